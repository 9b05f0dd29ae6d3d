import { describe, it, expect, beforeEach } from 'vitest';
import { IntelligenceQueryService } from '../../src/services/IntelligenceQueryService.js';
import { SimilaritySearchService } from '../../src/services/SimilaritySearchService.js';
import { NotFoundError, ValidationError } from '../../src/errors.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';
import { MockEmbeddingRepository } from '../mocks/MockEmbeddingRepository.js';
import { MockIntelligenceRepository } from '../mocks/MockIntelligenceRepository.js';
import { makeArchivedRow, testUuid } from '../helpers/fixtures.js';

function scored(score: number) {
  return { time_archived: '2026-03-04T00:00:00.000Z', max_rate_class: 'importance', max_rate_score: score };
}

describe('IntelligenceQueryService', () => {
  let repo: MockIntelligenceRepository;
  let service: IntelligenceQueryService;

  const berlin = makeArchivedRow({
    uuid: testUuid(11),
    pub_time: '2026-03-01T08:00:00.000Z',
    title: 'Rail strike in Berlin',
    locations: ['Berlin'],
    people: ['Ada Weber'],
    appendix: scored(8),
  });
  const paris = makeArchivedRow({
    uuid: testUuid(12),
    pub_time: '2026-03-03T08:00:00.000Z',
    title: 'Flooding in Paris',
    locations: ['Paris'],
    appendix: scored(6),
  });
  const summit = makeArchivedRow({
    uuid: testUuid(13),
    pub_time: '2026-03-02T08:00:00.000Z',
    title: 'Summit talks',
    locations: ['Berlin', 'Paris'],
    organizations: ['Trade Council'],
    appendix: scored(9),
  });
  const minor = makeArchivedRow({ uuid: testUuid(14), state: 'low_value', appendix: scored(2) });

  beforeEach(() => {
    repo = new MockIntelligenceRepository();
    repo.seed('archived', berlin);
    repo.seed('archived', paris);
    repo.seed('archived', summit);
    repo.seed('low_value', minor);

    const similarity = new SimilaritySearchService(
      repo,
      new MockEmbeddingRepository(),
      new MockEmbeddingProvider()
    );
    service = new IntelligenceQueryService(repo, similarity);
  });

  // ── getByUuid ──

  describe('getByUuid', () => {
    it('should return the item with its partition and raw content', async () => {
      const item = await service.getByUuid(berlin.uuid);

      expect(item.partition).toBe('archived');
      expect(item.title).toBe('Rail strike in Berlin');
      expect(item.rawContent).toBe(berlin.raw_content);
      expect(item.appendix.maxRateScore).toBe(8);
    });

    it('should throw NotFoundError for an unknown uuid', async () => {
      await expect(service.getByUuid(testUuid(999))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  // ── filter mode ──

  describe('query (filter)', () => {
    it('should list archived items newest first by default', async () => {
      const response = await service.query({});

      expect(response.total).toBe(3);
      expect(response.results.map((r) => r.uuid)).toEqual([paris.uuid, summit.uuid, berlin.uuid]);
      expect(response.results[0].rawContent).toBeUndefined();
    });

    it('should match any of the listed locations', async () => {
      const response = await service.query({ locations: ['Berlin'] });
      expect(response.results.map((r) => r.uuid)).toEqual([summit.uuid, berlin.uuid]);
    });

    it('should AND different filter fields', async () => {
      const response = await service.query({ locations: ['Berlin'], keywords: 'summit' });
      expect(response.results.map((r) => r.uuid)).toEqual([summit.uuid]);
    });

    it('should filter by people and organizations', async () => {
      expect((await service.query({ people: ['Ada Weber'] })).total).toBe(1);
      expect((await service.query({ organizations: ['Trade Council'] })).results[0].uuid).toBe(
        summit.uuid
      );
    });

    it('should filter by minimum max rating', async () => {
      const response = await service.query({ threshold: 8.5 });
      expect(response.results.map((r) => r.uuid)).toEqual([summit.uuid]);
    });

    it('should filter by publish time range', async () => {
      const response = await service.query({
        startTime: '2026-03-02T00:00:00.000Z',
        endTime: '2026-03-02T23:59:59.000Z',
      });
      expect(response.results.map((r) => r.uuid)).toEqual([summit.uuid]);
    });

    it('should paginate and report the full total', async () => {
      const response = await service.query({ page: 2, perPage: 1 });

      expect(response.total).toBe(3);
      expect(response.results.map((r) => r.uuid)).toEqual([summit.uuid]);
    });

    it('should query another collection when asked', async () => {
      const response = await service.query({ collection: 'low_value' });

      expect(response.total).toBe(1);
      expect(response.results[0].partition).toBe('low_value');
    });

    it('should ignore blank list entries', async () => {
      const response = await service.query({ locations: [' '] });
      expect(response.total).toBe(3);
    });

    it('should reject invalid paging', async () => {
      await expect(service.query({ perPage: 0 })).rejects.toThrow('Invalid query');
    });
  });

  // ── mode dispatch ──

  describe('query (mode dispatch)', () => {
    it('should reject an unknown searchMode', async () => {
      await expect(service.query({ searchMode: 'fuzzy' })).rejects.toThrow('Invalid searchMode');
    });

    it('should route vector_similar to the similarity search', async () => {
      await expect(
        service.query({ searchMode: 'vector_similar', reference: testUuid(999) })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should route vector_text to the similarity search', async () => {
      await expect(service.query({ searchMode: 'vector_text' })).rejects.toThrow(
        'Invalid similarity query'
      );
    });

    it('should reject a non-object query', async () => {
      await expect(service.query('everything')).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
