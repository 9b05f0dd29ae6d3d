/**
 * Row and reply builders shared across tests.
 */

import type { IntelligenceRow } from '../../src/types/database.js';
import type { PipelinePolicy } from '../../src/types/models.js';

let counter = 0;

/** A deterministic UUID-shaped id: 00000000-0000-4000-8000-<n>. */
export function testUuid(n: number = ++counter): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

export function makeRow(overrides: Partial<IntelligenceRow> = {}): IntelligenceRow {
  const uuid = overrides.uuid ?? testUuid();
  return {
    uuid,
    fingerprint: `url:${uuid}`,
    informant: `https://news.test/${uuid}`,
    pub_time: '2026-03-01T08:00:00.000Z',
    raw_title: 'Port strike enters second week',
    raw_content: 'Dock workers at the northern terminal remain on strike.',
    title: null,
    brief: null,
    text: null,
    times: [],
    locations: [],
    people: [],
    organizations: [],
    geography: null,
    impact: null,
    reason: null,
    tips: null,
    taxonomy: null,
    sub_category: [],
    rate: {},
    state: 'pending',
    attempts: 0,
    lease_token: null,
    lease_expires_at: null,
    next_attempt_at: null,
    last_error: null,
    appendix: { time_got: '2026-03-01T08:05:00.000Z' },
    created_at: '2026-03-01T08:05:00.000Z',
    updated_at: '2026-03-01T08:05:00.000Z',
    ...overrides,
  };
}

/** A classified row as it sits in the archived partition. */
export function makeArchivedRow(overrides: Partial<IntelligenceRow> = {}): IntelligenceRow {
  return makeRow({
    title: 'Port strike disrupts shipping',
    brief: 'A strike at the northern terminal has halted container traffic.',
    text: 'Container traffic has been halted for a second week.',
    taxonomy: 'economy_finance',
    rate: { importance: 8, credibility: 5 },
    state: 'archived',
    attempts: 1,
    appendix: {
      time_got: '2026-03-01T08:05:00.000Z',
      time_archived: '2026-03-01T09:00:00.000Z',
      max_rate_class: 'importance',
      max_rate_score: 8,
    },
    ...overrides,
  });
}

export function validReply(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    time: ['2026-03-01'],
    location: ['Northport'],
    geography: 'Northern Europe',
    people: [],
    organization: ['Dock Workers Union'],
    event_title: 'Port strike disrupts shipping',
    event_brief: 'A strike at the northern terminal has halted container traffic.',
    event_text: 'Container traffic has been halted for a second week.',
    taxonomy: 'economy_finance',
    sub_category: ['logistics'],
    impact: 'Delays for regional importers.',
    reason: 'Sustained disruption of a major port.',
    rate: { importance: 8, credibility: 5 },
    tips: 'Watch for a negotiated settlement.',
    ...overrides,
  });
}

export const TEST_POLICY: PipelinePolicy = Object.freeze({
  scoreThreshold: 6,
  maxAttempts: 3,
  leaseMs: 60_000,
  aiTimeoutMs: 1_000,
  retryBackoffMs: 1_000,
});
