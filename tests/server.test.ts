import { describe, it, expect } from 'vitest';
import {
  requestIdOf,
  sendResponse,
  toRequest,
  type OutgoingResponse,
} from '../src/server.js';

class RecordingResponse implements OutgoingResponse {
  statusCode = 0;
  headers: Record<string, string> = {};
  body: Buffer | null = null;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  setHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  send(body: Buffer): this {
    this.body = body;
    return this;
  }
}

describe('server', () => {
  describe('toRequest', () => {
    it('should rebuild the URL from the host header and carry the parsed body', async () => {
      const request = toRequest({
        method: 'POST',
        originalUrl: '/api/v1/import?collection=archived',
        headers: { host: 'pipeline.test:8080', 'content-type': 'application/x-ndjson' },
        body: Buffer.from('{"a":1}\n'),
      });

      expect(request.url).toBe('http://pipeline.test:8080/api/v1/import?collection=archived');
      expect(request.method).toBe('POST');
      expect(request.headers.get('content-type')).toBe('application/x-ndjson');
      expect(await request.text()).toBe('{"a":1}\n');
    });

    it('should join repeated headers', () => {
      const request = toRequest({
        method: 'GET',
        originalUrl: '/api/v1/pipeline/policy',
        headers: { 'x-forwarded-for': ['10.0.0.1', '10.0.0.2'] },
        body: {},
      });

      expect(request.url).toBe('http://localhost/api/v1/pipeline/policy');
      expect(request.headers.get('x-forwarded-for')).toBe('10.0.0.1, 10.0.0.2');
    });

    it('should send no body when nothing was read', async () => {
      const request = toRequest({
        method: 'POST',
        originalUrl: '/api/v1/pipeline/drain',
        headers: {},
        body: {},
      });

      expect(request.body).toBeNull();
      expect(await request.text()).toBe('');
    });
  });

  describe('sendResponse', () => {
    it('should copy status, headers and body', async () => {
      const res = new RecordingResponse();

      const response = new Response('{"ok":true}', {
        status: 201,
        headers: { 'Content-Type': 'application/json' },
      });

      await sendResponse(res, response);

      expect(res.statusCode).toBe(201);
      expect(res.headers['content-type']).toBe('application/json');
      expect(res.body?.toString('utf8')).toBe('{"ok":true}');
    });
  });

  describe('requestIdOf', () => {
    it('should keep a caller-supplied id', () => {
      expect(requestIdOf({ 'x-request-id': 'req-42' })).toBe('req-42');
    });

    it('should generate an id when none is supplied', () => {
      expect(requestIdOf({})).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[0-9a-f]{4}-[0-9a-f]{12}$/
      );
    });
  });
});
