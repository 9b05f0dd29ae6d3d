import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { readJson, validateBody } from '../../src/middleware/validate-body.js';
import { ValidationError } from '../../src/errors.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

const ctx: HandlerContext = { requestId: 'req-1', params: {} };

const schema = z.object({
  uuid: z.string().min(1),
  perPage: z.number().int().min(1).default(10),
});

function post(body: string): Request {
  return new Request('http://test/api/v1/manual-ratings', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

const echo: Handler = async (req) => new Response(await req.text(), { status: 200 });

describe('validateBody', () => {
  const wrapped = validateBody(schema)(echo);

  it('should pass the parsed body with defaults to the handler', async () => {
    const res = await wrapped(post('{"uuid":"abc","extra":true}'), ctx);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ uuid: 'abc', perPage: 10 });
  });

  it('should reject malformed JSON', async () => {
    const res = await wrapped(post('{"uuid":'), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'INVALID_REQUEST', message: 'Request body must be valid JSON' },
    });
  });

  it('should reject a body that is not an object', async () => {
    const res = await wrapped(post('[1,2]'), ctx);
    expect((await res.json()).error.message).toBe('Request body must be a JSON object');
  });

  it('should list every schema issue', async () => {
    const res = await wrapped(post('{"uuid":"","perPage":0}'), ctx);
    const body = await res.json();

    expect(res.status).toBe(400);
    expect(body.error.details.issues).toEqual([
      'uuid: String must contain at least 1 character(s)',
      'perPage: Number must be greater than or equal to 1',
    ]);
    expect(body.error.message).toBe(body.error.details.issues.join('; '));
  });

  it('should keep the request method and URL', async () => {
    const handler: Handler = async (req) => new Response(`${req.method} ${new URL(req.url).pathname}`);
    const res = await validateBody(schema)(handler)(post('{"uuid":"abc"}'), ctx);

    expect(await res.text()).toBe('POST /api/v1/manual-ratings');
  });
});

describe('readJson', () => {
  it('should parse a JSON body', async () => {
    expect(await readJson(post('[{"a":1}]'))).toEqual([{ a: 1 }]);
  });

  it('should throw ValidationError for invalid JSON', async () => {
    await expect(readJson(post('nope'))).rejects.toBeInstanceOf(ValidationError);
  });
});
