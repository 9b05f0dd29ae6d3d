/**
 * Response and query-string helpers shared by the endpoint modules.
 */

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

/** Query-string parameters as a plain object; absent keys stay absent. */
export function searchParams(req: Request, keys: string[]): Record<string, string> {
  const params = new URL(req.url).searchParams;
  const result: Record<string, string> = {};
  for (const key of keys) {
    const value = params.get(key);
    if (value !== null && value !== '') result[key] = value;
  }
  return result;
}
