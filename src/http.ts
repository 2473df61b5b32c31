import { request } from 'undici';

export type HttpResult = { status: number; body: string };

export interface HttpClient {
  get(url: string, headers?: Record<string, string>): Promise<HttpResult>;
}

export class HttpStatusError extends Error {
  constructor(readonly url: string, readonly status: number) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

export function createHttpClient(opts: { timeoutMs: number; userAgent: string }): HttpClient {
  return {
    async get(url, headers = {}) {
      const controller = new AbortController();
      const id = setTimeout(() => controller.abort(), opts.timeoutMs);
      try {
        const res = await request(url, {
          method: 'GET',
          headers: { 'user-agent': opts.userAgent, ...headers },
          signal: controller.signal,
        });
        const body = await res.body.text();
        return { status: res.statusCode, body };
      } finally {
        clearTimeout(id);
      }
    },
  };
}

/** GET that insists on a 200 and returns the body text. */
export async function getOk(http: HttpClient, url: string, headers?: Record<string, string>): Promise<string> {
  const res = await http.get(url, headers);
  if (res.status !== 200) throw new HttpStatusError(url, res.status);
  return res.body;
}

export function parseJson(body: string): unknown {
  return JSON.parse(body);
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function field(v: unknown, key: string): unknown {
  return isRecord(v) ? v[key] : undefined;
}

export function asArray(v: unknown): unknown[] {
  return Array.isArray(v) ? v : [];
}
