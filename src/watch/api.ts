/**
 * api.ts
 *
 * Client for the Moodle endpoints the watcher uses
 *
 * - creates a request context carrying the session cookie and browser-like headers
 * - GET pages with a small retry on 429/5xx
 * - POST batched calls to /lib/ajax/service.php (sesskey + timestamp query params)
 * - call core_course_get_course_module to map a cmid to its fsresource instance
 */

import { request, type APIRequestContext } from '@playwright/test';
import { z } from 'zod';
import type { JsonValue, MoodleSession, PostOptions, ServiceCall, ServiceReply, WatchConfig } from './types';
import { extractServiceException, snippet, TransportError } from './errors';
import { assertAllowedRequest, SERVICE_PATH } from './safety';

export const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
};

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

// core_course_get_course_module answers { cm: { instance } }; some proxies flatten it
const moduleInfoSchema = z.union([
  z.object({ cm: z.object({ instance: z.coerce.number().int().positive() }) }),
  z.object({ instance: z.coerce.number().int().positive() }),
]);

export type ClientOptions = {
  maxRetries?: number;
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

export class MoodleClient implements MoodleSession {
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly ctx: APIRequestContext,
    readonly baseUrl: string,
    opts: ClientOptions = {},
  ) {
    this.maxRetries = opts.maxRetries ?? 3;
    this.backoffMs = opts.backoffMs ?? 800;
    this.sleep = opts.sleep ?? ((ms) => new Promise((r) => setTimeout(r, ms)));
  }

  async fetchPage(path: string): Promise<string> {
    assertAllowedRequest(this.baseUrl, 'GET', path);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const res = await this.ctx.get(path);
        if (res.ok()) return await res.text();
        if (!RETRY_STATUSES.has(res.status())) {
          throw new TransportError(`GET ${path} returned HTTP ${res.status()}`, res.status(), await res.text());
        }
        lastError = new TransportError(`GET ${path} returned HTTP ${res.status()}`, res.status(), await res.text());
      } catch (e) {
        // non-retryable status: give up right away
        if (e instanceof TransportError && e.status !== null && !RETRY_STATUSES.has(e.status)) throw e;
        lastError = e;
      }
      if (attempt < this.maxRetries) await this.sleep(this.backoffMs * attempt);
    }

    if (lastError instanceof TransportError) throw lastError;
    throw new TransportError(`GET ${path} failed: ${lastError instanceof Error ? lastError.message : String(lastError)}`);
  }

  async postService(body: JsonValue, opts: PostOptions): Promise<ServiceReply> {
    assertAllowedRequest(this.baseUrl, 'POST', SERVICE_PATH);
    const params: Record<string, string> = {
      sesskey: opts.sesskey,
      timestamp: String(opts.timestampMs ?? Date.now()),
    };
    if (opts.info) params.info = opts.info;

    let status: number;
    let raw: string;
    try {
      const res = await this.ctx.post(SERVICE_PATH, {
        params,
        data: JSON.stringify(body),
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      });
      status = res.status();
      raw = await res.text();
    } catch (e) {
      throw new TransportError(`POST ${SERVICE_PATH} failed: ${e instanceof Error ? e.message : String(e)}`);
    }

    if (status < 200 || status >= 300) {
      throw new TransportError(`POST ${SERVICE_PATH} returned HTTP ${status}`, status, raw);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new TransportError(`POST ${SERVICE_PATH} returned a non-JSON body: ${snippet(raw)}`, status, raw);
    }
    return { status, raw, json };
  }

  async callService(methodname: string, args: ServiceCall['args'], sesskey: string): Promise<unknown> {
    const calls: ServiceCall[] = [{ index: 0, methodname, args }];
    const reply = await this.postService(calls, { sesskey, info: methodname });
    const ex = extractServiceException(reply.json);
    if (ex) throw new TransportError(`${methodname}: ${ex.errorcode}: ${ex.message}`, reply.status, reply.raw);
    const first: unknown = Array.isArray(reply.json) ? reply.json[0] : reply.json;
    return typeof first === 'object' && first !== null && 'data' in first ? first.data : first;
  }

  async lookupModuleInstance(cmid: number, sesskey: string): Promise<number | null> {
    const data = await this.callService('core_course_get_course_module', { cmid }, sesskey);
    const parsed = moduleInfoSchema.safeParse(data);
    if (!parsed.success) return null;
    return 'cm' in parsed.data ? parsed.data.cm.instance : parsed.data.instance;
  }

  async dispose(): Promise<void> {
    await this.ctx.dispose();
  }
}

// Cookie is sent as a raw header so the exact value the browser had is reused.
export async function createMoodleClient(cfg: WatchConfig, opts: ClientOptions = {}): Promise<MoodleClient> {
  const extraHTTPHeaders: Record<string, string> = { ...DEFAULT_HEADERS };
  if (cfg.cookieHeader) extraHTTPHeaders.Cookie = cfg.cookieHeader;

  const ctx = await request.newContext({
    baseURL: cfg.baseUrl,
    extraHTTPHeaders,
    timeout: cfg.timeoutMs,
  });
  return new MoodleClient(ctx, cfg.baseUrl, opts);
}
