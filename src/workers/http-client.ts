import { request, type Dispatcher } from 'undici';
import { config } from '../config.js';
import { DecodeError, FetchError } from '../errors.js';
import type { HttpClient, HttpRequestOptions } from '../types/adapter.js';
import type { JsonValue } from '../types/json.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'SportsbookMarkets/0.1 (odds research)',
  Accept: 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.5',
};

export interface UndiciHttpClientOptions {
  timeoutMs?: number;
  /** Alternate dispatcher, e.g. an undici MockAgent */
  dispatcher?: Dispatcher;
}

/**
 * JSON GET over undici. Every call carries header, body and overall
 * deadlines; a timeout surfaces as a FetchError like any transport failure.
 */
export class UndiciHttpClient implements HttpClient {
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: UndiciHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.HTTP_TIMEOUT_MS;
    this.dispatcher = options.dispatcher;
  }

  async getJson(url: string, options: HttpRequestOptions = {}): Promise<JsonValue> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;

    let statusCode: number;
    let text: string;
    try {
      const res = await request(url, {
        method: 'GET',
        headers: { ...DEFAULT_HEADERS, ...options.headers },
        maxRedirections: 3,
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
        signal: AbortSignal.timeout(timeoutMs),
        ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
      });
      statusCode = res.statusCode;
      text = await res.body.text();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new FetchError(`GET ${url} failed: ${reason}`, url, { cause: err });
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw new FetchError(`GET ${url} returned HTTP ${statusCode}`, url, { status: statusCode });
    }

    try {
      const parsed: JsonValue = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new DecodeError(`Response from ${url} is not valid JSON`, url, { cause: err });
    }
  }
}
