import { Fingerprint, fingerprintHeaders, pickFingerprint } from "./fingerprint";
import { Logger, silentLogger } from "./logger";

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
}

export interface FetchRuntimeConfig extends RetryPolicy {
  timeoutMs: number;
}

export type Sleep = (ms: number) => Promise<void>;
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface RequestOptions {
  query?: Record<string, string | number>;
  headers?: Record<string, string>;
}

export interface HttpClient {
  getJson(url: string, options?: RequestOptions): Promise<unknown | null>;
  postJson(url: string, body: unknown, options?: RequestOptions): Promise<unknown | null>;
  resolveRedirect(url: string, options?: RequestOptions): Promise<string | null>;
}

export class HttpStatusError extends Error {
  constructor(readonly status: number, readonly url: string) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
  }
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

const defaultFetch: FetchFn = (url, init) => fetch(url, init);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Attempt n that fails waits baseDelayMs * n before attempt n + 1. Exhaustion yields null.
export async function withRetries<T>(
  operation: string,
  policy: RetryPolicy,
  task: (attempt: number) => Promise<T>,
  logger: Logger,
  sleep: Sleep = defaultSleep
): Promise<T | null> {
  const attempts = Math.max(1, policy.attempts);
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await task(attempt);
    } catch (error) {
      logger.warn("attempt_failed", { operation, attempt, attempts, error: errorMessage(error) });
    }
    if (attempt < attempts) {
      await sleep(policy.baseDelayMs * attempt);
    }
  }
  logger.error("retries_exhausted", { operation, attempts });
  return null;
}

// The timer also covers consuming the body, so a stalled body aborts the attempt.
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  consume: (response: Response) => Promise<T>,
  fetchImpl: FetchFn = defaultFetch
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });
    return await consume(response);
  } finally {
    clearTimeout(timeout);
  }
}

async function readJson(response: Response, url: string): Promise<unknown> {
  if (!response.ok) {
    await response.body?.cancel();
    throw new HttpStatusError(response.status, url);
  }
  const payload: unknown = await response.json();
  return payload;
}

export function withQuery(url: string, query: Record<string, string | number> | undefined): string {
  if (!query) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

export interface HttpClientDeps {
  fetch?: FetchFn;
  sleep?: Sleep;
  random?: () => number;
}

export class ResilientHttpClient implements HttpClient {
  private readonly fetchImpl: FetchFn;
  private readonly sleep: Sleep;
  private readonly random: () => number;

  constructor(
    private readonly runtime: FetchRuntimeConfig,
    private readonly logger: Logger = silentLogger(),
    deps: HttpClientDeps = {}
  ) {
    this.fetchImpl = deps.fetch ?? defaultFetch;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  private headersFor(fingerprint: Fingerprint, options: RequestOptions | undefined, extra: Record<string, string>): Headers {
    return new Headers({ ...fingerprintHeaders(fingerprint, extra), ...(options?.headers ?? {}) });
  }

  private requestJson(url: string, init: RequestInit): Promise<unknown> {
    return fetchWithTimeout(url, init, this.runtime.timeoutMs, (response) => readJson(response, url), this.fetchImpl);
  }

  async getJson(url: string, options?: RequestOptions): Promise<unknown | null> {
    const target = withQuery(url, options?.query);
    return withRetries(
      `GET ${target}`,
      this.runtime,
      async () => {
        const headers = this.headersFor(pickFingerprint(this.random), options, { Accept: "application/json" });
        return this.requestJson(target, { method: "GET", headers, redirect: "follow" });
      },
      this.logger,
      this.sleep
    );
  }

  async postJson(url: string, body: unknown, options?: RequestOptions): Promise<unknown | null> {
    const target = withQuery(url, options?.query);
    return withRetries(
      `POST ${target}`,
      this.runtime,
      async () => {
        const headers = this.headersFor(pickFingerprint(this.random), options, {
          Accept: "application/json",
          "Content-Type": "application/json"
        });
        return this.requestJson(target, { method: "POST", headers, body: JSON.stringify(body) });
      },
      this.logger,
      this.sleep
    );
  }

  async resolveRedirect(url: string, options?: RequestOptions): Promise<string | null> {
    const resolved = await withRetries(
      `REDIRECT ${url}`,
      this.runtime,
      async () => {
        const headers = this.headersFor(pickFingerprint(this.random), options, {});
        const location = await fetchWithTimeout(
          url,
          { method: "HEAD", headers, redirect: "manual" },
          this.runtime.timeoutMs,
          async (head) => head.headers.get("location"),
          this.fetchImpl
        );
        let target = location ? new URL(location, url).toString() : null;

        if (!target || target === url) {
          target = await fetchWithTimeout(
            url,
            { method: "GET", headers, redirect: "follow" },
            this.runtime.timeoutMs,
            async (followed) => {
              await followed.body?.cancel();
              return followed.url || null;
            },
            this.fetchImpl
          );
        }

        if (!target || target === url) {
          throw new Error("no redirect target");
        }
        return target;
      },
      this.logger,
      this.sleep
    );
    this.logger.debug("redirect_resolved", { url, original_url: resolved });
    return resolved;
  }
}
