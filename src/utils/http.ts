export type HttpErrorKind = "network" | "status" | "malformed" | "timeout" | "aborted";

export class HttpError extends Error {
  readonly kind: HttpErrorKind;
  readonly status?: number;
  readonly url: string;
  readonly responseText?: string;

  constructor(
    message: string,
    opts: { kind: HttpErrorKind; url: string; status?: number; responseText?: string; cause?: unknown },
  ) {
    super(message, { cause: opts.cause });
    this.name = "HttpError";
    this.kind = opts.kind;
    this.url = opts.url;
    this.status = opts.status;
    this.responseText = opts.responseText;
  }
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
  headers?: Record<string, string>;
  /** Defaults to the global fetch */
  fetch?: FetchLike;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  /** Caller-side cancellation, independent of the per-request timeout */
  signal?: AbortSignal;
}

/**
 * Thin JSON-over-HTTP client. One attempt per call: no retries, since every
 * attempt has to go through the caller's rate limiter.
 */
export class HttpClient {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;

  constructor(opts: HttpClientOptions) {
    this.timeoutMs = opts.timeoutMs;
    this.userAgent = opts.userAgent;
    this.headers = opts.headers ?? {};
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
  }

  async getJson(url: string, opts: RequestOptions = {}): Promise<unknown> {
    let parsedUrl: URL;
    try {
      parsedUrl = new URL(url);
    } catch {
      throw new HttpError(`Invalid URL: ${url}`, { kind: "network", url });
    }

    if (!["http:", "https:"].includes(parsedUrl.protocol)) {
      throw new HttpError(
        `Invalid URL protocol "${parsedUrl.protocol}": only http: and https: are allowed`,
        { kind: "network", url },
      );
    }

    if (opts.signal?.aborted) {
      throw new HttpError(`Request aborted: ${url}`, { kind: "aborted", url });
    }

    const headers: Record<string, string> = {
      "user-agent": this.userAgent,
      accept: "application/json",
      ...this.headers,
      ...opts.headers,
    };

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    opts.signal?.addEventListener("abort", onCallerAbort, { once: true });

    const failure = (e: unknown): HttpError => {
      if (e instanceof HttpError) return e;
      if (timedOut) {
        return new HttpError(`Request timed out after ${this.timeoutMs} ms`, { kind: "timeout", url, cause: e });
      }
      if (opts.signal?.aborted) {
        return new HttpError(`Request aborted: ${url}`, { kind: "aborted", url, cause: e });
      }
      const reason = e instanceof Error && e.cause instanceof Error ? e.cause.message : String(e);
      return new HttpError(`Connect error: ${reason}`, { kind: "network", url, cause: e });
    };

    try {
      let res: Response;
      let text: string;
      try {
        res = await this.fetchImpl(url, { method: "GET", headers, signal: controller.signal });
        // Read the body under the same timeout; a truncated body is a failure, not data
        text = await res.text();
      } catch (e) {
        throw failure(e);
      }

      if (!res.ok) {
        throw new HttpError(`HTTP ${res.status} ${res.statusText}`.trim(), {
          kind: "status",
          url,
          status: res.status,
          responseText: text,
        });
      }

      try {
        return JSON.parse(text);
      } catch (parseError) {
        const parseMessage = parseError instanceof Error ? parseError.message : String(parseError);
        throw new HttpError(`Invalid JSON response: ${parseMessage}`, {
          kind: "malformed",
          url,
          status: res.status,
          responseText: text,
        });
      }
    } finally {
      clearTimeout(timeout);
      opts.signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
