import { CancelledError, SourceError, toCancelledError } from "../errors.js";
import { sourceLogger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

export type FetchLike = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

export interface SessionOptions {
  /** Source name for logs */
  name: string;
  userAgent: string;
  timeoutMs: number;
  /** Run-level cancellation; aborting it aborts every request of the session */
  signal?: AbortSignal;
  fetch?: FetchLike;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Retry-After as seconds or an HTTP date.
 */
export function parseRetryAfter(
  header: string | null,
  now = Date.now()
): number | undefined {
  if (header === null || header.trim() === "") {
    return undefined;
  }
  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(header);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export function errorForStatus(response: Response, url: string): SourceError {
  const { status } = response;
  const message = `HTTP ${String(status)} ${response.statusText} for ${url}`;

  if (status === 404) {
    return new SourceError("not_found", message, { status });
  }
  if (status === 429) {
    return new SourceError("throttled", message, {
      status,
      retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
    });
  }
  if (status === 408 || status >= 500) {
    return new SourceError("transient", message, { status });
  }
  return new SourceError("http", message, { status });
}

// ============================================================================
// Source Session
// ============================================================================

/**
 * HTTP session owned by one source client for the length of one run.
 *
 * Closing the session (or aborting the run signal) aborts every request
 * still in flight; later requests fail with CancelledError.
 */
export class SourceSession {
  private readonly controller = new AbortController();
  private readonly fetchImpl: FetchLike;
  private readonly unlink: () => void;
  private requests = 0;

  constructor(private readonly options: SessionOptions) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));

    const parent = options.signal;
    if (parent === undefined) {
      this.unlink = () => undefined;
    } else if (parent.aborted) {
      this.controller.abort(parent.reason);
      this.unlink = () => undefined;
    } else {
      const onAbort = (): void => {
        this.controller.abort(parent.reason);
      };
      parent.addEventListener("abort", onAbort, { once: true });
      this.unlink = () => {
        parent.removeEventListener("abort", onAbort);
      };
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get requestCount(): number {
    return this.requests;
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  async getJson(url: string): Promise<unknown> {
    return this.request(url, "application/json", async (response) => {
      const body = await response.text();
      try {
        return JSON.parse(body) as unknown;
      } catch (error) {
        throw new SourceError("malformed", `Invalid JSON from ${url}`, {
          cause: error,
        });
      }
    });
  }

  async getText(url: string): Promise<string> {
    return this.request(url, "text/html", (response) => response.text());
  }

  close(): void {
    this.unlink();
    if (!this.controller.signal.aborted) {
      this.controller.abort(new CancelledError("Session closed"));
    }
    sourceLogger.debug(
      { source: this.options.name, requests: this.requests },
      "Source session closed"
    );
  }

  private async request<T>(
    url: string,
    accept: string,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const sessionSignal = this.controller.signal;
    if (sessionSignal.aborted) {
      throw toCancelledError(sessionSignal);
    }

    const requestController = new AbortController();
    const timer = setTimeout(() => {
      requestController.abort(
        new SourceError(
          "transient",
          `Request timed out after ${String(this.options.timeoutMs)}ms: ${url}`
        )
      );
    }, this.options.timeoutMs);
    const onSessionAbort = (): void => {
      requestController.abort(sessionSignal.reason);
    };
    sessionSignal.addEventListener("abort", onSessionAbort, { once: true });

    this.requests++;
    const startTime = performance.now();

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: accept,
        },
        signal: requestController.signal,
      });

      sourceLogger.debug(
        {
          source: this.options.name,
          url,
          status: response.status,
          duration: `${String(Math.round(performance.now() - startTime))}ms`,
        },
        "Received response"
      );

      if (!response.ok) {
        // Release the connection; the body is never read
        await response.body?.cancel();
        throw errorForStatus(response, url);
      }
      return await read(response);
    } catch (error) {
      if (sessionSignal.aborted) {
        throw toCancelledError(sessionSignal);
      }
      const reason: unknown = requestController.signal.reason;
      if (requestController.signal.aborted && reason instanceof SourceError) {
        throw reason;
      }
      if (error instanceof SourceError) {
        throw error;
      }
      throw new SourceError(
        "transient",
        `Network error for ${url}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timer);
      sessionSignal.removeEventListener("abort", onSessionAbort);
    }
  }
}
