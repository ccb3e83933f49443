export const DEFAULT_FETCH_HEADERS = { 'User-Agent': 'FishingSafetyAdvisor/1.0', Accept: 'application/json' };

/** Reads what the caller needs from the response; runs under the same timeout as the request. */
export type ReadResponse<T> = (response: Response) => Promise<T>;

export type FetchOptions = RequestInit & { timeoutMs?: number };

export type FetchWithTimeout = <T>(url: string, read: ReadResponse<T>, options?: FetchOptions) => Promise<T>;

export class FetchTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Builds the process-wide fetch used for outbound calls. The timer covers the
 * whole exchange, headers and body, and an aborted caller signal aborts it too.
 */
export const createFetchWithTimeout =
  (defaultTimeoutMs: number, fetchImpl: typeof fetch = globalThis.fetch.bind(globalThis)): FetchWithTimeout =>
  async <T>(url: string, read: ReadResponse<T>, { timeoutMs = defaultTimeoutMs, ...init }: FetchOptions = {}): Promise<T> => {
    const controller = new AbortController();
    const upstreamSignal = init.signal;
    const abortFromUpstream = () => {
      controller.abort(upstreamSignal?.reason);
    };

    let timedOut = false;
    let rejectOnAbort = () => {};
    // Settles as soon as the exchange is aborted, even if a body stream ignores the signal.
    const aborted = new Promise<never>((_resolve, reject) => {
      rejectOnAbort = () => {
        reject(timedOut ? new FetchTimeoutError(url, timeoutMs) : controller.signal.reason);
      };
      controller.signal.addEventListener('abort', rejectOnAbort, { once: true });
    });

    if (upstreamSignal) {
      if (upstreamSignal.aborted) {
        abortFromUpstream();
      } else {
        upstreamSignal.addEventListener('abort', abortFromUpstream, { once: true });
      }
    }
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const exchange = async () => {
      const response = await fetchImpl(url, { ...init, signal: controller.signal });
      return read(response);
    };

    try {
      return await Promise.race([exchange(), aborted]);
    } catch (error) {
      if (timedOut) {
        throw new FetchTimeoutError(url, timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
      controller.signal.removeEventListener('abort', rejectOnAbort);
      if (upstreamSignal) {
        upstreamSignal.removeEventListener('abort', abortFromUpstream);
      }
    }
  };
