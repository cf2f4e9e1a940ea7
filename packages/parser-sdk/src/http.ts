const DEFAULT_TIMEOUT_MS = 15_000;
const MAX_ATTEMPTS = 3;
const RETRY_DELAYS_MS = [100, 300];

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

export interface FetchWithRetryOptions {
  /** Name used in error messages, e.g. "Remotive API". */
  label: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class SourceHttpError extends Error {
  readonly status: number;

  constructor(label: string, status: number) {
    super(`${label} returned ${status}`);
    this.name = 'SourceHttpError';
    this.status = status;
  }
}

function shouldRetryStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function retryDelay(attempt: number): number {
  return RETRY_DELAYS_MS[attempt - 1] ?? RETRY_DELAYS_MS[RETRY_DELAYS_MS.length - 1] ?? 0;
}

/**
 * GET with a per-request timeout. Network errors, 429 and 5xx are retried with
 * fixed delays; any other non-2xx status fails at once.
 */
export async function fetchWithRetry(url: string, options: FetchWithRetryOptions): Promise<Response> {
  const fetchImpl = options.fetchImpl ?? fetch;
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    let res: Response;

    try {
      res = await fetchImpl(url, {
        headers: options.headers ?? BROWSER_HEADERS,
        signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt < MAX_ATTEMPTS) {
        await sleep(retryDelay(attempt));
      }
      continue;
    }

    if (!res.ok) {
      const statusError = new SourceHttpError(options.label, res.status);
      if (!shouldRetryStatus(res.status)) {
        throw statusError;
      }

      lastError = statusError;
      if (attempt < MAX_ATTEMPTS) {
        await sleep(retryDelay(attempt));
      }
      continue;
    }

    return res;
  }

  throw lastError ?? new Error(`${options.label} request failed after ${MAX_ATTEMPTS} attempts`);
}

export async function fetchJson(url: string, options: FetchWithRetryOptions): Promise<unknown> {
  const res = await fetchWithRetry(url, options);
  try {
    return await res.json();
  } catch (error) {
    const parseError = error instanceof Error ? error : new Error(String(error));
    throw new Error(`${options.label} response parse failed: ${parseError.message}`);
  }
}

export async function fetchText(url: string, options: FetchWithRetryOptions): Promise<string> {
  const res = await fetchWithRetry(url, options);
  return res.text();
}
