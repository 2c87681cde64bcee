import { logger } from "../logger";
import { sleep } from "../concurrency";

export interface FetchWithRetryOptions {
  url: string;
  timeoutMs: number;
  maxRetries: number;
  backoffStartMs: number;
  headers?: Record<string, string>;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchResult {
  body: string | null;
  success: boolean;
  error?: string;
  rateLimited: boolean;
  responseTimeMs: number;
  statusCode?: number;
  timedOut?: boolean;
}

const USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0",
];

export function pickUserAgent(): string {
  return USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)];
}

/**
 * GET an HTML page. 429 and 5xx responses and network failures are
 * retried with exponential backoff; other non-2xx responses return at once.
 */
export async function fetchWithRetry(
  options: FetchWithRetryOptions,
): Promise<FetchResult> {
  const { url, timeoutMs, maxRetries, backoffStartMs } = options;
  const wait = options.sleep ?? sleep;
  let lastError = "";
  let rateLimited = false;
  let timedOut = false;
  let lastStatus: number | undefined;
  const startTime = Date.now();

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          Accept: "text/html,application/xhtml+xml",
          "User-Agent": pickUserAgent(),
          ...options.headers,
        },
      });

      if (response.status === 429) {
        rateLimited = true;
        lastStatus = 429;
        lastError = "Rate limited (429)";
        const retryAfter = Number.parseInt(response.headers.get("Retry-After") ?? "", 10);
        const waitMs = Number.isNaN(retryAfter)
          ? backoffStartMs * Math.pow(2, attempt)
          : retryAfter * 1000;

        logger.warn(
          `Rate limited (429) on ${url} (attempt ${attempt + 1}/${maxRetries + 1})`,
        );

        if (attempt < maxRetries) {
          await wait(waitMs);
          continue;
        }
        break;
      }

      if (response.status >= 500) {
        lastStatus = response.status;
        lastError = `Server error: ${response.status} ${response.statusText}`;
        logger.warn(`${lastError} on ${url} (attempt ${attempt + 1}/${maxRetries + 1})`);

        if (attempt < maxRetries) {
          await wait(backoffStartMs * Math.pow(2, attempt));
          continue;
        }
        break;
      }

      if (!response.ok) {
        return {
          body: null,
          success: false,
          error: `HTTP ${response.status}: ${response.statusText}`,
          rateLimited: false,
          responseTimeMs: Date.now() - startTime,
          statusCode: response.status,
        };
      }

      const body = await response.text();
      return {
        body,
        success: true,
        rateLimited: false,
        responseTimeMs: Date.now() - startTime,
        statusCode: response.status,
      };
    } catch (error) {
      const isAbort = error instanceof Error && error.name === "AbortError";
      timedOut = isAbort;
      lastStatus = undefined;
      lastError = isAbort ? `Timeout after ${timeoutMs}ms` : String(error);

      logger.warn(
        `Fetch error on ${url}: ${lastError} (attempt ${attempt + 1}/${maxRetries + 1})`,
      );

      if (attempt < maxRetries) {
        await wait(backoffStartMs * Math.pow(2, attempt));
        continue;
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  return {
    body: null,
    success: false,
    error: lastError,
    rateLimited,
    responseTimeMs: Date.now() - startTime,
    statusCode: lastStatus,
    timedOut,
  };
}
