/**
 * HTTP GET with a fixed User-Agent, timeout and bounded retry.
 *
 * Never throws: callers get a FetchResult and decide how to degrade.
 */

import { describeFetchError } from "@/lib/error-utils";

export interface HttpOptions {
  userAgent: string;
  timeoutMs: number;
  /** Additional attempts after the first */
  retries: number;
  /** Fixed delay between attempts */
  backoffMs: number;
  accept?: string;
}

export type FetchResult =
  | { success: true; status: number; body: string }
  | { success: false; error: string; status?: number };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export async function fetchText(url: string, options: HttpOptions): Promise<FetchResult> {
  const attempts = options.retries + 1;
  let lastError = "no attempt made";
  let lastStatus: number | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const response = await fetch(url, {
        headers: {
          "User-Agent": options.userAgent,
          Accept: options.accept ?? "*/*",
        },
        signal: AbortSignal.timeout(options.timeoutMs),
      });

      // 204 = valid request, nothing to report
      if (response.status === 204) {
        return { success: true, status: 204, body: "" };
      }

      if (response.ok) {
        return { success: true, status: response.status, body: await response.text() };
      }

      // Release the connection before retrying or giving up
      await response.body?.cancel();
      lastStatus = response.status;
      lastError = `HTTP ${response.status}`;
      if (!isRetryableStatus(response.status)) {
        return { success: false, error: lastError, status: response.status };
      }
    } catch (error) {
      lastStatus = undefined;
      lastError = describeFetchError(error);
    }

    if (attempt < attempts) {
      console.warn(
        `[HTTP] ${url} failed (${lastError}), retrying in ${options.backoffMs}ms (attempt ${attempt}/${attempts})`
      );
      if (options.backoffMs > 0) {
        await sleep(options.backoffMs);
      }
    }
  }

  return {
    success: false,
    error: `${lastError} after ${attempts} attempt${attempts === 1 ? "" : "s"}`,
    status: lastStatus,
  };
}
