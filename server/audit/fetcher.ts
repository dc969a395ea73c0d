import type { FetchFailure, FetchOutcome, HttpClient } from "./types";
import type { HostClock } from "./host-clock";
import { isSSRFSafe } from "./url-utils";

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);
/** Decoded characters kept for parsing; the download itself is not capped. */
export const MAX_PARSED_CHARS = 5_000_000;
/** Least spacing between a failed attempt and its retry when a clock is given. */
export const RETRY_BACKOFF_MS = 1000;
const ACCEPT = "text/html,application/xhtml+xml,application/xml;q=0.9,text/plain;q=0.8,*/*;q=0.5";

const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN", "EAI_NONAME", "EAI_FAIL"]);
const CONNECT_TIMEOUT_CODES = new Set(["UND_ERR_CONNECT_TIMEOUT", "ETIMEDOUT", "ESOCKETTIMEDOUT"]);
const READ_TIMEOUT_CODES = new Set(["UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT"]);
const TLS_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "EPROTO",
]);

export interface FetchPageOptions {
  http: HttpClient;
  userAgent: string;
  timeoutMs: number;
  retryTimeoutMs: number;
  maxRedirects: number;
  blockPrivateNetworks: boolean;
  /** Run-level cancellation; aborting it yields an `Aborted` failure. */
  signal?: AbortSignal;
  /**
   * Per-host politeness. The first request is assumed to be admitted by the
   * caller; a retry and every redirect hop wait here first.
   */
  clock?: HostClock;
}

type FetchPhase = "connect" | "body";

function codeOf(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "code" in value && typeof value.code === "string") {
    return value.code;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }
  return String(error);
}

/** Maps a thrown fetch error onto the failure taxonomy. */
export function classifyFetchError(
  error: unknown,
  context: { runAborted: boolean; timedOut: boolean; phase: FetchPhase }
): FetchFailure {
  if (context.runAborted) {
    return { kind: "Aborted", message: "Audit deadline reached before the response completed" };
  }
  if (context.timedOut) {
    return context.phase === "connect"
      ? { kind: "ConnectTimeout", message: "Timed out waiting for response headers" }
      : { kind: "ReadTimeout", message: "Timed out reading the response body" };
  }

  const message = messageOf(error);
  const code = (error instanceof Error ? codeOf(error.cause) : undefined) ?? codeOf(error) ?? "";

  if (DNS_CODES.has(code)) return { kind: "DNSError", message };
  if (code === "ECONNREFUSED") return { kind: "ConnectionRefused", message };
  if (CONNECT_TIMEOUT_CODES.has(code)) return { kind: "ConnectTimeout", message };
  if (READ_TIMEOUT_CODES.has(code)) return { kind: "ReadTimeout", message };
  if (TLS_CODES.has(code) || code.startsWith("ERR_TLS_") || code.startsWith("ERR_SSL_")) {
    return { kind: "TLSError", message };
  }
  return { kind: "NetworkError", message };
}

function isRetryable(outcome: FetchOutcome): boolean {
  if (outcome.ok) return false;
  const { failure } = outcome;
  if (failure.kind === "ConnectTimeout" || failure.kind === "ReadTimeout") return true;
  return failure.kind === "HTTPError" && RETRYABLE_STATUS.has(failure.code);
}

async function attemptFetch(
  url: string,
  options: FetchPageOptions,
  timeoutMs: number,
  admitted: boolean
): Promise<FetchOutcome> {
  const started = Date.now();
  const controller = new AbortController();
  let timedOut = false;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  // The timeout covers one request; waiting on the clock is not counted.
  const arm = () => {
    clearTimeout(timeoutId);
    timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
  };
  const onRunAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onRunAbort, { once: true });

  const chain = [url];
  let currentUrl = url;
  let phase: FetchPhase = "connect";

  const trace = () => ({
    finalUrl: currentUrl,
    redirectChain: chain.length > 1 ? [...chain] : [],
    fetchMs: Date.now() - started,
  });

  try {
    if (options.signal?.aborted) {
      controller.abort();
    }

    for (let redirectCount = 0; ; redirectCount++) {
      if (options.blockPrivateNetworks) {
        const ssrfCheck = await isSSRFSafe(currentUrl);
        if (!ssrfCheck.safe) {
          return {
            ok: false,
            statusCode: null,
            failure: { kind: "Blocked", message: `SSRF protection: ${ssrfCheck.reason}` },
            ...trace(),
          };
        }
      }

      if (options.clock && (redirectCount > 0 || !admitted)) {
        await options.clock.acquire(currentUrl, options.signal, redirectCount > 0 ? 0 : RETRY_BACKOFF_MS);
      }

      phase = "connect";
      arm();
      const response = await options.http(currentUrl, {
        method: "GET",
        signal: controller.signal,
        headers: {
          "User-Agent": options.userAgent,
          Accept: ACCEPT,
        },
        redirect: "manual",
      });

      const location = response.headers.get("location");
      if (response.status >= 300 && response.status < 400 && location) {
        clearTimeout(timeoutId);
        if (redirectCount >= options.maxRedirects) {
          return {
            ok: false,
            statusCode: response.status,
            failure: {
              kind: "TooManyRedirects",
              message: `Gave up after ${options.maxRedirects} redirects`,
            },
            ...trace(),
          };
        }

        let next: string;
        try {
          next = new URL(location, currentUrl).toString();
        } catch {
          return {
            ok: false,
            statusCode: response.status,
            failure: { kind: "NetworkError", message: `Invalid redirect location: ${location}` },
            ...trace(),
          };
        }
        currentUrl = next;
        chain.push(currentUrl);
        continue;
      }

      if (response.status >= 400) {
        return {
          ok: false,
          statusCode: response.status,
          failure: { kind: "HTTPError", code: response.status, message: `HTTP ${response.status}` },
          ...trace(),
        };
      }

      phase = "body";
      const body = (await response.text()).slice(0, MAX_PARSED_CHARS);

      return {
        ok: true,
        statusCode: response.status,
        contentType: response.headers.get("content-type") ?? "",
        body,
        contentLength: Buffer.byteLength(body),
        ...trace(),
      };
    }
  } catch (error) {
    return {
      ok: false,
      statusCode: null,
      failure: classifyFetchError(error, {
        runAborted: options.signal?.aborted ?? false,
        timedOut,
        phase,
      }),
      ...trace(),
    };
  } finally {
    clearTimeout(timeoutId);
    options.signal?.removeEventListener("abort", onRunAbort);
  }
}

/**
 * One GET with manual redirect handling. A timeout or a transient status is
 * retried once with the longer `retryTimeoutMs`. With a `clock`, the retry and
 * each redirect hop respect the host's crawl delay. Never throws.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<FetchOutcome> {
  const started = Date.now();

  let outcome = await attemptFetch(url, options, options.timeoutMs, true);
  if (isRetryable(outcome) && !options.signal?.aborted) {
    outcome = await attemptFetch(url, options, options.retryTimeoutMs, false);
  }

  return { ...outcome, fetchMs: Date.now() - started };
}

/** Short description of a failure for logs and finding text. */
export function describeFailure(failure: FetchFailure): string {
  return failure.kind === "HTTPError" ? `HTTP ${failure.code}` : failure.kind;
}
