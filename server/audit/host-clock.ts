import { getHost } from "./url-utils";

function pause(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Time of the last request sent to each host. The frontier stamps a host when
 * it dispatches a URL; the fetcher goes through `acquire` before any further
 * request of that fetch (a retry or a redirect hop).
 */
export class HostClock {
  private readonly lastRequest = new Map<string, number>();

  constructor(readonly delayMs: number) {}

  /** Earliest time the host of `url` may be requested again. */
  readyAt(url: string, minGapMs = 0): number {
    const last = this.lastRequest.get(getHost(url));
    return last === undefined ? -Infinity : last + Math.max(this.delayMs, minGapMs);
  }

  stamp(url: string, now: number): void {
    this.lastRequest.set(getHost(url), now);
  }

  /**
   * Waits until the host of `url` is out of its delay window, then stamps it.
   * Resolves early once `signal` aborts; the caller's request then fails as
   * aborted.
   */
  async acquire(url: string, signal?: AbortSignal, minGapMs = 0): Promise<void> {
    for (;;) {
      if (signal?.aborted) return;
      const now = Date.now();
      const readyAt = this.readyAt(url, minGapMs);
      if (readyAt <= now) {
        this.stamp(url, now);
        return;
      }
      await pause(readyAt - now, signal);
    }
  }
}
