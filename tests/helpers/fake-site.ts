import type { HttpClient, HttpRequestInit, HttpResponse } from '../../server/audit/types';

export interface FakeRoute {
  status?: number;
  headers?: Record<string, string>;
  body?: string;
  /** Milliseconds before the response arrives (runs on timers, so fake timers drive it). */
  delayMs?: number;
  /** Rejects like a runtime network error carrying this `cause.code`. */
  errorCode?: string;
}

export interface RecordedRequest {
  url: string;
  at: number;
  init: HttpRequestInit;
}

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

function canonical(url: string): string {
  return new URL(url).toString();
}

/**
 * In-process stand-in for a website. Unknown URLs answer 404; every request
 * is recorded with the (possibly faked) time it was made.
 */
export class FakeSite {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, FakeRoute>();

  constructor(routes: Record<string, FakeRoute> = {}) {
    Object.entries(routes).forEach(([url, route]) => this.route(url, route));
  }

  route(url: string, route: FakeRoute): this {
    this.routes.set(canonical(url), route);
    return this;
  }

  html(url: string, body: string, extra: Omit<FakeRoute, 'body'> = {}): this {
    return this.route(url, { headers: { 'content-type': 'text/html; charset=utf-8' }, ...extra, body });
  }

  redirect(url: string, location: string, status = 301): this {
    return this.route(url, { status, headers: { location } });
  }

  requestsTo(url: string): RecordedRequest[] {
    const target = canonical(url);
    return this.requests.filter((r) => r.url === target);
  }

  readonly http: HttpClient = (url, init) => this.respond(url, init);

  private respond(url: string, init: HttpRequestInit): Promise<HttpResponse> {
    this.requests.push({ url, at: Date.now(), init });
    const route = this.routes.get(url) ?? { status: 404, body: 'Not found' };

    const headers = new Map(Object.entries(route.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v]));
    const body = route.body ?? '';
    const response: HttpResponse = {
      status: route.status ?? 200,
      headers: { get: (name) => headers.get(name.toLowerCase()) ?? null },
      text: async () => body,
    };

    return new Promise<HttpResponse>((resolve, reject) => {
      if (init.signal.aborted) {
        reject(abortError());
        return;
      }

      const settle = () => {
        init.signal.removeEventListener('abort', onAbort);
        if (route.errorCode) {
          const cause = Object.assign(new Error(`connect ${route.errorCode}`), { code: route.errorCode });
          reject(new TypeError('fetch failed', { cause }));
        } else {
          resolve(response);
        }
      };

      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = () => {
        clearTimeout(timer);
        reject(abortError());
      };
      init.signal.addEventListener('abort', onAbort, { once: true });

      if (route.delayMs && route.delayMs > 0) {
        timer = setTimeout(settle, route.delayMs);
      } else {
        void Promise.resolve().then(settle);
      }
    });
  }
}

export function page(options: {
  title?: string;
  description?: string;
  h1?: string[];
  links?: string[];
  canonical?: string;
  body?: string;
}): string {
  const head = [
    options.title !== undefined ? `<title>${options.title}</title>` : '',
    options.description !== undefined ? `<meta name="description" content="${options.description}">` : '',
    options.canonical !== undefined ? `<link rel="canonical" href="${options.canonical}">` : '',
  ].join('');
  const headings = (options.h1 ?? []).map((text) => `<h1>${text}</h1>`).join('');
  const links = (options.links ?? []).map((href) => `<a href="${href}">link</a>`).join('');
  return `<!doctype html><html><head>${head}</head><body>${headings}${links}${options.body ?? ''}</body></html>`;
}
