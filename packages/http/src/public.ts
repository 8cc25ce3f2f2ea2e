import { Observable, OperatorFunction, of, throwError } from 'rxjs'
import { ajax, AjaxConfig, AjaxError } from 'rxjs/ajax'
import { catchError, map } from 'rxjs/operators'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HttpRequestOptions extends Omit<AjaxConfig, 'url' | 'method' | 'body'> {}

/**
 * Read-only JSON client. Bodies come back as `unknown`: callers validate
 * what they receive instead of trusting a type parameter.
 */
export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Observable<unknown>
}

/**
 * - `request(config)` runs before the XHR is sent, with the URL already resolved
 *   against `baseUrl`, and returns the config to use.
 * - `response(source$)` wraps the response Observable (retry, logging, mapping).
 */
export interface HttpInterceptor {
  request?(config: AjaxConfig): AjaxConfig
  response?(source$: Observable<unknown>): Observable<unknown>
}

export interface HttpClientConfig {
  /** Prepended to relative paths. Trailing slashes are dropped. */
  baseUrl?: string
  /** Request phase left-to-right, response phase right-to-left. */
  interceptors?: HttpInterceptor[]
  /** XHR timeout in ms; 0 or absent means none. */
  timeoutMs?: number
}

// ---------------------------------------------------------------------------
// createHttpClient
// ---------------------------------------------------------------------------

const ABSOLUTE_URL = /^https?:\/\//i

/**
 * Every call returns a cold Observable: nothing is sent until subscription,
 * and unsubscribing aborts the XHR.
 *
 * @example
 *   const http = createHttpClient({ baseUrl: 'http://localhost:3000/api', timeoutMs: 10_000 })
 *   http.get('/products').subscribe(body => console.log(body))
 */
export function createHttpClient(config?: HttpClientConfig): HttpClient {
  const baseUrl = config?.baseUrl?.replace(/\/+$/, '') ?? ''
  const interceptors = config?.interceptors ?? []
  const timeout = config?.timeoutMs ?? 0

  function resolve(url: string): string {
    if (!baseUrl || ABSOLUTE_URL.test(url)) return url
    return baseUrl + (url.startsWith('/') ? url : '/' + url)
  }

  function send(ajaxConfig: AjaxConfig): Observable<unknown> {
    let cfg: AjaxConfig = { ...ajaxConfig, url: resolve(ajaxConfig.url) }
    if (timeout > 0) cfg = { ...cfg, timeout }
    for (const i of interceptors) {
      if (i.request) cfg = i.request(cfg)
    }

    let result$: Observable<unknown> = ajax<unknown>({
      ...cfg,
      headers: { Accept: 'application/json', ...cfg.headers },
    }).pipe(map((res) => res.response))

    for (let idx = interceptors.length - 1; idx >= 0; idx--) {
      const intercept = interceptors[idx].response
      if (intercept) result$ = intercept(result$)
    }

    return result$
  }

  return {
    get(url: string, options?: HttpRequestOptions): Observable<unknown> {
      return send({ ...options, url, method: 'GET' })
    },
  }
}

// ---------------------------------------------------------------------------
// nullOn404
// ---------------------------------------------------------------------------

/**
 * Turns a 404 into `null` so "not found" travels as a value.
 * Every other error is rethrown untouched.
 *
 * @example
 *   http.get(`/products/${id}`).pipe(nullOn404())
 */
export function nullOn404<T>(): OperatorFunction<T, T | null> {
  return (source$) =>
    source$.pipe(
      catchError((err: unknown) =>
        err instanceof AjaxError && err.status === 404 ? of(null) : throwError(() => err),
      ),
    )
}
