import { EMPTY, Observable, OperatorFunction, Subject, Subscription, fromEvent, of } from 'rxjs'
import { AjaxError, AjaxTimeoutError } from 'rxjs/ajax'
import { catchError } from 'rxjs/operators'

// ---------------------------------------------------------------------------
// ValidationError
// ---------------------------------------------------------------------------

/** Thrown when data crossing a boundary (API payload, env, user input) is malformed. */
export class ValidationError extends Error {
  readonly field: string
  /** The message without the field prefix. */
  readonly detail: string

  constructor(field: string, detail: string) {
    super(`${field}: ${detail}`)
    this.name = 'ValidationError'
    this.field = field
    this.detail = detail
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ErrorKind = 'network' | 'http' | 'timeout' | 'validation' | 'unknown'

export interface AppError {
  /**
   *   'observable' : caught inside a pipeline via catchAndReport
   *   'global'     : window error event
   *   'promise'    : unhandledrejection
   *   'manual'     : handler.reportError(...)
   */
  source: 'observable' | 'global' | 'promise' | 'manual'
  kind: ErrorKind
  /** HTTP status, for `http` errors. */
  status?: number
  error: Error
  message: string
  timestamp: number
  /** Label identifying the pipeline or screen, e.g. 'catalog/FETCH'. */
  context?: string
}

export interface ErrorHandlerConfig {
  /**
   * Attach window `error` / `unhandledrejection` listeners (default true).
   * Ignored where there is no window.
   */
  enableGlobalCapture?: boolean
  /** Called synchronously for every reported error, before errors$ emits. */
  onError?: (error: AppError) => void
}

export interface ErrorHandler {
  /** Hot stream of every reported error. Does not replay. */
  errors$: Observable<AppError>
  reportError(error: unknown, source?: AppError['source'], context?: string): void
}

// ---------------------------------------------------------------------------
// Normalisation
// ---------------------------------------------------------------------------

function toError(raw: unknown): Error {
  if (raw instanceof Error) return raw
  if (typeof raw === 'string') return new Error(raw)
  try {
    return new Error(JSON.stringify(raw))
  } catch {
    return new Error(String(raw))
  }
}

/**
 * Sorts a thrown value into an ErrorKind. An AjaxError with status 0 never
 * reached the server, so it counts as a network failure.
 */
export function classifyError(raw: unknown): { kind: ErrorKind; status?: number } {
  if (raw instanceof ValidationError) return { kind: 'validation' }
  if (raw instanceof AjaxTimeoutError) return { kind: 'timeout' }
  if (raw instanceof AjaxError) {
    return raw.status === 0 ? { kind: 'network' } : { kind: 'http', status: raw.status }
  }
  return { kind: 'unknown' }
}

// ---------------------------------------------------------------------------
// createErrorHandler
// ---------------------------------------------------------------------------

/**
 * Creates the central error bus. The returned Subscription removes the
 * global listeners.
 *
 * @example
 *   const [handler, sub] = createErrorHandler({ onError: e => console.error(e.message) })
 */
export function createErrorHandler(config?: ErrorHandlerConfig): [ErrorHandler, Subscription] {
  const enableGlobal = config?.enableGlobalCapture ?? true
  const onError = config?.onError

  const bus = new Subject<AppError>()
  const cleanupSub = new Subscription()

  function reportError(raw: unknown, source: AppError['source'] = 'manual', context?: string): void {
    const error = toError(raw)
    const { kind, status } = classifyError(raw)
    const appError: AppError = {
      source,
      kind,
      ...(status !== undefined ? { status } : {}),
      error,
      message: error.message,
      timestamp: Date.now(),
      context,
    }
    onError?.(appError)
    bus.next(appError)
  }

  if (enableGlobal && typeof window !== 'undefined') {
    cleanupSub.add(
      fromEvent<ErrorEvent>(window, 'error').subscribe((e) => {
        reportError(e.error ?? new Error(e.message), 'global')
      }),
    )
    cleanupSub.add(
      fromEvent<PromiseRejectionEvent>(window, 'unhandledrejection').subscribe((e) => {
        reportError(e.reason, 'promise')
      }),
    )
  }
  cleanupSub.add(() => bus.complete())

  return [{ errors$: bus.asObservable(), reportError }, cleanupSub]
}

// ---------------------------------------------------------------------------
// catchAndReport
// ---------------------------------------------------------------------------

export interface CatchAndReportOptions<T> {
  /**
   * Emitted after reporting. A function receives the classified error so the
   * fallback can say what went wrong. Completes without a value if omitted.
   */
  fallback?: T | Observable<T> | ((error: AppErrorSummary) => T)
  context?: string
}

export interface AppErrorSummary {
  kind: ErrorKind
  status?: number
  message: string
}

/**
 * Drop-in for `catchError` that reports to the handler first.
 *
 * @example
 *   catalog.fetchAll().pipe(
 *     map(products => ({ type: 'FETCH_SUCCESS' as const, products })),
 *     catchAndReport(handler, {
 *       fallback: ({ kind }) => ({ type: 'FETCH_ERROR' as const, error: kind }),
 *       context: 'catalog/FETCH',
 *     }),
 *   )
 */
export function catchAndReport<T>(
  handler: ErrorHandler,
  options?: CatchAndReportOptions<T>,
): OperatorFunction<T, T> {
  return (source: Observable<T>): Observable<T> =>
    source.pipe(
      catchError((raw: unknown): Observable<T> => {
        handler.reportError(raw, 'observable', options?.context)

        const fb = options?.fallback
        if (fb === undefined) return EMPTY
        if (fb instanceof Observable) return fb
        if (isFallbackFn<T>(fb)) {
          return of(fb({ ...classifyError(raw), message: toError(raw).message }))
        }
        return of(fb)
      }),
    )
}

function isFallbackFn<T>(
  fb: T | ((error: AppErrorSummary) => T),
): fb is (error: AppErrorSummary) => T {
  return typeof fb === 'function'
}
