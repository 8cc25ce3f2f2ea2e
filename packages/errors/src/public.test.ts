import { describe, it, expect, vi, afterEach } from 'vitest'
import { Subject, of, throwError } from 'rxjs'
import { AjaxError, AjaxTimeoutError } from 'rxjs/ajax'
import { map, toArray } from 'rxjs/operators'
import { createErrorHandler, catchAndReport, classifyError, ValidationError } from './public'
import type { AppError, ErrorHandler } from './public'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let cleanupSubs: Array<{ unsubscribe(): void }> = []

afterEach(() => {
  cleanupSubs.forEach((s) => s.unsubscribe())
  cleanupSubs = []
})

function makeHandler(onError?: (e: AppError) => void): ErrorHandler {
  const [handler, sub] = createErrorHandler({ enableGlobalCapture: false, onError })
  cleanupSubs.push(sub)
  return handler
}

function collectErrors(handler: ErrorHandler): AppError[] {
  const collected: AppError[] = []
  cleanupSubs.push(handler.errors$.subscribe((e) => collected.push(e)))
  return collected
}

function ajaxError(status: number): AjaxError {
  // AjaxError only reads `status`, `responseType` and `response` off the xhr here.
  const xhr = { status, responseType: 'json', response: null } as unknown as XMLHttpRequest
  return new AjaxError(`ajax error ${status}`, xhr, {
    url: '/products/9',
    method: 'GET',
    headers: {},
    body: undefined,
    withCredentials: false,
    async: true,
    timeout: 0,
    crossDomain: false,
    responseType: 'json',
  })
}

// ---------------------------------------------------------------------------
// ValidationError
// ---------------------------------------------------------------------------

describe('ValidationError', () => {
  it('prefixes the message with the field', () => {
    const err = new ValidationError('stock', 'must be a non-negative integer')
    expect(err.message).toBe('stock: must be a non-negative integer')
    expect(err.field).toBe('stock')
    expect(err.detail).toBe('must be a non-negative integer')
    expect(err.name).toBe('ValidationError')
    expect(err).toBeInstanceOf(Error)
  })
})

// ---------------------------------------------------------------------------
// classifyError
// ---------------------------------------------------------------------------

describe('classifyError()', () => {
  it('recognises validation errors', () => {
    expect(classifyError(new ValidationError('id', 'bad'))).toEqual({ kind: 'validation' })
  })

  it('maps an AjaxError with a status to http', () => {
    expect(classifyError(ajaxError(503))).toEqual({ kind: 'http', status: 503 })
  })

  it('maps an AjaxError with status 0 to network', () => {
    expect(classifyError(ajaxError(0))).toEqual({ kind: 'network' })
  })

  it('maps AjaxTimeoutError to timeout', () => {
    const xhr = { status: 0, responseType: 'json', response: null } as unknown as XMLHttpRequest
    const err = new AjaxTimeoutError(xhr, {
      url: '/products',
      method: 'GET',
      headers: {},
      body: undefined,
      withCredentials: false,
      async: true,
      timeout: 10,
      crossDomain: false,
      responseType: 'json',
    })
    expect(classifyError(err)).toEqual({ kind: 'timeout' })
  })

  it('falls back to unknown', () => {
    expect(classifyError(new Error('boom'))).toEqual({ kind: 'unknown' })
    expect(classifyError('boom')).toEqual({ kind: 'unknown' })
  })
})

// ---------------------------------------------------------------------------
// createErrorHandler
// ---------------------------------------------------------------------------

describe('createErrorHandler', () => {
  it('emits reported errors with source manual by default', () => {
    const handler = makeHandler()
    const collected = collectErrors(handler)

    handler.reportError(new Error('boom'))

    expect(collected).toHaveLength(1)
    expect(collected[0].message).toBe('boom')
    expect(collected[0].source).toBe('manual')
    expect(collected[0].kind).toBe('unknown')
  })

  it('records source, context and classification', () => {
    const handler = makeHandler()
    const collected = collectErrors(handler)

    handler.reportError(ajaxError(404), 'observable', 'detail/FETCH')

    expect(collected[0].source).toBe('observable')
    expect(collected[0].context).toBe('detail/FETCH')
    expect(collected[0].kind).toBe('http')
    expect(collected[0].status).toBe(404)
  })

  it('normalises strings and plain objects into Errors', () => {
    const handler = makeHandler()
    const collected = collectErrors(handler)

    handler.reportError('oops')
    handler.reportError({ code: 7 })

    expect(collected[0].error).toBeInstanceOf(Error)
    expect(collected[0].message).toBe('oops')
    expect(collected[1].message).toBe('{"code":7}')
  })

  it('calls onError before errors$ emits', () => {
    const order: string[] = []
    const handler = makeHandler(() => order.push('onError'))
    cleanupSubs.push(handler.errors$.subscribe(() => order.push('errors$')))

    handler.reportError(new Error('x'))

    expect(order).toEqual(['onError', 'errors$'])
  })

  it('completes errors$ when the subscription is released', () => {
    const [handler, sub] = createErrorHandler({ enableGlobalCapture: false })
    let done = false
    handler.errors$.subscribe({ complete: () => { done = true } })

    sub.unsubscribe()

    expect(done).toBe(true)
  })

  it('skips global capture where there is no window', () => {
    const [handler, sub] = createErrorHandler()
    expect(typeof handler.reportError).toBe('function')
    sub.unsubscribe()
  })
})

// ---------------------------------------------------------------------------
// catchAndReport
// ---------------------------------------------------------------------------

describe('catchAndReport()', () => {
  it('passes values through when nothing fails', () => {
    const handler = makeHandler()
    const values: number[] = []

    of(1, 2).pipe(catchAndReport(handler)).subscribe((v) => values.push(v))

    expect(values).toEqual([1, 2])
  })

  it('reports and completes without a value when no fallback is given', () => {
    const handler = makeHandler()
    const collected = collectErrors(handler)
    const values: number[] = []
    let completed = false

    throwError(() => new Error('fail'))
      .pipe(catchAndReport<number>(handler, { context: 'ctx' }))
      .subscribe({ next: (v) => values.push(v), complete: () => { completed = true } })

    expect(values).toEqual([])
    expect(completed).toBe(true)
    expect(collected[0].context).toBe('ctx')
    expect(collected[0].source).toBe('observable')
  })

  it('emits a value fallback', () => {
    const handler = makeHandler()
    const values: string[] = []

    throwError(() => new Error('fail'))
      .pipe(catchAndReport<string>(handler, { fallback: 'fallback' }))
      .subscribe((v) => values.push(v))

    expect(values).toEqual(['fallback'])
  })

  it('subscribes to an Observable fallback', () => {
    const handler = makeHandler()
    let result: string[] = []

    throwError(() => new Error('fail'))
      .pipe(catchAndReport<string>(handler, { fallback: of('a', 'b') }), toArray())
      .subscribe((v) => { result = v })

    expect(result).toEqual(['a', 'b'])
  })

  it('hands the classified error to a function fallback', () => {
    const handler = makeHandler()
    const values: string[] = []

    throwError(() => ajaxError(500))
      .pipe(
        catchAndReport<string>(handler, {
          fallback: ({ kind, status }) => `${kind}:${status ?? '-'}`,
        }),
      )
      .subscribe((v) => values.push(v))

    expect(values).toEqual(['http:500'])
  })

  it('keeps an outer pipeline alive when used per inner request', () => {
    const handler = makeHandler()
    const spy = vi.fn()
    cleanupSubs.push(handler.errors$.subscribe(spy))
    const trigger = new Subject<boolean>()
    const results: string[] = []

    trigger.pipe(
      map((fail) => {
        if (fail) throw new Error('inner')
        return 'ok'
      }),
      catchAndReport<string>(handler, { fallback: 'recovered' }),
    ).subscribe((v) => results.push(v))

    trigger.next(false)
    trigger.next(true)

    expect(results).toEqual(['ok', 'recovered'])
    expect(spy).toHaveBeenCalledTimes(1)
  })
})
