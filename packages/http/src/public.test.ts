import { describe, it, expect, vi, beforeEach } from 'vitest'
import { firstValueFrom, of, throwError, Observable } from 'rxjs'
import { map } from 'rxjs/operators'
import { AjaxConfig, AjaxError } from 'rxjs/ajax'
import { createHttpClient, nullOn404 } from './public'
import type { HttpInterceptor } from './public'

// Capture the config handed to ajax and answer with a canned body
vi.mock('rxjs/ajax', async () => {
  const actual = await vi.importActual<typeof import('rxjs/ajax')>('rxjs/ajax')
  return {
    ...actual,
    ajax: vi.fn((config: AjaxConfig) => of({ response: { mocked: true, url: config.url } })),
  }
})

import { ajax } from 'rxjs/ajax'
const mockedAjax = vi.mocked<(config: AjaxConfig) => ReturnType<typeof ajax>>(ajax)

function lastConfig(): AjaxConfig {
  return mockedAjax.mock.calls[mockedAjax.mock.calls.length - 1][0] as AjaxConfig
}

function ajaxError(status: number): AjaxError {
  const xhr = { status, responseType: 'json', response: null } as unknown as XMLHttpRequest
  return new AjaxError(`ajax error ${status}`, xhr, {
    url: '/x',
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

describe('createHttpClient', () => {
  beforeEach(() => {
    mockedAjax.mockClear()
  })

  it('issues a GET and emits the response body', async () => {
    const client = createHttpClient()
    const body = await firstValueFrom(client.get('/products'))

    expect(lastConfig().method).toBe('GET')
    expect(lastConfig().url).toBe('/products')
    expect(body).toEqual({ mocked: true, url: '/products' })
  })

  it('asks for JSON', async () => {
    await firstValueFrom(createHttpClient().get('/products'))
    expect((lastConfig().headers as Record<string, string>).Accept).toBe('application/json')
  })

  it('prepends baseUrl to relative paths', async () => {
    const client = createHttpClient({ baseUrl: 'http://localhost:3000/api' })
    await firstValueFrom(client.get('/products'))
    expect(lastConfig().url).toBe('http://localhost:3000/api/products')
  })

  it('adds the missing slash between baseUrl and path', async () => {
    const client = createHttpClient({ baseUrl: 'http://localhost:3000/api/' })
    await firstValueFrom(client.get('products/3'))
    expect(lastConfig().url).toBe('http://localhost:3000/api/products/3')
  })

  it('leaves absolute URLs alone', async () => {
    const client = createHttpClient({ baseUrl: 'http://localhost:3000/api' })
    await firstValueFrom(client.get('https://cdn.example.com/catalog.json'))
    expect(lastConfig().url).toBe('https://cdn.example.com/catalog.json')
  })

  it('treats the scheme of an absolute URL case-insensitively', async () => {
    const client = createHttpClient({ baseUrl: 'http://localhost:3000/api' })
    await firstValueFrom(client.get('HTTPS://cdn.example.com/catalog.json'))
    expect(lastConfig().url).toBe('HTTPS://cdn.example.com/catalog.json')
  })

  it('hands request interceptors the resolved URL', async () => {
    const seen: string[] = []
    const spy: HttpInterceptor = {
      request: (c) => {
        seen.push(c.url)
        return c
      },
    }
    const client = createHttpClient({ baseUrl: 'http://localhost:3000/api', interceptors: [spy] })

    await firstValueFrom(client.get('/products/3'))

    expect(seen).toEqual(['http://localhost:3000/api/products/3'])
  })

  it('applies timeoutMs to every request', async () => {
    const client = createHttpClient({ timeoutMs: 2500 })
    await firstValueFrom(client.get('/products'))
    expect(lastConfig().timeout).toBe(2500)
  })

  it('sets no timeout by default', async () => {
    await firstValueFrom(createHttpClient().get('/products'))
    expect(lastConfig().timeout).toBeUndefined()
  })

  it('runs request interceptors left to right', async () => {
    const order: string[] = []
    const first: HttpInterceptor = {
      request: (c) => {
        order.push('first')
        return { ...c, headers: { ...c.headers, 'X-Client': 'shop' } }
      },
    }
    const second: HttpInterceptor = {
      request: (c) => {
        order.push('second')
        return c
      },
    }

    await firstValueFrom(createHttpClient({ interceptors: [first, second] }).get('/products'))

    expect(order).toEqual(['first', 'second'])
    expect((lastConfig().headers as Record<string, string>)['X-Client']).toBe('shop')
  })

  it('runs response interceptors right to left', async () => {
    const order: string[] = []
    const tag = (name: string): HttpInterceptor => ({
      response: (source$: Observable<unknown>) => {
        order.push(name)
        return source$
      },
    })

    await firstValueFrom(createHttpClient({ interceptors: [tag('a'), tag('b')] }).get('/products'))

    expect(order).toEqual(['b', 'a'])
  })

  it('lets a response interceptor replace the body', async () => {
    const unwrap: HttpInterceptor = {
      response: (source$) => source$.pipe(map(() => 'replaced')),
    }
    const body = await firstValueFrom(createHttpClient({ interceptors: [unwrap] }).get('/products'))
    expect(body).toBe('replaced')
  })
})

describe('nullOn404()', () => {
  it('passes values through', async () => {
    const value = await firstValueFrom(of(5).pipe(nullOn404()))
    expect(value).toBe(5)
  })

  it('maps a 404 to null', async () => {
    const value = await firstValueFrom(throwError(() => ajaxError(404)).pipe(nullOn404()))
    expect(value).toBeNull()
  })

  it('rethrows other HTTP errors', async () => {
    const err = ajaxError(500)
    await expect(firstValueFrom(throwError(() => err).pipe(nullOn404()))).rejects.toBe(err)
  })

  it('rethrows non-HTTP errors', async () => {
    const err = new Error('offline')
    await expect(firstValueFrom(throwError(() => err).pipe(nullOn404()))).rejects.toBe(err)
  })
})
