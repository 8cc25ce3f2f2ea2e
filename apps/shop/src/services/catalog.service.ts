import { Observable, defer, of } from 'rxjs'
import { map } from 'rxjs/operators'
import { nullOn404 } from '@shopfront/http'
import type { HttpClient } from '@shopfront/http'
import type { Product } from '../types'
import { parseCatalog, parseProduct } from '../catalog/product'

/** Both calls are cold and emit exactly once. */
export interface ProductCatalogService {
  fetchAll(): Observable<Product[]>
  /** Emits `null` when there is no product with that id. */
  fetchById(id: number): Observable<Product | null>
}

/**
 * Catalog served by the shop API:
 *   GET /products      → Product[]
 *   GET /products/:id  → Product, 404 when unknown
 * Bodies are validated; a malformed one errors the Observable.
 */
export function createHttpCatalogService(http: HttpClient): ProductCatalogService {
  return {
    fetchAll: () => http.get('/products').pipe(map(parseCatalog)),
    fetchById: (id) =>
      http.get(`/products/${id}`).pipe(
        map(parseProduct),
        nullOn404(),
      ),
  }
}

/** Catalog held in memory, e.g. the bundled seed data. */
export function createInMemoryCatalogService(products: readonly Product[]): ProductCatalogService {
  const byId = new Map(products.map(p => [p.id, p]))
  return {
    fetchAll: () => defer(() => of([...products])),
    fetchById: (id) => defer(() => of(byId.get(id) ?? null)),
  }
}
