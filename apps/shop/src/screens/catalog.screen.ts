import { Observable, Subscription } from 'rxjs'
import { distinctUntilChanged, map, shareReplay, switchMap } from 'rxjs/operators'
import { createStore, ofType } from '@shopfront/store'
import type { Store } from '@shopfront/store'
import { catchAndReport } from '@shopfront/errors'
import type { ErrorHandler } from '@shopfront/errors'
import type { FilterQuery, ImageSource, Product } from '../types'
import type { ProductCatalogService } from '../services/catalog.service'
import type { ImageResolver } from '../services/image-resolver'
import {
  ALL_CATEGORIES,
  EMPTY_QUERY,
  categoriesOf,
  filterProducts,
  isFiltering,
  toggleCategory,
} from '../catalog/filter'
import { loadErrorMessage } from './messages'

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface CatalogState {
  /** Last successfully loaded catalog; kept while reloading or after an error. */
  products: Product[]
  loading: boolean
  error: string | null
  query: FilterQuery
}

export type CatalogAction =
  | { type: 'FETCH' }
  | { type: 'FETCH_SUCCESS'; products: Product[] }
  | { type: 'FETCH_ERROR'; error: string }
  | { type: 'SET_SEARCH_TEXT'; text: string }
  | { type: 'CLEAR_SEARCH' }
  | { type: 'TOGGLE_CATEGORY'; label: string }
  | { type: 'SELECT_ALL_CATEGORIES' }

export function catalogReducer(state: CatalogState, action: CatalogAction): CatalogState {
  switch (action.type) {
    case 'FETCH':
      return { ...state, loading: true, error: null }
    case 'FETCH_SUCCESS':
      return { ...state, loading: false, products: action.products }
    case 'FETCH_ERROR':
      return { ...state, loading: false, error: action.error }
    case 'SET_SEARCH_TEXT':
      return { ...state, query: { ...state.query, text: action.text } }
    case 'CLEAR_SEARCH':
      return { ...state, query: { ...state.query, text: '' } }
    case 'TOGGLE_CATEGORY':
      return {
        ...state,
        query: { ...state.query, category: toggleCategory(state.query.category, action.label) },
      }
    case 'SELECT_ALL_CATEGORIES':
      return { ...state, query: { ...state.query, category: ALL_CATEGORIES } }
  }
}

export const INITIAL_CATALOG_STATE: CatalogState = {
  products: [],
  loading: true,
  error: null,
  query: EMPTY_QUERY,
}

// ---------------------------------------------------------------------------
// View derivation
// ---------------------------------------------------------------------------

export type CatalogStatus = 'loading' | 'error' | 'empty' | 'ready'

export interface CatalogItem {
  product: Product
  image: ImageSource
}

export interface CatalogView {
  status: CatalogStatus
  error: string | null
  query: FilterQuery
  /** Chip labels, from the whole catalog rather than the filtered list. */
  categories: string[]
  items: CatalogItem[]
  /** Number of matches, only while the query narrows the catalog. */
  resultCount: number | null
}

function statusOf(state: CatalogState): CatalogStatus {
  if (state.loading) return 'loading'
  if (state.error !== null) return 'error'
  if (state.products.length === 0) return 'empty'
  return 'ready'
}

export function deriveCatalogView(state: CatalogState, images: ImageResolver): CatalogView {
  const visible = filterProducts(state.products, state.query)
  return {
    status: statusOf(state),
    error: state.error,
    query: state.query,
    categories: categoriesOf(state.products),
    items: visible.map(product => ({ product, image: images.resolve(product.imageRef) })),
    resultCount: isFiltering(state.query) ? visible.length : null,
  }
}

// ---------------------------------------------------------------------------
// Screen
// ---------------------------------------------------------------------------

export interface CatalogScreenDeps {
  catalog: ProductCatalogService
  images: ImageResolver
  errorHandler: ErrorHandler
}

export interface CatalogScreen {
  store: Store<CatalogState, CatalogAction>
  view$: Observable<CatalogView>
  setSearchText(text: string): void
  clearSearch(): void
  /** Chip click: selects `label`, or clears it when already selected. */
  toggleCategory(label: string): void
  selectAllCategories(): void
  retry(): void
  /** Cancels any fetch in flight and completes view$. */
  destroy(): void
}

/** Starts loading the catalog immediately. */
export function createCatalogScreen({ catalog, images, errorHandler }: CatalogScreenDeps): CatalogScreen {
  const store = createStore<CatalogState, CatalogAction>(catalogReducer, INITIAL_CATALOG_STATE)
  const effects = new Subscription()

  // ── Effect: FETCH → fetchAll, latest request wins ───────────────────────
  effects.add(
    store.actions$.pipe(
      ofType('FETCH'),
      switchMap(() =>
        catalog.fetchAll().pipe(
          map((products): CatalogAction => ({ type: 'FETCH_SUCCESS', products })),
          catchAndReport<CatalogAction>(errorHandler, {
            fallback: (e) => ({ type: 'FETCH_ERROR', error: loadErrorMessage('products', e) }),
            context: 'catalog/FETCH',
          }),
        ),
      ),
    ).subscribe(action => store.dispatch(action)),
  )

  const view$ = store.state$.pipe(
    distinctUntilChanged(),
    map(state => deriveCatalogView(state, images)),
    shareReplay({ bufferSize: 1, refCount: true }),
  )

  store.dispatch({ type: 'FETCH' })

  return {
    store,
    view$,
    setSearchText: (text) => store.dispatch({ type: 'SET_SEARCH_TEXT', text }),
    clearSearch: () => store.dispatch({ type: 'CLEAR_SEARCH' }),
    toggleCategory: (label) => store.dispatch({ type: 'TOGGLE_CATEGORY', label }),
    selectAllCategories: () => store.dispatch({ type: 'SELECT_ALL_CATEGORIES' }),
    retry: () => store.dispatch({ type: 'FETCH' }),
    destroy() {
      effects.unsubscribe()
      store.destroy()
    },
  }
}
