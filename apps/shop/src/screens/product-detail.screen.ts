import { EMPTY, Observable, Subscription, timer } from 'rxjs'
import { distinctUntilChanged, exhaustMap, filter, map, shareReplay, switchMap } from 'rxjs/operators'
import { createStore, ofType } from '@shopfront/store'
import type { Store } from '@shopfront/store'
import { catchAndReport } from '@shopfront/errors'
import type { ErrorHandler } from '@shopfront/errors'
import type { ImageSource, Product } from '../types'
import type { ProductCatalogService } from '../services/catalog.service'
import type { CartService } from '../services/cart.service'
import type { ImageResolver } from '../services/image-resolver'
import { CART_UNAVAILABLE_MESSAGE, cartFailureMessage, loadErrorMessage } from './messages'

// ---------------------------------------------------------------------------
// Local store
// ---------------------------------------------------------------------------

export interface ProductDetailState {
  productId: number
  product: Product | null
  loading: boolean
  error: string | null
  /** An add-to-cart request is in flight. */
  adding: boolean
  /** The "added to cart" message is showing. */
  confirmation: boolean
  /** Why the last add was refused, until the next attempt. */
  failure: string | null
}

export type ProductDetailAction =
  | { type: 'FETCH' }
  | { type: 'FETCH_SUCCESS'; product: Product | null }
  | { type: 'FETCH_ERROR'; error: string }
  | { type: 'ADD_TO_CART' }
  | { type: 'ADD_SUCCESS'; quantityInCart: number }
  | { type: 'ADD_FAILURE'; message: string }
  | { type: 'DISMISS_CONFIRMATION' }

export function canAddToCart(state: ProductDetailState): boolean {
  return !state.loading && state.error === null && state.product !== null &&
    state.product.hasStock && !state.adding
}

export function productDetailReducer(
  state: ProductDetailState,
  action: ProductDetailAction,
): ProductDetailState {
  switch (action.type) {
    case 'FETCH':
      return { ...state, loading: true, error: null }
    case 'FETCH_SUCCESS':
      return { ...state, loading: false, product: action.product }
    case 'FETCH_ERROR':
      return { ...state, loading: false, error: action.error }
    case 'ADD_TO_CART':
      return canAddToCart(state) ? { ...state, adding: true, failure: null } : state
    case 'ADD_SUCCESS':
      return { ...state, adding: false, confirmation: true }
    case 'ADD_FAILURE':
      return { ...state, adding: false, confirmation: false, failure: action.message }
    case 'DISMISS_CONFIRMATION':
      return { ...state, confirmation: false }
  }
}

export function initialProductDetailState(productId: number): ProductDetailState {
  return {
    productId,
    product: null,
    loading: true,
    error: null,
    adding: false,
    confirmation: false,
    failure: null,
  }
}

export const CONFIRMATION_DISMISS_MS = 2000

// ---------------------------------------------------------------------------
// View derivation
// ---------------------------------------------------------------------------

export type ProductDetailStatus = 'loading' | 'error' | 'not-found' | 'ready'

export interface ProductDetailView {
  status: ProductDetailStatus
  error: string | null
  product: Product | null
  image: ImageSource | null
  canAddToCart: boolean
  confirmation: boolean
  failure: string | null
}

export function deriveProductDetailView(
  state: ProductDetailState,
  images: ImageResolver,
): ProductDetailView {
  let status: ProductDetailStatus = 'ready'
  if (state.loading) status = 'loading'
  else if (state.error !== null) status = 'error'
  else if (state.product === null) status = 'not-found'

  return {
    status,
    error: state.error,
    product: state.product,
    image: state.product ? images.resolve(state.product.imageRef) : null,
    canAddToCart: canAddToCart(state),
    confirmation: state.confirmation,
    failure: state.failure,
  }
}

// ---------------------------------------------------------------------------
// Screen
// ---------------------------------------------------------------------------

export interface ProductDetailScreenDeps {
  productId: number
  catalog: ProductCatalogService
  cart: CartService
  images: ImageResolver
  errorHandler: ErrorHandler
  /** How long the confirmation stays up. Defaults to CONFIRMATION_DISMISS_MS. */
  confirmationMs?: number
}

export interface ProductDetailScreen {
  store: Store<ProductDetailState, ProductDetailAction>
  view$: Observable<ProductDetailView>
  /** Ignored unless the product is loaded, in stock and no add is pending. */
  addToCart(): void
  retry(): void
  /** Cancels the fetch, a pending add and the dismissal timer. */
  destroy(): void
}

/** Starts loading the product immediately. */
export function createProductDetailScreen(deps: ProductDetailScreenDeps): ProductDetailScreen {
  const { productId, catalog, cart, images, errorHandler } = deps
  const confirmationMs = deps.confirmationMs ?? CONFIRMATION_DISMISS_MS
  const store = createStore<ProductDetailState, ProductDetailAction>(
    productDetailReducer,
    initialProductDetailState(productId),
  )
  const effects = new Subscription()

  // ── Effect: FETCH → fetchById ───────────────────────────────────────────
  effects.add(
    store.actions$.pipe(
      ofType('FETCH'),
      switchMap(() =>
        catalog.fetchById(productId).pipe(
          map((product): ProductDetailAction => ({ type: 'FETCH_SUCCESS', product })),
          catchAndReport<ProductDetailAction>(errorHandler, {
            fallback: (e) => ({ type: 'FETCH_ERROR', error: loadErrorMessage('the product', e) }),
            context: 'productDetail/FETCH',
          }),
        ),
      ),
    ).subscribe(action => store.dispatch(action)),
  )

  // ── Effect: ADD_TO_CART → cart.add, one request at a time ───────────────
  effects.add(
    store.actions$.pipe(
      ofType('ADD_TO_CART'),
      filter(() => store.getState().adding),
      exhaustMap(() => {
        const { product } = store.getState()
        if (!product) return EMPTY
        return cart.add(product).pipe(
          map((result): ProductDetailAction =>
            result.ok
              ? { type: 'ADD_SUCCESS', quantityInCart: result.quantityInCart }
              : { type: 'ADD_FAILURE', message: cartFailureMessage(result.reason) },
          ),
          catchAndReport<ProductDetailAction>(errorHandler, {
            fallback: { type: 'ADD_FAILURE', message: CART_UNAVAILABLE_MESSAGE },
            context: 'productDetail/ADD_TO_CART',
          }),
        )
      }),
    ).subscribe(action => store.dispatch(action)),
  )

  // ── Effect: ADD_SUCCESS → dismiss later; a new success restarts the timer
  effects.add(
    store.actions$.pipe(
      ofType('ADD_SUCCESS'),
      switchMap(() => timer(confirmationMs)),
      map((): ProductDetailAction => ({ type: 'DISMISS_CONFIRMATION' })),
    ).subscribe(action => store.dispatch(action)),
  )

  const view$ = store.state$.pipe(
    distinctUntilChanged(),
    map(state => deriveProductDetailView(state, images)),
    shareReplay({ bufferSize: 1, refCount: true }),
  )

  store.dispatch({ type: 'FETCH' })

  return {
    store,
    view$,
    addToCart: () => store.dispatch({ type: 'ADD_TO_CART' }),
    retry: () => store.dispatch({ type: 'FETCH' }),
    destroy() {
      effects.unsubscribe()
      store.destroy()
    },
  }
}
