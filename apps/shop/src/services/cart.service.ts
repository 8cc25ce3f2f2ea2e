import { Observable, defer, of } from 'rxjs'
import type { CartResult, Product } from '../types'
import { quantityInCart } from '../store/cart.store'
import type { CartStore } from '../store/cart.store'

export interface CartService {
  /** Cold; emits one CartResult and completes. A refusal is a value, not an error. */
  add(product: Product, quantity?: number): Observable<CartResult>
}

/**
 * Cart held in a local store. Refuses quantities that are not positive
 * integers, products without stock, and requests that would put more units
 * in the cart than `stock`.
 */
export function createCartService(cartStore: CartStore): CartService {
  function tryAdd(product: Product, quantity: number): CartResult {
    if (!Number.isSafeInteger(quantity) || quantity < 1) {
      return { ok: false, reason: 'invalid-quantity' }
    }
    if (!product.hasStock) {
      return { ok: false, reason: 'out-of-stock' }
    }
    const already = quantityInCart(cartStore.getState(), product.id)
    if (already + quantity > product.stock) {
      return { ok: false, reason: 'insufficient-stock' }
    }
    cartStore.dispatch({ type: 'ADD_TO_CART', product, quantity })
    return { ok: true, quantityInCart: already + quantity }
  }

  return {
    add: (product, quantity = 1) => defer(() => of(tryAdd(product, quantity))),
  }
}
