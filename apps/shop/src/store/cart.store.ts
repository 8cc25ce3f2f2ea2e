import { createStore } from '@shopfront/store'
import type { Store } from '@shopfront/store'
import type { Product, CartItem } from '../types'

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

export interface CartState {
  items: CartItem[]
}

// ---------------------------------------------------------------------------
// Actions
// ---------------------------------------------------------------------------

export type CartAction =
  | { type: 'ADD_TO_CART'; product: Product; quantity?: number }
  | { type: 'REMOVE_FROM_CART'; productId: number }
  | { type: 'UPDATE_QUANTITY'; productId: number; quantity: number }
  | { type: 'CLEAR_CART' }

export type CartStore = Store<CartState, CartAction>

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

export function cartReducer(state: CartState, action: CartAction): CartState {
  switch (action.type) {
    case 'ADD_TO_CART': {
      const qty = action.quantity ?? 1
      const existing = state.items.find(i => i.product.id === action.product.id)
      if (existing) {
        return {
          items: state.items.map(i =>
            i.product.id === action.product.id
              ? { product: action.product, quantity: i.quantity + qty }
              : i
          ),
        }
      }
      return { items: [...state.items, { product: action.product, quantity: qty }] }
    }
    case 'REMOVE_FROM_CART':
      return { items: state.items.filter(i => i.product.id !== action.productId) }
    case 'UPDATE_QUANTITY': {
      if (action.quantity <= 0) {
        return { items: state.items.filter(i => i.product.id !== action.productId) }
      }
      return {
        items: state.items.map(i =>
          i.product.id === action.productId ? { ...i, quantity: action.quantity } : i
        ),
      }
    }
    case 'CLEAR_CART':
      return { items: [] }
  }
}

// ---------------------------------------------------------------------------
// Selectors
// ---------------------------------------------------------------------------

export const cartCount = (s: CartState): number =>
  s.items.reduce((sum, i) => sum + i.quantity, 0)

export const cartSubtotal = (s: CartState): number =>
  s.items.reduce((sum, i) => sum + i.product.price * i.quantity, 0)

export const quantityInCart = (s: CartState, productId: number): number =>
  s.items.find(i => i.product.id === productId)?.quantity ?? 0

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export const INITIAL_CART_STATE: CartState = { items: [] }

export function createCartStore(initial: CartState = INITIAL_CART_STATE): CartStore {
  return createStore<CartState, CartAction>(cartReducer, initial)
}
