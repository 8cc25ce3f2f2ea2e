import type { AppErrorSummary } from '@shopfront/errors'
import type { CartFailureReason } from '../types'

/** User-facing text for a failed load of `what` ("products", "the product"). */
export function loadErrorMessage(what: string, { kind, status }: AppErrorSummary): string {
  switch (kind) {
    case 'network':
      return `Could not load ${what}: no connection.`
    case 'timeout':
      return `Could not load ${what}: the server took too long to answer.`
    case 'http':
      return `Could not load ${what}: the server answered ${status ?? 'with an error'}.`
    case 'validation':
      return `Could not load ${what}: the server sent invalid data.`
    case 'unknown':
      return `Could not load ${what}.`
  }
}

export function cartFailureMessage(reason: CartFailureReason): string {
  switch (reason) {
    case 'out-of-stock':
      return 'This product is out of stock.'
    case 'insufficient-stock':
      return 'There is not enough stock for that quantity.'
    case 'invalid-quantity':
      return 'Choose at least one unit.'
  }
}

export const CART_UNAVAILABLE_MESSAGE = 'Could not add the product to the cart. Try again.'
