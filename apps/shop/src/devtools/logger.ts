import type { Store } from '@shopfront/store'
import type { Subscription } from 'rxjs'

/**
 * Logs every dispatched action type of a store through console.debug.
 * Unsubscribe the result to stop logging.
 *
 * @param name Tag for the store, e.g. 'Catalog'.
 */
export function createLogger<S, A extends { type: string }>(
  store: Store<S, A>,
  name = 'Store',
): Subscription {
  return store.actions$.subscribe((action) => {
    console.debug(`[shop] ${name}: ${action.type}`, action)
  })
}
