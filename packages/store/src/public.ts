import { BehaviorSubject, Observable, OperatorFunction, Subject } from 'rxjs'
import { distinctUntilChanged, filter, map, scan, shareReplay, startWith } from 'rxjs/operators'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Reducer<S, A> = (state: S, action: A) => S

export interface Store<S, A> {
  /** Multicasted state stream. Replays the latest value to late subscribers. */
  state$: Observable<S>
  /**
   * Every dispatched action, after the reducer has seen it, in dispatch
   * order for every subscriber. Screens hang their effects (fetches, timers)
   * off this stream.
   *
   * @example
   *   store.actions$.pipe(
   *     ofType('FETCH'),
   *     switchMap(() => catalog.fetchAll().pipe(
   *       map(products => ({ type: 'FETCH_SUCCESS' as const, products })),
   *     )),
   *   ).subscribe(action => store.dispatch(action))
   */
  actions$: Observable<A>
  dispatch(action: A): void
  /** Derive a slice of state. Emits only when the slice changes (===). */
  select<T>(selector: (state: S) => T): Observable<T>
  /** Synchronous snapshot of the current state. */
  getState(): S
  /**
   * Completes state$ and actions$. Later dispatches are ignored, so an
   * effect that outlives its screen cannot move the state.
   */
  destroy(): void
}

// ---------------------------------------------------------------------------
// createStore
// ---------------------------------------------------------------------------

/**
 * createStore<S, A>(reducer, initialState)
 *
 *   Subject<A>  →  scan(reducer)  →  startWith(initial)  →  shareReplay(1)
 *        ↑                                                      ↓
 *   dispatch(action)                                   state$ / select()
 *
 * State is written before the action is re-emitted on `actions$`, so an
 * effect reading `getState()` sees the state the action produced. An action
 * dispatched from inside an effect is queued and runs once the current one
 * has reached every subscriber; `dispatch` still returns only after the
 * queue is drained.
 */
export function createStore<S, A>(reducer: Reducer<S, A>, initialState: S): Store<S, A> {
  const input = new Subject<A>()
  const actionsSubject = new Subject<A>()
  const stateBs = new BehaviorSubject<S>(initialState)
  let destroyed = false
  // Actions dispatched while another is being delivered wait their turn, so
  // every subscriber of actions$ sees the same order.
  const queue: A[] = []
  let delivering = false

  const state$ = input.pipe(
    scan(reducer, initialState),
    startWith(initialState),
    shareReplay({ bufferSize: 1, refCount: false }),
  )

  state$.subscribe((s) => stateBs.next(s))

  return {
    state$,
    actions$: actionsSubject.asObservable(),
    dispatch(action: A) {
      if (destroyed) return
      queue.push(action)
      if (delivering) return
      delivering = true
      try {
        for (let next = queue.shift(); next !== undefined && !destroyed; next = queue.shift()) {
          input.next(next)
          actionsSubject.next(next)
        }
      } finally {
        queue.length = 0
        delivering = false
      }
    },
    select<T>(selector: (state: S) => T): Observable<T> {
      return state$.pipe(map(selector), distinctUntilChanged())
    },
    getState(): S {
      return stateBs.value
    },
    destroy() {
      if (destroyed) return
      destroyed = true
      input.complete()
      actionsSubject.complete()
    },
  }
}

// ---------------------------------------------------------------------------
// ofType
// ---------------------------------------------------------------------------

/**
 * Filters an action stream by `type`, narrowing the action union.
 *
 * @example
 *   store.actions$.pipe(ofType('ADD_SUCCESS'), switchMap(() => timer(2000)))
 */
export function ofType<A extends { type: string }, K extends A['type']>(
  ...types: [K, ...K[]]
): OperatorFunction<A, Extract<A, { type: K }>> {
  const wanted = new Set<string>(types)
  return filter((action): action is Extract<A, { type: K }> => wanted.has(action.type))
}
