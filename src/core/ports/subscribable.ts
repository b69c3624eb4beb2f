/**
 * Core Layer - Ports
 *
 * Minimal typed pub/sub abstraction.
 *
 * Core ports depend on this interface instead of a concrete reactive library.
 * An RxJS Observable returned by `Subject.asObservable()` satisfies
 * `Subscribable<T>` structurally.
 */

/**
 * Returned by `Subscribable.subscribe()`.
 * Call `unsubscribe()` to stop receiving values.
 */
export interface Subscription {
  unsubscribe(): void
}

export interface Subscribable<T> {
  subscribe(callback: (value: T) => void): Subscription
}
