/**
 * Core Layer - Observer Port
 *
 * Listener invoked whenever a subject's watched value changes.
 * Any return value is ignored.
 */
export interface Observer<T> {
  onValueChanged(value: T): void
}

/** What a registry does when asked to detach an observer it never held. */
export type DetachPolicy = 'throw' | 'ignore'

export const DETACH_POLICIES = ['throw', 'ignore'] as const satisfies readonly DetachPolicy[]
