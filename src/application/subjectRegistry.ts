import { InvalidArgumentError, NotFoundError } from '../core/errors.js'
import type { DiagnosticsBus } from '../core/ports/diagnosticsBus.js'
import type { DetachPolicy, Observer } from '../core/ports/observer.js'
import { describeCollaborator } from '../shared/describeCollaborator.js'

export type SubjectRegistryOptions = {
  /**
   * `'throw'` (default) raises NotFoundError when detaching an observer that
   * is not attached; `'ignore'` makes that a no-op.
   */
  detachPolicy?: DetachPolicy
  /** Receives an `observer_notified` event after each delivery. */
  diagnostics?: DiagnosticsBus
}

/**
 * Application Layer - Subject Registry
 *
 * Owns a value and an ordered audience of observers. Every change to the value
 * is broadcast synchronously to each attached observer in attachment order.
 *
 * The same observer may be attached more than once and is then notified once
 * per attachment.
 */
export class SubjectRegistry<T> {
  #value: T
  readonly #observers: Observer<T>[] = []
  readonly #detachPolicy: DetachPolicy
  readonly #diagnostics: DiagnosticsBus | undefined

  constructor(initialValue: T, options: SubjectRegistryOptions = {}) {
    this.#value = initialValue
    this.#detachPolicy = options.detachPolicy ?? 'throw'
    this.#diagnostics = options.diagnostics
  }

  get value(): T {
    return this.#value
  }

  get size(): number {
    return this.#observers.length
  }

  get detachPolicy(): DetachPolicy {
    return this.#detachPolicy
  }

  /** Attached observers in attachment order, duplicates included. */
  observers(): Observer<T>[] {
    return [...this.#observers]
  }

  attach(observer: Observer<T> | null | undefined): void {
    if (observer === null || observer === undefined) {
      throw new InvalidArgumentError('An observer is required')
    }
    this.#observers.push(observer)
  }

  /** Removes the earliest attachment of `observer` only. */
  detach(observer: Observer<T> | null | undefined): void {
    if (observer === null || observer === undefined) {
      throw new InvalidArgumentError('An observer is required')
    }
    const index = this.#observers.indexOf(observer)
    if (index === -1) {
      if (this.#detachPolicy === 'ignore') return
      throw new NotFoundError(`Observer is not attached: ${describeCollaborator(observer)}`)
    }
    this.#observers.splice(index, 1)
  }

  setValue(newValue: T): void {
    this.#value = newValue
    this.notify()
  }

  /**
   * Broadcast the current value without changing it.
   *
   * Iterates a snapshot: observers attached or detached by a callback take
   * effect from the next broadcast. A throwing observer aborts the broadcast
   * and the error propagates to the caller.
   */
  notify(): void {
    const value = this.#value
    for (const observer of [...this.#observers]) {
      observer.onValueChanged(value)
      this.#diagnostics?.emit({
        type: 'observer_notified',
        payload: { observer: describeCollaborator(observer), value }
      })
    }
  }
}
