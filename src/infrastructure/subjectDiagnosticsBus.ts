import { Subject } from 'rxjs'
import type { Subscribable } from '../core/ports/subscribable.js'
import type { DiagnosticEvent, DiagnosticsBus } from '../core/ports/diagnosticsBus.js'

/**
 * rxjs-backed diagnostics bus.
 *
 * rxjs reports a throwing subscriber asynchronously as an uncaught error, so
 * each callback is guarded where it is registered. A failing subscriber is
 * logged and the remaining subscribers still receive the event.
 */
export class SubjectDiagnosticsBus implements DiagnosticsBus {
  readonly #subject = new Subject<DiagnosticEvent>()
  readonly events$: Subscribable<DiagnosticEvent> = {
    subscribe: (callback) =>
      this.#subject.subscribe((event) => {
        try {
          callback(event)
        } catch (err) {
          console.error(`[DiagnosticsBus] subscriber error on "${event.type}":`, err)
        }
      })
  }

  emit(event: DiagnosticEvent): void {
    this.#subject.next(event)
  }
}

export function createDiagnosticsBus(): DiagnosticsBus {
  return new SubjectDiagnosticsBus()
}
