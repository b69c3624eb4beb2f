import type { Subscribable } from './subscribable.js'

export type DiagnosticEvent =
  | {
      type: 'strategy_switched'
      payload: { from: string; to: string }
    }
  | {
      type: 'observer_notified'
      payload: { observer: string; value: unknown }
    }

/**
 * Side channel for human-readable tracing. Nothing on it is part of the
 * functional contract of the components that emit.
 */
export interface DiagnosticsBus {
  readonly events$: Subscribable<DiagnosticEvent>
  emit(event: DiagnosticEvent): void
}
