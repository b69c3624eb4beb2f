import { InvalidArgumentError } from '../core/errors.js'
import type { DiagnosticsBus } from '../core/ports/diagnosticsBus.js'
import type { RouteStrategy } from '../core/ports/routeStrategy.js'
import { describeCollaborator } from '../shared/describeCollaborator.js'

export type StrategyContextOptions = {
  /** Receives a `strategy_switched` event on every replacement. */
  diagnostics?: DiagnosticsBus
}

/**
 * Application Layer - Strategy Context
 *
 * Holds exactly one active route strategy and delegates direction requests to
 * it. Callers may swap the strategy at any time; the next request uses the new
 * one with nothing carried over from the old.
 */
export class StrategyContext {
  #strategy: RouteStrategy
  readonly #diagnostics: DiagnosticsBus | undefined

  constructor(initialStrategy: RouteStrategy | null | undefined, options: StrategyContextOptions = {}) {
    this.#strategy = requireStrategy(initialStrategy)
    this.#diagnostics = options.diagnostics
  }

  get strategy(): RouteStrategy {
    return this.#strategy
  }

  setStrategy(newStrategy: RouteStrategy | null | undefined): void {
    const next = requireStrategy(newStrategy)
    const previous = this.#strategy
    this.#strategy = next
    this.#diagnostics?.emit({
      type: 'strategy_switched',
      payload: { from: describeCollaborator(previous), to: describeCollaborator(next) }
    })
  }

  /** Errors thrown by the strategy reach the caller untouched. */
  getDirections(origin: string, destination: string): string {
    return this.#strategy.computeRoute(origin, destination)
  }
}

function requireStrategy(strategy: RouteStrategy | null | undefined): RouteStrategy {
  if (strategy === null || strategy === undefined) {
    throw new InvalidArgumentError('A route strategy is required')
  }
  return strategy
}
