/**
 * Core Layer - Route Strategy Port
 *
 * Interchangeable routing algorithm selected at runtime by its caller.
 */
export interface RouteStrategy {
  computeRoute(origin: string, destination: string): string
}

export const ROUTE_STRATEGY_KINDS = ['road', 'walk'] as const

export type RouteStrategyKind = (typeof ROUTE_STRATEGY_KINDS)[number]
