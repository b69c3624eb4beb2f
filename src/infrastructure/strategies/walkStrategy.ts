import type { RouteStrategy } from '../../core/ports/routeStrategy.js'

export class WalkStrategy implements RouteStrategy {
  computeRoute(origin: string, destination: string): string {
    return `Walking from ${origin} to ${destination}: Walk through the park, takes 2 hours`
  }
}
