import type { RouteStrategy } from '../../core/ports/routeStrategy.js'

export class RoadStrategy implements RouteStrategy {
  computeRoute(origin: string, destination: string): string {
    return `Road Route from ${origin} to ${destination} : Drive I-95, takes 30 mins`
  }
}
