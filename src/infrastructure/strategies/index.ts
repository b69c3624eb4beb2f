import type { RouteStrategy, RouteStrategyKind } from '../../core/ports/routeStrategy.js'
import { RoadStrategy } from './roadStrategy.js'
import { WalkStrategy } from './walkStrategy.js'

export { RoadStrategy } from './roadStrategy.js'
export { WalkStrategy } from './walkStrategy.js'

export function createRouteStrategy(kind: RouteStrategyKind): RouteStrategy {
  switch (kind) {
    case 'road':
      return new RoadStrategy()
    case 'walk':
      return new WalkStrategy()
  }
}
