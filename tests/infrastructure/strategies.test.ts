import { describe, expect, test } from 'vitest'
import { ROUTE_STRATEGY_KINDS } from '../../src/core/ports/routeStrategy.js'
import { RoadStrategy, WalkStrategy, createRouteStrategy } from '../../src/infrastructure/strategies/index.js'

describe('route strategies', () => {
  test('road strategy describes a drive', () => {
    expect(new RoadStrategy().computeRoute('Depot', 'Harbor')).toBe(
      'Road Route from Depot to Harbor : Drive I-95, takes 30 mins'
    )
  })

  test('walk strategy describes a walk', () => {
    expect(new WalkStrategy().computeRoute('Depot', 'Harbor')).toBe(
      'Walking from Depot to Harbor: Walk through the park, takes 2 hours'
    )
  })

  test('createRouteStrategy builds each known kind', () => {
    expect(createRouteStrategy('road')).toBeInstanceOf(RoadStrategy)
    expect(createRouteStrategy('walk')).toBeInstanceOf(WalkStrategy)
    expect(ROUTE_STRATEGY_KINDS).toEqual(['road', 'walk'])
  })
})
