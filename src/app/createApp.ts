import { StrategyContext } from '../application/strategyContext.js'
import { SubjectRegistry } from '../application/subjectRegistry.js'
import { initAppConfig, type AppConfig, type Env } from '../config/appConfig.js'
import type { DiagnosticsBus } from '../core/ports/diagnosticsBus.js'
import type { RouteStrategyKind } from '../core/ports/routeStrategy.js'
import { createDiagnosticsBus } from '../infrastructure/subjectDiagnosticsBus.js'
import { createRouteStrategy } from '../infrastructure/strategies/index.js'

export type App = {
  config: Readonly<AppConfig>
  diagnostics: DiagnosticsBus
  /** Navigator starting on `kind`, or on the configured default route. */
  createNavigator(kind?: RouteStrategyKind): StrategyContext
  /** Temperature registry starting at 0, using the configured detach policy. */
  createWeatherStation(): SubjectRegistry<number>
}

export function createApp(opts: { env: Env }): App {
  const config = initAppConfig(opts.env)
  const diagnostics = createDiagnosticsBus()

  return {
    config,
    diagnostics,
    createNavigator: (kind) =>
      new StrategyContext(createRouteStrategy(kind ?? config.defaultRoute), { diagnostics }),
    createWeatherStation: () =>
      new SubjectRegistry<number>(0, { detachPolicy: config.detachPolicy, diagnostics }),
  }
}
