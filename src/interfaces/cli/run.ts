import yargs from 'yargs'
import { createApp, type App } from '../../app/createApp.js'
import { getAppConfig, type Env } from '../../config/appConfig.js'
import { InvalidArgumentError } from '../../core/errors.js'
import type { Subscription } from '../../core/ports/subscribable.js'
import { MEDIA_BACKENDS } from '../../core/ports/mediaPlayer.js'
import { ROUTE_STRATEGY_KINDS } from '../../core/ports/routeStrategy.js'
import { createMediaPlayer } from '../../infrastructure/media/players.js'
import { createDisplay, DISPLAY_KINDS } from '../../infrastructure/observers/displays.js'
import {
  HtmlDecorator,
  SimpleText,
  UpperCaseDecorator,
  type TextDecorator
} from '../../infrastructure/publishing/textPublishers.js'
import { getSerializer } from '../../infrastructure/serializers/serializers.js'
import { createRouteStrategy } from '../../infrastructure/strategies/index.js'
import type { TextPublisher } from '../../core/ports/textPublisher.js'
import { withTrace } from '../../shared/withTrace.js'
import type { IO } from './io.js'

/**
 * CLI adapter: parse commands → drive the pattern demos
 *
 * Commands:
 * - route [origin] [destination] [--strategy road|walk] [--switch-to road|walk]
 * - weather <values..> [--twice phone|window] [--detach phone|window]...
 * - publish <text..> [--html] [--upper]
 * - serialize <data..> [--format json|xml]
 * - play <file> [--backend vlc|mp3] [--speed <n>]
 * - config
 * - trace <words..>
 */
export async function runCli(opts: {
  argv: string[]
  env: Env
  io: IO
}): Promise<number> {
  const { argv, env, io } = opts
  const writeLine = (line: string) => io.stdout(`${line}\n`)

  let app: App
  try {
    app = createApp({ env })
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }

  const parser = yargs(argv)
    .scriptName('patterns')
    .option('verbose', { type: 'boolean', default: false, describe: 'Print every observer notification' })
    .command(
      'route [origin] [destination]',
      'Strategy: compute directions, optionally switching strategy',
      (y) =>
        y
          .positional('origin', { type: 'string', default: 'Home' })
          .positional('destination', { type: 'string', default: 'Office' })
          .option('strategy', { type: 'string', choices: ROUTE_STRATEGY_KINDS })
          .option('switch-to', { type: 'string', choices: ROUTE_STRATEGY_KINDS }),
      (args) => {
        const initial = args.strategy ? oneOf(ROUTE_STRATEGY_KINDS, args.strategy, 'strategy') : undefined
        const next = args.switchTo ? oneOf(ROUTE_STRATEGY_KINDS, args.switchTo, 'switch-to') : undefined

        withDiagnostics(app, writeLine, args.verbose, () => {
          const navigator = app.createNavigator(initial)
          writeLine(navigator.getDirections(args.origin, args.destination))
          if (next) {
            navigator.setStrategy(createRouteStrategy(next))
            writeLine(navigator.getDirections(args.origin, args.destination))
          }
        })
      }
    )
    .command(
      'weather <values..>',
      'Observer: broadcast temperature readings to displays',
      (y) =>
        y
          .positional('values', { type: 'number', array: true, demandOption: true })
          .option('twice', { type: 'string', choices: DISPLAY_KINDS, describe: 'Attach this display a second time' })
          .option('detach', { type: 'string', array: true, describe: 'Detach a display before broadcasting (repeatable)' }),
      (args) => {
        const values = args.values.map((value) => {
          if (Number.isNaN(value)) throw new InvalidArgumentError('weather values must be numbers')
          return value
        })

        withDiagnostics(app, writeLine, args.verbose, () => {
          const station = app.createWeatherStation()
          const displays = {
            phone: createDisplay('phone', writeLine),
            window: createDisplay('window', writeLine)
          }
          station.attach(displays.phone)
          station.attach(displays.window)
          if (args.twice) {
            station.attach(displays[oneOf(DISPLAY_KINDS, args.twice, 'twice')])
          }
          for (const kind of args.detach ?? []) {
            station.detach(displays[oneOf(DISPLAY_KINDS, kind, 'detach')])
          }
          for (const value of values) {
            station.setValue(value)
          }
        })
      }
    )
    .command(
      'publish <text..>',
      'Decorator: publish text through optional decorators',
      (y) =>
        y
          .positional('text', { type: 'string', array: true, demandOption: true })
          .option('html', { type: 'boolean', default: false })
          .option('upper', { type: 'boolean', default: false }),
      (args) => {
        let publisher: TextPublisher = new SimpleText(args.text.join(' '))
        const layers: Array<new (component: TextPublisher) => TextDecorator> = []
        if (args.html) layers.push(HtmlDecorator)
        if (args.upper) layers.push(UpperCaseDecorator)
        for (const Layer of layers) {
          publisher = new Layer(publisher)
        }
        writeLine(publisher.publish())
      }
    )
    .command(
      'serialize <data..>',
      'Factory: serialize data with a serializer picked by format',
      (y) =>
        y
          .positional('data', { type: 'string', array: true, demandOption: true })
          .option('format', { type: 'string', describe: 'json or xml (defaults to PATTERNS_SERIALIZER_FORMAT)' }),
      (args) => {
        const serializer = getSerializer(args.format ?? app.config.serializerFormat)
        writeLine(serializer.serialize(args.data.join(' ')))
      }
    )
    .command(
      'play <file>',
      'Adapter: play a file through the configured media backend',
      (y) =>
        y
          .positional('file', { type: 'string', demandOption: true })
          .option('backend', { type: 'string', choices: MEDIA_BACKENDS })
          .option('speed', { type: 'number', default: 1 }),
      (args) => {
        if (!Number.isFinite(args.speed) || args.speed <= 0) {
          throw new InvalidArgumentError('--speed must be a positive number')
        }
        const backend = args.backend ? oneOf(MEDIA_BACKENDS, args.backend, 'backend') : app.config.mediaBackend
        const player = createMediaPlayer(backend, { speed: args.speed, log: writeLine })
        writeLine(player.play(args.file))
      }
    )
    .command(
      'config',
      'Singleton: show the process-wide configuration',
      () => {},
      () => {
        const first = getAppConfig()
        const second = getAppConfig()
        writeLine(`Service URL: ${first.serviceUrl}`)
        writeLine(`User name: ${first.userName}`)
        writeLine(`Default route: ${first.defaultRoute}`)
        writeLine(`Detach policy: ${first.detachPolicy}`)
        writeLine(`Serializer format: ${first.serializerFormat}`)
        writeLine(`Media backend: ${first.mediaBackend}`)
        writeLine(`Same instance: ${first === second}`)
      }
    )
    .command(
      'trace <words..>',
      'Function wrapping: call a traced echo function',
      (y) => y.positional('words', { type: 'string', array: true, demandOption: true }),
      (args) => {
        const echo = withTrace((...words: string[]) => words.join(' '), writeLine, 'echo')
        writeLine(echo(...args.words))
      }
    )
    .demandCommand(1, 'Specify a command; see --help')
    .strict()
    .help()
    .exitProcess(false)
    .fail((message, err) => {
      throw err ?? new Error(message)
    })

  try {
    // A parse callback makes yargs collect --help/--version text instead of logging it
    await parser.parseAsync(argv, {}, (err, _argv, output) => {
      if (!err && output) writeLine(output)
    })
    return 0
  } catch (err) {
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`)
    return 1
  }
}

function oneOf<T extends string>(choices: readonly T[], value: string, optionName: string): T {
  const match = choices.find((choice) => choice === value)
  if (match === undefined) {
    throw new InvalidArgumentError(`--${optionName} must be one of: ${choices.join(', ')}`)
  }
  return match
}

/**
 * Print diagnostics while `fn` runs. Strategy switches are always shown;
 * observer notifications only with --verbose.
 */
function withDiagnostics(app: App, writeLine: (line: string) => void, verbose: boolean, fn: () => void): void {
  const subscription: Subscription = app.diagnostics.events$.subscribe((event) => {
    if (event.type === 'strategy_switched') {
      writeLine(`[StrategyContext] switching strategy: ${event.payload.from} -> ${event.payload.to}`)
    } else if (verbose) {
      writeLine(`[SubjectRegistry] notified ${event.payload.observer} with ${String(event.payload.value)}`)
    }
  })
  try {
    fn()
  } finally {
    subscription.unsubscribe()
  }
}
