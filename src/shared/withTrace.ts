/**
 * Wrap `fn` so each call first writes `[trace] name(arg1, arg2)` through `log`,
 * then delegates with the same arguments and returns its result.
 */
export function withTrace<Args extends unknown[], R>(
  fn: (...args: Args) => R,
  log: (line: string) => void,
  name: string = fn.name || 'anonymous'
): (...args: Args) => R {
  return (...args: Args): R => {
    log(`[trace] ${name}(${args.map((arg) => String(arg)).join(', ')})`)
    return fn(...args)
  }
}
