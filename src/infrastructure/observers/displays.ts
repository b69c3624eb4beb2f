import type { Observer } from '../../core/ports/observer.js'

/** Where a display writes its rendered line. */
export type LineSink = (line: string) => void

/**
 * Infrastructure Layer - Temperature Displays
 *
 * Each display renders the latest temperature as one line on its sink.
 */
export class PhoneDisplay implements Observer<number> {
  readonly #write: LineSink

  constructor(write: LineSink) {
    this.#write = write
  }

  onValueChanged(temperature: number): void {
    this.#write(`Phone display updated to ${temperature} temperature`)
  }
}

export class WindowDisplay implements Observer<number> {
  readonly #write: LineSink

  constructor(write: LineSink) {
    this.#write = write
  }

  onValueChanged(temperature: number): void {
    this.#write(`Window display updated to ${temperature} temperature`)
  }
}

export const DISPLAY_KINDS = ['phone', 'window'] as const

export type DisplayKind = (typeof DISPLAY_KINDS)[number]

export function createDisplay(kind: DisplayKind, write: LineSink): Observer<number> {
  return kind === 'phone' ? new PhoneDisplay(write) : new WindowDisplay(write)
}
