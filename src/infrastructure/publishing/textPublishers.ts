import type { TextPublisher } from '../../core/ports/textPublisher.js'

export class SimpleText implements TextPublisher {
  readonly #text: string

  constructor(text: string) {
    this.#text = text
  }

  publish(): string {
    return this.#text
  }
}

/**
 * Base decorator: delegates to the wrapped publisher unchanged. Subclasses
 * transform `super.publish()`.
 */
export class TextDecorator implements TextPublisher {
  readonly #component: TextPublisher

  constructor(component: TextPublisher) {
    this.#component = component
  }

  publish(): string {
    return this.#component.publish()
  }
}

export class HtmlDecorator extends TextDecorator {
  override publish(): string {
    return `<html>${super.publish()}</html>`
  }
}

export class UpperCaseDecorator extends TextDecorator {
  override publish(): string {
    return super.publish().toUpperCase()
  }
}
