import { describe, expect, test } from 'vitest'
import {
  HtmlDecorator,
  SimpleText,
  TextDecorator,
  UpperCaseDecorator
} from '../../src/infrastructure/publishing/textPublishers.js'

describe('text publishers', () => {
  test('simple text publishes its text as-is', () => {
    expect(new SimpleText('Hello world').publish()).toBe('Hello world')
  })

  test('base decorator passes through', () => {
    expect(new TextDecorator(new SimpleText('plain')).publish()).toBe('plain')
  })

  test('html then upper-case', () => {
    const published = new UpperCaseDecorator(new HtmlDecorator(new SimpleText('Hello world'))).publish()

    expect(published).toBe('<HTML>HELLO WORLD</HTML>')
  })

  test('upper-case then html keeps the tags lower-case', () => {
    const published = new HtmlDecorator(new UpperCaseDecorator(new SimpleText('Hello world'))).publish()

    expect(published).toBe('<html>HELLO WORLD</html>')
  })

  test('decorators stack repeatedly', () => {
    const published = new HtmlDecorator(new HtmlDecorator(new SimpleText('x'))).publish()

    expect(published).toBe('<html><html>x</html></html>')
  })
})
