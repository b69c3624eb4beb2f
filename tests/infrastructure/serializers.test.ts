import { describe, expect, test } from 'vitest'
import { InvalidArgumentError } from '../../src/core/errors.js'
import { JsonSerializer, XmlSerializer, getSerializer } from '../../src/infrastructure/serializers/serializers.js'

describe('serializer factory', () => {
  test('json format yields the json serializer', () => {
    const serializer = getSerializer('json')

    expect(serializer).toBeInstanceOf(JsonSerializer)
    expect(serializer.serialize('My business data')).toBe("JSON representation : {'data':'My business data'}")
  })

  test('xml format yields the xml serializer', () => {
    const serializer = getSerializer('xml')

    expect(serializer).toBeInstanceOf(XmlSerializer)
    expect(serializer.serialize('My business data')).toBe('XML representation: <data>My business data</data>')
  })

  test('unknown formats are rejected', () => {
    expect(() => getSerializer('yaml')).toThrow(InvalidArgumentError)
    expect(() => getSerializer('JSON')).toThrow('Unknown format: JSON')
  })
})
