import { InvalidArgumentError } from '../../core/errors.js'
import { SERIALIZER_FORMATS, type Serializer, type SerializerFormat } from '../../core/ports/serializer.js'

export class JsonSerializer implements Serializer {
  serialize(data: string): string {
    return `JSON representation : {'data':'${data}'}`
  }
}

export class XmlSerializer implements Serializer {
  serialize(data: string): string {
    return `XML representation: <data>${data}</data>`
  }
}

function isSerializerFormat(format: string): format is SerializerFormat {
  return (SERIALIZER_FORMATS as readonly string[]).includes(format)
}

/**
 * Factory for serializers by format name. Throws InvalidArgumentError for any
 * format other than `json` or `xml`.
 */
export function getSerializer(format: string): Serializer {
  if (!isSerializerFormat(format)) {
    throw new InvalidArgumentError(`Unknown format: ${format}`)
  }
  return format === 'json' ? new JsonSerializer() : new XmlSerializer()
}
