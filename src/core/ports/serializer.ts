export interface Serializer {
  serialize(data: string): string
}

export const SERIALIZER_FORMATS = ['json', 'xml'] as const

export type SerializerFormat = (typeof SERIALIZER_FORMATS)[number]
