/**
 * Core Layer - Media Player Port
 *
 * The interface the music app plays through. Players with a different native
 * API are wrapped in an adapter that implements this port.
 */
export interface MediaPlayer {
  play(fileName: string): string
}

export const MEDIA_BACKENDS = ['vlc', 'mp3'] as const

export type MediaBackend = (typeof MEDIA_BACKENDS)[number]
