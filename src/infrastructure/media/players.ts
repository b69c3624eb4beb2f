import type { MediaBackend, MediaPlayer } from '../../core/ports/mediaPlayer.js'

export class Mp3Player implements MediaPlayer {
  play(fileName: string): string {
    return `Playing mp3 file: ${fileName}`
  }
}

/**
 * Third-party style player whose API does not match `MediaPlayer`.
 */
export class VlcPlayer {
  heavyPlay(fileName: string, speed: number, options: { normalize: boolean }): string {
    const suffix = options.normalize ? ' (normalized)' : ''
    return `VLC playing ${fileName} at ${speed}x${suffix}`
  }
}

export type VlcAdapterOptions = {
  speed?: number
  log?: (message: string) => void
}

/**
 * Adapts `VlcPlayer.heavyPlay()` to `MediaPlayer.play()`.
 */
export class VlcAdapter implements MediaPlayer {
  readonly #player: VlcPlayer
  readonly #speed: number
  readonly #log: (message: string) => void

  constructor(player: VlcPlayer, options: VlcAdapterOptions = {}) {
    this.#player = player
    this.#speed = options.speed ?? 1.0
    this.#log = options.log ?? ((message: string) => console.log(message))
  }

  play(fileName: string): string {
    this.#log('[VlcAdapter] adapting play() to heavyPlay()')
    return this.#player.heavyPlay(fileName, this.#speed, { normalize: true })
  }
}

export function createMediaPlayer(
  backend: MediaBackend,
  options: VlcAdapterOptions = {}
): MediaPlayer {
  if (backend === 'mp3') {
    return new Mp3Player()
  }
  return new VlcAdapter(new VlcPlayer(), options)
}
