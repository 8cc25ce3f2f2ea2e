import type { ImageSource } from '../types'

export interface ImageResolver {
  resolve(imageRef: string): ImageSource
}

export interface ImageResolverConfig {
  /** Bundled images keyed by ref, e.g. { mouse_gamer: '/images/mouse_gamer.webp' }. */
  assets: Readonly<Record<string, string>>
  /** Shown when a ref resolves to nothing. */
  placeholder: string
}

const REMOTE_REF = /^https?:\/\//i

/**
 * Bundled asset first, then an absolute http(s) URL, then the placeholder.
 * Refs are matched exactly.
 */
export function createImageResolver(config: ImageResolverConfig): ImageResolver {
  const assets = new Map(Object.entries(config.assets))
  return {
    resolve(imageRef) {
      const asset = assets.get(imageRef)
      if (asset !== undefined) return { kind: 'asset', src: asset }
      if (REMOTE_REF.test(imageRef)) return { kind: 'remote', src: imageRef }
      return { kind: 'placeholder', src: config.placeholder }
    },
  }
}
