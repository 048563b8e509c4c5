import { basename } from 'path'
import type { PassImage } from '../types.js'

const SCALE_SUFFIX = /@[23]x/g

/** Last path segment of the source file. */
export function imageFileName(image: PassImage): string {
  return basename(image.path)
}

/** Text after the last `.` of the file name, empty when there is none. */
export function imageExtension(image: PassImage): string {
  const fileName = imageFileName(image)
  const dot = fileName.lastIndexOf('.')
  return dot === -1 ? '' : fileName.slice(dot + 1)
}

/** File name without its extension. */
export function imageBaseName(image: PassImage): string {
  const fileName = imageFileName(image)
  const extension = imageExtension(image)
  return extension ? fileName.slice(0, -(extension.length + 1)) : fileName
}

/**
 * Name an image is stored under at the bundle root, without extension.
 * An explicit name gets the `@2x`/`@3x` suffix for its scale; otherwise the
 * source file's base name is used as is.
 */
export function resolveImageName(image: PassImage): string {
  if (image.name !== undefined) {
    const scale = image.scale ?? 1
    return scale > 1 ? `${image.name}@${scale}x` : image.name
  }
  return imageBaseName(image)
}

/** Strip scale suffixes so `icon@2x` and `icon` compare as the same role. */
export function normalizeImageName(name: string): string {
  return name.replace(SCALE_SUFFIX, '')
}

export function bundleImageFileName(image: PassImage): string {
  return `${resolveImageName(image)}.${imageExtension(image)}`
}

/** Localized images keep their literal names; no scale suffix applies. */
export function localizedImageFileName(image: PassImage): string {
  return image.name ?? imageFileName(image)
}
