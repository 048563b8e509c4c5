import { copyFile, mkdir, readdir, rm, stat, writeFile } from 'fs/promises'
import { EOL } from 'os'
import { join } from 'path'
import type { ParsedPass, ParsedPassImage } from '../types.js'
import { BundleError, DirectoryError } from '../errors.js'
import { logDebug } from '../utils/logger.js'
import { bundleImageFileName, localizedImageFileName } from './images.js'

export const PASS_FILENAME = 'pass.json'
export const LOCALIZATION_EXTENSION = '.lproj'
export const STRINGS_FILENAME = 'pass.strings'

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST'
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

/**
 * Create a directory unless it already exists as one.
 */
export async function ensureDirectory(path: string): Promise<void> {
  try {
    await mkdir(path, { mode: 0o755 })
  } catch (error) {
    if (isAlreadyExists(error) && (await isDirectory(path))) return
    throw new DirectoryError(path, error)
  }
}

async function clearDirectory(dir: string): Promise<void> {
  let removed = 0
  try {
    for (const name of await readdir(dir)) {
      await rm(join(dir, name), { recursive: true, force: true })
      removed++
    }
  } catch (error) {
    throw new BundleError(`Scratch directory "${dir}" could not be emptied`, error)
  }

  if (removed > 0) {
    logDebug(`Cleared ${removed} leftover entries from ${dir}`)
  }
}

/**
 * Scratch directory for one bundle, keyed by serial number. A directory
 * left behind by an earlier run is reused but emptied, so nothing stale
 * ends up in the manifest or the archive.
 */
export async function createScratchDirectory(pass: ParsedPass, tempDir: string): Promise<string> {
  const dir = join(tempDir, pass.serialNumber)
  await ensureDirectory(dir)
  await clearDirectory(dir)
  logDebug(`Scratch directory ready: ${dir}`)
  return dir
}

/**
 * The pass.json document: every populated content field, with the field
 * structure stored under the pass type's key.
 */
export function serializePass(pass: ParsedPass): string {
  const { type, fields, images: _images, localizations: _localizations, formatVersion, serialNumber, ...content } = pass

  return JSON.stringify(
    {
      formatVersion,
      serialNumber,
      ...content,
      [type]: fields ?? {}
    },
    null,
    2
  )
}

export async function writePassJson(pass: ParsedPass, dir: string): Promise<void> {
  await writeFile(join(dir, PASS_FILENAME), serializePass(pass), 'utf-8')
}

async function copyImage(image: ParsedPassImage, destination: string): Promise<void> {
  try {
    await copyFile(image.path, destination)
  } catch (error) {
    throw new BundleError(`Image "${image.path}" could not be copied`, error)
  }
}

export async function copyImages(pass: ParsedPass, dir: string): Promise<void> {
  for (const image of pass.images) {
    await copyImage(image, join(dir, bundleImageFileName(image)))
  }
}

/** Backslash-escape quotes, backslashes and NUL. */
export function escapeString(value: string): string {
  return value.replace(/[\\'"\0]/g, (char) => (char === '\0' ? '\\0' : `\\${char}`))
}

/**
 * Contents of a pass.strings file: one `"key" = "value";` line per entry.
 */
export function formatStrings(strings: Record<string, string>): string {
  return Object.entries(strings)
    .map(([key, value]) => `"${escapeString(key)}" = "${escapeString(value)}";${EOL}`)
    .join('')
}

/**
 * Write one `<language>.lproj` directory per localization, holding its
 * pass.strings and any localized images.
 */
export async function writeLocalizations(pass: ParsedPass, dir: string): Promise<void> {
  for (const localization of pass.localizations) {
    const localizationDir = join(dir, `${localization.language}${LOCALIZATION_EXTENSION}`)
    await ensureDirectory(localizationDir)
    await writeFile(join(localizationDir, STRINGS_FILENAME), formatStrings(localization.strings), 'utf-8')

    for (const image of localization.images) {
      await copyImage(image, join(localizationDir, localizedImageFileName(image)))
    }
  }
}

/**
 * Materialize the bundle tree (everything except manifest and signature).
 */
export async function assembleBundle(pass: ParsedPass, dir: string): Promise<void> {
  await writePassJson(pass, dir)
  await copyImages(pass, dir)
  await writeLocalizations(pass, dir)
}
