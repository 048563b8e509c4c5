import { createHash } from 'crypto'
import { readFile, writeFile } from 'fs/promises'
import { join } from 'path'
import type { Manifest } from '../types.js'
import { ManifestError, describeError } from '../errors.js'
import { walkTree } from '../utils/fs.js'
import { logDebug } from '../utils/logger.js'

export const MANIFEST_FILENAME = 'manifest.json'
export const SIGNATURE_FILENAME = 'signature'

// Never listed in the manifest they belong beside
const EXCLUDED = new Set([MANIFEST_FILENAME, SIGNATURE_FILENAME])

/** Lowercase hex SHA-1 of a file's bytes. */
export async function hashFile(path: string): Promise<string> {
  const data = await readFile(path)
  return createHash('sha1').update(data).digest('hex')
}

/**
 * Hash every file under the bundle root and write manifest.json.
 * Must run before signing; the manifest does not list itself.
 */
export async function generateManifest(dir: string): Promise<Manifest> {
  const manifest: Manifest = {}

  try {
    for (const entry of await walkTree(dir)) {
      if (entry.kind !== 'file' || EXCLUDED.has(entry.relativePath)) continue
      manifest[entry.relativePath] = await hashFile(entry.absolutePath)
    }

    await writeFile(join(dir, MANIFEST_FILENAME), JSON.stringify(manifest, null, 2), 'utf-8')
  } catch (error) {
    throw new ManifestError(`Manifest for "${dir}" could not be written: ${describeError(error)}`, error)
  }
  logDebug(`Manifest written with ${Object.keys(manifest).length} entries`)

  return manifest
}
