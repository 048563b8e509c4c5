import { readFile, writeFile } from 'fs/promises'
import JSZip from 'jszip'
import { ArchiveError } from '../errors.js'
import { walkTree } from '../utils/fs.js'
import { logDebug } from '../utils/logger.js'

export const PASS_EXTENSION = '.pkpass'

/**
 * Zip the bundle tree. Each directory gets its own entry ahead of its
 * contents; files keep their bytes and their path relative to `source`.
 */
export async function buildArchive(source: string): Promise<Buffer> {
  const zip = new JSZip()

  for (const entry of await walkTree(source)) {
    if (entry.kind === 'directory') {
      zip.folder(entry.relativePath)
    } else {
      zip.file(entry.relativePath, await readFile(entry.absolutePath), { binary: true, createFolders: false })
    }
  }

  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' })
}

export async function archiveDirectory(source: string, destination: string): Promise<void> {
  try {
    const archive = await buildArchive(source)
    await writeFile(destination, archive)
    logDebug(`Archive written: ${destination} (${archive.length} bytes)`)
  } catch (error) {
    throw new ArchiveError(destination, error)
  }
}
