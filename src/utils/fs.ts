import { readdir, rm, unlink } from 'fs/promises'
import { join } from 'path'
import { describeError } from '../errors.js'
import { logDebug } from './logger.js'

export interface TreeEntry {
  // Relative to the walked root, `/`-separated
  relativePath: string
  absolutePath: string
  kind: 'directory' | 'file'
}

/**
 * List a directory tree depth-first, each directory before its contents.
 * Siblings come in name order. Symlinks and other special files are skipped.
 */
export async function walkTree(root: string, prefix = ''): Promise<TreeEntry[]> {
  const dirents = await readdir(root, { withFileTypes: true })
  dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

  const entries: TreeEntry[] = []
  for (const dirent of dirents) {
    const relativePath = prefix ? `${prefix}/${dirent.name}` : dirent.name
    const absolutePath = join(root, dirent.name)

    if (dirent.isDirectory()) {
      entries.push({ relativePath, absolutePath, kind: 'directory' })
      entries.push(...(await walkTree(absolutePath, relativePath)))
    } else if (dirent.isFile()) {
      entries.push({ relativePath, absolutePath, kind: 'file' })
    }
  }

  return entries
}

/**
 * Recursively delete a directory. Best effort: a missing directory or a
 * failed removal is logged and never thrown, so cleanup cannot mask the
 * error that triggered it.
 */
export async function deleteDirectory(directory: string): Promise<void> {
  try {
    await rm(directory, { recursive: true, force: true })
  } catch (error) {
    logDebug(`Could not delete directory "${directory}":`, describeError(error))
  }
}

/**
 * Delete a single file. Best effort, same as `deleteDirectory`.
 */
export async function deleteFile(path: string): Promise<void> {
  try {
    await unlink(path)
  } catch (error) {
    logDebug(`Could not delete file "${path}":`, describeError(error))
  }
}
