/**
 * Pass Bundle API
 *
 * validate → scratch directory → pass.json → images → localizations →
 * manifest → signature → archive → cleanup
 */

import { readFile } from 'fs/promises'
import { join } from 'path'
import type { BundleOptions, BundlerConfig, Pass, PassBundleResult } from '../types.js'
import { PassBundleError, describeError } from '../errors.js'
import { assertValidOptions, assertValidPass } from '../bundle/validator.js'
import { assembleBundle, createScratchDirectory } from '../bundle/assembler.js'
import { generateManifest } from '../bundle/manifest.js'
import { signManifest } from '../bundle/signer.js'
import { PASS_EXTENSION, archiveDirectory } from '../bundle/archiver.js'
import { deleteDirectory, deleteFile } from '../utils/fs.js'
import { logDebug, logError } from '../utils/logger.js'

/**
 * Build, sign and archive a pass bundle into
 * `<outputDir>/<name ?? serialNumber>.pkpass`.
 *
 * The scratch directory lives for this call only: anything left in it by an
 * earlier run is cleared first, and it is removed on every exit path once
 * created. Calls for the same serial number must not overlap; they share a
 * scratch directory.
 */
export async function createPassBundle(
  pass: Pass,
  config: BundlerConfig,
  options: BundleOptions = {}
): Promise<PassBundleResult> {
  const { name } = assertValidOptions(options)
  const parsed = assertValidPass(pass)
  const dir = await createScratchDirectory(parsed, config.tempDir)

  try {
    await assembleBundle(parsed, dir)
    const manifest = await generateManifest(dir)
    const signed = await signManifest(dir, config)

    const path = join(config.outputDir, `${name ?? parsed.serialNumber}${PASS_EXTENSION}`)
    await archiveDirectory(dir, path)

    logDebug(`Created ${path}`)
    return { path, manifest, signed }
  } catch (error) {
    logError(`Pass ${parsed.serialNumber} failed:`, describeError(error))
    throw error instanceof PassBundleError
      ? error
      : new PassBundleError('assemble', `Pass bundle could not be created: ${describeError(error)}`, { cause: error })
  } finally {
    await deleteDirectory(dir)
  }
}

/**
 * Build a bundle and return its bytes; the archive file is removed.
 */
export async function getPassBuffer(pass: Pass, config: BundlerConfig): Promise<Buffer> {
  const { path } = await createPassBundle(pass, config)
  try {
    return await readFile(path)
  } finally {
    await deleteFile(path)
  }
}
