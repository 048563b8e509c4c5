import { tmpdir } from 'os'
import { BundlerConfigSchema } from './types.js'
import type { BundlerConfig } from './types.js'
import { ConfigError } from './errors.js'

export type BundlerConfigInput = Partial<BundlerConfig>

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined
  return /^(1|true|yes)$/i.test(value)
}

/**
 * Build an immutable bundler configuration. Explicit values win, then the
 * environment, then defaults.
 *
 * Environment variables: PASSBUNDLER_TEMP_DIR, PASSBUNDLER_OUTPUT_DIR,
 * APPLE_CERT_PATH, APPLE_CERT_PASSWORD, APPLE_WWDR_PATH,
 * PASSBUNDLER_SKIP_SIGNATURE.
 */
export function resolveBundlerConfig(
  config?: BundlerConfigInput,
  env: NodeJS.ProcessEnv = process.env
): BundlerConfig {
  const result = BundlerConfigSchema.safeParse({
    tempDir: config?.tempDir || env.PASSBUNDLER_TEMP_DIR || tmpdir(),
    outputDir: config?.outputDir || env.PASSBUNDLER_OUTPUT_DIR || '',
    certificatePath: config?.certificatePath || env.APPLE_CERT_PATH || undefined,
    certificatePassword: config?.certificatePassword ?? env.APPLE_CERT_PASSWORD ?? '',
    wwdrPath: config?.wwdrPath || env.APPLE_WWDR_PATH || undefined,
    skipSignature: config?.skipSignature ?? parseFlag(env.PASSBUNDLER_SKIP_SIGNATURE) ?? false
  })

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    )
  }

  return Object.freeze(result.data)
}
