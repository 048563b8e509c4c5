export type PassBundleStage = 'config' | 'validate' | 'assemble' | 'manifest' | 'sign' | 'archive'

/**
 * Base class for every failure raised while building a pass bundle.
 * `stage` names the pipeline step that failed.
 */
export class PassBundleError extends Error {
  readonly stage: PassBundleStage

  constructor(stage: PassBundleStage, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.stage = stage
  }
}

export class PassValidationError extends PassBundleError {
  readonly errors: string[]

  constructor(errors: string[]) {
    super('validate', `Invalid pass: ${errors.join(' ')}`)
    this.errors = errors
  }
}

export class ConfigError extends PassBundleError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super('config', `Invalid bundler configuration: ${issues.join('; ')}`)
    this.issues = issues
  }
}

export class DirectoryError extends PassBundleError {
  readonly path: string

  constructor(path: string, cause?: unknown) {
    super('assemble', `Directory "${path}" could not be created`, { cause })
    this.path = path
  }
}

export class BundleError extends PassBundleError {
  constructor(message: string, cause?: unknown) {
    super('assemble', message, { cause })
  }
}

export class ManifestError extends PassBundleError {
  constructor(message: string, cause?: unknown) {
    super('manifest', message, { cause })
  }
}

export class CertificateError extends PassBundleError {
  constructor(message: string, cause?: unknown) {
    super('sign', message, { cause })
  }
}

export class SigningError extends PassBundleError {
  constructor(message: string, cause?: unknown) {
    super('sign', message, { cause })
  }
}

export class ArchiveError extends PassBundleError {
  readonly path: string

  constructor(path: string, cause?: unknown) {
    super('archive', `Could not create ZIP file at "${path}"`, { cause })
    this.path = path
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
