import type { ZodIssue } from 'zod'
import { ALLOWED_IMAGES, BundleOptionsSchema, PassSchema } from '../types.js'
import type { BundleOptions, ImageRole, Pass, ParsedPass, ParsedPassImage, PassVariant } from '../types.js'
import { PassValidationError } from '../errors.js'
import { imageExtension, imageFileName, normalizeImageName, resolveImageName } from './images.js'

export const ICON_MISSING_ERROR = 'The pass must have an icon image.'

export const STRIP_EXCLUSIVITY_ERROR =
  'When specifying a strip image, no background image or thumbnail may be specified.'

function isAllowedImage(name: string, variant: PassVariant): boolean {
  const allowed: readonly string[] = ALLOWED_IMAGES[variant]
  return allowed.includes(name) || allowed.includes(normalizeImageName(name))
}

function hasRole(images: ParsedPassImage[], ...roles: ImageRole[]): boolean {
  const wanted: readonly string[] = roles
  return images.some((image) => wanted.includes(normalizeImageName(resolveImageName(image))))
}

/**
 * Image rules for a structurally valid pass. Every violation is reported.
 */
export function validateImages(pass: ParsedPass): string[] {
  const errors: string[] = []

  for (const image of pass.images) {
    const name = resolveImageName(image)
    const extension = imageExtension(image)

    if (extension.toLowerCase() !== 'png') {
      errors.push(`${imageFileName(image)}: expected .png extension, found .${extension}`)
    }
    if (!isAllowedImage(name, pass.type)) {
      errors.push(`Invalid image type \`${name}\` for pass type \`${pass.type}\`.`)
    }
  }

  // Event tickets take a background or thumbnail only without a strip
  if (pass.type === 'eventTicket' && hasRole(pass.images, 'strip') && hasRole(pass.images, 'thumbnail', 'background')) {
    errors.push(STRIP_EXCLUSIVITY_ERROR)
  }

  if (!hasRole(pass.images, 'icon')) {
    errors.push(ICON_MISSING_ERROR)
  }

  return errors
}

function formatIssues(issues: ZodIssue[], root: string): string[] {
  return issues.map((issue) => `${issue.path.join('.') || root}: ${issue.message}`)
}

function parsePass(pass: Pass): { pass?: ParsedPass; errors: string[] } {
  const result = PassSchema.safeParse(pass)
  if (!result.success) {
    return { errors: formatIssues(result.error.issues, 'pass') }
  }
  return { pass: result.data, errors: [] }
}

/**
 * Validate a pass, returning every problem found (empty when valid).
 * Structural problems are reported on their own, since the image rules
 * need a well-formed pass to run against.
 */
export function validatePass(pass: Pass): string[] {
  const parsed = parsePass(pass)
  if (!parsed.pass) return parsed.errors
  return validateImages(parsed.pass)
}

/**
 * Validate a pass and return it with defaults applied, or throw a
 * PassValidationError carrying the full list of violations.
 */
export function assertValidPass(pass: Pass): ParsedPass {
  const parsed = parsePass(pass)
  if (!parsed.pass) {
    throw new PassValidationError(parsed.errors)
  }

  const errors = validateImages(parsed.pass)
  if (errors.length > 0) {
    throw new PassValidationError(errors)
  }

  return parsed.pass
}

/**
 * Check bundle options before anything touches the filesystem; the output
 * name must stay a single file name inside the output directory.
 */
export function assertValidOptions(options: BundleOptions): BundleOptions {
  const result = BundleOptionsSchema.safeParse(options)
  if (!result.success) {
    throw new PassValidationError(formatIssues(result.error.issues, 'options'))
  }
  return result.data
}
