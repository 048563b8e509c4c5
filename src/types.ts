import { z } from 'zod'

// ===========================================
// PASS VARIANTS & IMAGE ROLES
// ===========================================

export const PASS_VARIANTS = ['boardingPass', 'coupon', 'eventTicket', 'generic', 'storeCard'] as const

export type PassVariant = (typeof PASS_VARIANTS)[number]

export const IMAGE_ROLES = ['icon', 'logo', 'strip', 'background', 'thumbnail', 'footer'] as const

export type ImageRole = (typeof IMAGE_ROLES)[number]

/**
 * Image roles each pass variant accepts. Looked up by the pass `type` tag.
 */
export const ALLOWED_IMAGES: Readonly<Record<PassVariant, readonly ImageRole[]>> = {
  boardingPass: ['logo', 'icon', 'footer'],
  coupon: ['logo', 'icon', 'strip'],
  eventTicket: ['logo', 'icon', 'strip', 'background', 'thumbnail'],
  generic: ['logo', 'icon', 'thumbnail'],
  storeCard: ['logo', 'icon', 'strip']
}

// Boarding Pass Transit Types
export const TransitTypeSchema = z.enum([
  'PKTransitTypeAir',
  'PKTransitTypeBoat',
  'PKTransitTypeBus',
  'PKTransitTypeTrain',
  'PKTransitTypeGeneric'
])

export type TransitType = z.infer<typeof TransitTypeSchema>

// Names used as a single path segment (scratch directory, .lproj, output file)
function isFileNameSegment(value: string): boolean {
  return !/[\\/]/.test(value) && value !== '.' && value !== '..'
}

// ===========================================
// PASS CONTENT
// ===========================================

export const PassFieldSchema = z.object({
  key: z.string().min(1),
  label: z.string().optional(),
  value: z.union([z.string(), z.number()]),
  changeMessage: z.string().optional(),
  textAlignment: z
    .enum(['PKTextAlignmentLeft', 'PKTextAlignmentCenter', 'PKTextAlignmentRight', 'PKTextAlignmentNatural'])
    .optional()
})

export type PassField = z.infer<typeof PassFieldSchema>

export const PassStructureSchema = z.object({
  headerFields: z.array(PassFieldSchema).optional(),
  primaryFields: z.array(PassFieldSchema).optional(),
  secondaryFields: z.array(PassFieldSchema).optional(),
  auxiliaryFields: z.array(PassFieldSchema).optional(),
  backFields: z.array(PassFieldSchema).optional(),
  // Boarding passes only
  transitType: TransitTypeSchema.optional()
})

export type PassStructure = z.infer<typeof PassStructureSchema>

export const BarcodeSchema = z.object({
  message: z.string(),
  format: z.enum(['PKBarcodeFormatQR', 'PKBarcodeFormatPDF417', 'PKBarcodeFormatAztec', 'PKBarcodeFormatCode128']),
  messageEncoding: z.string().default('iso-8859-1'),
  altText: z.string().optional()
})

export type Barcode = z.infer<typeof BarcodeSchema>

export const LocationSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  altitude: z.number().optional(),
  relevantText: z.string().optional()
})

export type Location = z.infer<typeof LocationSchema>

// ===========================================
// IMAGES & LOCALIZATIONS
// ===========================================

export const PassImageSchema = z.object({
  // Source file on disk
  path: z.string().min(1),
  // Explicit role override, e.g. `icon`
  name: z.string().min(1).optional(),
  scale: z.union([z.literal(1), z.literal(2), z.literal(3)]).default(1)
})

export type PassImage = z.input<typeof PassImageSchema>

export const PassLocalizationSchema = z.object({
  language: z
    .string()
    .min(1)
    .refine(isFileNameSegment, {
      message: 'language code must not contain path separators'
    }),
  strings: z.record(z.string()).default({}),
  images: z.array(PassImageSchema).default([])
})

export type PassLocalization = z.input<typeof PassLocalizationSchema>

// ===========================================
// PASS
// ===========================================

export const PassSchema = z.object({
  type: z.enum(PASS_VARIANTS),
  serialNumber: z
    .string()
    .min(1)
    .refine(isFileNameSegment, {
      message: 'serial number must not contain path separators'
    }),
  formatVersion: z.number().int().positive().default(1),
  description: z.string().min(1),
  organizationName: z.string().min(1),
  passTypeIdentifier: z.string().min(1),
  teamIdentifier: z.string().min(1),
  logoText: z.string().optional(),
  backgroundColor: z.string().optional(),
  foregroundColor: z.string().optional(),
  labelColor: z.string().optional(),
  groupingIdentifier: z.string().optional(),
  barcodes: z.array(BarcodeSchema).optional(),
  locations: z.array(LocationSchema).optional(),
  relevantDate: z.string().optional(),
  expirationDate: z.string().optional(),
  voided: z.boolean().optional(),
  webServiceURL: z.string().url().optional(),
  authenticationToken: z.string().min(16).optional(),
  sharingProhibited: z.boolean().optional(),
  userInfo: z.record(z.unknown()).optional(),
  fields: PassStructureSchema.optional(),
  images: z.array(PassImageSchema).default([]),
  localizations: z.array(PassLocalizationSchema).default([])
})

/** A pass as callers write it; defaults not yet applied. */
export type Pass = z.input<typeof PassSchema>

/** A pass after schema parsing, with defaults filled in. */
export type ParsedPass = z.output<typeof PassSchema>

export type ParsedPassImage = z.output<typeof PassImageSchema>

export type ParsedPassLocalization = z.output<typeof PassLocalizationSchema>

// ===========================================
// BUNDLE CONFIGURATION & RESULTS
// ===========================================

export const BundlerConfigSchema = z
  .object({
    tempDir: z.string().min(1),
    outputDir: z.string().min(1),
    certificatePath: z.string().optional(),
    certificatePassword: z.string().default(''),
    wwdrPath: z.string().optional(),
    skipSignature: z.boolean().default(false)
  })
  .superRefine((config, ctx) => {
    if (config.skipSignature) return
    if (!config.certificatePath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['certificatePath'],
        message: 'required unless skipSignature is set'
      })
    }
    if (!config.wwdrPath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['wwdrPath'],
        message: 'required unless skipSignature is set'
      })
    }
  })

export type BundlerConfig = Readonly<z.output<typeof BundlerConfigSchema>>

export const BundleOptionsSchema = z.object({
  // Output base name; defaults to the serial number
  name: z
    .string()
    .min(1)
    .refine(isFileNameSegment, {
      message: 'output name must not contain path separators'
    })
    .optional()
})

export type BundleOptions = z.infer<typeof BundleOptionsSchema>

export type Manifest = Record<string, string>

export interface PassBundleResult {
  path: string
  manifest: Manifest
  signed: boolean
}
