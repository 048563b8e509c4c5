// Pass bundle API
export { createPassBundle, getPassBuffer } from './api/bundle.js'

// Bundler
export { PassBundler } from './adapters/apple-wallet.js'

// Configuration
export { resolveBundlerConfig } from './config.js'
export type { BundlerConfigInput } from './config.js'

// Pipeline stages
export {
  validatePass,
  validateImages,
  assertValidPass,
  assertValidOptions,
  ICON_MISSING_ERROR,
  STRIP_EXCLUSIVITY_ERROR
} from './bundle/validator.js'
export {
  createScratchDirectory,
  assembleBundle,
  serializePass,
  writePassJson,
  copyImages,
  writeLocalizations,
  formatStrings,
  escapeString,
  PASS_FILENAME,
  LOCALIZATION_EXTENSION,
  STRINGS_FILENAME
} from './bundle/assembler.js'
export { generateManifest, hashFile, MANIFEST_FILENAME, SIGNATURE_FILENAME } from './bundle/manifest.js'
export {
  signManifest,
  loadSigningCredentials,
  readPkcs12,
  readCertificate,
  createSmimeSignature,
  extractDerSignature
} from './bundle/signer.js'
export type { SigningCredentials } from './bundle/signer.js'
export { archiveDirectory, buildArchive, PASS_EXTENSION } from './bundle/archiver.js'
export {
  resolveImageName,
  normalizeImageName,
  imageExtension,
  imageBaseName,
  imageFileName
} from './bundle/images.js'
export { deleteDirectory, deleteFile } from './utils/fs.js'

// Errors
export {
  PassBundleError,
  PassValidationError,
  ConfigError,
  DirectoryError,
  BundleError,
  ManifestError,
  CertificateError,
  SigningError,
  ArchiveError
} from './errors.js'
export type { PassBundleStage } from './errors.js'

// Types
export type {
  PassVariant,
  ImageRole,
  TransitType,
  PassField,
  PassStructure,
  Barcode,
  Location,
  PassImage,
  PassLocalization,
  Pass,
  ParsedPass,
  BundlerConfig,
  BundleOptions,
  Manifest,
  PassBundleResult
} from './types.js'

// Schemas
export {
  PASS_VARIANTS,
  IMAGE_ROLES,
  ALLOWED_IMAGES,
  PassSchema,
  PassImageSchema,
  PassLocalizationSchema,
  PassFieldSchema,
  PassStructureSchema,
  TransitTypeSchema,
  BarcodeSchema,
  LocationSchema,
  BundlerConfigSchema,
  BundleOptionsSchema
} from './types.js'
