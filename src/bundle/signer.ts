import { randomBytes } from 'crypto'
import { readFile, writeFile } from 'fs/promises'
import { join } from 'path'
import forge from 'node-forge'
import type { BundlerConfig } from '../types.js'
import { CertificateError, SigningError, describeError } from '../errors.js'
import { deleteFile } from '../utils/fs.js'
import { logDebug } from '../utils/logger.js'
import { MANIFEST_FILENAME, SIGNATURE_FILENAME } from './manifest.js'

const SMIME_FILENAME_MARKER = 'filename="smime.p7s"'
const SMIME_BOUNDARY_MARKER = '------'

export interface SigningCredentials {
  certificate: forge.pki.Certificate
  privateKey: forge.pki.PrivateKey
  // Apple WWDR intermediate
  wwdr: forge.pki.Certificate
}

function bagsOfType(p12: forge.pkcs12.Pkcs12Pfx, bagType: string): forge.pkcs12.Bag[] {
  return p12.getBags({ bagType })[bagType] ?? []
}

/**
 * Decrypt a PKCS#12 container and pick the signing certificate and key.
 * When the container holds several certificates, the one sharing the key's
 * localKeyId is the leaf.
 */
export function readPkcs12(data: Buffer, password: string): { certificate: forge.pki.Certificate; privateKey: forge.pki.PrivateKey } {
  let p12: forge.pkcs12.Pkcs12Pfx
  try {
    p12 = forge.pkcs12.pkcs12FromAsn1(forge.asn1.fromDer(data.toString('binary')), password)
  } catch (error) {
    throw new CertificateError(`Invalid certificate file: ${describeError(error)}`, error)
  }

  const keyBag = [
    ...bagsOfType(p12, forge.pki.oids.pkcs8ShroudedKeyBag),
    ...bagsOfType(p12, forge.pki.oids.keyBag)
  ].find((bag) => bag.key)
  const certBags = bagsOfType(p12, forge.pki.oids.certBag).filter((bag) => bag.cert)

  if (!keyBag?.key || certBags.length === 0) {
    throw new CertificateError('Invalid certificate file: expected a certificate and a private key')
  }

  const localKeyId: unknown = keyBag.attributes?.localKeyId?.[0]
  const leaf =
    certBags.find((bag) => typeof localKeyId === 'string' && bag.attributes?.localKeyId?.[0] === localKeyId) ??
    certBags[0]

  if (!leaf.cert) {
    throw new CertificateError('Invalid certificate file: expected a certificate and a private key')
  }

  return { certificate: leaf.cert, privateKey: keyBag.key }
}

/** Parse a certificate given as PEM text or raw DER. */
export function readCertificate(data: Buffer): forge.pki.Certificate {
  const text = data.toString('binary')
  if (text.includes('-----BEGIN CERTIFICATE-----')) {
    return forge.pki.certificateFromPem(text)
  }
  return forge.pki.certificateFromAsn1(forge.asn1.fromDer(text))
}

/**
 * Load the signing credentials named by the configuration.
 */
export async function loadSigningCredentials(config: BundlerConfig): Promise<SigningCredentials> {
  const { certificatePath, wwdrPath } = config
  if (!certificatePath || !wwdrPath) {
    throw new CertificateError('A certificate and a WWDR certificate are required to sign')
  }

  let p12Data: Buffer
  try {
    p12Data = await readFile(certificatePath)
  } catch (error) {
    throw new CertificateError(`The certificate at "${certificatePath}" could not be read`, error)
  }

  let wwdrData: Buffer
  try {
    wwdrData = await readFile(wwdrPath)
  } catch (error) {
    throw new CertificateError(`The WWDR certificate at "${wwdrPath}" could not be read`, error)
  }

  const { certificate, privateKey } = readPkcs12(p12Data, config.certificatePassword)

  let wwdr: forge.pki.Certificate
  try {
    wwdr = readCertificate(wwdrData)
  } catch (error) {
    throw new CertificateError(`The WWDR certificate at "${wwdrPath}" is not a valid certificate`, error)
  }

  return { certificate, privateKey, wwdr }
}

/**
 * Detached, binary-mode PKCS#7 signature over `content`, in the
 * multipart/signed S/MIME layout `openssl smime -sign -binary` writes.
 * The signer certificate and the WWDR certificate are embedded; no others.
 */
export function createSmimeSignature(content: Buffer, credentials: SigningCredentials): string {
  const p7 = forge.pkcs7.createSignedData()
  p7.content = forge.util.createBuffer(content.toString('binary'))
  p7.addCertificate(credentials.certificate)
  p7.addCertificate(credentials.wwdr)
  p7.addSigner({
    key: forge.pki.privateKeyToPem(credentials.privateKey),
    certificate: credentials.certificate,
    digestAlgorithm: forge.pki.oids.sha256,
    authenticatedAttributes: [
      { type: forge.pki.oids.contentType, value: forge.pki.oids.data },
      { type: forge.pki.oids.messageDigest },
      { type: forge.pki.oids.signingTime }
    ]
  })
  p7.sign({ detached: true })

  const der = forge.asn1.toDer(p7.toAsn1()).getBytes()
  const boundary = `----${randomBytes(16).toString('hex').toUpperCase()}`

  return [
    'MIME-Version: 1.0',
    `Content-Type: multipart/signed; protocol="application/x-pkcs7-signature"; micalg="sha-256"; boundary="${boundary}"`,
    '',
    'This is an S/MIME signed message',
    '',
    `--${boundary}`,
    content.toString('utf-8'),
    `--${boundary}`,
    'Content-Type: application/x-pkcs7-signature; name="smime.p7s"',
    'Content-Transfer-Encoding: base64',
    `Content-Disposition: attachment; ${SMIME_FILENAME_MARKER}`,
    '',
    forge.util.encode64(der, 64),
    '',
    `--${boundary}--`,
    ''
  ].join('\n')
}

/**
 * Unwrap an S/MIME signed message into the raw DER PKCS#7 blob: the base64
 * body after `filename="smime.p7s"`, up to the next boundary line.
 */
export function extractDerSignature(smime: string): Buffer {
  const start = smime.indexOf(SMIME_FILENAME_MARKER)
  if (start === -1) {
    throw new SigningError(`Signature envelope has no ${SMIME_FILENAME_MARKER} part`)
  }

  const rest = smime.slice(start + SMIME_FILENAME_MARKER.length)
  const end = rest.indexOf(SMIME_BOUNDARY_MARKER)
  if (end === -1) {
    throw new SigningError('Signature envelope has no closing boundary')
  }

  // Strips the remaining header line break and the blank line too
  const body = rest.slice(0, end).trim()
  if (body === '' || !/^[A-Za-z0-9+/=\s]+$/.test(body)) {
    throw new SigningError('Signature body is not valid base64')
  }

  return Buffer.from(body, 'base64')
}

/**
 * Sign manifest.json into the `signature` file. Returns false when signing
 * is skipped by configuration.
 */
export async function signManifest(dir: string, config: BundlerConfig): Promise<boolean> {
  if (config.skipSignature) {
    // A signature from an earlier run would not cover this manifest
    await deleteFile(join(dir, SIGNATURE_FILENAME))
    logDebug('Signature skipped by configuration')
    return false
  }

  const credentials = await loadSigningCredentials(config)
  const signaturePath = join(dir, SIGNATURE_FILENAME)

  try {
    const manifest = await readFile(join(dir, MANIFEST_FILENAME))
    await writeFile(signaturePath, createSmimeSignature(manifest, credentials), 'utf-8')

    // The envelope is replaced in place by the DER blob it carries
    const der = extractDerSignature(await readFile(signaturePath, 'utf-8'))
    await writeFile(signaturePath, der)
    logDebug(`Signature written (${der.length} bytes)`)
  } catch (error) {
    if (error instanceof SigningError) throw error
    throw new SigningError(`Manifest could not be signed: ${describeError(error)}`, error)
  }

  return true
}
