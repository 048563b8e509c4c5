import { mkdir, mkdtemp, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { dirname, join } from 'path'
import forge from 'node-forge'
import type { Pass } from '../src/types.js'

// 1x1 PNG; the pipeline copies bytes verbatim so any content would do
export const PNG_BYTES = Buffer.from(
  '89504e470d0a1a0a0000000d4948445200000001000000010806000000' +
    '1f15c4890000000d49444154789c6360f8cfc0000003010100c9fe92ef0000000049454e44ae426082',
  'hex'
)

export const TEST_PASSWORD = 'test-secret'

export async function makeWorkspace(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'passbundler-test-'))
}

export async function writeFixture(path: string, data: string | Buffer = PNG_BYTES): Promise<string> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, data)
  return path
}

export function basePass(overrides: Partial<Pass> = {}): Pass {
  return {
    type: 'generic',
    serialNumber: 'ABC123',
    description: 'Test pass',
    organizationName: 'Test Org',
    passTypeIdentifier: 'pass.test.bundle',
    teamIdentifier: 'TEAM123456',
    images: [],
    localizations: [],
    ...overrides
  }
}

export interface TestCredentials {
  p12: Buffer
  wwdrPem: string
  wwdrDer: Buffer
  leaf: forge.pki.Certificate
  wwdr: forge.pki.Certificate
}

function makeCertificate(
  subject: string,
  publicKey: forge.pki.rsa.PublicKey,
  issuer: string,
  signingKey: forge.pki.rsa.PrivateKey,
  serialNumber: string
): forge.pki.Certificate {
  const cert = forge.pki.createCertificate()
  cert.publicKey = publicKey
  cert.serialNumber = serialNumber
  cert.validity.notBefore = new Date(Date.now() - 60_000)
  cert.validity.notAfter = new Date(Date.now() + 365 * 24 * 60 * 60 * 1000)
  cert.setSubject([{ name: 'commonName', value: subject }])
  cert.setIssuer([{ name: 'commonName', value: issuer }])
  cert.sign(signingKey, forge.md.sha256.create())
  return cert
}

/**
 * Self-made trust chain: a stand-in WWDR authority and a pass type
 * certificate it issued, packed into a PKCS#12 with TEST_PASSWORD.
 */
export function createTestCredentials(): TestCredentials {
  const wwdrKeys = forge.pki.rsa.generateKeyPair(2048)
  const leafKeys = forge.pki.rsa.generateKeyPair(2048)

  const wwdr = makeCertificate('Test WWDR Authority', wwdrKeys.publicKey, 'Test WWDR Authority', wwdrKeys.privateKey, '01')
  const leaf = makeCertificate('Pass Type ID: pass.test.bundle', leafKeys.publicKey, 'Test WWDR Authority', wwdrKeys.privateKey, '02')

  const p12Asn1 = forge.pkcs12.toPkcs12Asn1(leafKeys.privateKey, [leaf], TEST_PASSWORD, { algorithm: '3des' })

  return {
    p12: Buffer.from(forge.asn1.toDer(p12Asn1).getBytes(), 'binary'),
    wwdrPem: forge.pki.certificateToPem(wwdr),
    wwdrDer: Buffer.from(forge.asn1.toDer(forge.pki.certificateToAsn1(wwdr)).getBytes(), 'binary'),
    leaf,
    wwdr
  }
}

/** Write credentials into `dir`, returning their paths. */
export async function writeCredentials(
  dir: string,
  credentials: TestCredentials
): Promise<{ certificatePath: string; wwdrPath: string }> {
  const certificatePath = await writeFixture(join(dir, 'certs', 'pass.p12'), credentials.p12)
  const wwdrPath = await writeFixture(join(dir, 'certs', 'wwdr.pem'), credentials.wwdrPem)
  return { certificatePath, wwdrPath }
}
