import { join } from 'path'
import { PassBundler, PassValidationError } from '../src/index.js'

/**
 * Builds an event ticket from the images in ./examples/assets.
 *
 * Signing needs APPLE_CERT_PATH, APPLE_CERT_PASSWORD and APPLE_WWDR_PATH;
 * set PASSBUNDLER_SKIP_SIGNATURE=1 to build an unsigned bundle instead.
 */
async function main() {
  console.log('🎫 passbundler event ticket demo\n')

  const assets = join(process.cwd(), 'examples', 'assets')
  const bundler = new PassBundler({
    outputDir: process.env.PASSBUNDLER_OUTPUT_DIR || process.cwd()
  })

  const pass = {
    type: 'eventTicket' as const,
    serialNumber: 'ET-20261019-DEMO01',
    description: 'Summer Concert',
    organizationName: 'Open Air Hall',
    passTypeIdentifier: 'pass.com.example.events',
    teamIdentifier: 'EXAMPLE123',
    backgroundColor: 'rgb(128, 0, 128)',
    foregroundColor: 'rgb(255, 255, 255)',
    fields: {
      headerFields: [{ key: 'gate', label: 'GATE', value: 'B' }],
      primaryFields: [{ key: 'event', label: 'EVENT', value: 'Summer Concert' }],
      auxiliaryFields: [
        { key: 'row', label: 'ROW', value: '12' },
        { key: 'seat', label: 'SEAT', value: '7' }
      ]
    },
    barcodes: [
      { message: 'ET-20261019-DEMO01', format: 'PKBarcodeFormatQR' as const, messageEncoding: 'iso-8859-1' }
    ],
    images: [
      { path: join(assets, 'icon.png') },
      { path: join(assets, 'icon@2x.png') },
      { path: join(assets, 'strip.png') }
    ],
    localizations: [
      { language: 'de', strings: { GATE: 'Tor', ROW: 'Reihe', SEAT: 'Platz' } }
    ]
  }

  // 1) Check the image set
  const problems = bundler.validate(pass)
  if (problems.length > 0) {
    console.log('❌ Pass is invalid:')
    problems.forEach((problem) => console.log('   -', problem))
    return
  }

  // 2) Build the bundle
  try {
    const result = await bundler.create(pass)
    console.log('✅ Bundle written:', result.path)
    console.log('   Signed:', result.signed)
    console.log('   Manifest:', result.manifest)
  } catch (error) {
    if (error instanceof PassValidationError) {
      console.log('❌ Validation failed:', error.errors)
      return
    }
    throw error
  }
}

main().catch(err => {
  console.error(err)
  process.exit(1)
})
