import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdir, readFile, readdir, rm, stat } from 'fs/promises'
import { EOL } from 'os'
import { join } from 'path'
import {
  createScratchDirectory,
  serializePass,
  writePassJson,
  copyImages,
  writeLocalizations,
  formatStrings,
  escapeString
} from '../src/bundle/assembler.js'
import { BundleError, DirectoryError } from '../src/errors.js'
import { PassSchema } from '../src/types.js'
import { PNG_BYTES, basePass, makeWorkspace, writeFixture } from './helpers.js'

describe('serializePass', () => {
  it('should write content fields with the structure under the pass type key', () => {
    const pass = PassSchema.parse(
      basePass({
        type: 'eventTicket',
        backgroundColor: 'rgb(128, 0, 128)',
        fields: {
          primaryFields: [{ key: 'event', label: 'EVENT', value: 'Concert' }]
        },
        images: [{ path: '/assets/icon.png' }]
      })
    )

    expect(JSON.parse(serializePass(pass))).toEqual({
      formatVersion: 1,
      serialNumber: 'ABC123',
      description: 'Test pass',
      organizationName: 'Test Org',
      passTypeIdentifier: 'pass.test.bundle',
      teamIdentifier: 'TEAM123456',
      backgroundColor: 'rgb(128, 0, 128)',
      eventTicket: {
        primaryFields: [{ key: 'event', label: 'EVENT', value: 'Concert' }]
      }
    })
  })

  it('should pretty-print with two spaces', () => {
    const text = serializePass(PassSchema.parse(basePass()))
    expect(text.startsWith('{\n  "formatVersion": 1,\n  "serialNumber": "ABC123",')).toBe(true)
  })

  it('should write an empty structure when no fields are given', () => {
    const json = JSON.parse(serializePass(PassSchema.parse(basePass({ type: 'coupon' }))))
    expect(json.coupon).toEqual({})
    expect(json.images).toBeUndefined()
    expect(json.localizations).toBeUndefined()
  })
})

describe('formatStrings', () => {
  it('should write one assignment per line', () => {
    expect(formatStrings({ GATE: 'Tor', SEAT: 'Platz' })).toBe(`"GATE" = "Tor";${EOL}"SEAT" = "Platz";${EOL}`)
  })

  it('should escape quotes and backslashes in keys and values', () => {
    expect(formatStrings({ 'say "hi"': 'C:\\path' })).toBe(`"say \\"hi\\"" = "C:\\\\path";${EOL}`)
    expect(escapeString("it's")).toBe("it\\'s")
    expect(escapeString('a\0b')).toBe('a\\0b')
  })

  it('should be empty for no strings', () => {
    expect(formatStrings({})).toBe('')
  })
})

describe('Bundle Assembler', () => {
  let workspace: string

  beforeEach(async () => {
    workspace = await makeWorkspace()
  })

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true })
  })

  it('should create the scratch directory keyed by serial number', async () => {
    const dir = await createScratchDirectory(PassSchema.parse(basePass()), workspace)
    expect(dir).toBe(join(workspace, 'ABC123'))
    expect((await stat(dir)).isDirectory()).toBe(true)
  })

  it('should accept an existing scratch directory', async () => {
    const pass = PassSchema.parse(basePass())
    await createScratchDirectory(pass, workspace)
    await expect(createScratchDirectory(pass, workspace)).resolves.toBe(join(workspace, 'ABC123'))
  })

  it('should empty a scratch directory left by an earlier run', async () => {
    const pass = PassSchema.parse(basePass())
    await writeFixture(join(workspace, 'ABC123', 'signature'), 'stale')
    await writeFixture(join(workspace, 'ABC123', 'old.lproj', 'pass.strings'), 'stale')

    const dir = await createScratchDirectory(pass, workspace)

    expect(await readdir(dir)).toEqual([])
  })

  it('should fail with a DirectoryError when the directory cannot be created', async () => {
    const blocker = await writeFixture(join(workspace, 'not-a-dir'), 'x')
    await expect(createScratchDirectory(PassSchema.parse(basePass()), blocker)).rejects.toBeInstanceOf(DirectoryError)
  })

  it('should fail with a DirectoryError when a file holds the scratch path', async () => {
    await writeFixture(join(workspace, 'ABC123'), 'x')
    await expect(createScratchDirectory(PassSchema.parse(basePass()), workspace)).rejects.toBeInstanceOf(DirectoryError)
  })

  it('should write pass.json', async () => {
    const pass = PassSchema.parse(basePass())
    await writePassJson(pass, workspace)
    expect(await readFile(join(workspace, 'pass.json'), 'utf-8')).toBe(serializePass(pass))
  })

  it('should copy images under their resolved names', async () => {
    const source = await writeFixture(join(workspace, 'src', 'artwork.png'))
    const logo = await writeFixture(join(workspace, 'src', 'logo.png'), Buffer.from('logo-bytes'))
    const bundle = join(workspace, 'bundle')
    const pass = PassSchema.parse(
      basePass({
        images: [
          { path: source, name: 'icon' },
          { path: source, name: 'icon', scale: 2 },
          { path: logo }
        ]
      })
    )

    await mkdir(bundle)
    await copyImages(pass, bundle)

    expect((await readdir(bundle)).sort()).toEqual(['icon.png', 'icon@2x.png', 'logo.png'])
    expect(await readFile(join(bundle, 'icon@2x.png'))).toEqual(PNG_BYTES)
    expect((await readFile(join(bundle, 'logo.png'))).toString()).toBe('logo-bytes')
  })

  it('should fail with a BundleError when a source image is missing', async () => {
    const pass = PassSchema.parse(basePass({ images: [{ path: join(workspace, 'missing.png') }] }))
    await expect(copyImages(pass, workspace)).rejects.toBeInstanceOf(BundleError)
  })

  it('should write localization directories with strings and images', async () => {
    const localizedLogo = await writeFixture(join(workspace, 'src', 'logo-de.png'), Buffer.from('de-logo'))
    const bundle = join(workspace, 'bundle')
    await writeFixture(join(bundle, 'pass.json'), '{}')
    const pass = PassSchema.parse(
      basePass({
        localizations: [
          {
            language: 'de',
            strings: { GATE: 'Tor' },
            images: [{ path: localizedLogo, name: 'logo@2x.png', scale: 2 }, { path: localizedLogo }]
          },
          { language: 'fr', strings: {} }
        ]
      })
    )

    await writeLocalizations(pass, bundle)

    expect((await readdir(bundle)).sort()).toEqual(['de.lproj', 'fr.lproj', 'pass.json'])
    expect((await readdir(join(bundle, 'de.lproj'))).sort()).toEqual(['logo-de.png', 'logo@2x.png', 'pass.strings'])
    expect(await readFile(join(bundle, 'de.lproj', 'pass.strings'), 'utf-8')).toBe(`"GATE" = "Tor";${EOL}`)
    expect((await readFile(join(bundle, 'de.lproj', 'logo@2x.png'))).toString()).toBe('de-logo')
    expect(await readFile(join(bundle, 'fr.lproj', 'pass.strings'), 'utf-8')).toBe('')
  })

  it('should fail with a DirectoryError when a file holds a localization path', async () => {
    const bundle = join(workspace, 'bundle')
    const blocker = await writeFixture(join(bundle, 'de.lproj'), 'x')
    const pass = PassSchema.parse(basePass({ localizations: [{ language: 'de', strings: { GATE: 'Tor' } }] }))

    let caught: unknown
    try {
      await writeLocalizations(pass, bundle)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(DirectoryError)
    if (caught instanceof DirectoryError) {
      expect(caught.path).toBe(blocker)
      expect(caught.stage).toBe('assemble')
    }
  })
})
