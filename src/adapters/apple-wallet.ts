import type { BundlerConfig, Pass, PassBundleResult } from '../types.js'
import { resolveBundlerConfig } from '../config.js'
import type { BundlerConfigInput } from '../config.js'
import { createPassBundle, getPassBuffer } from '../api/bundle.js'
import { validatePass } from '../bundle/validator.js'

/**
 * Apple Wallet bundler - builds signed .pkpass archives for every pass type:
 * - Boarding Pass (flights, trains, buses, boats)
 * - Event Ticket (concerts, sports, movies)
 * - Store Card (loyalty, membership, gift cards)
 * - Coupon (offers, discounts)
 * - Generic (anything else)
 *
 * The configuration is resolved once and frozen, so one instance can serve
 * concurrent calls.
 */
export class PassBundler {
  readonly config: BundlerConfig

  constructor(config?: BundlerConfigInput, env?: NodeJS.ProcessEnv) {
    this.config = resolveBundlerConfig(config, env)
  }

  /**
   * Generate a .pkpass file, named after the serial number unless `name` is given
   */
  async create(pass: Pass, name?: string): Promise<PassBundleResult> {
    return createPassBundle(pass, this.config, { name })
  }

  /**
   * Generate a .pkpass and return its contents
   */
  async getBuffer(pass: Pass): Promise<Buffer> {
    return getPassBuffer(pass, this.config)
  }

  validate(pass: Pass): string[] {
    return validatePass(pass)
  }
}

export default PassBundler
