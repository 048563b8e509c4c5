const isTestEnv =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST === '1'

const isDebugEnabled = /^(1|true|yes)$/i.test(process.env.PASSBUNDLER_DEBUG || '')

const PREFIX = '[passbundler]'

export function logDebug(...args: unknown[]) {
  if (!isDebugEnabled) return
  console.log(PREFIX, ...args)
}

export function logInfo(...args: unknown[]) {
  if (!isDebugEnabled) return
  console.log(PREFIX, ...args)
}

export function logWarn(...args: unknown[]) {
  if (isTestEnv && !isDebugEnabled) return
  console.warn(PREFIX, ...args)
}

export function logError(...args: unknown[]) {
  if (isTestEnv && !isDebugEnabled) return
  console.error(PREFIX, ...args)
}
