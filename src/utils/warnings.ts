const PREFIX = "[json-marshal]"

const emitted = new Set<string>()

/**
 * Log a prefixed warning
 * @param once - when true, an identical message is only logged the first time
 */
export function warn(message: string, once = false): void {
  if (once) {
    if (emitted.has(message)) return
    emitted.add(message)
  }
  console.warn(`${PREFIX} ${message}`)
}

/**
 * Log a deprecation warning, once per message
 */
export function deprecationWarning(message: string): void {
  warn(`Deprecated: ${message}`, true)
}
