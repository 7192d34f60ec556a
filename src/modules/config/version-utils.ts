/**
 * Helpers for the config_format_version field.
 */

export function isVersionSupported(version: string, supported: readonly string[]): boolean {
  return supported.includes(version)
}

/**
 * Format the standard "unsupported version" error message.
 */
export function formatUnsupportedVersionError(version: string, supported: readonly string[]): string {
  return (
    `Configuration format version "${version}" is not supported. ` +
    `This version of rebase-pilot supports: ${supported.join(', ')}. ` +
    `Please upgrade: npm install -g rebase-pilot@latest`
  )
}
