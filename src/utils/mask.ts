/**
 * Redact the user directory part of a path before it leaves the process
 * (reports, security events).
 */
export function maskPath(path: string): string {
  return path.replace(/\/Users\/[^/]+/g, '/Users/[REDACTED]')
    .replace(/\/home\/[^/]+/g, '/home/[REDACTED]')
    .replace(/C:\\Users\\[^\\]+/g, 'C:\\Users\\[REDACTED]')
}

/**
 * Keep a declared upload name printable: control characters become "?" and
 * long names are cut.
 */
export function maskFileName(name: string, maxLength = 255): string {
  // eslint-disable-next-line no-control-regex
  const printable = name.replace(/[\u0000-\u001f\u007f]/g, '?')
  return printable.length > maxLength ? `${printable.slice(0, maxLength)}…` : printable
}
