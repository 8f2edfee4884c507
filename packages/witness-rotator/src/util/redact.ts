/**
 * Replace every occurrence of each non-empty secret in `text`.
 *
 * @remarks
 * Secrets are applied longest first so that a secret containing another is
 * masked as a whole.
 *
 * @internal
 */
export function maskSecrets(
  text: string,
  secrets: Iterable<string>,
  replacement = '[REDACTED]',
): string {
  const ordered = [...secrets].filter((s) => s.length > 0).sort((a, b) => b.length - a.length)
  let masked = text
  for (const secret of ordered) {
    masked = masked.replaceAll(secret, replacement)
  }
  return masked
}
