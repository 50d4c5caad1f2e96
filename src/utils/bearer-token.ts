const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i

/**
 * Returns the token of an `Authorization: Bearer <token>` header, or null
 * when the header is missing or uses another scheme.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null
  const match = BEARER_PATTERN.exec(header)
  return match ? match[1] : null
}
