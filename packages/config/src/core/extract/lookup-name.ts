/**
 * Derives a variable name from a field key: word boundaries become `_` and
 * everything is uppercased.
 *
 * @example
 * ```ts
 * toEnvName("databaseUrl")  // "DATABASE_URL"
 * toEnvName("database_url") // "DATABASE_URL"
 * toEnvName("HTTPServer")   // "HTTP_SERVER"
 * ```
 */
export function toEnvName(key: string): string {
  return key
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/[\s.-]+/g, "_")
    .toUpperCase()
}

export function lookupNameOf(prefix: string, key: string, name: string | undefined): string {
  return prefix + (name ?? toEnvName(key))
}
