import mime from "mime-types"

const genericTextType = "text/plain"
const binaryFallback = "application/octet-stream"

const fallbackTypes: ReadonlyArray<readonly [extensions: readonly string[], type: string]> = [
  [[".js", ".mjs"], "application/javascript"],
  [[".css"], "text/css"],
  [[".json"], "application/json"],
  [[".html", ".htm"], "text/html"],
  [[".svg"], "image/svg+xml"],
  [[".txt"], "text/plain"],
  [[".md", ".markdown"], "text/markdown"],
]

export function fallbackContentType(path: string): string | undefined {
  const lower = path.toLowerCase()

  for (const [extensions, type] of fallbackTypes) {
    if (extensions.some((ext) => lower.endsWith(ext))) return type
  }

  return undefined
}

/**
 * Picks the content type of a file.
 *
 * Origins tend to label everything `text/plain`, so that header value is
 * ignored in favor of the extension.
 *
 * 1. Origin header, parameters stripped, unless it is `text/plain`.
 * 2. Extension lookup in the standard MIME table.
 * 3. Built-in table of common web asset extensions.
 * 4. `application/octet-stream`.
 */
export function detectContentType(path: string, originHeader: string | undefined): string {
  const fromHeader = originHeader?.split(";")[0]?.trim().toLowerCase()

  if (fromHeader && fromHeader !== genericTextType) return fromHeader

  const fromExtension = mime.lookup(path)
  if (fromExtension) return fromExtension

  return fallbackContentType(path) ?? binaryFallback
}
