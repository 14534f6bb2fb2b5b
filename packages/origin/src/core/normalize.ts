import type { OriginFileRef } from "../ports/origin-file"

const refNamespaces = ["refs/heads/", "refs/tags/"] as const

/** `refs/heads/main` and `refs/tags/v1` become `main` and `v1`. */
export function normalizeRef(ref: string): string {
  for (const prefix of refNamespaces) {
    if (ref.startsWith(prefix)) return ref.slice(prefix.length)
  }
  return ref
}

export function normalizePath(path: string): string {
  return path.replace(/^\/+/, "")
}

/** Origin-relative path of a file, always starting with `/`. */
export function buildOriginPath(file: OriginFileRef): string {
  return `/${file.owner}/${file.repository}/${normalizeRef(file.ref)}/${normalizePath(file.path)}`
}

export function buildOriginUrl(baseUrl: string, file: OriginFileRef): string {
  return `${baseUrl.replace(/\/+$/, "")}${buildOriginPath(file)}`
}
