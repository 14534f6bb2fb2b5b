import type { CacheKey } from "@rawcache/store"

export const DEFAULT_REF = "main"

/**
 * One cacheable file. Two keys are the same file only if all four fields
 * are equal, compared case-sensitively.
 */
export type FileKey = {
  owner: string
  repository: string
  path: string
  ref: string
}

export type FileKeyInput = Omit<FileKey, "ref"> & { ref?: string }

export function fileKey(input: FileKeyInput): FileKey {
  return {
    owner: input.owner,
    repository: input.repository,
    path: input.path,
    ref: input.ref ?? DEFAULT_REF,
  }
}

/**
 * Storage key in the form `owner:repository@ref:path`.
 *
 * Owner, repository and ref are percent-encoded so none of them can contain
 * a separator; the path takes whatever follows the last one.
 */
export function toStorageKey(file: FileKey): CacheKey {
  const owner = encodeURIComponent(file.owner)
  const repository = encodeURIComponent(file.repository)
  const ref = encodeURIComponent(file.ref)

  return `${owner}:${repository}@${ref}:${file.path}`
}

/** `owner/repository/path@ref`, for messages. */
export function describeFile(file: FileKey): string {
  return `${file.owner}/${file.repository}/${file.path}@${file.ref}`
}
