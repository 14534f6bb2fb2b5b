/**
 * Address of one file at the origin. Fields are passed through verbatim;
 * normalization happens when the origin URL is built.
 */
export type OriginFileRef = {
  owner: string
  repository: string
  path: string
  ref: string
}

export type OriginFileInfo = {
  fingerprint: string
  contentType: string
  size: number
  /** Absolute URL accepted by `OriginClient.download()`. */
  downloadUrl: string
  /**
   * Body already transferred while probing the file, if any. Lets callers
   * skip a second round trip to `downloadUrl`.
   */
  content?: Uint8Array
}
