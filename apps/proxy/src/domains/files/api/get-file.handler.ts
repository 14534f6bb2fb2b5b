import type { Context } from "@rawcache/server"
import { z } from "zod"
import type { FileServices } from "../composition"
import { fileKey } from "../model/file-key"
import { FileRequestError } from "../model/files.errors"
import { fileParamsSchema, fileQuerySchema } from "./files.api.schema"

export const FILE_CACHE_CONTROL = "public, max-age=3600, must-revalidate"

/** Length of the fingerprint prefix sent as the ETag. */
const ETAG_LENGTH = 16

export type FileHandler = (c: Context) => Promise<Response>

export function getFileHandler(deps: FileServices): FileHandler {
  return async (c) => {
    const params = fileParamsSchema.safeParse(c.req.param())
    if (!params.success) throw FileRequestError.invalidPath(c.req.path)

    const query = fileQuerySchema.safeParse(c.req.query())
    if (!query.success) throw FileRequestError.invalidQuery(z.prettifyError(query.error))

    const file = fileKey({
      owner: params.data.owner,
      repository: params.data.repo,
      path: params.data.path,
      ref: query.data.ref,
    })

    if (query.data.refresh) await deps.orchestrator.invalidate(file)

    const resolved = await deps.orchestrator.resolve(file, { signal: c.req.raw.signal })
    const metadata = await deps.orchestrator.getMetadata(file)

    const headers = new Headers({
      "Content-Type": resolved.contentType,
      "Cache-Control": FILE_CACHE_CONTROL,
      "X-Cache-Status": resolved.cacheStatus === "hit" ? "HIT" : "MISS",
    })

    if (metadata) headers.set("ETag", `"${metadata.fingerprint.slice(0, ETAG_LENGTH)}"`)

    return new Response(resolved.content, { status: 200, headers })
  }
}

/** Answers `/gh` paths that do not name an owner, a repository and a file. */
export function invalidPathHandler(): FileHandler {
  return async (c) => {
    throw FileRequestError.invalidPath(c.req.path)
  }
}
