import { z } from "zod"
import { DEFAULT_REF } from "../model/file-key"

export const FILE_ROUTE = "/gh/:owner/:repo/:path{.+}"

export const fileParamsSchema = z.object({
  owner: z.string().min(1),
  repo: z.string().min(1),
  path: z.string().min(1),
})

export const fileQuerySchema = z.object({
  ref: z.string().trim().min(1).default(DEFAULT_REF),
  refresh: z.stringbool().default(false),
})

export type FileParams = z.infer<typeof fileParamsSchema>
export type FileQuery = z.infer<typeof fileQuerySchema>
