import { BaseError } from "@rawcache/errors"
import { describeFile, type FileKey } from "./file-key"

export type PermissionErrorCode = "repository_not_allowed"

/** The repository is not on the allow list. Raised before any cache or origin I/O. */
export class PermissionError extends BaseError<PermissionErrorCode> {
  static notAllowed(owner: string, repository: string): PermissionError {
    return new PermissionError(`Repository ${owner}/${repository} is not whitelisted`, {
      code: "repository_not_allowed",
      context: { owner, repository },
    })
  }
}

export type NotFoundErrorCode = "file_not_found"

/** The origin confirmed the file does not exist. Never cached. */
export class NotFoundError extends BaseError<NotFoundErrorCode> {
  static forFile(file: FileKey): NotFoundError {
    return new NotFoundError(`File not found: ${describeFile(file)}`, {
      code: "file_not_found",
      context: { ...file },
    })
  }
}

export type FileRequestErrorCode = "invalid_file_path" | "invalid_file_query"

export const FILE_ROUTE_TEMPLATE = "/gh/{owner}/{repo}/{path}?ref={branch}"

export class FileRequestError extends BaseError<FileRequestErrorCode> {
  static invalidPath(path: string): FileRequestError {
    return new FileRequestError(
      `Invalid API path format. Correct template: ${FILE_ROUTE_TEMPLATE}`,
      { code: "invalid_file_path", context: { path } },
    )
  }

  static invalidQuery(details: string): FileRequestError {
    return new FileRequestError(`Invalid query: ${details}`, {
      code: "invalid_file_query",
    })
  }
}
