import type { ApiModule } from "../../../app/routes"
import type { FileServices } from "../composition"
import { FILE_ROUTE } from "./files.api.schema"
import { getFileHandler, invalidPathHandler } from "./get-file.handler"

type FilesModuleDeps = {
  files: FileServices
}

export function createFilesModule(deps: FilesModuleDeps): ApiModule {
  return {
    name: "files",
    register: (app) => {
      app.get(FILE_ROUTE, getFileHandler(deps.files))

      // Registered after the file route, so they only see what it did not match.
      app.get("/gh", invalidPathHandler())
      app.get("/gh/*", invalidPathHandler())
    },
  }
}
