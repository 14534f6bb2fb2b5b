import type { Application } from "@rawcache/server"
import { text } from "../../../../tests/file-fixtures"
import { createTestHarness, type TestHarness } from "../../../../tests/test-harness"

type ErrorBody = {
  error: { status: number; code: string; message: string }
}

const readme = { owner: "acme", repository: "widgets", path: "README.md", ref: "main" }

describe("Files API", () => {
  let harness: TestHarness
  let app: Application

  beforeEach(async () => {
    harness = await createTestHarness()
    await harness.start()
    app = harness.app
  })

  afterEach(async () => {
    await harness.stop()
  })

  const getFile = (path: string): Promise<Response> => Promise.resolve(app.request(path))

  describe("GET /gh/:owner/:repo/*path", () => {
    it("serves a file from origin, then from cache", async () => {
      harness.origin.put(readme, {
        content: text("# widgets"),
        etag: '"abcdef0123456789abcdef"',
      })

      const first = await getFile("/gh/acme/widgets/README.md")

      expect(first.status).toBe(200)
      expect(await first.text()).toBe("# widgets")
      expect(first.headers.get("x-cache-status")).toBe("MISS")
      expect(first.headers.get("content-type")).toBe("text/markdown")
      expect(first.headers.get("cache-control")).toBe("public, max-age=3600, must-revalidate")
      expect(first.headers.get("etag")).toBe('"abcdef0123456789"')

      const second = await getFile("/gh/acme/widgets/README.md")

      expect(second.status).toBe(200)
      expect(await second.text()).toBe("# widgets")
      expect(second.headers.get("x-cache-status")).toBe("HIT")
      expect(second.headers.get("etag")).toBe('"abcdef0123456789"')
      expect(harness.origin.calls.fetchInfo).toBe(1)
    })

    it("serves nested paths at the requested ref", async () => {
      harness.origin.put(
        { owner: "acme", repository: "widgets", path: "dist/app.js", ref: "v1.2.0" },
        { content: text("console.log(1)") },
      )

      const res = await getFile("/gh/acme/widgets/dist/app.js?ref=v1.2.0")

      expect(res.status).toBe(200)
      expect(await res.text()).toBe("console.log(1)")
      expect(res.headers.get("content-type")).toBe("application/javascript")
    })

    it("does not serve another ref's cached content", async () => {
      harness.origin.put(readme, { content: text("main") })

      await getFile("/gh/acme/widgets/README.md?ref=main")
      const res = await getFile("/gh/acme/widgets/README.md?ref=develop")

      expect(res.status).toBe(404)
    })

    it("refetches from origin when refresh=true", async () => {
      harness.origin.put(readme, { content: text("v1") })
      await getFile("/gh/acme/widgets/README.md")

      harness.origin.put(readme, { content: text("v2") })

      const cached = await getFile("/gh/acme/widgets/README.md")
      expect(await cached.text()).toBe("v1")

      const refreshed = await getFile("/gh/acme/widgets/README.md?refresh=true")

      expect(refreshed.status).toBe(200)
      expect(await refreshed.text()).toBe("v2")
      expect(refreshed.headers.get("x-cache-status")).toBe("MISS")
    })

    it("returns 404 with the file coordinates when origin has no such file", async () => {
      const res = await getFile("/gh/acme/widgets/missing.txt?ref=dev")
      const body = (await res.json()) as ErrorBody

      expect(res.status).toBe(404)
      expect(body.error.code).toBe("file_not_found")
      expect(body.error.message).toBe("File not found: acme/widgets/missing.txt@dev")
    })

    it("returns 400 when the path names no file", async () => {
      const res = await getFile("/gh/acme")
      const body = (await res.json()) as ErrorBody

      expect(res.status).toBe(400)
      expect(body.error.code).toBe("invalid_file_path")
      expect(body.error.message).toBe(
        "Invalid API path format. Correct template: /gh/{owner}/{repo}/{path}?ref={branch}",
      )
    })

    it("returns 400 for an unparseable refresh flag", async () => {
      const res = await getFile("/gh/acme/widgets/README.md?refresh=maybe")
      const body = (await res.json()) as ErrorBody

      expect(res.status).toBe(400)
      expect(body.error.code).toBe("invalid_file_query")
    })

    it("returns 400 for an empty ref", async () => {
      const res = await getFile("/gh/acme/widgets/README.md?ref=")
      const body = (await res.json()) as ErrorBody

      expect(res.status).toBe(400)
      expect(body.error.code).toBe("invalid_file_query")
      expect(harness.origin.calls.fetchInfo).toBe(0)
    })
  })

  describe("with a repository whitelist", () => {
    beforeEach(async () => {
      harness = await createTestHarness({ env: { REPOSITORIES: "acme/widgets" } })
      app = harness.app
    })

    it("serves whitelisted repositories", async () => {
      harness.origin.put(readme, { content: text("# widgets") })

      const res = await getFile("/gh/acme/widgets/README.md")

      expect(res.status).toBe(200)
    })

    it("returns 403 for other repositories without contacting origin", async () => {
      const res = await getFile("/gh/other/tools/README.md")
      const body = (await res.json()) as ErrorBody

      expect(res.status).toBe(403)
      expect(body.error.code).toBe("repository_not_allowed")
      expect(body.error.message).toBe("Repository other/tools is not whitelisted")
      expect(harness.origin.calls.fetchInfo).toBe(0)
    })
  })

  it("answers health checks", async () => {
    const res = await getFile("/health")

    expect(res.status).toBe(200)
  })
})
