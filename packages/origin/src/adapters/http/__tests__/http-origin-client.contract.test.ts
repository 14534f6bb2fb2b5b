import { NullLogger } from "@rawcache/logger"
import { MockAgent } from "undici"
import { buildOriginPath } from "../../../core/normalize"
import { describeOriginClientContract } from "../../../ports/__tests__/origin-client.contract"
import { HttpOriginClient } from "../http-origin-client"

const baseUrl = "https://raw.example.test"

let agent: MockAgent | undefined

describeOriginClientContract({
  name: "HttpOriginClient",
  make: (fixtures) => {
    agent = new MockAgent()
    agent.disableNetConnect()
    const pool = agent.get(baseUrl)

    for (const { file, entry } of fixtures) {
      pool
        .intercept({ path: buildOriginPath(file), method: "GET" })
        .reply(200, Buffer.from(entry.content), {
          headers: {
            ...(entry.contentType !== undefined && { "content-type": entry.contentType }),
            ...(entry.etag !== undefined && { etag: entry.etag }),
          },
        })
        .persist()
    }

    pool
      .intercept({ path: () => true, method: "GET" })
      .reply(404, "404: Not Found")
      .persist()

    return new HttpOriginClient(
      { logger: new NullLogger(), dispatcher: agent },
      { baseUrl, timeoutMs: 5000 },
    )
  },
  cleanup: async () => {
    await agent?.close()
    agent = undefined
  },
})
