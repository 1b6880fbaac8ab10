import { describe, it, expect, vi, type Mock } from "vitest"
import { Schema } from "effect"
import type { ApiClientConfig, FetchFn } from "../config/config.js"
import { HTTPError, InvalidResponseError, NetworkError } from "../errors.js"
import { SilentHttpLogger } from "../http/logger.js"
import { SSEClient } from "./sse-client.js"
import type { SSEFrame } from "./sse-frame.js"

const encoder = new TextEncoder()

function sseResponse(chunks: string[], init: ResponseInit = {}): Response {
	const body = new ReadableStream<Uint8Array>({
		start(controller) {
			for (const chunk of chunks) controller.enqueue(encoder.encode(chunk))
			controller.close()
		},
	})
	return new Response(body, {
		status: 200,
		headers: { "Content-Type": "text/event-stream" },
		...init,
	})
}

function clientWith(fetch: FetchFn, token?: string): SSEClient {
	const config: ApiClientConfig = {
		baseUrl: "https://api.test/v1",
		fetch,
		logger: new SilentHttpLogger(),
	}
	if (token !== undefined) {
		config.auth = { getToken: async () => token }
	}
	return new SSEClient(config)
}

async function collect<A>(iterable: AsyncIterable<A>): Promise<A[]> {
	const out: A[] = []
	for await (const value of iterable) out.push(value)
	return out
}

function requestOf(fetch: Mock<FetchFn>): { url: string; init: RequestInit } {
	const call = fetch.mock.calls[0]
	if (!call) throw new Error("fetch was not called")
	return { url: String(call[0]), init: call[1] ?? {} }
}

describe("SSEClient.connect", () => {
	it("yields frames in line-arrival order", async () => {
		const fetch = vi.fn<FetchFn>(async () =>
			sseResponse(["event: progress\n", 'data: {"p":0.1}\n', "event: progress\ndata: ", '{"p":0.5}\n']),
		)
		const frames = await collect(clientWith(fetch).connect({ path: "/jobs/1/events" }))

		expect(frames).toEqual<SSEFrame[]>([
			{ event: "progress", data: '{"p":0.1}' },
			{ event: "progress", data: '{"p":0.5}' },
		])
	})

	it("sends streaming headers, auth and Last-Event-ID", async () => {
		const fetch = vi.fn<FetchFn>(async () => sseResponse([]))
		const client = clientWith(fetch, "test-secret")

		await collect(client.connect({ path: "/events", headers: { "X-Trace": "abc" } }, { lastEventId: "41" }))

		const { url, init } = requestOf(fetch)
		const headers = new Headers(init.headers)
		expect(url).toBe("https://api.test/v1/events")
		expect(init.method).toBe("GET")
		expect(headers.get("Accept")).toBe("text/event-stream")
		expect(headers.get("Cache-Control")).toBe("no-cache")
		expect(headers.get("Authorization")).toBe("Bearer test-secret")
		expect(headers.get("Last-Event-ID")).toBe("41")
		expect(headers.get("X-Trace")).toBe("abc")
		expect(headers.get("Content-Type")).toBeNull()
	})

	it("sends a JSON body with a POST", async () => {
		const fetch = vi.fn<FetchFn>(async () => sseResponse([]))
		await collect(clientWith(fetch).connect({ path: "/chat", method: "POST", body: '{"q":"hi"}' }))

		const { init } = requestOf(fetch)
		expect(init.method).toBe("POST")
		expect(init.body).toBe('{"q":"hi"}')
		expect(new Headers(init.headers).get("Content-Type")).toBe("application/json")
	})

	it("throws HTTPError before any frame for a non-2xx status", async () => {
		const fetch = vi.fn<FetchFn>(async () => sseResponse(["data: never\n"], { status: 500 }))
		const received: SSEFrame[] = []

		const error = await (async () => {
			for await (const frame of clientWith(fetch).connect({ path: "/events" })) received.push(frame)
		})().then(
			() => undefined,
			(e: unknown) => e,
		)

		expect(received).toEqual([])
		expect(error).toBeInstanceOf(HTTPError)
		expect(error instanceof HTTPError && error.statusCode).toBe(500)
		expect(error instanceof HTTPError && new TextDecoder().decode(error.body)).toBe("data: never\n")
	})

	it("wraps a transport failure in NetworkError", async () => {
		const fetch = vi.fn<FetchFn>(async () => {
			throw new TypeError("fetch failed")
		})
		await expect(collect(clientWith(fetch).connect({ path: "/events" }))).rejects.toBeInstanceOf(NetworkError)
	})

	it("ends quietly when aborted before connecting", async () => {
		const controller = new AbortController()
		controller.abort()
		const fetch = vi.fn<FetchFn>(async (_input, init) => {
			init?.signal?.throwIfAborted()
			return sseResponse([])
		})

		const frames = await collect(clientWith(fetch).connect({ path: "/events" }, { signal: controller.signal }))
		expect(frames).toEqual([])
	})

	it("throws InvalidResponseError for a 2xx response without a body", async () => {
		const fetch = vi.fn<FetchFn>(async () => new Response(null, { status: 200 }))
		const error = await collect(clientWith(fetch).connect({ path: "/events" })).then(
			() => undefined,
			(e: unknown) => e,
		)

		expect(error).toBeInstanceOf(InvalidResponseError)
		expect(error instanceof InvalidResponseError && error.reason).toBe("SSE response has no body")
	})

	it("wraps a body read failure mid-stream in NetworkError", async () => {
		const fetch = vi.fn<FetchFn>(async () => {
			const body = new ReadableStream<Uint8Array>({
				start(controller) {
					controller.enqueue(encoder.encode("event: a\ndata: 1\nevent: b\n"))
				},
				pull(controller) {
					controller.error(new Error("connection reset"))
				},
			})
			return new Response(body, { status: 200 })
		})
		const received: SSEFrame[] = []

		const error = await (async () => {
			for await (const frame of clientWith(fetch).connect({ path: "/events" })) received.push(frame)
		})().then(
			() => undefined,
			(e: unknown) => e,
		)

		expect(received).toEqual([{ event: "a", data: "1" }])
		expect(error).toBeInstanceOf(NetworkError)
		expect(error instanceof NetworkError && error.cause).toEqual(new Error("connection reset"))
	})

	it("ends quietly when aborted mid-stream", async () => {
		const controller = new AbortController()
		const fetch = vi.fn<FetchFn>(async (_input, init) => {
			const body = new ReadableStream<Uint8Array>({
				start(stream) {
					stream.enqueue(encoder.encode("event: a\ndata: 1\nevent: b\n"))
					init?.signal?.addEventListener("abort", () => stream.error(controller.signal.reason))
				},
			})
			return new Response(body, { status: 200 })
		})
		const received: SSEFrame[] = []

		for await (const frame of clientWith(fetch).connect({ path: "/events" }, { signal: controller.signal })) {
			received.push(frame)
			controller.abort()
		}

		expect(received).toEqual([{ event: "a", data: "1" }])
	})

	it("flushes a final frame that had no closing line", async () => {
		const fetch = vi.fn<FetchFn>(async () => sseResponse(["id: 5\n", "data: tail"]))
		const frames = await collect(clientWith(fetch).connect({ path: "/events" }))
		expect(frames).toEqual([{ id: "5", data: "tail" }])
	})
})

describe("SSEClient.execute", () => {
	const Progress = Schema.Struct({ p: Schema.Number })

	it("decodes frames and skips those that fail", async () => {
		const fetch = vi.fn<FetchFn>(async () =>
			sseResponse(['event: progress\ndata: {"p":0.1}\n', "event: progress\ndata: oops\n", 'event: progress\ndata: {"p":1}\n']),
		)
		const onDecodeError = vi.fn()

		const events = await collect(
			clientWith(fetch).execute({ path: "/jobs/1/events", event: Progress }, { onDecodeError }),
		)

		expect(events).toEqual([{ p: 0.1 }, { p: 1 }])
		expect(onDecodeError).toHaveBeenCalledTimes(1)
		expect(onDecodeError.mock.calls[0]?.[1]).toEqual({ event: "progress", data: "oops" })
	})

	it("warns through the logger when no callback is given", async () => {
		const logger = new SilentHttpLogger()
		const warn = vi.spyOn(logger, "warn")
		const fetch = vi.fn<FetchFn>(async () => sseResponse(["data: oops\n"]))
		const client = new SSEClient({ baseUrl: "https://api.test", fetch, logger })

		const events = await collect(client.execute({ path: "/events", event: Progress }))

		expect(events).toEqual([])
		expect(warn).toHaveBeenCalledTimes(1)
		expect(warn.mock.calls[0]?.[0]).toMatch(/^Failed to decode event: /)
	})
})
