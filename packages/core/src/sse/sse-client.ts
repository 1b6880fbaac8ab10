/**
 * SSEClient - one long-lived request, streamed line by line into frames
 *
 * connect() yields raw SSEFrames; execute() decodes each frame's data
 * through the streaming endpoint's schema and skips frames that fail.
 *
 * @example
 * ```ts
 * const sse = new SSEClient({ baseUrl: "https://api.test" })
 * for await (const event of sse.execute({ path: "/jobs/1/events", event: JobEvent })) {
 *   console.log(event.progress)
 * }
 * ```
 */
import { Effect, Either } from "effect"
import {
	ConfigService,
	isResolvedConfig,
	resolveConfig,
	type ApiClientConfig,
	type ResolvedConfig,
} from "../config/config.js"
import {
	InvalidResponseError,
	HTTPError,
	NetworkError,
	type ApiError,
	type DecodingError,
} from "../errors.js"
import { buildUrl, methodOf, toRequestBody, type Endpoint, type StreamingEndpoint } from "../http/endpoint.js"
import { runSyncOrThrow } from "../runtime/run.js"
import { SSEFrameParser } from "./frame-parser.js"
import { readLines } from "./line-reader.js"
import type { SSEFrame } from "./sse-frame.js"
import { decodeEvents, type DecodeEventsOptions } from "./typed-events.js"

export interface ConnectOptions {
	/** Aborting closes the connection and ends the stream without error */
	signal?: AbortSignal
	/** Sent as Last-Event-ID to resume a stream */
	lastEventId?: string
}

export interface ExecuteOptions extends ConnectOptions, DecodeEventsOptions {}

const emptyBody = new Uint8Array()

/**
 * Headers for the streaming request, in override order:
 * defaults → SSE headers → auth → endpoint headers
 */
export function buildStreamHeaders(
	config: ResolvedConfig,
	endpoint: Endpoint,
	token: string | undefined,
	options: ConnectOptions,
): Headers {
	const headers = new Headers(config.defaultHeaders)
	headers.set("Accept", "text/event-stream")
	headers.set("Cache-Control", "no-cache")
	if (endpoint.body !== undefined) {
		headers.set("Content-Type", "application/json")
	}
	if (options.lastEventId !== undefined) {
		headers.set("Last-Event-ID", options.lastEventId)
	}
	if (token !== undefined) {
		headers.set("Authorization", `Bearer ${token}`)
	}
	for (const [key, value] of Object.entries(endpoint.headers ?? {})) {
		headers.set(key, value)
	}
	return headers
}

function readBody(response: Response): Effect.Effect<Uint8Array> {
	return Effect.tryPromise(() => response.arrayBuffer()).pipe(
		Effect.map((buffer) => new Uint8Array(buffer)),
		Effect.orElseSucceed(() => emptyBody),
	)
}

export class SSEClient {
	readonly config: ResolvedConfig

	constructor(config: ApiClientConfig | ResolvedConfig) {
		this.config = isResolvedConfig(config)
			? config
			: runSyncOrThrow(resolveConfig(config).pipe(Effect.provide(ConfigService.Default)))
	}

	/**
	 * Open the stream: resolves once response headers arrive with a 2xx status
	 */
	open(endpoint: Endpoint, options: ConnectOptions = {}): Effect.Effect<Response, ApiError> {
		const { config } = this
		return Effect.gen(function* () {
			const url = yield* buildUrl(config.baseUrl, endpoint.path, endpoint.query)
			const token = yield* Effect.tryPromise({
				try: () => config.auth?.getToken() ?? Promise.resolve(undefined),
				catch: (cause) => new NetworkError({ cause }),
			})

			const init: RequestInit = {
				method: methodOf(endpoint),
				headers: buildStreamHeaders(config, endpoint, token, options),
			}
			if (endpoint.body !== undefined) init.body = toRequestBody(endpoint.body)
			if (options.signal) init.signal = options.signal

			config.logger.debug(`SSE connecting to ${url.href}`)
			const response = yield* Effect.tryPromise({
				try: () => config.fetch(url, init),
				catch: (cause) => new NetworkError({ cause }),
			})
			config.logger.debug(`SSE response status ${response.status}`)

			if (response.status < 200 || response.status > 299) {
				const body = yield* readBody(response)
				return yield* Effect.fail(new HTTPError({ statusCode: response.status, body }))
			}
			return response
		})
	}

	/**
	 * Stream raw frames in line-arrival order
	 *
	 * Throws HTTPError before any frame for a non-2xx status, NetworkError when
	 * the connection fails mid-stream.
	 */
	async *connect(endpoint: Endpoint, options: ConnectOptions = {}): AsyncGenerator<SSEFrame, void, undefined> {
		const { logger } = this.config
		const opened = await Effect.runPromise(Effect.either(this.open(endpoint, options)))
		if (Either.isLeft(opened)) {
			if (opened.left._tag === "NetworkError" && options.signal?.aborted) return
			throw opened.left
		}
		const response = opened.right
		if (!response.body) {
			throw new InvalidResponseError({ reason: "SSE response has no body" })
		}

		const parser = new SSEFrameParser()
		let lineCount = 0
		let frameCount = 0

		try {
			for await (const line of readLines(response.body)) {
				lineCount++
				logger.debug(`SSE line #${lineCount}: ${line.slice(0, 80)}`)
				const frame = parser.feed(line)
				if (frame) {
					frameCount++
					yield frame
				}
			}
		} catch (cause) {
			if (options.signal?.aborted) return
			throw new NetworkError({ cause })
		}

		const last = parser.flush()
		if (last) {
			frameCount++
			yield last
		}
		logger.debug(`SSE stream finished: ${lineCount} lines, ${frameCount} frames`)
	}

	/**
	 * Stream decoded events for a streaming endpoint
	 *
	 * Frames without data and frames whose data fails to decode are skipped.
	 */
	execute<A, I>(
		contract: StreamingEndpoint<A, I>,
		options: ExecuteOptions = {},
	): AsyncGenerator<A, void, undefined> {
		const { logger } = this.config
		const onDecodeError =
			options.onDecodeError ??
			((error: DecodingError) => {
				logger.warn(`Failed to decode event: ${error.message}`)
			})
		return decodeEvents(this.connect(contract, options), contract.event, { onDecodeError })
	}
}
