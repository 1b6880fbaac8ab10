/**
 * ApiClient - request/response exchanges with global status broadcasting
 *
 * Every completed exchange is classified once: its log entry is published on
 * `logs()`, a notification (401/403/429/503/5xx) on `events()`, and the
 * outcome goes back to the caller. An HTTP failure thus reaches both the
 * caller and app-wide observers (sign-out on Unauthorized, rate-limit banner).
 *
 * Transport failures and timeouts surface as NetworkError with no log entry.
 * Nothing is retried here.
 *
 * @example
 * ```ts
 * const client = new ApiClient({ baseUrl: "https://api.test", auth: tokenStore })
 *
 * // Anywhere else in the app
 * for await (const event of client.events()) {
 *   if (event._tag === "Unauthorized") signOut()
 * }
 *
 * const user = await client.request({ path: "/me" }, User)
 * ```
 */
import { Duration, Effect, Option, Schema } from "effect"
import * as SchemaAST from "effect/SchemaAST"
import {
	ConfigService,
	resolveConfig,
	type ApiClientConfig,
	type ResolvedConfig,
} from "../config/config.js"
import { DecodingError, NetworkError, type ApiError } from "../errors.js"
import { MulticastSource, type SubscribeOptions } from "../multicast/multicast-source.js"
import { runOrThrow, runSyncOrThrow } from "../runtime/run.js"
import { SSEClient, type ConnectOptions } from "../sse/sse-client.js"
import { classifyExchange, type Classification } from "./classify.js"
import {
	buildUrl,
	encodeBody,
	methodOf,
	toRequestBody,
	type Endpoint,
	type StreamingEndpoint,
} from "./endpoint.js"
import type { HttpEvent } from "./http-event.js"
import { HttpLog } from "./http-log.js"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * Name used for a schema in DecodingError log entries: its identifier
 * annotation when present, otherwise the schema's printed form
 */
export function describeSchema<A, I>(schema: Schema.Schema<A, I>): string {
	return SchemaAST.getIdentifierAnnotation(schema.ast).pipe(
		Option.getOrElse(() => String(schema.ast)),
	)
}

/**
 * Headers for a JSON exchange, in override order:
 * JSON defaults → config defaults → auth → endpoint headers
 */
export function buildRequestHeaders(
	config: ResolvedConfig,
	endpoint: Endpoint,
	token: string | undefined,
): Headers {
	const headers = new Headers({
		"Content-Type": "application/json",
		Accept: "application/json",
	})
	for (const [key, value] of Object.entries(config.defaultHeaders)) {
		headers.set(key, value)
	}
	if (token !== undefined) {
		headers.set("Authorization", `Bearer ${token}`)
	}
	for (const [key, value] of Object.entries(endpoint.headers ?? {})) {
		headers.set(key, value)
	}
	return headers
}

export class ApiClient {
	readonly config: ResolvedConfig
	private readonly eventSource = new MulticastSource<HttpEvent>()
	private readonly logSource = new MulticastSource<HttpLog>()
	private readonly sse: SSEClient

	constructor(config: ApiClientConfig) {
		this.config = runSyncOrThrow(resolveConfig(config).pipe(Effect.provide(ConfigService.Default)))
		this.sse = new SSEClient(this.config)
	}

	/** Fresh subscription to notification events (401/403/429/503/5xx) */
	events(options?: SubscribeOptions): AsyncIterableIterator<HttpEvent> {
		return this.eventSource.subscribe(options)
	}

	/** Fresh subscription to log entries, one per exchange plus decode failures */
	logs(options?: SubscribeOptions): AsyncIterableIterator<HttpLog> {
		return this.logSource.subscribe(options)
	}

	/**
	 * Perform one exchange and classify it
	 *
	 * @returns Effect yielding the raw body on 2xx
	 */
	execute(endpoint: Endpoint): Effect.Effect<Uint8Array, ApiError> {
		const { config } = this
		const report = (classification: Classification) => this.report(classification)

		return Effect.gen(function* () {
			const url = yield* buildUrl(config.baseUrl, endpoint.path, endpoint.query)
			const token = yield* Effect.tryPromise({
				try: () => config.auth?.getToken() ?? Promise.resolve(undefined),
				catch: (cause) => new NetworkError({ cause }),
			})

			const init: RequestInit = {
				method: methodOf(endpoint),
				headers: buildRequestHeaders(config, endpoint, token),
			}
			if (endpoint.body !== undefined) init.body = toRequestBody(endpoint.body)

			const { response, body } = yield* Effect.gen(function* () {
				const response = yield* Effect.tryPromise({
					try: (signal) => config.fetch(url, { ...init, signal }),
					catch: (cause) => new NetworkError({ cause }),
				})
				const buffer = yield* Effect.tryPromise({
					try: () => response.arrayBuffer(),
					catch: (cause) => new NetworkError({ cause }),
				})
				return { response, body: new Uint8Array(buffer) }
			}).pipe(
				Effect.timeoutFail({
					duration: Duration.millis(config.timeoutMs),
					onTimeout: () =>
						new NetworkError({ cause: new Error(`Request timed out after ${config.timeoutMs}ms`) }),
				}),
			)

			const classification = classifyExchange({
				endpoint,
				statusCode: response.status,
				headers: response.headers,
				body,
			})
			report(classification)
			return yield* classification.result
		})
	}

	/**
	 * Perform one exchange and decode the JSON body through a schema
	 */
	decode<A, I>(endpoint: Endpoint, schema: Schema.Schema<A, I>): Effect.Effect<A, ApiError> {
		return this.execute(endpoint).pipe(
			Effect.flatMap((body) =>
				Schema.decodeUnknown(Schema.parseJson(schema))(decoder.decode(body)).pipe(
					Effect.mapError((error) => new DecodingError({ cause: error, message: error.message })),
					Effect.tapError((error) =>
						Effect.sync(() =>
							this.reportLog(
								HttpLog.DecodingError({
									endpoint,
									error: error.message,
									body,
									targetType: describeSchema(schema),
								}),
							),
						),
					),
				),
			),
		)
	}

	/** Promise form of `decode` */
	request<A, I>(endpoint: Endpoint, schema: Schema.Schema<A, I>): Promise<A> {
		return runOrThrow(this.decode(endpoint, schema))
	}

	/** Perform an exchange whose response body is not needed */
	async send(endpoint: Endpoint): Promise<void> {
		await runOrThrow(this.execute(endpoint))
	}

	/**
	 * Typed SSE stream; frames that fail to decode are skipped and logged as
	 * DecodingError entries on `logs()`
	 */
	stream<A, I>(
		contract: StreamingEndpoint<A, I>,
		options: ConnectOptions = {},
	): AsyncGenerator<A, void, undefined> {
		return this.sse.execute(contract, {
			...options,
			onDecodeError: (error, frame) =>
				this.reportLog(
					HttpLog.DecodingError({
						endpoint: contract,
						error: error.message,
						body: encoder.encode(frame.data ?? ""),
						targetType: describeSchema(contract.event),
					}),
				),
		})
	}

	/** JSON-encode a value for use as an Endpoint body */
	encode(value: unknown): Uint8Array {
		return encodeBody(value)
	}

	/** End every events()/logs() subscription */
	close(): void {
		this.eventSource.close()
		this.logSource.close()
	}

	private report(classification: Classification): void {
		this.reportLog(classification.log)
		if (classification.event) {
			this.eventSource.publish(classification.event)
		}
	}

	private reportLog(entry: HttpLog): void {
		this.logSource.publish(entry)
		this.config.logger.log(entry)
	}
}
