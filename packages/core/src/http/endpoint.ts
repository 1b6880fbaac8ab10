/**
 * Request descriptors
 *
 * An Endpoint is the opaque "what was asked" value that travels with every
 * log entry and broadcast event. Streaming endpoints additionally name the
 * schema their SSE payloads decode into.
 */
import { Effect } from "effect"
import type * as Schema from "effect/Schema"
import { InvalidURLError } from "../errors.js"

const SCHEME = /^[a-z][a-z0-9+.-]*:/i

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE"

export interface Endpoint {
	/** Path appended to the client's base URL, e.g. "/users/42" */
	readonly path: string
	/** Defaults to GET */
	readonly method?: HttpMethod
	/** Per-request headers, applied last (override defaults and auth) */
	readonly headers?: Readonly<Record<string, string>>
	readonly body?: Uint8Array | string
	readonly query?: Readonly<Record<string, string>>
}

export interface StreamingEndpoint<A, I = A> extends Endpoint {
	/** Schema each SSE `data` payload (JSON) decodes through */
	readonly event: Schema.Schema<A, I>
}

export function methodOf(endpoint: Endpoint): HttpMethod {
	return endpoint.method ?? "GET"
}

/**
 * "METHOD /path", as printed in log output
 */
export function describeEndpoint(endpoint: Endpoint): string {
	return `${methodOf(endpoint)} ${endpoint.path}`
}

/**
 * Join base URL and endpoint path with exactly one slash, then apply query params
 *
 * @example
 * ```ts
 * Effect.runSync(buildUrl(new URL("https://api.test/v1/"), "/users", { page: "2" })).href
 * // => "https://api.test/v1/users?page=2"
 * ```
 */
export function buildUrl(
	baseUrl: URL,
	path: string,
	query?: Readonly<Record<string, string>>,
): Effect.Effect<URL, InvalidURLError> {
	return Effect.try({
		try: () => {
			if (SCHEME.test(path) || /[\s?#]/.test(path)) {
				throw new Error(`Path must be a bare path: ${path}`)
			}
			const url = new URL(baseUrl.href)
			const basePath = url.pathname.replace(/\/+$/, "")
			const relative = path.replace(/^\/+/, "")
			url.pathname = relative === "" ? basePath || "/" : `${basePath}/${relative}`
			if (query) {
				for (const [key, value] of Object.entries(query)) {
					url.searchParams.set(key, value)
				}
			}
			return url
		},
		catch: () => new InvalidURLError({ url: `${baseUrl.href}${path}` }),
	})
}

const encoder = new TextEncoder()

/** JSON-encode a request body */
export function encodeBody(value: unknown): Uint8Array {
	return encoder.encode(JSON.stringify(value))
}

/** Copy into a fresh ArrayBuffer-backed view so fetch accepts it as BufferSource */
export function toRequestBody(body: Uint8Array | string): BodyInit {
	return typeof body === "string" ? body : new Uint8Array(body)
}
