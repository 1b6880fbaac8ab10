/**
 * HTTP log entries
 *
 * One entry is broadcast per completed exchange (Success or HTTPError), plus
 * a DecodingError entry whenever a typed decode of a response or SSE frame
 * fails downstream.
 */
import { Data, Either } from "effect"
import { describeEndpoint, type Endpoint } from "./endpoint.js"

export type HttpLog = Data.TaggedEnum<{
	Success: {
		readonly endpoint: Endpoint
		readonly statusCode: number
		readonly body: Uint8Array
	}
	HTTPError: {
		readonly endpoint: Endpoint
		readonly statusCode: number
		readonly body: Uint8Array
	}
	DecodingError: {
		readonly endpoint: Endpoint
		readonly error: string
		readonly body: Uint8Array
		readonly targetType: string
	}
}>

export const HttpLog = Data.taggedEnum<HttpLog>()

/** Success bodies at or above this size are summarized instead of printed */
export const MAX_DISPLAY_BYTES = 10_000

const utf8 = new TextDecoder("utf-8", { fatal: true })

/**
 * Pretty-print a body as JSON, falling back to raw text, then to its size
 */
export function formatBody(body: Uint8Array): string {
	const text = Either.try(() => utf8.decode(body))
	if (Either.isLeft(text)) {
		return `Unable to convert data to string. Data size: ${body.byteLength} bytes`
	}

	const parsed = Either.try((): unknown => JSON.parse(text.right))
	if (Either.isRight(parsed)) {
		return JSON.stringify(parsed.right, null, 2)
	}
	return `Raw data: ${text.right}`
}

/**
 * Render a log entry as the multi-line banner printed by ConsoleHttpLogger
 *
 * @example
 * ```ts
 * formatHttpLog(HttpLog.HTTPError({ endpoint: { path: "/x" }, statusCode: 404, body }))
 * // ========== HTTP ERROR ==========
 * // Endpoint: GET /x
 * // Status Code: 404
 * // Error Response:
 * // ...
 * // ========== END HTTP ERROR ==========
 * ```
 */
export function formatHttpLog(entry: HttpLog): string {
	const endpoint = `Endpoint: ${describeEndpoint(entry.endpoint)}`

	switch (entry._tag) {
		case "Success": {
			const data =
				entry.body.byteLength < MAX_DISPLAY_BYTES
					? `Response Data:\n${formatBody(entry.body)}`
					: `Response Data: ${entry.body.byteLength} bytes (too large to display)`
			return [
				"========== API REQUEST SUCCESS ==========",
				endpoint,
				`Status Code: ${entry.statusCode}`,
				data,
				"========== END REQUEST SUCCESS ==========",
			].join("\n")
		}
		case "HTTPError":
			return [
				"========== HTTP ERROR ==========",
				endpoint,
				`Status Code: ${entry.statusCode}`,
				"Error Response:",
				formatBody(entry.body),
				"========== END HTTP ERROR ==========",
			].join("\n")
		case "DecodingError":
			return [
				"========== DECODE ERROR ==========",
				endpoint,
				`Target Type: ${entry.targetType}`,
				`Error: ${entry.error}`,
				"Response Data:",
				formatBody(entry.body),
				"========== END DECODE ERROR ==========",
			].join("\n")
	}
}
