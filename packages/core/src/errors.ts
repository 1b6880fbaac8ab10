/**
 * Tagged errors for HTTP exchanges and SSE streams
 *
 * Every failure the client surfaces is one of these. Effect-returning APIs
 * carry them in the error channel; Promise/AsyncIterable APIs throw the same
 * instances, so callers can `switch` on `_tag` either way.
 */
import { Data } from "effect"

/** Connection/transport failure (DNS, reset, abort, timeout). Never retried here. */
export class NetworkError extends Data.TaggedError("NetworkError")<{
	cause: unknown
}> {}

export class InvalidURLError extends Data.TaggedError("InvalidURLError")<{
	url: string
}> {}

export class InvalidResponseError extends Data.TaggedError("InvalidResponseError")<{
	reason: string
}> {}

/** Remote rejected the request. Retry policy is up to the caller. */
export class HTTPError extends Data.TaggedError("HTTPError")<{
	statusCode: number
	body: Uint8Array
}> {}

/** 401 and 403 both collapse to this error; the broadcast event still tells them apart. */
export class UnauthorizedError extends Data.TaggedError("UnauthorizedError")<{
	statusCode: number
}> {}

export class DecodingError extends Data.TaggedError("DecodingError")<{
	cause: unknown
	message: string
}> {}

/** An SSE frame was asked for its payload but carried no `data` field */
export class NoDataError extends Data.TaggedError("NoDataError")<{}> {}

export type ApiError =
	| NetworkError
	| InvalidURLError
	| InvalidResponseError
	| HTTPError
	| UnauthorizedError
	| DecodingError

export type SSEError = ApiError | NoDataError

function causeMessage(cause: unknown): string {
	if (cause instanceof Error) return cause.message
	return String(cause)
}

/**
 * One-line, human-readable description of an error
 *
 * @example
 * ```ts
 * describeApiError(new HTTPError({ statusCode: 404, body: new Uint8Array() }))
 * // => "HTTP error: 404"
 * ```
 */
export function describeApiError(error: SSEError): string {
	switch (error._tag) {
		case "NetworkError":
			return `Network error: ${causeMessage(error.cause)}`
		case "InvalidURLError":
			return `Invalid URL: ${error.url}`
		case "InvalidResponseError":
			return `Invalid response from server: ${error.reason}`
		case "HTTPError":
			return `HTTP error: ${error.statusCode}`
		case "UnauthorizedError":
			return "Authentication required"
		case "DecodingError":
			return `Decoding error: ${error.message}`
		case "NoDataError":
			return "No data in event"
	}
}

/** True for any of the tagged errors above */
export function isApiError(value: unknown): value is SSEError {
	return (
		value instanceof NetworkError ||
		value instanceof InvalidURLError ||
		value instanceof InvalidResponseError ||
		value instanceof HTTPError ||
		value instanceof UnauthorizedError ||
		value instanceof DecodingError ||
		value instanceof NoDataError
	)
}
