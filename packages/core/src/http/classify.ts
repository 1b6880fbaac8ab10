/**
 * HTTP exchange classification
 *
 * Maps a completed exchange to the log entry that is always broadcast, the
 * notification event broadcast for a handful of status codes, and the
 * success/error outcome handed back to the caller.
 *
 * Dispatch order (first match wins):
 *
 * | code          | log       | event              | result              |
 * |---------------|-----------|--------------------|---------------------|
 * | 200–299       | Success   | -                  | Right(body)         |
 * | 401           | HTTPError | Unauthorized       | UnauthorizedError   |
 * | 403           | HTTPError | Forbidden          | UnauthorizedError   |
 * | 404           | HTTPError | -                  | HTTPError           |
 * | 429           | HTTPError | RateLimited        | HTTPError           |
 * | 503           | HTTPError | ServiceUnavailable | HTTPError           |
 * | 500–599       | HTTPError | ServerError        | HTTPError           |
 * | anything else | HTTPError | -                  | HTTPError           |
 */
import { Either } from "effect"
import { HTTPError, UnauthorizedError, type ApiError } from "../errors.js"
import type { Endpoint } from "./endpoint.js"
import { HttpEvent } from "./http-event.js"
import { HttpLog } from "./http-log.js"
import { parseRetryAfter } from "./retry-after.js"

/** The subset of `Headers` the classifier reads */
export interface HeaderLookup {
	get(name: string): string | null
}

export interface Exchange {
	readonly endpoint: Endpoint
	readonly statusCode: number
	readonly headers: HeaderLookup
	readonly body: Uint8Array
}

export interface Classification {
	readonly log: HttpLog
	readonly event: HttpEvent | undefined
	readonly result: Either.Either<Uint8Array, ApiError>
}

export function isSuccessStatus(statusCode: number): boolean {
	return statusCode >= 200 && statusCode <= 299
}

function notificationFor(exchange: Exchange, now: number): HttpEvent | undefined {
	const { endpoint, statusCode, body } = exchange

	if (statusCode === 401) return HttpEvent.Unauthorized({ endpoint, body })
	if (statusCode === 403) return HttpEvent.Forbidden({ endpoint, body })
	if (statusCode === 429) {
		const retryAfter = parseRetryAfter(exchange.headers.get("retry-after"), now)
		return HttpEvent.RateLimited({ endpoint, retryAfter, body })
	}
	if (statusCode === 503) return HttpEvent.ServiceUnavailable({ endpoint, body })
	if (statusCode >= 500 && statusCode <= 599) {
		return HttpEvent.ServerError({ endpoint, statusCode, body })
	}
	return undefined
}

/**
 * Classify one completed exchange
 *
 * @param now - Epoch ms used to resolve an HTTP-date Retry-After
 */
export function classifyExchange(exchange: Exchange, now: number = Date.now()): Classification {
	const { endpoint, statusCode, body } = exchange

	if (isSuccessStatus(statusCode)) {
		return {
			log: HttpLog.Success({ endpoint, statusCode, body }),
			event: undefined,
			result: Either.right(body),
		}
	}

	const result: Either.Either<Uint8Array, ApiError> =
		statusCode === 401 || statusCode === 403
			? Either.left(new UnauthorizedError({ statusCode }))
			: Either.left(new HTTPError({ statusCode, body }))

	return {
		log: HttpLog.HTTPError({ endpoint, statusCode, body }),
		event: notificationFor(exchange, now),
		result,
	}
}
