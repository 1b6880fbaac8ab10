/**
 * Retry-After header parsing (RFC 9110 §10.2.3)
 *
 * Accepts delta-seconds ("120") or an HTTP-date. A date in the past yields
 * undefined rather than a negative duration.
 */

const DELTA_SECONDS = /^\d+$/

/**
 * @param value - Raw header value (null/undefined when absent)
 * @param now - Current time in epoch ms, injectable for tests
 * @returns Seconds to wait, or undefined
 *
 * @example
 * parseRetryAfter("120") // 120
 * parseRetryAfter("Wed, 21 Oct 2015 07:28:00 GMT", Date.parse("Wed, 21 Oct 2015 07:27:00 GMT")) // 60
 */
export function parseRetryAfter(
	value: string | null | undefined,
	now: number = Date.now(),
): number | undefined {
	if (value == null) return undefined

	const trimmed = value.trim()
	if (trimmed === "") return undefined

	if (DELTA_SECONDS.test(trimmed)) {
		return Number.parseInt(trimmed, 10)
	}

	const date = Date.parse(trimmed)
	if (Number.isNaN(date)) return undefined

	const seconds = (date - now) / 1000
	return seconds < 0 ? undefined : seconds
}
