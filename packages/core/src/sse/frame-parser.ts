/**
 * SSE Frame Parser
 *
 * Incremental, line-at-a-time parser for the Server-Sent Events wire format.
 *
 * Frame boundaries are NOT taken from blank lines. Line readers commonly drop
 * empty lines, so a frame is considered complete when a new `event:` arrives
 * after data, or a new `data:` arrives after both event and data are set.
 * Servers that rely on blank lines to separate two consecutive data-only
 * events will see them merged into one multi-line data payload.
 *
 * Per line:
 * - `:comment` is ignored
 * - `field:value` / `field: value` (one leading space stripped, only the
 *   first colon splits, so `data: 12:30:45` keeps its colons)
 * - a line without a colon is a field with an empty value
 * - unknown fields (including the empty line) are ignored
 *
 * @example
 * ```ts
 * const parser = new SSEFrameParser()
 * parser.feed("event: progress")  // undefined
 * parser.feed('data: {"p":0.1}') // undefined
 * parser.feed("event: progress")  // { event: "progress", data: '{"p":0.1}' }
 * parser.feed('data: {"p":0.5}') // undefined
 * parser.flush()                  // { event: "progress", data: '{"p":0.5}' }
 * ```
 */
import { isEmptyFrame, makeFrame, type SSEFrame } from "./sse-frame.js"

const RETRY_DIGITS = /^\d+$/

interface Field {
	name: string
	value: string
}

/**
 * Split a wire line into field name and value
 */
export function splitField(line: string): Field {
	const colon = line.indexOf(":")
	if (colon === -1) {
		return { name: line, value: "" }
	}
	const raw = line.slice(colon + 1)
	return {
		name: line.slice(0, colon),
		value: raw.startsWith(" ") ? raw.slice(1) : raw,
	}
}

function parseRetry(value: string): number | undefined {
	return RETRY_DIGITS.test(value) ? Number.parseInt(value, 10) : undefined
}

export class SSEFrameParser {
	private currentEvent: string | undefined
	private currentData: string | undefined
	private currentId: string | undefined
	private currentRetry: number | undefined

	// id/retry that arrived after the current frame's data; they describe the next frame
	private nextId: string | undefined
	private nextRetry: number | undefined

	/**
	 * Feed one line (without its terminator)
	 *
	 * @returns The previous frame when this line completes it
	 */
	feed(line: string): SSEFrame | undefined {
		if (line.startsWith(":")) {
			return undefined
		}

		const { name, value } = splitField(line)

		switch (name) {
			case "event": {
				const completed = this.currentData !== undefined ? this.takeFrame() : undefined
				this.currentEvent = value
				this.currentData = undefined
				return completed
			}

			case "data": {
				if (this.currentData !== undefined && this.currentEvent !== undefined) {
					const completed = this.takeFrame()
					this.currentData = value
					return completed
				}
				this.currentData = this.currentData === undefined ? value : `${this.currentData}\n${value}`
				return undefined
			}

			case "id": {
				if (this.currentData === undefined) {
					this.currentId = value
				} else {
					this.nextId = value
				}
				return undefined
			}

			case "retry": {
				const retry = parseRetry(value)
				if (retry === undefined) return undefined
				if (this.currentData === undefined) {
					this.currentRetry = retry
				} else {
					this.nextRetry = retry
				}
				return undefined
			}

			default:
				return undefined
		}
	}

	/**
	 * Emit whatever is still pending at end of stream
	 *
	 * Calling it again (or on a fresh parser) returns undefined.
	 */
	flush(): SSEFrame | undefined {
		const frame = makeFrame({
			data: this.currentData,
			event: this.currentEvent,
			id: this.nextId ?? this.currentId,
			retry: this.nextRetry ?? this.currentRetry,
		})
		this.currentEvent = undefined
		this.currentData = undefined
		this.currentId = undefined
		this.currentRetry = undefined
		this.nextId = undefined
		this.nextRetry = undefined
		return isEmptyFrame(frame) ? undefined : frame
	}

	private takeFrame(): SSEFrame {
		const frame = makeFrame({
			data: this.currentData,
			event: this.currentEvent,
			id: this.currentId,
			retry: this.currentRetry,
		})
		this.currentEvent = undefined
		this.currentData = undefined
		this.currentId = this.nextId
		this.currentRetry = this.nextRetry
		this.nextId = undefined
		this.nextRetry = undefined
		return frame
	}
}

/**
 * Parse one complete block of SSE lines into a single frame
 *
 * Unlike the streaming parser this never splits: later `event`/`id`/`retry`
 * lines overwrite earlier ones and every `data` line is joined with "\n".
 *
 * @returns undefined when the block sets no field
 */
export function parseSSEFrame(block: string): SSEFrame | undefined {
	let data: string | undefined
	let event: string | undefined
	let id: string | undefined
	let retry: number | undefined

	for (const line of block.split("\n")) {
		if (line === "" || line.startsWith(":")) continue

		const { name, value } = splitField(line)
		switch (name) {
			case "data":
				data = data === undefined ? value : `${data}\n${value}`
				break
			case "event":
				event = value
				break
			case "id":
				id = value
				break
			case "retry":
				retry = parseRetry(value) ?? retry
				break
		}
	}

	const frame = makeFrame({ data, event, id, retry })
	return isEmptyFrame(frame) ? undefined : frame
}
