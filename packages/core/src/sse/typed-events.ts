/**
 * SSE-to-typed-event adapter
 *
 * Decodes each frame's `data` (JSON) through a schema. A frame that fails to
 * decode is reported and skipped; it never ends the stream.
 */
import { Either } from "effect"
import type * as Schema from "effect/Schema"
import type { DecodingError } from "../errors.js"
import { decodeFrameData, type SSEFrame } from "./sse-frame.js"

export interface DecodeEventsOptions {
	/** Called for every frame whose data does not match the schema */
	onDecodeError?: (error: DecodingError, frame: SSEFrame) => void
}

/**
 * @example
 * ```ts
 * const Progress = Schema.Struct({ p: Schema.Number })
 * for await (const { p } of decodeEvents(sse.connect({ path: "/jobs/1" }), Progress)) {
 *   bar.update(p)
 * }
 * ```
 */
export async function* decodeEvents<A, I>(
	frames: AsyncIterable<SSEFrame>,
	schema: Schema.Schema<A, I>,
	options: DecodeEventsOptions = {},
): AsyncGenerator<A, void, undefined> {
	for await (const frame of frames) {
		// Frames without data (bare event/id/retry) carry nothing to decode
		if (frame.data === undefined) continue

		const decoded = decodeFrameData(frame, schema)
		if (Either.isRight(decoded)) {
			yield decoded.right
		} else if (decoded.left._tag === "DecodingError") {
			options.onDecodeError?.(decoded.left, frame)
		}
	}
}
