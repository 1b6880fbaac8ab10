/**
 * SSEFrame - one complete Server-Sent Event as accumulated from wire lines
 */
import { Either, Schema } from "effect"
import { DecodingError, NoDataError } from "../errors.js"

export interface SSEFrame {
	/** `data` lines joined with "\n"; "" for a bare `data:` */
	readonly data?: string
	readonly event?: string
	readonly id?: string
	/** Reconnection delay in ms from a numeric `retry` field */
	readonly retry?: number
}

/** True when no field is set; such frames are never emitted */
export function isEmptyFrame(frame: SSEFrame): boolean {
	return (
		frame.data === undefined &&
		frame.event === undefined &&
		frame.id === undefined &&
		frame.retry === undefined
	)
}

/**
 * Build a frame containing only the fields that are set
 */
export function makeFrame(fields: {
	data: string | undefined
	event: string | undefined
	id: string | undefined
	retry: number | undefined
}): SSEFrame {
	const frame: { data?: string; event?: string; id?: string; retry?: number } = {}
	if (fields.data !== undefined) frame.data = fields.data
	if (fields.event !== undefined) frame.event = fields.event
	if (fields.id !== undefined) frame.id = fields.id
	if (fields.retry !== undefined) frame.retry = fields.retry
	return frame
}

/**
 * Decode a frame's `data` as JSON through a schema
 *
 * @example
 * ```ts
 * const Progress = Schema.Struct({ p: Schema.Number })
 * decodeFrameData({ event: "progress", data: '{"p":0.5}' }, Progress)
 * // => Either.right({ p: 0.5 })
 * ```
 */
export function decodeFrameData<A, I>(
	frame: SSEFrame,
	schema: Schema.Schema<A, I>,
): Either.Either<A, DecodingError | NoDataError> {
	if (frame.data === undefined) {
		return Either.left(new NoDataError())
	}
	return Schema.decodeUnknownEither(Schema.parseJson(schema))(frame.data).pipe(
		Either.mapLeft(
			(error) =>
				new DecodingError({
					cause: error,
					message: error.message,
				}),
		),
	)
}
