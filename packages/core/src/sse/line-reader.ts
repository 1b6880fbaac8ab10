/**
 * Split a streaming response body into text lines
 *
 * Handles LF, CRLF and lone CR terminators, including a CRLF split across
 * two chunks, and multi-byte UTF-8 sequences split across chunks. Empty
 * lines are yielded as "". A trailing line without terminator is yielded
 * at end of stream.
 *
 * Returning early from the generator (consumer `break`) cancels the body.
 */

const LINE_BREAK = /\r\n|\r|\n/

export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string, void, undefined> {
	const reader = body.getReader()
	const decoder = new TextDecoder()
	let buffer = ""
	let settled = false

	try {
		while (true) {
			const { done, value } = await reader.read()
			if (done) break

			buffer += decoder.decode(value, { stream: true })

			let match = LINE_BREAK.exec(buffer)
			while (match !== null) {
				// A CR at the very end may be the first half of a CRLF
				if (match[0] === "\r" && match.index === buffer.length - 1) break
				const line = buffer.slice(0, match.index)
				buffer = buffer.slice(match.index + match[0].length)
				yield line
				match = LINE_BREAK.exec(buffer)
			}
		}

		settled = true
		buffer += decoder.decode()
		if (buffer !== "") {
			const rest = buffer.split(LINE_BREAK)
			if (rest[rest.length - 1] === "") rest.pop()
			yield* rest
		}
	} catch (error) {
		settled = true
		throw error
	} finally {
		if (!settled) {
			await reader.cancel()
		}
		reader.releaseLock()
	}
}
