import { describe, it, expect } from "vitest"
import { SSEFrameParser, parseSSEFrame, splitField } from "./frame-parser.js"
import type { SSEFrame } from "./sse-frame.js"

/**
 * Feed lines to a fresh parser and collect every frame, including the flush
 */
function parseLines(lines: string[]): SSEFrame[] {
	const parser = new SSEFrameParser()
	const frames: SSEFrame[] = []
	for (const line of lines) {
		const frame = parser.feed(line)
		if (frame) frames.push(frame)
	}
	const last = parser.flush()
	if (last) frames.push(last)
	return frames
}

describe("splitField", () => {
	it("strips exactly one leading space from the value", () => {
		expect(splitField("data:  two spaces")).toEqual({ name: "data", value: " two spaces" })
		expect(splitField("data:none")).toEqual({ name: "data", value: "none" })
	})

	it("treats a line without colon as a field with empty value", () => {
		expect(splitField("data")).toEqual({ name: "data", value: "" })
	})
})

describe("SSEFrameParser", () => {
	it("joins N data lines with newlines in arrival order", () => {
		const frames = parseLines(["data: first", "data: second", "data: third"])
		expect(frames).toEqual([{ data: "first\nsecond\nthird" }])
	})

	it("yields an empty string for a bare data line", () => {
		const frames = parseLines(["data:"])
		expect(frames).toEqual([{ data: "" }])
		expect(frames[0]?.data).toBe("")
	})

	it("never produces a frame from a comment alone", () => {
		expect(parseLines([": keep-alive"])).toEqual([])
	})

	it("ignores comments between fields", () => {
		expect(parseLines(["event: tick", ": ping", "data: 1"])).toEqual([{ event: "tick", data: "1" }])
	})

	it("preserves colons inside the value", () => {
		expect(parseLines(["data: time: 12:30:45"])).toEqual([{ data: "time: 12:30:45" }])
	})

	it("drops a non-numeric retry but keeps the rest of the frame", () => {
		expect(parseLines(["event: update", "retry: not-a-number", "data: x"])).toEqual([
			{ event: "update", data: "x" },
		])
	})

	it("parses a numeric retry", () => {
		expect(parseLines(["retry: 3000", "data: x"])).toEqual([{ data: "x", retry: 3000 }])
	})

	it("splits consecutive event/data pairs into separate frames", () => {
		const frames = parseLines([
			"event: progress",
			'data: {"p":0.1}',
			"event: progress",
			'data: {"p":0.5}',
		])
		expect(frames).toEqual([
			{ event: "progress", data: '{"p":0.1}' },
			{ event: "progress", data: '{"p":0.5}' },
		])
	})

	it("emits the pending frame when data follows a complete event+data frame", () => {
		const frames = parseLines(["event: a", "data: 1", "data: 2"])
		expect(frames).toEqual([{ event: "a", data: "1" }, { data: "2" }])
	})

	it("returns the completed frame from the line that closes it", () => {
		const parser = new SSEFrameParser()
		expect(parser.feed("event: a")).toBeUndefined()
		expect(parser.feed("data: 1")).toBeUndefined()
		expect(parser.feed("event: b")).toEqual({ event: "a", data: "1" })
	})

	it("replaces an event that never received data", () => {
		expect(parseLines(["event: a", "event: b", "data: x"])).toEqual([{ event: "b", data: "x" }])
	})

	it("ignores unknown fields and empty lines", () => {
		expect(parseLines(["foo: bar", "", "data: x", ""])).toEqual([{ data: "x" }])
	})

	it("attaches an id seen before data to that frame", () => {
		expect(parseLines(["id: 7", "event: a", "data: x"])).toEqual([{ id: "7", event: "a", data: "x" }])
	})

	it("carries an id seen after data over to the next frame", () => {
		const frames = parseLines(["id: 1", "event: a", "data: x", "id: 2", "event: b", "data: y"])
		expect(frames).toEqual([
			{ id: "1", event: "a", data: "x" },
			{ id: "2", event: "b", data: "y" },
		])
	})

	it("flushes a frame with only id and retry", () => {
		expect(parseLines(["id: 9", "retry: 100"])).toEqual([{ id: "9", retry: 100 }])
	})

	it("flush on an empty parser emits nothing, and repeated flushes stay empty", () => {
		const parser = new SSEFrameParser()
		expect(parser.flush()).toBeUndefined()

		parser.feed("data: x")
		expect(parser.flush()).toEqual({ data: "x" })
		expect(parser.flush()).toBeUndefined()
	})
})

describe("parseSSEFrame", () => {
	it("parses every field of one block", () => {
		expect(parseSSEFrame("event: message\nid: 42\nretry: 500\ndata: hello")).toEqual({
			event: "message",
			id: "42",
			retry: 500,
			data: "hello",
		})
	})

	it("joins data lines and lets later event lines win", () => {
		expect(parseSSEFrame("event: a\ndata: 1\nevent: b\ndata: 2")).toEqual({
			event: "b",
			data: "1\n2",
		})
	})

	it("returns undefined for a comment-only block", () => {
		expect(parseSSEFrame(": just a comment\n\n")).toBeUndefined()
	})
})
