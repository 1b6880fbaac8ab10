/**
 * @streamwire/core/sse
 *
 * Line-driven Server-Sent Events parsing and typed event streams
 */

export { SSEFrameParser, parseSSEFrame, splitField } from "./frame-parser.js"
export { readLines } from "./line-reader.js"
export { decodeFrameData, isEmptyFrame, type SSEFrame } from "./sse-frame.js"
export { SSEClient, buildStreamHeaders, type ConnectOptions, type ExecuteOptions } from "./sse-client.js"
export { decodeEvents, type DecodeEventsOptions } from "./typed-events.js"
