/**
 * Notification events broadcast for status codes an app usually reacts to
 * globally (sign-out on 401, back-off on 429, maintenance banner on 503).
 */
import { Data } from "effect"
import type { Endpoint } from "./endpoint.js"

export type HttpEvent = Data.TaggedEnum<{
	Unauthorized: { readonly endpoint: Endpoint; readonly body: Uint8Array }
	Forbidden: { readonly endpoint: Endpoint; readonly body: Uint8Array }
	RateLimited: {
		readonly endpoint: Endpoint
		/** Seconds from the Retry-After header, undefined when missing/past/unparseable */
		readonly retryAfter: number | undefined
		readonly body: Uint8Array
	}
	ServiceUnavailable: { readonly endpoint: Endpoint; readonly body: Uint8Array }
	ServerError: { readonly endpoint: Endpoint; readonly statusCode: number; readonly body: Uint8Array }
}>

export const HttpEvent = Data.taggedEnum<HttpEvent>()
