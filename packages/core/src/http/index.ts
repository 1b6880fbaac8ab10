/**
 * @streamwire/core/http
 *
 * Exchange classification, status events, logs and the ApiClient
 */

export { ApiClient, buildRequestHeaders, describeSchema } from "./api-client.js"
export {
	classifyExchange,
	isSuccessStatus,
	type Classification,
	type Exchange,
	type HeaderLookup,
} from "./classify.js"
export {
	buildUrl,
	describeEndpoint,
	encodeBody,
	methodOf,
	type Endpoint,
	type HttpMethod,
	type StreamingEndpoint,
} from "./endpoint.js"
export { HttpEvent } from "./http-event.js"
export { HttpLog, formatHttpLog, formatBody, MAX_DISPLAY_BYTES } from "./http-log.js"
export { ConsoleHttpLogger, SilentHttpLogger, type HttpLogger } from "./logger.js"
export { parseRetryAfter } from "./retry-after.js"
