/**
 * @streamwire/core - Public API
 */

// Errors
export {
	NetworkError,
	InvalidURLError,
	InvalidResponseError,
	HTTPError,
	UnauthorizedError,
	DecodingError,
	NoDataError,
	describeApiError,
	isApiError,
	type ApiError,
	type SSEError,
} from "./errors.js"

// Configuration
export {
	ConfigService,
	DEFAULT_TIMEOUT_MS,
	resolveConfig,
	type ApiClientConfig,
	type AuthTokenProvider,
	type FetchFn,
	type ResolvedConfig,
} from "./config/config.js"

// Effect bridge
export { runOrThrow, runSyncOrThrow } from "./runtime/run.js"

export * from "./http/index.js"
export * from "./multicast/index.js"
export * from "./sse/index.js"
