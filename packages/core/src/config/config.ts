/**
 * Client configuration
 *
 * Explicit options win; environment supplies defaults through ConfigService:
 * - STREAMWIRE_DEBUG=1|true     print every exchange with ConsoleHttpLogger
 * - STREAMWIRE_TIMEOUT_MS=5000  request timeout (positive number)
 */
import { Effect, Either, Schema } from "effect"
import { InvalidURLError } from "../errors.js"
import { ConsoleHttpLogger, SilentHttpLogger, type HttpLogger } from "../http/logger.js"

export const DEFAULT_TIMEOUT_MS = 60_000

export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>

/** Supplies a bearer token per request; undefined means "send no Authorization header" */
export interface AuthTokenProvider {
	getToken(): Promise<string | undefined>
}

export interface ApiClientConfig {
	/** Absolute http(s) URL every endpoint path is appended to */
	baseUrl: string
	/** Transport, defaults to the global fetch */
	fetch?: FetchFn
	auth?: AuthTokenProvider
	timeoutMs?: number
	defaultHeaders?: Record<string, string>
	/** Print exchanges to the console (ignored when `logger` is given) */
	debug?: boolean
	logger?: HttpLogger
}

export interface ResolvedConfig {
	readonly baseUrl: URL
	readonly fetch: FetchFn
	readonly auth: AuthTokenProvider | undefined
	readonly timeoutMs: number
	readonly defaultHeaders: Readonly<Record<string, string>>
	readonly logger: HttpLogger
}

export function isResolvedConfig(config: ApiClientConfig | ResolvedConfig): config is ResolvedConfig {
	return config.baseUrl instanceof URL
}

const TimeoutFromEnv = Schema.NumberFromString.pipe(Schema.positive())

function readDebugFlag(raw: string | undefined): boolean {
	const value = raw?.trim().toLowerCase()
	return value === "1" || value === "true"
}

/**
 * ConfigService - environment-derived defaults
 *
 * Uses 'sync' factory pattern, read once per layer build.
 */
export class ConfigService extends Effect.Service<ConfigService>()("ConfigService", {
	sync: () => ({
		debug: readDebugFlag(process.env.STREAMWIRE_DEBUG),
		timeoutMs: Either.getOrUndefined(
			Schema.decodeUnknownEither(TimeoutFromEnv)(process.env.STREAMWIRE_TIMEOUT_MS),
		),
	}),
}) {}

function parseBaseUrl(raw: string): Either.Either<URL, InvalidURLError> {
	if (!URL.canParse(raw)) {
		return Either.left(new InvalidURLError({ url: raw }))
	}
	const url = new URL(raw)
	if (url.protocol !== "http:" && url.protocol !== "https:") {
		return Either.left(new InvalidURLError({ url: raw }))
	}
	return Either.right(url)
}

/**
 * Validate options and fill in defaults
 *
 * @example
 * ```ts
 * const config = runSyncOrThrow(
 *   resolveConfig({ baseUrl: "https://api.test" }).pipe(Effect.provide(ConfigService.Default)),
 * )
 * ```
 */
export function resolveConfig(
	config: ApiClientConfig,
): Effect.Effect<ResolvedConfig, InvalidURLError, ConfigService> {
	return Effect.gen(function* () {
		const env = yield* ConfigService
		const baseUrl = yield* parseBaseUrl(config.baseUrl)

		const debug = config.debug ?? env.debug
		const logger = config.logger ?? (debug ? new ConsoleHttpLogger() : new SilentHttpLogger())

		return {
			baseUrl,
			fetch: config.fetch ?? ((input, init) => globalThis.fetch(input, init)),
			auth: config.auth,
			timeoutMs: config.timeoutMs ?? env.timeoutMs ?? DEFAULT_TIMEOUT_MS,
			defaultHeaders: { ...config.defaultHeaders },
			logger,
		}
	})
}
