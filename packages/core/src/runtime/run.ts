/**
 * Effect → Promise bridge
 *
 * `Effect.runPromise` rejects with a FiberFailure wrapper. The public Promise
 * APIs reject with the tagged error itself instead.
 */
import { Effect, Either } from "effect"

export async function runOrThrow<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
	const result = await Effect.runPromise(Effect.either(effect))
	if (Either.isLeft(result)) {
		throw result.left
	}
	return result.right
}

export function runSyncOrThrow<A, E>(effect: Effect.Effect<A, E>): A {
	const result = Effect.runSync(Effect.either(effect))
	if (Either.isLeft(result)) {
		throw result.left
	}
	return result.right
}
