/**
 * Effect platform layer selection
 *
 * All file access goes through @effect/platform services; this module
 * supplies the Node.js implementation of them.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";

/**
 * Get the Effect platform layer providing FileSystem and Path
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run an effect whose requirements are satisfied and reject with its
 * typed failure as-is rather than a wrapped fiber failure
 */
export async function runOrThrow<A, E>(effect: Effect.Effect<A, E>): Promise<A> {
  const result = await Effect.runPromise(Effect.either(effect));
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
