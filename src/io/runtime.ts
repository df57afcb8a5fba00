/**
 * Effect platform layer selection
 *
 * All file access goes through the `FileSystem` service of @effect/platform;
 * this module supplies the Node.js implementation of it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer providing FileSystem, Path and friends
 *
 * @example
 * ```typescript
 * await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
 * ```
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
