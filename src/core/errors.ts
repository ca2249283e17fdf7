// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Configuration file exists but cannot be used
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Invalid command-line input
 *
 * @pure true (Data class)
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError = FSError | ConfigError | UsageError;
