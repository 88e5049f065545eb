import { Data } from "effect";

// ============================================================================
// Recoverable Lookup Errors
// ============================================================================

export class NameNotFoundError extends Data.TaggedError("NameNotFoundError")<{
	readonly name: string;
	readonly message: string;
}> {}

export class PositionOutOfRangeError extends Data.TaggedError(
	"PositionOutOfRangeError",
)<{
	readonly index: number;
	readonly length: number;
	readonly message: string;
}> {}

export class EmptyCollectionError extends Data.TaggedError(
	"EmptyCollectionError",
)<{
	readonly message: string;
}> {}

// ============================================================================
// Precondition Violations
// ============================================================================

export class SwapPreconditionError extends Data.TaggedError(
	"SwapPreconditionError",
)<{
	readonly key: string;
	readonly message: string;
}> {}

export class LookupMissError extends Data.TaggedError("LookupMissError")<{
	readonly key: string;
	readonly message: string;
}> {}

export class InvalidRangeError extends Data.TaggedError("InvalidRangeError")<{
	readonly start: number;
	readonly end: number;
	readonly length: number;
	readonly message: string;
}> {}

export class CapacityOverflowError extends Data.TaggedError(
	"CapacityOverflowError",
)<{
	readonly requested: number;
	readonly limit: number;
	readonly message: string;
}> {}

export class NameChangedError extends Data.TaggedError("NameChangedError")<{
	readonly expected: string;
	readonly received: string;
	readonly message: string;
}> {}

export class IndexCorruptedError extends Data.TaggedError(
	"IndexCorruptedError",
)<{
	readonly issues: ReadonlyArray<string>;
	readonly message: string;
}> {}

export class InvalidOptionsError extends Data.TaggedError(
	"InvalidOptionsError",
)<{
	readonly issues: ReadonlyArray<string>;
	readonly message: string;
}> {}

// ============================================================================
// Error Unions
// ============================================================================

/**
 * Expected misses, reported through `Option` by the collection and through
 * the failure channel by the Effect operations.
 */
export type LookupError =
	| NameNotFoundError
	| PositionOutOfRangeError
	| EmptyCollectionError;

/**
 * Caller programming errors. Thrown by the collection, turned into defects
 * by the Effect operations.
 */
export type CollectionDefect =
	| SwapPreconditionError
	| LookupMissError
	| InvalidRangeError
	| CapacityOverflowError
	| NameChangedError
	| IndexCorruptedError
	| InvalidOptionsError;
