/**
 * Main entry point for @named-collection/core.
 *
 * Exports the NamedCollection class, its lookup key types, typed errors,
 * index consistency checks and Effect-based operations.
 */

// ============================================================================
// Collection
// ============================================================================

export { NamedCollection } from "./state/named-collection.js";
export type { UpsertOutcome } from "./state/named-collection.js";

export type { Named, NameOf } from "./types/named.js";

// ============================================================================
// Lookup Keys
// ============================================================================

export {
	Lookup,
	PositionRange,
	byName,
	byPosition,
	formatLookup,
	formatRange,
	isPositionRange,
	range,
	rangeFrom,
	rangeFull,
	rangeTo,
	toLookup,
} from "./types/lookup-types.js";

export type { LookupInput, MultiLookup } from "./types/lookup-types.js";

// ============================================================================
// Configuration
// ============================================================================

export {
	DEFAULT_LABEL,
	MAX_CAPACITY,
	NamedCollectionOptionsSchema,
} from "./config/collection-options.js";

export type { NamedCollectionOptions } from "./config/collection-options.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	CapacityOverflowError,
	EmptyCollectionError,
	IndexCorruptedError,
	InvalidOptionsError,
	InvalidRangeError,
	LookupMissError,
	NameChangedError,
	NameNotFoundError,
	PositionOutOfRangeError,
	SwapPreconditionError,
} from "./errors/index.js";

export type {
	CollectionDefect,
	LookupError,
} from "./errors/index.js";

// ============================================================================
// Index Consistency
// ============================================================================

export {
	assertIndex,
	checkIndex,
	describeIssue,
} from "./indexes/name-index.js";

export type { IndexIssue } from "./indexes/name-index.js";

// ============================================================================
// Effect Operations
// ============================================================================

export * as CollectionOps from "./state/collection-operations.js";
