// ============================================================================
// Collection Errors (re-exported from collection-errors.ts)
// ============================================================================

export type {
	CollectionDefect,
	LookupError,
} from "./collection-errors.js";
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
} from "./collection-errors.js";
