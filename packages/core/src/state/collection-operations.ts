/**
 * Effect-based operations over a NamedCollection.
 *
 * Misses surface in the error channel as tagged errors. Precondition
 * violations thrown by the collection become defects. Each operation logs at
 * debug level, annotated with the collection label and the operation name.
 */

import { Effect, Option } from "effect";
import {
	EmptyCollectionError,
	type IndexCorruptedError,
	NameNotFoundError,
	PositionOutOfRangeError,
} from "../errors/collection-errors.js";
import { checkIndex, corruptedIndexError } from "../indexes/name-index.js";
import {
	formatLookup,
	Lookup,
	type LookupInput,
	toLookup,
} from "../types/lookup-types.js";
import type { Named } from "../types/named.js";
import type { NamedCollection, UpsertOutcome } from "./named-collection.js";

const annotated =
	(label: string, operation: string) =>
	<A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
		effect.pipe(
			Effect.annotateLogs({ collection: label, operation }),
		);

const missFor = (
	label: string,
	length: number,
	lookup: Lookup,
): NameNotFoundError | PositionOutOfRangeError =>
	Lookup.$match(lookup, {
		Name: ({ name }): NameNotFoundError | PositionOutOfRangeError =>
			new NameNotFoundError({
				name,
				message: `No element named "${name}" in ${label}`,
			}),
		Position: ({ index }): NameNotFoundError | PositionOutOfRangeError =>
			new PositionOutOfRangeError({
				index,
				length,
				message: `Position ${index} is out of range for ${label} of length ${length}`,
			}),
	});

/**
 * Gets the element addressed by `key`, failing with NameNotFoundError or
 * PositionOutOfRangeError when it does not resolve.
 */
export const getOrFail = <T extends Named>(
	collection: NamedCollection<T>,
	key: LookupInput,
): Effect.Effect<T, NameNotFoundError | PositionOutOfRangeError> => {
	const lookup = toLookup(key);
	return Effect.sync(() => collection.get(lookup)).pipe(
		Effect.flatMap(
			Option.match({
				onNone: () =>
					Effect.fail(missFor(collection.label, collection.length, lookup)),
				onSome: Effect.succeed,
			}),
		),
		Effect.tapError(() =>
			Effect.logDebug(`lookup ${formatLookup(lookup)} missed`),
		),
		annotated(collection.label, "get"),
	);
};

/**
 * Removes the last element, failing with EmptyCollectionError when there is
 * none.
 */
export const popOrFail = <T extends Named>(
	collection: NamedCollection<T>,
): Effect.Effect<T, EmptyCollectionError> =>
	Effect.sync(() => collection.pop()).pipe(
		Effect.flatMap(
			Option.match({
				onNone: () =>
					Effect.fail(
						new EmptyCollectionError({
							message: `Cannot pop from empty ${collection.label}`,
						}),
					),
				onSome: Effect.succeed,
			}),
		),
		Effect.tap((item) => Effect.logDebug(`popped "${item.name}"`)),
		annotated(collection.label, "pop"),
	);

export const upsert = <T extends Named>(
	collection: NamedCollection<T>,
	item: T,
): Effect.Effect<UpsertOutcome<T>> =>
	Effect.sync(() => collection.upsert(item)).pipe(
		Effect.tap((outcome) =>
			Effect.logDebug(
				`${outcome._tag === "Inserted" ? "inserted" : "replaced"} "${item.name}" at ${outcome.index}`,
			),
		),
		annotated(collection.label, "upsert"),
	);

/**
 * Swaps two elements. An unresolvable key dies with SwapPreconditionError.
 */
export const swap = <T extends Named>(
	collection: NamedCollection<T>,
	first: LookupInput,
	second: LookupInput,
): Effect.Effect<void> =>
	Effect.sync(() => collection.swap(first, second)).pipe(
		Effect.tap(() =>
			Effect.logDebug(
				`swapped ${formatLookup(toLookup(first))} with ${formatLookup(toLookup(second))}`,
			),
		),
		annotated(collection.label, "swap"),
	);

/**
 * Truncates to `length`, returning the discarded elements. A negative or
 * fractional length dies with InvalidRangeError.
 */
export const truncate = <T extends Named>(
	collection: NamedCollection<T>,
	length: number,
): Effect.Effect<ReadonlyArray<T>> =>
	Effect.sync(() => collection.truncate(length)).pipe(
		Effect.tap((discarded) =>
			Effect.logDebug(`truncated to ${length}, discarded ${discarded.length}`),
		),
		annotated(collection.label, "truncate"),
	);

/**
 * Fails with IndexCorruptedError when the name index disagrees with the
 * elements.
 */
export const verify = <T extends Named>(
	collection: NamedCollection<T>,
): Effect.Effect<void, IndexCorruptedError> =>
	Effect.sync(() => checkIndex(collection)).pipe(
		Effect.flatMap((issues) =>
			issues.length === 0
				? Effect.void
				: Effect.fail(corruptedIndexError(collection.label, issues)),
		),
		Effect.tapError((error) => Effect.logWarning(error.message)),
		annotated(collection.label, "verify"),
	);
