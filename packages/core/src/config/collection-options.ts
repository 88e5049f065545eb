/**
 * Construction options for named collections.
 */

import { Either, Schema } from "effect";
import {
	CapacityOverflowError,
	InvalidOptionsError,
} from "../errors/collection-errors.js";

/**
 * Largest length a JavaScript array can reach. Capacity requests beyond
 * this can never be honoured.
 */
export const MAX_CAPACITY = 2 ** 32 - 1;

export const NamedCollectionOptionsSchema = Schema.Struct({
	/** Number of insertions the collection should absorb without growing. */
	capacity: Schema.optional(Schema.NonNegativeInt),
	/** Label shown in log annotations and `toString()`. */
	label: Schema.optional(Schema.NonEmptyString),
});

export type NamedCollectionOptions = Schema.Schema.Type<
	typeof NamedCollectionOptionsSchema
>;

export interface ResolvedOptions {
	readonly capacity: number;
	readonly label: string;
}

export const DEFAULT_LABEL = "NamedCollection";

/**
 * Decode user-supplied options, filling in defaults.
 *
 * @throws InvalidOptionsError when the options do not match the schema
 * @throws CapacityOverflowError when the capacity hint exceeds MAX_CAPACITY
 */
export const resolveOptions = (options: unknown = {}): ResolvedOptions => {
	const decoded = Schema.decodeUnknownEither(NamedCollectionOptionsSchema)(
		options,
	);
	if (Either.isLeft(decoded)) {
		throw new InvalidOptionsError({
			issues: [decoded.left.message],
			message: `Invalid named collection options: ${decoded.left.message}`,
		});
	}

	const capacity = decoded.right.capacity ?? 0;
	checkCapacity(capacity);

	return {
		capacity,
		label: decoded.right.label ?? DEFAULT_LABEL,
	};
};

/**
 * Reject capacity totals that are not representable as an array length.
 */
export const checkCapacity = (requested: number): void => {
	if (
		!Number.isSafeInteger(requested) ||
		requested < 0 ||
		requested > MAX_CAPACITY
	) {
		throw new CapacityOverflowError({
			requested,
			limit: MAX_CAPACITY,
			message: `Capacity ${requested} is not an allocatable size (limit ${MAX_CAPACITY})`,
		});
	}
};
