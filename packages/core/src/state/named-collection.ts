/**
 * Ordered collection with constant-time lookup by element name.
 *
 * Elements live in an array in insertion order. A map from name to array
 * position is kept beside it, and every mutating method updates both before
 * returning. After any public call:
 *
 * - for each element `e` at position `i`, the map holds `e.name -> i`
 * - the map holds no other entries
 *
 * Lookups that may miss return `Option`. Caller errors (swapping an
 * unresolvable key, out-of-bounds slices, impossible capacity requests) throw
 * one of the tagged errors in `errors/collection-errors.ts`.
 */

import { Equal, Hash, Inspectable, Option } from "effect";
import {
	checkCapacity,
	type NamedCollectionOptions,
	resolveOptions,
} from "../config/collection-options.js";
import {
	InvalidRangeError,
	LookupMissError,
	NameChangedError,
	SwapPreconditionError,
} from "../errors/collection-errors.js";
import {
	formatLookup,
	formatRange,
	isPositionRange,
	Lookup,
	type LookupInput,
	type MultiLookup,
	PositionRange,
	toLookup,
} from "../types/lookup-types.js";
import type { Named } from "../types/named.js";

/**
 * Result of an upsert: either a new element was appended, or an element with
 * the same name was replaced where it stood.
 */
export type UpsertOutcome<T> =
	| { readonly _tag: "Inserted"; readonly index: number }
	| { readonly _tag: "Replaced"; readonly index: number; readonly previous: T };

export class NamedCollection<T extends Named>
	implements Iterable<T>, Equal.Equal, Inspectable.Inspectable
{
	readonly #items: Array<T> = [];
	readonly #positions = new Map<string, number>();
	#capacity: number;

	readonly label: string;

	constructor(options?: NamedCollectionOptions) {
		const resolved = resolveOptions(options);
		this.#capacity = resolved.capacity;
		this.label = resolved.label;
	}

	static empty<T extends Named>(): NamedCollection<T> {
		return new NamedCollection<T>();
	}

	/**
	 * Create an empty collection with room for `capacity` insertions.
	 */
	static withCapacity<T extends Named>(capacity: number): NamedCollection<T> {
		return new NamedCollection<T>({ capacity });
	}

	/**
	 * Build a collection by upserting each item in order. A later item whose
	 * name repeats an earlier one replaces it at the earlier position.
	 */
	static fromIterable<T extends Named>(
		items: Iterable<T>,
		options?: NamedCollectionOptions,
	): NamedCollection<T> {
		const collection = new NamedCollection<T>(options);
		for (const item of items) {
			collection.push(item);
		}
		return collection;
	}

	// ==========================================================================
	// Size and capacity
	// ==========================================================================

	get length(): number {
		return this.#items.length;
	}

	isEmpty(): boolean {
		return this.#items.length === 0;
	}

	/**
	 * Number of elements the collection can hold before it reports growth.
	 * Never less than `length`.
	 */
	get capacity(): number {
		return Math.max(this.#capacity, this.#items.length);
	}

	/**
	 * Reserve room for at least `additional` more elements.
	 *
	 * @throws CapacityOverflowError when `length + additional` is not a valid
	 * array length
	 */
	reserve(additional: number): void {
		checkCapacity(additional);
		const required = this.#items.length + additional;
		checkCapacity(required);
		this.#capacity = Math.max(this.#capacity, required);
	}

	shrinkToFit(): void {
		this.#capacity = this.#items.length;
	}

	// ==========================================================================
	// Mutation
	// ==========================================================================

	/**
	 * Append `item`, or replace the element that already carries its name.
	 * A replaced element keeps its position.
	 */
	push(item: T): void {
		this.upsert(item);
	}

	/**
	 * Same as `push`, reporting what happened.
	 */
	upsert(item: T): UpsertOutcome<T> {
		const name = item.name;
		const existing = this.#positions.get(name);
		if (existing !== undefined) {
			const previous = this.#items[existing];
			this.#items[existing] = item;
			return { _tag: "Replaced", index: existing, previous };
		}

		const index = this.#items.length;
		this.#positions.set(name, index);
		this.#items.push(item);
		return { _tag: "Inserted", index };
	}

	/**
	 * Remove and return the last element.
	 */
	pop(): Option.Option<T> {
		const last = this.#items.pop();
		if (last === undefined) {
			return Option.none();
		}
		this.#positions.delete(last.name);
		return Option.some(last);
	}

	/**
	 * Keep the first `length` elements and drop the rest, returning the
	 * dropped elements in position order. No-op when `length` is at least the
	 * current length.
	 *
	 * @throws InvalidRangeError when `length` is negative or not an integer
	 */
	truncate(length: number): ReadonlyArray<T> {
		const current = this.#items.length;
		if (!Number.isInteger(length) || length < 0) {
			throw new InvalidRangeError({
				start: length,
				end: current,
				length: current,
				message: `Cannot truncate to length ${length}`,
			});
		}
		if (length >= current) {
			return [];
		}

		// The discarded range comes from the array bounds, never from the map.
		const discarded = this.#items.slice(length, current);
		for (const item of discarded) {
			this.#positions.delete(item.name);
		}
		this.#items.length = length;
		return discarded;
	}

	clear(): void {
		this.#positions.clear();
		this.#items.length = 0;
	}

	/**
	 * Exchange the elements addressed by `first` and `second`.
	 *
	 * @throws SwapPreconditionError when either key does not resolve
	 */
	swap(first: LookupInput, second: LookupInput): void {
		const i = this.#resolveForSwap(first);
		const j = this.#resolveForSwap(second);
		if (i === j) {
			return;
		}

		const a = this.#items[i];
		const b = this.#items[j];
		const nameA = a.name;
		const nameB = b.name;

		this.#items[i] = b;
		this.#items[j] = a;
		this.#positions.set(nameA, j);
		this.#positions.set(nameB, i);
	}

	/**
	 * Replace the element at `key` with `update(current)`.
	 *
	 * The replacement must report the same name as the element it replaces;
	 * renaming through this method would desynchronise the name index.
	 *
	 * @returns the stored replacement, or none if `key` does not resolve
	 * @throws NameChangedError when the replacement reports a different name
	 */
	getMut(key: LookupInput, update: (current: T) => T): Option.Option<T> {
		return Option.map(this.#resolve(toLookup(key)), (index) => {
			const current = this.#items[index];
			const next = update(current);
			if (next.name !== current.name) {
				throw new NameChangedError({
					expected: current.name,
					received: next.name,
					message: `Replacement for "${current.name}" reports the name "${next.name}"`,
				});
			}
			this.#items[index] = next;
			return next;
		});
	}

	// ==========================================================================
	// Lookup
	// ==========================================================================

	get(key: LookupInput): Option.Option<T> {
		return Option.map(this.#resolve(toLookup(key)), (index) => this.#items[index]);
	}

	/**
	 * Index-operator access: the element at `key`, or a thrown error.
	 *
	 * @throws LookupMissError when `key` does not resolve
	 */
	at(key: LookupInput): T {
		const lookup = toLookup(key);
		return Option.getOrThrowWith(
			this.get(lookup),
			() =>
				new LookupMissError({
					key: formatLookup(lookup),
					message: `No element at ${formatLookup(lookup)} in ${this.label}`,
				}),
		);
	}

	has(key: LookupInput): boolean {
		return Option.isSome(this.#resolve(toLookup(key)));
	}

	indexOf(name: string): Option.Option<number> {
		return Option.fromNullable(this.#positions.get(name));
	}

	/**
	 * Contiguous read-only view of the elements in `positions`.
	 *
	 * @throws InvalidRangeError when the range is inverted or out of bounds
	 */
	slice(positions: PositionRange): ReadonlyArray<T> {
		const length = this.#items.length;
		const [start, end] = PositionRange.$match(positions, {
			Range: ({ start, end }) => [start, end] as const,
			RangeFrom: ({ start }) => [start, length] as const,
			RangeTo: ({ end }) => [0, end] as const,
			RangeFull: () => [0, length] as const,
		});

		if (
			!Number.isInteger(start) ||
			!Number.isInteger(end) ||
			start < 0 ||
			start > end ||
			end > length
		) {
			throw new InvalidRangeError({
				start,
				end,
				length,
				message: `Range ${formatRange(positions)} is out of bounds for length ${length}`,
			});
		}

		return Object.freeze(this.#items.slice(start, end));
	}

	/**
	 * Select zero or more elements: a single lookup yields at most one
	 * element, a position range yields its slice.
	 */
	select(key: MultiLookup | string | number): ReadonlyArray<T> {
		if (typeof key === "string" || typeof key === "number") {
			return this.#selectOne(toLookup(key));
		}
		if (isPositionRange(key)) {
			return this.slice(key);
		}
		return this.#selectOne(key);
	}

	toArray(): ReadonlyArray<T> {
		return this.slice(PositionRange.RangeFull());
	}

	// ==========================================================================
	// Iteration
	// ==========================================================================

	[Symbol.iterator](): Iterator<T> {
		return this.#items.values();
	}

	*names(): IterableIterator<string> {
		for (const item of this.#items) {
			yield item.name;
		}
	}

	*entries(): IterableIterator<[string, T]> {
		for (const item of this.#items) {
			yield [item.name, item];
		}
	}

	/**
	 * Copy of the name index, for consistency checks.
	 */
	indexSnapshot(): ReadonlyMap<string, number> {
		return new Map(this.#positions);
	}

	// ==========================================================================
	// Equality and inspection
	// ==========================================================================

	/**
	 * Two collections are equal when their elements are pairwise
	 * `Equal.equals` in the same order. Labels and capacity are ignored.
	 */
	[Equal.symbol](that: Equal.Equal): boolean {
		if (!(that instanceof NamedCollection)) {
			return false;
		}
		const other: ReadonlyArray<unknown> = that.toArray();
		return (
			other.length === this.#items.length &&
			this.#items.every((item, i) => Equal.equals(item, other[i]))
		);
	}

	[Hash.symbol](): number {
		return Hash.array(this.#items);
	}

	toJSON(): unknown {
		return {
			_id: "NamedCollection",
			label: this.label,
			items: this.#items.map((item) => Inspectable.toJSON(item)),
		};
	}

	toString(): string {
		return Inspectable.format(this.toJSON());
	}

	[Inspectable.NodeInspectSymbol](): unknown {
		return this.toJSON();
	}

	// ==========================================================================
	// Resolution
	// ==========================================================================

	#resolve(lookup: Lookup): Option.Option<number> {
		return Lookup.$match(lookup, {
			Name: ({ name }) => Option.fromNullable(this.#positions.get(name)),
			Position: ({ index }) =>
				Number.isInteger(index) && index >= 0 && index < this.#items.length
					? Option.some(index)
					: Option.none(),
		});
	}

	#selectOne(lookup: Lookup): ReadonlyArray<T> {
		return Option.match(this.get(lookup), {
			onNone: () => [],
			onSome: (item) => [item],
		});
	}

	#resolveForSwap(key: LookupInput): number {
		const lookup = toLookup(key);
		return Option.getOrThrowWith(
			this.#resolve(lookup),
			() =>
				new SwapPreconditionError({
					key: formatLookup(lookup),
					message: `Cannot swap ${formatLookup(lookup)}: no such element in ${this.label}`,
				}),
		);
	}
}
