/**
 * Lookup keys for named collections.
 *
 * A lookup addresses a single element either by its name or by its current
 * position. Accessors take a `LookupInput`, so call sites pass a raw string
 * or number and the conversion happens once, here.
 */

import { Data } from "effect";

/**
 * Name-or-position key addressing one element.
 */
export type Lookup = Data.TaggedEnum<{
	readonly Name: { readonly name: string };
	readonly Position: { readonly index: number };
}>;

export const Lookup = Data.taggedEnum<Lookup>();

/**
 * Anything an accessor accepts in place of an explicit `Lookup`.
 * Strings become `Name` lookups, numbers become `Position` lookups.
 */
export type LookupInput = Lookup | string | number;

/**
 * Contiguous range of positions, mirroring the four slice forms of an
 * ordinary sequence: bounded, open-ended on either side, and full.
 *
 * `end` is exclusive.
 */
export type PositionRange = Data.TaggedEnum<{
	readonly Range: { readonly start: number; readonly end: number };
	readonly RangeFrom: { readonly start: number };
	readonly RangeTo: { readonly end: number };
	readonly RangeFull: {};
}>;

export const PositionRange = Data.taggedEnum<PositionRange>();

/**
 * Key accepted by multi-element selection: a single-element lookup or a
 * position range.
 */
export type MultiLookup = Lookup | PositionRange;

export const toLookup = (input: LookupInput): Lookup => {
	if (typeof input === "string") {
		return Lookup.Name({ name: input });
	}
	if (typeof input === "number") {
		return Lookup.Position({ index: input });
	}
	return input;
};

export const byName = (name: string): Lookup => Lookup.Name({ name });

export const byPosition = (index: number): Lookup =>
	Lookup.Position({ index });

export const range = (start: number, end: number): PositionRange =>
	PositionRange.Range({ start, end });

export const rangeFrom = (start: number): PositionRange =>
	PositionRange.RangeFrom({ start });

export const rangeTo = (end: number): PositionRange =>
	PositionRange.RangeTo({ end });

export const rangeFull = (): PositionRange => PositionRange.RangeFull();

export const isPositionRange = (key: MultiLookup): key is PositionRange =>
	key._tag === "Range" ||
	key._tag === "RangeFrom" ||
	key._tag === "RangeTo" ||
	key._tag === "RangeFull";

/**
 * Render a lookup the way error messages and logs show it:
 * `"alpha"` for names, `#3` for positions.
 */
export const formatLookup = (lookup: Lookup): string =>
	Lookup.$match(lookup, {
		Name: ({ name }) => JSON.stringify(name),
		Position: ({ index }) => `#${index}`,
	});

export const formatRange = (positions: PositionRange): string =>
	PositionRange.$match(positions, {
		Range: ({ start, end }) => `${start}..${end}`,
		RangeFrom: ({ start }) => `${start}..`,
		RangeTo: ({ end }) => `..${end}`,
		RangeFull: () => "..",
	});
