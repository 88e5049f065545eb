/**
 * Element capability required by a named collection.
 *
 * An element reports its own name through a single pure accessor. A plain
 * readonly field works, and so does a getter computing the name from other
 * fields.
 *
 * The collection reads `name` whenever it needs the key (on insert, pop,
 * truncate, swap and consistency checks) and never caches the result
 * alongside the element. Changing an element in place so that it reports a
 * different name leaves the name index stale; keeping names stable is the
 * caller's responsibility.
 */
export interface Named {
	readonly name: string;
}

/**
 * Name type of an element, narrowed to its literal type when the element
 * type declares one.
 */
export type NameOf<T extends Named> = T["name"];
