/**
 * Consistency checks for the name index of a named collection.
 *
 * The collection keeps a name -> position map beside its element array.
 * These functions compare the two and describe every disagreement, which is
 * how tests and debug builds confirm that mutations kept them in step.
 */

import { IndexCorruptedError } from "../errors/collection-errors.js";
import type { NamedCollection } from "../state/named-collection.js";
import type { Named } from "../types/named.js";

/**
 * One disagreement between the element array and the name index.
 *
 * - MissingName: the element at `index` has no index entry
 * - WrongPosition: the index points the element's name at another position
 * - StaleEntry: the index holds a name no element reports
 * - DuplicateName: two elements report the same name
 */
export type IndexIssue =
	| { readonly _tag: "MissingName"; readonly name: string; readonly index: number }
	| {
			readonly _tag: "WrongPosition";
			readonly name: string;
			readonly index: number;
			readonly indexed: number;
	  }
	| { readonly _tag: "StaleEntry"; readonly name: string; readonly indexed: number }
	| {
			readonly _tag: "DuplicateName";
			readonly name: string;
			readonly first: number;
			readonly second: number;
	  };

export const describeIssue = (issue: IndexIssue): string => {
	switch (issue._tag) {
		case "MissingName":
			return `"${issue.name}" at position ${issue.index} is not indexed`;
		case "WrongPosition":
			return `"${issue.name}" at position ${issue.index} is indexed at ${issue.indexed}`;
		case "StaleEntry":
			return `index entry "${issue.name}" -> ${issue.indexed} has no element`;
		case "DuplicateName":
			return `"${issue.name}" appears at positions ${issue.first} and ${issue.second}`;
	}
};

/**
 * Compare a collection's elements against its name index.
 *
 * @returns every issue found, in position order, followed by stale entries;
 * empty when the collection is consistent
 */
export const checkIndex = <T extends Named>(
	collection: NamedCollection<T>,
): ReadonlyArray<IndexIssue> => {
	const index = collection.indexSnapshot();
	const issues: Array<IndexIssue> = [];
	const seen = new Map<string, number>();

	let position = 0;
	for (const name of collection.names()) {
		const first = seen.get(name);
		if (first !== undefined) {
			issues.push({ _tag: "DuplicateName", name, first, second: position });
		} else {
			seen.set(name, position);
			const indexed = index.get(name);
			if (indexed === undefined) {
				issues.push({ _tag: "MissingName", name, index: position });
			} else if (indexed !== position) {
				issues.push({ _tag: "WrongPosition", name, index: position, indexed });
			}
		}
		position++;
	}

	for (const [name, indexed] of index) {
		if (!seen.has(name)) {
			issues.push({ _tag: "StaleEntry", name, indexed });
		}
	}

	return issues;
};

export const corruptedIndexError = (
	label: string,
	issues: ReadonlyArray<IndexIssue>,
): IndexCorruptedError => {
	const described = issues.map(describeIssue);
	return new IndexCorruptedError({
		issues: described,
		message: `Name index of ${label} is inconsistent: ${described.join("; ")}`,
	});
};

/**
 * @throws IndexCorruptedError listing every issue when the index disagrees
 * with the elements
 */
export const assertIndex = <T extends Named>(
	collection: NamedCollection<T>,
): void => {
	const issues = checkIndex(collection);
	if (issues.length > 0) {
		throw corruptedIndexError(collection.label, issues);
	}
};
