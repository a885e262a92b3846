// CHANGE: Extension, exclude and root-config predicates
// WHY: Rule applicability and path expansion share suffix and substring tests
// PURITY: CORE
// INVARIANT: Empty include lists allow all; exclusion wins over inclusion
// COMPLEXITY: O(|entries| · |path|)

import { match } from "ts-pattern";

import type {
	ExcludeEntry,
	ExcludeFilter,
	ExtFilter,
	RootConfig,
} from "../types/index.js";
import { fileNameOf } from "../matcher/matcher.js";

/**
 * Suffix test on the file name.
 *
 * @pure true
 * @postcondition exclude hit → false; include = [] → true unless excluded
 */
export const extAllows = (filter: ExtFilter, fileName: string): boolean => {
	if (filter.exclude.some((ext) => fileName.endsWith(ext))) return false;
	return (
		filter.include.length === 0 ||
		filter.include.some((ext) => fileName.endsWith(ext))
	);
};

const entryExcludes = (
	entry: ExcludeEntry,
	fileName: string,
	path: string,
): boolean =>
	match(entry.filter)
		.with("file_starts_with", () => fileName.startsWith(entry.keyword))
		.with("file_ends_with", () => fileName.endsWith(entry.keyword))
		.with("path_contains", () => path.includes(entry.keyword))
		.exhaustive();

/**
 * OR over all entries.
 *
 * @pure true
 */
export const isExcluded = (filter: ExcludeFilter, path: string): boolean => {
	const fileName = fileNameOf(path);
	return filter.entries.some((e) => entryExcludes(e, fileName, path));
};

export const noExtFilter: ExtFilter = { include: [], exclude: [] };
export const noExcludeFilter: ExcludeFilter = { entries: [] };

export const defaultRootConfig: RootConfig = {
	includeExtensions: new Set<string>(),
	excludeDirs: new Set<string>(),
};

/**
 * Extension after the last dot of the file name, dot included; "" when none.
 *
 * @pure true
 * @example extensionOf("a/b.test.ts") === ".ts"
 */
export const extensionOf = (path: string): string => {
	const name = fileNameOf(path);
	const dot = name.lastIndexOf(".");
	return dot <= 0 ? "" : name.slice(dot);
};

/**
 * Root-level extension gate applied during path expansion.
 *
 * @pure true
 * @invariant includeExtensions = ∅ → true
 */
export const shouldIncludeExtension = (
	config: RootConfig,
	path: string,
): boolean => {
	if (config.includeExtensions.size === 0) return true;
	const ext = extensionOf(path);
	return ext !== "" && config.includeExtensions.has(ext);
};

export const shouldExcludeDir = (config: RootConfig, name: string): boolean =>
	name === ".git" || config.excludeDirs.has(name);
