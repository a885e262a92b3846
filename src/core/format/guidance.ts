// CHANGE: Rendering of guideline and review items
// PURITY: CORE
// INVARIANT: Items declared at the root carry no location

import type { GuidanceCategory, GuidanceItem, Sourced } from "../types/index.js";
import { relativeTo } from "./violations.js";

/**
 * @pure true
 * @example formatGuidance("review", { entry, sourceDir: "/r/api" }, "/r") === "review: <message> @ api"
 */
export const formatGuidance = (
	category: GuidanceCategory,
	item: Sourced<GuidanceItem>,
	rootDir: string,
): string => {
	const where =
		item.sourceDir === rootDir ? "" : relativeTo(rootDir, item.sourceDir);
	const message = item.entry.message;
	if (category === "guideline") {
		return where === ""
			? `[ guideline ] ${message}`
			: `[ guideline ] ${where}: ${message}`;
	}
	return where === "" ? `review: ${message}` : `review: ${message} @ ${where}`;
};
