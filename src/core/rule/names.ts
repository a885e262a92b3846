// CHANGE: Well-known configuration file names
// PURITY: CORE

export const RULE_FILE_NAME = ".cascade-lint.yaml";
export const ROOT_MARKER_NAME = ".cascade-lint-root.yaml";

/**
 * Configuration files are never validation targets.
 *
 * @pure true
 */
export const isConfigFileName = (name: string): boolean =>
	name === RULE_FILE_NAME || name === ROOT_MARKER_NAME;
