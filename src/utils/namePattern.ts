/**
 * Display-name pattern helpers.
 * Patterns are plain text (substring match) or shell-style wildcards where
 * `*` matches any run of characters and `?` exactly one.
 *
 * @module utils/namePattern
 */

const MAX_PATTERN_LENGTH = 200;

/**
 * Removes control characters and clamps the length of a user-supplied
 * pattern.
 */
export function sanitizePattern(pattern: string): string {
	return pattern.replace(/[\x00-\x1F\x7F]/g, "").trim().slice(0, MAX_PATTERN_LENGTH);
}

export function hasWildcards(pattern: string): boolean {
	return pattern.includes("*") || pattern.includes("?");
}

/**
 * Translates a pattern into a SQL LIKE expression using `\` as the escape
 * character. Unanchored patterns match anywhere in the value.
 *
 * @example
 * ```typescript
 * wildcardToLike("al*ce");                     // "%al%ce%"
 * wildcardToLike("50%_off", { anchored: true }); // "50\\%\\_off"
 * ```
 */
export function wildcardToLike(pattern: string, options: { anchored?: boolean } = {}): string {
	const body = sanitizePattern(pattern)
		.replace(/[\\%_]/g, "\\$&")
		.replace(/\*/g, "%")
		.replace(/\?/g, "_");
	return options.anchored ? body : `%${body}%`;
}
