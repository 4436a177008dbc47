/**
 * Splits raw player input into lowercase words.
 *
 * - `,` and `.` become tokens of their own so commands can be split on them.
 * - `! ? " '` are dropped.
 * - An article is dropped when another word follows it that is not a
 *   preposition or a separator ("the brass key" → "brass key").
 *
 * @example
 * ```typescript
 * tokenize("Take the brass key!"); // ["take", "brass", "key"]
 * tokenize("go north, then wait"); // ["go", "north", ",", "then", "wait"]
 * ```
 *
 * @module parser/tokenizer
 */
import { ARTICLES, PREPOSITIONS, SEPARATORS } from "./vocabulary.js";

export function tokenize(raw: string): string[] {
	const words = raw
		.toLowerCase()
		.replace(/[,.]/g, (separator) => ` ${separator} `)
		.replace(/[!?"']/g, "")
		.split(/\s+/)
		.filter((word) => word.length > 0);

	return words.filter((word, index) => {
		if (!ARTICLES.has(word)) return true;
		const next = words[index + 1];
		if (next === undefined) return true;
		return PREPOSITIONS.has(next) || SEPARATORS.has(next);
	});
}
