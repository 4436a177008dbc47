/**
 * Classifier - gives every token a word type and a canonical form.
 *
 * Words are looked up in the {@link Vocabulary} first. A word the vocabulary
 * does not know goes through a fixed chain of closed tables: directions,
 * prepositions, numeric literals, meta-commands, and finally UNKNOWN.
 * Classifying never fails; an UNKNOWN token is left for the syntax matcher
 * to place by position.
 *
 * When a word has several entries, context picks one:
 * 1. The first token prefers VERB.
 * 2. A word right after a movement verb prefers DIRECTION.
 * 3. A word followed by a known noun prefers ADJECTIVE.
 * 4. Later tokens prefer PREPOSITION over DIRECTION, and anything over VERB.
 * 5. Otherwise the first registered entry wins.
 *
 * @module parser/classifier
 */
import defaultLogger, { type Logger } from "../logger.js";
import { DIR2TEXT, text2dir } from "../direction.js";
import {
	META_COMMANDS,
	MOVEMENT_VERBS,
	PREPOSITIONS,
	WORD_TYPE,
	type Vocabulary,
	type VocabularyEntry,
} from "./vocabulary.js";

export interface Token {
	/** The word as typed, lowercased. */
	word: string;
	type: WORD_TYPE;
	canonical: string;
	entityIds: readonly string[];
	position: number;
}

export interface ClassifierOptions {
	logger?: Logger;
}

/**
 * Classification for a word the vocabulary does not know.
 */
export function fallbackClassify(word: string): {
	type: WORD_TYPE;
	canonical: string;
} {
	const direction = text2dir(word);
	if (direction !== undefined) {
		const canonical = DIR2TEXT.get(direction);
		if (canonical) return { type: WORD_TYPE.DIRECTION, canonical };
	}
	if (PREPOSITIONS.has(word)) return { type: WORD_TYPE.PREPOSITION, canonical: word };
	if (/^\d+$/.test(word))
		return { type: WORD_TYPE.NUMBER, canonical: word.replace(/^0+(?=\d)/, "") };
	if (META_COMMANDS.has(word)) return { type: WORD_TYPE.SPECIAL, canonical: word };
	return { type: WORD_TYPE.UNKNOWN, canonical: word };
}

export class Classifier {
	private readonly logger: Logger;

	constructor(
		private readonly vocabulary: Vocabulary,
		options: ClassifierOptions = {}
	) {
		this.logger = options.logger ?? defaultLogger;
	}

	classify(words: readonly string[]): Token[] {
		const tokens: Token[] = [];
		words.forEach((word, position) => {
			const entries = this.vocabulary.lookup(word);
			if (entries.length === 0) {
				const { type, canonical } = fallbackClassify(word);
				tokens.push({ word, type, canonical, entityIds: [], position });
				return;
			}
			const entry = this.choose(entries, position, tokens[position - 1], words[position + 1]);
			tokens.push({
				word,
				type: entry.type,
				canonical: entry.canonical,
				entityIds: entry.entityIds,
				position,
			});
		});
		this.logger.debug(
			`classified: ${tokens.map((t) => `${t.word}/${t.type}`).join(" ")}`
		);
		return tokens;
	}

	private choose(
		entries: readonly VocabularyEntry[],
		position: number,
		previous: Token | undefined,
		next: string | undefined
	): VocabularyEntry {
		const first = entries[0];
		if (entries.length === 1) return first;
		const ofType = (type: WORD_TYPE) => entries.find((entry) => entry.type === type);

		if (position === 0) return ofType(WORD_TYPE.VERB) ?? first;

		if (
			previous?.type === WORD_TYPE.VERB &&
			MOVEMENT_VERBS.has(previous.canonical)
		) {
			const direction = ofType(WORD_TYPE.DIRECTION);
			if (direction) return direction;
		}

		if (next !== undefined && this.vocabulary.has(next, WORD_TYPE.NOUN)) {
			const adjective = ofType(WORD_TYPE.ADJECTIVE);
			if (adjective) return adjective;
		}

		const preposition = ofType(WORD_TYPE.PREPOSITION);
		if (preposition) return preposition;

		return entries.find((entry) => entry.type !== WORD_TYPE.VERB) ?? first;
	}
}
