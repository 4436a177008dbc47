/**
 * Turns a line of player input into a {@link ParseResult}.
 *
 * Pipeline
 * 1. Tokenize; blank input is EMPTY_INPUT.
 * 2. A lone "again" word replays the last valid command.
 * 3. Split at the first conjunction or separator; the rest is kept as
 *    `remainder` for the caller to parse next.
 * 4. Expand one-letter shortcuts, then classify.
 * 5. A lone direction is `go <direction>`.
 * 6. The first syntax pattern that fits decides the verb and slots; each
 *    object slot is resolved by the disambiguator. A slot that fails to
 *    resolve fails the parse: no other pattern is tried.
 * 7. When no pattern fits, the permissive fallback (if enabled) takes token 0
 *    as the verb, known or not, and splits the rest at the first preposition.
 *    The result is valid but `deferred`; its slots are unresolved text. A verb
 *    nobody handles is turned away at dispatch.
 *
 * Parsing reads the world and never changes it.
 *
 * @example
 * ```typescript
 * const parser = new CommandParser({ vocabulary, syntax, disambiguator });
 * const result = parser.parse("put key in box");
 * if (result.valid) console.log(result.verb, result.directObject);
 * else console.log(result.message);
 * ```
 *
 * @module parser/parser
 */
import defaultLogger, { type Logger } from "../logger.js";
import { CONFIG_DEFAULT, type ParserConfig } from "../config.js";
import { isDirectionText } from "../direction.js";
import type { Entity } from "../entity.js";
import { tokenize } from "./tokenizer.js";
import { Classifier, type Token } from "./classifier.js";
import type { SlotBinding, SyntaxMatcher } from "./syntax.js";
import type { Disambiguator } from "./disambiguator.js";
import {
	COMMAND_SHORTCUTS,
	CONJUNCTIONS,
	SEPARATORS,
	WORD_TYPE,
	type Vocabulary,
} from "./vocabulary.js";
import {
	PARSE_ERROR,
	ambiguous,
	describeReference,
	failure,
	type ParseResult,
	type ParsedCommand,
	type Reference,
} from "./parse-result.js";

export interface CommandParserOptions {
	vocabulary: Vocabulary;
	syntax: SyntaxMatcher;
	disambiguator: Disambiguator;
	config?: Partial<ParserConfig>;
	logger?: Logger;
}

/**
 * Splits a noun phrase into its head noun and modifiers. The head is the last
 * NOUN token, or the last token when none is a noun. Modifiers are the words
 * before the head other than prepositions; a qualifier after the head
 * ("portrait of the duke") does not narrow the match.
 */
export function nounPhrase(tokens: readonly Token[]): {
	head: string;
	modifiers: string[];
} {
	let headIndex = tokens.length - 1;
	for (let i = tokens.length - 1; i >= 0; i--)
		if (tokens[i].type === WORD_TYPE.NOUN) {
			headIndex = i;
			break;
		}
	return {
		head: tokens[headIndex]?.canonical ?? "",
		modifiers: tokens
			.slice(0, Math.max(headIndex, 0))
			.filter((token) => token.type !== WORD_TYPE.PREPOSITION)
			.map((token) => token.canonical),
	};
}

type SlotOutcome = { reference: Reference } | { failure: ParseResult };

export class CommandParser {
	readonly vocabulary: Vocabulary;
	readonly classifier: Classifier;
	readonly syntax: SyntaxMatcher;
	readonly disambiguator: Disambiguator;
	private readonly config: ParserConfig;
	private readonly logger: Logger;
	private last?: ParsedCommand;

	constructor(options: CommandParserOptions) {
		this.vocabulary = options.vocabulary;
		this.syntax = options.syntax;
		this.disambiguator = options.disambiguator;
		this.logger = options.logger ?? defaultLogger;
		this.classifier = new Classifier(this.vocabulary, { logger: this.logger });
		this.config = {
			lenient_fallback:
				options.config?.lenient_fallback ?? CONFIG_DEFAULT.parser.lenient_fallback,
			max_candidates_listed:
				options.config?.max_candidates_listed ??
				CONFIG_DEFAULT.parser.max_candidates_listed,
			again_words: (
				options.config?.again_words ?? CONFIG_DEFAULT.parser.again_words
			).map((word) => word.toLowerCase()),
		};
	}

	/**
	 * The last valid command, which "again" replays.
	 */
	get lastCommand(): ParsedCommand | undefined {
		return this.last;
	}

	/**
	 * Parses one line of input from `viewpoint` (the player by default).
	 */
	parse(raw: string, viewpoint?: Entity): ParseResult {
		let words = tokenize(raw);
		while (words.length > 0 && (CONJUNCTIONS.has(words[0]) || SEPARATORS.has(words[0])))
			words = words.slice(1);
		if (words.length === 0) return failure(PARSE_ERROR.EMPTY_INPUT, raw);

		if (words.length === 1 && this.config.again_words.includes(words[0])) {
			if (!this.last) return failure(PARSE_ERROR.NOTHING_TO_REPEAT, raw);
			this.logger.debug(`repeating '${this.last.raw}'`);
			return { ...this.last, tokens: [...this.last.tokens] };
		}

		const split = words.findIndex((word) => CONJUNCTIONS.has(word) || SEPARATORS.has(word));
		let remainder: string | undefined;
		if (split !== -1) {
			const rest = words.slice(split + 1).join(" ").trim();
			remainder = rest.length > 0 ? rest : undefined;
			words = words.slice(0, split);
		}

		const shortcut = COMMAND_SHORTCUTS.get(words[0]);
		if (shortcut) words = [shortcut, ...words.slice(1)];

		const tokens = this.classifier.classify(words);
		const result = this.interpret(tokens, raw, remainder, viewpoint);
		if (result.valid) {
			this.last = result;
			this.logger.debug(
				`parsed '${raw}' as ${result.verb} ${describeReference(result.directObject)} ${
					result.preposition ?? "-"
				} ${describeReference(result.indirectObject)}${result.deferred ? " (deferred)" : ""}`
			);
		} else {
			this.logger.debug(`parse of '${raw}' failed: ${result.error}`);
		}
		return result;
	}

	private interpret(
		tokens: Token[],
		raw: string,
		remainder: string | undefined,
		viewpoint: Entity | undefined
	): ParseResult {
		const base = { valid: true as const, tokens, raw, remainder, deferred: false };

		const only = tokens.length === 1 ? tokens[0] : undefined;
		if (only?.type === WORD_TYPE.DIRECTION && isDirectionText(only.canonical))
			return {
				...base,
				verb: "go",
				directObject: { type: "direction", direction: only.canonical, text: only.word },
			};

		const match = this.syntax.match(tokens);
		if (match) {
			const references: Reference[] = [];
			for (const slot of match.slots) {
				const outcome = this.resolveSlot(slot, match.verb, raw, viewpoint);
				if ("failure" in outcome) return outcome.failure;
				references.push(outcome.reference);
			}
			return {
				...base,
				verb: match.verb,
				directObject: references[0],
				indirectObject: references[1],
				preposition: match.preposition,
			};
		}

		if (this.config.lenient_fallback) return this.fallback(tokens, base);
		return failure(PARSE_ERROR.NO_PATTERN_MATCH, raw);
	}

	private resolveSlot(
		slot: SlotBinding,
		verb: string,
		raw: string,
		viewpoint: Entity | undefined
	): SlotOutcome {
		switch (slot.type) {
			case "text":
				return { reference: { type: "text", text: slot.text } };
			case "direction": {
				const canonical = slot.tokens[0].canonical;
				if (!isDirectionText(canonical))
					return { failure: failure(PARSE_ERROR.NO_PATTERN_MATCH, raw) };
				return { reference: { type: "direction", direction: canonical, text: slot.text } };
			}
			case "topic": {
				const { head, modifiers } = nounPhrase(slot.tokens);
				const found = this.disambiguator.narrow(head, modifiers, { verb, viewpoint });
				if (found.length === 1)
					return { reference: { type: "entity", id: found[0].id, text: slot.text } };
				return { reference: { type: "text", text: slot.text } };
			}
			case "object": {
				const { head, modifiers } = nounPhrase(slot.tokens);
				const resolution = this.disambiguator.disambiguate(head, modifiers, {
					verb,
					viewpoint,
				});
				switch (resolution.status) {
					case "resolved":
						return {
							reference: { type: "entity", id: resolution.entity.id, text: slot.text },
						};
					case "ambiguous":
						return {
							failure: ambiguous(
								resolution.candidates,
								raw,
								this.config.max_candidates_listed
							),
						};
					case "not-found":
						return { failure: failure(PARSE_ERROR.NOT_FOUND, raw) };
				}
			}
		}
	}

	/**
	 * Token 0 is the verb, the words before the first preposition are the
	 * direct object and the words after it the indirect object.
	 */
	private fallback(
		tokens: Token[],
		base: Omit<ParsedCommand, "verb">
	): ParsedCommand {
		const rest = tokens.slice(1);
		const split = rest.findIndex((token) => token.type === WORD_TYPE.PREPOSITION);
		const before = split === -1 ? rest : rest.slice(0, split);
		const after = split === -1 ? [] : rest.slice(split + 1);
		const text = (list: Token[]): Reference | undefined =>
			list.length > 0
				? { type: "text", text: list.map((token) => token.word).join(" ") }
				: undefined;
		return {
			...base,
			verb: tokens[0].canonical,
			directObject: text(before),
			preposition: split === -1 ? undefined : rest[split].word,
			indirectObject: text(after),
			deferred: true,
		};
	}
}
