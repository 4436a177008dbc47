/**
 * Syntax patterns and the matcher that fits classified tokens to them.
 *
 * ## Pattern Syntax
 *
 * A pattern is a trigger verb followed by literal word groups and slots:
 * - `put <direct:object> in|into <indirect:object>` - two object slots split
 *   by either preposition
 * - `look under <direct:object>` - a leading preposition before the slot
 * - `ask <direct:object> about <topic:topic>` - a loosely resolved topic
 * - `search <direct:object?>` - `?` marks an optional slot
 * - `* <direct:object>` - `*` as the trigger accepts any verb
 *
 * ### Slot Types
 * - `object` - a noun phrase resolved to an entity in scope
 * - `topic` - a noun phrase that resolves to an entity when it can, and is
 *   kept as text when it cannot
 * - `text` - everything that follows, kept as text
 * - `direction` - a single direction word
 *
 * Two slots may not sit side by side; a literal group always separates them.
 *
 * ## Matching
 *
 * The first token must be a VERB whose canonical form is the trigger.
 * Literal groups must match the next token. A slot gathers tokens until it
 * reaches a preposition; that preposition must then be one the pattern
 * expects next. The last slot takes whatever remains, prepositions included
 * ("portrait of the duke"). Every token must be consumed. Patterns are tried in
 * registration order and the first structural match wins, even if its noun
 * phrases later fail to resolve.
 *
 * @module parser/syntax
 */
import defaultLogger, { type Logger } from "../logger.js";
import { SyntaxPatternError } from "../errors.js";
import { WORD_TYPE } from "./vocabulary.js";
import type { Token } from "./classifier.js";

export type SlotType = "object" | "topic" | "text" | "direction";

const SLOT_TYPES: ReadonlyArray<SlotType> = ["object", "topic", "text", "direction"];

function isSlotType(value: string): value is SlotType {
	return SLOT_TYPES.some((type) => type === value);
}

export interface SlotElement {
	kind: "slot";
	name: string;
	type: SlotType;
	required: boolean;
}

export interface LiteralElement {
	kind: "literal";
	words: ReadonlySet<string>;
}

export type PatternElement = SlotElement | LiteralElement;

/**
 * A declarative pattern entry, as found in syntax tables.
 */
export interface SyntaxTableEntry {
	pattern: string;
	/** Canonical verb reported on a match. Defaults to the trigger. */
	verb?: string;
}

export interface SlotBinding {
	name: string;
	type: SlotType;
	tokens: Token[];
	text: string;
}

export interface SyntaxMatch {
	pattern: SyntaxPattern;
	verb: string;
	/** Filled slots, in pattern order. */
	slots: SlotBinding[];
	/** The last literal word matched, if any. */
	preposition?: string;
}

export class SyntaxPattern {
	readonly source: string;
	readonly trigger: string;
	readonly verb?: string;
	readonly elements: readonly PatternElement[];

	constructor(entry: SyntaxTableEntry | string) {
		const { pattern, verb } =
			typeof entry === "string" ? { pattern: entry, verb: undefined } : entry;
		this.source = pattern;
		this.verb = verb?.toLowerCase();
		const parts = pattern.trim().split(/\s+/).filter(Boolean);
		const trigger = parts.shift();
		if (trigger === undefined) throw new SyntaxPatternError(pattern, "pattern is empty");
		if (trigger.startsWith("<"))
			throw new SyntaxPatternError(pattern, "pattern must start with a verb");
		this.trigger = trigger.toLowerCase();
		this.elements = SyntaxPattern.compile(pattern, parts);
	}

	private static compile(pattern: string, parts: string[]): PatternElement[] {
		const elements: PatternElement[] = [];
		const slotRegex = /^<([^:>]+):([^>]+?)(\?)?>$/;
		for (const part of parts) {
			const previous = elements[elements.length - 1];
			if (elements.some((e) => e.kind === "slot" && e.type === "text"))
				throw new SyntaxPatternError(pattern, "a text slot must come last");
			if (part.startsWith("<")) {
				const match = slotRegex.exec(part);
				if (!match) throw new SyntaxPatternError(pattern, `malformed slot '${part}'`);
				const [, name, type, optional] = match;
				if (!isSlotType(type))
					throw new SyntaxPatternError(pattern, `unknown slot type '${type}'`);
				if (previous?.kind === "slot")
					throw new SyntaxPatternError(
						pattern,
						`slot '${name}' needs a word between it and slot '${previous.name}'`
					);
				elements.push({ kind: "slot", name, type, required: optional === undefined });
			} else {
				const words = part.toLowerCase().split("|").filter(Boolean);
				if (words.length === 0)
					throw new SyntaxPatternError(pattern, `empty word group '${part}'`);
				elements.push({ kind: "literal", words: new Set(words) });
			}
		}
		return elements;
	}

	get slots(): SlotElement[] {
		return this.elements.filter((e): e is SlotElement => e.kind === "slot");
	}

	/**
	 * Fits the tokens to this pattern, or returns undefined.
	 */
	match(tokens: readonly Token[]): SyntaxMatch | undefined {
		const first = tokens[0];
		if (!first || first.type !== WORD_TYPE.VERB) return undefined;
		if (this.trigger !== "*" && first.canonical !== this.trigger) return undefined;

		const slots: SlotBinding[] = [];
		let preposition: string | undefined;
		let position = 1;

		for (let index = 0; index < this.elements.length; index++) {
			const element = this.elements[index];
			if (element.kind === "literal") {
				const token = tokens[position];
				if (!token || !element.words.has(token.word)) return undefined;
				preposition = token.word;
				position++;
				continue;
			}

			const next = this.elements[index + 1];
			const taken: Token[] = [];
			if (element.type === "text" || next === undefined) {
				taken.push(...tokens.slice(position));
			} else {
				while (position + taken.length < tokens.length) {
					const token = tokens[position + taken.length];
					const closes =
						token.type === WORD_TYPE.PREPOSITION ||
						(next?.kind === "literal" && next.words.has(token.word));
					if (closes) break;
					taken.push(token);
				}
			}

			if (taken.length === 0) {
				if (element.required) return undefined;
				continue;
			}
			if (
				element.type === "direction" &&
				(taken.length !== 1 || taken[0].type !== WORD_TYPE.DIRECTION)
			)
				return undefined;
			position += taken.length;
			slots.push({
				name: element.name,
				type: element.type,
				tokens: taken,
				text: taken.map((token) => token.word).join(" "),
			});
		}

		if (position !== tokens.length) return undefined;
		return {
			pattern: this,
			verb: this.verb ?? (this.trigger === "*" ? first.canonical : this.trigger),
			slots,
			preposition,
		};
	}

	toString(): string {
		return this.source;
	}
}

export interface SyntaxMatcherOptions {
	logger?: Logger;
}

/**
 * Ordered set of syntax patterns.
 */
export class SyntaxMatcher {
	private readonly patterns: SyntaxPattern[] = [];
	private readonly logger: Logger;

	constructor(options: SyntaxMatcherOptions = {}) {
		this.logger = options.logger ?? defaultLogger;
	}

	add(entry: SyntaxTableEntry | string | SyntaxPattern): SyntaxPattern {
		const pattern = entry instanceof SyntaxPattern ? entry : new SyntaxPattern(entry);
		this.patterns.push(pattern);
		return pattern;
	}

	/**
	 * Adds every entry of a syntax table, after the patterns already present.
	 */
	load(table: readonly (SyntaxTableEntry | string)[]): void {
		for (const entry of table) this.add(entry);
	}

	list(): readonly SyntaxPattern[] {
		return [...this.patterns];
	}

	get size(): number {
		return this.patterns.length;
	}

	/**
	 * The first pattern that fits the tokens structurally.
	 */
	match(tokens: readonly Token[]): SyntaxMatch | undefined {
		for (const pattern of this.patterns) {
			const match = pattern.match(tokens);
			if (match) {
				this.logger.debug(`matched pattern '${pattern.source}' as '${match.verb}'`);
				return match;
			}
		}
		this.logger.debug(
			`no pattern matched: ${tokens.map((token) => token.word).join(" ")}`
		);
		return undefined;
	}
}
