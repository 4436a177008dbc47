/**
 * Every word the parser knows, with its type and canonical form.
 *
 * A word may carry several entries (homonyms such as "in", which is both a
 * direction and a preposition, or "light", a verb and a noun). Entries keep
 * their registration order; the classifier picks among them by context.
 *
 * The vocabulary holds verbs and other words from declarative tables, plus the
 * nouns and adjectives of the entities in the world. The closed word lists
 * (articles, conjunctions, prepositions, shortcuts and meta-commands) live here
 * as constants; direction words come from the direction module.
 *
 * @module parser/vocabulary
 */
import { DIR2TEXT, DIR2TEXT_SHORT } from "../direction.js";
import type { Entity } from "../entity.js";
import type { World } from "../world.js";

/**
 * Word types the classifier assigns.
 */
export enum WORD_TYPE {
	VERB = "verb",
	NOUN = "noun",
	ADJECTIVE = "adjective",
	PREPOSITION = "preposition",
	ARTICLE = "article",
	CONJUNCTION = "conjunction",
	DIRECTION = "direction",
	NUMBER = "number",
	SPECIAL = "special",
	UNKNOWN = "unknown",
}

const WORD_TYPES: ReadonlyArray<WORD_TYPE> = [
	WORD_TYPE.VERB,
	WORD_TYPE.NOUN,
	WORD_TYPE.ADJECTIVE,
	WORD_TYPE.PREPOSITION,
	WORD_TYPE.ARTICLE,
	WORD_TYPE.CONJUNCTION,
	WORD_TYPE.DIRECTION,
	WORD_TYPE.NUMBER,
	WORD_TYPE.SPECIAL,
	WORD_TYPE.UNKNOWN,
];

export function text2wordType(text: string): WORD_TYPE | undefined {
	const lower = text.toLowerCase();
	return WORD_TYPES.find((type) => type === lower);
}

export const ARTICLES: ReadonlySet<string> = new Set(["a", "an", "the", "some"]);

export const CONJUNCTIONS: ReadonlySet<string> = new Set(["and", "then"]);

/** Punctuation the tokenizer keeps as tokens of their own. */
export const SEPARATORS: ReadonlySet<string> = new Set([",", "."]);

export const PREPOSITIONS: ReadonlySet<string> = new Set([
	"in",
	"on",
	"at",
	"to",
	"with",
	"from",
	"into",
	"onto",
	"under",
	"behind",
	"about",
	"for",
	"through",
	"across",
	"over",
	"around",
	"near",
	"beside",
	"between",
	"inside",
	"of",
	"off",
]);

/**
 * One-letter commands expanded before classification.
 * `g` is not here: repeating is handled through the configured again words.
 */
export const COMMAND_SHORTCUTS: ReadonlyMap<string, string> = new Map([
	["i", "inventory"],
	["l", "look"],
	["x", "examine"],
	["z", "wait"],
	["q", "quit"],
]);

/** Commands about the game rather than the world. */
export const META_COMMANDS: ReadonlySet<string> = new Set([
	"save",
	"restore",
	"load",
	"quit",
	"restart",
	"score",
	"inventory",
	"help",
	"about",
	"verbose",
	"brief",
	"superbrief",
	"version",
	"transcript",
]);

/** Canonical verbs after which a direction word means a direction. */
export const MOVEMENT_VERBS: ReadonlySet<string> = new Set([
	"go",
	"enter",
	"exit",
	"climb",
]);

export interface VocabularyEntry {
	word: string;
	type: WORD_TYPE;
	canonical: string;
	entityIds: string[];
}

/**
 * Declarative word table: word type, then canonical form, then the surface
 * words that map to it.
 *
 * ```yaml
 * verb:
 *   take: [take, get, grab]
 * adjective:
 *   brass: [brass, brassy]
 * ```
 */
export type VocabularyTable = Partial<Record<WORD_TYPE, Record<string, string[]>>>;

/**
 * Words an entity answers to as the head of a noun phrase: its synonyms, its
 * name when that is one word, and the last word of a longer name.
 */
export function entityNouns(entity: Entity): string[] {
	const nouns = new Set(entity.synonyms);
	const words = entity.name.toLowerCase().split(/\s+/).filter(Boolean);
	if (words.length > 0) nouns.add(words[words.length - 1]);
	return Array.from(nouns);
}

/**
 * Words that may modify a noun phrase naming the entity: its adjectives and
 * the leading words of a longer name ("brass" in "brass key").
 */
export function entityAdjectives(entity: Entity): string[] {
	const adjectives = new Set(entity.adjectives);
	const words = entity.name.toLowerCase().split(/\s+/).filter(Boolean);
	for (const word of words.slice(0, -1)) adjectives.add(word);
	return Array.from(adjectives);
}

export interface VocabularyOptions {
	/**
	 * Seed the built-in direction and preposition words.
	 * @default true
	 */
	builtins?: boolean;
}

export class Vocabulary {
	private readonly words = new Map<string, VocabularyEntry[]>();

	constructor(options: VocabularyOptions = {}) {
		if (options.builtins ?? true) {
			for (const text of DIR2TEXT.values())
				this.add(text, WORD_TYPE.DIRECTION);
			for (const [dir, text] of DIR2TEXT_SHORT) {
				const full = DIR2TEXT.get(dir);
				if (full) this.add(text, WORD_TYPE.DIRECTION, full);
			}
			this.add("inside", WORD_TYPE.DIRECTION, "in");
			this.add("outside", WORD_TYPE.DIRECTION, "out");
			for (const word of PREPOSITIONS) this.add(word, WORD_TYPE.PREPOSITION);
		}
	}

	/**
	 * Adds an entry. A word that already has an entry of the same type keeps
	 * that entry and gains the entity ids instead.
	 */
	add(
		word: string,
		type: WORD_TYPE,
		canonical?: string,
		entityIds: readonly string[] = []
	): VocabularyEntry {
		const key = word.toLowerCase();
		const list = this.words.get(key) ?? [];
		const existing = list.find((entry) => entry.type === type);
		if (existing) {
			for (const id of entityIds)
				if (!existing.entityIds.includes(id)) existing.entityIds.push(id);
			return existing;
		}
		const entry: VocabularyEntry = {
			word: key,
			type,
			canonical: (canonical ?? key).toLowerCase(),
			entityIds: [...entityIds],
		};
		list.push(entry);
		this.words.set(key, list);
		return entry;
	}

	/**
	 * Every entry for a word, in registration order.
	 */
	lookup(word: string): readonly VocabularyEntry[] {
		return this.words.get(word.toLowerCase()) ?? [];
	}

	has(word: string, type?: WORD_TYPE): boolean {
		const entries = this.lookup(word);
		return type === undefined
			? entries.length > 0
			: entries.some((entry) => entry.type === type);
	}

	/**
	 * Canonical form of a word, from its first entry (of `type`, if given).
	 */
	canonical(word: string, type?: WORD_TYPE): string | undefined {
		return this.lookup(word).find(
			(entry) => type === undefined || entry.type === type
		)?.canonical;
	}

	/**
	 * Ids of the entities a noun can refer to.
	 */
	entitiesFor(noun: string): string[] {
		const ids: string[] = [];
		for (const entry of this.lookup(noun))
			if (entry.type === WORD_TYPE.NOUN)
				for (const id of entry.entityIds) if (!ids.includes(id)) ids.push(id);
		return ids;
	}

	/**
	 * Loads a declarative word table.
	 */
	load(table: VocabularyTable): void {
		for (const type of WORD_TYPES) {
			const group = table[type];
			if (!group) continue;
			for (const [canonical, words] of Object.entries(group)) {
				this.add(canonical, type, canonical);
				for (const word of words) this.add(word, type, canonical);
			}
		}
	}

	/**
	 * Adds an entity's nouns and adjectives, each carrying its id.
	 */
	registerEntity(entity: Entity): void {
		for (const noun of entityNouns(entity))
			this.add(noun, WORD_TYPE.NOUN, noun, [entity.id]);
		for (const adjective of entityAdjectives(entity))
			this.add(adjective, WORD_TYPE.ADJECTIVE, adjective, [entity.id]);
	}

	/**
	 * Registers every entity in the world except the player.
	 */
	registerWorld(world: World): void {
		for (const entity of world.entities())
			if (entity.kind !== "player") this.registerEntity(entity);
	}

	get size(): number {
		return this.words.size;
	}
}
