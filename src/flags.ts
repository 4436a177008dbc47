/**
 * Entity flags: fixed boolean traits stored as a bitmask.
 *
 * This module provides:
 * - `ENTITY_FLAG` enum (one bit per trait)
 * - `FlagSet`, a compact mutable set of flags with O(1) operations
 * - Flag-to-text and text-to-flag conversion for declarative world data
 *
 * @example
 * ```typescript
 * import { ENTITY_FLAG, FlagSet } from "./flags.js";
 *
 * const flags = new FlagSet(ENTITY_FLAG.CONTAINER | ENTITY_FLAG.OPEN);
 * flags.has(ENTITY_FLAG.OPEN); // true
 * flags.clear(ENTITY_FLAG.OPEN);
 * flags.has(ENTITY_FLAG.OPEN); // false
 * ```
 *
 * @module flags
 */

/**
 * Boolean traits an entity can carry.
 * Every value is a single bit so any combination fits in one 32-bit integer.
 */
export enum ENTITY_FLAG {
	NONE = 0,
	TAKEABLE = 1 << 0,
	CONTAINER = 1 << 1,
	OPEN = 1 << 2,
	LOCKED = 1 << 3,
	/** Can provide light. */
	LIGHT = 1 << 4,
	/** Currently providing light. */
	LIT = 1 << 5,
	READABLE = 1 << 6,
	WEARABLE = 1 << 7,
	EDIBLE = 1 << 8,
	DRINKABLE = 1 << 9,
	WEAPON = 1 << 10,
	TOOL = 1 << 11,
	VEHICLE = 1 << 12,
	SURFACE = 1 << 13,
	TRANSPARENT = 1 << 14,
	INVISIBLE = 1 << 15,
	VISITED = 1 << 16,
	/** Cannot be dropped or taken away. */
	SACRED = 1 << 17,
	FEMALE = 1 << 18,
	PLURAL = 1 << 19,
	/** Never printed with an article. */
	NO_ARTICLE = 1 << 20,
	PROPER = 1 << 21,
	TOUCHABLE = 1 << 22,
	PERSON = 1 << 23,
	EVIDENCE = 1 << 24,
	/** Not visible until found. */
	HIDDEN = 1 << 25,
	/** Cannot be moved. */
	FIXED = 1 << 26,
	SEARCHED = 1 << 27,
	WORN = 1 << 28,
}

/**
 * Every flag value, in bit order.
 */
export const ENTITY_FLAGS: ReadonlyArray<ENTITY_FLAG> = [
	ENTITY_FLAG.TAKEABLE,
	ENTITY_FLAG.CONTAINER,
	ENTITY_FLAG.OPEN,
	ENTITY_FLAG.LOCKED,
	ENTITY_FLAG.LIGHT,
	ENTITY_FLAG.LIT,
	ENTITY_FLAG.READABLE,
	ENTITY_FLAG.WEARABLE,
	ENTITY_FLAG.EDIBLE,
	ENTITY_FLAG.DRINKABLE,
	ENTITY_FLAG.WEAPON,
	ENTITY_FLAG.TOOL,
	ENTITY_FLAG.VEHICLE,
	ENTITY_FLAG.SURFACE,
	ENTITY_FLAG.TRANSPARENT,
	ENTITY_FLAG.INVISIBLE,
	ENTITY_FLAG.VISITED,
	ENTITY_FLAG.SACRED,
	ENTITY_FLAG.FEMALE,
	ENTITY_FLAG.PLURAL,
	ENTITY_FLAG.NO_ARTICLE,
	ENTITY_FLAG.PROPER,
	ENTITY_FLAG.TOUCHABLE,
	ENTITY_FLAG.PERSON,
	ENTITY_FLAG.EVIDENCE,
	ENTITY_FLAG.HIDDEN,
	ENTITY_FLAG.FIXED,
	ENTITY_FLAG.SEARCHED,
	ENTITY_FLAG.WORN,
];

/**
 * Flags that change during play and are restored by a reset.
 */
export const MUTABLE_FLAGS: number =
	ENTITY_FLAG.OPEN |
	ENTITY_FLAG.LOCKED |
	ENTITY_FLAG.LIT |
	ENTITY_FLAG.VISITED |
	ENTITY_FLAG.SEARCHED |
	ENTITY_FLAG.WORN |
	ENTITY_FLAG.HIDDEN;

/**
 * Text names of each flag, as written in world data.
 */
export type FlagText =
	| "takeable"
	| "container"
	| "open"
	| "locked"
	| "light"
	| "lit"
	| "readable"
	| "wearable"
	| "edible"
	| "drinkable"
	| "weapon"
	| "tool"
	| "vehicle"
	| "surface"
	| "transparent"
	| "invisible"
	| "visited"
	| "sacred"
	| "female"
	| "plural"
	| "no_article"
	| "proper"
	| "touchable"
	| "person"
	| "evidence"
	| "hidden"
	| "fixed"
	| "searched"
	| "worn";

export const FLAG2TEXT: ReadonlyMap<ENTITY_FLAG, FlagText> = new Map<
	ENTITY_FLAG,
	FlagText
>([
	[ENTITY_FLAG.TAKEABLE, "takeable"],
	[ENTITY_FLAG.CONTAINER, "container"],
	[ENTITY_FLAG.OPEN, "open"],
	[ENTITY_FLAG.LOCKED, "locked"],
	[ENTITY_FLAG.LIGHT, "light"],
	[ENTITY_FLAG.LIT, "lit"],
	[ENTITY_FLAG.READABLE, "readable"],
	[ENTITY_FLAG.WEARABLE, "wearable"],
	[ENTITY_FLAG.EDIBLE, "edible"],
	[ENTITY_FLAG.DRINKABLE, "drinkable"],
	[ENTITY_FLAG.WEAPON, "weapon"],
	[ENTITY_FLAG.TOOL, "tool"],
	[ENTITY_FLAG.VEHICLE, "vehicle"],
	[ENTITY_FLAG.SURFACE, "surface"],
	[ENTITY_FLAG.TRANSPARENT, "transparent"],
	[ENTITY_FLAG.INVISIBLE, "invisible"],
	[ENTITY_FLAG.VISITED, "visited"],
	[ENTITY_FLAG.SACRED, "sacred"],
	[ENTITY_FLAG.FEMALE, "female"],
	[ENTITY_FLAG.PLURAL, "plural"],
	[ENTITY_FLAG.NO_ARTICLE, "no_article"],
	[ENTITY_FLAG.PROPER, "proper"],
	[ENTITY_FLAG.TOUCHABLE, "touchable"],
	[ENTITY_FLAG.PERSON, "person"],
	[ENTITY_FLAG.EVIDENCE, "evidence"],
	[ENTITY_FLAG.HIDDEN, "hidden"],
	[ENTITY_FLAG.FIXED, "fixed"],
	[ENTITY_FLAG.SEARCHED, "searched"],
	[ENTITY_FLAG.WORN, "worn"],
]);

/**
 * Accepted spellings of each flag, including older names found in data.
 */
const TEXT2FLAG: ReadonlyMap<string, ENTITY_FLAG> = new Map<string, ENTITY_FLAG>([
	...Array.from(FLAG2TEXT.entries()).map(
		([flag, text]): [string, ENTITY_FLAG] => [text, flag]
	),
	["light_source", ENTITY_FLAG.LIGHT],
	["on", ENTITY_FLAG.LIT],
	["narticle", ENTITY_FLAG.NO_ARTICLE],
]);

/**
 * Convert a flag to its text name.
 *
 * @example
 * ```typescript
 * flag2text(ENTITY_FLAG.TAKEABLE); // "takeable"
 * ```
 */
export function flag2text(flag: ENTITY_FLAG): FlagText | undefined {
	return FLAG2TEXT.get(flag);
}

/**
 * Convert a flag name from world data to its flag.
 * Matching is case-insensitive and accepts `-` or space for `_`.
 *
 * @example
 * ```typescript
 * text2flag("TAKEABLE");     // ENTITY_FLAG.TAKEABLE
 * text2flag("light-source"); // ENTITY_FLAG.LIGHT
 * text2flag("sparkly");      // undefined
 * ```
 */
export function text2flag(text: string): ENTITY_FLAG | undefined {
	const normalized = text.trim().toLowerCase().replace(/[\s-]+/g, "_");
	return TEXT2FLAG.get(normalized);
}

/**
 * A mutable set of entity flags backed by a single integer.
 */
export class FlagSet {
	private bits: number;

	constructor(bits: number = ENTITY_FLAG.NONE) {
		this.bits = bits;
	}

	/**
	 * The raw bitmask.
	 */
	get value(): number {
		return this.bits;
	}

	has(flag: ENTITY_FLAG): boolean {
		return (this.bits & flag) !== 0;
	}

	set(flag: ENTITY_FLAG): void {
		this.bits |= flag;
	}

	clear(flag: ENTITY_FLAG): void {
		this.bits &= ~flag;
	}

	toggle(flag: ENTITY_FLAG): void {
		this.bits ^= flag;
	}

	/**
	 * Replace the whole set with a raw bitmask.
	 */
	assign(bits: number): void {
		this.bits = bits;
	}

	/**
	 * Text names of every flag currently set, in bit order.
	 */
	toText(): FlagText[] {
		const names: FlagText[] = [];
		for (const flag of ENTITY_FLAGS) {
			const text = FLAG2TEXT.get(flag);
			if (text && this.has(flag)) names.push(text);
		}
		return names;
	}

	/**
	 * Build a flag set from flag names.
	 * Unknown names are returned in `unknown` instead of being applied.
	 */
	static fromText(names: Iterable<string>): {
		flags: FlagSet;
		unknown: string[];
	} {
		const flags = new FlagSet();
		const unknown: string[] = [];
		for (const name of names) {
			const flag = text2flag(name);
			if (flag === undefined) unknown.push(name);
			else flags.set(flag);
		}
		return { flags, unknown };
	}
}
