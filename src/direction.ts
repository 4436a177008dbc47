/**
 * Direction utilities for movement between rooms.
 *
 * This module provides:
 * - Direction enum and constants
 * - Direction-to-text and text-to-direction conversion (full and short forms)
 * - Direction helpers (reverse)
 *
 * Room exits are keyed by the full text of a direction (`"north"`, `"in"`),
 * so world data stays readable and exit tables serialize as plain objects.
 *
 * @module direction
 */

/**
 * Enum for directions the player can move in.
 *
 * @example
 * ```typescript
 * import { DIRECTION, dir2text } from "./direction.js";
 *
 * const exit = room.exitTo(dir2text(DIRECTION.NORTH));
 * ```
 */
export enum DIRECTION {
	NORTH = 1 << 0,
	SOUTH = 1 << 1,
	EAST = 1 << 2,
	WEST = 1 << 3,
	NORTHEAST = 1 << 4,
	NORTHWEST = 1 << 5,
	SOUTHEAST = 1 << 6,
	SOUTHWEST = 1 << 7,
	UP = 1 << 8,
	DOWN = 1 << 9,
	IN = 1 << 10,
	OUT = 1 << 11,
}

/**
 * Every direction, cardinal first, then diagonal, vertical and in/out.
 */
export const DIRECTIONS: ReadonlyArray<DIRECTION> = [
	DIRECTION.NORTH,
	DIRECTION.SOUTH,
	DIRECTION.EAST,
	DIRECTION.WEST,
	DIRECTION.NORTHEAST,
	DIRECTION.NORTHWEST,
	DIRECTION.SOUTHEAST,
	DIRECTION.SOUTHWEST,
	DIRECTION.UP,
	DIRECTION.DOWN,
	DIRECTION.IN,
	DIRECTION.OUT,
];

const DIR2REVERSE: ReadonlyMap<DIRECTION, DIRECTION> = new Map<
	DIRECTION,
	DIRECTION
>([
	[DIRECTION.NORTH, DIRECTION.SOUTH],
	[DIRECTION.SOUTH, DIRECTION.NORTH],
	[DIRECTION.EAST, DIRECTION.WEST],
	[DIRECTION.WEST, DIRECTION.EAST],
	[DIRECTION.NORTHEAST, DIRECTION.SOUTHWEST],
	[DIRECTION.NORTHWEST, DIRECTION.SOUTHEAST],
	[DIRECTION.SOUTHEAST, DIRECTION.NORTHWEST],
	[DIRECTION.SOUTHWEST, DIRECTION.NORTHEAST],
	[DIRECTION.UP, DIRECTION.DOWN],
	[DIRECTION.DOWN, DIRECTION.UP],
	[DIRECTION.IN, DIRECTION.OUT],
	[DIRECTION.OUT, DIRECTION.IN],
]);

/**
 * Gets the opposite of a direction.
 *
 * @example
 * ```typescript
 * dir2reverse(DIRECTION.NORTH); // DIRECTION.SOUTH
 * dir2reverse(DIRECTION.IN);    // DIRECTION.OUT
 * ```
 */
export function dir2reverse(dir: DIRECTION): DIRECTION | undefined {
	return DIR2REVERSE.get(dir);
}

/**
 * Full text name of a direction. This is the canonical form the parser
 * reports and the key room exits are stored under.
 */
export type DirectionText =
	| "north"
	| "south"
	| "east"
	| "west"
	| "northeast"
	| "northwest"
	| "southeast"
	| "southwest"
	| "up"
	| "down"
	| "in"
	| "out";

/**
 * Abbreviated text name of a direction. `in` and `out` have no abbreviation.
 */
export type DirectionTextShort =
	| "n"
	| "s"
	| "e"
	| "w"
	| "ne"
	| "nw"
	| "se"
	| "sw"
	| "u"
	| "d";

export const DIR2TEXT: ReadonlyMap<DIRECTION, DirectionText> = new Map<
	DIRECTION,
	DirectionText
>([
	[DIRECTION.NORTH, "north"],
	[DIRECTION.SOUTH, "south"],
	[DIRECTION.EAST, "east"],
	[DIRECTION.WEST, "west"],
	[DIRECTION.NORTHEAST, "northeast"],
	[DIRECTION.NORTHWEST, "northwest"],
	[DIRECTION.SOUTHEAST, "southeast"],
	[DIRECTION.SOUTHWEST, "southwest"],
	[DIRECTION.UP, "up"],
	[DIRECTION.DOWN, "down"],
	[DIRECTION.IN, "in"],
	[DIRECTION.OUT, "out"],
]);

export const DIR2TEXT_SHORT: ReadonlyMap<DIRECTION, DirectionTextShort> =
	new Map<DIRECTION, DirectionTextShort>([
		[DIRECTION.NORTH, "n"],
		[DIRECTION.SOUTH, "s"],
		[DIRECTION.EAST, "e"],
		[DIRECTION.WEST, "w"],
		[DIRECTION.NORTHEAST, "ne"],
		[DIRECTION.NORTHWEST, "nw"],
		[DIRECTION.SOUTHEAST, "se"],
		[DIRECTION.SOUTHWEST, "sw"],
		[DIRECTION.UP, "u"],
		[DIRECTION.DOWN, "d"],
	]);

/**
 * Every word the parser accepts as a direction, mapped to its direction.
 * Covers full names, abbreviations and a few spelled-out variants.
 */
const WORD2DIR: ReadonlyMap<string, DIRECTION> = new Map<string, DIRECTION>([
	...Array.from(DIR2TEXT.entries()).map(
		([dir, text]): [string, DIRECTION] => [text, dir]
	),
	...Array.from(DIR2TEXT_SHORT.entries()).map(
		([dir, text]): [string, DIRECTION] => [text, dir]
	),
	["inside", DIRECTION.IN],
	["outside", DIRECTION.OUT],
	["upstairs", DIRECTION.UP],
	["downstairs", DIRECTION.DOWN],
]);

/**
 * Converts a direction to its text form.
 *
 * @example
 * ```typescript
 * dir2text(DIRECTION.NORTH);       // "north"
 * dir2text(DIRECTION.NORTH, true); // "n"
 * dir2text(DIRECTION.IN, true);    // "in"
 * ```
 */
export function dir2text(dir: DIRECTION): DirectionText;
export function dir2text(
	dir: DIRECTION,
	short: true
): DirectionTextShort | DirectionText;
export function dir2text(
	dir: DIRECTION,
	short = false
): DirectionText | DirectionTextShort {
	const full = DIR2TEXT.get(dir);
	if (full === undefined) throw new RangeError(`unknown direction ${dir}`);
	if (!short) return full;
	return DIR2TEXT_SHORT.get(dir) ?? full;
}

/**
 * Converts any accepted direction word to its direction.
 * Returns undefined for words that are not directions.
 *
 * @example
 * ```typescript
 * text2dir("n");      // DIRECTION.NORTH
 * text2dir("Inside"); // DIRECTION.IN
 * text2dir("key");    // undefined
 * ```
 */
export function text2dir(text: string): DIRECTION | undefined {
	return WORD2DIR.get(text.toLowerCase());
}

/**
 * Whether a word names a direction.
 */
export function isDirectionWord(text: string): boolean {
	return WORD2DIR.has(text.toLowerCase());
}

/**
 * Type guard for the full text form of a direction.
 */
export function isDirectionText(text: string): text is DirectionText {
	for (const value of DIR2TEXT.values()) if (value === text) return true;
	return false;
}
