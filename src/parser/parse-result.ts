/**
 * The terminal artifact of a parse: a command ready to dispatch, or a typed
 * failure with a message for the player.
 *
 * @module parser/parse-result
 */
import type { DirectionText } from "../direction.js";
import type { Token } from "./classifier.js";

export enum PARSE_ERROR {
	EMPTY_INPUT = "EMPTY_INPUT",
	NO_PATTERN_MATCH = "NO_PATTERN_MATCH",
	AMBIGUOUS = "AMBIGUOUS",
	NOT_FOUND = "NOT_FOUND",
	NOTHING_TO_REPEAT = "NOTHING_TO_REPEAT",
}

export const PARSE_MESSAGES: Readonly<Record<Exclude<PARSE_ERROR, PARSE_ERROR.AMBIGUOUS>, string>> = {
	[PARSE_ERROR.EMPTY_INPUT]: "Please enter a command.",
	[PARSE_ERROR.NO_PATTERN_MATCH]: "I don't understand that.",
	[PARSE_ERROR.NOT_FOUND]: "I don't see that here.",
	[PARSE_ERROR.NOTHING_TO_REPEAT]: "No previous command to repeat.",
};

/** A noun phrase resolved to an entity. */
export interface EntityReference {
	type: "entity";
	id: string;
	text: string;
}

/** A direction word, by its full name. */
export interface DirectionReference {
	type: "direction";
	direction: DirectionText;
	text: string;
}

/**
 * Text left unresolved: a `text` slot, a topic that named no single entity,
 * or a slot of a deferred (fallback) parse.
 */
export interface TextReference {
	type: "text";
	text: string;
}

export type Reference = EntityReference | DirectionReference | TextReference;

export interface ParsedCommand {
	valid: true;
	verb: string;
	directObject?: Reference;
	indirectObject?: Reference;
	preposition?: string;
	tokens: Token[];
	raw: string;
	/**
	 * True when no pattern matched and the permissive fallback produced this
	 * command. Its references are text and have not been checked against the
	 * world.
	 */
	deferred: boolean;
	/** Input after the first conjunction or separator, for the next turn. */
	remainder?: string;
}

export interface ParseFailure {
	valid: false;
	error: PARSE_ERROR;
	message: string;
	/** Entity ids the player must choose between (AMBIGUOUS only). */
	candidates: string[];
	raw: string;
}

export type ParseResult = ParsedCommand | ParseFailure;

export function failure(
	error: Exclude<PARSE_ERROR, PARSE_ERROR.AMBIGUOUS>,
	raw: string
): ParseFailure {
	return { valid: false, error, message: PARSE_MESSAGES[error], candidates: [], raw };
}

/**
 * "Which do you mean, the X, the Y or the Z?"
 * Names past `limit` are left out of the question.
 */
export function ambiguityMessage(names: readonly string[], limit = 5): string {
	const listed = names.slice(0, Math.max(limit, 2)).map((name) => `the ${name}`);
	const last = listed.pop();
	if (listed.length === 0 || last === undefined) return `Which do you mean, ${last ?? "that"}?`;
	return `Which do you mean, ${listed.join(", ")} or ${last}?`;
}

export function ambiguous(
	candidates: readonly { id: string; name: string }[],
	raw: string,
	limit?: number
): ParseFailure {
	return {
		valid: false,
		error: PARSE_ERROR.AMBIGUOUS,
		message: ambiguityMessage(
			candidates.map((candidate) => candidate.name),
			limit
		),
		candidates: candidates.map((candidate) => candidate.id),
		raw,
	};
}

/**
 * Short text form of a reference, for logs.
 */
export function describeReference(reference: Reference | undefined): string {
	if (!reference) return "-";
	switch (reference.type) {
		case "entity":
			return `#${reference.id}`;
		case "direction":
			return reference.direction;
		case "text":
			return `"${reference.text}"`;
	}
}
