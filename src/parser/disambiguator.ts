/**
 * Narrows a noun phrase down to one entity.
 *
 * Given a head noun, its modifiers, and optionally the verb being attempted,
 * the disambiguator applies these filters in order, stopping as soon as one
 * candidate is left:
 *
 * 1. Scope entities the head names whose adjectives include every modifier.
 * 2. Visible entities.
 * 3. Accessible entities.
 * 4. Entities suited to the verb ("take" wants takeable things, "read" wants
 *    readable ones).
 * 5. Entities lying in the room, when others are in the viewpoint's hands.
 *
 * Steps 2 to 4 are skipped when they would leave nothing, so things seen
 * behind glass can still be named.
 *
 * Several survivors make the phrase ambiguous. The candidates are kept as
 * {@link Disambiguator.lastAmbiguous} so a follow-up question can be answered,
 * until {@link Disambiguator.clearAmbiguity} or the next clean resolution.
 *
 * @module parser/disambiguator
 */
import defaultLogger, { type Logger } from "../logger.js";
import { ENTITY_FLAG } from "../flags.js";
import type { Entity } from "../entity.js";
import type { World } from "../world.js";
import type { ScopeResolver } from "../scope.js";
import { entityAdjectives, entityNouns } from "./vocabulary.js";

export interface DisambiguationContext {
	/** Canonical verb of the command being parsed. */
	verb?: string;
	/** Whose scope to search. Defaults to the world's player. */
	viewpoint?: Entity;
}

export type Resolution =
	| { status: "resolved"; entity: Entity }
	| { status: "ambiguous"; candidates: Entity[] }
	| { status: "not-found" };

/**
 * Which entities a verb would rather act on.
 */
const VERB_PREFERENCES: ReadonlyMap<string, (entity: Entity) => boolean> = new Map([
	["take", (entity: Entity) => entity.canTake()],
	["open", (entity: Entity) => entity.hasFlag(ENTITY_FLAG.CONTAINER)],
	["close", (entity: Entity) => entity.hasFlag(ENTITY_FLAG.CONTAINER)],
	["read", (entity: Entity) => entity.hasFlag(ENTITY_FLAG.READABLE)],
	["talk", (entity: Entity) => entity.hasFlag(ENTITY_FLAG.PERSON)],
	["ask", (entity: Entity) => entity.hasFlag(ENTITY_FLAG.PERSON)],
	["tell", (entity: Entity) => entity.hasFlag(ENTITY_FLAG.PERSON)],
]);

export interface DisambiguatorOptions {
	logger?: Logger;
}

/**
 * Keeps the candidates that pass `test`, or all of them when none does.
 */
function keepAny(candidates: Entity[], test: (entity: Entity) => boolean): Entity[] {
	const kept = candidates.filter(test);
	return kept.length > 0 ? kept : candidates;
}

export class Disambiguator {
	private readonly logger: Logger;
	private ambiguity?: string[];

	constructor(
		private readonly world: World,
		private readonly scope: ScopeResolver,
		options: DisambiguatorOptions = {}
	) {
		this.logger = options.logger ?? defaultLogger;
	}

	/**
	 * Ids of the candidates from the last ambiguous phrase, if any.
	 */
	get lastAmbiguous(): readonly string[] | undefined {
		return this.ambiguity;
	}

	clearAmbiguity(): void {
		this.ambiguity = undefined;
	}

	/**
	 * Resolves a noun phrase, remembering the candidates when it is ambiguous.
	 */
	disambiguate(
		head: string,
		modifiers: readonly string[] = [],
		context: DisambiguationContext = {}
	): Resolution {
		const candidates = this.narrow(head, modifiers, context);
		if (candidates.length === 0) return { status: "not-found" };
		if (candidates.length === 1) {
			this.ambiguity = undefined;
			return { status: "resolved", entity: candidates[0] };
		}
		this.ambiguity = candidates.map((entity) => entity.id);
		return { status: "ambiguous", candidates };
	}

	/**
	 * Runs the filters and returns whatever survives. Changes no state.
	 */
	narrow(
		head: string,
		modifiers: readonly string[] = [],
		context: DisambiguationContext = {}
	): Entity[] {
		const viewpoint = context.viewpoint ?? this.world.player;
		const noun = head.toLowerCase();
		const wanted = modifiers.map((modifier) => modifier.toLowerCase());

		let candidates = this.scope
			.resolveScope(viewpoint)
			.map((id) => this.world.require(id))
			.filter((entity) => {
				if (!entityNouns(entity).includes(noun)) return false;
				const adjectives = entityAdjectives(entity);
				return wanted.every((modifier) => adjectives.includes(modifier));
			});
		this.trace("candidates", noun, candidates);
		if (candidates.length <= 1) return candidates;

		candidates = keepAny(candidates, (entity) => this.scope.isVisible(entity));
		this.trace("visible", noun, candidates);
		if (candidates.length <= 1) return candidates;

		candidates = keepAny(candidates, (entity) => this.scope.isAccessible(entity));
		this.trace("accessible", noun, candidates);
		if (candidates.length <= 1) return candidates;

		const prefers = context.verb ? VERB_PREFERENCES.get(context.verb) : undefined;
		if (prefers) {
			candidates = keepAny(candidates, prefers);
			this.trace(`suits '${context.verb}'`, noun, candidates);
			if (candidates.length <= 1) return candidates;
		}

		const room = viewpoint.room;
		const inRoom = candidates.filter((entity) => room !== undefined && entity.location === room);
		const held = candidates.filter((entity) => entity.location === viewpoint);
		if (inRoom.length > 0 && held.length > 0) {
			candidates = inRoom;
			this.trace("in room", noun, candidates);
		}
		return candidates;
	}

	private trace(step: string, noun: string, candidates: readonly Entity[]): void {
		this.logger.debug(
			`disambiguate '${noun}' ${step}: [${candidates.map((e) => e.id).join(", ")}]`
		);
	}
}
