/**
 * Scope resolution: what a viewpoint can currently refer to.
 *
 * Scope is computed on demand from the containment graph and is never cached,
 * so it always reflects the latest moves and flag changes. Resolving scope
 * reads the world and changes nothing.
 *
 * Rules
 * - Walk the viewpoint's room depth first, then the viewpoint's own contents.
 * - Enter an entity's contents only if it is not a container, or it is an open
 *   or transparent container.
 * - Skip INVISIBLE and HIDDEN entities along with everything inside them.
 * - A room that needs light and holds no lit light source is dark, and a dark
 *   room has an empty scope.
 *
 * @module scope
 */
import defaultLogger, { type Logger } from "./logger.js";
import { ENTITY_FLAG } from "./flags.js";
import type { Entity } from "./entity.js";

export interface ScopeResolverOptions {
	logger?: Logger;
}

function concealed(entity: Entity): boolean {
	return (
		entity.hasFlag(ENTITY_FLAG.INVISIBLE) || entity.hasFlag(ENTITY_FLAG.HIDDEN)
	);
}

/**
 * Whether the contents of an entity can be seen from outside it.
 */
export function revealsContents(entity: Entity): boolean {
	if (!entity.hasFlag(ENTITY_FLAG.CONTAINER)) return true;
	return (
		entity.hasFlag(ENTITY_FLAG.OPEN) || entity.hasFlag(ENTITY_FLAG.TRANSPARENT)
	);
}

/**
 * Ancestors of an entity that sit below its room, nearest first.
 */
function ancestorsBelowRoom(entity: Entity): Entity[] {
	const chain: Entity[] = [];
	for (const ancestor of entity.ancestors()) {
		if (ancestor.kind === "room") break;
		chain.push(ancestor);
	}
	return chain;
}

export class ScopeResolver {
	private readonly logger: Logger;

	constructor(options: ScopeResolverOptions = {}) {
		this.logger = options.logger ?? defaultLogger;
	}

	/**
	 * Ids of every entity `viewpoint` can refer to, in walk order.
	 * The viewpoint itself is never included.
	 */
	resolveScope(viewpoint: Entity): string[] {
		const room = viewpoint.room;
		if (room && this.isDark(room)) {
			this.logger.debug(`scope of '${viewpoint.id}' is empty: '${room.id}' is dark`);
			return [];
		}

		const seen = new Set<string>();
		const visit = (entity: Entity): void => {
			if (entity === viewpoint || seen.has(entity.id) || concealed(entity))
				return;
			seen.add(entity.id);
			if (revealsContents(entity))
				for (const child of entity.contents) visit(child);
		};

		if (room) for (const entity of room.contents) visit(entity);
		for (const entity of viewpoint.contents) visit(entity);

		const scope = Array.from(seen);
		this.logger.debug(`scope of '${viewpoint.id}': ${scope.join(", ")}`);
		return scope;
	}

	/**
	 * Whether `entity` is currently in `viewpoint`'s scope.
	 */
	inScope(entity: Entity, viewpoint: Entity): boolean {
		return this.resolveScope(viewpoint).includes(entity.id);
	}

	/**
	 * Whether a room is too dark to see in. Any lit light source inside the
	 * room counts, however deeply it is nested.
	 */
	isDark(room: Entity): boolean {
		if (room.data.kind !== "room" || !room.data.lightNeeded) return false;
		return !room
			.descendants()
			.some(
				(entity) =>
					entity.hasFlag(ENTITY_FLAG.LIGHT) && entity.hasFlag(ENTITY_FLAG.LIT)
			);
	}

	/**
	 * Whether an entity can be seen: it is not concealed and nothing between it
	 * and its room blocks the view.
	 */
	isVisible(entity: Entity): boolean {
		if (concealed(entity)) return false;
		return ancestorsBelowRoom(entity).every(revealsContents);
	}

	/**
	 * Whether an entity can be handled: no closed container stands between it
	 * and its room.
	 */
	isAccessible(entity: Entity): boolean {
		return ancestorsBelowRoom(entity).every(
			(ancestor) =>
				!ancestor.hasFlag(ENTITY_FLAG.CONTAINER) ||
				ancestor.hasFlag(ENTITY_FLAG.OPEN)
		);
	}
}
