/**
 * The world is the arena that owns every entity.
 *
 * Entities are registered once, when the world is assembled, and are never
 * removed. The world resolves ids for the containment graph, knows which
 * entity is the player, and checks the graph's invariants.
 *
 * @module world
 */
import logger from "./logger.js";
import { Entity, type EntityArena, type EntityKind, type KindData } from "./entity.js";
import { UnknownEntityError, WorldValidationError } from "./errors.js";

export class World implements EntityArena {
	private readonly entityMap = new Map<string, Entity>();
	private playerId?: string;

	/**
	 * Adds an entity to the world. Ids must be unique.
	 * A `player` entity becomes the world's player.
	 */
	register<T extends Entity>(entity: T): T {
		if (this.entityMap.has(entity.id))
			throw new Error(`duplicate entity id '${entity.id}'`);
		entity.attach(this);
		this.entityMap.set(entity.id, entity);
		if (entity.kind === "player") this.playerId = entity.id;
		return entity;
	}

	get(id: string): Entity | undefined {
		return this.entityMap.get(id);
	}

	/**
	 * @throws UnknownEntityError when no entity has the id.
	 */
	require(id: string): Entity {
		const entity = this.entityMap.get(id);
		if (!entity) throw new UnknownEntityError(id);
		return entity;
	}

	has(id: string): boolean {
		return this.entityMap.has(id);
	}

	/**
	 * Every entity, in registration order.
	 */
	entities(): Entity[] {
		return Array.from(this.entityMap.values());
	}

	get size(): number {
		return this.entityMap.size;
	}

	find(predicate: (entity: Entity) => boolean): Entity | undefined {
		for (const entity of this.entityMap.values())
			if (predicate(entity)) return entity;
		return undefined;
	}

	byKind<K extends EntityKind>(
		kind: K
	): Array<Entity & { data: Extract<KindData, { kind: K }> }> {
		const found: Array<Entity & { data: Extract<KindData, { kind: K }> }> = [];
		for (const entity of this.entityMap.values())
			if (hasKind(entity, kind)) found.push(entity);
		return found;
	}

	/**
	 * The player entity.
	 * @throws UnknownEntityError when no player was registered.
	 */
	get player(): Entity {
		if (this.playerId === undefined) throw new UnknownEntityError("player");
		return this.require(this.playerId);
	}

	/**
	 * The room the player is standing in, if any.
	 */
	get currentRoom(): Entity | undefined {
		if (this.playerId === undefined) return undefined;
		const location = this.player.location;
		return location?.kind === "room" ? location : undefined;
	}

	/**
	 * Checks the containment graph and the player's placement.
	 * Returns one line per problem; an empty list means the world is sound.
	 */
	validate(): string[] {
		const problems: string[] = [];
		for (const entity of this.entityMap.values()) {
			const location = entity.location;
			if (location) {
				const count = location.contentIdList.filter(
					(id) => id === entity.id
				).length;
				if (count !== 1)
					problems.push(
						`'${entity.id}' is in '${location.id}' but listed ${count} times there`
					);
				if (entity.isIn(entity))
					problems.push(`'${entity.id}' is inside itself`);
			}
			for (const child of entity.contents)
				if (child.location !== entity)
					problems.push(
						`'${entity.id}' lists '${child.id}' which is somewhere else`
					);
			if (entity.kind === "room" && location)
				problems.push(`room '${entity.id}' is inside '${location.id}'`);
			if (entity.kind !== "room" && entity.kind !== "player" && !location)
				logger.debug(`'${entity.id}' is in limbo`);
		}

		if (this.playerId === undefined) problems.push("there is no player");
		else if (!this.currentRoom)
			problems.push(`player '${this.playerId}' is not in a room`);
		return problems;
	}

	/**
	 * @throws WorldValidationError listing every problem {@link validate} finds.
	 */
	assertValid(): void {
		const problems = this.validate();
		if (problems.length > 0) {
			const error = new WorldValidationError(problems);
			logger.error(error.message);
			throw error;
		}
	}

	/**
	 * Records every entity's current owner and flags as its reset state.
	 */
	captureOriginals(): void {
		for (const entity of this.entityMap.values()) entity.captureOriginal();
	}

	/**
	 * Returns every entity to its reset state.
	 *
	 * Everything is parked in limbo first so that entities can be put back in
	 * any order without tripping over containment that changed during play.
	 */
	resetAll(): void {
		for (const entity of this.entityMap.values()) entity.moveTo(undefined);
		for (const entity of this.entityMap.values()) entity.reset();
		logger.debug(`reset ${this.entityMap.size} entities`);
	}
}

/**
 * Narrows an entity to one of a given kind.
 */
export function hasKind<K extends EntityKind>(
	entity: Entity,
	kind: K
): entity is Entity & { data: Extract<KindData, { kind: K }> } {
	return entity.data.kind === kind;
}
