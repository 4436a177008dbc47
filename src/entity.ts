/**
 * Every thing in the game world is an {@link Entity}.
 *
 * Rooms, the player, items, containers, doors and characters are all the same
 * {@link Entity} record. What differs between them lives in a tagged payload,
 * {@link KindData}, selected by its `kind` field. Code that cares about a kind
 * switches on `entity.data.kind` and gets the payload narrowed for free.
 *
 * Entities never own each other. Every entity belongs to an {@link EntityArena}
 * (the world) and refers to its owner and its contents by id. {@link Entity.moveTo}
 * is the only way containment changes, which keeps `location` and `contents`
 * in agreement.
 *
 * @example
 * ```typescript
 * import { Entity } from "./entity.js";
 * import { World } from "./world.js";
 *
 * const world = new World();
 * const study = world.register(new Entity({
 *   id: "study", name: "Study",
 *   data: { kind: "room", exits: {}, lightNeeded: false },
 * }));
 * const box = world.register(new Entity({
 *   id: "box", name: "box",
 *   data: { kind: "container", capacity: 3 },
 * }));
 * box.moveTo(study);
 * box.location === study; // true
 * ```
 *
 * @module entity
 */
import logger from "./logger.js";
import { ENTITY_FLAG, FlagSet, MUTABLE_FLAGS } from "./flags.js";
import {
	AdventureError,
	ContainmentCycleError,
	UnknownEntityError,
} from "./errors.js";
import type { DirectionText } from "./direction.js";
import type { JsonValue } from "./utils/types.js";

/**
 * Numeric traits an entity reports when it has no property of its own.
 */
export const PROPERTY_DEFAULTS: ReadonlyMap<string, number> = new Map([
	["size", 1],
	["weight", 1],
	["capacity", 10],
	["value", 0],
	["damage", 0],
	["strength", 10],
	["trust_level", 0],
]);

export interface RoomData {
	kind: "room";
	/** Direction name to the id of the room (or door) it leads to. */
	exits: Partial<Record<DirectionText, string>>;
	lightNeeded: boolean;
	visitedDescription?: string;
}

export interface PlayerData {
	kind: "player";
	maxCarryItems: number;
	maxCarryWeight: number;
}

export interface ItemData {
	kind: "item";
}

export interface ThingData {
	kind: "thing";
}

export interface ContainerData {
	kind: "container";
	capacity: number;
	keyId?: string;
}

export interface DoorData {
	kind: "door";
	connects: [string, string];
	keyId?: string;
	bothSides: boolean;
}

export interface ScheduleEntry {
	time: string;
	location: string;
	activity?: string;
}

export interface CharacterData {
	kind: "character";
	schedule: ScheduleEntry[];
	topics: Record<string, string>;
	knowledge: Record<string, string>;
	trustLevel: number;
}

export interface EvidenceData {
	kind: "evidence";
	evidenceValue: number;
	reveals: string[];
	contradicts: string[];
	requiredForSolution: boolean;
}

export interface WeaponData {
	kind: "weapon";
	damage: number;
	usedInCrime: boolean;
	fingerprints: string[];
}

export interface DocumentData {
	kind: "document";
	text: string;
	pages: string[];
	currentPage: number;
	signature?: string;
	date?: string;
}

export interface LightData {
	kind: "light";
	/** Undefined means the light never runs out. */
	fuelRemaining?: number;
	fuelType: string;
	burnRate: number;
}

export interface FurnitureData {
	kind: "furniture";
	canSit: boolean;
	canStandOn: boolean;
	canHideBehind: boolean;
	moveable: boolean;
}

/**
 * Kind-specific payload of an entity.
 */
export type KindData =
	| RoomData
	| PlayerData
	| ItemData
	| ThingData
	| ContainerData
	| DoorData
	| CharacterData
	| EvidenceData
	| WeaponData
	| DocumentData
	| LightData
	| FurnitureData;

export type EntityKind = KindData["kind"];

/**
 * Every kind, in the order kind inference reports candidates.
 */
export const ENTITY_KINDS: ReadonlyArray<EntityKind> = [
	"room",
	"player",
	"item",
	"thing",
	"container",
	"door",
	"character",
	"evidence",
	"weapon",
	"document",
	"light",
	"furniture",
];

export function isEntityKind(value: string): value is EntityKind {
	for (const kind of ENTITY_KINDS) if (kind === value) return true;
	return false;
}

/**
 * Applies the flags a kind implies to the flags an entity was declared with.
 * `declared` is undefined when the data named no flags at all, which lets
 * items and evidence fall back to their default flags.
 */
export function impliedFlags(data: KindData, declared?: number): number {
	const flags = declared ?? ENTITY_FLAG.NONE;
	switch (data.kind) {
		case "container":
			return flags | ENTITY_FLAG.CONTAINER;
		case "character":
		case "player":
			return flags | ENTITY_FLAG.PERSON;
		case "light":
			return flags | ENTITY_FLAG.LIGHT;
		case "document":
			return flags | ENTITY_FLAG.READABLE;
		case "weapon":
			return flags | ENTITY_FLAG.WEAPON | ENTITY_FLAG.TAKEABLE;
		case "evidence":
			return declared ?? ENTITY_FLAG.TAKEABLE | ENTITY_FLAG.READABLE;
		case "item":
			return declared ?? ENTITY_FLAG.TAKEABLE;
		case "furniture":
			return flags & ~ENTITY_FLAG.TAKEABLE;
		case "room":
		case "door":
		case "thing":
			return flags;
		default: {
			const unreachable: never = data;
			return unreachable;
		}
	}
}

/**
 * Resolves entity ids. Implemented by {@link World}.
 */
export interface EntityArena {
	get(id: string): Entity | undefined;
}

export interface EntityOptions {
	id: string;
	name: string;
	description?: string;
	shortDescription?: string;
	initialDescription?: string;
	/** Raw flag bits; undefined lets the kind choose its default flags. */
	flags?: number;
	properties?: Record<string, JsonValue>;
	synonyms?: string[];
	adjectives?: string[];
	data: KindData;
}

/**
 * A single thing in the world.
 *
 * Identity, descriptions, flags, properties and vocabulary are shared by every
 * kind. Behaviour that only some kinds have (locking, lighting, reading) is
 * offered on every entity and answers `false` for kinds that lack it, so
 * command handlers can call it without checking the kind first.
 */
export class Entity {
	readonly id: string;
	name: string;
	description: string;
	shortDescription?: string;
	initialDescription?: string;
	readonly flags: FlagSet;
	readonly synonyms: string[];
	readonly adjectives: string[];
	readonly data: KindData;
	private readonly properties: Map<string, JsonValue>;

	private arena?: EntityArena;
	private locationId?: string;
	private readonly contentIds: string[] = [];

	private originalFlags: number;
	private originalLocationId?: string;
	private originalFuel?: number;

	constructor(options: EntityOptions) {
		this.id = options.id;
		this.name = options.name;
		this.description = options.description ?? "";
		this.shortDescription = options.shortDescription;
		this.initialDescription = options.initialDescription;
		this.data = options.data;
		this.flags = new FlagSet(impliedFlags(options.data, options.flags));
		this.properties = new Map(Object.entries(options.properties ?? {}));
		this.synonyms = (options.synonyms ?? []).map((word) => word.toLowerCase());
		this.adjectives = (options.adjectives ?? []).map((word) =>
			word.toLowerCase()
		);
		this.originalFlags = this.flags.value;
		if (this.data.kind === "light") this.originalFuel = this.data.fuelRemaining;
	}

	get kind(): EntityKind {
		return this.data.kind;
	}

	/**
	 * Binds this entity to the arena that resolves its ids.
	 * Called by {@link World.register}.
	 */
	attach(arena: EntityArena): void {
		if (this.arena && this.arena !== arena)
			throw new AdventureError(`entity '${this.id}' already belongs to a world`);
		this.arena = arena;
	}

	private resolve(id: string): Entity {
		const entity = this.arena?.get(id);
		if (!entity) throw new UnknownEntityError(id);
		return entity;
	}

	/*
	 * Flags
	 */

	hasFlag(flag: ENTITY_FLAG): boolean {
		return this.flags.has(flag);
	}

	setFlag(flag: ENTITY_FLAG): void {
		this.flags.set(flag);
	}

	clearFlag(flag: ENTITY_FLAG): void {
		this.flags.clear(flag);
	}

	toggleFlag(flag: ENTITY_FLAG): void {
		this.flags.toggle(flag);
	}

	/*
	 * Properties
	 */

	/**
	 * Reads a property. Falls back to `fallback`, then to
	 * {@link PROPERTY_DEFAULTS}, then to undefined.
	 */
	getProperty(key: string): JsonValue | undefined;
	getProperty(key: string, fallback: JsonValue): JsonValue;
	getProperty(key: string, fallback?: JsonValue): JsonValue | undefined {
		const own = this.properties.get(key);
		if (own !== undefined) return own;
		if (fallback !== undefined) return fallback;
		return PROPERTY_DEFAULTS.get(key);
	}

	setProperty(key: string, value: JsonValue): void {
		this.properties.set(key, value);
	}

	hasProperty(key: string): boolean {
		return this.properties.has(key);
	}

	removeProperty(key: string): boolean {
		return this.properties.delete(key);
	}

	/**
	 * Reads a numeric property, ignoring values of any other type.
	 */
	numericProperty(key: string): number {
		const value = this.getProperty(key);
		if (typeof value === "number") return value;
		return PROPERTY_DEFAULTS.get(key) ?? 0;
	}

	get size(): number {
		return this.numericProperty("size");
	}

	get weight(): number {
		return this.numericProperty("weight");
	}

	/**
	 * How many entities this one can hold.
	 */
	get capacity(): number {
		if (this.data.kind === "container") return this.data.capacity;
		return this.numericProperty("capacity");
	}

	/*
	 * Containment
	 */

	/**
	 * The entity directly holding this one, or undefined while in limbo.
	 */
	get location(): Entity | undefined {
		if (this.locationId === undefined) return undefined;
		return this.resolve(this.locationId);
	}

	/**
	 * A copy of the entities directly held, in the order they arrived.
	 */
	get contents(): Entity[] {
		return this.contentIds.map((id) => this.resolve(id));
	}

	/**
	 * Ids of the entities directly held.
	 */
	get contentIdList(): readonly string[] {
		return [...this.contentIds];
	}

	/**
	 * Moves this entity into `owner`, or into limbo when `owner` is undefined.
	 *
	 * @throws ContainmentCycleError when `owner` is this entity or is inside it.
	 * Nothing changes when the move is rejected.
	 * @throws UnknownEntityError when either entity is not in the same world.
	 */
	moveTo(owner: Entity | undefined): void {
		if (owner) {
			if (owner === this || owner.isIn(this)) {
				const error = new ContainmentCycleError(this.id, owner.id);
				logger.error(error.message, { entity: this.id, target: owner.id });
				throw error;
			}
			if (!this.arena || this.arena.get(owner.id) !== owner)
				throw new UnknownEntityError(owner.id);
		}

		const previous = this.location;
		if (previous === owner) return;

		if (previous) {
			const index = previous.contentIds.indexOf(this.id);
			if (index !== -1) previous.contentIds.splice(index, 1);
		}
		if (owner) owner.contentIds.push(this.id);
		this.locationId = owner?.id;

		logger.debug(
			`moved '${this.id}' from '${previous?.id ?? "limbo"}' to '${
				owner?.id ?? "limbo"
			}'`
		);
	}

	/**
	 * Whether this entity is anywhere inside `other`.
	 */
	isIn(other: Entity): boolean {
		let current = this.location;
		while (current) {
			if (current === other) return true;
			current = current.location;
		}
		return false;
	}

	/**
	 * Owners of this entity, nearest first.
	 */
	ancestors(): Entity[] {
		const chain: Entity[] = [];
		let current = this.location;
		while (current) {
			chain.push(current);
			current = current.location;
		}
		return chain;
	}

	/**
	 * Everything inside this entity, depth first.
	 */
	descendants(): Entity[] {
		const found: Entity[] = [];
		for (const child of this.contents) {
			found.push(child);
			found.push(...child.descendants());
		}
		return found;
	}

	/**
	 * The nearest room this entity is inside.
	 */
	get room(): Entity | undefined {
		return this.ancestors().find((entity) => entity.kind === "room");
	}

	/*
	 * Queries for command handlers
	 */

	canTake(): boolean {
		return (
			this.hasFlag(ENTITY_FLAG.TAKEABLE) &&
			!this.hasFlag(ENTITY_FLAG.SACRED) &&
			!this.hasFlag(ENTITY_FLAG.FIXED)
		);
	}

	/**
	 * Whether `other` could be put inside (or on) this entity right now.
	 */
	canContain(other: Entity): boolean {
		if (other === this || this.isIn(other)) return false;
		const container = this.hasFlag(ENTITY_FLAG.CONTAINER);
		if (!container && !this.hasFlag(ENTITY_FLAG.SURFACE)) return false;
		if (
			container &&
			!this.hasFlag(ENTITY_FLAG.OPEN) &&
			this.hasFlag(ENTITY_FLAG.LOCKED)
		)
			return false;
		const held = this.contentIds.filter((id) => id !== other.id).length;
		if (held >= this.capacity) return false;
		const maxSize = this.getProperty("max_item_size");
		if (typeof maxSize === "number" && other.size > maxSize) return false;
		return true;
	}

	/**
	 * Whether the player could pick up `item` without exceeding their limits.
	 * Always false for entities that are not the player.
	 */
	canCarry(item: Entity): boolean {
		if (this.data.kind !== "player" || !item.canTake()) return false;
		const carried = this.contents.filter((entity) =>
			entity.hasFlag(ENTITY_FLAG.TAKEABLE)
		);
		if (carried.length >= this.data.maxCarryItems) return false;
		const load = carried.reduce((sum, entity) => sum + entity.weight, 0);
		return load + item.weight <= this.data.maxCarryWeight;
	}

	/*
	 * Kind behaviours
	 */

	private lockable(): ContainerData | DoorData | undefined {
		const data = this.data;
		switch (data.kind) {
			case "container":
			case "door":
				return data;
			case "room":
			case "player":
			case "item":
			case "thing":
			case "character":
			case "evidence":
			case "weapon":
			case "document":
			case "light":
			case "furniture":
				return undefined;
			default: {
				const unreachable: never = data;
				return unreachable;
			}
		}
	}

	open(): boolean {
		if (!this.lockable() || this.hasFlag(ENTITY_FLAG.LOCKED)) return false;
		this.setFlag(ENTITY_FLAG.OPEN);
		return true;
	}

	close(): boolean {
		if (!this.lockable()) return false;
		this.clearFlag(ENTITY_FLAG.OPEN);
		return true;
	}

	/**
	 * Locks a closed container or door. A keyed lock needs its key.
	 */
	lock(key?: Entity): boolean {
		const data = this.lockable();
		if (!data || this.hasFlag(ENTITY_FLAG.OPEN)) return false;
		if (data.keyId !== undefined && key?.id !== data.keyId) return false;
		this.setFlag(ENTITY_FLAG.LOCKED);
		return true;
	}

	/**
	 * Unlocks a container or door. Already unlocked counts as success.
	 */
	unlock(key?: Entity): boolean {
		const data = this.lockable();
		if (!data) return false;
		if (!this.hasFlag(ENTITY_FLAG.LOCKED)) return true;
		if (data.keyId !== undefined && key?.id !== data.keyId) return false;
		this.clearFlag(ENTITY_FLAG.LOCKED);
		return true;
	}

	/**
	 * The room on the far side of a door from `roomId`.
	 */
	otherSide(roomId: string): string | undefined {
		if (this.data.kind !== "door") return undefined;
		const [a, b] = this.data.connects;
		if (roomId === a) return b;
		if (roomId === b) return a;
		return undefined;
	}

	turnOn(): boolean {
		if (this.data.kind !== "light") return false;
		const fuel = this.data.fuelRemaining;
		if (fuel !== undefined && fuel <= 0) return false;
		this.setFlag(ENTITY_FLAG.LIT);
		return true;
	}

	turnOff(): boolean {
		if (this.data.kind !== "light") return false;
		this.clearFlag(ENTITY_FLAG.LIT);
		return true;
	}

	/**
	 * Burns fuel for one turn (or `amount`). Returns false when the light
	 * ran out and went dark.
	 */
	consumeFuel(amount?: number): boolean {
		if (this.data.kind !== "light" || !this.hasFlag(ENTITY_FLAG.LIT))
			return true;
		if (this.data.fuelRemaining === undefined) return true;
		this.data.fuelRemaining -= amount ?? this.data.burnRate;
		if (this.data.fuelRemaining <= 0) {
			this.data.fuelRemaining = 0;
			this.turnOff();
			return false;
		}
		return true;
	}

	refuel(amount: number): void {
		if (this.data.kind === "light" && this.data.fuelRemaining !== undefined)
			this.data.fuelRemaining += amount;
	}

	/**
	 * Text of a document: the given page, the current page, or the whole
	 * text with its signature and date.
	 */
	read(page?: number): string | undefined {
		const data = this.data;
		if (data.kind !== "document") return undefined;
		this.setFlag(ENTITY_FLAG.VISITED);
		if (data.pages.length > 0) {
			if (page !== undefined && page >= 0 && page < data.pages.length)
				return data.pages[page];
			if (data.currentPage < data.pages.length)
				return data.pages[data.currentPage];
		}
		if (data.text) {
			let result = data.text;
			if (data.signature) result += `\n\nSigned: ${data.signature}`;
			if (data.date) result += `\nDated: ${data.date}`;
			return result;
		}
		return "The document is blank.";
	}

	turnPage(forward = true): boolean {
		const data = this.data;
		if (data.kind !== "document" || data.pages.length === 0) return false;
		if (forward && data.currentPage < data.pages.length - 1) {
			data.currentPage++;
			return true;
		}
		if (!forward && data.currentPage > 0) {
			data.currentPage--;
			return true;
		}
		return false;
	}

	/**
	 * What a character says about a topic.
	 */
	respond(topic: string): string | undefined {
		const data = this.data;
		if (data.kind !== "character") return undefined;
		return (
			data.topics[topic] ??
			data.knowledge[topic] ??
			`${this.name} doesn't seem to know about that.`
		);
	}

	/*
	 * Display
	 */

	/**
	 * The indefinite article to print before the name, or "" for none.
	 */
	get article(): string {
		if (this.hasFlag(ENTITY_FLAG.PROPER) || this.hasFlag(ENTITY_FLAG.NO_ARTICLE))
			return "";
		if (this.hasFlag(ENTITY_FLAG.PLURAL)) return "some";
		if (/^[aeiou]/i.test(this.name)) return "an";
		return "a";
	}

	/**
	 * Name with its article, as printed in inventory lists.
	 */
	get inventoryName(): string {
		const article = this.article;
		return article ? `${article} ${this.name}` : this.name;
	}

	/*
	 * Reset
	 */

	/**
	 * Records the current owner and flags as the state {@link reset} returns to.
	 */
	captureOriginal(): void {
		this.originalFlags = this.flags.value;
		this.originalLocationId = this.locationId;
		if (this.data.kind === "light") this.originalFuel = this.data.fuelRemaining;
	}

	/**
	 * Returns to the original owner and restores the flags play can change.
	 */
	reset(): void {
		this.moveTo(
			this.originalLocationId === undefined
				? undefined
				: this.resolve(this.originalLocationId)
		);
		this.flags.assign(
			(this.flags.value & ~MUTABLE_FLAGS) | (this.originalFlags & MUTABLE_FLAGS)
		);
		const data = this.data;
		if (data.kind === "document") data.currentPage = 0;
		if (data.kind === "light") data.fuelRemaining = this.originalFuel;
	}

	toString(): string {
		return `${this.kind}:${this.id}`;
	}
}
