/**
 * World assembly from declarative tables.
 *
 * `buildWorld` takes already-parsed world data (the package layer reads it from
 * YAML) and produces a validated {@link World}. The tables are checked as they
 * are read; anything malformed, dangling or undecidable is a
 * {@link WorldDataError} naming the entity at fault.
 *
 * ```yaml
 * player:
 *   starting_room: study
 *   starting_inventory: [notebook]
 * rooms:
 *   study:
 *     name: Study
 *     exits: { north: hall }
 *     contents: [desk]
 * objects:
 *   desk:
 *     kind: furniture
 *     name: desk
 *     flags: [surface]
 * characters:
 *   butler:
 *     name: butler
 *     location: hall
 * ```
 *
 * @module loader
 */
import defaultLogger, { type Logger } from "./logger.js";
import { ENTITY_FLAG, FlagSet } from "./flags.js";
import {
	Entity,
	isEntityKind,
	type EntityKind,
	type KindData,
	type ScheduleEntry,
} from "./entity.js";
import { World } from "./world.js";
import { WorldDataError } from "./errors.js";
import { isDirectionText, type DirectionText } from "./direction.js";
import { isJsonValue, isRecord, type JsonValue } from "./utils/types.js";

/**
 * Shape of the world tables, for reference. Input is accepted as `unknown`
 * and checked field by field.
 */
export interface WorldData {
	player?: Record<string, unknown>;
	rooms?: Record<string, Record<string, unknown>>;
	objects?: Record<string, Record<string, unknown>>;
	characters?: Record<string, Record<string, unknown>>;
}

export interface BuildWorldOptions {
	logger?: Logger;
}

type Raw = Record<string, unknown>;

/**
 * Typed access to one entity's raw table, raising errors that name the entity.
 */
class FieldReader {
	constructor(readonly id: string, readonly raw: Raw) {}

	has(key: string): boolean {
		return this.raw[key] !== undefined;
	}

	string(key: string): string | undefined {
		const value = this.raw[key];
		if (value === undefined) return undefined;
		if (typeof value !== "string")
			throw new WorldDataError(`'${key}' must be a string`, this.id);
		return value;
	}

	number(key: string): number | undefined {
		const value = this.raw[key];
		if (value === undefined) return undefined;
		if (typeof value !== "number" || Number.isNaN(value))
			throw new WorldDataError(`'${key}' must be a number`, this.id);
		return value;
	}

	boolean(key: string): boolean | undefined {
		const value = this.raw[key];
		if (value === undefined) return undefined;
		if (typeof value !== "boolean")
			throw new WorldDataError(`'${key}' must be true or false`, this.id);
		return value;
	}

	strings(key: string): string[] {
		const value = this.raw[key];
		if (value === undefined) return [];
		if (!Array.isArray(value) || !value.every((v) => typeof v === "string"))
			throw new WorldDataError(`'${key}' must be a list of strings`, this.id);
		return value.filter((v): v is string => typeof v === "string");
	}

	stringMap(key: string): Record<string, string> {
		const value = this.raw[key];
		if (value === undefined) return {};
		if (!isRecord(value))
			throw new WorldDataError(`'${key}' must be a mapping`, this.id);
		const result: Record<string, string> = {};
		for (const [name, text] of Object.entries(value)) {
			if (typeof text !== "string")
				throw new WorldDataError(`'${key}.${name}' must be a string`, this.id);
			result[name] = text;
		}
		return result;
	}

	properties(): Record<string, JsonValue> {
		const value = this.raw.properties;
		const result: Record<string, JsonValue> = {};
		if (value !== undefined) {
			if (!isRecord(value) || !isJsonValue(value))
				throw new WorldDataError("'properties' must be a mapping", this.id);
			Object.assign(result, value);
		}
		// legacy top-level numeric traits
		for (const key of ["size", "weight", "value"]) {
			const legacy = this.number(key);
			if (legacy !== undefined && result[key] === undefined)
				result[key] = legacy;
		}
		return result;
	}
}

/**
 * Kind inference rules for data without an explicit `kind`.
 * Each rule reports whether the raw table looks like that kind.
 */
const FIELD_RULES: ReadonlyArray<[EntityKind, (raw: Raw) => boolean]> = [
	["room", (raw) => raw.exits !== undefined || raw.light_needed !== undefined],
	["door", (raw) => raw.connects !== undefined],
	[
		"character",
		(raw) =>
			raw.schedule !== undefined ||
			raw.topics !== undefined ||
			raw.knowledge !== undefined ||
			raw.trust_level !== undefined,
	],
	[
		"container",
		(raw) =>
			raw.capacity !== undefined ||
			(raw.key_id !== undefined && raw.connects === undefined),
	],
	[
		"evidence",
		(raw) =>
			raw.evidence_value !== undefined ||
			raw.reveals !== undefined ||
			raw.contradicts !== undefined ||
			raw.required_for_solution !== undefined,
	],
	[
		"weapon",
		(raw) =>
			raw.damage !== undefined ||
			raw.used_in_crime !== undefined ||
			raw.fingerprints !== undefined,
	],
	[
		"document",
		(raw) =>
			raw.text !== undefined ||
			raw.pages !== undefined ||
			raw.signature !== undefined,
	],
	[
		"light",
		(raw) =>
			raw.fuel_remaining !== undefined ||
			raw.fuel_type !== undefined ||
			raw.burn_rate !== undefined,
	],
	[
		"furniture",
		(raw) =>
			raw.can_sit !== undefined ||
			raw.can_stand_on !== undefined ||
			raw.can_hide_behind !== undefined ||
			raw.moveable !== undefined,
	],
];

const FLAG_RULES: ReadonlyArray<[EntityKind, ENTITY_FLAG]> = [
	["character", ENTITY_FLAG.PERSON],
	["container", ENTITY_FLAG.CONTAINER],
	["weapon", ENTITY_FLAG.WEAPON],
	["document", ENTITY_FLAG.READABLE],
	["light", ENTITY_FLAG.LIGHT],
];

/**
 * Decides the kind of an entity that did not declare one.
 *
 * @throws WorldDataError when the data fits more than one kind.
 */
export function inferKind(id: string, raw: Raw, flags: FlagSet): EntityKind {
	let candidates = FIELD_RULES.filter(([, test]) => test(raw)).map(
		([kind]) => kind
	);
	if (candidates.length === 0)
		candidates = FLAG_RULES.filter(([, flag]) => flags.has(flag)).map(
			([kind]) => kind
		);
	if (candidates.length > 1)
		throw new WorldDataError(
			`kind is ambiguous (could be ${candidates.join(", ")}); add an explicit 'kind'`,
			id
		);
	if (candidates.length === 1) return candidates[0];
	return flags.has(ENTITY_FLAG.TAKEABLE) ? "item" : "thing";
}

function readExits(reader: FieldReader): Partial<Record<DirectionText, string>> {
	const exits: Partial<Record<DirectionText, string>> = {};
	for (const [direction, target] of Object.entries(reader.stringMap("exits"))) {
		const key = direction.toLowerCase();
		if (!isDirectionText(key))
			throw new WorldDataError(`'${direction}' is not a direction`, reader.id);
		exits[key] = target;
	}
	return exits;
}

function readSchedule(reader: FieldReader): ScheduleEntry[] {
	const value = reader.raw.schedule;
	if (value === undefined) return [];
	if (!Array.isArray(value))
		throw new WorldDataError("'schedule' must be a list", reader.id);
	return value.map((entry, index) => {
		if (!isRecord(entry))
			throw new WorldDataError(`'schedule[${index}]' must be a mapping`, reader.id);
		const step = new FieldReader(reader.id, entry);
		const time = step.string("time");
		const location = step.string("location");
		if (time === undefined || location === undefined)
			throw new WorldDataError(
				`'schedule[${index}]' needs 'time' and 'location'`,
				reader.id
			);
		return { time, location, activity: step.string("activity") };
	});
}

/**
 * Builds the kind payload for an entity from its raw table.
 */
function readKindData(kind: EntityKind, reader: FieldReader): KindData {
	switch (kind) {
		case "room":
			return {
				kind,
				exits: readExits(reader),
				lightNeeded: reader.boolean("light_needed") ?? false,
				visitedDescription: reader.string("visited_description"),
			};
		case "player":
			return {
				kind,
				maxCarryItems:
					reader.number("max_carry_items") ?? reader.number("max_carry") ?? 10,
				maxCarryWeight: reader.number("max_carry_weight") ?? 100,
			};
		case "item":
		case "thing":
			return { kind };
		case "container":
			return {
				kind,
				capacity: reader.number("capacity") ?? 10,
				keyId: reader.string("key_id"),
			};
		case "door": {
			const connects = reader.strings("connects");
			if (connects.length !== 2)
				throw new WorldDataError("'connects' must name exactly two rooms", reader.id);
			return {
				kind,
				connects: [connects[0], connects[1]],
				keyId: reader.string("key_id"),
				bothSides: reader.boolean("both_sides") ?? true,
			};
		}
		case "character":
			return {
				kind,
				schedule: readSchedule(reader),
				topics: reader.stringMap("topics"),
				knowledge: reader.stringMap("knowledge"),
				trustLevel: reader.number("trust_level") ?? 0,
			};
		case "evidence":
			return {
				kind,
				evidenceValue: reader.number("evidence_value") ?? 5,
				reveals: reader.strings("reveals"),
				contradicts: reader.strings("contradicts"),
				requiredForSolution: reader.boolean("required_for_solution") ?? false,
			};
		case "weapon":
			return {
				kind,
				damage: reader.number("damage") ?? 1,
				usedInCrime: reader.boolean("used_in_crime") ?? false,
				fingerprints: reader.strings("fingerprints"),
			};
		case "document":
			return {
				kind,
				text: reader.string("text") ?? reader.string("text_content") ?? "",
				pages: reader.strings("pages"),
				currentPage: 0,
				signature: reader.string("signature"),
				date: reader.string("date"),
			};
		case "light":
			return {
				kind,
				fuelRemaining: reader.number("fuel_remaining"),
				fuelType: reader.string("fuel_type") ?? "battery",
				burnRate: reader.number("burn_rate") ?? 1,
			};
		case "furniture":
			return {
				kind,
				canSit: reader.boolean("can_sit") ?? false,
				canStandOn: reader.boolean("can_stand_on") ?? false,
				canHideBehind: reader.boolean("can_hide_behind") ?? false,
				moveable: reader.boolean("moveable") ?? false,
			};
		default: {
			const unreachable: never = kind;
			return unreachable;
		}
	}
}

/**
 * Creates one entity from its raw table.
 *
 * @param implied The kind its section implies (rooms, characters, player),
 * or undefined for the objects section where the kind is declared or inferred.
 */
export function createEntity(id: string, raw: unknown, implied?: EntityKind): Entity {
	if (!isRecord(raw)) throw new WorldDataError("entry must be a mapping", id);
	const reader = new FieldReader(id, raw);

	let flags: FlagSet | undefined;
	if (reader.has("flags")) {
		const parsed = FlagSet.fromText(reader.strings("flags"));
		if (parsed.unknown.length > 0)
			throw new WorldDataError(
				`unknown flag(s): ${parsed.unknown.join(", ")}`,
				id
			);
		flags = parsed.flags;
	}

	const declared = reader.string("kind") ?? reader.string("type");
	let kind: EntityKind;
	if (declared !== undefined) {
		const normalized = declared.toLowerCase();
		if (!isEntityKind(normalized))
			throw new WorldDataError(`unknown kind '${declared}'`, id);
		if (implied !== undefined && normalized !== implied)
			throw new WorldDataError(
				`declared kind '${normalized}' does not belong in the ${implied} table`,
				id
			);
		kind = normalized;
	} else {
		kind = implied ?? inferKind(id, raw, flags ?? new FlagSet());
	}

	return new Entity({
		id,
		name: reader.string("name") ?? id,
		description: reader.string("description"),
		shortDescription: reader.string("short_description"),
		initialDescription: reader.string("initial_description"),
		flags: flags?.value,
		properties: reader.properties(),
		synonyms: reader.strings("synonyms"),
		adjectives: reader.strings("adjectives"),
		data: readKindData(kind, reader),
	});
}

function table(raw: Raw, key: string): Array<[string, unknown]> {
	const value = raw[key];
	if (value === undefined || value === null) return [];
	if (!isRecord(value))
		throw new WorldDataError(`'${key}' must be a mapping of id to entry`);
	return Object.entries(value);
}

/**
 * Assembles a world from declarative tables.
 *
 * Entities are created from `rooms`, `objects`, `characters` and `player`,
 * then placed: the player in its starting room, room contents, object
 * contents, object locations, character locations, and finally the starting
 * inventory. The result is validated and its state recorded for resets.
 *
 * @throws WorldDataError for malformed data or references to unknown ids.
 * @throws WorldValidationError if the assembled world breaks an invariant.
 */
export function buildWorld(data: unknown, options: BuildWorldOptions = {}): World {
	const logger = options.logger ?? defaultLogger;
	if (!isRecord(data)) throw new WorldDataError("world data must be a mapping");
	const world = new World();

	const add = (id: string, raw: unknown, implied?: EntityKind): Entity => {
		if (world.has(id)) throw new WorldDataError("id is used more than once", id);
		const entity = world.register(createEntity(id, raw, implied));
		logger.debug(`created ${entity.kind} '${id}'`);
		return entity;
	};

	const rooms = table(data, "rooms");
	const objects = table(data, "objects");
	const characters = table(data, "characters");
	for (const [id, raw] of rooms) add(id, raw, "room");
	for (const [id, raw] of objects) add(id, raw);
	for (const [id, raw] of characters) add(id, raw, "character");

	const rawPlayer = data.player ?? {};
	if (!isRecord(rawPlayer)) throw new WorldDataError("'player' must be a mapping");
	const playerReader = new FieldReader("player", rawPlayer);
	const player = add(
		playerReader.string("id") ?? "player",
		{ name: "yourself", ...rawPlayer },
		"player"
	);

	const lookup = (owner: string, ref: string): Entity => {
		const entity = world.get(ref);
		if (!entity) throw new WorldDataError(`refers to unknown id '${ref}'`, owner);
		return entity;
	};
	const place = (owner: string, entityId: string, targetId: string): void => {
		const entity = lookup(owner, entityId);
		const target = lookup(owner, targetId);
		if (entity.kind === "room")
			throw new WorldDataError(`room '${entityId}' cannot be placed inside '${targetId}'`, owner);
		entity.moveTo(target);
	};

	const startingRoom = playerReader.string("starting_room") ?? rooms[0]?.[0];
	if (startingRoom === undefined)
		throw new WorldDataError("no starting room and no rooms to default to", player.id);
	const start = lookup(player.id, startingRoom);
	if (start.kind !== "room")
		throw new WorldDataError(`starting room '${startingRoom}' is not a room`, player.id);
	player.moveTo(start);

	for (const [id, raw] of [...rooms, ...objects]) {
		if (!isRecord(raw)) continue;
		for (const child of new FieldReader(id, raw).strings("contents"))
			place(id, child, id);
	}
	for (const [id, raw] of [...objects, ...characters]) {
		if (!isRecord(raw)) continue;
		const location = new FieldReader(id, raw).string("location");
		if (location !== undefined) place(id, id, location);
	}
	for (const itemId of playerReader.strings("starting_inventory"))
		place(player.id, itemId, player.id);

	for (const room of world.byKind("room"))
		for (const [direction, target] of Object.entries(room.data.exits))
			if (target !== undefined && !world.has(target))
				throw new WorldDataError(
					`exit '${direction}' leads to unknown id '${target}'`,
					room.id
				);
	for (const door of world.byKind("door"))
		for (const roomId of door.data.connects) lookup(door.id, roomId);

	world.assertValid();
	world.captureOriginals();
	logger.info(
		`Assembled world: ${rooms.length} rooms, ${objects.length} objects, ${characters.length} characters`
	);
	return world;
}
