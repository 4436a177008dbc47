import assert from "node:assert";
import { suite, test } from "node:test";

import { ENTITY_FLAG, FlagSet } from "./flags.js";
import { buildWorld, inferKind } from "./loader.js";
import { WorldDataError } from "./errors.js";

function manor() {
	return {
		player: { starting_room: "study", starting_inventory: ["pencil"] },
		rooms: {
			study: { name: "Study", exits: { north: "hall" }, contents: ["desk"] },
			hall: { name: "Hall", exits: { south: "study" } },
		},
		objects: {
			desk: { kind: "furniture", name: "oak desk", flags: ["surface"], contents: ["note"] },
			note: { name: "note", text: "Hello" },
			pencil: { name: "pencil", flags: ["takeable"] },
			chest: { name: "chest", capacity: 2, location: "hall" },
			door: { name: "door", connects: ["study", "hall"] },
		},
		characters: {
			butler: { name: "butler", location: "hall", topics: { tea: "Earl Grey." } },
		},
	};
}

function rejects(data: unknown, message: string): void {
	assert.throws(
		() => buildWorld(data),
		(error: unknown) => error instanceof WorldDataError && error.message === message
	);
}

suite("loader.ts", () => {
	suite("buildWorld", () => {
		test("creates and places every entity", () => {
			const world = buildWorld(manor());
			assert.strictEqual(world.size, 9);
			const player = world.player;
			assert.strictEqual(player.name, "yourself");
			assert.strictEqual(player.location?.id, "study");
			assert.deepStrictEqual(player.contentIdList, ["pencil"]);
			assert.deepStrictEqual(world.require("study").contentIdList, ["player", "desk"]);
			assert.deepStrictEqual(world.require("desk").contentIdList, ["note"]);
			assert.deepStrictEqual(world.require("hall").contentIdList, ["chest", "butler"]);
		});

		test("infers kinds from fields and flags", () => {
			const world = buildWorld(manor());
			assert.strictEqual(world.require("note").kind, "document");
			assert.strictEqual(world.require("pencil").kind, "item");
			assert.strictEqual(world.require("chest").kind, "container");
			assert.strictEqual(world.require("door").kind, "door");
			assert.strictEqual(world.require("butler").hasFlag(ENTITY_FLAG.PERSON), true);
			assert.strictEqual(world.require("desk").hasFlag(ENTITY_FLAG.TAKEABLE), false);
		});

		test("the player starts in the first room by default", () => {
			const world = buildWorld({ rooms: { attic: {}, hall: {} } });
			assert.strictEqual(world.player.location?.id, "attic");
		});

		test("legacy type and top-level traits are read", () => {
			const world = buildWorld({
				rooms: { hall: { contents: ["sword"] } },
				objects: { sword: { type: "weapon", name: "sword", size: 4 } },
			});
			const sword = world.require("sword");
			assert.strictEqual(sword.kind, "weapon");
			assert.strictEqual(sword.size, 4);
			assert.strictEqual(sword.canTake(), true);
		});

		test("records the assembled state for resets", () => {
			const world = buildWorld(manor());
			const pencil = world.require("pencil");
			pencil.moveTo(world.require("hall"));
			world.resetAll();
			assert.strictEqual(pencil.location?.id, "player");
		});

		test("rejects unknown references", () => {
			rejects(
				{ rooms: { hall: {} }, objects: { lamp: { name: "lamp", location: "nowhere" } } },
				"lamp: refers to unknown id 'nowhere'"
			);
			rejects(
				{ rooms: { hall: { exits: { north: "attic" } } } },
				"hall: exit 'north' leads to unknown id 'attic'"
			);
		});

		test("rejects malformed entries", () => {
			rejects({ rooms: { hall: { exits: { sideways: "hall" } } } }, "hall: 'sideways' is not a direction");
			rejects(
				{ rooms: { hall: {} }, objects: { gem: { flags: ["glowing"] } } },
				"gem: unknown flag(s): glowing"
			);
			rejects(
				{ rooms: { hall: { kind: "item" } } },
				"hall: declared kind 'item' does not belong in the room table"
			);
			rejects(
				{ rooms: { hall: {} }, objects: { door: { connects: ["hall"] } } },
				"door: 'connects' must name exactly two rooms"
			);
		});

		test("rejects a starting room that is not a room", () => {
			rejects(
				{
					player: { starting_room: "desk" },
					rooms: { hall: {} },
					objects: { desk: { kind: "furniture" } },
				},
				"player: starting room 'desk' is not a room"
			);
		});

		test("rejects data that is not a mapping", () => {
			rejects("rooms", "world data must be a mapping");
		});
	});

	suite("inferKind", () => {
		test("falls back to flags, then to item or thing", () => {
			assert.strictEqual(inferKind("x", {}, new FlagSet(ENTITY_FLAG.PERSON)), "character");
			assert.strictEqual(inferKind("x", {}, new FlagSet(ENTITY_FLAG.TAKEABLE)), "item");
			assert.strictEqual(inferKind("x", {}, new FlagSet()), "thing");
		});

		test("fields decide before flags", () => {
			assert.strictEqual(
				inferKind("x", { fuel_remaining: 3 }, new FlagSet(ENTITY_FLAG.CONTAINER)),
				"light"
			);
		});

		test("more than one candidate is an error", () => {
			assert.throws(
				() => inferKind("chest", { capacity: 2, damage: 3 }, new FlagSet()),
				/kind is ambiguous \(could be container, weapon\)/
			);
		});
	});
});
