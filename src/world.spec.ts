import assert from "node:assert";
import { suite, test } from "node:test";

import { Entity } from "./entity.js";
import { World, hasKind } from "./world.js";
import { UnknownEntityError, WorldValidationError } from "./errors.js";

function makeRoom(id: string): Entity {
	return new Entity({
		id,
		name: id,
		data: { kind: "room", exits: {}, lightNeeded: false },
	});
}

function makePlayer(): Entity {
	return new Entity({
		id: "player",
		name: "yourself",
		data: { kind: "player", maxCarryItems: 10, maxCarryWeight: 100 },
	});
}

suite("world.ts", () => {
	test("register rejects duplicate ids", () => {
		const world = new World();
		world.register(makeRoom("hall"));
		assert.throws(() => world.register(makeRoom("hall")), /duplicate entity id 'hall'/);
	});

	test("get, require and has", () => {
		const world = new World();
		const hall = world.register(makeRoom("hall"));
		assert.strictEqual(world.get("hall"), hall);
		assert.strictEqual(world.get("attic"), undefined);
		assert.strictEqual(world.has("hall"), true);
		assert.throws(() => world.require("attic"), UnknownEntityError);
		assert.strictEqual(world.size, 1);
	});

	test("player and currentRoom", () => {
		const world = new World();
		assert.throws(() => world.player, UnknownEntityError);
		assert.strictEqual(world.currentRoom, undefined);
		const hall = world.register(makeRoom("hall"));
		const player = world.register(makePlayer());
		assert.strictEqual(world.player, player);
		assert.strictEqual(world.currentRoom, undefined);
		player.moveTo(hall);
		assert.strictEqual(world.currentRoom, hall);
	});

	test("byKind and hasKind", () => {
		const world = new World();
		world.register(makeRoom("hall"));
		world.register(makeRoom("study"));
		world.register(makePlayer());
		assert.deepStrictEqual(
			world.byKind("room").map((room) => room.id),
			["hall", "study"]
		);
		const player = world.player;
		assert.strictEqual(hasKind(player, "player"), true);
		assert.strictEqual(hasKind(player, "room"), false);
	});

	test("find returns the first match", () => {
		const world = new World();
		world.register(makeRoom("hall"));
		world.register(makeRoom("study"));
		assert.strictEqual(world.find((e) => e.id.startsWith("s"))?.id, "study");
		assert.strictEqual(world.find((e) => e.id === "attic"), undefined);
	});

	suite("validate", () => {
		test("a sound world has no problems", () => {
			const world = new World();
			const hall = world.register(makeRoom("hall"));
			world.register(makePlayer()).moveTo(hall);
			assert.deepStrictEqual(world.validate(), []);
		});

		test("reports a missing player", () => {
			const world = new World();
			world.register(makeRoom("hall"));
			assert.deepStrictEqual(world.validate(), ["there is no player"]);
		});

		test("reports a player outside any room and a room inside something", () => {
			const world = new World();
			const hall = world.register(makeRoom("hall"));
			const study = world.register(makeRoom("study"));
			world.register(makePlayer());
			study.moveTo(hall);
			assert.deepStrictEqual(world.validate(), [
				"room 'study' is inside 'hall'",
				"player 'player' is not in a room",
			]);
		});

		test("assertValid throws with every problem", () => {
			const world = new World();
			world.register(makeRoom("hall"));
			assert.throws(
				() => world.assertValid(),
				(error: unknown) =>
					error instanceof WorldValidationError &&
					error.problems.length === 1 &&
					error.problems[0] === "there is no player"
			);
		});
	});
});
