import assert from "node:assert";
import { suite, test } from "node:test";

import { buildWorld } from "./loader.js";
import { createContext } from "./context.js";
import type { CommandContext, CommandHandler } from "./command.js";
import { PARSE_ERROR, type ParsedCommand } from "./parser/parse-result.js";

function setup() {
	const world = buildWorld({
		player: { starting_room: "hall" },
		rooms: {
			hall: { contents: ["lamp", "red_door", "blue_door", "butler"] },
			study: {},
		},
		objects: {
			lamp: { kind: "light", name: "oil lamp", flags: ["takeable"] },
			red_door: { kind: "door", name: "red door", connects: ["hall", "study"] },
			blue_door: { kind: "door", name: "blue door", connects: ["hall", "study"] },
		},
		characters: { butler: { name: "butler" } },
	});
	const context = createContext({
		world,
		vocabulary: [{ verb: { take: ["get"], wait: [], sing: [] } }],
		syntax: ["take <direct:object>", "wait"],
	});
	return { world, context };
}

/**
 * Handler that records what it was called with.
 */
function recorder(verb: string, aliases?: string[]) {
	const calls: Array<{ context: CommandContext; command: ParsedCommand }> = [];
	const handler: CommandHandler = {
		verb,
		aliases,
		execute(context, command) {
			calls.push({ context, command });
			return `${verb} done`;
		},
	};
	return { handler, calls };
}

suite("command.ts", () => {
	test("failed parses are passed back", () => {
		const { context } = setup();
		const outcome = context.dispatcher.dispatch(context.parser.parse(""));
		assert.strictEqual(outcome.ok ? undefined : outcome.failure.error, PARSE_ERROR.EMPTY_INPUT);
	});

	test("a verb with no handler is not understood", () => {
		const { context } = setup();
		const outcome = context.dispatcher.dispatch(context.parser.parse("take lamp"));
		assert.strictEqual(outcome.ok, false);
		if (!outcome.ok) {
			assert.strictEqual(outcome.failure.error, PARSE_ERROR.NO_PATTERN_MATCH);
			assert.strictEqual(outcome.failure.message, "I don't understand that.");
			assert.strictEqual(outcome.failure.raw, "take lamp");
		}
	});

	test("an unknown word taken as a verb is not understood", () => {
		const { context } = setup();
		const parsed = context.parser.parse("xyzzy");
		assert.strictEqual(parsed.valid && parsed.deferred, true);
		const outcome = context.dispatcher.dispatch(parsed);
		assert.strictEqual(outcome.ok ? undefined : outcome.failure.error, PARSE_ERROR.NO_PATTERN_MATCH);
	});

	test("the handler runs with the actor and room", () => {
		const { context, world } = setup();
		context.dispatcher.register({
			verb: "take",
			execute({ actor, world: handlerWorld }, command) {
				if (command.directObject?.type !== "entity") return "Take what?";
				handlerWorld.require(command.directObject.id).moveTo(actor);
				return "Taken.";
			},
		});
		const outcome = context.dispatcher.dispatch(context.parser.parse("get lamp"));
		assert.strictEqual(outcome.ok ? outcome.output : undefined, "Taken.");
		assert.strictEqual(world.require("lamp").location, world.player);

		const { handler, calls } = recorder("wait");
		context.dispatcher.register(handler);
		context.dispatcher.dispatch(context.parser.parse("wait"));
		assert.strictEqual(calls.length, 1);
		assert.strictEqual(calls[0].context.actor, world.player);
		assert.strictEqual(calls[0].context.room, world.require("hall"));
	});

	test("aliases and unregister", () => {
		const { context } = setup();
		const { handler } = recorder("take", ["Grab"]);
		context.dispatcher.register(handler);
		assert.strictEqual(context.dispatcher.handlerFor("GRAB"), handler);
		assert.deepStrictEqual(context.dispatcher.verbs(), ["take", "grab"]);
		context.dispatcher.unregister(handler);
		assert.strictEqual(context.dispatcher.handlerFor("take"), undefined);
		assert.deepStrictEqual(context.dispatcher.verbs(), []);
	});

	suite("deferred commands", () => {
		test("text is resolved before the handler sees it", () => {
			const { context } = setup();
			const { handler, calls } = recorder("wait");
			context.dispatcher.register(handler);
			const parsed = context.parser.parse("wait for butler");
			assert.strictEqual(parsed.valid && parsed.deferred, true);
			const outcome = context.dispatcher.dispatch(parsed);
			assert.strictEqual(outcome.ok ? outcome.output : undefined, "wait done");
			assert.strictEqual(calls[0].command.deferred, false);
			assert.deepStrictEqual(calls[0].command.indirectObject, {
				type: "entity",
				id: "butler",
				text: "butler",
			});
		});

		test("a direction word becomes a direction", () => {
			const { context } = setup();
			const { handler, calls } = recorder("sing");
			context.dispatcher.register(handler);
			context.dispatcher.dispatch(context.parser.parse("sing north"));
			assert.deepStrictEqual(calls[0].command.directObject, {
				type: "direction",
				direction: "north",
				text: "north",
			});
		});

		test("text that names nothing here is NOT_FOUND", () => {
			const { context } = setup();
			const { handler, calls } = recorder("wait");
			context.dispatcher.register(handler);
			const outcome = context.dispatcher.dispatch(context.parser.parse("wait for unicorn"));
			assert.strictEqual(outcome.ok ? undefined : outcome.failure.error, PARSE_ERROR.NOT_FOUND);
			assert.strictEqual(calls.length, 0);
		});

		test("text that names several things is AMBIGUOUS", () => {
			const { context } = setup();
			context.dispatcher.register(recorder("sing").handler);
			const outcome = context.dispatcher.dispatch(context.parser.parse("sing to door"));
			assert.strictEqual(outcome.ok, false);
			if (!outcome.ok) {
				assert.strictEqual(outcome.failure.error, PARSE_ERROR.AMBIGUOUS);
				assert.deepStrictEqual(outcome.failure.candidates, ["red_door", "blue_door"]);
			}
		});
	});
});
