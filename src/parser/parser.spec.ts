import assert from "node:assert";
import { suite, test } from "node:test";

import { buildWorld } from "../loader.js";
import { ScopeResolver } from "../scope.js";
import type { ParserConfig } from "../config.js";
import { Vocabulary, WORD_TYPE } from "./vocabulary.js";
import { SyntaxMatcher } from "./syntax.js";
import { Disambiguator } from "./disambiguator.js";
import { CommandParser, nounPhrase } from "./parser.js";
import { PARSE_ERROR, type ParseResult, type ParsedCommand } from "./parse-result.js";

function setup(config: Partial<ParserConfig> = {}) {
	const world = buildWorld({
		player: { starting_room: "hall" },
		rooms: {
			hall: {
				exits: { north: "cellar" },
				contents: ["brass_key", "box", "red_door", "blue_door", "butler", "portrait"],
			},
			cellar: { light_needed: true, exits: { south: "hall" }, contents: ["rope"] },
		},
		objects: {
			brass_key: { name: "brass key", flags: ["takeable"] },
			box: { kind: "container", name: "small box", flags: ["open"], contents: ["coin"] },
			coin: { name: "coin", flags: ["takeable"] },
			red_door: { kind: "door", name: "red door", connects: ["hall", "cellar"] },
			blue_door: { kind: "door", name: "blue door", connects: ["hall", "cellar"] },
			rope: { name: "rope", flags: ["takeable"] },
			portrait: { name: "portrait", flags: ["fixed"] },
		},
		characters: {
			butler: { name: "butler" },
		},
	});
	const vocabulary = new Vocabulary();
	vocabulary.load({
		verb: {
			go: [],
			take: ["get"],
			put: [],
			open: [],
			look: [],
			examine: [],
			ask: [],
			wait: [],
		},
	});
	vocabulary.registerWorld(world);
	const syntax = new SyntaxMatcher();
	syntax.load([
		"go <where:direction>",
		"take <direct:object> from <indirect:object>",
		"take <direct:object>",
		"put <direct:object> in|into <indirect:object>",
		"open <direct:object>",
		{ pattern: "look at <direct:object>", verb: "examine" },
		"look",
		"examine <direct:object>",
		"ask <direct:object> about <topic:topic>",
		"wait",
	]);
	const disambiguator = new Disambiguator(world, new ScopeResolver());
	const parser = new CommandParser({ vocabulary, syntax, disambiguator, config });
	return { world, parser, disambiguator };
}

function valid(result: ParseResult): ParsedCommand {
	if (!result.valid) assert.fail(`expected a command, got ${result.error}`);
	return result;
}

suite("parser/parser.ts", () => {
	test("nounPhrase takes the last noun as head", () => {
		const token = (word: string, type: WORD_TYPE) => ({
			word,
			type,
			canonical: word,
			entityIds: [],
			position: 0,
		});
		assert.deepStrictEqual(
			nounPhrase([token("rusty", WORD_TYPE.ADJECTIVE), token("key", WORD_TYPE.NOUN)]),
			{ head: "key", modifiers: ["rusty"] }
		);
		assert.deepStrictEqual(
			nounPhrase([token("odd", WORD_TYPE.UNKNOWN), token("thing", WORD_TYPE.UNKNOWN)]),
			{ head: "thing", modifiers: ["odd"] }
		);
		assert.deepStrictEqual(
			nounPhrase([
				token("portrait", WORD_TYPE.NOUN),
				token("of", WORD_TYPE.PREPOSITION),
				token("duke", WORD_TYPE.UNKNOWN),
			]),
			{ head: "portrait", modifiers: [] }
		);
	});

	test("blank input is EMPTY_INPUT", () => {
		const { parser } = setup();
		for (const input of ["", "   ", "and then"]) {
			const result = parser.parse(input);
			assert.strictEqual(result.valid, false);
			if (!result.valid) {
				assert.strictEqual(result.error, PARSE_ERROR.EMPTY_INPUT);
				assert.strictEqual(result.message, "Please enter a command.");
				assert.deepStrictEqual(result.candidates, []);
			}
		}
	});

	test("take the brass key", () => {
		const { parser } = setup();
		const command = valid(parser.parse("take the brass key"));
		assert.strictEqual(command.verb, "take");
		assert.deepStrictEqual(command.directObject, {
			type: "entity",
			id: "brass_key",
			text: "brass key",
		});
		assert.deepStrictEqual(
			command.tokens.map((token) => token.type),
			[WORD_TYPE.VERB, WORD_TYPE.ADJECTIVE, WORD_TYPE.NOUN]
		);
		assert.strictEqual(command.deferred, false);
	});

	test("a lone direction is go", () => {
		const { parser } = setup();
		const command = valid(parser.parse("north"));
		assert.strictEqual(command.verb, "go");
		assert.deepStrictEqual(command.directObject, {
			type: "direction",
			direction: "north",
			text: "north",
		});
		assert.deepStrictEqual(valid(parser.parse("s")).directObject, {
			type: "direction",
			direction: "south",
			text: "s",
		});
	});

	test("go with a direction slot", () => {
		const { parser } = setup();
		const command = valid(parser.parse("go n"));
		assert.strictEqual(command.verb, "go");
		assert.deepStrictEqual(command.directObject, {
			type: "direction",
			direction: "north",
			text: "n",
		});
	});

	test("put key in box", () => {
		const { parser, world } = setup();
		const command = valid(parser.parse("put key in box"));
		assert.strictEqual(command.verb, "put");
		assert.deepStrictEqual(command.directObject, { type: "entity", id: "brass_key", text: "key" });
		assert.deepStrictEqual(command.indirectObject, { type: "entity", id: "box", text: "box" });
		assert.strictEqual(command.preposition, "in");
		assert.strictEqual(world.require("brass_key").location?.id, "hall");
	});

	test("take coin from box", () => {
		const { parser } = setup();
		const command = valid(parser.parse("get coin from box"));
		assert.strictEqual(command.verb, "take");
		assert.deepStrictEqual(command.directObject, { type: "entity", id: "coin", text: "coin" });
		assert.strictEqual(command.preposition, "from");
	});

	test("two doors are AMBIGUOUS", () => {
		const { parser, disambiguator } = setup();
		const result = parser.parse("open door");
		assert.strictEqual(result.valid, false);
		if (!result.valid) {
			assert.strictEqual(result.error, PARSE_ERROR.AMBIGUOUS);
			assert.deepStrictEqual(result.candidates, ["red_door", "blue_door"]);
			assert.strictEqual(result.message, "Which do you mean, the red door or the blue door?");
		}
		assert.deepStrictEqual(disambiguator.lastAmbiguous, ["red_door", "blue_door"]);
	});

	test("an object not in scope is NOT_FOUND", () => {
		const { parser } = setup();
		const result = parser.parse("take unicorn");
		assert.strictEqual(result.valid, false);
		if (!result.valid) {
			assert.strictEqual(result.error, PARSE_ERROR.NOT_FOUND);
			assert.strictEqual(result.message, "I don't see that here.");
		}
	});

	test("nothing can be found in the dark", () => {
		const { parser, world } = setup();
		world.player.moveTo(world.require("cellar"));
		const result = parser.parse("take rope");
		assert.strictEqual(result.valid ? undefined : result.error, PARSE_ERROR.NOT_FOUND);
		assert.strictEqual(valid(parser.parse("south")).verb, "go");
	});

	test("an unknown first word is still taken as the verb", () => {
		const { parser } = setup();
		const dance = valid(parser.parse("dance wildly"));
		assert.strictEqual(dance.verb, "dance");
		assert.strictEqual(dance.deferred, true);
		assert.deepStrictEqual(dance.directObject, { type: "text", text: "wildly" });
		const xyzzy = valid(parser.parse("xyzzy"));
		assert.strictEqual(xyzzy.verb, "xyzzy");
		assert.strictEqual(xyzzy.directObject, undefined);
	});

	test("the last slot keeps everything after its preposition", () => {
		const { parser } = setup();
		const night = valid(parser.parse("ask the butler about the night of the murder"));
		assert.strictEqual(night.verb, "ask");
		assert.strictEqual(night.deferred, false);
		assert.deepStrictEqual(night.directObject, { type: "entity", id: "butler", text: "butler" });
		assert.strictEqual(night.preposition, "about");
		assert.deepStrictEqual(night.indirectObject, { type: "text", text: "night of murder" });

		const portrait = valid(parser.parse("look at portrait of the duke"));
		assert.strictEqual(portrait.verb, "examine");
		assert.strictEqual(portrait.deferred, false);
		assert.deepStrictEqual(portrait.directObject, {
			type: "entity",
			id: "portrait",
			text: "portrait of duke",
		});
	});

	test("the permissive fallback defers a known verb", () => {
		const { parser } = setup();
		const command = valid(parser.parse("wait for butler"));
		assert.strictEqual(command.verb, "wait");
		assert.strictEqual(command.deferred, true);
		assert.strictEqual(command.directObject, undefined);
		assert.strictEqual(command.preposition, "for");
		assert.deepStrictEqual(command.indirectObject, { type: "text", text: "butler" });
	});

	test("without the fallback a misfit is NO_PATTERN_MATCH", () => {
		const { parser } = setup({ lenient_fallback: false });
		const result = parser.parse("wait for butler");
		assert.strictEqual(result.valid ? undefined : result.error, PARSE_ERROR.NO_PATTERN_MATCH);
	});

	test("shortcuts and alternative verbs", () => {
		const { parser } = setup();
		const examine = valid(parser.parse("x box"));
		assert.strictEqual(examine.verb, "examine");
		assert.deepStrictEqual(examine.directObject, { type: "entity", id: "box", text: "box" });
		assert.strictEqual(valid(parser.parse("look at box")).verb, "examine");
		assert.strictEqual(valid(parser.parse("l")).verb, "look");
	});

	test("topics resolve when they can and stay text when they cannot", () => {
		const { parser } = setup();
		const murder = valid(parser.parse("ask butler about murder"));
		assert.deepStrictEqual(murder.directObject, { type: "entity", id: "butler", text: "butler" });
		assert.deepStrictEqual(murder.indirectObject, { type: "text", text: "murder" });
		assert.strictEqual(murder.preposition, "about");
		const key = valid(parser.parse("ask butler about key"));
		assert.deepStrictEqual(key.indirectObject, { type: "entity", id: "brass_key", text: "key" });
	});

	test("again repeats the last valid command", () => {
		const { parser } = setup();
		const nothing = parser.parse("again");
		assert.strictEqual(nothing.valid ? undefined : nothing.error, PARSE_ERROR.NOTHING_TO_REPEAT);

		const first = valid(parser.parse("take key"));
		parser.parse("take unicorn");
		const repeated = valid(parser.parse("g"));
		assert.notStrictEqual(repeated, first);
		assert.strictEqual(repeated.verb, "take");
		assert.strictEqual(repeated.raw, "take key");
		assert.deepStrictEqual(repeated.directObject, first.directObject);
		assert.strictEqual(parser.lastCommand, first);
	});

	test("input after a conjunction is kept as the remainder", () => {
		const { parser } = setup();
		const command = valid(parser.parse("take key and open box"));
		assert.strictEqual(command.verb, "take");
		assert.strictEqual(command.remainder, "open box");
		assert.strictEqual(valid(parser.parse("take key, then wait")).remainder, "then wait");
		assert.strictEqual(valid(parser.parse("then wait")).verb, "wait");
	});
});
