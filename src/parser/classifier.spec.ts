import assert from "node:assert";
import { suite, test } from "node:test";

import { Entity } from "../entity.js";
import { World } from "../world.js";
import { Vocabulary, WORD_TYPE } from "./vocabulary.js";
import { Classifier, fallbackClassify } from "./classifier.js";

function classifier(): Classifier {
	const world = new World();
	const item = (id: string, name: string) =>
		world.register(new Entity({ id, name, data: { kind: "item" } }));
	item("brass_key", "brass key");
	item("key_ring", "key ring");
	item("box", "box");
	item("light", "light");
	const vocabulary = new Vocabulary();
	vocabulary.load({ verb: { take: ["get"], go: [], put: [], light: ["ignite"] } });
	vocabulary.registerWorld(world);
	return new Classifier(vocabulary);
}

suite("parser/classifier.ts", () => {
	test("take the brass key", () => {
		const tokens = classifier().classify(["take", "brass", "key"]);
		assert.deepStrictEqual(
			tokens.map((token) => [token.word, token.type, token.canonical, token.position]),
			[
				["take", WORD_TYPE.VERB, "take", 0],
				["brass", WORD_TYPE.ADJECTIVE, "brass", 1],
				["key", WORD_TYPE.NOUN, "key", 2],
			]
		);
		assert.deepStrictEqual(tokens[2].entityIds, ["brass_key"]);
	});

	test("synonyms carry their canonical form", () => {
		const [verb] = classifier().classify(["get"]);
		assert.strictEqual(verb.type, WORD_TYPE.VERB);
		assert.strictEqual(verb.canonical, "take");
	});

	test("in is a direction after a movement verb and a preposition elsewhere", () => {
		const c = classifier();
		assert.strictEqual(c.classify(["go", "in"])[1].type, WORD_TYPE.DIRECTION);
		assert.strictEqual(c.classify(["put", "key", "in", "box"])[2].type, WORD_TYPE.PREPOSITION);
	});

	test("a word followed by a noun is read as an adjective", () => {
		const c = classifier();
		assert.strictEqual(c.classify(["take", "key", "ring"])[1].type, WORD_TYPE.ADJECTIVE);
		assert.strictEqual(c.classify(["take", "key"])[1].type, WORD_TYPE.NOUN);
	});

	test("the first word prefers a verb, later words anything else", () => {
		const tokens = classifier().classify(["light", "light"]);
		assert.strictEqual(tokens[0].type, WORD_TYPE.VERB);
		assert.strictEqual(tokens[1].type, WORD_TYPE.NOUN);
	});

	test("unknown words fall back to closed tables", () => {
		const tokens = classifier().classify(["take", "xyzzy", "3"]);
		assert.strictEqual(tokens[1].type, WORD_TYPE.UNKNOWN);
		assert.strictEqual(tokens[2].type, WORD_TYPE.NUMBER);
	});

	test("fallbackClassify", () => {
		assert.deepStrictEqual(fallbackClassify("ne"), {
			type: WORD_TYPE.DIRECTION,
			canonical: "northeast",
		});
		assert.deepStrictEqual(fallbackClassify("beside"), {
			type: WORD_TYPE.PREPOSITION,
			canonical: "beside",
		});
		assert.deepStrictEqual(fallbackClassify("007"), { type: WORD_TYPE.NUMBER, canonical: "7" });
		assert.deepStrictEqual(fallbackClassify("000"), { type: WORD_TYPE.NUMBER, canonical: "0" });
		assert.deepStrictEqual(fallbackClassify("0123456789012345678901"), {
			type: WORD_TYPE.NUMBER,
			canonical: "123456789012345678901",
		});
		assert.deepStrictEqual(fallbackClassify("save"), { type: WORD_TYPE.SPECIAL, canonical: "save" });
		assert.deepStrictEqual(fallbackClassify("frob"), { type: WORD_TYPE.UNKNOWN, canonical: "frob" });
	});
});
