import assert from "node:assert";
import { suite, test } from "node:test";

import {
	DIRECTION,
	DIRECTIONS,
	dir2reverse,
	dir2text,
	isDirectionText,
	isDirectionWord,
	text2dir,
} from "./direction.js";

suite("direction.ts", () => {
	test("should map directions to their text representations", () => {
		assert.strictEqual(dir2text(DIRECTION.NORTH), "north");
		assert.strictEqual(dir2text(DIRECTION.SOUTHWEST), "southwest");
		assert.strictEqual(dir2text(DIRECTION.IN), "in");
		assert.strictEqual(dir2text(DIRECTION.NORTH, true), "n");
		assert.strictEqual(dir2text(DIRECTION.OUT, true), "out");
	});

	test("should parse full, short and spelled-out words", () => {
		assert.strictEqual(text2dir("north"), DIRECTION.NORTH);
		assert.strictEqual(text2dir("NE"), DIRECTION.NORTHEAST);
		assert.strictEqual(text2dir("inside"), DIRECTION.IN);
		assert.strictEqual(text2dir("key"), undefined);
		assert.strictEqual(isDirectionWord("u"), true);
		assert.strictEqual(isDirectionWord("enter"), false);
	});

	test("every direction reverses back to itself", () => {
		for (const dir of DIRECTIONS) {
			const reverse = dir2reverse(dir);
			assert.ok(reverse !== undefined);
			assert.strictEqual(dir2reverse(reverse), dir);
		}
	});

	test("isDirectionText only accepts full names", () => {
		assert.strictEqual(isDirectionText("north"), true);
		assert.strictEqual(isDirectionText("n"), false);
	});
});
