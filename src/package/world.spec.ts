import { suite, test, before, after } from "node:test";
import assert from "node:assert";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import logger from "../logger.js";
import { defaultConfig } from "../config.js";
import { ENTITY_FLAG } from "../flags.js";
import { WorldDataError } from "../errors.js";
import { getBundledDataDirectory } from "../utils/path.js";
import worldPkg, { loadWorld } from "./world.js";
import type { EngineState } from "./state.js";

const SMALL_WORLD = `
player:
  starting_room: hall
rooms:
  hall:
    contents: [lamp]
objects:
  lamp:
    kind: light
    name: brass lamp
    flags: [takeable]
`;

suite("package/world.ts", () => {
	let root: string;

	before(async () => {
		root = await mkdtemp(join(tmpdir(), "adventure-world-"));
		await mkdir(join(root, "worlds"), { recursive: true });
		await writeFile(join(root, "worlds", "small.yaml"), SMALL_WORLD, "utf-8");
		await writeFile(join(root, "worlds", "broken.yaml"), "rooms: [hall]\n", "utf-8");
	});

	after(async () => {
		await rm(root, { recursive: true, force: true });
	});

	test("loads a world file", async () => {
		const world = await loadWorld(join(root, "worlds", "small.yaml"));
		assert.strictEqual(world.currentRoom?.id, "hall");
		assert.strictEqual(world.require("lamp").kind, "light");
		assert.strictEqual(world.require("lamp").location?.id, "hall");
	});

	test("rejects a missing file", async () => {
		await assert.rejects(() => loadWorld(join(root, "worlds", "missing.yaml")));
	});

	test("rejects malformed world data", async () => {
		await assert.rejects(() => loadWorld(join(root, "worlds", "broken.yaml")), WorldDataError);
	});

	test("loads the bundled sample world", async () => {
		const world = await loadWorld(join(getBundledDataDirectory(), "world.yaml"));
		assert.deepStrictEqual(world.validate(), []);
		assert.strictEqual(world.currentRoom?.id, "foyer");
		assert.strictEqual(world.require("notebook").location, world.player);
		assert.strictEqual(world.require("brass_key").location?.id, "writing_desk");
		assert.strictEqual(world.require("strongbox").hasFlag(ENTITY_FLAG.LOCKED), true);
		assert.strictEqual(world.require("bootprint").hasFlag(ENTITY_FLAG.HIDDEN), true);
	});

	test("package loader reads the configured file under the root", async () => {
		const config = defaultConfig();
		config.world.data_file = "worlds/small.yaml";
		const state: EngineState = { root, configPath: join(root, "config.yaml"), logger, config };
		await worldPkg.loader(state);
		assert.strictEqual(state.world?.has("lamp"), true);
	});
});
