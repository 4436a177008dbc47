/**
 * Package: world - world tables from YAML
 *
 * Reads the world file named by `world.data_file` (relative to the root
 * directory) and assembles it with {@link buildWorld}. A missing or malformed
 * file is an error: there is no default world.
 *
 * @module package/world
 */
import { join, relative } from "path";
import { readFile } from "fs/promises";
import YAML from "js-yaml";
import defaultLogger, { type Logger } from "../logger.js";
import { buildWorld } from "../loader.js";
import { CONFIG_DEFAULT } from "../config.js";
import { getSafeRootDirectory } from "../utils/path.js";
import type { World } from "../world.js";
import configPkg from "./config.js";
import type { Package } from "./package.js";
import type { EngineState } from "./state.js";

export interface LoadWorldOptions {
	logger?: Logger;
}

/**
 * Reads and assembles the world at `path`.
 */
export async function loadWorld(path: string, options: LoadWorldOptions = {}): Promise<World> {
	const logger = options.logger ?? defaultLogger;
	logger.debug(`Loading world from ${relative(getSafeRootDirectory(), path)}`);
	const content = await readFile(path, "utf-8");
	return buildWorld(YAML.load(content), { logger });
}

export default {
	name: "world",
	dependencies: [configPkg],
	loader: async (state) => {
		const file = state.config?.world.data_file ?? CONFIG_DEFAULT.world.data_file;
		state.world = await loadWorld(join(state.root, file), { logger: state.logger });
	},
} satisfies Package<EngineState>;
