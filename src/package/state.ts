import type { Logger } from "../logger.js";
import type { Config } from "../config.js";
import type { World } from "../world.js";
import type { Lexicon } from "./lexicon.js";

/**
 * What the engine's packages read and fill in while loading.
 */
export interface EngineState {
	/** Directory relative paths in the config resolve against. */
	root: string;
	configPath: string;
	logger: Logger;
	config?: Config;
	lexicon?: Lexicon;
	world?: World;
}
