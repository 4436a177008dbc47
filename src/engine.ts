/**
 * Engine bootstrap: loads config, lexicon and world from disk, then builds an
 * {@link EngineContext}.
 *
 * @example
 * ```typescript
 * const engine = await createEngine({ root: "/srv/mystery" });
 * const result = engine.parser.parse("take the brass key");
 * ```
 *
 * @module engine
 */
import { join } from "path";
import defaultLogger, { type Logger } from "./logger.js";
import { getSafeRootDirectory } from "./utils/path.js";
import { createContext, type EngineContext } from "./context.js";
import type { CommandHandler } from "./command.js";
import { loadPackages } from "./package/package.js";
import type { EngineState } from "./package/state.js";
import configPkg from "./package/config.js";
import lexiconPkg from "./package/lexicon.js";
import worldPkg from "./package/world.js";

export interface EngineOptions {
	/** Directory the data paths resolve against. Defaults to the safe root. */
	root?: string;
	/** Config file. Defaults to `data/config.yaml` under the root. */
	configPath?: string;
	handlers?: readonly CommandHandler[];
	logger?: Logger;
}

export async function createEngine(options: EngineOptions = {}): Promise<EngineContext> {
	const logger = options.logger ?? defaultLogger;
	const root = options.root ?? getSafeRootDirectory();
	const state: EngineState = {
		root,
		configPath: options.configPath ?? join(root, "data", "config.yaml"),
		logger,
	};

	return logger.block("engine", async () => {
		await loadPackages([configPkg, lexiconPkg, worldPkg], state, logger);
		const { config, lexicon, world } = state;
		if (!config || !lexicon || !world)
			throw new Error("engine packages finished without config, lexicon or world");
		const context = createContext({
			world,
			config,
			vocabulary: lexicon.vocabulary,
			syntax: lexicon.syntax,
			handlers: options.handlers,
			logger,
		});
		logger.info(`Engine ready in ${root}`);
		return context;
	});
}
