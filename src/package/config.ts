/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it with defaults if missing) and merges
 * the known keys over {@link CONFIG_DEFAULT}.
 *
 * Behavior
 * - Merges only known keys of the right type (unknown keys are ignored,
 *   mistyped ones warned about and left at their default)
 * - If the file does not exist, writes the defaults to disk
 * - A file that exists but is not valid YAML is an error
 *
 * @example
 * import { loadConfig } from './package/config.js';
 * const config = await loadConfig('data/config.yaml');
 * console.log(config.parser.max_candidates_listed);
 *
 * @module package/config
 */
import { dirname, relative } from "path";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import YAML from "js-yaml";
import defaultLogger, { type Logger } from "../logger.js";
import { getSafeRootDirectory } from "../utils/path.js";
import { isRecord } from "../utils/types.js";
import { CONFIG_DEFAULT, defaultConfig, type Config } from "../config.js";
import type { Package } from "./package.js";
import type { EngineState } from "./state.js";

export interface LoadConfigOptions {
	logger?: Logger;
}

/**
 * Reads one section of the raw config, logging each key it settles.
 */
class SectionReader {
	constructor(
		private readonly section: string,
		private readonly raw: Record<string, unknown>,
		private readonly logger: Logger
	) {}

	private take<T>(
		key: string,
		fallback: T,
		accept: (value: unknown) => value is T,
		expected: string
	): T {
		const value = this.raw[key];
		if (value === undefined) {
			this.logger.debug(`DEFAULT ${this.section}.${key} = ${String(fallback)}`);
			return fallback;
		}
		if (!accept(value)) {
			this.logger.warn(
				`Ignoring ${this.section}.${key}: expected ${expected}, got ${JSON.stringify(value)}`
			);
			return fallback;
		}
		this.logger.debug(`Set ${this.section}.${key} = ${String(value)}`);
		return value;
	}

	boolean(key: string, fallback: boolean): boolean {
		return this.take(key, fallback, (v): v is boolean => typeof v === "boolean", "a boolean");
	}

	count(key: string, fallback: number): number {
		return this.take(
			key,
			fallback,
			(v): v is number => typeof v === "number" && Number.isInteger(v) && v > 0,
			"a positive integer"
		);
	}

	string(key: string, fallback: string): string {
		return this.take(
			key,
			fallback,
			(v): v is string => typeof v === "string" && v.length > 0,
			"a string"
		);
	}

	strings(key: string, fallback: string[]): string[] {
		return this.take(
			key,
			fallback,
			(v): v is string[] =>
				Array.isArray(v) && v.length > 0 && v.every((item) => typeof item === "string"),
			"a list of strings"
		);
	}

	/** Logs the keys this section does not know. */
	unknown(known: readonly string[]): void {
		for (const key of Object.keys(this.raw))
			if (!known.includes(key))
				this.logger.debug(`Ignoring unknown key ${this.section}.${key}`);
	}
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
	const value = raw[name];
	return isRecord(value) ? value : {};
}

/**
 * Merges a parsed config document over the defaults.
 */
export function mergeConfig(raw: unknown, logger: Logger = defaultLogger): Config {
	const config = defaultConfig();
	const document = isRecord(raw) ? raw : {};

	const parser = new SectionReader("parser", section(document, "parser"), logger);
	config.parser.lenient_fallback = parser.boolean(
		"lenient_fallback",
		config.parser.lenient_fallback
	);
	config.parser.max_candidates_listed = parser.count(
		"max_candidates_listed",
		config.parser.max_candidates_listed
	);
	config.parser.again_words = parser.strings("again_words", config.parser.again_words);
	parser.unknown(Object.keys(CONFIG_DEFAULT.parser));

	const world = new SectionReader("world", section(document, "world"), logger);
	config.world.data_file = world.string("data_file", config.world.data_file);
	world.unknown(Object.keys(CONFIG_DEFAULT.world));

	const lexicon = new SectionReader("lexicon", section(document, "lexicon"), logger);
	config.lexicon.vocabulary_file = lexicon.string(
		"vocabulary_file",
		config.lexicon.vocabulary_file
	);
	config.lexicon.syntax_file = lexicon.string("syntax_file", config.lexicon.syntax_file);
	lexicon.unknown(Object.keys(CONFIG_DEFAULT.lexicon));

	return config;
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Writes the default config to `path` through a temporary file.
 */
async function writeDefaultConfig(path: string, logger: Logger): Promise<void> {
	const content = YAML.dump(defaultConfig(), { noRefs: true, lineWidth: 120 });
	const tempPath = `${path}.tmp`;
	await mkdir(dirname(path), { recursive: true });
	try {
		await writeFile(tempPath, content, "utf-8");
		await rename(tempPath, path);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError: unknown) => {
			logger.debug(`could not remove ${tempPath}: ${String(cleanupError)}`);
		});
		throw writeError;
	}
}

/**
 * Loads the config file at `path`, writing the defaults there if it does not
 * exist yet.
 */
export async function loadConfig(
	path: string,
	options: LoadConfigOptions = {}
): Promise<Config> {
	const logger = options.logger ?? defaultLogger;
	logger.debug(`Loading config from ${relative(getSafeRootDirectory(), path)}`);
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (!isMissingFile(error)) throw error;
		logger.debug(`Config file not found, creating default at ${path}`);
		await writeDefaultConfig(path, logger);
		return defaultConfig();
	}
	const config = mergeConfig(YAML.load(content), logger);
	logger.info("Config loaded successfully");
	return config;
}

export default {
	name: "config",
	loader: async (state) => {
		state.config = await loadConfig(state.configPath, { logger: state.logger });
	},
} satisfies Package<EngineState>;
