/**
 * Engine configuration: types and defaults.
 *
 * The configuration is loaded by the config package and carried on the
 * engine context; nothing reads it from module state.
 *
 * @module config
 */
import type { DeepReadonly } from "./utils/types.js";

export type ParserConfig = {
	/** Accept input no pattern fits, as a deferred command. */
	lenient_fallback: boolean;
	/** Most candidates named in a "Which do you mean" question. */
	max_candidates_listed: number;
	/** Words that repeat the previous command. */
	again_words: string[];
};

export type WorldConfig = {
	/** World tables, relative to the root directory. */
	data_file: string;
};

export type LexiconConfig = {
	/** Extra word table loaded after the built-in one, if the file exists. */
	vocabulary_file: string;
	/** Extra syntax patterns tried after the built-in ones, if the file exists. */
	syntax_file: string;
};

export type Config = {
	parser: ParserConfig;
	world: WorldConfig;
	lexicon: LexiconConfig;
};

export const CONFIG_DEFAULT: DeepReadonly<Config> = {
	parser: {
		lenient_fallback: true,
		max_candidates_listed: 5,
		again_words: ["again", "g"],
	},
	world: {
		data_file: "data/world.yaml",
	},
	lexicon: {
		vocabulary_file: "data/vocabulary.yaml",
		syntax_file: "data/syntax.yaml",
	},
};

/**
 * A fresh, mutable copy of the defaults.
 */
export function defaultConfig(): Config {
	return {
		parser: {
			...CONFIG_DEFAULT.parser,
			again_words: [...CONFIG_DEFAULT.parser.again_words],
		},
		world: { ...CONFIG_DEFAULT.world },
		lexicon: { ...CONFIG_DEFAULT.lexicon },
	};
}
