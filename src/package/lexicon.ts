/**
 * Package: lexicon - vocabulary and syntax tables
 *
 * Reads the built-in word and pattern tables shipped under `data/defaults/`,
 * then the user's extension files named in the `lexicon` config section when
 * they exist. Tables are checked here and handed to the core as plain data.
 *
 * Vocabulary files map a word type to canonical words and their synonyms:
 * ```yaml
 * verb:
 *   take: [get, grab]
 * adjective:
 *   rusty: [rusted]
 * ```
 *
 * Syntax files list patterns, as strings or with an explicit verb:
 * ```yaml
 * - take <direct:object>
 * - pattern: look under <direct:object>
 *   verb: look-under
 * ```
 *
 * @module package/lexicon
 */
import { join, relative } from "path";
import { readFile } from "fs/promises";
import YAML from "js-yaml";
import defaultLogger, { type Logger } from "../logger.js";
import { LexiconError } from "../errors.js";
import { CONFIG_DEFAULT, type LexiconConfig } from "../config.js";
import { getBundledDataDirectory, getSafeRootDirectory } from "../utils/path.js";
import { isRecord } from "../utils/types.js";
import { text2wordType, type VocabularyTable } from "../parser/vocabulary.js";
import { SyntaxPattern, type SyntaxTableEntry } from "../parser/syntax.js";
import configPkg from "./config.js";
import type { Package } from "./package.js";
import type { EngineState } from "./state.js";

export interface Lexicon {
	/** Word tables, built-in first. */
	vocabulary: VocabularyTable[];
	/** Syntax patterns in the order they are tried. */
	syntax: SyntaxTableEntry[];
}

export interface LoadLexiconOptions {
	root?: string;
	config?: LexiconConfig;
	/** Directory holding the built-in tables. */
	defaultsDirectory?: string;
	logger?: Logger;
}

function wordList(value: unknown, where: string, file?: string): string[] {
	if (value === null || value === undefined) return [];
	if (typeof value === "string") return [value.toLowerCase()];
	if (Array.isArray(value) && value.every((word): word is string => typeof word === "string"))
		return value.map((word) => word.toLowerCase());
	throw new LexiconError(`${where} must be a word or a list of words`, file);
}

/**
 * Checks a parsed vocabulary document.
 */
export function parseVocabularyTable(raw: unknown, file?: string): VocabularyTable {
	if (raw === null || raw === undefined) return {};
	if (!isRecord(raw)) throw new LexiconError("vocabulary must be a mapping", file);
	const table: VocabularyTable = {};
	for (const [typeName, group] of Object.entries(raw)) {
		const type = text2wordType(typeName);
		if (type === undefined)
			throw new LexiconError(`unknown word type '${typeName}'`, file);
		if (group === null) continue;
		if (!isRecord(group))
			throw new LexiconError(`'${typeName}' must map words to synonyms`, file);
		const words: Record<string, string[]> = {};
		for (const [canonical, synonyms] of Object.entries(group))
			words[canonical.toLowerCase()] = wordList(synonyms, `${typeName}.${canonical}`, file);
		table[type] = words;
	}
	return table;
}

/**
 * Checks a parsed syntax document, compiling each pattern to catch mistakes
 * at load time.
 */
export function parseSyntaxTable(raw: unknown, file?: string): SyntaxTableEntry[] {
	if (raw === null || raw === undefined) return [];
	if (!Array.isArray(raw)) throw new LexiconError("syntax must be a list of patterns", file);
	return raw.map((item: unknown, index) => {
		let entry: SyntaxTableEntry;
		if (typeof item === "string") entry = { pattern: item };
		else {
			const pattern = isRecord(item) ? item.pattern : undefined;
			const verb = isRecord(item) ? item.verb : undefined;
			if (typeof pattern !== "string")
				throw new LexiconError(`entry ${index + 1} has no pattern`, file);
			if (verb !== undefined && typeof verb !== "string")
				throw new LexiconError(`entry ${index + 1}: 'verb' must be a string`, file);
			entry = verb === undefined ? { pattern } : { pattern, verb };
		}
		new SyntaxPattern(entry);
		return entry;
	});
}

async function readYaml(path: string, optional: boolean, logger: Logger): Promise<unknown> {
	try {
		return YAML.load(await readFile(path, "utf-8"));
	} catch (error) {
		if (
			optional &&
			error instanceof Error &&
			"code" in error &&
			error.code === "ENOENT"
		) {
			logger.debug(`No file at ${relative(getSafeRootDirectory(), path)}, skipping`);
			return undefined;
		}
		throw error;
	}
}

/**
 * Reads the built-in tables and any user extensions.
 */
export async function loadLexicon(options: LoadLexiconOptions = {}): Promise<Lexicon> {
	const logger = options.logger ?? defaultLogger;
	const root = options.root ?? getSafeRootDirectory();
	const config = options.config ?? CONFIG_DEFAULT.lexicon;
	const defaults = options.defaultsDirectory ?? join(getBundledDataDirectory(), "defaults");

	const vocabularyPath = join(defaults, "vocabulary.yaml");
	const syntaxPath = join(defaults, "syntax.yaml");
	const lexicon: Lexicon = {
		vocabulary: [
			parseVocabularyTable(await readYaml(vocabularyPath, false, logger), vocabularyPath),
		],
		syntax: parseSyntaxTable(await readYaml(syntaxPath, false, logger), syntaxPath),
	};

	const userVocabulary = join(root, config.vocabulary_file);
	const extraWords = await readYaml(userVocabulary, true, logger);
	if (extraWords !== undefined)
		lexicon.vocabulary.push(parseVocabularyTable(extraWords, userVocabulary));

	const userSyntax = join(root, config.syntax_file);
	const extraPatterns = await readYaml(userSyntax, true, logger);
	if (extraPatterns !== undefined)
		lexicon.syntax.push(...parseSyntaxTable(extraPatterns, userSyntax));

	logger.info(
		`Loaded lexicon: ${lexicon.vocabulary.length} word tables, ${lexicon.syntax.length} patterns`
	);
	return lexicon;
}

export default {
	name: "lexicon",
	dependencies: [configPkg],
	loader: async (state) => {
		state.lexicon = await loadLexicon({
			root: state.root,
			config: state.config?.lexicon,
			logger: state.logger,
		});
	},
} satisfies Package<EngineState>;
