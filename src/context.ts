/**
 * Engine context, every component of a running game wired together.
 *
 * {@link createContext} builds a context synchronously from a world and
 * in-memory tables; the async `createEngine` reads those from disk first.
 * Nothing here is global: two contexts never share state.
 *
 * @module context
 */
import defaultLogger, { type Logger } from "./logger.js";
import { defaultConfig, type Config } from "./config.js";
import type { World } from "./world.js";
import { ScopeResolver } from "./scope.js";
import { Vocabulary, type VocabularyTable } from "./parser/vocabulary.js";
import { SyntaxMatcher, type SyntaxTableEntry } from "./parser/syntax.js";
import { Disambiguator } from "./parser/disambiguator.js";
import { CommandParser } from "./parser/parser.js";
import { CommandDispatcher, type CommandHandler } from "./command.js";

export interface EngineContext {
	config: Config;
	world: World;
	vocabulary: Vocabulary;
	syntax: SyntaxMatcher;
	scope: ScopeResolver;
	disambiguator: Disambiguator;
	parser: CommandParser;
	dispatcher: CommandDispatcher;
	logger: Logger;
}

export interface ContextParts {
	world: World;
	config?: Config;
	/** Word tables loaded in order, after the built-in direction words. */
	vocabulary?: readonly VocabularyTable[];
	/** Syntax patterns in the order they are tried. */
	syntax?: readonly (SyntaxTableEntry | string)[];
	handlers?: readonly CommandHandler[];
	logger?: Logger;
}

export function createContext(parts: ContextParts): EngineContext {
	const logger = parts.logger ?? defaultLogger;
	const config = parts.config ?? defaultConfig();
	const world = parts.world;

	const vocabulary = new Vocabulary();
	for (const table of parts.vocabulary ?? []) vocabulary.load(table);
	vocabulary.registerWorld(world);

	const syntax = new SyntaxMatcher({ logger });
	syntax.load(parts.syntax ?? []);

	const scope = new ScopeResolver({ logger });
	const disambiguator = new Disambiguator(world, scope, { logger });
	const parser = new CommandParser({
		vocabulary,
		syntax,
		disambiguator,
		config: config.parser,
		logger,
	});
	const dispatcher = new CommandDispatcher({
		world,
		scope,
		disambiguator,
		classifier: parser.classifier,
		maxCandidatesListed: config.parser.max_candidates_listed,
		logger,
	});
	for (const handler of parts.handlers ?? []) dispatcher.register(handler);

	logger.debug(
		`context ready: ${vocabulary.size} words, ${syntax.size} patterns, ${world.size} entities`
	);
	return {
		config,
		world,
		vocabulary,
		syntax,
		scope,
		disambiguator,
		parser,
		dispatcher,
		logger,
	};
}
