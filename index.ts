export {
	ENTITY_FLAG,
	ENTITY_FLAGS,
	MUTABLE_FLAGS,
	FlagSet,
	flag2text,
	text2flag,
	type FlagText,
} from "./src/flags.js";
export {
	DIRECTION,
	DIRECTIONS,
	dir2reverse,
	dir2text,
	text2dir,
	isDirectionText,
	type DirectionText,
} from "./src/direction.js";
export * from "./src/errors.js";
export {
	Entity,
	ENTITY_KINDS,
	PROPERTY_DEFAULTS,
	impliedFlags,
	isEntityKind,
	type EntityArena,
	type EntityKind,
	type EntityOptions,
	type KindData,
} from "./src/entity.js";
export { World, hasKind } from "./src/world.js";
export { ScopeResolver, revealsContents } from "./src/scope.js";
export { buildWorld, createEntity, inferKind, type WorldData } from "./src/loader.js";
export {
	Vocabulary,
	WORD_TYPE,
	type VocabularyEntry,
	type VocabularyTable,
} from "./src/parser/vocabulary.js";
export { tokenize } from "./src/parser/tokenizer.js";
export { Classifier, type Token } from "./src/parser/classifier.js";
export {
	SyntaxMatcher,
	SyntaxPattern,
	type SyntaxMatch,
	type SyntaxTableEntry,
} from "./src/parser/syntax.js";
export { Disambiguator, type Resolution } from "./src/parser/disambiguator.js";
export { CommandParser } from "./src/parser/parser.js";
export * from "./src/parser/parse-result.js";
export {
	CommandDispatcher,
	type CommandContext,
	type CommandHandler,
	type DispatchOutcome,
} from "./src/command.js";
export { CONFIG_DEFAULT, defaultConfig, type Config } from "./src/config.js";
export { createContext, type ContextParts, type EngineContext } from "./src/context.js";
export { createEngine, type EngineOptions } from "./src/engine.js";
export { loadConfig } from "./src/package/config.js";
export { loadLexicon, type Lexicon } from "./src/package/lexicon.js";
export { loadWorld } from "./src/package/world.js";
export { default as logger, type Logger } from "./src/logger.js";
