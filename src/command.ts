/**
 * Command dispatch. Hands parsed commands to the handler for their verb.
 *
 * The parser decides *what* the player asked for; handlers decide what
 * happens. Handlers register under a canonical verb (plus aliases) and receive
 * a {@link CommandContext} and the parsed command.
 *
 * ## Deferred commands
 *
 * When no syntax pattern fits, the parser's permissive fallback still returns
 * a valid command, marked `deferred`, whose objects are raw text. The
 * dispatcher never passes such text to a handler: before dispatching, each
 * text object is run through the disambiguator with the command's verb. A
 * single match becomes an entity reference, a lone direction word becomes a
 * direction reference, and anything else fails with NOT_FOUND or AMBIGUOUS.
 *
 * ## Example
 *
 * ```typescript
 * const dispatcher = new CommandDispatcher({ world, scope, disambiguator, classifier });
 * dispatcher.register({
 *   verb: "take",
 *   aliases: ["get"],
 *   execute(context, command) {
 *     if (command.directObject?.type !== "entity") return "Take what?";
 *     context.world.require(command.directObject.id).moveTo(context.actor);
 *     return "Taken.";
 *   },
 * });
 *
 * const outcome = dispatcher.dispatch(parser.parse("take lamp"));
 * console.log(outcome.ok ? outcome.output : outcome.failure.message);
 * ```
 *
 * @module command
 */
import defaultLogger, { type Logger } from "./logger.js";
import { CONFIG_DEFAULT } from "./config.js";
import { isDirectionText } from "./direction.js";
import type { Entity } from "./entity.js";
import type { World } from "./world.js";
import type { ScopeResolver } from "./scope.js";
import type { Classifier } from "./parser/classifier.js";
import type { Disambiguator } from "./parser/disambiguator.js";
import { tokenize } from "./parser/tokenizer.js";
import { nounPhrase } from "./parser/parser.js";
import { WORD_TYPE } from "./parser/vocabulary.js";
import {
	PARSE_ERROR,
	ambiguous,
	failure,
	type ParseFailure,
	type ParseResult,
	type ParsedCommand,
	type Reference,
} from "./parser/parse-result.js";

/**
 * What a handler gets to work with.
 */
export interface CommandContext {
	world: World;
	/** The entity performing the command, normally the player. */
	actor: Entity;
	/** The room the actor is in, if any. */
	room?: Entity;
	scope: ScopeResolver;
}

export interface CommandHandler {
	/** Canonical verb this handler answers. */
	readonly verb: string;
	readonly aliases?: readonly string[];
	/**
	 * Carries out the command. The returned text, if any, is shown to the
	 * player.
	 */
	execute(context: CommandContext, command: ParsedCommand): string | void;
}

export type DispatchOutcome =
	| { ok: true; command: ParsedCommand; handler: CommandHandler; output?: string }
	| { ok: false; failure: ParseFailure };

export interface CommandDispatcherOptions {
	world: World;
	scope: ScopeResolver;
	disambiguator: Disambiguator;
	classifier: Classifier;
	maxCandidatesListed?: number;
	logger?: Logger;
}

type Revalidated = { reference?: Reference } | { failure: ParseFailure };

export class CommandDispatcher {
	private readonly handlers = new Map<string, CommandHandler>();
	private readonly world: World;
	private readonly scope: ScopeResolver;
	private readonly disambiguator: Disambiguator;
	private readonly classifier: Classifier;
	private readonly maxCandidatesListed: number;
	private readonly logger: Logger;

	constructor(options: CommandDispatcherOptions) {
		this.world = options.world;
		this.scope = options.scope;
		this.disambiguator = options.disambiguator;
		this.classifier = options.classifier;
		this.maxCandidatesListed =
			options.maxCandidatesListed ?? CONFIG_DEFAULT.parser.max_candidates_listed;
		this.logger = options.logger ?? defaultLogger;
	}

	/**
	 * Registers a handler under its verb and aliases. A later handler for the
	 * same word replaces the earlier one.
	 */
	register(handler: CommandHandler): void {
		for (const word of [handler.verb, ...(handler.aliases ?? [])]) {
			const key = word.toLowerCase();
			if (this.handlers.has(key))
				this.logger.warn(`handler for '${key}' replaced`);
			this.handlers.set(key, handler);
		}
	}

	/**
	 * Removes a handler from every word it was registered under.
	 */
	unregister(handler: CommandHandler): void {
		for (const [word, registered] of this.handlers)
			if (registered === handler) this.handlers.delete(word);
	}

	handlerFor(verb: string): CommandHandler | undefined {
		return this.handlers.get(verb.toLowerCase());
	}

	verbs(): string[] {
		return Array.from(this.handlers.keys());
	}

	/**
	 * Runs the handler for a parse result.
	 *
	 * Failed parses are passed back untouched. A verb with no handler is
	 * NO_PATTERN_MATCH. Deferred commands are checked against the world first.
	 */
	dispatch(result: ParseResult, actor: Entity = this.world.player): DispatchOutcome {
		if (!result.valid) return { ok: false, failure: result };

		const handler = this.handlerFor(result.verb);
		if (!handler) {
			this.logger.debug(`no handler for verb '${result.verb}'`);
			return { ok: false, failure: failure(PARSE_ERROR.NO_PATTERN_MATCH, result.raw) };
		}

		let command = result;
		if (result.deferred) {
			const direct = this.revalidate(result.directObject, result, actor);
			if ("failure" in direct) return { ok: false, failure: direct.failure };
			const indirect = this.revalidate(result.indirectObject, result, actor);
			if ("failure" in indirect) return { ok: false, failure: indirect.failure };
			command = {
				...result,
				directObject: direct.reference,
				indirectObject: indirect.reference,
				deferred: false,
			};
			this.logger.debug(`revalidated deferred command '${result.raw}'`);
		}

		const context: CommandContext = {
			world: this.world,
			actor,
			room: actor.room,
			scope: this.scope,
		};
		const output = handler.execute(context, command);
		return { ok: true, command, handler, output: output ?? undefined };
	}

	private revalidate(
		reference: Reference | undefined,
		command: ParsedCommand,
		actor: Entity
	): Revalidated {
		if (!reference || reference.type !== "text") return { reference };
		const tokens = this.classifier.classify(tokenize(reference.text));
		if (tokens.length === 0) return { reference: undefined };

		const only = tokens.length === 1 ? tokens[0] : undefined;
		if (only?.type === WORD_TYPE.DIRECTION && isDirectionText(only.canonical))
			return {
				reference: { type: "direction", direction: only.canonical, text: reference.text },
			};

		const { head, modifiers } = nounPhrase(tokens);
		const resolution = this.disambiguator.disambiguate(head, modifiers, {
			verb: command.verb,
			viewpoint: actor,
		});
		switch (resolution.status) {
			case "resolved":
				return {
					reference: { type: "entity", id: resolution.entity.id, text: reference.text },
				};
			case "ambiguous":
				return {
					failure: ambiguous(resolution.candidates, command.raw, this.maxCandidatesListed),
				};
			case "not-found":
				return { failure: failure(PARSE_ERROR.NOT_FOUND, command.raw) };
		}
	}
}
