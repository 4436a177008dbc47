/**
 * Error classes thrown by the world model and the data loaders.
 *
 * Parser failures are never thrown; they are returned as invalid
 * {@link ParseResult}s. These classes cover programming and content errors.
 *
 * @module errors
 */

/**
 * Base class for every error raised by this package.
 */
export class AdventureError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

/**
 * Raised when an entity would be moved into itself or one of its descendants.
 * The move is rejected and the world is left unchanged.
 */
export class ContainmentCycleError extends AdventureError {
	readonly entityId: string;
	readonly targetId: string;
	constructor(entityId: string, targetId: string) {
		super(
			entityId === targetId
				? `cannot move '${entityId}' into itself`
				: `cannot move '${entityId}' into its own descendant '${targetId}'`
		);
		this.entityId = entityId;
		this.targetId = targetId;
	}
}

/**
 * Raised when an id is looked up that the world does not hold.
 */
export class UnknownEntityError extends AdventureError {
	readonly entityId: string;
	constructor(entityId: string) {
		super(`unknown entity '${entityId}'`);
		this.entityId = entityId;
	}
}

/**
 * Raised when world data cannot be turned into a world: malformed tables,
 * unknown flags, dangling references, or a kind that cannot be decided.
 */
export class WorldDataError extends AdventureError {
	readonly entityId?: string;
	constructor(message: string, entityId?: string) {
		super(entityId ? `${entityId}: ${message}` : message);
		this.entityId = entityId;
	}
}

/**
 * Raised by {@link World.assertValid} with every invariant violation found.
 */
export class WorldValidationError extends AdventureError {
	readonly problems: readonly string[];
	constructor(problems: readonly string[]) {
		super(`world failed validation:\n- ${problems.join("\n- ")}`);
		this.problems = problems;
	}
}

/**
 * Raised when a syntax pattern string cannot be compiled.
 */
export class SyntaxPatternError extends AdventureError {
	readonly pattern: string;
	constructor(pattern: string, reason: string) {
		super(`bad syntax pattern '${pattern}': ${reason}`);
		this.pattern = pattern;
	}
}

/**
 * Raised when a vocabulary or syntax table is not shaped as expected.
 */
export class LexiconError extends AdventureError {
	readonly file?: string;
	constructor(message: string, file?: string) {
		super(file ? `${file}: ${message}` : message);
		this.file = file;
	}
}
