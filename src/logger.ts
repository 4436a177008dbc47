/**
 * Logger module - structured application logging
 *
 * Provides a preconfigured Winston logger used across the project.
 * It writes JSON-formatted logs to files and colorized human-readable logs
 * to the console (console output is disabled during tests).
 *
 * Transports
 * - File (errors): `logs/error-YYYY-MM-DD-HHMMSS[.test].log` at level `error`
 * - File (app):    `logs/app-YYYY-MM-DD-HHMMSS[.test].log` at level `debug`
 * - Console: colorized output at `LOG_LEVEL` (default `info`), disabled when
 *   `process.env.NODE_TEST_CONTEXT` is set
 *
 * Blocks
 * - `logger.block(name, fn)` runs `fn` with `name` pushed onto a label stack.
 *   Every line logged inside is prefixed with the stack (`[world > rooms]`),
 *   and the block reports how long it took at `debug`.
 *
 * Usage
 * ```ts
 * import logger from './logger.js';
 *
 * await logger.block("world", async () => {
 *   logger.info("Loading world data...");
 * });
 * logger.debug('Classified tokens', { tokens });
 * ```
 *
 * @module logger
 */
import winston from "winston";
import path from "path";
import { getSafeRootDirectory } from "./utils/path.js";

// Detect if we're running under node:test
const isTestMode = process.env.NODE_TEST_CONTEXT;

// Generate timestamp for log filenames (YYYY-MM-DD-HHMMSS)
const timestamp = new Date().toISOString().split("T");
const date = timestamp[0];
const HMS = timestamp[1].split(".")[0].split(":").join("");
const testSuffix = isTestMode ? ".test" : "";
const LOG_DIRECTORY = path.join(getSafeRootDirectory(), "logs");

/**
 * Labels of the blocks currently running, outermost first.
 */
const blockStack: string[] = [];

/**
 * Prefixes the message with the active block labels.
 */
const blockPrefix = winston.format((info) => {
	if (blockStack.length > 0)
		info.message = `[${blockStack.join(" > ")}] ${String(info.message)}`;
	return info;
});

const filePrintf = winston.format.printf(
	({ timestamp, level, message, ...meta }) =>
		`[${timestamp}] ${level.toUpperCase()}: ${message}${
			Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
		}`
);

/**
 * Application logger using Winston.
 *
 * Log levels (from highest to lowest priority):
 * - error: Content or programming errors (containment cycles, bad data)
 * - warn: Suspicious but recoverable situations
 * - info: Loading milestones
 * - debug: Parser traces (tokens, matched pattern, disambiguation steps)
 */
const base = winston.createLogger({
	level: "debug",
	format: winston.format.combine(
		blockPrefix(),
		winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json()
	),
	defaultMeta: { service: "adventure-core" },
	transports: [
		new winston.transports.File({
			filename: path.join(LOG_DIRECTORY, `error-${date}-${HMS}${testSuffix}.log`),
			level: "error",
			format: winston.format.combine(
				winston.format.uncolorize(),
				winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
				filePrintf
			),
		}),
		new winston.transports.File({
			filename: path.join(LOG_DIRECTORY, `app-${date}-${HMS}${testSuffix}.log`),
			level: "debug",
			format: winston.format.combine(
				winston.format.uncolorize(),
				winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
				filePrintf
			),
		}),
		// Console transport - disabled during test mode
		...(!isTestMode
			? [
					new winston.transports.Console({
						level: process.env.LOG_LEVEL || "info",
						format: winston.format.combine(
							winston.format.colorize(),
							winston.format.timestamp({ format: "HH:mm:ss" }),
							winston.format.printf(
								({ timestamp, level, message, ...meta }) =>
									`[${timestamp}] ${level}: ${message}${
										Object.keys(meta).length && meta.service === undefined
											? " " + JSON.stringify(meta)
											: ""
									}`
							)
						),
					}),
			  ]
			: []),
	],
});

/**
 * Winston logger with labelled, timed blocks.
 */
export type Logger = winston.Logger & {
	block<T>(name: string, fn: () => Promise<T> | T): Promise<T>;
};

async function block<T>(name: string, fn: () => Promise<T> | T): Promise<T> {
	blockStack.push(name);
	const started = Date.now();
	try {
		return await fn();
	} finally {
		base.debug(`done in ${Date.now() - started}ms`);
		blockStack.pop();
	}
}

const logger: Logger = Object.assign(base, { block });

export default logger;
