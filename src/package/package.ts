/**
 * Package: the unit the engine loads its data through.
 *
 * A package has a name, the packages it needs loaded first, and an async
 * loader that reads its files and records what it read on the shared state.
 * {@link loadPackages} runs loaders in dependency order, each once.
 *
 * @module package/package
 */
import defaultLogger, { type Logger } from "../logger.js";
import { AdventureError } from "../errors.js";

export interface Package<S> {
	name: string;
	dependencies?: readonly Package<S>[];
	loader(state: S): Promise<void>;
}

export class PackageCycleError extends AdventureError {
	constructor(readonly chain: readonly string[]) {
		super(`package dependency cycle: ${chain.join(" -> ")}`);
	}
}

/**
 * Loads `packages` and their dependencies, dependencies first.
 * Returns the names in the order they were loaded.
 */
export async function loadPackages<S>(
	packages: readonly Package<S>[],
	state: S,
	logger: Logger = defaultLogger
): Promise<string[]> {
	const order: Package<S>[] = [];
	const done = new Set<Package<S>>();
	const visiting: Package<S>[] = [];

	const visit = (pkg: Package<S>): void => {
		if (done.has(pkg)) return;
		if (visiting.includes(pkg)) {
			const start = visiting.indexOf(pkg);
			throw new PackageCycleError([...visiting.slice(start), pkg].map((p) => p.name));
		}
		visiting.push(pkg);
		for (const dependency of pkg.dependencies ?? []) visit(dependency);
		visiting.pop();
		done.add(pkg);
		order.push(pkg);
	};
	for (const pkg of packages) visit(pkg);

	for (const pkg of order)
		await logger.block(pkg.name, async () => {
			await pkg.loader(state);
		});
	return order.map((pkg) => pkg.name);
}
