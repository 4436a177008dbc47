import { join } from "path";
import { fileURLToPath } from "url";

/**
 * Returns the safe current working directory for runtime operations.
 * Prefers the `ADVENTURE_ROOT` environment variable and falls back to
 * `process.cwd()` otherwise.
 */
export function getSafeRootDirectory(): string {
	const rootDir = process.env.ADVENTURE_ROOT;
	if (rootDir) return rootDir;
	return process.cwd();
}

/**
 * Directory holding the data files shipped with the package
 * (`data/` at the project root, beside `src/` or `dist/src/`).
 */
export function getBundledDataDirectory(): string {
	const here = fileURLToPath(new URL(".", import.meta.url));
	// src/utils -> project root, dist/src/utils -> project root
	const depth = here.replace(/\\/g, "/").includes("/dist/src/") ? 3 : 2;
	return join(here, ...Array<string>(depth).fill(".."), "data");
}
