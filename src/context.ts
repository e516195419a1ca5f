import { select } from "@inquirer/prompts";
import type { AssetSummary } from "@gdm/catalog";
import { HttpCatalog } from "@gdm/catalog";
import { Engine } from "@gdm/engine";
import { SimpleGitTransport } from "@gdm/git";
import { isJsonMode, sanitize, setDebug, setJsonMode } from "@gdm/output";
import { requireProject } from "@gdm/paths";
import { resolveSettings, type Settings } from "@gdm/settings";

/**
 * Options every command accepts.
 */
export interface GlobalOptions {
	cwd?: string;
	json?: boolean;
	verbose?: boolean;
	apiUrl?: string;
	manifest?: string;
	projectFile?: string;
	addonsDir?: string;
	timeout?: string;
	concurrency?: string;
}

/**
 * Apply output flags and resolve settings for a command run.
 */
export function loadSettings(options: GlobalOptions): Settings {
	setJsonMode(Boolean(options.json));
	if (options.verbose) setDebug(true);
	return resolveSettings({
		apiUrl: options.apiUrl,
		manifestFile: options.manifest,
		projectFile: options.projectFile,
		addonsDir: options.addonsDir,
		timeoutMs: options.timeout,
		concurrency: options.concurrency,
	});
}

export function createCatalog(settings: Settings): HttpCatalog {
	return new HttpCatalog({ baseUrl: settings.apiUrl, timeoutMs: settings.timeoutMs });
}

/** Interactive pick among several catalog matches; only offered on a terminal. */
async function chooseAsset(name: string, candidates: AssetSummary[]): Promise<AssetSummary | undefined> {
	if (isJsonMode() || !process.stdin.isTTY || !process.stdout.isTTY) return undefined;
	return select({
		message: `Several assets match "${name}". Which one?`,
		choices: candidates.map(candidate => ({
			name: `${sanitize(candidate.title)} ${sanitize(candidate.version)} by ${sanitize(candidate.author)} (asset id ${candidate.assetId})`,
			value: candidate,
		})),
	});
}

/**
 * Engine for the project around `options.cwd` (or the working directory).
 */
export function createEngine(options: GlobalOptions, settings: Settings = loadSettings(options)): Engine {
	return new Engine({
		paths: requireProject(settings, options.cwd),
		catalog: createCatalog(settings),
		git: new SimpleGitTransport(settings.timeoutMs),
		concurrency: settings.concurrency,
		chooseAsset,
	});
}
