import chalk from "chalk";
import { type GlobalOptions, createCatalog, loadSettings } from "@gdm/context";
import { GdmError } from "@gdm/errors";
import { log, outputJson, sanitize } from "@gdm/output";
import { findProjectRoot, getProjectPaths } from "@gdm/paths";
import { ProjectConfig } from "@gdm/project-config";

export interface SearchOptions extends GlobalOptions {
	godotVersion?: string;
	limit?: string;
}

/**
 * Search the asset catalog. Inside a project the engine version defaults to
 * the project's own.
 */
export async function searchCatalog(query: string, options: SearchOptions = {}): Promise<void> {
	const settings = loadSettings(options);

	let godotVersion = options.godotVersion;
	if (!godotVersion) {
		const root = findProjectRoot(options.cwd, settings.projectFile);
		if (!root) {
			throw new GdmError("Usage", "Not inside a Godot project", { hint: "Pass --godot-version <version>." });
		}
		godotVersion = (await ProjectConfig.load(getProjectPaths(root, settings).projectFile)).godotVersion();
	}

	const results = await createCatalog(settings).search(query, godotVersion);
	const limit = options.limit ? Number.parseInt(options.limit, 10) : 20;
	const shown = Number.isNaN(limit) || limit <= 0 ? results : results.slice(0, limit);

	if (options.json) {
		outputJson({ query, godotVersion, results: shown });
		return;
	}

	if (shown.length === 0) {
		log(chalk.yellow(`No assets found for "${query}"${godotVersion ? ` (Godot ${godotVersion})` : ""}`));
		return;
	}

	for (const asset of shown) {
		const meta = [sanitize(asset.version), sanitize(asset.author), sanitize(asset.license)].filter(Boolean).join(" · ");
		log(`${chalk.green("◆")} ${chalk.bold(sanitize(asset.title))} ${chalk.dim(`[${asset.assetId}]`)} ${chalk.dim(meta)}`);
		if (asset.category) log(chalk.dim(`    ${sanitize(asset.category)} · Godot ${sanitize(asset.godotVersion)}`));
	}
	if (results.length > shown.length) {
		log(chalk.dim(`\n${results.length - shown.length} more; narrow the query or pass --limit`));
	}
	log(chalk.dim(`\nInstall with: gdm add --asset-id <id>`));
}
