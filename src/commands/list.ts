import chalk from "chalk";
import { type GlobalOptions, createEngine } from "@gdm/context";
import { describeSource } from "@gdm/manifest";
import { log, outputJson, sanitize } from "@gdm/output";

/**
 * List all tracked plugins
 */
export async function listPlugins(options: GlobalOptions = {}): Promise<void> {
	const engine = createEngine(options);
	const { plugins } = await engine.status();

	if (options.json) {
		outputJson({
			plugins: plugins.map(({ record, missing, activated }) => ({ ...record, missing, activated })),
		});
		return;
	}

	if (plugins.length === 0) {
		log(chalk.yellow("No plugins tracked."));
		log(chalk.dim("Add one with: gdm add <name>"));
		return;
	}

	log(chalk.bold(`Tracked plugins (${plugins.length}) [${engine.paths.manifest}]:\n`));

	for (const { record, missing, activated } of plugins) {
		const isGit = record.source.type === "git";
		const isMissing = missing.length > 0;

		const gitBadge = isGit ? chalk.cyan(" (git)") : "";
		const disabledBadge = !record.enabled ? chalk.yellow(" (no plugin.cfg)") : record.enabled && !activated ? chalk.yellow(" (not enabled)") : "";
		const missingBadge = isMissing ? chalk.red(" (missing)") : "";
		const icon = isMissing ? chalk.red("✗") : !record.enabled ? chalk.gray("○") : chalk.green("◆");

		log(`${icon} ${chalk.bold(record.name)}${gitBadge}${disabledBadge}${missingBadge}`);
		if (record.title && record.title !== record.name) {
			log(chalk.dim(`    ${sanitize(record.title)}`));
		}
		log(chalk.dim(`    ${sanitize(describeSource(record.source))}`));
		log(chalk.dim(`    ${engine.paths.addonsDirName}/${record.installPath}`));
		if (record.subAssets.length > 0) {
			log(chalk.dim(`    bundled: ${record.subAssets.join(", ")}`));
		}
		if (isMissing) {
			log(chalk.red(`    missing: ${missing.join(", ")}; run gdm install`));
		}
	}
}
