import chalk from "chalk";
import { type GlobalOptions, createEngine } from "@gdm/context";
import { log, outputJson, sanitize } from "@gdm/output";
import { resultToJson } from "@gdm/commands/report";

/**
 * Show catalog plugins with a newer version available
 */
export async function showOutdated(names: string[], options: GlobalOptions = {}): Promise<void> {
	const engine = createEngine(options);
	const report = await engine.outdated(names);

	if (report.failures.length > 0) process.exitCode = 1;

	if (options.json) {
		outputJson({ plugins: report.entries, failures: report.failures.map(resultToJson) });
		return;
	}

	const outdated = report.entries.filter(entry => entry.outdated);
	for (const entry of outdated) {
		log(`${chalk.yellow("↑")} ${entry.name}: ${sanitize(entry.current)} -> ${chalk.green(sanitize(entry.latest))}`);
	}
	for (const failure of report.failures) {
		log(chalk.red(`✗ ${failure.name}: ${failure.error?.message ?? "failed"}`));
	}

	if (outdated.length === 0 && report.failures.length === 0) {
		log(chalk.green("✓ All catalog plugins are up to date"));
	} else if (outdated.length > 0) {
		log(chalk.dim("\nRun gdm update to upgrade."));
	}
}
