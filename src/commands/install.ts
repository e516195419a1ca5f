import chalk from "chalk";
import { type GlobalOptions, createEngine } from "@gdm/context";
import { batchFailed } from "@gdm/engine";
import { log, outputJson } from "@gdm/output";
import { batchToJson, printBatch } from "@gdm/commands/report";

export interface InstallOptions extends GlobalOptions {
	force?: boolean;
}

/**
 * Restore every plugin in the manifest that is missing from the addons tree
 * and bring the activation section in line with the manifest.
 */
export async function installPlugins(options: InstallOptions = {}): Promise<void> {
	const engine = createEngine(options);
	const batch = await engine.install({ force: options.force });

	if (batchFailed(batch)) process.exitCode = 1;

	if (options.json) {
		outputJson(batchToJson(batch));
		return;
	}

	if (batch.results.length === 0) {
		log(chalk.yellow("No plugins in the manifest."));
		log(chalk.dim("Add one with: gdm add <name>"));
		return;
	}
	printBatch(batch);
}
