import chalk from "chalk";
import { type GlobalOptions, createEngine } from "@gdm/context";
import { batchFailed } from "@gdm/engine";
import { log, outputJson } from "@gdm/output";
import { batchToJson, printBatch } from "@gdm/commands/report";

export interface UpdateOptions extends GlobalOptions {
	force?: boolean;
}

/**
 * Update catalog plugins (all, or the named ones) to their latest version.
 */
export async function updatePlugins(names: string[], options: UpdateOptions = {}): Promise<void> {
	const engine = createEngine(options);
	const batch = await engine.update(names, { force: options.force });

	if (batchFailed(batch)) process.exitCode = 1;

	if (options.json) {
		outputJson(batchToJson(batch));
		return;
	}

	if (batch.results.length === 0) {
		log(chalk.yellow("No plugins to update."));
		return;
	}
	printBatch(batch);
}
