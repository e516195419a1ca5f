import chalk from "chalk";
import type { BatchResult, PluginResult } from "@gdm/engine";
import type { GdmError } from "@gdm/errors";
import { log, sanitize } from "@gdm/output";

export function errorToJson(error: GdmError): { code: string; message: string; hint?: string } {
	return { code: error.code, message: error.message, hint: error.hint };
}

export function resultToJson(result: PluginResult): Record<string, unknown> {
	return {
		name: result.name,
		ok: result.ok,
		action: result.action,
		from: result.from,
		to: result.to,
		error: result.error ? errorToJson(result.error) : undefined,
	};
}

export function batchToJson(batch: BatchResult): Record<string, unknown> {
	return {
		results: batch.results.map(resultToJson),
		activated: batch.activated,
		deactivated: batch.deactivated,
	};
}

function describe(result: PluginResult): string {
	switch (result.action) {
		case "installed":
			return `installed ${sanitize(result.to ?? "")}`;
		case "updated":
			return `${sanitize(result.from ?? "")} -> ${sanitize(result.to ?? "")}`;
		case "skipped":
			return chalk.dim(`skipped (git ref ${sanitize(result.from ?? "")})`);
		case "unchanged":
			return chalk.dim(`up to date (${sanitize(result.to ?? "")})`);
		default:
			return result.action ?? "";
	}
}

/**
 * Per-plugin lines followed by a success/failure tally.
 */
export function printBatch(batch: BatchResult, verbose = true): void {
	for (const result of batch.results) {
		if (result.ok) {
			if (!verbose && result.action === "unchanged") continue;
			log(`${chalk.green("✓")} ${result.name}: ${describe(result)}`);
		} else {
			log(chalk.red(`✗ ${result.name}: ${result.error?.message ?? "failed"}`));
		}
	}
	for (const path of batch.activated) log(chalk.dim(`  + enabled ${path}`));
	for (const path of batch.deactivated) log(chalk.dim(`  - disabled ${path}`));

	const failed = batch.results.filter(result => !result.ok).length;
	const succeeded = batch.results.length - failed;
	log();
	if (failed > 0) {
		log(chalk.yellow(`${succeeded} succeeded, ${failed} failed`));
	} else {
		log(chalk.green(`✓ ${succeeded} plugin(s) ok`));
	}
}
