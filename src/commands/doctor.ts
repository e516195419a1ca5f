import chalk from "chalk";
import { formatConflicts } from "@gdm/conflicts";
import { type GlobalOptions, createEngine } from "@gdm/context";
import { log, outputJson } from "@gdm/output";
import { batchToJson, printBatch } from "@gdm/commands/report";
import { batchFailed } from "@gdm/engine";

export interface DoctorOptions extends GlobalOptions {
	fix?: boolean;
}

interface DiagnosticResult {
	check: string;
	status: "ok" | "warning" | "error";
	message: string;
	fix?: string;
}

/**
 * Check that the manifest, the addons tree and project.godot agree
 */
export async function runDoctor(options: DoctorOptions = {}): Promise<void> {
	const engine = createEngine(options);
	const status = await engine.status();
	const results: DiagnosticResult[] = [];

	const missing = status.plugins.filter(plugin => plugin.missing.length > 0);
	if (missing.length > 0) {
		results.push({
			check: "Plugin files",
			status: "error",
			message: `${missing.length} plugin(s) missing from ${engine.paths.addonsDirName}/: ${missing.map(p => `${p.record.name} (${p.missing.join(", ")})`).join("; ")}`,
			fix: "Run: gdm install",
		});
	} else {
		results.push({ check: "Plugin files", status: "ok", message: `${status.plugins.length} plugin(s) present` });
	}

	if (status.inactive.length > 0 || status.unmanaged.length > 0) {
		const parts: string[] = [];
		if (status.inactive.length > 0) parts.push(`not enabled: ${status.inactive.join(", ")}`);
		if (status.unmanaged.length > 0) parts.push(`enabled without a manifest record: ${status.unmanaged.join(", ")}`);
		results.push({
			check: "Activation",
			status: status.inactive.length > 0 ? "error" : "warning",
			message: parts.join("; "),
			fix: "Run: gdm install",
		});
	} else {
		results.push({ check: "Activation", status: "ok", message: "[editor_plugins] matches the manifest" });
	}

	if (status.conflicts.length > 0) {
		results.push({
			check: "Conflicts",
			status: "error",
			message: formatConflicts(status.conflicts).join("; "),
			fix: "Remove one of the conflicting plugins",
		});
	} else {
		results.push({ check: "Conflicts", status: "ok", message: "No directory is claimed twice" });
	}

	const errors = results.filter(r => r.status === "error");
	const warnings = results.filter(r => r.status === "warning");
	const repairable = missing.length > 0 || status.inactive.length > 0 || status.unmanaged.length > 0;

	// Conflicts cannot be auto-fixed
	const repaired = options.fix && repairable ? await engine.install() : undefined;
	const unresolved = repaired ? status.conflicts.length > 0 || batchFailed(repaired) : errors.length > 0;
	if (unresolved) process.exitCode = 1;

	if (options.json) {
		outputJson({ results, fix: repaired ? batchToJson(repaired) : undefined });
		return;
	}

	for (const result of results) {
		const icon = result.status === "ok" ? "✓" : result.status === "warning" ? "⚠" : "✗";
		const color = result.status === "ok" ? chalk.green : result.status === "warning" ? chalk.yellow : chalk.red;
		log(color(`${icon} ${result.check}: `) + result.message);
		if (result.fix && result.status !== "ok") log(chalk.dim(`    ${result.fix}`));
	}

	log();
	if (errors.length === 0 && warnings.length === 0) {
		log(chalk.green("✓ All checks passed!"));
	} else {
		if (errors.length > 0) log(chalk.red(`${errors.length} error(s) found`));
		if (warnings.length > 0) log(chalk.yellow(`${warnings.length} warning(s) found`));
	}

	if (repaired) {
		log(chalk.blue("\nRepairing with install..."));
		printBatch(repaired);
	} else if (options.fix && status.conflicts.length > 0) {
		log(chalk.yellow("\nConflicts cannot be auto-fixed. Please resolve manually."));
	}
}
