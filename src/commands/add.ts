import chalk from "chalk";
import { type GlobalOptions, createEngine } from "@gdm/context";
import { describeSource } from "@gdm/manifest";
import { log, outputJson, sanitize } from "@gdm/output";

export interface AddOptions extends GlobalOptions {
	version?: string;
	assetId?: string;
	git?: string;
	ref?: string;
	force?: boolean;
}

/**
 * Add a plugin from the catalog or a git repository. Re-adding a tracked
 * plugin moves it to the requested version.
 */
export async function addPlugin(name: string | undefined, options: AddOptions = {}): Promise<void> {
	const engine = createEngine(options);

	const { record, previous } = await engine.add({
		name,
		version: options.version,
		assetId: options.assetId,
		gitUrl: options.git,
		ref: options.ref,
		force: options.force,
	});

	if (options.json) {
		outputJson({ plugin: record, previous });
		return;
	}

	const title = record.title ? ` (${sanitize(record.title)})` : "";
	const verb = previous ? "Updated" : "Added";
	log(chalk.green(`✓ ${verb} ${record.name}${title}: ${sanitize(describeSource(record.source))}`));
	if (previous && describeSource(previous.source) !== describeSource(record.source)) {
		log(chalk.dim(`  was ${sanitize(describeSource(previous.source))}`));
	}
	log(chalk.dim(`  ${engine.paths.addonsDirName}/${record.installPath}${record.enabled ? "" : " (no plugin.cfg, not enabled)"}`));
	for (const sub of record.subAssets) {
		log(chalk.dim(`  ${engine.paths.addonsDirName}/${sub} (bundled)`));
	}
}
