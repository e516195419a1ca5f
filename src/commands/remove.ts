import chalk from "chalk";
import { type GlobalOptions, createEngine } from "@gdm/context";
import { ownedDirs } from "@gdm/manifest";
import { log, outputJson } from "@gdm/output";

/**
 * Remove plugins together with their bundled directories
 */
export async function removePlugins(names: string[], options: GlobalOptions = {}): Promise<void> {
	const engine = createEngine(options);
	const removed = await engine.remove(names);

	if (options.json) {
		outputJson({ removed: removed.map(record => ({ name: record.name, dirs: ownedDirs(record) })) });
		return;
	}

	for (const record of removed) {
		log(chalk.green(`✓ Removed ${record.name}`));
		for (const dir of ownedDirs(record)) {
			log(chalk.dim(`  - ${engine.paths.addonsDirName}/${dir}`));
		}
	}
}
