import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { GdmError } from "@gdm/errors";
import type { Settings } from "@gdm/settings";

/**
 * Absolute locations of every store the engine touches for one project.
 */
export interface ProjectPaths {
	root: string;
	manifest: string;
	projectFile: string;
	addons: string;
	cache: string;
	lock: string;
	/** Directory name of the addons tree, as written in `res://` paths */
	addonsDirName: string;
}

/** Nearest directory at or above `start` holding the project file, or null. */
export function findProjectRoot(start: string = process.cwd(), projectFile = "project.godot"): string | null {
	let dir = resolve(start);

	while (true) {
		if (existsSync(join(dir, projectFile))) {
			return dir;
		}
		const parent = dirname(dir);
		if (parent === dir) break;
		dir = parent;
	}

	return null;
}

export function getProjectPaths(root: string, settings: Settings): ProjectPaths {
	const cache = resolve(root, settings.cacheDir);
	const addonsDirName = settings.addonsDir.replace(/\\/g, "/").replace(/^\.\/+/, "").replace(/\/+$/, "");
	return {
		root,
		manifest: resolve(root, settings.manifestFile),
		projectFile: resolve(root, settings.projectFile),
		addons: resolve(root, addonsDirName),
		cache,
		lock: join(cache, ".lock"),
		addonsDirName,
	};
}

/**
 * Locate the project for a command, failing with NotFound when there is none.
 */
export function requireProject(settings: Settings, cwd?: string): ProjectPaths {
	const root = findProjectRoot(cwd, settings.projectFile);
	if (!root) {
		throw new GdmError("NotFound", `No ${settings.projectFile} found in ${resolve(cwd ?? process.cwd())} or any parent directory`, {
			hint: "Run gdm from inside a Godot project.",
		});
	}
	return getProjectPaths(root, settings);
}
