#!/usr/bin/env -S npx tsx
import { type Command, program } from "commander";
import { type AddOptions, addPlugin } from "@gdm/commands/add";
import { type DoctorOptions, runDoctor } from "@gdm/commands/doctor";
import { type InstallOptions, installPlugins } from "@gdm/commands/install";
import { listPlugins } from "@gdm/commands/list";
import { showOutdated } from "@gdm/commands/outdated";
import { removePlugins } from "@gdm/commands/remove";
import { type SearchOptions, searchCatalog } from "@gdm/commands/search";
import { type UpdateOptions, updatePlugins } from "@gdm/commands/update";
import type { GlobalOptions } from "@gdm/context";
import { withErrorHandling } from "@gdm/errors";

const VERSION = "0.4.0";

/** Options shared by every command. */
function withGlobalOptions(command: Command): Command {
	return command
		.option("-C, --cwd <dir>", "Run as if started in <dir>")
		.option("--json", "Output JSON")
		.option("--verbose", "Print debug logging and stack traces")
		.option("--api-url <url>", "Asset library API base URL (env GDM_API_URL)")
		.option("--manifest <file>", "Manifest file, relative to the project (env GDM_MANIFEST)")
		.option("--project-file <file>", "Project file name (env GDM_PROJECT_FILE)")
		.option("--addons-dir <dir>", "Addons directory, relative to the project (env GDM_ADDONS_DIR)")
		.option("--timeout <ms>", "Network timeout in milliseconds (env GDM_TIMEOUT_MS)")
		.option("--concurrency <n>", "Parallel fetches (env GDM_CONCURRENCY)");
}

program
	.name("gdm")
	.description("Godot addon dependency manager")
	.version(VERSION)
	.enablePositionalOptions();

withGlobalOptions(
	program
		.command("add [name]")
		.description("Add a plugin from the asset library or a git repository")
		.addHelpText(
			"after",
			`
Examples:
  $ gdm add gut                          # Search the asset library by name
  $ gdm add gut --version 9.1.0          # Pin a version (also moves a tracked plugin)
  $ gdm add --asset-id 1709              # Add by asset library id
  $ gdm add --git https://github.com/user/repo --ref v1.2.0
  $ gdm add --git github.com/user/repo@main
`,
		)
		.option("--version <version>", "Version to install (default: latest)")
		.option("--asset-id <id>", "Asset library id")
		.option("--git <url>", "Git repository URL")
		.option("--ref <ref>", "Git branch, tag or commit (default: main)")
		.option("-f, --force", "Overwrite directories owned by other plugins"),
).action(withErrorHandling(async (name: string | undefined, options: AddOptions) => addPlugin(name, options)));

withGlobalOptions(
	program
		.command("install")
		.description("Install missing plugins from the manifest and sync [editor_plugins]")
		.option("-f, --force", "Overwrite directories owned by other plugins"),
).action(withErrorHandling(async (options: InstallOptions) => installPlugins(options)));

withGlobalOptions(
	program
		.command("update [names...]")
		.description("Update asset library plugins to their latest version")
		.option("-f, --force", "Overwrite directories owned by other plugins"),
).action(withErrorHandling(async (names: string[], options: UpdateOptions) => updatePlugins(names, options)));

withGlobalOptions(
	program.command("outdated [names...]").description("Show asset library plugins with a newer version"),
).action(withErrorHandling(async (names: string[], options: GlobalOptions) => showOutdated(names, options)));

withGlobalOptions(
	program
		.command("remove <names...>")
		.alias("rm")
		.description("Remove plugins and their bundled directories"),
).action(withErrorHandling(async (names: string[], options: GlobalOptions) => removePlugins(names, options)));

withGlobalOptions(
	program
		.command("search <query>")
		.description("Search the asset library")
		.option("--godot-version <version>", "Engine version filter (default: the project's)")
		.option("--limit <n>", "Maximum results to show", "20"),
).action(withErrorHandling(async (query: string, options: SearchOptions) => searchCatalog(query, options)));

withGlobalOptions(
	program.command("list").alias("ls").description("List tracked plugins"),
).action(withErrorHandling(async (options: GlobalOptions) => listPlugins(options)));

withGlobalOptions(
	program
		.command("doctor")
		.description("Check the manifest, addons and project.godot for drift")
		.option("--fix", "Repair by running install"),
).action(withErrorHandling(async (options: DoctorOptions) => runDoctor(options)));

await program.parseAsync();
