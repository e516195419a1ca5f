import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { planLayout, pluginDirName, rankCandidates, resolveLayout, scanStagedTree } from "@gdm/layout";
import { listTree, writeTree } from "./helpers";

describe("rankCandidates", () => {
	it("prefers the exact name over a longer sibling", () => {
		expect(rankCandidates(["Foo-examples", "Foo"], "Foo")).toEqual(["Foo", "Foo-examples"]);
	});

	it("orders exact, prefix and unrelated names", () => {
		expect(rankCandidates(["other", "gut_extras", "gut"], "Gut")).toEqual(["gut", "gut_extras", "other"]);
	});

	it("matches names that differ only in punctuation and case", () => {
		expect(rankCandidates(["dialogue_nodes", "dialogue_manager"], "Dialogue Manager")).toEqual([
			"dialogue_manager",
			"dialogue_nodes",
		]);
	});

	it("breaks ties by shorter name, then alphabetically", () => {
		expect(rankCandidates(["alpha", "beta", "acme"], "zzz")).toEqual(["acme", "beta", "alpha"]);
	});
});

describe("pluginDirName", () => {
	it("slugs the identity", () => {
		expect(pluginDirName("Loose Tool")).toBe("loose_tool");
		expect(pluginDirName("  My.Plugin! ")).toBe("my.plugin");
		expect(pluginDirName("***")).toBe("plugin");
	});
});

describe("planLayout", () => {
	it("rejects an empty tree", () => {
		expect(() => planLayout({ dirs: [], files: [] }, "x")).toThrow('"x" contains no plugin files');
	});

	it("picks the best matching directory with a descriptor as primary", () => {
		const plan = planLayout(
			{
				dirs: [
					{ name: "Foo", hasDescriptor: true },
					{ name: "Foo-examples", hasDescriptor: true },
					{ name: "shared_assets", hasDescriptor: false },
				],
				files: [],
			},
			"Foo",
		);

		expect(plan).toEqual({ primary: "Foo", subAssets: ["Foo-examples", "shared_assets"], enabled: true, gather: undefined });
	});

	it("prefers a descriptor directory over a better named plain one", () => {
		const plan = planLayout(
			{
				dirs: [
					{ name: "tool", hasDescriptor: false },
					{ name: "tool_editor", hasDescriptor: true },
				],
				files: [],
			},
			"tool",
		);

		expect(plan.primary).toBe("tool_editor");
		expect(plan.subAssets).toEqual(["tool"]);
	});

	it("falls back to plain directories when none has a descriptor", () => {
		const plan = planLayout({ dirs: [{ name: "shaders", hasDescriptor: false }], files: [] }, "Shader Pack");

		expect(plan).toMatchObject({ primary: "shaders", subAssets: [], enabled: false });
	});

	it("treats a root descriptor as a plugin spanning the whole tree", () => {
		const plan = planLayout({ dirs: [{ name: "icons", hasDescriptor: false }], files: ["plugin.cfg", "plugin.gd"] }, "My Tool");

		expect(plan).toEqual({
			primary: "my_tool",
			subAssets: [],
			enabled: true,
			gather: { into: "my_tool", entries: ["icons", "plugin.cfg", "plugin.gd"], wholeTree: true },
		});
	});

	it("gathers loose files into a matching directory", () => {
		const plan = planLayout({ dirs: [{ name: "Foo", hasDescriptor: true }], files: ["README.txt"] }, "foo");

		expect(plan).toEqual({
			primary: "Foo",
			subAssets: [],
			enabled: true,
			gather: { into: "Foo", entries: ["README.txt"], wholeTree: false },
		});
	});
});

describe("resolveLayout", () => {
	let root: string;

	beforeEach(async () => {
		root = await mkdtemp(join(tmpdir(), "gdm-layout-"));
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	it("ignores hidden entries and archive metadata", async () => {
		const staged = join(root, "staged");
		await writeTree(staged, {
			"gut/plugin.cfg": "[plugin]\n",
			".hidden/x": "x",
			"__MACOSX/gut/._plugin.cfg": "x",
			".DS_Store": "x",
		});

		expect(await scanStagedTree(staged)).toEqual({ dirs: [{ name: "gut", hasDescriptor: true }], files: [] });
	});

	it("moves loose files into the synthesized plugin directory", async () => {
		const staged = join(root, "staged");
		await writeTree(staged, { "tool.gd": "extends Node\n", "icon.png": "png" });

		const layout = await resolveLayout(staged, "Loose Tool");

		expect(layout).toEqual({ root: staged, primary: "loose_tool", subAssets: [], enabled: false });
		expect(await listTree(staged)).toEqual(["loose_tool/icon.png", "loose_tool/tool.gd"]);
	});

	it("wraps a root plugin in its own directory beside the staged tree", async () => {
		const staged = join(root, "staged");
		await writeTree(staged, { "plugin.cfg": "[plugin]\n", "scripts/main.gd": "extends Node\n" });

		const layout = await resolveLayout(staged, "Solo");

		expect(layout).toEqual({ root: `${staged}.gathered`, primary: "solo", subAssets: [], enabled: true });
		expect(await listTree(layout.root)).toEqual(["solo/plugin.cfg", "solo/scripts/main.gd"]);
	});
});
