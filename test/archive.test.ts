import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { strToU8 } from "fflate";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { extractArchive, fetchCatalogAsset, normalizeArchivePaths } from "@gdm/archive";
import { FakeCatalog, GUT, listTree, makeZip } from "./helpers";

describe("normalizeArchivePaths", () => {
	it("strips a shared top directory and keeps only content below addons/", () => {
		const mapping = normalizeArchivePaths(["gut-9.1.0/addons/gut/plugin.cfg", "gut-9.1.0/addons/gut/gut.gd", "gut-9.1.0/README.md"]);

		expect([...mapping]).toEqual([
			["gut-9.1.0/addons/gut/plugin.cfg", "gut/plugin.cfg"],
			["gut-9.1.0/addons/gut/gut.gd", "gut/gut.gd"],
		]);
	});

	it("uses the whole tree when there is no addons/ directory", () => {
		const mapping = normalizeArchivePaths(["repo/plugin.cfg", "repo/src/main.gd"]);

		expect([...mapping.values()]).toEqual(["plugin.cfg", "src/main.gd"]);
	});

	it("keeps top-level files as they are", () => {
		expect([...normalizeArchivePaths(["tool.gd", "docs/readme.md"]).values()]).toEqual(["tool.gd", "docs/readme.md"]);
	});

	it("rejects entries that escape the extraction root", () => {
		expect(() => normalizeArchivePaths(["ok/file", "../evil.gd"])).toThrow("Unsafe archive entry path: ../evil.gd");
		expect(() => normalizeArchivePaths(["/etc/passwd"])).toThrow("Unsafe archive entry path: /etc/passwd");
	});
});

describe("extractArchive", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "gdm-archive-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("writes the normalized addons tree", async () => {
		const count = await extractArchive(
			makeZip({ "repo-main/addons/a/plugin.cfg": "[plugin]\n", "repo-main/addons/a/x.gd": "x\n", "repo-main/LICENSE": "MIT\n" }),
			dir,
		);

		expect(count).toBe(2);
		expect(await listTree(dir)).toEqual(["a/plugin.cfg", "a/x.gd"]);
		expect(await readFile(join(dir, "a/x.gd"), "utf-8")).toBe("x\n");
	});

	it("reports undecodable data as CorruptArchive", async () => {
		await expect(extractArchive(strToU8("not a zip"), dir)).rejects.toMatchObject({ code: "CorruptArchive" });
	});

	it("stages a catalog download", async () => {
		const staged = await fetchCatalogAsset(new FakeCatalog([GUT]), "42", "9.1.0", dir);

		expect(staged).toBe(join(dir, "staged"));
		expect(await listTree(staged)).toEqual(["gut/gut.gd", "gut/plugin.cfg"]);
	});

	it("rejects an empty download", async () => {
		const catalog = new FakeCatalog([GUT]);
		catalog.download = async () => new Uint8Array();

		await expect(fetchCatalogAsset(catalog, "42", "9.5.0", dir)).rejects.toMatchObject({ code: "DownloadFailed" });
	});
});
