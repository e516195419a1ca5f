import { describe, expect, it } from "vitest";
import { resolveAssetByName, resolveCatalogVersion, resolveGitRef, resolveLatestVersion } from "@gdm/resolver";
import { FakeCatalog, GUT } from "./helpers";

const catalog = new FakeCatalog([
	GUT,
	{ assetId: "43", title: "Gut Extras", latest: "1.0", versions: {} },
	{ assetId: "50", title: "Dialogue Manager", latest: "2.0", versions: {} },
	{ assetId: "51", title: "Dialogue Nodes", latest: "3.0", versions: {} },
]);

describe("resolveCatalogVersion", () => {
	it("defaults to the latest version", async () => {
		const { asset, version } = await resolveCatalogVersion(catalog, "42");
		expect(asset.title).toBe("Gut");
		expect(version).toBe("9.5.0");
	});

	it("accepts an older version the catalog offers", async () => {
		expect((await resolveCatalogVersion(catalog, "42", "9.1.0")).version).toBe("9.1.0");
	});

	it("lists the available versions when the requested one is missing", async () => {
		await expect(resolveCatalogVersion(catalog, "42", "8.0.0")).rejects.toMatchObject({
			code: "VersionNotFound",
			message: 'Gut (42) has no version "8.0.0"',
			hint: "Available versions: 9.5.0, 9.1.0",
		});
	});

	it("reads the latest version", async () => {
		expect(await resolveLatestVersion(catalog, "42")).toBe("9.5.0");
	});
});

describe("resolveAssetByName", () => {
	it("prefers an exact title among several hits", async () => {
		expect((await resolveAssetByName(catalog, "gut", "4.3")).assetId).toBe("42");
	});

	it("asks the chooser when the name is ambiguous", async () => {
		const chosen = await resolveAssetByName(catalog, "dialogue", undefined, async (_name, candidates) => candidates[1]);
		expect(chosen.assetId).toBe("51");
	});

	it("lists candidates when nobody chooses", async () => {
		await expect(resolveAssetByName(catalog, "dialogue", "4.3")).rejects.toMatchObject({
			code: "NotFound",
			message: '"dialogue" matches 2 assets for Godot 4.3:\n  Dialogue Manager (asset id 50)\n  Dialogue Nodes (asset id 51)',
			hint: "Pass --asset-id to pick one.",
		});
	});

	it("fails when nothing matches", async () => {
		await expect(resolveAssetByName(catalog, "terrain", undefined)).rejects.toMatchObject({
			code: "NotFound",
			message: 'No asset named "terrain" found in the catalog',
		});
	});
});

describe("resolveGitRef", () => {
	it("defaults to main", () => {
		expect(resolveGitRef()).toBe("main");
		expect(resolveGitRef("  ")).toBe("main");
		expect(resolveGitRef(" v1.2 ")).toBe("v1.2");
	});
});
