import { describe, expect, it } from "vitest";
import { DEFAULT_API_URL, resolveSettings } from "@gdm/settings";

describe("resolveSettings", () => {
	it("uses defaults with an empty environment", () => {
		expect(resolveSettings({}, {})).toEqual({
			apiUrl: DEFAULT_API_URL,
			manifestFile: "gdm.json",
			projectFile: "project.godot",
			addonsDir: "addons",
			cacheDir: ".gdm",
			timeoutMs: 30_000,
			concurrency: 4,
		});
	});

	it("reads the environment and lets explicit values win", () => {
		const env = { GDM_TIMEOUT_MS: "5000", GDM_CONCURRENCY: "8", GDM_API_URL: "https://mirror.test/api/" };

		const settings = resolveSettings({ concurrency: "2" }, env);

		expect(settings.timeoutMs).toBe(5000);
		expect(settings.concurrency).toBe(2);
		expect(settings.apiUrl).toBe("https://mirror.test/api");
	});

	it("ignores empty environment values", () => {
		expect(resolveSettings({}, { GDM_MANIFEST: "" }).manifestFile).toBe("gdm.json");
	});

	it("names the offending setting and variable", () => {
		expect(() => resolveSettings({}, { GDM_CONCURRENCY: "0" })).toThrow("concurrency (GDM_CONCURRENCY)");
		expect(() => resolveSettings({ apiUrl: "not a url" }, {})).toThrow("apiUrl (GDM_API_URL)");
	});
});
