import { describe, expect, it } from "vitest";
import { detectAllConflicts, detectConflicts, formatConflicts } from "@gdm/conflicts";
import type { PluginRecord } from "@gdm/manifest";

function record(name: string, installPath: string, subAssets: string[] = []): PluginRecord {
	return { name, source: { type: "catalog", assetId: name, version: "1" }, installPath, subAssets, enabled: true };
}

describe("conflicts", () => {
	const records = [record("gut", "gut"), record("foo", "Foo", ["shared"])];

	it("finds directories owned by other records, ignoring case", () => {
		expect(detectConflicts("bar", ["bar", "GUT", "shared"], records)).toEqual([
			{ dir: "GUT", plugins: ["gut", "bar"] },
			{ dir: "shared", plugins: ["foo", "bar"] },
		]);
	});

	it("never reports a record against itself", () => {
		expect(detectConflicts("foo", ["Foo", "shared"], records)).toEqual([]);
	});

	it("scans the whole manifest", () => {
		const all = detectAllConflicts([...records, record("bar", "bar", ["foo"])]);

		expect(all).toEqual([{ dir: "Foo", plugins: ["foo", "bar"] }]);
		expect(formatConflicts(all)).toEqual(["foo and bar both install Foo"]);
	});
});
