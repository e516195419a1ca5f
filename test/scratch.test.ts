import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ScratchCache } from "@gdm/scratch";

describe("ScratchCache", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "gdm-scratch-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("hands out distinct directories and removes them all", async () => {
		const cache = new ScratchCache(dir);
		const a = await cache.claim("Gut");
		const b = await cache.claim("Gut");

		expect(a.path).not.toBe(b.path);
		expect(a.path.startsWith(join(dir, "gut-"))).toBe(true);
		expect(existsSync(a.path)).toBe(true);

		await cache.releaseAll();

		expect(existsSync(a.path)).toBe(false);
		expect(existsSync(b.path)).toBe(false);
	});

	it("removes the directory when the callback throws", async () => {
		const cache = new ScratchCache(dir);
		let used = "";

		await expect(
			cache.with("x", async path => {
				used = path;
				throw new Error("fail");
			}),
		).rejects.toThrow("fail");

		expect(used.startsWith(join(dir, "x-"))).toBe(true);
		expect(existsSync(used)).toBe(false);
	});
});
