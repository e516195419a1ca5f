import { existsSync } from "node:fs";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { acquireLock, releaseLock, withLock } from "@gdm/lock";

describe("lock", () => {
	let dir: string;
	let lockPath: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "gdm-lock-"));
		lockPath = join(dir, ".gdm", ".lock");
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("is exclusive until released", async () => {
		expect(await acquireLock(lockPath)).toBe(true);
		expect(await acquireLock(lockPath)).toBe(false);

		await releaseLock(lockPath);

		expect(await acquireLock(lockPath)).toBe(true);
	});

	it("takes over a stale or unreadable lock", async () => {
		expect(await acquireLock(lockPath)).toBe(true);
		await writeFile(lockPath, JSON.stringify({ pid: process.pid, timestamp: Date.now() - 120_000 }));
		expect(await acquireLock(lockPath)).toBe(true);

		await writeFile(lockPath, "garbage");
		expect(await acquireLock(lockPath)).toBe(true);
	});

	it("releases the lock when the guarded function throws", async () => {
		await expect(
			withLock(lockPath, async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");
		expect(existsSync(lockPath)).toBe(false);
	});

	it("refuses to run while the lock is held", async () => {
		await acquireLock(lockPath);
		let ran = false;

		await expect(
			withLock(lockPath, async () => {
				ran = true;
			}),
		).rejects.toMatchObject({ code: "FilesystemError", message: "Another gdm operation is running in this project" });
		expect(ran).toBe(false);
	});
});
