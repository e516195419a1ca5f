import { existsSync } from "node:fs";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { errnoCode, GdmError, toFilesystemError } from "@gdm/errors";
import { logger } from "@gdm/output";

const LOCK_TIMEOUT_MS = 60000; // 1 minute

const lockSchema = z.object({ pid: z.number().int(), timestamp: z.number() });

type LockContent = z.infer<typeof lockSchema>;

function parseLock(content: string): LockContent | null {
	try {
		const parsed = lockSchema.safeParse(JSON.parse(content));
		return parsed.success ? parsed.data : null;
	} catch {
		return null; // not JSON
	}
}

function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0); // Signal 0 = check existence
		return true;
	} catch (err) {
		// EPERM means the process exists but belongs to someone else
		return errnoCode(err) === "EPERM";
	}
}

export async function acquireLock(lockPath: string): Promise<boolean> {
	try {
		await mkdir(dirname(lockPath), { recursive: true });

		// Check for existing lock
		if (existsSync(lockPath)) {
			const lock = parseLock(await readFile(lockPath, "utf-8"));

			if (lock && Date.now() - lock.timestamp <= LOCK_TIMEOUT_MS && isProcessAlive(lock.pid)) {
				return false; // Process alive, can't acquire
			}
			// Stale, unreadable or orphaned lock
			logger.warn("Removing stale lock", { path: lockPath, pid: lock?.pid });
			await rm(lockPath, { force: true });
		}

		// wx: fail if another process created the lock in the meantime
		await writeFile(lockPath, JSON.stringify({ pid: process.pid, timestamp: Date.now() }), { flag: "wx" });
		return true;
	} catch (err) {
		if (errnoCode(err) === "EEXIST") return false;
		throw toFilesystemError(err, lockPath, "create lock");
	}
}

export async function releaseLock(lockPath: string): Promise<void> {
	await rm(lockPath, { force: true });
}

/**
 * Run `fn` while holding the project lock, releasing it on every exit path.
 */
export async function withLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
	if (!(await acquireLock(lockPath))) {
		throw new GdmError("FilesystemError", "Another gdm operation is running in this project", {
			hint: `If that is not the case, delete ${lockPath}`,
		});
	}
	try {
		return await fn();
	} finally {
		await releaseLock(lockPath);
	}
}
