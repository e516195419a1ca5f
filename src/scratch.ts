import { randomBytes } from "node:crypto";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { toFilesystemError } from "@gdm/errors";
import { removePath } from "@gdm/files";
import { logger } from "@gdm/output";

export interface ScratchDir {
	readonly path: string;
	release(): Promise<void>;
}

function slug(label: string): string {
	return (
		label
			.toLowerCase()
			.replace(/[^a-z0-9._-]+/g, "-")
			.replace(/^[-.]+|[-.]+$/g, "")
			.slice(0, 40) || "fetch"
	);
}

/**
 * Scratch space under the project's cache directory. Every fetch claims its own
 * uniquely named subdirectory, so parallel fetches never collide, and the
 * owner of the cache tracks every claim until it is released.
 */
export class ScratchCache {
	#claims = new Set<string>();

	constructor(readonly root: string) {}

	async claim(label: string): Promise<ScratchDir> {
		const path = join(this.root, `${slug(label)}-${randomBytes(4).toString("hex")}`);
		try {
			await mkdir(path, { recursive: true });
		} catch (err) {
			throw toFilesystemError(err, path, "create scratch directory");
		}
		this.#claims.add(path);
		logger.debug("Claimed scratch directory", { path });
		return {
			path,
			release: async () => {
				if (!this.#claims.delete(path)) return;
				await removePath(path);
				logger.debug("Released scratch directory", { path });
			},
		};
	}

	/** Run `fn` inside a fresh scratch directory, removing it on every exit path. */
	async with<T>(label: string, fn: (dir: string) => Promise<T>): Promise<T> {
		const scratch = await this.claim(label);
		try {
			return await fn(scratch.path);
		} finally {
			await scratch.release();
		}
	}

	/** Remove every claim still held. */
	async releaseAll(): Promise<void> {
		const paths = [...this.#claims];
		this.#claims.clear();
		await Promise.all(paths.map(path => removePath(path)));
	}
}
