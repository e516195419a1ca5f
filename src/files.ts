import { randomBytes } from "node:crypto";
import { cp, mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { errnoCode, toFilesystemError } from "@gdm/errors";

export async function pathExists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch (err) {
		if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") return false;
		throw toFilesystemError(err, path, "inspect");
	}
}

export async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch (err) {
		if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") return false;
		throw toFilesystemError(err, path, "inspect");
	}
}

/**
 * Whether two paths name the same entry on disk. Differently cased names are
 * one directory on a case-insensitive filesystem and two on any other.
 */
export async function sameEntry(a: string, b: string): Promise<boolean> {
	try {
		const [left, right] = await Promise.all([stat(a), stat(b)]);
		return left.dev === right.dev && left.ino === right.ino;
	} catch (err) {
		if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") return false;
		throw toFilesystemError(err, a, "inspect");
	}
}

/**
 * Write a file by writing a sibling temp file and renaming it over the target,
 * so readers never observe a half-written file.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
	const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`);
	try {
		await mkdir(dirname(path), { recursive: true });
		await writeFile(tempPath, content, "utf-8");
		await rename(tempPath, path);
	} catch (err) {
		await rm(tempPath, { force: true });
		throw toFilesystemError(err, path, "write");
	}
}

export async function removePath(path: string): Promise<void> {
	try {
		await rm(path, { recursive: true, force: true });
	} catch (err) {
		throw toFilesystemError(err, path, "remove");
	}
}

/**
 * Move a file or directory, replacing anything at the destination.
 * Falls back to copy + delete when source and destination sit on different devices.
 */
export async function movePath(src: string, dest: string): Promise<void> {
	try {
		await mkdir(dirname(dest), { recursive: true });
		await rm(dest, { recursive: true, force: true });
		try {
			await rename(src, dest);
		} catch (err) {
			if (errnoCode(err) !== "EXDEV") throw err;
			await cp(src, dest, { recursive: true });
			await rm(src, { recursive: true, force: true });
		}
	} catch (err) {
		throw toFilesystemError(err, dest, "move files into");
	}
}
