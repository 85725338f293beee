import { readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { applyEdits, type Edit, type PatchResult } from "@/lib/patch";

export interface PatchFileOptions {
	/** Compute the result without touching the file */
	dryRun?: boolean;
}

/**
 * Replace a file's contents atomically: write a sibling temp file, then
 * rename it over the target. Readers see the old or the new file, never a mix.
 */
export async function writeFileAtomic(
	path: string,
	content: string,
): Promise<void> {
	const tempPath = join(
		dirname(path),
		`.${basename(path)}.${process.pid}.${Date.now()}.tmp`,
	);
	const { mode } = await stat(path);
	try {
		await writeFile(tempPath, content, { encoding: "utf-8", mode });
		await rename(tempPath, path);
	} catch (error) {
		await rm(tempPath, { force: true });
		throw error;
	}
}

/**
 * Apply edits to a file in one read and (at most) one write.
 * The file is left untouched when nothing changed.
 */
export async function patchFile(
	path: string,
	edits: Edit[],
	options: PatchFileOptions = {},
): Promise<PatchResult> {
	const original = await readFile(path, "utf-8");
	const result = applyEdits(original, edits);

	if (!options.dryRun && result.content !== original) {
		await writeFileAtomic(path, result.content);
	}

	if (process.env.PINBUMP_DEBUG) {
		console.log(
			`[patch] ${path}: ${result.changes.length} line(s) changed${options.dryRun ? " (dry run)" : ""}`,
		);
	}

	return result;
}
