/**
 * Checksum manifest parsing (SHA256SUMS / *.md5.txt)
 *
 * Lines look like `<hex-digest> <flag><filename>` where the flag is a space
 * (text mode) or `*` (binary mode), as written by sha256sum and md5sum.
 */

import ignore from "ignore";
import { AmbiguousMatchError } from "@/errors";

export type ChecksumAlgorithm = "sha256" | "md5";

export interface ChecksumEntry {
	digest: string;
	/** Mode marker between digest and filename ("*" or "") */
	flag: string;
	filename: string;
}

export interface ChecksumRecord {
	algorithm: ChecksumAlgorithm;
	/** Glob the entry was selected with */
	pattern: string;
	filename: string;
	digest: string;
}

export interface ChecksumSelection {
	entry: ChecksumEntry;
	/** Every entry that matched; more than one means the pick was a guess */
	candidates: ChecksumEntry[];
}

const MANIFEST_LINE = /^([0-9a-fA-F]+)\s([ *]?)(\S.*)$/;

/**
 * Parse manifest content into entries, skipping blank and malformed lines.
 */
export function parseChecksumManifest(content: string): ChecksumEntry[] {
	const entries: ChecksumEntry[] = [];
	for (const rawLine of content.split("\n")) {
		const line = rawLine.trimEnd();
		const match = line.match(MANIFEST_LINE);
		if (!match) continue;
		entries.push({
			digest: (match[1] ?? "").toLowerCase(),
			flag: (match[2] ?? "").trim(),
			filename: match[3] ?? "",
		});
	}
	return entries;
}

/**
 * Find the entries whose filename matches a glob such as `VBoxGuestAdditions_*.iso`.
 */
export function matchChecksumEntries(
	entries: ChecksumEntry[],
	pattern: string,
): ChecksumEntry[] {
	const matcher = ignore({ ignorecase: false }).add(pattern);
	return entries.filter(
		(entry) =>
			ignore.isPathValid(entry.filename) && matcher.ignores(entry.filename),
	);
}

/**
 * Select the entry for a glob.
 *
 * No match throws. Several matches keep the first (manifest order) and
 * expose all candidates so the caller can warn about it.
 */
export function selectChecksum(
	entries: ChecksumEntry[],
	pattern: string,
	source: string,
): ChecksumSelection {
	const candidates = matchChecksumEntries(entries, pattern);
	const [entry] = candidates;
	if (!entry) {
		throw new AmbiguousMatchError(pattern, 0, source);
	}
	return { entry, candidates };
}
