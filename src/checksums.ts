/**
 * Checksum resolution for pinned downloads.
 */

import { ParseError } from "@/errors";
import type { Fetcher } from "@/fetcher";
import { mirrorCandidates } from "@/dependencies";
import {
	type ChecksumRecord,
	parseChecksumManifest,
	selectChecksum,
} from "@/lib/manifest";

export const GUEST_ADDITIONS_PATTERN = "VBoxGuestAdditions_*.iso";

export interface RootfsLocation {
	mirrors: string[];
	major: string;
	arch: string;
	version: string;
	rootfs: string;
}

/**
 * Primary and fallback SHA256SUMS locations for a VirtualBox release.
 */
export function guestAdditionsManifestUrls(version: string): string[] {
	return [
		`https://download.virtualbox.org/virtualbox/${version}/SHA256SUMS`,
		`https://www.virtualbox.org/download/hashes/${version}/SHA256SUMS`,
	];
}

/**
 * Fetch the first manifest that answers. A failed primary falls back to
 * the secondary once; the last error propagates.
 */
async function fetchFirst(fetcher: Fetcher, urls: string[]): Promise<{
	url: string;
	body: string;
}> {
	let lastError: unknown;
	for (const url of urls) {
		try {
			return { url, body: await fetcher.text(url) };
		} catch (error) {
			if (process.env.PINBUMP_DEBUG) {
				console.log(`[checksum] ${url} failed, trying fallback`);
			}
			lastError = error;
		}
	}
	throw lastError;
}

/**
 * SHA-256 of the VirtualBox guest additions ISO for a release.
 */
export async function resolveGuestAdditionsSha256(
	fetcher: Fetcher,
	version: string,
): Promise<ChecksumRecord> {
	const { url, body } = await fetchFirst(
		fetcher,
		guestAdditionsManifestUrls(version),
	);
	const { entry, candidates } = selectChecksum(
		parseChecksumManifest(body),
		GUEST_ADDITIONS_PATTERN,
		url,
	);

	if (candidates.length > 1) {
		console.warn(
			`  Warning: ${candidates.length} entries match ${GUEST_ADDITIONS_PATTERN} in ${url}; using ${entry.filename}`,
		);
	}

	return {
		algorithm: "sha256",
		pattern: GUEST_ADDITIONS_PATTERN,
		filename: entry.filename,
		digest: entry.digest,
	};
}

/**
 * Candidate paths of the rootfs .md5.txt under `<mirror>/<major>/`:
 * the release's archive directory first, then the current release directory.
 */
export function rootfsChecksumPaths(location: RootfsLocation): string[] {
	const { major, arch, version, rootfs } = location;
	return [
		`${major}/${arch}/archive/${version}/distribution_files/${rootfs}.md5.txt`,
		`${major}/${arch}/release/distribution_files/${rootfs}.md5.txt`,
	];
}

/**
 * MD5 of the Tiny Core root filesystem, from the first mirror that has it.
 */
export async function resolveRootfsMd5(
	fetcher: Fetcher,
	location: RootfsLocation,
): Promise<ChecksumRecord> {
	const candidates = rootfsChecksumPaths(location).flatMap((path) =>
		mirrorCandidates(location.mirrors, path),
	);
	const body = await fetcher.any(candidates);
	const [entry] = parseChecksumManifest(body);
	if (!entry) {
		throw new ParseError(
			`${location.rootfs} checksum`,
			"md5 file has no checksum line",
		);
	}

	return {
		algorithm: "md5",
		pattern: location.rootfs,
		filename: entry.filename,
		digest: entry.digest,
	};
}
