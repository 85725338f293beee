/**
 * Parallels Desktop has no version listing. The download site publishes an
 * index of build manifests; the DMG link in the newest manifest redirects to
 * a path that carries the full build version.
 */

import { z } from "zod";
import { ParseError } from "@/errors";
import type { Fetcher } from "@/fetcher";
import { joinUrl } from "@/fetcher";
import { compareVersions } from "@/lib/version";

export const PARALLELS_LINKS_BASE =
	"https://download.parallels.com/website_links";
export const PARALLELS_INDEX_URL = `${PARALLELS_LINKS_BASE}/desktop/index.json`;

/** Redirect targets that carry the version, e.g. .../desktop/v19/19.1.0-54729/... */
export const PARALLELS_TARGET_PATTERN =
	/^https:\/\/download\.parallels\.com\/desktop\//;
export const PARALLELS_VERSION_PATTERN = /\/([0-9]+(?:[.-][0-9]+)+)\//;

const indexSchema = z.record(
	z
		.object({
			builds: z.object({ en_US: z.string().min(1) }).passthrough(),
		})
		.passthrough(),
);

const manifestSchema = z.array(
	z
		.object({
			category: z.object({ name: z.string() }).passthrough(),
			contents: z.array(
				z
					.object({
						name: z.string(),
						files: z.record(z.string()).optional(),
					})
					.passthrough(),
			),
		})
		.passthrough(),
);

export type ParallelsIndex = z.infer<typeof indexSchema>;
export type ParallelsManifest = z.infer<typeof manifestSchema>;

/**
 * Path of the build manifest for the highest product line in the index.
 */
export function selectManifestPath(index: ParallelsIndex): string | null {
	const keys = Object.keys(index).sort(compareVersions);
	const latest = keys[keys.length - 1];
	if (latest === undefined) return null;
	return index[latest]?.builds.en_US ?? null;
}

/**
 * DMG download link of the first Parallels Desktop product in a manifest.
 */
export function selectDmgUrl(manifest: ParallelsManifest): string | null {
	for (const category of manifest) {
		if (!category.category.name.startsWith("Parallels Desktop")) continue;
		for (const content of category.contents) {
			const dmg = content.files?.DMG;
			if (content.name.startsWith("Parallels Desktop") && dmg) {
				return dmg;
			}
		}
	}
	return null;
}

/**
 * Walk index -> manifest -> DMG link.
 */
export async function locateParallelsDmg(fetcher: Fetcher): Promise<string> {
	const index = await fetcher.json(PARALLELS_INDEX_URL, indexSchema);
	const manifestPath = selectManifestPath(index);
	if (!manifestPath) {
		throw new ParseError("Parallels Desktop version", "empty build index");
	}

	const manifestUrl = joinUrl(PARALLELS_LINKS_BASE, manifestPath);
	const manifest = await fetcher.json(manifestUrl, manifestSchema);
	const dmg = selectDmgUrl(manifest);
	if (!dmg) {
		throw new ParseError(
			"Parallels Desktop version",
			`no DMG download in ${manifestUrl}`,
		);
	}
	return dmg;
}
