/**
 * The tracked upstream projects, in resolution order.
 */

import { z } from "zod";
import type { ResolvedConfig } from "@/config";
import type { MirrorCandidate } from "@/fetcher";
import {
	locateParallelsDmg,
	PARALLELS_TARGET_PATTERN,
	PARALLELS_VERSION_PATTERN,
} from "@/parallels";
import { type Dependency, defineFeedFormat } from "@/sources";

// =============================================================================
// Upstream locations
// =============================================================================

export const KERNEL_RELEASES_URL = "https://www.kernel.org/releases.json";
export const DOCKER_RELEASES_URL =
	"https://api.github.com/repos/moby/moby/releases?per_page=100";
export const SQUASHFS_REPOSITORY = "https://github.com/plougher/squashfs-tools";
export const VIRTUALBOX_INDEX_URL = "https://download.virtualbox.org/virtualbox/";
export const XEN_REPOSITORY = "https://github.com/xenserver/xe-guest-utilities";
export const CTOP_REPOSITORY = "https://github.com/bcicen/ctop";

const VERSION_LINK = /href="(\d+(?:\.\d+)*)\/?"/g;

// =============================================================================
// Feed formats
// =============================================================================

/**
 * kernel.org releases.json; only "longterm" lines count.
 */
export const kernelReleasesFeed = defineFeedFormat(
	z.object({
		releases: z.array(
			z.object({ moniker: z.string(), version: z.string() }).passthrough(),
		),
	}),
	(document) =>
		document.releases.map((release) => ({
			version: release.version,
			include: release.moniker === "longterm",
		})),
);

/**
 * GitHub releases API; prereleases never count.
 */
export const githubReleasesFeed = defineFeedFormat(
	z.array(
		z.object({ tag_name: z.string(), prerelease: z.boolean() }).passthrough(),
	),
	(document) =>
		document.map((release) => ({
			version: release.tag_name,
			include: !release.prerelease,
		})),
);

// =============================================================================
// Descriptors
// =============================================================================

/**
 * Every mirror for one path, in mirror priority order.
 */
export function mirrorCandidates(
	mirrors: string[],
	path: string,
): MirrorCandidate[] {
	return mirrors.map((mirror) => ({ mirror, path }));
}

export function virtualBoxIsoUrl(version: string): string {
	return `${VIRTUALBOX_INDEX_URL}${version}/VBoxGuestAdditions_${version}.iso`;
}

/**
 * Build the dependency list from configuration.
 */
export function buildDependencies(config: ResolvedConfig): {
	tinycore: Dependency;
	kernel: Dependency;
	docker: Dependency;
	squashfs: Dependency;
	virtualbox: Dependency;
	parallels: Dependency;
	xen: Dependency;
	ctop: Dependency;
} {
	const { tinycore } = config;

	return {
		tinycore: {
			name: "tinycore",
			label: "Tiny Core Linux",
			source: {
				kind: "text",
				candidates: mirrorCandidates(
					tinycore.mirrors,
					`latest-${tinycore.arch}`,
				),
			},
			check: { type: "exact", expected: tinycore.version },
		},
		kernel: {
			name: "kernel",
			label: "Linux Kernel",
			source: {
				kind: "feed",
				url: KERNEL_RELEASES_URL,
				format: kernelReleasesFeed,
			},
			check: { type: "family", base: config.kernel.base },
		},
		docker: {
			name: "docker",
			label: "Docker",
			source: {
				kind: "feed",
				url: DOCKER_RELEASES_URL,
				format: githubReleasesFeed,
				stripPrefix: "v",
			},
			check: { type: "family", base: config.docker.base },
		},
		squashfs: {
			name: "squashfs",
			label: "squashfs-tools",
			source: {
				kind: "tags",
				repository: SQUASHFS_REPOSITORY,
				tagPattern: /^squashfs-tools-(\d+(?:\.\d+)*)$/,
			},
		},
		virtualbox: {
			name: "virtualbox",
			label: "VirtualBox",
			source: {
				kind: "listing",
				url: VIRTUALBOX_INDEX_URL,
				pattern: VERSION_LINK,
				family: config.virtualbox.base,
			},
			check: config.virtualbox.base
				? { type: "family", base: config.virtualbox.base }
				: undefined,
		},
		parallels: {
			name: "parallels",
			label: "Parallels Desktop",
			source: {
				kind: "redirect",
				locate: locateParallelsDmg,
				targetPattern: PARALLELS_TARGET_PATTERN,
				versionPattern: PARALLELS_VERSION_PATTERN,
			},
			check: config.parallels.base
				? { type: "family", base: config.parallels.base }
				: undefined,
		},
		xen: {
			name: "xen",
			label: "XenServer guest utilities",
			source: {
				kind: "tags",
				repository: XEN_REPOSITORY,
				tagPattern: /^v(\d+(?:\.\d+)*)$/,
			},
		},
		ctop: {
			name: "ctop",
			label: "ctop",
			source: {
				kind: "tags",
				repository: CTOP_REPOSITORY,
				tagPattern: /^v(\d+(?:\.\d+)*)$/,
			},
		},
	};
}

/**
 * Probe that the listed VirtualBox release actually ships the guest additions.
 */
export function virtualBoxIsoDependency(version: string): Dependency {
	return {
		name: "virtualbox-iso",
		label: `VirtualBox ${version} guest additions`,
		source: {
			kind: "spider",
			url: virtualBoxIsoUrl(version),
			reference: version,
		},
	};
}
