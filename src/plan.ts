/**
 * Patch planning: turn a run's resolved versions into Dockerfile edits.
 */

import type { Edit } from "@/lib/patch";

/**
 * Everything one run resolved, ready to be pinned.
 */
export interface Resolution {
	tinycore: {
		mirrors: string[];
		major: string;
		version: string;
		rootfs: string;
		rootfsMd5: string;
	};
	linuxVersion: string;
	dockerVersion: string;
	squashfsVersion: string;
	vbox: { version: string; sha256: string };
	parallelsVersion: string;
	xenVersion: string;
	ctopVersion: string;
}

export const SQUASHFS_LINK_PREFIX =
	"# https://github.com/plougher/squashfs-tools/blob/";
export const SQUASHFS_LINK_SUFFIX = "/squashfs-tools/Makefile#L1";

/**
 * Ordered edit list threaded through the planning steps.
 * Each step returns a new accumulator; nothing is shared.
 */
export class EditAccumulator {
	private constructor(private readonly list: readonly Edit[]) {}

	static empty(): EditAccumulator {
		return new EditAccumulator([]);
	}

	add(...edits: Edit[]): EditAccumulator {
		for (const edit of edits) {
			if (this.list.some((existing) => existing.id === edit.id)) {
				throw new Error(`Duplicate edit id: ${edit.id}`);
			}
		}
		return new EditAccumulator([...this.list, ...edits]);
	}

	merge(other: EditAccumulator): EditAccumulator {
		return this.add(...other.list);
	}

	get edits(): Edit[] {
		return [...this.list];
	}
}

/**
 * An `ENV <NAME> <value>` edit.
 */
export function envEdit(id: string, name: string, value: string): Edit {
	return { kind: "assign", id, token: `ENV ${name}`, value };
}

function planTinyCore(tinycore: Resolution["tinycore"]): EditAccumulator {
	return EditAccumulator.empty().add(
		envEdit("tcl-mirrors", "TCL_MIRRORS", tinycore.mirrors.join(" ")),
		envEdit("tcl-major", "TCL_MAJOR", tinycore.major),
		envEdit("tcl-version", "TCL_VERSION", tinycore.version),
		{
			kind: "line",
			id: "tcl-rootfs",
			token: "ENV TCL_ROOTFS",
			line: `ENV TCL_ROOTFS="${tinycore.rootfs}" TCL_ROOTFS_MD5="${tinycore.rootfsMd5}"`,
		},
	);
}

function planSquashfs(version: string): EditAccumulator {
	return EditAccumulator.empty().add(
		envEdit("squashfs-version", "SQUASHFS_VERSION", version),
		{
			kind: "enclosed",
			id: "squashfs-link",
			prefix: SQUASHFS_LINK_PREFIX,
			suffix: SQUASHFS_LINK_SUFFIX,
			value: version,
		},
	);
}

/**
 * Build the full, ordered edit list for a resolution.
 */
export function planEdits(resolution: Resolution): Edit[] {
	return planTinyCore(resolution.tinycore)
		.add(
			envEdit("linux-version", "LINUX_VERSION", resolution.linuxVersion),
			envEdit("docker-version", "DOCKER_VERSION", resolution.dockerVersion),
		)
		.merge(planSquashfs(resolution.squashfsVersion))
		.add(
			envEdit("vbox-version", "VBOX_VERSION", resolution.vbox.version),
			envEdit("vbox-sha256", "VBOX_SHA256", resolution.vbox.sha256),
			envEdit(
				"parallels-version",
				"PARALLELS_VERSION",
				resolution.parallelsVersion,
			),
			envEdit("xen-version", "XEN_VERSION", resolution.xenVersion),
			envEdit("ctop-version", "CTOP_VERSION", resolution.ctopVersion),
		).edits;
}
