/**
 * The update run: resolve every dependency in a fixed order, then rewrite
 * the Dockerfile once. Any failure before the write leaves the file as it was.
 */

import { resolveGuestAdditionsSha256, resolveRootfsMd5 } from "@/checksums";
import type { ResolvedConfig } from "@/config";
import { buildDependencies, virtualBoxIsoDependency } from "@/dependencies";
import { patchFile } from "@/dockerfile";
import type { PatchResult } from "@/lib/patch";
import { planEdits, type Resolution } from "@/plan";
import {
	attributeFailure,
	type Dependency,
	resolveDependency,
	type SourceContext,
} from "@/sources";

export interface UpdateOptions {
	dryRun?: boolean;
}

export interface UpdateReport {
	resolution: Resolution;
	patch: PatchResult;
	dockerfile: string;
	dryRun: boolean;
}

async function check(
	dependency: Dependency,
	context: SourceContext,
): Promise<string> {
	console.log(`Checking ${dependency.label}...`);
	const version = await resolveDependency(dependency, context);
	console.log(`  ${dependency.label}: ${version}`);
	return version;
}

async function checksum<T>(
	name: string,
	label: string,
	resolve: () => Promise<T>,
): Promise<T> {
	console.log(`Fetching ${label}...`);
	try {
		return await resolve();
	} catch (error) {
		throw attributeFailure(error, name, label);
	}
}

/**
 * Resolve every tracked version and checksum, one request at a time.
 */
export async function resolveAll(
	config: ResolvedConfig,
	context: SourceContext,
): Promise<Resolution> {
	const deps = buildDependencies(config);
	const { tinycore } = config;

	// Base distribution first: a new release line stops everything else
	const tclVersion = await check(deps.tinycore, context);
	const linuxVersion = await check(deps.kernel, context);
	const dockerVersion = await check(deps.docker, context);

	const rootfsMd5 = await checksum(
		"rootfs-md5",
		`${tinycore.rootfs} checksum`,
		() =>
			resolveRootfsMd5(context.fetcher, {
				mirrors: tinycore.mirrors,
				major: tinycore.major,
				arch: tinycore.arch,
				version: tclVersion,
				rootfs: tinycore.rootfs,
			}),
	);

	const squashfsVersion = await check(deps.squashfs, context);

	const vboxVersion = await check(deps.virtualbox, context);
	await check(virtualBoxIsoDependency(vboxVersion), context);
	const vboxSha256 = await checksum(
		"vbox-sha256",
		"VirtualBox guest additions checksum",
		() => resolveGuestAdditionsSha256(context.fetcher, vboxVersion),
	);

	const parallelsVersion = await check(deps.parallels, context);
	const xenVersion = await check(deps.xen, context);
	const ctopVersion = await check(deps.ctop, context);

	return {
		tinycore: {
			mirrors: tinycore.mirrors,
			major: tinycore.major,
			version: tclVersion,
			rootfs: tinycore.rootfs,
			rootfsMd5: rootfsMd5.digest,
		},
		linuxVersion,
		dockerVersion,
		squashfsVersion,
		vbox: { version: vboxVersion, sha256: vboxSha256.digest },
		parallelsVersion,
		xenVersion,
		ctopVersion,
	};
}

/**
 * Resolve, plan and patch.
 */
export async function runUpdate(
	config: ResolvedConfig,
	context: SourceContext,
	options: UpdateOptions = {},
): Promise<UpdateReport> {
	const resolution = await resolveAll(config, context);
	const edits = planEdits(resolution);
	const patch = await patchFile(config.dockerfile, edits, {
		dryRun: options.dryRun,
	});

	return {
		resolution,
		patch,
		dockerfile: config.dockerfile,
		dryRun: options.dryRun ?? false,
	};
}
