import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ResolvedConfig } from "@/config";
import {
	CTOP_REPOSITORY,
	DOCKER_RELEASES_URL,
	KERNEL_RELEASES_URL,
	SQUASHFS_REPOSITORY,
	VIRTUALBOX_INDEX_URL,
	XEN_REPOSITORY,
} from "@/dependencies";
import { DependencyError, FamilyMismatchError, FetchError } from "@/errors";
import { createFetcher } from "@/fetcher";
import { PARALLELS_INDEX_URL } from "@/parallels";
import { createFakeFetch, networkError, type Route } from "./test-helpers";
import { runUpdate } from "./update";

const MIRRORS = ["https://m1.example/tc", "https://m2.example/tc"];
const PARALLELS_DMG = "https://www.parallels.com/directdownload/pd19/image.dmg";
const PARALLELS_TARGET =
	"https://download.parallels.com/desktop/v19/19.1.0-54729/ParallelsDesktop-19.1.0-54729.dmg";

const DOCKERFILE = `FROM debian:bookworm-slim

ENV TCL_MIRRORS http://old.example/tc
ENV TCL_MAJOR 13.x
ENV TCL_VERSION 13.1
ENV TCL_ROOTFS="rootfs64.gz" TCL_ROOTFS_MD5="ffff"

# https://www.kernel.org/
ENV LINUX_VERSION 6.1.55
ENV DOCKER_VERSION 24.0.5

# https://github.com/plougher/squashfs-tools/blob/4.6/squashfs-tools/Makefile#L1
ENV SQUASHFS_VERSION 4.6

ENV VBOX_VERSION 7.0.12
ENV VBOX_SHA256 aaaa
ENV PARALLELS_VERSION 19.0.0-54570
ENV XEN_VERSION 8.3.1
ENV CTOP_VERSION 0.7.6

RUN echo "ENV LINUX_VERSION stays" > /dev/null
`;

const EXPECTED = `FROM debian:bookworm-slim

ENV TCL_MIRRORS https://m1.example/tc https://m2.example/tc
ENV TCL_MAJOR 14.x
ENV TCL_VERSION 14.0
ENV TCL_ROOTFS="rootfs64.gz" TCL_ROOTFS_MD5="0123456789abcdef0123456789abcdef"

# https://www.kernel.org/
ENV LINUX_VERSION 6.1.68
ENV DOCKER_VERSION 24.0.7

# https://github.com/plougher/squashfs-tools/blob/4.6.1/squashfs-tools/Makefile#L1
ENV SQUASHFS_VERSION 4.6.1

ENV VBOX_VERSION 7.0.14
ENV VBOX_SHA256 1234abcd
ENV PARALLELS_VERSION 19.1.0-54729
ENV XEN_VERSION 8.4.0
ENV CTOP_VERSION 0.7.7

RUN echo "ENV LINUX_VERSION stays" > /dev/null
`;

function upstreamRoutes(
	kernelLongterm = "6.1.68",
): Record<string, Route> {
	return {
		// first mirror is down; the second answers
		"https://m1.example/tc/latest-x86_64": { error: networkError() },
		"https://m2.example/tc/latest-x86_64": { body: "14.0\n" },
		[KERNEL_RELEASES_URL]: {
			body: JSON.stringify({
				releases: [
					{ moniker: "mainline", version: "6.7-rc5" },
					{ moniker: "stable", version: "6.6.7" },
					{ moniker: "longterm", version: kernelLongterm },
					{ moniker: "longterm", version: "5.15.143" },
				],
			}),
		},
		[DOCKER_RELEASES_URL]: {
			body: JSON.stringify([
				{ tag_name: "v25.0.0-rc.1", prerelease: true },
				{ tag_name: "v24.0.7", prerelease: false },
				{ tag_name: "v24.0.6", prerelease: false },
			]),
		},
		"https://m1.example/tc/14.x/x86_64/archive/14.0/distribution_files/rootfs64.gz.md5.txt":
			{ body: "0123456789abcdef0123456789abcdef  rootfs64.gz\n" },
		[VIRTUALBOX_INDEX_URL]: {
			body: '<a href="7.0.12/">7.0.12/</a>\n<a href="7.0.14/">7.0.14/</a>\n<a href="LATEST.TXT">LATEST.TXT</a>\n',
		},
		[`${VIRTUALBOX_INDEX_URL}7.0.14/VBoxGuestAdditions_7.0.14.iso`]: {},
		[`${VIRTUALBOX_INDEX_URL}7.0.14/SHA256SUMS`]: {
			body: "1234abcd *VBoxGuestAdditions_7.0.14.iso\n9999 *VirtualBox-7.0.14.tar.bz2\n",
		},
		[PARALLELS_INDEX_URL]: {
			body: JSON.stringify({
				"18": { builds: { en_US: "desktop/18/en_US.json" } },
				"19": { builds: { en_US: "desktop/19/en_US.json" } },
			}),
		},
		"https://download.parallels.com/website_links/desktop/19/en_US.json": {
			body: JSON.stringify([
				{
					category: { name: "Parallels Desktop for Mac" },
					contents: [
						{ name: "Parallels Desktop 19", files: { DMG: PARALLELS_DMG } },
					],
				},
			]),
		},
		[PARALLELS_DMG]: { status: 302, headers: { location: PARALLELS_TARGET } },
		[PARALLELS_TARGET]: {},
	};
}

const TAGS: Record<string, string[]> = {
	[SQUASHFS_REPOSITORY]: ["squashfs-tools-4.6", "squashfs-tools-4.6.1", "4.4"],
	[XEN_REPOSITORY]: ["v8.3.1", "v8.4.0", "v7.20.2"],
	[CTOP_REPOSITORY]: ["v0.7.6", "v0.7.7"],
};

describe("runUpdate", () => {
	let dir: string;
	let config: ResolvedConfig;

	beforeEach(async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
		dir = await mkdtemp(join(tmpdir(), "pinbump-update-"));
		config = {
			dockerfile: join(dir, "Dockerfile"),
			timeoutMs: 1000,
			tinycore: {
				major: "14.x",
				version: "14.0",
				arch: "x86_64",
				rootfs: "rootfs64.gz",
				mirrors: MIRRORS,
			},
			kernel: { base: "6.1" },
			docker: { base: "24.0" },
			virtualbox: {},
			parallels: {},
			sources: [],
		};
		await writeFile(config.dockerfile, DOCKERFILE);
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await rm(dir, { recursive: true, force: true });
	});

	function context(routes: Record<string, Route>) {
		const fake = createFakeFetch(routes);
		return {
			fake,
			fetcher: createFetcher({ timeoutMs: 1000, fetch: fake.fetch }),
			listTags: async (repository: string) => TAGS[repository] ?? [],
		};
	}

	it("should pin every tracked variable and keep other lines", async () => {
		const report = await runUpdate(config, context(upstreamRoutes()));

		await expect(readFile(config.dockerfile, "utf-8")).resolves.toBe(EXPECTED);
		expect(report.patch.changes).toHaveLength(13);
		expect(report.patch.unmatched).toEqual([]);
		expect(report.resolution.parallelsVersion).toBe("19.1.0-54729");
	});

	it("should resolve dependencies in a fixed order", async () => {
		const ctx = context(upstreamRoutes());
		await runUpdate(config, ctx);

		expect(ctx.fake.calls).toEqual([
			"GET https://m1.example/tc/latest-x86_64",
			"GET https://m2.example/tc/latest-x86_64",
			`GET ${KERNEL_RELEASES_URL}`,
			`GET ${DOCKER_RELEASES_URL}`,
			"GET https://m1.example/tc/14.x/x86_64/archive/14.0/distribution_files/rootfs64.gz.md5.txt",
			`GET ${VIRTUALBOX_INDEX_URL}`,
			`HEAD ${VIRTUALBOX_INDEX_URL}7.0.14/VBoxGuestAdditions_7.0.14.iso`,
			`GET ${VIRTUALBOX_INDEX_URL}7.0.14/SHA256SUMS`,
			`GET ${PARALLELS_INDEX_URL}`,
			"GET https://download.parallels.com/website_links/desktop/19/en_US.json",
			`HEAD ${PARALLELS_DMG}`,
			`HEAD ${PARALLELS_TARGET}`,
		]);
	});

	it("should leave the file untouched when the kernel family check fails", async () => {
		const error = await runUpdate(
			config,
			context(upstreamRoutes("6.6.7")),
		).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(FamilyMismatchError);
		expect(error).toMatchObject({ dependency: "kernel", actual: "6.6.7" });
		await expect(readFile(config.dockerfile, "utf-8")).resolves.toBe(DOCKERFILE);
	});

	it("should leave the file untouched when a late step fails", async () => {
		const routes = upstreamRoutes();
		delete routes[PARALLELS_INDEX_URL];

		const error = await runUpdate(config, context(routes)).catch(
			(e: unknown) => e,
		);

		expect(error).toBeInstanceOf(DependencyError);
		expect(error).toMatchObject({
			dependency: "parallels",
			message: `Parallels Desktop: Failed to fetch ${PARALLELS_INDEX_URL}: Not Found (HTTP 404)`,
		});
		expect(error instanceof Error && error.cause).toBeInstanceOf(FetchError);
		await expect(readFile(config.dockerfile, "utf-8")).resolves.toBe(DOCKERFILE);
	});

	it("should name the dependency when its request fails", async () => {
		const routes = upstreamRoutes();
		routes[KERNEL_RELEASES_URL] = { error: networkError() };

		await expect(runUpdate(config, context(routes))).rejects.toThrow(
			`Linux Kernel: Network error fetching ${KERNEL_RELEASES_URL}: fetch failed (getaddrinfo ENOTFOUND example.invalid)`,
		);
		await expect(readFile(config.dockerfile, "utf-8")).resolves.toBe(DOCKERFILE);
	});

	it("should name the checksum when no mirror has it", async () => {
		const routes = upstreamRoutes();
		delete routes[
			"https://m1.example/tc/14.x/x86_64/archive/14.0/distribution_files/rootfs64.gz.md5.txt"
		];

		const error = await runUpdate(config, context(routes)).catch(
			(e: unknown) => e,
		);

		expect(error).toBeInstanceOf(DependencyError);
		expect(error instanceof Error && error.message.split("\n")[0]).toBe(
			"rootfs64.gz checksum: All 4 mirror locations failed:",
		);
	});

	it("should only report changes on a dry run", async () => {
		const report = await runUpdate(config, context(upstreamRoutes()), {
			dryRun: true,
		});

		expect(report.dryRun).toBe(true);
		expect(report.patch.content).toBe(EXPECTED);
		await expect(readFile(config.dockerfile, "utf-8")).resolves.toBe(DOCKERFILE);
	});

	it("should find nothing to change on a second run", async () => {
		await runUpdate(config, context(upstreamRoutes()));
		const report = await runUpdate(config, context(upstreamRoutes()));

		expect(report.patch.changes).toEqual([]);
		await expect(readFile(config.dockerfile, "utf-8")).resolves.toBe(EXPECTED);
	});
});
