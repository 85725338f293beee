import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "@/errors";
import {
	findProjectConfigPath,
	parseRcFile,
	renderDefaultRcFile,
	resolveConfig,
} from "./config";

describe("parseRcFile", () => {
	it("should read sections and mirror arrays", () => {
		const parsed = parseRcFile(
			[
				"dockerfile = images/Dockerfile",
				"[tinycore]",
				"version = 14.0",
				"mirrors[] = https://m1.example/tc",
				"mirrors[] = https://m2.example/tc",
				"[kernel]",
				"base = 6.6",
			].join("\n"),
			".pinbumprc",
		);

		expect(parsed).toEqual({
			dockerfile: "images/Dockerfile",
			tinycore: {
				version: "14.0",
				mirrors: ["https://m1.example/tc", "https://m2.example/tc"],
			},
			kernel: { base: "6.6" },
		});
	});

	it("should reject invalid values with the offending key", () => {
		expect(() => parseRcFile("[docker]\nbase = latest\n", "/x/.pinbumprc")).toThrow(
			ConfigError,
		);
		expect(() => parseRcFile("timeout = soon\n", "/x/.pinbumprc")).toThrow(
			"Invalid config in /x/.pinbumprc:\n  - timeout: must be a whole number of milliseconds",
		);
	});

	it("should read the rendered default file back as the defaults", () => {
		expect(parseRcFile(renderDefaultRcFile(), "default")).toEqual({
			dockerfile: "Dockerfile",
			timeout: "2000",
			tinycore: {
				major: "14.x",
				version: "14.0",
				arch: "x86_64",
				rootfs: "rootfs64.gz",
				mirrors: ["https://distro.ibiblio.org/tinycorelinux"],
			},
			kernel: { base: "6.1" },
			docker: { base: "24.0" },
		});
	});

	it("should render the optional families as comments", () => {
		const lines = renderDefaultRcFile().split("\n");

		expect(lines[0]).toBe("; pinbump configuration");
		expect(lines).toContain(
			"mirrors[] = https://distro.ibiblio.org/tinycorelinux",
		);
		expect(lines).toContain("; [virtualbox]");
		expect(lines).toContain("; [parallels]");
	});
});

describe("resolveConfig", () => {
	let root: string;
	let home: string;
	let project: string;

	beforeEach(async () => {
		root = await mkdtemp(join(tmpdir(), "pinbump-config-"));
		home = join(root, "home");
		project = join(root, "work", "project");
		await mkdir(home, { recursive: true });
		await mkdir(join(project, "nested"), { recursive: true });
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	it("should use defaults when no config exists", async () => {
		const config = await resolveConfig({ cwd: project, home, env: {} });

		expect(config.dockerfile).toBe(join(project, "Dockerfile"));
		expect(config.timeoutMs).toBe(2000);
		expect(config.tinycore).toEqual({
			major: "14.x",
			version: "14.0",
			arch: "x86_64",
			rootfs: "rootfs64.gz",
			mirrors: ["https://distro.ibiblio.org/tinycorelinux"],
		});
		expect(config.kernel.base).toBe("6.1");
		expect(config.docker.base).toBe("24.0");
		expect(config.virtualbox.base).toBeUndefined();
	});

	it("should layer user, project, env and overrides", async () => {
		await writeFile(
			join(home, ".pinbumprc"),
			"timeout = 5000\n[kernel]\nbase = 6.6\n[docker]\nbase = 25.0\n",
		);
		await writeFile(
			join(project, ".pinbumprc"),
			"dockerfile = build/Dockerfile\n[kernel]\nbase = 6.1\n",
		);

		const config = await resolveConfig({
			cwd: join(project, "nested"),
			home,
			env: { PINBUMP_DOCKER_BASE: "26.1" },
			overrides: { timeoutMs: 750 },
		});

		expect(config.dockerfile).toBe(join(project, "build", "Dockerfile"));
		expect(config.timeoutMs).toBe(750);
		expect(config.kernel.base).toBe("6.1");
		expect(config.docker.base).toBe("26.1");
		expect(config.sources).toEqual([
			join(home, ".pinbumprc"),
			join(project, ".pinbumprc"),
		]);
	});

	it("should reject a bad timeout in the environment", async () => {
		await expect(
			resolveConfig({ cwd: project, home, env: { PINBUMP_TIMEOUT: "0" } }),
		).rejects.toThrow(
			'PINBUMP_TIMEOUT must be a positive number of milliseconds, got "0"',
		);
	});
});

describe("findProjectConfigPath", () => {
	it("should return null when no file exists up the tree", async () => {
		const dir = await mkdtemp(join(tmpdir(), "pinbump-find-"));
		try {
			const found = await findProjectConfigPath(dir);
			// A stray ~/.pinbumprc above tmpdir would be found; anything else is wrong
			expect(found === null || !found.startsWith(dir)).toBe(true);
		} finally {
			await rm(dir, { recursive: true, force: true });
		}
	});
});
