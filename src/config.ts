import { readFile, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import * as ini from "ini";
import { z } from "zod";
import { ConfigError } from "./errors";

// =============================================================================
// Types
// =============================================================================

/**
 * Contents of a .pinbumprc file (INI format)
 *
 * ```ini
 * dockerfile = Dockerfile
 * timeout = 2000
 *
 * [tinycore]
 * major = 14.x
 * version = 14.0
 * mirrors[] = https://distro.ibiblio.org/tinycorelinux
 *
 * [kernel]
 * base = 6.1
 *
 * [docker]
 * base = 24.0
 * ```
 */
const numericString = z
	.string()
	.regex(/^\d+$/, "must be a whole number of milliseconds");

const familyString = z
	.string()
	.regex(/^\d+(\.\d+)*$/, "must be a dotted version prefix such as 6.1");

const section = <T extends z.ZodRawShape>(shape: T) =>
	z.object(shape).partial().optional();

export const rcFileSchema = z.object({
	dockerfile: z.string().min(1).optional(),
	timeout: numericString.optional(),
	tinycore: section({
		major: z.string().min(1),
		version: z.string().min(1),
		arch: z.string().min(1),
		rootfs: z.string().min(1),
		mirrors: z.array(z.string().url()).min(1),
	}),
	kernel: section({ base: familyString }),
	docker: section({ base: familyString }),
	virtualbox: section({ base: familyString }),
	parallels: section({ base: familyString }),
});

export type RcFile = z.infer<typeof rcFileSchema>;

/**
 * Fully resolved configuration (after cascade)
 */
export interface ResolvedConfig {
	/** Absolute path of the Dockerfile to rewrite */
	dockerfile: string;
	/** Per-request timeout in milliseconds */
	timeoutMs: number;
	tinycore: {
		major: string;
		version: string;
		arch: string;
		rootfs: string;
		/** Tried in order; first is preferred */
		mirrors: string[];
	};
	kernel: { base: string };
	docker: { base: string };
	/** Unset base means "any version" */
	virtualbox: { base?: string };
	parallels: { base?: string };
	/** Which rc files contributed, lowest priority first */
	sources: string[];
}

export interface ConfigOverrides {
	dockerfile?: string;
	timeoutMs?: number;
}

export interface ResolveConfigOptions {
	cwd?: string;
	home?: string;
	env?: NodeJS.ProcessEnv;
	overrides?: ConfigOverrides;
}

// =============================================================================
// Constants
// =============================================================================

export const CONFIG_FILE_NAME = ".pinbumprc";

export const DEFAULT_CONFIG = {
	dockerfile: "Dockerfile",
	timeoutMs: 2000,
	tinycore: {
		major: "14.x",
		version: "14.0",
		arch: "x86_64",
		rootfs: "rootfs64.gz",
		mirrors: ["https://distro.ibiblio.org/tinycorelinux"],
	},
	kernel: { base: "6.1" },
	docker: { base: "24.0" },
} as const;

/**
 * Get the user config file path (~/.pinbumprc)
 */
export function getConfigPath(home: string = homedir()): string {
	return join(home, CONFIG_FILE_NAME);
}

// =============================================================================
// INI Config Functions
// =============================================================================

/**
 * Parse and validate the contents of an rc file.
 */
export function parseRcFile(content: string, path: string): RcFile {
	const result = rcFileSchema.safeParse(ini.parse(content));
	if (!result.success) {
		const issues = result.error.issues
			.map((issue) => {
				const key = issue.path.join(".") || "(root)";
				return `  - ${key}: ${issue.message}`;
			})
			.join("\n");
		throw new ConfigError(`Invalid config in ${path}:\n${issues}`);
	}
	return result.data;
}

async function isFile(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile();
	} catch {
		return false;
	}
}

/**
 * Read an rc file if it exists. A file that exists but is invalid throws.
 */
export async function readRcFile(path: string): Promise<RcFile | null> {
	if (!(await isFile(path))) {
		return null;
	}

	const content = await readFile(path, "utf-8");
	const parsed = parseRcFile(content, path);

	if (process.env.PINBUMP_DEBUG) {
		console.log(`[config] Read ${path}:`, JSON.stringify(parsed, null, 2));
	}

	return parsed;
}

/**
 * Find the nearest project .pinbumprc by searching up the directory tree
 */
export async function findProjectConfigPath(
	cwd: string = process.cwd(),
): Promise<string | null> {
	let currentDir = resolve(cwd);

	while (true) {
		const configPath = join(currentDir, CONFIG_FILE_NAME);
		if (await isFile(configPath)) {
			return configPath;
		}
		const parent = dirname(currentDir);
		if (parent === currentDir) {
			return null;
		}
		currentDir = parent;
	}
}

/**
 * Write a starter .pinbumprc with the default values
 */
export function renderDefaultRcFile(): string {
	const body = ini.stringify(
		{
			dockerfile: DEFAULT_CONFIG.dockerfile,
			timeout: String(DEFAULT_CONFIG.timeoutMs),
			tinycore: {
				...DEFAULT_CONFIG.tinycore,
				mirrors: [...DEFAULT_CONFIG.tinycore.mirrors],
			},
			kernel: { ...DEFAULT_CONFIG.kernel },
			docker: { ...DEFAULT_CONFIG.docker },
		},
		{ whitespace: true },
	);
	// ini.stringify writes no comments; the optional families go in by hand
	return [
		"; pinbump configuration",
		body,
		"; [virtualbox]",
		"; base = 7.0",
		"",
		"; [parallels]",
		"; base = 19.1",
		"",
	].join("\n");
}

function parseTimeout(value: string, origin: string): number {
	const parsed = Number.parseInt(value, 10);
	if (!/^\d+$/.test(value) || parsed <= 0) {
		throw new ConfigError(
			`${origin} must be a positive number of milliseconds, got "${value}"`,
		);
	}
	return parsed;
}

function mergeRcFile(config: ResolvedConfig, rc: RcFile, cwd: string): void {
	if (rc.dockerfile) config.dockerfile = resolve(cwd, rc.dockerfile);
	if (rc.timeout) config.timeoutMs = parseTimeout(rc.timeout, "timeout");
	config.tinycore = { ...config.tinycore, ...rc.tinycore };
	config.kernel = { ...config.kernel, ...rc.kernel };
	config.docker = { ...config.docker, ...rc.docker };
	config.virtualbox = { ...config.virtualbox, ...rc.virtualbox };
	config.parallels = { ...config.parallels, ...rc.parallels };
}

/**
 * Resolve the full configuration using cascade priority:
 * 1. Command-line overrides
 * 2. Environment variables (PINBUMP_*)
 * 3. Project config (.pinbumprc in project directory or above)
 * 4. User config (~/.pinbumprc)
 * 5. Defaults
 */
export async function resolveConfig(
	options: ResolveConfigOptions = {},
): Promise<ResolvedConfig> {
	const cwd = resolve(options.cwd ?? process.cwd());
	const env = options.env ?? process.env;

	const config: ResolvedConfig = {
		dockerfile: resolve(cwd, DEFAULT_CONFIG.dockerfile),
		timeoutMs: DEFAULT_CONFIG.timeoutMs,
		tinycore: {
			...DEFAULT_CONFIG.tinycore,
			mirrors: [...DEFAULT_CONFIG.tinycore.mirrors],
		},
		kernel: { ...DEFAULT_CONFIG.kernel },
		docker: { ...DEFAULT_CONFIG.docker },
		virtualbox: {},
		parallels: {},
		sources: [],
	};

	const userPath = getConfigPath(options.home);
	const userConfig = await readRcFile(userPath);
	if (userConfig) {
		mergeRcFile(config, userConfig, cwd);
		config.sources.push(userPath);
	}

	// Project config is relative to its own directory
	const projectPath = await findProjectConfigPath(cwd);
	if (projectPath && projectPath !== userPath) {
		const projectConfig = await readRcFile(projectPath);
		if (projectConfig) {
			mergeRcFile(config, projectConfig, dirname(projectPath));
			config.sources.push(projectPath);
		}
	}

	// Environment variables
	if (env.PINBUMP_DOCKERFILE) {
		config.dockerfile = resolve(cwd, env.PINBUMP_DOCKERFILE);
	}
	if (env.PINBUMP_TIMEOUT) {
		config.timeoutMs = parseTimeout(env.PINBUMP_TIMEOUT, "PINBUMP_TIMEOUT");
	}
	if (env.PINBUMP_TCL_VERSION) {
		config.tinycore.version = env.PINBUMP_TCL_VERSION;
	}
	if (env.PINBUMP_KERNEL_BASE) {
		config.kernel.base = env.PINBUMP_KERNEL_BASE;
	}
	if (env.PINBUMP_DOCKER_BASE) {
		config.docker.base = env.PINBUMP_DOCKER_BASE;
	}

	// Command-line flags always win
	if (options.overrides?.dockerfile) {
		config.dockerfile = resolve(cwd, options.overrides.dockerfile);
	}
	if (options.overrides?.timeoutMs !== undefined) {
		config.timeoutMs = options.overrides.timeoutMs;
	}

	if (env.PINBUMP_DEBUG) {
		console.log("[config] Resolved config:");
		console.log(`[config]   dockerfile: ${config.dockerfile}`);
		console.log(`[config]   timeout: ${config.timeoutMs}ms`);
		console.log(`[config]   mirrors: ${config.tinycore.mirrors.join(", ")}`);
	}

	return config;
}
