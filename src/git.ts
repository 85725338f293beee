/**
 * Remote tag listing via `git ls-remote --tags`.
 */

import { type ExecFileOptions, execFile } from "node:child_process";
import { promisify } from "node:util";
import { GitError } from "@/errors";

const execFileAsync = promisify(execFile);

/** Lists the tag names of a remote repository */
export type TagLister = (repository: string) => Promise<string[]>;

/** Runs a binary and resolves with its standard output */
export type CommandRunner = (
	file: string,
	args: string[],
	options: ExecFileOptions,
) => Promise<{ stdout: string }>;

export interface GitOptions {
	/** Kill git if it has not finished after this many milliseconds */
	timeoutMs: number;
	/** Injected process runner (defaults to execFile) */
	run?: CommandRunner;
}

function wasKilled(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"killed" in error &&
		error.killed === true
	);
}

/**
 * Parse `git ls-remote --tags` output into unique tag names.
 *
 * Strips the `refs/tags/` prefix and the `^{}` suffix of peeled
 * annotated tags, keeping first-seen order.
 */
export function parseLsRemoteTags(output: string): string[] {
	const tags = new Set<string>();
	for (const line of output.split("\n")) {
		const ref = line.trim().split(/\s+/)[1];
		if (!ref?.startsWith("refs/tags/")) continue;
		const name = ref.slice("refs/tags/".length).replace(/\^\{\}$/, "");
		if (name) tags.add(name);
	}
	return [...tags];
}

/**
 * Create a tag lister backed by the git binary.
 */
export function createGitTagLister(options: GitOptions): TagLister {
	const run: CommandRunner =
		options.run ??
		((file, args, execOptions) => execFileAsync(file, args, execOptions));

	return async (repository) => {
		if (process.env.PINBUMP_DEBUG) {
			console.log(`[git] ls-remote --tags ${repository}`);
		}

		try {
			const { stdout } = await run(
				"git",
				["ls-remote", "--tags", repository],
				{
					timeout: options.timeoutMs,
					maxBuffer: 16 * 1024 * 1024,
					env: {
						...process.env,
						// slow Git HTTP servers should fail fast, not hang
						GIT_HTTP_LOW_SPEED_LIMIT: "100",
						GIT_HTTP_LOW_SPEED_TIME: "2",
						GIT_TERMINAL_PROMPT: "0",
					},
				},
			);
			return parseLsRemoteTags(stdout);
		} catch (error) {
			if (wasKilled(error)) {
				throw new GitError(
					repository,
					`timed out after ${options.timeoutMs}ms`,
				);
			}
			const message = error instanceof Error ? error.message : String(error);
			throw new GitError(repository, message.trim());
		}
	};
}
