import { relative } from "node:path";
import { resolveConfig } from "@/config";
import { createFetcher } from "@/fetcher";
import { createGitTagLister } from "@/git";
import { runUpdate } from "@/update";

export interface UpdateCommandOptions {
	dockerfile?: string;
	dryRun?: boolean;
	timeout?: string;
}

function parseTimeoutFlag(value: string | undefined): number | undefined {
	if (value === undefined) return undefined;
	const parsed = Number.parseInt(value, 10);
	if (!/^\d+$/.test(value) || parsed <= 0) {
		throw new Error(`--timeout must be a positive number, got "${value}"`);
	}
	return parsed;
}

export async function update(options: UpdateCommandOptions): Promise<void> {
	try {
		const config = await resolveConfig({
			overrides: {
				dockerfile: options.dockerfile,
				timeoutMs: parseTimeoutFlag(options.timeout),
			},
		});

		const fetcher = createFetcher({ timeoutMs: config.timeoutMs });
		// ls-remote makes several round trips; give it more room than one request
		const listTags = createGitTagLister({ timeoutMs: config.timeoutMs * 15 });

		const report = await runUpdate(
			config,
			{ fetcher, listTags },
			{ dryRun: options.dryRun },
		);
		const target =
			relative(process.cwd(), report.dockerfile) || report.dockerfile;

		for (const id of report.patch.unmatched) {
			console.warn(`  Warning: no line in ${target} matched edit "${id}"`);
		}

		if (report.patch.changes.length === 0) {
			console.log(`\n${target} is up to date.`);
			return;
		}

		console.log(`\nChanges to ${target}:\n`);
		for (const change of report.patch.changes) {
			console.log(`  ${change.line}: - ${change.before}`);
			console.log(`  ${change.line}: + ${change.after}`);
		}

		if (report.dryRun) {
			console.log("\nDry run - no changes made.");
			return;
		}

		console.log(`\nUpdated ${target}.`);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
