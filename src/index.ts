#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { configInit, configShow, update } from "./commands/index";

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson: unknown = JSON.parse(
	readFileSync(join(__dirname, "..", "package.json"), "utf-8"),
);
const version =
	typeof packageJson === "object" &&
	packageJson !== null &&
	"version" in packageJson &&
	typeof packageJson.version === "string"
		? packageJson.version
		: "0.0.0";

const program = new Command();

program
	.name("pinbump")
	.description(
		"Check upstream releases and pin new versions in a Tiny Core based Dockerfile",
	)
	.version(version);

// =============================================================================
// Config commands
// =============================================================================

const configCmd = program
	.command("config")
	.description("Manage pinbump configuration");

configCmd
	.command("show")
	.description("Show resolved configuration")
	.action(async () => {
		await configShow();
	});

configCmd
	.command("init")
	.description("Create a .pinbumprc file with the default values")
	.option("-f, --force", "Overwrite an existing .pinbumprc")
	.action(async (options: { force?: boolean }) => {
		await configInit({ force: options.force });
	});

// =============================================================================
// Update
// =============================================================================

program
	.command("update")
	.description(
		"Resolve the latest upstream versions and rewrite the Dockerfile",
	)
	.option("--dockerfile <path>", "Dockerfile to rewrite")
	.option("--timeout <ms>", "Per-request timeout in milliseconds")
	.option("--dry-run", "Show what would change without writing")
	.action(
		async (options: {
			dockerfile?: string;
			timeout?: string;
			dryRun?: boolean;
		}) => {
			await update({
				dockerfile: options.dockerfile,
				timeout: options.timeout,
				dryRun: options.dryRun,
			});
		},
	);

await program.parseAsync();
