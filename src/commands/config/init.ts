import { stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { CONFIG_FILE_NAME, renderDefaultRcFile } from "@/config";

export interface ConfigInitOptions {
	force?: boolean;
}

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch {
		return false;
	}
}

/**
 * Create a .pinbumprc file in the current directory (INI format)
 */
export async function configInit(options: ConfigInitOptions): Promise<void> {
	try {
		const configPath = join(process.cwd(), CONFIG_FILE_NAME);

		if (!options.force && (await exists(configPath))) {
			throw new Error(
				`${CONFIG_FILE_NAME} already exists in this directory. Use --force to overwrite it.`,
			);
		}

		const content = renderDefaultRcFile();
		await writeFile(configPath, content);

		console.log(`Created ${CONFIG_FILE_NAME}`);
		console.log("");
		console.log("Contents:");
		console.log(content);
		console.log(
			`Note: bump the [kernel] and [docker] bases in ${CONFIG_FILE_NAME} after reviewing a new release line.`,
		);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
