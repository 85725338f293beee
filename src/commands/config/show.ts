import { getConfigPath, resolveConfig } from "@/config";

/**
 * Show resolved configuration
 */
export async function configShow(): Promise<void> {
	try {
		const resolved = await resolveConfig();
		const { tinycore } = resolved;

		console.log("Resolved Configuration:\n");
		console.log(`  Dockerfile:       ${resolved.dockerfile}`);
		console.log(`  Timeout:          ${resolved.timeoutMs}ms`);
		console.log(`  Tiny Core:        ${tinycore.version} (${tinycore.major})`);
		console.log(`  Architecture:     ${tinycore.arch}`);
		console.log(`  Root filesystem:  ${tinycore.rootfs}`);
		console.log("  Mirrors:");
		for (const mirror of tinycore.mirrors) {
			console.log(`    - ${mirror}`);
		}
		console.log(`  Kernel family:    ${resolved.kernel.base}`);
		console.log(`  Docker family:    ${resolved.docker.base}`);
		console.log(
			`  VirtualBox family: ${resolved.virtualbox.base || "(any)"}`,
		);
		console.log(`  Parallels family: ${resolved.parallels.base || "(any)"}`);
		console.log("");
		console.log("Config Locations:");
		console.log(`  User config:    ${getConfigPath()}`);
		console.log(
			`  Loaded:         ${resolved.sources.length > 0 ? resolved.sources.join(", ") : "(defaults only)"}`,
		);
		console.log("");
		console.log("Environment Variables:");
		for (const name of [
			"PINBUMP_DOCKERFILE",
			"PINBUMP_TIMEOUT",
			"PINBUMP_TCL_VERSION",
			"PINBUMP_KERNEL_BASE",
			"PINBUMP_DOCKER_BASE",
		]) {
			console.log(`  ${name}: ${process.env[name] || "(not set)"}`);
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
