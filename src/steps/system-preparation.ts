import { chmodSync, mkdirSync } from "node:fs";
import { aptInstall, missingPackages } from "../lib/packages.js";
import * as ui from "../lib/ui.js";
import type { ResolvedEnvironment, VariableSpec } from "../types.js";

const PACKAGES = ["apt-transport-https", "ca-certificates", "curl", "gnupg", "lsb-release"];

const DIRECTORY_VARIABLES = ["INSTALL_ROOT", "LOG_DIR", "CONFIG_DIR", "DATA_DIR"] as const;

export const variables: VariableSpec[] = [
	{ name: "INSTALL_ROOT", prompt: "Installation root directory", default: "/opt/keycloak" },
	{ name: "LOG_DIR", prompt: "Log directory", default: "/var/log/keycloak" },
	{ name: "CONFIG_DIR", prompt: "Configuration directory", default: "/etc/keycloak" },
	{ name: "DATA_DIR", prompt: "Data directory", default: "/var/lib/keycloak" },
];

export async function checkDependencies(): Promise<boolean> {
	const missing = await missingPackages(PACKAGES);
	if (missing.length > 0) ui.info(`Missing packages: ${missing.join(", ")}`);
	return missing.length === 0;
}

export async function installDependencies(): Promise<boolean> {
	await aptInstall(await missingPackages(PACKAGES));
	return (await missingPackages(PACKAGES)).length === 0;
}

/**
 * Step 1 — System preparation: base packages and the directory layout.
 */
export async function execute(env: ResolvedEnvironment): Promise<boolean> {
	for (const key of DIRECTORY_VARIABLES) {
		const dir = env[key];
		if (!dir) return false;
		mkdirSync(dir, { recursive: true, mode: 0o755 });
		chmodSync(dir, 0o755);
		ui.success(`Directory ${ui.cmd(dir)}`);
	}
	return true;
}

export async function cleanup(_env: ResolvedEnvironment): Promise<void> {
	// Directories may hold operator data; reset removes the install dir itself
	ui.skip("System preparation has nothing to undo");
}
