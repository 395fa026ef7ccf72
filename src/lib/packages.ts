import { existsSync } from "node:fs";
import { DeployError } from "./errors.js";
import { exec, execOrThrow, LONG_TIMEOUT } from "./shell.js";
import * as ui from "./ui.js";

const APT_ENV = { DEBIAN_FRONTEND: "noninteractive" };

export function isDebianFamily(): boolean {
	return existsSync("/etc/debian_version");
}

export async function isPackageInstalled(pkg: string): Promise<boolean> {
	const result = await exec("dpkg-query", ["-W", "-f=${Status}", pkg]);
	return result.exitCode === 0 && result.stdout.includes("install ok installed");
}

/** Packages from the list that dpkg does not report as installed. */
export async function missingPackages(pkgs: string[]): Promise<string[]> {
	const missing: string[] = [];
	for (const pkg of pkgs) {
		if (!(await isPackageInstalled(pkg))) missing.push(pkg);
	}
	return missing;
}

/** Fail with manual instructions on hosts without apt. */
export function requireApt(pkgs: string[], hint?: string): void {
	if (!isDebianFamily()) {
		throw new DeployError("ExternalToolUnavailable", `Automatic installation of ${pkgs.join(", ")} needs a Debian or Ubuntu host`, {
			remediation: hint ?? `Install manually: ${pkgs.join(" ")}`,
		});
	}
}

/** apt-get update + install. Already installed packages are a no-op for apt. */
export async function aptInstall(pkgs: string[], hint?: string): Promise<void> {
	if (pkgs.length === 0) return;
	requireApt(pkgs, hint);

	ui.info(`Installing ${ui.bold(pkgs.join(", "))}...`);
	await execOrThrow("apt-get", ["update"], { timeout: LONG_TIMEOUT, env: APT_ENV });
	await execOrThrow("apt-get", ["install", "-y", ...pkgs], { timeout: LONG_TIMEOUT, env: APT_ENV });
	ui.success(`Installed ${pkgs.join(", ")}`);
}
