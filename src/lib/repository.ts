import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { DeployError } from "./errors.js";
import { commandExists, execOrThrow, installHint, LONG_TIMEOUT } from "./shell.js";
import * as ui from "./ui.js";

export interface SyncOptions {
	repoUrl?: string;
	dir: string;
	/** False with --no-clone. */
	clone: boolean;
	/** Pull when a checkout already exists. */
	update: boolean;
}

export type SyncResult = "skipped" | "cloned" | "updated" | "unchanged";

async function requireGit(): Promise<void> {
	if (!(await commandExists("git"))) {
		throw new DeployError("ExternalToolUnavailable", "git is required to sync the deployment repository", { remediation: installHint("git") });
	}
}

/**
 * Keep the install directory's checkout of the deployment repository current.
 * Runs outside the step pipeline and never touches the progress file.
 */
export async function syncRepository(options: SyncOptions): Promise<SyncResult> {
	if (!options.clone) {
		ui.skip("Repository sync disabled (--no-clone)");
		return "skipped";
	}

	if (existsSync(join(options.dir, ".git"))) {
		if (!options.update) return "unchanged";
		await requireGit();
		ui.info(`Updating ${ui.cmd(options.dir)}...`);
		await execOrThrow("git", ["-C", options.dir, "pull", "--ff-only"], { timeout: LONG_TIMEOUT });
		ui.success("Repository updated");
		return "updated";
	}

	const { repoUrl } = options;
	if (!repoUrl) {
		if (options.update) ui.warn(`${options.dir} is not a git checkout and KCDEPLOY_REPO_URL is unset; nothing to update`);
		return "skipped";
	}
	if (existsSync(options.dir) && readdirSync(options.dir).length > 0) {
		ui.warn(`${options.dir} is not empty and not a git checkout; not cloning`);
		return "skipped";
	}

	await requireGit();
	ui.info(`Cloning ${ui.url(repoUrl)} into ${ui.cmd(options.dir)}...`);
	await execOrThrow("git", ["clone", repoUrl, options.dir], { timeout: LONG_TIMEOUT });
	ui.success("Repository cloned");
	return "cloned";
}
