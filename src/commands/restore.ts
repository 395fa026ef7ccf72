import { existsSync, readFileSync } from "node:fs";
import { basename, isAbsolute, join } from "node:path";
import { gunzipSync } from "node:zlib";
import { confirm, select } from "@inquirer/prompts";
import { startContainer, stopContainer } from "../lib/docker.js";
import { DeployError } from "../lib/errors.js";
import { acquireLock } from "../lib/lock.js";
import { exec, LONG_TIMEOUT } from "../lib/shell.js";
import * as ui from "../lib/ui.js";
import { allVariables } from "../pipeline.js";
import { KEYCLOAK_CONTAINER, POSTGRES_CONTAINER } from "../steps/keycloak-deployment.js";
import { listDumps } from "./backup.js";
import type { Runtime } from "./runtime.js";

async function chooseDump(dir: string, requested: string | undefined, interactive: boolean): Promise<string | null> {
	if (requested) {
		const file = isAbsolute(requested) || existsSync(requested) ? requested : join(dir, requested);
		if (!existsSync(file)) throw new DeployError("ValidationFailed", `Backup ${requested} not found`);
		return file;
	}

	const dumps = listDumps(dir);
	if (dumps.length === 0) {
		ui.error(`No backups found in ${ui.cmd(dir)}`);
		return null;
	}
	if (!interactive) return dumps[0] ?? null;

	return select({
		message: `${ui.cyan("Backup to restore")}:`,
		choices: dumps.map((file) => ({ name: basename(file), value: file })),
	});
}

/**
 * `kcdeploy restore [file]`: Keycloak is stopped while the dump is replayed
 * and started again whatever the outcome.
 */
export async function runRestore(runtime: Runtime, requested?: string): Promise<number> {
	const env = runtime.resolver.peekAll(allVariables());
	const dir = env.BACKUP_STORAGE_PATH ?? "/var/backups/keycloak";

	const file = await chooseDump(dir, requested, runtime.interactive);
	if (!file) return 1;

	if (runtime.interactive) {
		const ok = await confirm({ message: `Replace the current database with ${ui.bold(basename(file))}?`, default: false });
		if (!ok) {
			ui.info("Restore cancelled.");
			return 0;
		}
	}

	const lock = acquireLock(runtime.config.lockFile);
	try {
		const raw = readFileSync(file);
		const sql = file.endsWith(".gz") ? gunzipSync(raw).toString("utf-8") : raw.toString("utf-8");

		ui.info(`Stopping ${ui.bold(KEYCLOAK_CONTAINER)}...`);
		await stopContainer(KEYCLOAK_CONTAINER);
		try {
			const result = await exec(
				"docker",
				["exec", "-i", POSTGRES_CONTAINER, "psql", "-v", "ON_ERROR_STOP=1", "-U", env.DB_USER ?? "keycloak", "-d", env.DB_NAME ?? "keycloak"],
				{ stdin: sql, timeout: LONG_TIMEOUT },
			);
			if (result.exitCode !== 0) {
				throw new DeployError("ExecutionFailed", `psql restore failed: ${result.stderr || result.stdout}`);
			}
		} finally {
			ui.info(`Starting ${ui.bold(KEYCLOAK_CONTAINER)}...`);
			await startContainer(KEYCLOAK_CONTAINER);
		}

		ui.success(`Database restored from ${ui.cmd(basename(file))}`);
		return 0;
	} finally {
		lock.release();
	}
}
