import { existsSync, mkdirSync, readdirSync, rmSync, statSync } from "node:fs";
import { join } from "node:path";
import { backupStamp } from "../lib/backups.js";
import { DeployError, errorMessage } from "../lib/errors.js";
import { acquireLock } from "../lib/lock.js";
import { type ExecResult, execToFile } from "../lib/shell.js";
import * as ui from "../lib/ui.js";
import { allVariables } from "../pipeline.js";
import { POSTGRES_CONTAINER } from "../steps/keycloak-deployment.js";
import type { Runtime } from "./runtime.js";

const DUMP_NAME = /^keycloak_backup_\d{8}_\d{6}\.sql(\.gz)?$/;

/** Dumps in `dir`, newest first. */
export function listDumps(dir: string): string[] {
	if (!existsSync(dir)) return [];
	return readdirSync(dir)
		.filter((name) => DUMP_NAME.test(name))
		.sort()
		.reverse()
		.map((name) => join(dir, name));
}

/** `kcdeploy backup`: pg_dump through the database container. Returns the dump path. */
export async function createDump(runtime: Runtime, now = new Date()): Promise<string> {
	const env = runtime.resolver.peekAll(allVariables());
	const dir = env.BACKUP_STORAGE_PATH ?? "/var/backups/keycloak";
	mkdirSync(dir, { recursive: true, mode: 0o700 });

	const file = join(dir, `keycloak_backup_${backupStamp(now)}.sql`);
	ui.info(`Dumping ${ui.bold(env.DB_NAME ?? "keycloak")} to ${ui.cmd(file)}...`);
	let result: ExecResult;
	try {
		result = await execToFile("docker", ["exec", POSTGRES_CONTAINER, "pg_dump", "--clean", "--if-exists", "-U", env.DB_USER ?? "keycloak", env.DB_NAME ?? "keycloak"], file);
	} catch (err) {
		if (existsSync(file) && statSync(file).isFile()) rmSync(file);
		throw new DeployError("ExecutionFailed", `pg_dump to ${file} failed: ${errorMessage(err)}`, { cause: err });
	}
	if (result.exitCode !== 0) {
		rmSync(file, { force: true });
		throw new DeployError("ExecutionFailed", `pg_dump failed: ${result.stderr || `exit code ${result.exitCode}`}`);
	}
	return file;
}

export async function runBackup(runtime: Runtime): Promise<number> {
	const lock = acquireLock(runtime.config.lockFile);
	try {
		const file = await createDump(runtime);
		ui.success(`Backup written to ${ui.cmd(file)}`);
		return 0;
	} finally {
		lock.release();
	}
}
