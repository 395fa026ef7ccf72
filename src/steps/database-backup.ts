import { existsSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { templatesDir } from "../lib/config.js";
import { aptInstall, missingPackages } from "../lib/packages.js";
import { renderTemplate } from "../lib/template.js";
import * as ui from "../lib/ui.js";
import { intValue, isTrue } from "../lib/values.js";
import type { ResolvedEnvironment, VariableSpec } from "../types.js";
import { POSTGRES_CONTAINER } from "./keycloak-deployment.js";

export const BACKUP_CRON_FILE = "keycloak-db-backup";

export const variables: VariableSpec[] = [
	{ name: "BACKUP_ENABLED", prompt: "Schedule nightly database backups (true/false)", default: "true" },
	{ name: "BACKUP_STORAGE_PATH", prompt: "Database backup directory", default: "/var/backups/keycloak" },
	{ name: "BACKUP_SCHEDULE", prompt: "Backup schedule (cron expression)", default: "0 2 * * *" },
	{ name: "BACKUP_RETENTION_DAYS", prompt: "Days to keep database backups", default: "7" },
	{ name: "DB_NAME", prompt: "Database name", default: "keycloak" },
	{ name: "DB_USER", prompt: "Database user", default: "keycloak" },
	{ name: "CRON_DIR", prompt: "cron.d directory", default: "/etc/cron.d" },
	{ name: "INSTALL_ROOT", prompt: "Installation root directory", default: "/opt/keycloak" },
	{ name: "LOG_DIR", prompt: "Log directory", default: "/var/log/keycloak" },
];

export function backupScriptPath(env: ResolvedEnvironment): string {
	return join(env.INSTALL_ROOT, "bin", "db_backup.sh");
}

export function cronEntry(env: ResolvedEnvironment): string {
	return `${env.BACKUP_SCHEDULE} root ${backupScriptPath(env)} >> ${join(env.LOG_DIR, "db_backup.log")} 2>&1\n`;
}

export async function checkDependencies(): Promise<boolean> {
	return (await missingPackages(["cron"])).length === 0;
}

export async function installDependencies(): Promise<boolean> {
	await aptInstall(["cron"]);
	return checkDependencies();
}

/**
 * Step 7 — Scheduled backups: a dump script plus a cron.d entry.
 */
export async function execute(env: ResolvedEnvironment): Promise<boolean> {
	const cronFile = join(env.CRON_DIR, BACKUP_CRON_FILE);
	if (!isTrue(env.BACKUP_ENABLED)) {
		rmSync(cronFile, { force: true });
		ui.skip("Scheduled backups disabled (BACKUP_ENABLED)");
		return true;
	}

	intValue(env, "BACKUP_RETENTION_DAYS");
	if (env.BACKUP_SCHEDULE.trim().split(/\s+/).length !== 5) {
		ui.error(`BACKUP_SCHEDULE must have five cron fields, got "${env.BACKUP_SCHEDULE}"`);
		return false;
	}

	mkdirSync(env.BACKUP_STORAGE_PATH, { recursive: true, mode: 0o700 });
	const script = backupScriptPath(env);
	renderTemplate(join(templatesDir(), "backup", "db_backup.sh"), script, { ...env, DB_CONTAINER: POSTGRES_CONTAINER }, 0o755);
	ui.success(`Backup script ${ui.cmd(script)}`);

	mkdirSync(env.CRON_DIR, { recursive: true });
	writeFileSync(cronFile, cronEntry(env), { mode: 0o644 });
	ui.success(`Backups scheduled (${ui.bold(env.BACKUP_SCHEDULE)}) in ${ui.cmd(cronFile)}`);
	return true;
}

/** Removes the cron entry and the script; existing dumps are kept. */
export async function cleanup(env: ResolvedEnvironment): Promise<void> {
	if (env.CRON_DIR) {
		const cronFile = join(env.CRON_DIR, BACKUP_CRON_FILE);
		if (existsSync(cronFile)) {
			rmSync(cronFile);
			ui.success(`Removed ${ui.cmd(cronFile)}`);
		}
	}
	if (env.INSTALL_ROOT) rmSync(backupScriptPath(env), { force: true });
}
