import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, statSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gunzipSync, gzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { exec } from "../lib/shell.js";
import { BACKUP_CRON_FILE, backupScriptPath, cleanup, cronEntry, execute } from "../steps/database-backup.js";

describe("database_backup", () => {
	let dir: string;
	let env: Record<string, string>;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "kcdeploy-dbbackup-"));
		env = {
			BACKUP_ENABLED: "true",
			BACKUP_STORAGE_PATH: join(dir, "dumps"),
			BACKUP_SCHEDULE: "0 2 * * *",
			BACKUP_RETENTION_DAYS: "7",
			DB_NAME: "keycloak",
			DB_USER: "keycloak",
			CRON_DIR: join(dir, "cron.d"),
			INSTALL_ROOT: join(dir, "root"),
			LOG_DIR: join(dir, "log"),
		};
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("builds the cron line from the schedule", () => {
		expect(cronEntry(env)).toBe(`0 2 * * * root ${dir}/root/bin/db_backup.sh >> ${dir}/log/db_backup.log 2>&1\n`);
	});

	it("installs an executable script and the cron entry", async () => {
		expect(await execute(env)).toBe(true);

		const script = readFileSync(backupScriptPath(env), "utf-8");
		expect(script.split("\n")).toContain(`BACKUP_DIR="${dir}/dumps"`);
		expect(script).toContain('docker exec keycloak-postgres pg_dump --clean --if-exists -U "keycloak" "keycloak"');
		expect(statSync(backupScriptPath(env)).mode & 0o777).toBe(0o755);
		expect(readFileSync(join(env.CRON_DIR, BACKUP_CRON_FILE), "utf-8")).toBe(cronEntry(env));
	});

	it("rejects a schedule without five fields", async () => {
		expect(await execute({ ...env, BACKUP_SCHEDULE: "@daily" })).toBe(false);
		expect(existsSync(join(env.CRON_DIR, BACKUP_CRON_FILE))).toBe(false);
	});

	it("rejects a non-numeric retention", async () => {
		await expect(execute({ ...env, BACKUP_RETENTION_DAYS: "week" })).rejects.toMatchObject({ kind: "ValidationFailed" });
	});

	it("removes the schedule when backups are disabled", async () => {
		await execute(env);

		expect(await execute({ ...env, BACKUP_ENABLED: "false" })).toBe(true);
		expect(existsSync(join(env.CRON_DIR, BACKUP_CRON_FILE))).toBe(false);
	});

	it("cleanup removes the cron entry and the script", async () => {
		await execute(env);

		await cleanup(env);

		expect(existsSync(join(env.CRON_DIR, BACKUP_CRON_FILE))).toBe(false);
		expect(existsSync(backupScriptPath(env))).toBe(false);
	});

	describe("backup script", () => {
		const OLD_DUMP = "keycloak_backup_20260101_020000.sql.gz";

		async function runScript(dockerStub: string) {
			await execute(env);
			mkdirSync(env.BACKUP_STORAGE_PATH, { recursive: true });
			const old = join(env.BACKUP_STORAGE_PATH, OLD_DUMP);
			writeFileSync(old, gzipSync("-- good dump\n"));
			const tenDaysAgo = new Date(Date.now() - 10 * 86_400_000);
			utimesSync(old, tenDaysAgo, tenDaysAgo);

			const bin = join(dir, "fake-bin");
			mkdirSync(bin);
			writeFileSync(join(bin, "docker"), `#!/bin/sh\n${dockerStub}\n`, { mode: 0o755 });
			return exec("sh", [backupScriptPath(env)], { env: { PATH: `${bin}:${process.env.PATH ?? ""}` } });
		}

		it("fails and keeps older dumps when pg_dump fails", async () => {
			const result = await runScript('echo "connection refused" >&2\nexit 1');

			expect(result.exitCode).toBe(1);
			expect(result.stderr).toMatch(/backup FAILED: pg_dump exited with status 1$/);
			expect(readdirSync(env.BACKUP_STORAGE_PATH)).toEqual([OLD_DUMP]);
		});

		it("fails on an empty dump", async () => {
			const result = await runScript("exit 0");

			expect(result.exitCode).toBe(1);
			expect(result.stderr).toMatch(/backup FAILED: pg_dump produced no output$/);
			expect(readdirSync(env.BACKUP_STORAGE_PATH)).toEqual([OLD_DUMP]);
		});

		it("writes a compressed dump and prunes expired ones", async () => {
			const result = await runScript('echo "-- dump"');

			expect(result.exitCode).toBe(0);
			const files = readdirSync(env.BACKUP_STORAGE_PATH);
			expect(files).toHaveLength(1);
			const [latest = ""] = files;
			expect(latest).toMatch(/^keycloak_backup_\d{8}_\d{6}\.sql\.gz$/);
			expect(gunzipSync(readFileSync(join(env.BACKUP_STORAGE_PATH, latest))).toString()).toBe("-- dump\n");
			expect(result.stdout).toMatch(/backup written: /);
		});
	});
});
