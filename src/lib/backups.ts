import { cpSync, existsSync, mkdirSync, readdirSync, rmSync, statSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";

export interface BackupSource {
	/** File or directory to copy. Missing sources are skipped. */
	path: string;
	/** Name inside the backup directory. */
	name?: string;
}

export interface CreateBackupOptions {
	root: string;
	sources: BackupSource[];
	maxBackups: number;
	/** Extra lines written to backup_info.txt. */
	info?: string[];
	now?: Date;
}

const pad = (n: number) => String(n).padStart(2, "0");

/** 20260118_093005 */
export function backupStamp(date: Date): string {
	return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/** Backup directories under `root`, oldest first. */
export function listBackups(root: string): string[] {
	if (!existsSync(root)) return [];
	return readdirSync(root)
		.filter((name) => /^\d{8}_\d{6}(_\d+)?$/.test(name) && statSync(join(root, name)).isDirectory())
		.sort()
		.map((name) => join(root, name));
}

export function latestBackup(root: string): string | null {
	const all = listBackups(root);
	return all[all.length - 1] ?? null;
}

/** Delete oldest backups until fewer than `maxBackups` remain, leaving room for one more. */
export function rotateBackups(root: string, maxBackups: number): string[] {
	const removed: string[] = [];
	const all = listBackups(root);
	while (all.length > 0 && all.length >= maxBackups) {
		const oldest = all.shift();
		if (oldest === undefined) break;
		rmSync(oldest, { recursive: true, force: true });
		removed.push(oldest);
	}
	return removed;
}

/**
 * Copy the existing sources into a fresh timestamped directory under `root`.
 * Returns null when none of the sources exist.
 */
export function createBackup(options: CreateBackupOptions): string | null {
	const present = options.sources.filter((s) => existsSync(s.path));
	if (present.length === 0) return null;

	rotateBackups(options.root, options.maxBackups);

	const stamp = backupStamp(options.now ?? new Date());
	let dir = join(options.root, stamp);
	for (let n = 1; existsSync(dir); n++) {
		dir = join(options.root, `${stamp}_${n}`);
	}
	mkdirSync(dir, { recursive: true });

	for (const source of present) {
		cpSync(source.path, join(dir, source.name ?? basename(source.path)), { recursive: true, dereference: true });
	}
	if (options.info) {
		writeFileSync(join(dir, "backup_info.txt"), `${options.info.join("\n")}\n`, "utf-8");
	}
	return dir;
}

/** Copy every entry of a backup (except backup_info.txt) into `target`. */
export function restoreBackup(backupDir: string, target: string): void {
	mkdirSync(target, { recursive: true });
	for (const entry of readdirSync(backupDir)) {
		if (entry === "backup_info.txt") continue;
		cpSync(join(backupDir, entry), join(target, entry), { recursive: true, force: true });
	}
}
