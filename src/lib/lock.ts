import { mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { DeployError } from "./errors.js";

export interface Lock {
	release: () => void;
}

function isAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (err) {
		// EPERM: the process exists but belongs to someone else
		return err instanceof Error && "code" in err && err.code === "EPERM";
	}
}

/**
 * Take the PID lock, replacing a stale one. Throws AlreadyRunning when a live
 * process holds it.
 */
export function acquireLock(filePath: string, pid = process.pid): Lock {
	mkdirSync(dirname(filePath), { recursive: true });

	try {
		writeFileSync(filePath, `${pid}\n`, { flag: "wx" });
	} catch (err) {
		if (!(err instanceof Error && "code" in err && err.code === "EEXIST")) throw err;

		const holder = Number.parseInt(readFileSync(filePath, "utf-8").trim(), 10);
		if (Number.isInteger(holder) && holder !== pid && isAlive(holder)) {
			throw new DeployError("AlreadyRunning", `Another deployment is running (pid ${holder})`, {
				remediation: `Wait for it to finish, or remove ${filePath} if that process is not kcdeploy`,
			});
		}
		writeFileSync(filePath, `${pid}\n`);
	}

	return {
		release: () => rmSync(filePath, { force: true }),
	};
}
