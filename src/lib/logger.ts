import { appendFileSync, mkdirSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

// Levels-only surface:
// - logger.info("msg")
// - logger.info({ step: "docker_setup" }, "msg")
export interface RunLogger {
	readonly filePath: string;
	debug: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
	info: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
	warn: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
	error: (objOrMsg?: Record<string, unknown> | string, msg?: string) => void;
	/** Append a raw multi-line block (error details). */
	block: (lines: string[]) => void;
}

function normalizeArgs(objOrMsg?: Record<string, unknown> | string, msg?: string): { obj: Record<string, unknown>; msg: string } {
	if (typeof objOrMsg === "string") {
		return { obj: {}, msg: objOrMsg };
	}
	return { obj: objOrMsg ?? {}, msg: msg ?? "" };
}

/** Pick a writable log path, falling back to the temp dir when the preferred one is not. */
function prepareLogFile(filePath: string): { path: string; fallbackReason?: string } {
	try {
		mkdirSync(dirname(filePath), { recursive: true });
		appendFileSync(filePath, "");
		return { path: filePath };
	} catch (err) {
		const fallback = join(tmpdir(), "keycloak-deploy.log");
		return { path: fallback, fallbackReason: err instanceof Error ? err.message : String(err) };
	}
}

export function createRunLogger(filePath: string): RunLogger {
	const target = prepareLogFile(filePath);

	const append = (text: string): void => {
		appendFileSync(target.path, text, "utf8");
	};

	const write = (level: LogLevel, objOrMsg?: Record<string, unknown> | string, msg?: string): void => {
		const { obj, msg: normalizedMsg } = normalizeArgs(objOrMsg, msg);
		const fields = Object.keys(obj).length > 0 ? ` ${JSON.stringify(obj)}` : "";
		append(`${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} ${normalizedMsg}${fields}\n`);
	};

	const logger: RunLogger = {
		filePath: target.path,
		debug: (objOrMsg, msg) => write("debug", objOrMsg, msg),
		info: (objOrMsg, msg) => write("info", objOrMsg, msg),
		warn: (objOrMsg, msg) => write("warn", objOrMsg, msg),
		error: (objOrMsg, msg) => write("error", objOrMsg, msg),
		block: (lines) => append(`${lines.join("\n")}\n`),
	};

	if (target.fallbackReason) {
		logger.warn({ requested: filePath }, `log file not writable, using ${target.path}: ${target.fallbackReason}`);
	}
	return logger;
}
