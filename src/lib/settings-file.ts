import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import dotenv from "dotenv";
import { DeployError } from "./errors.js";

/** Settings hold passwords: owner read/write only. */
export const SETTINGS_FILE_MODE = 0o600;

const SAFE_VALUE = /^[A-Za-z0-9_./:@,+%=*-]*$/;
// dotenv ends a double-quoted value at the next " and expands \n and \r inside it
const DOUBLE_QUOTE_UNSAFE = /"|\\[nr]/;

/** Read KEY=value pairs. A missing file is an empty mapping. */
export function readSettings(filePath: string): Record<string, string> {
	if (!existsSync(filePath)) return {};
	return dotenv.parse(readFileSync(filePath, "utf-8"));
}

/** Whether some quoting reads back exactly `value`. */
export function storable(value: string): boolean {
	return !value.includes("'") || !value.includes("`") || !DOUBLE_QUOTE_UNSAFE.test(value);
}

/** Quote a value so dotenv reads back exactly what was written. */
export function formatValue(value: string, key = "Value"): string {
	if (SAFE_VALUE.test(value)) return value;
	if (!value.includes("'")) return `'${value}'`;
	if (!value.includes("`")) return `\`${value}\``;
	if (!storable(value)) {
		throw new DeployError("ValidationFailed", `${key} cannot be stored in the settings file: it combines ', \` and " or a \\n sequence`);
	}
	return `"${value}"`;
}

/**
 * Insert or replace one key, keeping every other line (comments included) as it was.
 */
export function upsertSetting(filePath: string, key: string, value: string): void {
	const lines = existsSync(filePath) ? readFileSync(filePath, "utf-8").split("\n") : [];
	if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

	const entry = `${key}=${formatValue(value, key)}`;
	const matcher = new RegExp(`^\\s*(export\\s+)?${key}\\s*=`);
	const index = lines.findIndex((line) => matcher.test(line));
	if (index === -1) {
		lines.push(entry);
	} else {
		lines[index] = entry;
	}

	mkdirSync(dirname(filePath), { recursive: true });
	writeFileSync(filePath, `${lines.join("\n")}\n`, { encoding: "utf-8", mode: SETTINGS_FILE_MODE });
	chmodSync(filePath, SETTINGS_FILE_MODE);
}
