import { chmodSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Replace ${NAME} with its value; unknown names stay as written. */
export function substitute(text: string, values: Readonly<Record<string, string>>): string {
	return text.replace(PLACEHOLDER, (match, name: string) => values[name] ?? match);
}

/** Substitute inside every string of a parsed document; keys and other scalars are kept. */
export function substituteStrings(value: unknown, values: Readonly<Record<string, string>>): unknown {
	if (typeof value === "string") return substitute(value, values);
	if (Array.isArray(value)) return value.map((item) => substituteStrings(item, values));
	if (value !== null && typeof value === "object") {
		return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, substituteStrings(item, values)]));
	}
	return value;
}

/** Render a template file to `dest`, creating parent directories. */
export function renderTemplate(source: string, dest: string, values: Readonly<Record<string, string>>, mode = 0o644): string {
	const content = substitute(readFileSync(source, "utf-8"), values);
	mkdirSync(dirname(dest), { recursive: true });
	writeFileSync(dest, content, { encoding: "utf-8", mode });
	chmodSync(dest, mode);
	return content;
}
