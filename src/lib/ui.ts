import type { RunLogger } from "./logger.js";

const supportsColor = process.env.NO_COLOR == null && process.stdout.isTTY === true;

const c = (code: string) => (supportsColor ? code : "");

const RESET = c("\x1b[0m");
const BOLD = c("\x1b[1m");
const DIM = c("\x1b[2m");
const UNDERLINE = c("\x1b[4m");
const GREEN = c("\x1b[32m");
const YELLOW = c("\x1b[33m");
const CYAN = c("\x1b[36m");
const RED = c("\x1b[31m");
const WHITE = c("\x1b[37m");

const ANSI = /\x1b\[[0-9;]*m/g;

let sink: RunLogger | null = null;
let verbose = false;

/** Mirror every printed line into the run log (null detaches). */
export function attachLog(logger: RunLogger | null): void {
	sink = logger;
}

export function setVerbose(on: boolean): void {
	verbose = on;
}

export function stripAnsi(text: string): string {
	return text.replace(ANSI, "");
}

function print(line: string, level: "info" | "warn" | "error" | "debug" = "info"): void {
	console.log(line);
	const plain = stripAnsi(line).trim();
	if (sink && plain) sink[level](plain);
}

// ─── Inline colour helpers ─────────────────────────────────────────────────

export function bold(text: string): string {
	return `${BOLD}${text}${RESET}`;
}

export function dim(text: string): string {
	return `${DIM}${text}${RESET}`;
}

export function cyan(text: string): string {
	return `${CYAN}${text}${RESET}`;
}

/** URLs */
export function url(text: string): string {
	return `${UNDERLINE}${CYAN}${text}${RESET}`;
}

/** Commands and file paths */
export function cmd(text: string): string {
	return `${YELLOW}${text}${RESET}`;
}

/** Domain names */
export function host(text: string): string {
	return `${GREEN}${BOLD}${text}${RESET}`;
}

// ─── Output functions ──────────────────────────────────────────────────────

export function blank(): void {
	console.log("");
}

/** Print the welcome banner. */
export function banner(): void {
	blank();
	print(`${BOLD}${CYAN}  ╔═══════════════════════════════════════╗${RESET}`);
	print(`${BOLD}${CYAN}  ║${RESET}${BOLD}${WHITE}   🔐  Keycloak Deploy ${DIM}(kcdeploy)${RESET}${BOLD}${CYAN}     ║${RESET}`);
	print(`${BOLD}${CYAN}  ╚═══════════════════════════════════════╝${RESET}`);
	print(`${DIM}  Keycloak, PostgreSQL, TLS and monitoring on one host${RESET}`);
	blank();
}

/** Print a numbered step header. */
export function stepHeader(step: number, total: number, title: string): void {
	blank();
	print(`${BOLD}${CYAN}  ━━━ ${WHITE}Step ${YELLOW}${step}${WHITE}/${DIM}${total}${RESET}${BOLD}${WHITE} — ${CYAN}${title} ${CYAN}━━━${RESET}`);
	blank();
}

export function success(msg: string): void {
	print(`  ${GREEN}✔${RESET} ${msg}`);
}

export function skip(msg: string): void {
	print(`  ${DIM}⊘ ${msg}${RESET}`);
}

export function info(msg: string): void {
	print(`  ${CYAN}ℹ${RESET} ${msg}`);
}

export function warn(msg: string): void {
	print(`  ${YELLOW}⚠${RESET} ${YELLOW}${msg}${RESET}`, "warn");
}

export function error(msg: string): void {
	print(`  ${RED}✖${RESET} ${RED}${msg}${RESET}`, "error");
}

/** Only shown with --verbose; always written to the log. */
export function debug(msg: string): void {
	if (verbose) {
		print(`  ${DIM}· ${msg}${RESET}`, "debug");
	} else {
		sink?.debug(stripAnsi(msg));
	}
}

/** Print a key=value pair for summaries. */
export function keyValue(key: string, value: string): void {
	print(`  ${DIM}${key}:${RESET} ${BOLD}${WHITE}${value}${RESET}`);
}

/** Print a table of rows (status output). */
export function table(headers: string[], rows: string[][]): void {
	const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

	const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
	const formatHeader = (row: string[]) => row.map((cell, i) => ` ${BOLD}${CYAN}${(cell ?? "").padEnd(widths[i] ?? 0)}${RESET} `).join(`${DIM}│${RESET}`);
	const formatRow = (row: string[]) => row.map((cell, i) => ` ${(cell ?? "").padEnd(widths[i] ?? 0)} `).join(`${DIM}│${RESET}`);

	print(`  ${DIM}${sep}${RESET}`);
	print(`  ${formatHeader(headers)}`);
	print(`  ${DIM}${sep}${RESET}`);
	for (const row of rows) {
		print(`  ${formatRow(row)}`);
	}
	print(`  ${DIM}${sep}${RESET}`);
}

/** Print a completion summary box. */
export function summaryBox(title: string, tone: "ok" | "fail" = "ok"): void {
	const COLOR = tone === "ok" ? GREEN : RED;
	const mark = tone === "ok" ? "✔" : "✖";
	blank();
	print(`${BOLD}${COLOR}  ╔═══════════════════════════════════════╗${RESET}`);
	print(`${BOLD}${COLOR}  ║${RESET}${BOLD}${WHITE}  ${mark} ${title.padEnd(35)}${BOLD}${COLOR}║${RESET}`);
	print(`${BOLD}${COLOR}  ╚═══════════════════════════════════════╝${RESET}`);
	blank();
}
