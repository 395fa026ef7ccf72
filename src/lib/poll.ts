import { setTimeout as sleep } from "node:timers/promises";
import * as ui from "./ui.js";

export interface PollOptions {
	intervalMs: number;
	maxAttempts: number;
	/** Shown in debug output for each failed attempt. */
	label?: string;
}

/**
 * Call `predicate` until it returns true, at most `maxAttempts` times with
 * `intervalMs` between attempts. Returns false when attempts run out.
 */
export async function pollUntil(predicate: () => Promise<boolean>, options: PollOptions): Promise<boolean> {
	for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
		if (await predicate()) return true;
		if (options.label) ui.debug(`${options.label}: attempt ${attempt}/${options.maxAttempts} not ready`);
		if (attempt < options.maxAttempts) await sleep(options.intervalMs);
	}
	return false;
}
