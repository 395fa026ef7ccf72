import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

/**
 * Completed step ids, one per line. A listed id means the step's execute
 * succeeded at least once since the last reset.
 */
export class ProgressState {
	private done = new Set<string>();

	constructor(readonly filePath: string) {}

	load(): Set<string> {
		this.done = new Set();
		if (existsSync(this.filePath)) {
			for (const line of readFileSync(this.filePath, "utf-8").split("\n")) {
				const id = line.trim();
				if (id) this.done.add(id);
			}
		}
		return new Set(this.done);
	}

	isDone(id: string): boolean {
		return this.done.has(id);
	}

	markDone(id: string): void {
		this.done.add(id);
		mkdirSync(dirname(this.filePath), { recursive: true });
		writeFileSync(this.filePath, `${[...this.done].join("\n")}\n`, "utf-8");
	}

	reset(): void {
		rmSync(this.filePath, { force: true });
		this.done.clear();
	}

	completed(): string[] {
		return [...this.done];
	}
}
