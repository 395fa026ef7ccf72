import { containerStatus } from "../lib/docker.js";
import * as ui from "../lib/ui.js";
import { MANAGED_CONTAINERS, STEPS } from "../pipeline.js";
import type { Runtime } from "./runtime.js";

/** `kcdeploy status`: containers and pipeline progress. */
export async function runStatus(runtime: Runtime): Promise<number> {
	const rows: string[][] = [];
	for (const name of MANAGED_CONTAINERS) {
		rows.push([name, (await containerStatus(name)) || "not running"]);
	}
	ui.info(ui.bold("Containers"));
	ui.table(["Container", "Status"], rows);
	ui.blank();

	runtime.progress.load();
	ui.info(ui.bold("Steps"));
	ui.table(
		["Step", "State"],
		STEPS.map((step) => [step.id, runtime.progress.isDone(step.id) ? "done" : "pending"]),
	);
	return 0;
}
