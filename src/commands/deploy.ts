import { join } from "node:path";
import { acquireLock } from "../lib/lock.js";
import { Orchestrator } from "../lib/orchestrator.js";
import { syncRepository } from "../lib/repository.js";
import { writeInstallationSummary } from "../lib/summary.js";
import * as ui from "../lib/ui.js";
import { MANAGED_CONTAINERS, STEPS, stepsFor } from "../pipeline.js";
import type { ResolvedEnvironment } from "../types.js";
import type { Runtime } from "./runtime.js";

export interface DeployArgs {
	command: "deploy" | "setup";
	reset: boolean;
	domain?: string;
	email?: string;
	clone: boolean;
	update: boolean;
}

/** File name of the rendered summary inside the install directory. */
export const SUMMARY_FILE = "installation_summary.md";

/**
 * `kcdeploy [deploy|setup]`: run the pipeline, or tear everything down with --reset.
 * Returns the process exit code.
 */
export async function runDeploy(args: DeployArgs, runtime: Runtime): Promise<number> {
	const { config, resolver, progress, logger } = runtime;
	const lock = acquireLock(config.lockFile);

	try {
		const summaryPath = join(config.installDir, SUMMARY_FILE);
		const orchestrator = new Orchestrator({
			progress,
			resolver,
			logger,
			summary:
				args.command === "deploy"
					? async (env: ResolvedEnvironment) => {
							await writeInstallationSummary(env, {
								templatePath: join(config.templatesDir, "installation_summary.md"),
								outputPath: summaryPath,
								settingsFile: config.settingsFile,
								containers: MANAGED_CONTAINERS,
							});
							return summaryPath;
						}
					: undefined,
		});

		if (args.reset) {
			await orchestrator.reset(STEPS, { paths: [config.installDir, config.settingsFile] });
			return 0;
		}

		await syncRepository({ repoUrl: config.repoUrl, dir: config.installDir, clone: args.clone, update: args.update });

		// Command-line values count as answered and are saved for later runs
		resolver.seed({ KEYCLOAK_DOMAIN: args.domain, SSL_DOMAINS: args.domain, SSL_EMAIL: args.email });

		const result = await orchestrator.run(stepsFor(args.command));
		if (!result.ok) {
			ui.summaryBox(`Failed at ${result.failure?.step ?? "unknown step"}`, "fail");
			ui.info(`Fix the problem and run ${ui.cmd("kcdeploy")} again; completed steps are skipped.`);
			ui.info(`Details in ${ui.cmd(logger.filePath)}`);
			return 1;
		}

		const done = result.outcomes.filter((o) => o.status === "completed").length;
		const skipped = result.outcomes.length - done;
		ui.summaryBox(args.command === "setup" ? "Host Prepared" : "Installation Complete");
		ui.keyValue("Steps", `${done} run, ${skipped} already done`);
		if (result.environment.KEYCLOAK_DOMAIN) ui.keyValue("Admin console", ui.url(`https://${result.environment.KEYCLOAK_DOMAIN}/admin/`));
		if (result.environment.KEYCLOAK_ADMIN) ui.keyValue("Admin user", result.environment.KEYCLOAK_ADMIN);
		ui.keyValue("Settings", config.settingsFile);
		if (result.summaryPath) ui.keyValue("Summary", result.summaryPath);
		ui.blank();
		return 0;
	} finally {
		lock.release();
	}
}
