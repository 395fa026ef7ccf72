#!/usr/bin/env node

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { runBackup } from "./commands/backup.js";
import { runDeploy } from "./commands/deploy.js";
import { runRestore } from "./commands/restore.js";
import { createRuntime } from "./commands/runtime.js";
import { runStatus } from "./commands/status.js";
import { errorMessage, isDeployError, isPromptExit } from "./lib/errors.js";
import * as ui from "./lib/ui.js";

const DOMAIN = /^[a-z0-9.-]+\.[a-z]{2,}$/;
const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

async function main(): Promise<number> {
	const outcome = { code: 0 };

	await yargs(hideBin(process.argv))
		.scriptName("kcdeploy")
		.usage("$0 [command] [options]")
		.option("reset", { type: "boolean", default: false, describe: "Remove containers, volumes, network, install directory and progress, then exit" })
		.option("domain", { type: "string", describe: "Public domain for Keycloak and its certificate" })
		.option("email", { type: "string", describe: "Let's Encrypt account email" })
		.option("clone", { type: "boolean", default: true, describe: "Clone the deployment repository (--no-clone to skip)" })
		.option("update", { type: "boolean", default: false, describe: "Pull the deployment repository before running" })
		.option("verbose", { type: "boolean", default: false, describe: "Show debug output" })
		.option("yes", { alias: "y", type: "boolean", default: false, describe: "Never prompt: use saved values and defaults" })
		.check((argv) => {
			if (argv.domain !== undefined && !DOMAIN.test(argv.domain)) return `Invalid domain: ${argv.domain}`;
			if (argv.email !== undefined && !EMAIL.test(argv.email)) return `Invalid email: ${argv.email}`;
			return true;
		})
		.command(
			["deploy", "$0"],
			"Run the full installation (default)",
			(y) => y,
			async (argv) => {
				ui.banner();
				const runtime = createRuntime({ interactive: !argv.yes, verbose: argv.verbose });
				outcome.code = await runDeploy({ command: "deploy", ...argv }, runtime);
			},
		)
		.command(
			"setup",
			"Prepare the host only: packages, Docker, network and volumes",
			(y) => y,
			async (argv) => {
				ui.banner();
				const runtime = createRuntime({ interactive: !argv.yes, verbose: argv.verbose });
				outcome.code = await runDeploy({ command: "setup", ...argv }, runtime);
			},
		)
		.command(
			"status",
			"Show container status and completed steps",
			(y) => y,
			async (argv) => {
				outcome.code = await runStatus(createRuntime({ interactive: false, verbose: argv.verbose }));
			},
		)
		.command(
			"backup",
			"Dump the Keycloak database now",
			(y) => y,
			async (argv) => {
				outcome.code = await runBackup(createRuntime({ interactive: false, verbose: argv.verbose }));
			},
		)
		.command(
			"restore [file]",
			"Restore the database from a backup",
			(y) => y.positional("file", { type: "string", describe: "Dump file; chosen from the backup directory when omitted" }),
			async (argv) => {
				outcome.code = await runRestore(createRuntime({ interactive: !argv.yes, verbose: argv.verbose }), argv.file);
			},
		)
		.strict()
		.fail(false)
		.help()
		.parseAsync();

	return outcome.code;
}

// Run
main()
	.then((code) => {
		process.exitCode = code;
	})
	.catch((err: unknown) => {
		if (isPromptExit(err)) {
			// User pressed Ctrl+C
			console.log("\n");
			ui.info("Cancelled. Completed steps are kept; run kcdeploy again to continue.");
			process.exitCode = 130;
			return;
		}
		if (err instanceof Error && err.name === "YError") {
			ui.error(err.message);
			ui.info(`Run ${ui.cmd("kcdeploy --help")} for usage.`);
			process.exitCode = 2;
			return;
		}
		ui.error(isDeployError(err) ? `[${err.kind}] ${err.message}` : errorMessage(err));
		if (isDeployError(err) && err.remediation) ui.info(err.remediation);
		process.exitCode = 1;
	});
