import { type AppConfig, loadConfig } from "../lib/config.js";
import { createRunLogger, type RunLogger } from "../lib/logger.js";
import { ProgressState } from "../lib/progress.js";
import { VariableResolver } from "../lib/resolver.js";
import * as ui from "../lib/ui.js";

/** Everything a command needs, built once per invocation. */
export interface Runtime {
	config: AppConfig;
	logger: RunLogger;
	resolver: VariableResolver;
	progress: ProgressState;
	interactive: boolean;
}

export function createRuntime(options: { interactive: boolean; verbose: boolean; env?: NodeJS.ProcessEnv }): Runtime {
	const env = options.env ?? process.env;
	const config = loadConfig(env);
	const logger = createRunLogger(config.logFile);
	ui.attachLog(logger);
	ui.setVerbose(options.verbose);
	logger.info({ argv: process.argv.slice(2), pid: process.pid }, "kcdeploy started");

	return {
		config,
		logger,
		resolver: new VariableResolver({ settingsFile: config.settingsFile, interactive: options.interactive, env }),
		progress: new ProgressState(config.stateFile),
		interactive: options.interactive,
	};
}
