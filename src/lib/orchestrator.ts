import { rmSync } from "node:fs";
import type { ResolvedEnvironment, Step } from "../types.js";
import { DeployError, errorMessage, isDeployError, isPromptExit } from "./errors.js";
import type { RunLogger } from "./logger.js";
import type { ProgressState } from "./progress.js";
import type { VariableResolver } from "./resolver.js";
import * as ui from "./ui.js";

export type StepOutcome =
	| { id: string; status: "skipped" | "completed" }
	| { id: string; status: "failed"; error: DeployError; cleanedUp: boolean };

export interface RunResult {
	ok: boolean;
	outcomes: StepOutcome[];
	/** The step that stopped the run. */
	failure?: { step: string; error: DeployError };
	/** Every variable known at the end of the run. */
	environment: Record<string, string>;
	summaryPath?: string;
}

export interface OrchestratorOptions {
	progress: ProgressState;
	resolver: VariableResolver;
	logger?: RunLogger;
	/** Renders the installation summary after a fully successful run; returns where it was written. */
	summary?: (environment: ResolvedEnvironment) => Promise<string>;
}

export interface ResetOptions {
	/** Files and directories deleted after every cleanup ran. */
	paths: string[];
}

/**
 * Runs steps strictly in order, skipping ids recorded in the progress file and
 * stopping at the first failure.
 */
export class Orchestrator {
	constructor(private readonly options: OrchestratorOptions) {}

	async run(steps: Step[]): Promise<RunResult> {
		const { progress, resolver } = this.options;
		progress.load();

		const outcomes: StepOutcome[] = [];
		for (const [index, step] of steps.entries()) {
			const outcome = await this.runStep(step, index + 1, steps.length);
			outcomes.push(outcome);

			if (outcome.status === "failed") {
				ui.error(`Step ${ui.bold(step.label)} failed ${ui.dim(`[${outcome.error.kind}]`)}: ${outcome.error.message}`);
				if (outcome.error.remediation) ui.info(outcome.error.remediation);
				return {
					ok: false,
					outcomes,
					failure: { step: step.id, error: outcome.error },
					environment: resolver.snapshot(),
				};
			}
		}

		const environment = this.collectEnvironment(steps);
		const result: RunResult = { ok: true, outcomes, environment };

		if (this.options.summary) {
			try {
				result.summaryPath = await this.options.summary(Object.freeze({ ...environment }));
			} catch (err) {
				if (isPromptExit(err)) throw err;
				ui.warn(`Installation summary not written: ${errorMessage(err)}`);
			}
		}
		return result;
	}

	async runStep(step: Step, position: number, total: number): Promise<StepOutcome> {
		const { progress, resolver } = this.options;

		if (progress.isDone(step.id)) {
			ui.skip(`${step.label} (already done)`);
			return { id: step.id, status: "skipped" };
		}

		ui.stepHeader(position, total, step.label);
		ui.debug(step.description);

		try {
			const satisfied = (await step.checkDependencies()) || (await step.installDependencies());
			if (!satisfied) {
				return this.fail(step, new DeployError("DependencyInstallFailed", `Dependencies for ${step.id} could not be installed`), resolver.peekAll(step.variables));
			}
		} catch (err) {
			if (isPromptExit(err)) throw err;
			const error =
				isDeployError(err) && err.kind === "ExternalToolUnavailable"
					? err
					: new DeployError("DependencyInstallFailed", `Dependencies for ${step.id} could not be installed: ${errorMessage(err)}`, { cause: err });
			return this.fail(step, error, resolver.peekAll(step.variables));
		}

		let env: ResolvedEnvironment;
		try {
			env = await resolver.resolveAll(step.variables);
		} catch (err) {
			if (isPromptExit(err) || !isDeployError(err)) throw err;
			// Nothing was executed yet: no cleanup
			return this.fail(step, err, null);
		}

		let ok: boolean;
		let cause: unknown;
		try {
			ok = await step.execute(env);
		} catch (err) {
			if (isPromptExit(err)) throw err;
			ok = false;
			cause = err;
		}

		if (!ok) {
			const message = cause === undefined ? `${step.id} did not complete` : errorMessage(cause);
			const error = isDeployError(cause) ? cause : new DeployError("ExecutionFailed", message, { cause });
			return this.fail(step, error, env);
		}

		progress.markDone(step.id);
		ui.success(`${step.label} complete`);
		return { id: step.id, status: "completed" };
	}

	/**
	 * Unconditional teardown: every cleanup in reverse order, then the given
	 * paths and the progress file. Never executes a step.
	 */
	async reset(steps: Step[], options: ResetOptions): Promise<void> {
		const { progress, resolver } = this.options;
		ui.warn("Resetting installation: containers, volumes, network and install directory will be removed");

		for (const step of [...steps].reverse()) {
			try {
				await step.cleanup(resolver.peekAll(step.variables), "teardown");
				ui.success(`${step.label} cleaned up`);
			} catch (err) {
				if (isPromptExit(err)) throw err;
				ui.warn(`${step.label} cleanup failed: ${errorMessage(err)}`);
			}
		}

		for (const path of options.paths) {
			rmSync(path, { recursive: true, force: true });
			ui.debug(`removed ${path}`);
		}
		progress.reset();
		ui.success("Installation reset");
	}

	private async fail(step: Step, error: DeployError, env: ResolvedEnvironment | null): Promise<StepOutcome> {
		this.writeErrorDetails(step, error);

		let cleanedUp = false;
		if (env && step.canCleanup) {
			ui.info(`Cleaning up ${step.label}...`);
			try {
				await step.cleanup(env, "rollback");
				cleanedUp = true;
			} catch (err) {
				if (isPromptExit(err)) throw err;
				ui.warn(`Cleanup of ${step.label} failed: ${errorMessage(err)}`);
			}
		}
		return { id: step.id, status: "failed", error, cleanedUp };
	}

	private writeErrorDetails(step: Step, error: DeployError): void {
		const lines = ["=== Error Details ===", `Timestamp: ${new Date().toISOString()}`, `Step: ${step.id}`, `Kind: ${error.kind}`, `Error Message: ${error.message}`];
		if (error.remediation) lines.push(`Remediation: ${error.remediation}`);
		if (error.cause instanceof Error && error.cause.stack) lines.push(`Cause: ${error.cause.stack}`);
		lines.push("=====================");
		this.options.logger?.block(lines);
	}

	/** Persisted values of every step (skipped ones included) overlaid with this run's. */
	private collectEnvironment(steps: Step[]): Record<string, string> {
		const merged: Record<string, string> = {};
		for (const step of steps) Object.assign(merged, this.options.resolver.peekAll(step.variables));
		return { ...merged, ...this.options.resolver.snapshot() };
	}
}
