/** Failure categories surfaced to the operator and written to the log. */
export type FailureKind =
	| "MissingRequiredVariable"
	| "DependencyInstallFailed"
	| "ExecutionFailed"
	| "ExternalToolUnavailable"
	| "ValidationFailed"
	| "AlreadyRunning";

export class DeployError extends Error {
	readonly kind: FailureKind;
	/** Manual steps the operator can take, printed under the error. */
	readonly remediation?: string;

	constructor(kind: FailureKind, message: string, options?: { cause?: unknown; remediation?: string }) {
		super(message, options?.cause === undefined ? undefined : { cause: options.cause });
		this.name = "DeployError";
		this.kind = kind;
		this.remediation = options?.remediation;
	}
}

export function isDeployError(err: unknown): err is DeployError {
	return err instanceof DeployError;
}

/** Message text of anything thrown. */
export function errorMessage(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}

/** Operator pressed Ctrl+C inside an @inquirer prompt. */
export function isPromptExit(err: unknown): boolean {
	return err instanceof Error && err.name === "ExitPromptError";
}
