/** Identifiers persisted in the progress file. Never rename one: completed installs would rerun it. */
export type StepId =
	| "system_preparation"
	| "docker_setup"
	| "certificate_management"
	| "keycloak_deployment"
	| "keycloak_configuration"
	| "monitoring_setup"
	| "database_backup";

/** One named input a step needs. */
export interface VariableSpec {
	/** Global key; shared by every step that declares it. */
	name: string;
	prompt: string;
	/** Absent means required: non-interactive runs fail without a value. */
	default?: string;
	/** Masked prompt, default not echoed. */
	secret?: boolean;
	/** Fallback default produced on demand (passwords). */
	generate?: () => string;
}

/** Variables of one step invocation, keyed by name. */
export type ResolvedEnvironment = Readonly<Record<string, string>>;

/**
 * Why cleanup runs: `rollback` after this step's own execute failed, `teardown`
 * during reset, which removes everything the step manages.
 */
export type CleanupMode = "rollback" | "teardown";

/** A unit of deployment work. */
export interface Step {
	id: string;
	label: string;
	description: string;
	/** Whether cleanup runs when the step fails. */
	canCleanup: boolean;
	variables: VariableSpec[];
	/** Read-only probe of tools/packages/images the step needs. */
	checkDependencies: () => Promise<boolean>;
	/** Only called when the check failed. */
	installDependencies: () => Promise<boolean>;
	/** False or a throw means the step failed. */
	execute: (env: ResolvedEnvironment) => Promise<boolean>;
	/** Best effort undo; a rollback only touches what execute created. */
	cleanup: (env: ResolvedEnvironment, mode: CleanupMode) => Promise<void>;
}

/** Shape of a step module under src/steps. */
export type StepModule = Pick<Step, "variables" | "checkDependencies" | "installDependencies" | "execute" | "cleanup">;
