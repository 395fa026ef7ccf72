import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { DeployError } from "./errors.js";

/** Bundled templates: <package root>/templates, both from src/lib and dist/lib. */
export const BUNDLED_TEMPLATES_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "..", "..", "templates");

/** Template root, overridable with KCDEPLOY_TEMPLATES_DIR. */
export function templatesDir(env: NodeJS.ProcessEnv = process.env): string {
	return nonEmpty(env.KCDEPLOY_TEMPLATES_DIR) ?? BUNDLED_TEMPLATES_DIR;
}

const AppConfigSchema = z.object({
	installDir: z.string().min(1),
	settingsFile: z.string().min(1),
	stateFile: z.string().min(1),
	logFile: z.string().min(1),
	lockFile: z.string().min(1),
	templatesDir: z.string().min(1),
	repoUrl: z.string().url().optional(),
});

/** Where the tool keeps its own files. Steps get their paths through variables instead. */
export type AppConfig = z.infer<typeof AppConfigSchema>;

function nonEmpty(value: string | undefined): string | undefined {
	return value && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * Build the tool configuration from KCDEPLOY_* environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const installDir = nonEmpty(env.KCDEPLOY_INSTALL_DIR) ?? "/opt/keycloak-deploy";
	const stateFile = nonEmpty(env.KCDEPLOY_STATE_FILE) ?? "/opt/.keycloak-deploy-state";

	const parsed = AppConfigSchema.safeParse({
		installDir,
		settingsFile: nonEmpty(env.KCDEPLOY_SETTINGS_FILE) ?? join(installDir, ".env"),
		stateFile,
		logFile: nonEmpty(env.KCDEPLOY_LOG_FILE) ?? "/var/log/keycloak-deploy.log",
		lockFile: nonEmpty(env.KCDEPLOY_LOCK_FILE) ?? join(dirname(stateFile), ".keycloak-deploy.lock"),
		templatesDir: templatesDir(env),
		repoUrl: nonEmpty(env.KCDEPLOY_REPO_URL),
	});

	if (!parsed.success) {
		const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
		throw new DeployError("ValidationFailed", `Invalid KCDEPLOY_* configuration: ${details}`);
	}
	return parsed.data;
}
