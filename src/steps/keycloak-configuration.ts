import { join } from "node:path";
import { templatesDir } from "../lib/config.js";
import { generatePassword } from "../lib/crypto.js";
import { containerState } from "../lib/docker.js";
import { containerAdmin, login } from "../lib/kcadm.js";
import { applyDocuments } from "../lib/keycloak-config.js";
import * as ui from "../lib/ui.js";
import type { ResolvedEnvironment, VariableSpec } from "../types.js";
import { KEYCLOAK_CONTAINER } from "./keycloak-deployment.js";

export const variables: VariableSpec[] = [
	{ name: "KEYCLOAK_REALM", prompt: "Realm name", default: "keycloak" },
	{ name: "KEYCLOAK_REALM_DISPLAY_NAME", prompt: "Realm display name", default: "Keycloak" },
	{ name: "KEYCLOAK_DOMAIN", prompt: "Public domain for Keycloak (e.g. auth.example.com)" },
	{ name: "KEYCLOAK_ADMIN", prompt: "Keycloak admin username", default: "admin" },
	{ name: "KEYCLOAK_ADMIN_PASSWORD", prompt: "Keycloak admin password", secret: true },
	{ name: "KEYCLOAK_CONFIG_DIR", prompt: "Directory with realm configuration documents", default: join(templatesDir(), "keycloak") },
	{ name: "CLIENT_ID", prompt: "OIDC client id for your application", default: "web-app" },
	{ name: "CLIENT_NAME", prompt: "OIDC client display name", default: "Web application" },
	{ name: "CLIENT_SECRET", prompt: "OIDC client secret", secret: true, generate: () => generatePassword(32) },
	{ name: "SMTP_HOST", prompt: "SMTP host (empty to skip mail settings)", default: "" },
	{ name: "SMTP_PORT", prompt: "SMTP port", default: "587" },
	{ name: "SMTP_FROM", prompt: "Sender address for Keycloak mail", default: "" },
	{ name: "SMTP_USER", prompt: "SMTP username", default: "" },
	{ name: "SMTP_PASSWORD", prompt: "SMTP password", secret: true, default: "" },
];

export async function checkDependencies(): Promise<boolean> {
	return (await containerState(KEYCLOAK_CONTAINER))?.status === "running";
}

export async function installDependencies(): Promise<boolean> {
	ui.error(`Container ${ui.bold(KEYCLOAK_CONTAINER)} is not running; deploy Keycloak first`);
	return false;
}

/**
 * Step 5 — Realm configuration through kcadm.sh inside the Keycloak container.
 *
 * Documents under KEYCLOAK_CONFIG_DIR are applied required-first; see
 * CONFIG_DOCUMENTS for the order and dependencies.
 */
export async function execute(env: ResolvedEnvironment): Promise<boolean> {
	const admin = containerAdmin(KEYCLOAK_CONTAINER);
	await login(admin, { server: "http://localhost:8080", user: env.KEYCLOAK_ADMIN, password: env.KEYCLOAK_ADMIN_PASSWORD });
	ui.success("Authenticated with the Keycloak admin CLI");

	const reports = await applyDocuments({ dir: env.KEYCLOAK_CONFIG_DIR, values: env, admin, realm: env.KEYCLOAK_REALM });
	const applied = reports.filter((r) => r.status === "applied").length;
	ui.success(`Realm ${ui.bold(env.KEYCLOAK_REALM)} configured (${applied}/${reports.length} documents applied)`);
	return true;
}

export async function cleanup(_env: ResolvedEnvironment): Promise<void> {
	// Realm state lives in the database volume; removing containers and volumes undoes it
	ui.skip("Realm configuration is removed with the database");
}
