import { join } from "node:path";
import { generatePassword } from "../lib/crypto.js";
import { type ContainerSpec, containerState, engineReady, ensureContainer, imageExists, pullImage, removeContainer, stopContainer } from "../lib/docker.js";
import { DeployError } from "../lib/errors.js";
import { pollUntil } from "../lib/poll.js";
import { commandExists } from "../lib/shell.js";
import * as ui from "../lib/ui.js";
import type { ResolvedEnvironment, VariableSpec } from "../types.js";

export const KEYCLOAK_CONTAINER = "keycloak";
export const POSTGRES_CONTAINER = "keycloak-postgres";

// Keycloak's image ships no curl; probe the management port through bash.
const KEYCLOAK_HEALTH_CMD = "{ printf 'GET /health/ready HTTP/1.0\\r\\n\\r\\n' >&3; cat <&3; } 3<>/dev/tcp/localhost/9000 | grep -q UP";

export const variables: VariableSpec[] = [
	{ name: "KEYCLOAK_DOMAIN", prompt: "Public domain for Keycloak (e.g. auth.example.com)" },
	{ name: "KEYCLOAK_IMAGE", prompt: "Keycloak image", default: "quay.io/keycloak/keycloak:26.0" },
	{ name: "POSTGRES_IMAGE", prompt: "PostgreSQL image", default: "postgres:16" },
	{ name: "KEYCLOAK_ADMIN", prompt: "Keycloak admin username", default: "admin" },
	{ name: "KEYCLOAK_ADMIN_PASSWORD", prompt: "Keycloak admin password", secret: true, generate: () => generatePassword() },
	{ name: "DB_NAME", prompt: "Database name", default: "keycloak" },
	{ name: "DB_USER", prompt: "Database user", default: "keycloak" },
	{ name: "DB_PASSWORD", prompt: "Database password", secret: true, generate: () => generatePassword() },
	{ name: "KEYCLOAK_HTTP_PORT", prompt: "Host port for HTTP", default: "8080" },
	{ name: "KEYCLOAK_HTTPS_PORT", prompt: "Host port for HTTPS", default: "8443" },
	{ name: "KEYCLOAK_MEM_LIMIT", prompt: "Keycloak memory limit", default: "2g" },
	{ name: "POSTGRES_MEM_LIMIT", prompt: "PostgreSQL memory limit", default: "1g" },
	{ name: "DOCKER_NETWORK", prompt: "Docker network name", default: "keycloak-network" },
	{ name: "INSTALL_ROOT", prompt: "Installation root directory", default: "/opt/keycloak" },
];

export function postgresContainer(env: ResolvedEnvironment): ContainerSpec {
	return {
		name: POSTGRES_CONTAINER,
		image: env.POSTGRES_IMAGE,
		network: env.DOCKER_NETWORK,
		env: { POSTGRES_DB: env.DB_NAME, POSTGRES_USER: env.DB_USER, POSTGRES_PASSWORD: env.DB_PASSWORD },
		volumes: ["postgres-data:/var/lib/postgresql/data"],
		memory: env.POSTGRES_MEM_LIMIT,
		cpus: "1",
		healthCmd: `pg_isready -U ${env.DB_USER} -d ${env.DB_NAME}`,
		healthInterval: "10s",
		healthRetries: 5,
	};
}

export function keycloakContainer(env: ResolvedEnvironment): ContainerSpec {
	return {
		name: KEYCLOAK_CONTAINER,
		image: env.KEYCLOAK_IMAGE,
		network: env.DOCKER_NETWORK,
		env: {
			KC_DB: "postgres",
			KC_DB_URL: `jdbc:postgresql://${POSTGRES_CONTAINER}:5432/${env.DB_NAME}`,
			KC_DB_USERNAME: env.DB_USER,
			KC_DB_PASSWORD: env.DB_PASSWORD,
			KC_HOSTNAME: `https://${env.KEYCLOAK_DOMAIN}`,
			KC_HTTP_ENABLED: "true",
			KC_HEALTH_ENABLED: "true",
			KC_METRICS_ENABLED: "true",
			KC_PROXY_HEADERS: "xforwarded",
			KC_HTTPS_CERTIFICATE_FILE: "/opt/keycloak/conf/certs/tls.crt",
			KC_HTTPS_CERTIFICATE_KEY_FILE: "/opt/keycloak/conf/certs/tls.key",
			KC_BOOTSTRAP_ADMIN_USERNAME: env.KEYCLOAK_ADMIN,
			KC_BOOTSTRAP_ADMIN_PASSWORD: env.KEYCLOAK_ADMIN_PASSWORD,
		},
		ports: [`${env.KEYCLOAK_HTTP_PORT}:8080`, `${env.KEYCLOAK_HTTPS_PORT}:8443`],
		volumes: [`${join(env.INSTALL_ROOT, "certs")}:/opt/keycloak/conf/certs:ro`, "keycloak-data:/opt/keycloak/data"],
		memory: env.KEYCLOAK_MEM_LIMIT,
		cpus: "2",
		healthCmd: KEYCLOAK_HEALTH_CMD,
		healthInterval: "15s",
		healthRetries: 5,
		healthStartPeriod: "60s",
		command: ["start"],
	};
}

async function healthy(name: string): Promise<boolean> {
	return (await containerState(name))?.health === "healthy";
}

export async function checkDependencies(): Promise<boolean> {
	return (await commandExists("docker")) && (await engineReady());
}

export async function installDependencies(): Promise<boolean> {
	throw new DeployError("ExternalToolUnavailable", "Docker is not available", {
		remediation: "Run the docker_setup step first (kcdeploy setup)",
	});
}

/**
 * Step 4 — Keycloak: PostgreSQL then Keycloak containers, each waited on until healthy.
 */
export async function execute(env: ResolvedEnvironment): Promise<boolean> {
	for (const image of [env.POSTGRES_IMAGE, env.KEYCLOAK_IMAGE]) {
		if (await imageExists(image)) continue;
		ui.info(`Pulling ${ui.bold(image)}...`);
		await pullImage(image);
	}

	const db = await ensureContainer(postgresContainer(env));
	ui.success(`PostgreSQL container ${db}`);

	ui.info("Waiting for PostgreSQL to become healthy...");
	if (!(await pollUntil(() => healthy(POSTGRES_CONTAINER), { intervalMs: 2_000, maxAttempts: 30, label: POSTGRES_CONTAINER }))) {
		ui.error("PostgreSQL did not become healthy");
		return false;
	}

	const kc = await ensureContainer(keycloakContainer(env));
	ui.success(`Keycloak container ${kc}`);

	ui.info("Waiting for Keycloak to become healthy (this can take a few minutes)...");
	const ready = await pollUntil(async () => (await healthy(POSTGRES_CONTAINER)) && (await healthy(KEYCLOAK_CONTAINER)), {
		intervalMs: 5_000,
		maxAttempts: 60,
		label: KEYCLOAK_CONTAINER,
	});
	if (!ready) {
		ui.error("Keycloak did not become healthy");
		return false;
	}

	ui.success(`Keycloak is up at ${ui.url(`https://${env.KEYCLOAK_DOMAIN}`)}`);
	return true;
}

/** Stops and removes both containers. Volumes are kept. */
export async function cleanup(_env: ResolvedEnvironment): Promise<void> {
	for (const name of [KEYCLOAK_CONTAINER, POSTGRES_CONTAINER]) {
		const state = await containerState(name);
		if (!state) continue;
		if (state.status === "running") await stopContainer(name, 10);
		await removeContainer(name);
		ui.success(`Container ${ui.bold(name)} removed`);
	}
}
