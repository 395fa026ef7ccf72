import { existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { createBackup, latestBackup, restoreBackup } from "../lib/backups.js";
import { templatesDir } from "../lib/config.js";
import { generatePassword } from "../lib/crypto.js";
import { type ContainerSpec, containerState, engineReady, ensureContainer, imageExists, pullImage, removeContainer } from "../lib/docker.js";
import { DeployError } from "../lib/errors.js";
import { pollUntil } from "../lib/poll.js";
import { commandExists } from "../lib/shell.js";
import { renderTemplate } from "../lib/template.js";
import * as ui from "../lib/ui.js";
import { intValue } from "../lib/values.js";
import type { CleanupMode, ResolvedEnvironment, VariableSpec } from "../types.js";

export const PROMETHEUS_CONTAINER = "keycloak-prometheus";
export const GRAFANA_CONTAINER = "keycloak-grafana";

export const variables: VariableSpec[] = [
	{ name: "PROMETHEUS_IMAGE", prompt: "Prometheus image", default: "prom/prometheus:v2.54.1" },
	{ name: "GRAFANA_IMAGE", prompt: "Grafana image", default: "grafana/grafana:11.2.0" },
	{ name: "PROMETHEUS_SCRAPE_INTERVAL", prompt: "Prometheus scrape interval", default: "15s" },
	{ name: "PROMETHEUS_EVAL_INTERVAL", prompt: "Prometheus rule evaluation interval", default: "15s" },
	{ name: "PROMETHEUS_RETENTION_TIME", prompt: "Prometheus data retention", default: "15d" },
	{ name: "MONITORING_DIR", prompt: "Monitoring configuration directory", default: "/opt/keycloak/monitoring" },
	{ name: "MONITORING_BACKUP_DIR", prompt: "Monitoring configuration backups", default: "/opt/keycloak/backups/monitoring" },
	{ name: "MONITORING_MAX_BACKUPS", prompt: "Monitoring configuration backups to keep", default: "5" },
	{ name: "GRAFANA_PORT", prompt: "Host port for Grafana", default: "3000" },
	{ name: "GRAFANA_ADMIN_USER", prompt: "Grafana admin username", default: "admin" },
	{ name: "GRAFANA_ADMIN_PASSWORD", prompt: "Grafana admin password", secret: true, generate: () => generatePassword() },
	{ name: "GRAFANA_ALERT_EMAIL", prompt: "Alert email recipient (empty for none)", default: "" },
	{ name: "GRAFANA_SLACK_WEBHOOK_URL", prompt: "Slack webhook for alerts (empty for none)", default: "" },
	{ name: "GRAFANA_SLACK_CHANNEL", prompt: "Slack channel for alerts", default: "#alerts" },
	{ name: "SMTP_HOST", prompt: "SMTP host (empty to skip mail settings)", default: "" },
	{ name: "SMTP_PORT", prompt: "SMTP port", default: "587" },
	{ name: "SMTP_FROM", prompt: "Sender address for Keycloak mail", default: "" },
	{ name: "SMTP_USER", prompt: "SMTP username", default: "" },
	{ name: "SMTP_PASSWORD", prompt: "SMTP password", secret: true, default: "" },
	{ name: "DOCKER_NETWORK", prompt: "Docker network name", default: "keycloak-network" },
];

/**
 * Render Prometheus and Grafana configuration into `targetDir`. Contact points
 * are only written for the channels that are configured.
 */
export function renderMonitoringConfig(sourceDir: string, targetDir: string, env: ResolvedEnvironment): string[] {
	const files = [
		"prometheus/prometheus.yml",
		"prometheus/alerts/keycloak_alerts.yml",
		"prometheus/alerts/system_alerts.yml",
		"grafana/provisioning/datasources/prometheus.yml",
	];
	if (env.GRAFANA_ALERT_EMAIL) files.push("grafana/provisioning/alerting/contact-points-email.yml");
	if (env.GRAFANA_SLACK_WEBHOOK_URL) files.push("grafana/provisioning/alerting/contact-points-slack.yml");

	// Contact points removed from the settings must not linger from a previous render
	rmSync(join(targetDir, "grafana/provisioning/alerting"), { recursive: true, force: true });

	for (const file of files) {
		renderTemplate(join(sourceDir, file), join(targetDir, file), env);
	}
	return files;
}

export function prometheusContainer(env: ResolvedEnvironment): ContainerSpec {
	return {
		name: PROMETHEUS_CONTAINER,
		image: env.PROMETHEUS_IMAGE,
		network: env.DOCKER_NETWORK,
		volumes: [`${join(env.MONITORING_DIR, "prometheus")}:/etc/prometheus:ro`, "prometheus-data:/prometheus"],
		ports: ["127.0.0.1:9090:9090"],
		memory: "512m",
		command: ["--config.file=/etc/prometheus/prometheus.yml", "--storage.tsdb.path=/prometheus", `--storage.tsdb.retention.time=${env.PROMETHEUS_RETENTION_TIME}`],
	};
}

export function grafanaContainer(env: ResolvedEnvironment): ContainerSpec {
	const smtp: Record<string, string> = env.SMTP_HOST
		? {
				GF_SMTP_ENABLED: "true",
				GF_SMTP_HOST: `${env.SMTP_HOST}:${env.SMTP_PORT}`,
				GF_SMTP_USER: env.SMTP_USER,
				GF_SMTP_PASSWORD: env.SMTP_PASSWORD,
				GF_SMTP_FROM_ADDRESS: env.SMTP_FROM,
			}
		: {};
	return {
		name: GRAFANA_CONTAINER,
		image: env.GRAFANA_IMAGE,
		network: env.DOCKER_NETWORK,
		env: { GF_SECURITY_ADMIN_USER: env.GRAFANA_ADMIN_USER, GF_SECURITY_ADMIN_PASSWORD: env.GRAFANA_ADMIN_PASSWORD, GF_USERS_ALLOW_SIGN_UP: "false", ...smtp },
		volumes: [`${join(env.MONITORING_DIR, "grafana", "provisioning")}:/etc/grafana/provisioning:ro`, "grafana-data:/var/lib/grafana"],
		ports: [`${env.GRAFANA_PORT}:3000`],
		memory: "512m",
	};
}

async function running(name: string): Promise<boolean> {
	return (await containerState(name))?.status === "running";
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
 * Step 6 — Monitoring: Prometheus scraping Keycloak, Grafana with alert contact points.
 *
 * The previous configuration is backed up first; a rollback restores it.
 */
export async function execute(env: ResolvedEnvironment): Promise<boolean> {
	const targetDir = env.MONITORING_DIR;
	const backup = createBackup({
		root: env.MONITORING_BACKUP_DIR,
		sources: [{ path: join(targetDir, "prometheus") }, { path: join(targetDir, "grafana") }],
		maxBackups: intValue(env, "MONITORING_MAX_BACKUPS"),
		info: [`Created: ${new Date().toISOString()}`],
	});
	if (backup) ui.success(`Previous monitoring configuration backed up to ${ui.cmd(backup)}`);

	const files = renderMonitoringConfig(join(templatesDir(), "monitoring"), targetDir, env);
	ui.success(`Rendered ${files.length} configuration files into ${ui.cmd(targetDir)}`);
	if (!env.GRAFANA_ALERT_EMAIL && !env.GRAFANA_SLACK_WEBHOOK_URL) {
		ui.warn("No alert contact configured; alerts are only visible in Grafana");
	}

	for (const spec of [prometheusContainer(env), grafanaContainer(env)]) {
		if (!(await imageExists(spec.image))) {
			ui.info(`Pulling ${ui.bold(spec.image)}...`);
			await pullImage(spec.image);
		}
		// Recreate so the container picks up new settings
		if (await containerState(spec.name)) await removeContainer(spec.name);
		await ensureContainer(spec);
	}

	const up = await pollUntil(async () => (await running(PROMETHEUS_CONTAINER)) && (await running(GRAFANA_CONTAINER)), {
		intervalMs: 3_000,
		maxAttempts: 20,
		label: "monitoring containers",
	});
	if (!up) {
		ui.error("Monitoring containers did not stay running");
		return false;
	}
	ui.success(`Grafana on port ${ui.bold(env.GRAFANA_PORT)}, Prometheus on ${ui.bold("127.0.0.1:9090")}`);
	return true;
}

/** Removes the containers; a rollback also puts the last configuration backup back. */
export async function cleanup(env: ResolvedEnvironment, mode: CleanupMode): Promise<void> {
	for (const name of [GRAFANA_CONTAINER, PROMETHEUS_CONTAINER]) {
		if (await containerState(name)) {
			await removeContainer(name);
			ui.success(`Container ${ui.bold(name)} removed`);
		}
	}

	if (mode === "teardown" || !env.MONITORING_BACKUP_DIR || !env.MONITORING_DIR) return;
	const latest = latestBackup(env.MONITORING_BACKUP_DIR);
	if (latest && existsSync(latest)) {
		restoreBackup(latest, env.MONITORING_DIR);
		ui.success(`Monitoring configuration restored from ${ui.cmd(latest)}`);
	}
}
