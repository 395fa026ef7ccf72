import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BUNDLED_TEMPLATES_DIR } from "../lib/config.js";
import { grafanaContainer, renderMonitoringConfig } from "../steps/monitoring.js";

const BASE = {
	PROMETHEUS_SCRAPE_INTERVAL: "30s",
	PROMETHEUS_EVAL_INTERVAL: "15s",
	GRAFANA_ALERT_EMAIL: "",
	GRAFANA_SLACK_WEBHOOK_URL: "",
	GRAFANA_SLACK_CHANNEL: "#alerts",
};

describe("monitoring configuration", () => {
	let target: string;
	const source = join(BUNDLED_TEMPLATES_DIR, "monitoring");
	const emailFile = "grafana/provisioning/alerting/contact-points-email.yml";

	beforeEach(() => {
		target = mkdtempSync(join(tmpdir(), "kcdeploy-monitoring-"));
	});

	afterEach(() => {
		rmSync(target, { recursive: true, force: true });
	});

	it("renders Prometheus settings and only the configured contact points", () => {
		const files = renderMonitoringConfig(source, target, { ...BASE, GRAFANA_ALERT_EMAIL: "ops@example.com" });

		expect(files).toEqual([
			"prometheus/prometheus.yml",
			"prometheus/alerts/keycloak_alerts.yml",
			"prometheus/alerts/system_alerts.yml",
			"grafana/provisioning/datasources/prometheus.yml",
			emailFile,
		]);
		expect(readFileSync(join(target, "prometheus/prometheus.yml"), "utf-8").split("\n")).toContain("  scrape_interval: 30s");
		expect(readFileSync(join(target, emailFile), "utf-8").split("\n")).toContain('          addresses: "ops@example.com"');
		expect(existsSync(join(target, "grafana/provisioning/alerting/contact-points-slack.yml"))).toBe(false);
	});

	it("drops a contact point that is no longer configured", () => {
		renderMonitoringConfig(source, target, { ...BASE, GRAFANA_ALERT_EMAIL: "ops@example.com" });

		renderMonitoringConfig(source, target, BASE);

		expect(existsSync(join(target, emailFile))).toBe(false);
	});

	it("enables Grafana mail only with an SMTP host", () => {
		const env = {
			...BASE,
			GRAFANA_IMAGE: "grafana/grafana:11.2.0",
			DOCKER_NETWORK: "keycloak-network",
			MONITORING_DIR: "/opt/keycloak/monitoring",
			GRAFANA_ADMIN_USER: "admin",
			GRAFANA_ADMIN_PASSWORD: "test-secret",
			GRAFANA_PORT: "3000",
			SMTP_HOST: "",
			SMTP_PORT: "587",
			SMTP_USER: "",
			SMTP_PASSWORD: "",
			SMTP_FROM: "",
		};

		expect(grafanaContainer(env).env).not.toHaveProperty("GF_SMTP_ENABLED");
		expect(grafanaContainer({ ...env, SMTP_HOST: "smtp.example.com" }).env).toMatchObject({ GF_SMTP_ENABLED: "true", GF_SMTP_HOST: "smtp.example.com:587" });
	});
});
