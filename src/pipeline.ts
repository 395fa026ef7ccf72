import * as certificatesStep from "./steps/certificates.js";
import * as databaseBackupStep from "./steps/database-backup.js";
import * as dockerSetupStep from "./steps/docker-setup.js";
import * as keycloakConfigurationStep from "./steps/keycloak-configuration.js";
import * as keycloakDeploymentStep from "./steps/keycloak-deployment.js";
import * as monitoringStep from "./steps/monitoring.js";
import * as systemPreparationStep from "./steps/system-preparation.js";
import type { Step, StepId, StepModule } from "./types.js";

function step(id: StepId, label: string, description: string, canCleanup: boolean, module: StepModule): Step {
	return {
		id,
		label,
		description,
		canCleanup,
		variables: module.variables,
		checkDependencies: module.checkDependencies,
		installDependencies: module.installDependencies,
		execute: module.execute,
		cleanup: module.cleanup,
	};
}

/** Fixed deployment order. */
export const STEPS: Step[] = [
	step("system_preparation", "System", "Base packages + directory layout", false, systemPreparationStep),
	step("docker_setup", "Docker", "Engine, network and volumes", true, dockerSetupStep),
	step("certificate_management", "Certificates", "Let's Encrypt certificate, backups + renewal", true, certificatesStep),
	step("keycloak_deployment", "Keycloak", "PostgreSQL + Keycloak containers", true, keycloakDeploymentStep),
	step("keycloak_configuration", "Realm", "Realm, clients, roles, auth + events via kcadm", false, keycloakConfigurationStep),
	step("monitoring_setup", "Monitoring", "Prometheus + Grafana with alerting", true, monitoringStep),
	step("database_backup", "Backups", "Scheduled PostgreSQL dumps", true, databaseBackupStep),
];

/** Host preparation only: what `kcdeploy setup` runs. */
export const SETUP_STEP_IDS: StepId[] = ["system_preparation", "docker_setup"];

export function stepsFor(command: "deploy" | "setup"): Step[] {
	return command === "setup" ? STEPS.filter((s) => SETUP_STEP_IDS.some((id) => id === s.id)) : STEPS;
}

/** Union of every step's variables, first declaration wins. */
export function allVariables(steps: Step[] = STEPS): Step["variables"] {
	const seen = new Map<string, Step["variables"][number]>();
	for (const s of steps) {
		for (const v of s.variables) {
			if (!seen.has(v.name)) seen.set(v.name, v);
		}
	}
	return [...seen.values()];
}

/** Every container the steps create, in start order. */
export const MANAGED_CONTAINERS = [
	keycloakDeploymentStep.POSTGRES_CONTAINER,
	keycloakDeploymentStep.KEYCLOAK_CONTAINER,
	monitoringStep.PROMETHEUS_CONTAINER,
	monitoringStep.GRAFANA_CONTAINER,
];
