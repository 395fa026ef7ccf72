import {
	composeAvailable,
	createNetwork,
	createVolume,
	engineReady,
	networkContainers,
	networkExists,
	removeNetwork,
	removeVolume,
	volumeExists,
} from "../lib/docker.js";
import { requireApt } from "../lib/packages.js";
import { pollUntil } from "../lib/poll.js";
import { commandExists, exec, execOrThrow, installHint, LONG_TIMEOUT } from "../lib/shell.js";
import * as ui from "../lib/ui.js";
import type { CleanupMode, ResolvedEnvironment, VariableSpec } from "../types.js";

export const VOLUMES = ["keycloak-data", "postgres-data"];

const DOCKER_PACKAGES = ["docker-ce", "docker-ce-cli", "containerd.io", "docker-buildx-plugin", "docker-compose-plugin"];
const KEYRING = "/etc/apt/keyrings/docker.asc";

export const READY_ATTEMPTS = 10;
const READY_INTERVAL_MS = 3_000;

interface Created {
	network?: string;
	volumes: string[];
}

// What the last execute created; a rollback removes only these.
let created: Created = { volumes: [] };

export const variables: VariableSpec[] = [
	{ name: "DOCKER_NETWORK", prompt: "Docker network name", default: "keycloak-network" },
	{ name: "DOCKER_NETWORK_SUBNET", prompt: "Docker network subnet", default: "172.20.0.0/16" },
];

export async function checkDependencies(): Promise<boolean> {
	if (!(await commandExists("docker"))) {
		ui.info(`${ui.cmd("docker")} not found`);
		return false;
	}
	if (!(await composeAvailable())) {
		ui.info("Docker Compose is not installed");
		return false;
	}
	ui.success("Docker engine and Compose found");
	return true;
}

/** Docker's apt repository, then the engine packages; the service is enabled and started. */
export async function installDependencies(): Promise<boolean> {
	requireApt(DOCKER_PACKAGES, `Install Docker manually: ${installHint("docker")}`);
	const env = { DEBIAN_FRONTEND: "noninteractive" };

	ui.info("Adding the Docker apt repository...");
	const distro = (await execOrThrow("sh", ["-c", ". /etc/os-release && echo $ID"])) || "ubuntu";
	const codename = await execOrThrow("lsb_release", ["-cs"]);
	const arch = await execOrThrow("dpkg", ["--print-architecture"]);

	await execOrThrow("install", ["-m", "0755", "-d", "/etc/apt/keyrings"]);
	await execOrThrow("curl", ["-fsSL", `https://download.docker.com/linux/${distro}/gpg`, "-o", KEYRING]);
	await execOrThrow("chmod", ["a+r", KEYRING]);
	await execOrThrow("sh", [
		"-c",
		`echo "deb [arch=${arch} signed-by=${KEYRING}] https://download.docker.com/linux/${distro} ${codename} stable" > /etc/apt/sources.list.d/docker.list`,
	]);

	ui.info(`Installing ${ui.bold("Docker")}...`);
	await execOrThrow("apt-get", ["update"], { timeout: LONG_TIMEOUT, env });
	await execOrThrow("apt-get", ["install", "-y", ...DOCKER_PACKAGES], { timeout: LONG_TIMEOUT, env });
	await execOrThrow("systemctl", ["enable", "--now", "docker"]);
	ui.success("Docker installed");
	return commandExists("docker");
}

/**
 * Step 2 — Docker: wait for the engine, then create the shared network and volumes.
 * Engine readiness is checked here, not in checkDependencies.
 */
export async function execute(env: ResolvedEnvironment): Promise<boolean> {
	created = { volumes: [] };
	if (!(await engineReady())) {
		ui.info("Starting the Docker service...");
		await exec("systemctl", ["start", "docker"]);
	}
	ui.info("Waiting for the Docker engine...");
	const ready = await pollUntil(engineReady, { intervalMs: READY_INTERVAL_MS, maxAttempts: READY_ATTEMPTS, label: "docker engine" });
	if (!ready) {
		ui.error(`Docker engine not ready after ${READY_ATTEMPTS} attempts`);
		return false;
	}

	const network = env.DOCKER_NETWORK;
	if (await networkExists(network)) {
		ui.skip(`Network ${ui.bold(network)} already exists`);
	} else {
		await createNetwork(network, env.DOCKER_NETWORK_SUBNET);
		created.network = network;
		ui.success(`Network ${ui.bold(network)} created (${env.DOCKER_NETWORK_SUBNET})`);
	}

	for (const volume of VOLUMES) {
		if (await volumeExists(volume)) {
			ui.skip(`Volume ${ui.bold(volume)} already exists`);
			continue;
		}
		await createVolume(volume);
		created.volumes.push(volume);
		ui.success(`Volume ${ui.bold(volume)} created`);
	}
	return true;
}

/**
 * A rollback removes the network and volumes this run created; pre-existing
 * ones (and their data) stay. Teardown removes all of them. The engine stays installed.
 */
export async function cleanup(env: ResolvedEnvironment, mode: CleanupMode): Promise<void> {
	const volumes = mode === "teardown" ? VOLUMES : created.volumes;
	const network = mode === "teardown" ? env.DOCKER_NETWORK : created.network;
	created = { volumes: [] };

	for (const volume of volumes) {
		if (await volumeExists(volume)) {
			await removeVolume(volume);
			ui.success(`Volume ${ui.bold(volume)} removed`);
		}
	}

	if (!network || !(await networkExists(network))) return;

	const attached = await networkContainers(network);
	if (attached.length > 0) {
		ui.warn(`Network ${network} still has containers attached (${attached.join(", ")}); leaving it`);
		return;
	}
	await removeNetwork(network);
	ui.success(`Network ${ui.bold(network)} removed`);
}
