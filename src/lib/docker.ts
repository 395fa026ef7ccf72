import { exec, execOrThrow, LONG_TIMEOUT } from "./shell.js";

/** Label put on every network, volume and container this tool creates. */
export const MANAGED_LABEL = "io.kcdeploy.managed=true";

export interface ContainerState {
	status: string;
	/** null when the container defines no health check. */
	health: string | null;
}

export interface ContainerSpec {
	name: string;
	image: string;
	network: string;
	env?: Record<string, string>;
	/** host:container */
	ports?: string[];
	/** source:target[:ro] */
	volumes?: string[];
	memory?: string;
	memoryReservation?: string;
	cpus?: string;
	healthCmd?: string;
	healthInterval?: string;
	healthRetries?: number;
	healthStartPeriod?: string;
	restart?: string;
	/** Arguments after the image. */
	command?: string[];
}

export async function engineReady(): Promise<boolean> {
	const result = await exec("docker", ["info", "--format", "{{.ServerVersion}}"]);
	return result.exitCode === 0;
}

export async function composeAvailable(): Promise<boolean> {
	const plugin = await exec("docker", ["compose", "version"]);
	if (plugin.exitCode === 0) return true;
	const standalone = await exec("docker-compose", ["--version"]);
	return standalone.exitCode === 0;
}

export async function networkExists(name: string): Promise<boolean> {
	return (await exec("docker", ["network", "inspect", name])).exitCode === 0;
}

export async function createNetwork(name: string, subnet: string): Promise<void> {
	await execOrThrow("docker", ["network", "create", "--driver", "bridge", "--subnet", subnet, "--label", MANAGED_LABEL, name]);
}

/** Containers attached to a network, by name. */
export async function networkContainers(name: string): Promise<string[]> {
	const result = await exec("docker", ["network", "inspect", name, "--format", "{{range .Containers}}{{.Name}} {{end}}"]);
	if (result.exitCode !== 0) return [];
	return result.stdout.split(/\s+/).filter(Boolean);
}

export async function removeNetwork(name: string): Promise<void> {
	await execOrThrow("docker", ["network", "rm", name]);
}

export async function volumeExists(name: string): Promise<boolean> {
	return (await exec("docker", ["volume", "inspect", name])).exitCode === 0;
}

export async function createVolume(name: string): Promise<void> {
	await execOrThrow("docker", ["volume", "create", "--label", MANAGED_LABEL, name]);
}

export async function removeVolume(name: string): Promise<void> {
	await execOrThrow("docker", ["volume", "rm", name]);
}

export async function imageExists(image: string): Promise<boolean> {
	return (await exec("docker", ["image", "inspect", image])).exitCode === 0;
}

export async function pullImage(image: string): Promise<void> {
	await execOrThrow("docker", ["pull", image], { timeout: LONG_TIMEOUT });
}

/** null when the container does not exist. */
export async function containerState(name: string): Promise<ContainerState | null> {
	const result = await exec("docker", ["inspect", "--format", "{{.State.Status}}|{{if .State.Health}}{{.State.Health.Status}}{{end}}", name]);
	if (result.exitCode !== 0) return null;
	const [status = "", health = ""] = result.stdout.split("|");
	return { status, health: health === "" ? null : health };
}

export function runArgs(spec: ContainerSpec): string[] {
	const args = ["run", "-d", "--name", spec.name, "--network", spec.network, "--label", MANAGED_LABEL, "--restart", spec.restart ?? "unless-stopped"];
	for (const [key, value] of Object.entries(spec.env ?? {})) args.push("-e", `${key}=${value}`);
	for (const port of spec.ports ?? []) args.push("-p", port);
	for (const volume of spec.volumes ?? []) args.push("-v", volume);
	if (spec.memory) args.push("--memory", spec.memory);
	if (spec.memoryReservation) args.push("--memory-reservation", spec.memoryReservation);
	if (spec.cpus) args.push("--cpus", spec.cpus);
	if (spec.healthCmd) {
		args.push("--health-cmd", spec.healthCmd);
		args.push("--health-interval", spec.healthInterval ?? "10s");
		args.push("--health-retries", String(spec.healthRetries ?? 5));
		if (spec.healthStartPeriod) args.push("--health-start-period", spec.healthStartPeriod);
	}
	args.push(spec.image, ...(spec.command ?? []));
	return args;
}

/** Start an existing container, or create it from `spec`. */
export async function ensureContainer(spec: ContainerSpec): Promise<"started" | "created" | "running"> {
	const state = await containerState(spec.name);
	if (state?.status === "running") return "running";
	if (state) {
		await execOrThrow("docker", ["start", spec.name]);
		return "started";
	}
	await execOrThrow("docker", runArgs(spec), { timeout: LONG_TIMEOUT });
	return "created";
}

export async function stopContainer(name: string, timeoutSeconds = 10): Promise<void> {
	await execOrThrow("docker", ["stop", "-t", String(timeoutSeconds), name], { timeout: (timeoutSeconds + 30) * 1000 });
}

export async function startContainer(name: string): Promise<void> {
	await execOrThrow("docker", ["start", name]);
}

export async function removeContainer(name: string): Promise<void> {
	await execOrThrow("docker", ["rm", "-f", name]);
}

/** Human readable status line per container name ("Up 3 hours (healthy)"), empty when absent. */
export async function containerStatus(name: string): Promise<string> {
	const result = await exec("docker", ["ps", "-a", "--filter", `name=^${name}$`, "--format", "{{.Status}}"]);
	return result.exitCode === 0 ? result.stdout : "";
}
