import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ExecResult } from "../lib/shell.js";

const shell = vi.hoisted(() => ({
	exec: vi.fn(),
	execOrThrow: vi.fn(),
	commandExists: vi.fn(),
}));

vi.mock("../lib/shell.js", async (importOriginal) => {
	const actual = await importOriginal<typeof import("../lib/shell.js")>();
	return { ...actual, exec: shell.exec, execOrThrow: shell.execOrThrow, commandExists: shell.commandExists };
});

vi.mock("node:timers/promises", () => ({ setTimeout: vi.fn(async () => undefined) }));

import { Orchestrator } from "../lib/orchestrator.js";
import { ProgressState } from "../lib/progress.js";
import { VariableResolver } from "../lib/resolver.js";
import { STEPS } from "../pipeline.js";
import { checkDependencies, cleanup, execute, READY_ATTEMPTS } from "../steps/docker-setup.js";
import type { Step } from "../types.js";

const OK: ExecResult = { stdout: "", stderr: "", exitCode: 0 };
const FAILED: ExecResult = { stdout: "", stderr: "Cannot connect to the Docker daemon", exitCode: 1 };

const ENV = { DOCKER_NETWORK: "keycloak-network", DOCKER_NETWORK_SUBNET: "172.20.0.0/16" };

function dockerStep(): Step {
	const found = STEPS.find((s) => s.id === "docker_setup");
	if (!found) throw new Error("docker_setup not registered");
	return found;
}

function removed(kind: "volume" | "network"): string[] {
	return shell.execOrThrow.mock.calls.filter((call) => call[0] === "docker" && call[1][0] === kind && call[1][1] === "rm").map((call) => String(call[1][2]));
}

describe("docker_setup", () => {
	let dir: string;
	let infoCalls: number;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "kcdeploy-docker-"));
		infoCalls = 0;
		shell.commandExists.mockResolvedValue(true);
		shell.execOrThrow.mockResolvedValue("");
		shell.exec.mockImplementation(async (_command: string, args: string[]): Promise<ExecResult> => {
			if (args[0] === "info") {
				infoCalls++;
				return FAILED;
			}
			if (args[0] === "compose") return OK;
			if (args[0] === "volume" && args[1] === "inspect") return OK;
			return FAILED;
		});
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("fails after the readiness attempts run out and removes nothing it did not create", async () => {
		const executed: string[] = [];
		const fake = (id: string): Step => ({
			id,
			label: id,
			description: id,
			canCleanup: false,
			variables: [],
			checkDependencies: async () => true,
			installDependencies: async () => true,
			execute: async () => {
				executed.push(id);
				return true;
			},
			cleanup: async () => undefined,
		});

		const stateFile = join(dir, "state");
		const orchestrator = new Orchestrator({
			progress: new ProgressState(stateFile),
			resolver: new VariableResolver({ settingsFile: join(dir, ".env"), interactive: false, env: {} }),
		});

		const result = await orchestrator.run([fake("system_preparation"), dockerStep(), fake("certificate_management")]);

		expect(result.ok).toBe(false);
		expect(result.failure?.step).toBe("docker_setup");
		expect(result.failure?.error.kind).toBe("ExecutionFailed");
		// One check before starting the service, then every polling attempt
		expect(infoCalls).toBe(1 + READY_ATTEMPTS);
		expect(shell.exec).toHaveBeenCalledWith("systemctl", ["start", "docker"]);
		expect(executed).toEqual(["system_preparation"]);
		expect(readFileSync(stateFile, "utf-8")).toBe("system_preparation\n");

		expect(removed("volume")).toEqual([]);
		expect(removed("network")).toEqual([]);
	});

	it("keeps volumes from an earlier install when the network cannot be created", async () => {
		shell.exec.mockImplementation(async (_command: string, args: string[]): Promise<ExecResult> => {
			if (args[0] === "info") return { ...OK, stdout: "27.3.1" };
			if (args[0] === "compose") return OK;
			if (args[0] === "volume" && args[1] === "inspect") return OK;
			return FAILED;
		});
		shell.execOrThrow.mockImplementation(async (_command: string, args: string[]): Promise<string> => {
			if (args[0] === "network" && args[1] === "create") throw new Error("Pool overlaps with other one on this address space");
			return "";
		});

		const orchestrator = new Orchestrator({
			progress: new ProgressState(join(dir, "state")),
			resolver: new VariableResolver({ settingsFile: join(dir, ".env"), interactive: false, env: ENV }),
		});
		const result = await orchestrator.run([dockerStep()]);

		expect(result.ok).toBe(false);
		expect(result.failure?.error.message).toBe("Pool overlaps with other one on this address space");
		expect(result.outcomes).toEqual([expect.objectContaining({ id: "docker_setup", status: "failed", cleanedUp: true })]);
		expect(removed("volume")).toEqual([]);
		expect(removed("network")).toEqual([]);
	});

	it("rolls back only the network and volume this run created", async () => {
		let networkCreated = false;
		const volumes = new Set(["postgres-data"]);
		shell.exec.mockImplementation(async (_command: string, args: string[]): Promise<ExecResult> => {
			if (args[0] === "info") return { ...OK, stdout: "27.3.1" };
			if (args[0] === "network" && args[1] === "inspect") return networkCreated ? OK : FAILED;
			if (args[0] === "volume" && args[1] === "inspect") return volumes.has(args[2] ?? "") ? OK : FAILED;
			return FAILED;
		});
		shell.execOrThrow.mockImplementation(async (_command: string, args: string[]): Promise<string> => {
			if (args[0] === "network" && args[1] === "create") networkCreated = true;
			if (args[0] === "volume" && args[1] === "create") volumes.add(args[4] ?? "");
			return "";
		});

		expect(await execute(ENV)).toBe(true);
		await cleanup(ENV, "rollback");

		expect(removed("volume")).toEqual(["keycloak-data"]);
		expect(removed("network")).toEqual(["keycloak-network"]);
	});

	it("removes every volume and the network on teardown", async () => {
		shell.exec.mockImplementation(async (_command: string, args: string[]): Promise<ExecResult> => {
			if (args[0] === "network" && args[1] === "inspect") return OK;
			if (args[0] === "volume" && args[1] === "inspect") return OK;
			return FAILED;
		});

		await cleanup(ENV, "teardown");

		expect(removed("volume")).toEqual(["keycloak-data", "postgres-data"]);
		expect(removed("network")).toEqual(["keycloak-network"]);
	});

	it("does not contact the daemon when checking dependencies", async () => {
		expect(await checkDependencies()).toBe(true);
		expect(infoCalls).toBe(0);
	});
});
