import { z } from "zod";
import { DeployError } from "./errors.js";
import { type ExecResult, exec } from "./shell.js";

/** Admin CLI path inside the official Keycloak image. */
export const KCADM_PATH = "/opt/keycloak/bin/kcadm.sh";

/** Runs kcadm.sh; a body is sent as JSON on stdin (used with `-f -`). */
export interface KeycloakAdmin {
	run: (args: string[], body?: unknown) => Promise<ExecResult>;
}

export interface AdminCredentials {
	server: string;
	user: string;
	password: string;
}

export function containerAdmin(container: string): KeycloakAdmin {
	return {
		run: (args, body) =>
			exec("docker", ["exec", "-i", container, KCADM_PATH, ...args], {
				stdin: body === undefined ? undefined : JSON.stringify(body),
				timeout: 60_000,
			}),
	};
}

async function must(admin: KeycloakAdmin, args: string[], body?: unknown): Promise<string> {
	const result = await admin.run(args, body);
	if (result.exitCode !== 0) {
		throw new DeployError("ExecutionFailed", `kcadm ${args.slice(0, 2).join(" ")} failed: ${result.stderr || result.stdout}`);
	}
	return result.stdout;
}

/** Store admin credentials in the container's kcadm config (master realm). */
export async function login(admin: KeycloakAdmin, credentials: AdminCredentials): Promise<void> {
	await must(admin, ["config", "credentials", "--server", credentials.server, "--realm", "master", "--user", credentials.user, "--password", credentials.password]);
}

export async function realmExists(admin: KeycloakAdmin, realm: string): Promise<boolean> {
	return (await admin.run(["get", `realms/${realm}`])).exitCode === 0;
}

export async function upsertRealm(admin: KeycloakAdmin, realm: string, representation: Record<string, unknown>): Promise<"created" | "updated"> {
	if (await realmExists(admin, realm)) {
		await must(admin, ["update", `realms/${realm}`, "-f", "-"], representation);
		return "updated";
	}
	await must(admin, ["create", "realms", "-f", "-"], { ...representation, realm });
	return "created";
}

export async function updateRealm(admin: KeycloakAdmin, realm: string, representation: Record<string, unknown>): Promise<void> {
	await must(admin, ["update", `realms/${realm}`, "-f", "-"], representation);
}

const ClientIdsSchema = z.array(z.object({ id: z.string() }));

/** Internal id of a client, or null when absent. */
export async function findClient(admin: KeycloakAdmin, realm: string, clientId: string): Promise<string | null> {
	const stdout = await must(admin, ["get", "clients", "-r", realm, "-q", `clientId=${clientId}`, "--fields", "id"]);
	const parsed = ClientIdsSchema.safeParse(JSON.parse(stdout || "[]"));
	if (!parsed.success) throw new DeployError("ExecutionFailed", `Unexpected kcadm output for client ${clientId}`);
	return parsed.data[0]?.id ?? null;
}

export async function upsertClient(admin: KeycloakAdmin, realm: string, client: Record<string, unknown> & { clientId: string }): Promise<"created" | "updated"> {
	const id = await findClient(admin, realm, client.clientId);
	if (id) {
		await must(admin, ["update", `clients/${id}`, "-r", realm, "-f", "-"], client);
		return "updated";
	}
	await must(admin, ["create", "clients", "-r", realm, "-f", "-"], client);
	return "created";
}

export async function upsertRole(admin: KeycloakAdmin, realm: string, role: { name: string; description?: string }): Promise<"created" | "updated"> {
	const exists = (await admin.run(["get", `roles/${role.name}`, "-r", realm])).exitCode === 0;
	if (exists) {
		await must(admin, ["update", `roles/${role.name}`, "-r", realm, "-f", "-"], role);
		return "updated";
	}
	await must(admin, ["create", "roles", "-r", realm, "-f", "-"], role);
	return "created";
}

export async function addCompositeRoles(admin: KeycloakAdmin, realm: string, role: string, composites: string[]): Promise<void> {
	if (composites.length === 0) return;
	await must(admin, ["add-roles", "-r", realm, "--rname", role, ...composites.flatMap((c) => ["--rolename", c])]);
}

export async function enableRequiredAction(admin: KeycloakAdmin, realm: string, alias: string): Promise<void> {
	await must(admin, ["update", `authentication/required-actions/${alias}`, "-r", realm, "-s", "enabled=true", "-s", "defaultAction=true"]);
}

export async function updateEventsConfig(admin: KeycloakAdmin, realm: string, config: Record<string, unknown>): Promise<void> {
	await must(admin, ["update", "events/config", "-r", realm, "-f", "-"], config);
}
