import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BUNDLED_TEMPLATES_DIR } from "../lib/config.js";
import type { KeycloakAdmin } from "../lib/kcadm.js";
import { applyDocuments, CONFIG_DOCUMENTS } from "../lib/keycloak-config.js";
import type { ExecResult } from "../lib/shell.js";

interface AdminCall {
	args: string[];
	body?: unknown;
}

/** Empty Keycloak: every lookup misses, every write succeeds. */
function fakeAdmin(calls: AdminCall[]): KeycloakAdmin {
	return {
		run: async (args, body): Promise<ExecResult> => {
			calls.push(body === undefined ? { args } : { args, body });
			if (args[0] === "get" && args[1] === "clients") return { stdout: "[]", stderr: "", exitCode: 0 };
			if (args[0] === "get") return { stdout: "", stderr: "Resource not found", exitCode: 1 };
			return { stdout: "", stderr: "", exitCode: 0 };
		},
	};
}

const VALUES = {
	KEYCLOAK_REALM: "demo",
	KEYCLOAK_REALM_DISPLAY_NAME: "Demo",
	KEYCLOAK_DOMAIN: "auth.example.com",
	CLIENT_ID: "web-app",
	CLIENT_NAME: "Web App",
	CLIENT_SECRET: "test-secret",
	SMTP_HOST: "",
	SMTP_PORT: "587",
	SMTP_FROM: "",
	SMTP_USER: "",
	SMTP_PASSWORD: "",
};

describe("applyDocuments", () => {
	let dir: string;
	let calls: AdminCall[];

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "kcdeploy-config-"));
		calls = [];
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("applies the bundled documents, required first, and skips SMTP without a host", async () => {
		const reports = await applyDocuments({ dir: join(BUNDLED_TEMPLATES_DIR, "keycloak"), values: VALUES, admin: fakeAdmin(calls), realm: "demo" });

		expect(reports.map((r) => `${r.name}:${r.status}`)).toEqual([
			"realm:applied",
			"security:applied",
			"clients:applied",
			"roles:applied",
			"authentication:applied",
			"events:applied",
			"monitoring:applied",
			"themes:applied",
			"smtp:skipped",
		]);

		expect(calls[0]).toEqual({ args: ["get", "realms/demo"] });
		expect(calls[1]).toEqual({
			args: ["create", "realms", "-f", "-"],
			body: expect.objectContaining({ realm: "demo", displayName: "Demo", enabled: true, sslRequired: "external" }),
		});
		expect(calls).toContainEqual({
			args: ["create", "clients", "-r", "demo", "-f", "-"],
			body: expect.objectContaining({ clientId: "web-app", secret: "test-secret", redirectUris: ["https://auth.example.com/*"] }),
		});
		expect(calls).toContainEqual({ args: ["add-roles", "-r", "demo", "--rname", "admin", "--rolename", "user"] });
		expect(calls).toContainEqual({
			args: ["update", "authentication/required-actions/CONFIGURE_TOTP", "-r", "demo", "-s", "enabled=true", "-s", "defaultAction=true"],
		});
	});

	it("keeps quotes and backslashes from settings intact", async () => {
		const values = {
			...VALUES,
			KEYCLOAK_REALM_DISPLAY_NAME: 'ACME "Staff" Login',
			SMTP_HOST: "smtp.example.com",
			SMTP_FROM: "noreply@example.com",
			SMTP_USER: "mailer",
			SMTP_PASSWORD: "pa\\ss",
		};

		const reports = await applyDocuments({ dir: join(BUNDLED_TEMPLATES_DIR, "keycloak"), values, admin: fakeAdmin(calls), realm: "demo" });

		expect(reports.at(-1)).toEqual({ name: "smtp", status: "applied" });
		expect(calls[1]?.body).toMatchObject({ realm: "demo", displayName: 'ACME "Staff" Login' });
		expect(calls).toContainEqual({
			args: ["update", "realms/demo", "-f", "-"],
			body: { smtpServer: expect.objectContaining({ host: "smtp.example.com", password: "pa\\ss", fromDisplayName: 'ACME "Staff" Login' }) },
		});
	});

	it("fails when a required document is missing", async () => {
		writeFileSync(join(dir, "realm.yml"), "realm:\n  name: demo\n");

		await expect(applyDocuments({ dir, values: {}, admin: fakeAdmin(calls), realm: "demo" })).rejects.toMatchObject({
			kind: "ValidationFailed",
			message: `Required configuration security: security.yml not found in ${dir}`,
		});
	});

	it("fails when a required document does not validate", async () => {
		writeFileSync(join(dir, "realm.yml"), 'realm:\n  name: ""\n');

		await expect(applyDocuments({ dir, values: {}, admin: fakeAdmin(calls), realm: "demo" })).rejects.toThrow(/^Required configuration realm: realm\.name: /);
		expect(calls).toEqual([]);
	});

	it("reads .yaml files and skips an optional document whose dependency is absent", async () => {
		writeFileSync(join(dir, "themes.yaml"), "themes:\n  loginTheme: keycloak\n");
		const themes = CONFIG_DOCUMENTS.filter((d) => d.name === "themes");

		const reports = await applyDocuments({ dir, values: {}, admin: fakeAdmin(calls), realm: "demo", documents: themes });

		expect(reports).toEqual([{ name: "themes", status: "skipped", reason: "depends on realm which was not applied" }]);
		expect(calls).toEqual([]);
	});

	it("skips an optional document with invalid YAML", async () => {
		writeFileSync(join(dir, "realm.yml"), "realm:\n  name: demo\n");
		writeFileSync(join(dir, "monitoring.yml"), "monitoring: [unclosed\n");
		const documents = CONFIG_DOCUMENTS.filter((d) => d.name === "realm" || d.name === "monitoring");

		const reports = await applyDocuments({ dir, values: {}, admin: fakeAdmin(calls), realm: "demo", documents });

		expect(reports[0]).toEqual({ name: "realm", status: "applied" });
		expect(reports[1]).toMatchObject({ name: "monitoring", status: "skipped" });
		expect(reports[1]?.reason).toMatch(/^invalid YAML: /);
	});
});
