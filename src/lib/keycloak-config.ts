import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { DeployError, errorMessage } from "./errors.js";
import {
	addCompositeRoles,
	enableRequiredAction,
	type KeycloakAdmin,
	updateEventsConfig,
	updateRealm,
	upsertClient,
	upsertRealm,
	upsertRole,
} from "./kcadm.js";
import { substituteStrings } from "./template.js";
import * as ui from "./ui.js";

export type DocumentName = "realm" | "security" | "clients" | "roles" | "authentication" | "events" | "monitoring" | "themes" | "smtp";

type ParseOutcome = { ok: true; apply: (admin: KeycloakAdmin, realm: string) => Promise<void> } | { ok: false; error: string };

export interface ConfigDocument {
	name: DocumentName;
	required: boolean;
	dependencies: DocumentName[];
	parse: (raw: unknown) => ParseOutcome;
}

export interface DocumentReport {
	name: DocumentName;
	status: "applied" | "skipped";
	reason?: string;
}

function defineDocument<T>(definition: {
	name: DocumentName;
	required: boolean;
	dependencies: DocumentName[];
	schema: z.ZodType<T, z.ZodTypeDef, unknown>;
	apply: (admin: KeycloakAdmin, realm: string, doc: T) => Promise<void>;
}): ConfigDocument {
	return {
		name: definition.name,
		required: definition.required,
		dependencies: definition.dependencies,
		parse: (raw) => {
			const parsed = definition.schema.safeParse(raw);
			if (!parsed.success) {
				return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ") };
			}
			return { ok: true, apply: (admin, realm) => definition.apply(admin, realm, parsed.data) };
		},
	};
}

const optionalText = z
	.string()
	.optional()
	.transform((v) => (v === "" ? undefined : v));

const RealmDocument = z.object({
	realm: z
		.object({
			name: z.string().min(1),
			displayName: optionalText,
			enabled: z.boolean().default(true),
		})
		.passthrough(),
});

const SecurityDocument = z.object({
	security: z
		.object({
			bruteForceProtected: z.boolean().default(true),
			failureFactor: z.number().int().positive().default(5),
			passwordPolicy: optionalText,
			browserSecurityHeaders: z.record(z.string()).optional(),
		})
		.passthrough(),
});

const ClientsDocument = z.object({
	clients: z
		.array(
			z
				.object({
					clientId: z.string().min(1),
					name: optionalText,
					enabled: z.boolean().default(true),
					publicClient: z.boolean().default(false),
					protocol: z.string().default("openid-connect"),
					rootUrl: optionalText,
					redirectUris: z.array(z.string()).default([]),
					webOrigins: z.array(z.string()).default([]),
					secret: optionalText,
				})
				.passthrough(),
		)
		.min(1),
});

const RolesDocument = z.object({
	roles: z.object({
		realm: z.array(
			z.object({
				name: z.string().min(1),
				description: optionalText,
				composites: z.array(z.string()).default([]),
			}),
		),
	}),
});

const AuthenticationDocument = z.object({
	authentication: z.object({
		browserFlow: z.string().default("browser"),
		directGrantFlow: z.string().default("direct grant"),
		otpPolicy: z
			.object({
				type: z.enum(["totp", "hotp"]).default("totp"),
				algorithm: z.string().default("HmacSHA1"),
				digits: z.number().int().default(6),
				period: z.number().int().default(30),
			})
			.optional(),
		requiredActions: z.array(z.string()).default([]),
	}),
});

const EventsDocument = z.object({
	events: z.object({
		eventsEnabled: z.boolean().default(true),
		eventsExpiration: z.number().int().positive().optional(),
		eventsListeners: z.array(z.string()).default(["jboss-logging"]),
		enabledEventTypes: z.array(z.string()).optional(),
		adminEventsEnabled: z.boolean().default(true),
		adminEventsDetailsEnabled: z.boolean().default(false),
	}),
});

const MonitoringDocument = z.object({
	monitoring: z.object({
		attributes: z.record(z.string()),
	}),
});

const ThemesDocument = z.object({
	themes: z.object({
		loginTheme: optionalText,
		accountTheme: optionalText,
		adminTheme: optionalText,
		emailTheme: optionalText,
		internationalizationEnabled: z.boolean().optional(),
		supportedLocales: z.array(z.string()).optional(),
		defaultLocale: optionalText,
	}),
});

const SmtpDocument = z.object({
	smtp: z.object({
		host: z.string().min(1),
		port: z.coerce.number().int().positive().default(587),
		from: z.string().email(),
		fromDisplayName: optionalText,
		replyTo: optionalText,
		auth: z.boolean().default(true),
		user: optionalText,
		password: optionalText,
		starttls: z.boolean().default(true),
		ssl: z.boolean().default(false),
	}),
});

/** Drop keys whose value is undefined so kcadm does not overwrite them with null. */
function defined(record: Record<string, unknown>): Record<string, unknown> {
	return Object.fromEntries(Object.entries(record).filter(([, v]) => v !== undefined));
}

/** Required documents first, then optional ones, each group in this order. */
export const CONFIG_DOCUMENTS: ConfigDocument[] = [
	defineDocument({
		name: "realm",
		required: true,
		dependencies: [],
		schema: RealmDocument,
		apply: async (admin, _realm, doc) => {
			const { name, ...rest } = doc.realm;
			const action = await upsertRealm(admin, name, defined(rest));
			ui.debug(`realm ${name} ${action}`);
		},
	}),
	defineDocument({
		name: "security",
		required: true,
		dependencies: ["realm"],
		schema: SecurityDocument,
		apply: (admin, realm, doc) => updateRealm(admin, realm, defined(doc.security)),
	}),
	defineDocument({
		name: "clients",
		required: true,
		dependencies: ["realm"],
		schema: ClientsDocument,
		apply: async (admin, realm, doc) => {
			for (const client of doc.clients) {
				const action = await upsertClient(admin, realm, { ...defined(client), clientId: client.clientId });
				ui.debug(`client ${client.clientId} ${action}`);
			}
		},
	}),
	defineDocument({
		name: "roles",
		required: true,
		dependencies: ["realm"],
		schema: RolesDocument,
		apply: async (admin, realm, doc) => {
			for (const role of doc.roles.realm) {
				await upsertRole(admin, realm, role.description ? { name: role.name, description: role.description } : { name: role.name });
			}
			// Composites reference other roles, so they go in after every role exists
			for (const role of doc.roles.realm) {
				await addCompositeRoles(admin, realm, role.name, role.composites);
			}
		},
	}),
	defineDocument({
		name: "authentication",
		required: true,
		dependencies: ["realm", "security"],
		schema: AuthenticationDocument,
		apply: async (admin, realm, doc) => {
			const { browserFlow, directGrantFlow, otpPolicy, requiredActions } = doc.authentication;
			const otp = otpPolicy
				? { otpPolicyType: otpPolicy.type, otpPolicyAlgorithm: otpPolicy.algorithm, otpPolicyDigits: otpPolicy.digits, otpPolicyPeriod: otpPolicy.period }
				: {};
			await updateRealm(admin, realm, { browserFlow, directGrantFlow, ...otp });
			for (const alias of requiredActions) {
				await enableRequiredAction(admin, realm, alias);
			}
		},
	}),
	defineDocument({
		name: "events",
		required: true,
		dependencies: ["realm"],
		schema: EventsDocument,
		apply: (admin, realm, doc) => updateEventsConfig(admin, realm, defined(doc.events)),
	}),
	defineDocument({
		name: "monitoring",
		required: false,
		dependencies: ["realm"],
		schema: MonitoringDocument,
		apply: (admin, realm, doc) => updateRealm(admin, realm, { attributes: doc.monitoring.attributes }),
	}),
	defineDocument({
		name: "themes",
		required: false,
		dependencies: ["realm"],
		schema: ThemesDocument,
		apply: (admin, realm, doc) => updateRealm(admin, realm, defined(doc.themes)),
	}),
	defineDocument({
		name: "smtp",
		required: false,
		dependencies: ["realm"],
		schema: SmtpDocument,
		apply: (admin, realm, doc) => {
			const smtpServer = Object.fromEntries(Object.entries(defined(doc.smtp)).map(([k, v]) => [k, String(v)]));
			return updateRealm(admin, realm, { smtpServer });
		},
	}),
];

export interface ApplyDocumentsOptions {
	/** Directory holding <name>.yml files. */
	dir: string;
	/** ${NAME} values substituted into the parsed strings. */
	values: Readonly<Record<string, string>>;
	admin: KeycloakAdmin;
	realm: string;
	documents?: ConfigDocument[];
}

function documentPath(dir: string, name: string): string | null {
	for (const ext of [".yml", ".yaml"]) {
		const candidate = join(dir, `${name}${ext}`);
		if (existsSync(candidate)) return candidate;
	}
	return null;
}

/**
 * Apply configuration documents. A required document that is missing, invalid,
 * fails to apply or has unmet dependencies throws ValidationFailed; an optional
 * one is skipped with a warning.
 */
export async function applyDocuments(options: ApplyDocumentsOptions): Promise<DocumentReport[]> {
	const documents = options.documents ?? CONFIG_DOCUMENTS;
	const ordered = [...documents.filter((d) => d.required), ...documents.filter((d) => !d.required)];
	const applied = new Set<DocumentName>();
	const reports: DocumentReport[] = [];

	const skipOrFail = (doc: ConfigDocument, reason: string): void => {
		if (doc.required) {
			throw new DeployError("ValidationFailed", `Required configuration ${doc.name}: ${reason}`);
		}
		ui.warn(`Skipping optional configuration ${ui.bold(doc.name)}: ${reason}`);
		reports.push({ name: doc.name, status: "skipped", reason });
	};

	for (const doc of ordered) {
		const unmet = doc.dependencies.filter((dep) => !applied.has(dep));
		if (unmet.length > 0) {
			skipOrFail(doc, `depends on ${unmet.join(", ")} which was not applied`);
			continue;
		}

		const file = documentPath(options.dir, doc.name);
		if (!file) {
			skipOrFail(doc, `${doc.name}.yml not found in ${options.dir}`);
			continue;
		}

		let raw: unknown;
		try {
			raw = substituteStrings(YAML.parse(readFileSync(file, "utf-8")), options.values);
		} catch (err) {
			skipOrFail(doc, `invalid YAML: ${errorMessage(err)}`);
			continue;
		}

		const parsed = doc.parse(raw);
		if (!parsed.ok) {
			skipOrFail(doc, parsed.error);
			continue;
		}

		try {
			await parsed.apply(options.admin, options.realm);
		} catch (err) {
			if (doc.required) throw err;
			skipOrFail(doc, errorMessage(err));
			continue;
		}

		applied.add(doc.name);
		reports.push({ name: doc.name, status: "applied" });
		ui.success(`Applied ${ui.bold(doc.name)} configuration`);
	}
	return reports;
}
