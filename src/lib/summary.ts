import { chmodSync, existsSync, mkdirSync, readdirSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { ResolvedEnvironment } from "../types.js";
import { containerStatus } from "./docker.js";
import { exec } from "./shell.js";
import { substitute } from "./template.js";

/** Values gathered from the host rather than from settings. */
export interface SummaryCollectors {
	certificateExpiry: (certPath: string) => Promise<string>;
	serviceStatus: (containers: string[]) => Promise<string>;
	lastBackup: (dir: string) => string;
}

export interface SummaryOptions {
	templatePath: string;
	outputPath: string;
	settingsFile: string;
	/** Containers listed under "Service status". */
	containers: string[];
	collectors?: Partial<SummaryCollectors>;
	now?: Date;
}

async function certificateExpiry(certPath: string): Promise<string> {
	if (!existsSync(certPath)) return "no certificate installed";
	const result = await exec("openssl", ["x509", "-enddate", "-noout", "-in", certPath]);
	return result.exitCode === 0 ? result.stdout.replace(/^notAfter=/, "") : "unknown";
}

async function serviceStatus(containers: string[]): Promise<string> {
	const lines: string[] = [];
	for (const name of containers) {
		const status = await containerStatus(name);
		lines.push(`- ${name}: ${status || "not running"}`);
	}
	return lines.join("\n");
}

/** Modification time of the newest entry in `dir`. */
function lastBackup(dir: string): string {
	if (!existsSync(dir)) return "none yet";
	const times = readdirSync(dir)
		.filter((name) => name.startsWith("keycloak_backup_"))
		.map((name) => statSync(join(dir, name)).mtime.getTime());
	if (times.length === 0) return "none yet";
	return new Date(Math.max(...times)).toISOString();
}

const DEFAULT_COLLECTORS: SummaryCollectors = { certificateExpiry, serviceStatus, lastBackup };

/**
 * Render the installation summary from the run's variables plus live facts,
 * write it owner-only and return the document.
 */
export async function writeInstallationSummary(env: ResolvedEnvironment, options: SummaryOptions): Promise<string> {
	const collectors = { ...DEFAULT_COLLECTORS, ...options.collectors };
	const certPath = join(env.INSTALL_ROOT ?? "/opt/keycloak", "certs", "tls.crt");

	const values: Record<string, string> = {
		...env,
		INSTALL_DATE: (options.now ?? new Date()).toISOString(),
		SETTINGS_FILE: options.settingsFile,
		SSL_CERT_PATH: certPath,
		SSL_EXPIRY_DATE: await collectors.certificateExpiry(certPath),
		SERVICE_STATUS: await collectors.serviceStatus(options.containers),
		LAST_BACKUP_DATE: collectors.lastBackup(env.BACKUP_STORAGE_PATH ?? "/var/backups/keycloak"),
	};

	const document = substitute(readFileSync(options.templatePath, "utf-8"), values);
	mkdirSync(dirname(options.outputPath), { recursive: true });
	writeFileSync(options.outputPath, document, { encoding: "utf-8", mode: 0o600 });
	chmodSync(options.outputPath, 0o600);
	return document;
}
