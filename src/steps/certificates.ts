import { chmodSync, copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { createBackup, latestBackup, restoreBackup } from "../lib/backups.js";
import { type CertificateCheck, checkCertificate, parseDomainList } from "../lib/certificates.js";
import { DeployError } from "../lib/errors.js";
import { aptInstall } from "../lib/packages.js";
import { commandExists, exec, installHint, LONG_TIMEOUT } from "../lib/shell.js";
import * as ui from "../lib/ui.js";
import { intValue, isTrue } from "../lib/values.js";
import type { CleanupMode, ResolvedEnvironment, VariableSpec } from "../types.js";

export const RENEWAL_CRON_FILE = "certbot-renew";

export const variables: VariableSpec[] = [
	{ name: "SSL_DOMAINS", prompt: "Certificate domains (comma separated)" },
	{ name: "SSL_EMAIL", prompt: "Let's Encrypt account email" },
	{ name: "SSL_STAGING", prompt: "Use the Let's Encrypt staging environment (true/false)", default: "true" },
	{ name: "SSL_AUTO_RENEWAL", prompt: "Schedule automatic renewal (true/false)", default: "true" },
	{ name: "SSL_MIN_DAYS_VALID", prompt: "Renew when fewer days than this remain", default: "30" },
	{ name: "SSL_MAX_BACKUPS", prompt: "Certificate backups to keep", default: "5" },
	{ name: "SSL_CERT_DIR", prompt: "Certbot live directory", default: "/etc/letsencrypt/live" },
	{ name: "SSL_BACKUP_DIR", prompt: "Certificate backup directory", default: "/opt/keycloak/certs/backup" },
	{ name: "CRON_DIR", prompt: "cron.d directory", default: "/etc/cron.d" },
	{ name: "INSTALL_ROOT", prompt: "Installation root directory", default: "/opt/keycloak" },
];

export async function checkDependencies(): Promise<boolean> {
	const missing: string[] = [];
	for (const tool of ["certbot", "openssl"]) {
		if (!(await commandExists(tool))) missing.push(tool);
	}
	if (missing.length > 0) ui.info(`Not on PATH: ${missing.join(", ")}`);
	return missing.length === 0;
}

export async function installDependencies(): Promise<boolean> {
	await aptInstall(["certbot", "openssl"], `Install certbot manually: ${installHint("certbot")}`);
	return (await commandExists("certbot")) && (await commandExists("openssl"));
}

export function certbotArgs(domains: string[], email: string, staging: boolean): string[] {
	return [
		"certonly",
		"--standalone",
		"--non-interactive",
		"--agree-tos",
		`--email=${email}`,
		...domains.flatMap((d) => ["-d", d]),
		...(staging ? ["--test-cert"] : []),
		"--preferred-challenges",
		"http",
	];
}

/** Monthly renewal; the deploy hook refreshes the copies Keycloak reads and restarts it. */
export function renewalCronEntry(liveDir: string, certsDir: string): string {
	const hook = `cp -L ${liveDir}/fullchain.pem ${certsDir}/tls.crt && cp -L ${liveDir}/privkey.pem ${certsDir}/tls.key && docker restart keycloak`;
	return `0 0 1 * * root certbot renew --quiet --deploy-hook "${hook}"\n`;
}

function liveDirectory(env: ResolvedEnvironment): string {
	const [primary] = parseDomainList(env.SSL_DOMAINS ?? "");
	if (!primary) throw new DeployError("ValidationFailed", "SSL_DOMAINS lists no domain");
	return join(env.SSL_CERT_DIR, primary);
}

function inspect(liveDir: string, domains: string[], minDaysValid: number): CertificateCheck {
	const chain = join(liveDir, "fullchain.pem");
	const key = join(liveDir, "privkey.pem");
	if (!existsSync(chain) || !existsSync(key)) return { valid: false, reason: `no certificate in ${liveDir}` };
	return checkCertificate({ chainPem: readFileSync(chain, "utf-8"), keyPem: readFileSync(key, "utf-8"), domains, minDaysValid });
}

/** Copy into INSTALL_ROOT/certs: public chain world-readable, key owner-only. */
function installForKeycloak(liveDir: string, certsDir: string): void {
	mkdirSync(certsDir, { recursive: true });
	const crt = join(certsDir, "tls.crt");
	const key = join(certsDir, "tls.key");
	copyFileSync(join(liveDir, "fullchain.pem"), crt);
	chmodSync(crt, 0o644);
	copyFileSync(join(liveDir, "privkey.pem"), key);
	chmodSync(key, 0o600);
	ui.success(`Certificate installed to ${ui.cmd(certsDir)}`);
}

/**
 * Step 3 — TLS certificates:
 * - keeps a valid existing certificate (expiry, SAN, key pair, chain)
 * - otherwise backs up the current one and requests a new one from Let's Encrypt
 * - restores the backup if the request fails or yields an invalid certificate
 * - schedules renewal and installs the certificate for Keycloak
 */
export async function execute(env: ResolvedEnvironment): Promise<boolean> {
	const domains = parseDomainList(env.SSL_DOMAINS);
	const minDays = intValue(env, "SSL_MIN_DAYS_VALID");
	const maxBackups = intValue(env, "SSL_MAX_BACKUPS");
	const liveDir = liveDirectory(env);

	const current = inspect(liveDir, domains, minDays);
	if (current.valid) {
		ui.success(`Existing certificate for ${ui.host(domains.join(", "))} valid for ${current.daysLeft} more days`);
	} else {
		ui.info(`Requesting a new certificate: ${current.reason}`);

		const backup = createBackup({
			root: env.SSL_BACKUP_DIR,
			sources: [{ path: join(liveDir, "fullchain.pem") }, { path: join(liveDir, "privkey.pem") }],
			maxBackups,
			info: [`Domains: ${domains.join(", ")}`, `Created: ${new Date().toISOString()}`, `Reason: ${current.reason ?? "unknown"}`],
		});
		if (backup) ui.success(`Previous certificate backed up to ${ui.cmd(backup)}`);

		const staging = isTrue(env.SSL_STAGING);
		if (staging) ui.warn("Using the Let's Encrypt staging environment: browsers will not trust this certificate");

		const result = await exec("certbot", certbotArgs(domains, env.SSL_EMAIL, staging), { timeout: LONG_TIMEOUT });
		const issued = result.exitCode === 0 ? inspect(liveDir, domains, minDays) : null;

		if (!issued?.valid) {
			ui.error(issued ? `New certificate rejected: ${issued.reason}` : `certbot failed: ${result.stderr || result.stdout}`);
			if (backup) {
				restoreBackup(backup, liveDir);
				ui.info("Previous certificate restored");
			}
			return false;
		}
		ui.success(`Certificate issued for ${ui.host(domains.join(", "))}, expires ${issued.expiresAt?.toISOString().slice(0, 10)}`);
	}

	const certsDir = join(env.INSTALL_ROOT, "certs");
	if (isTrue(env.SSL_AUTO_RENEWAL)) {
		const cronFile = join(env.CRON_DIR, RENEWAL_CRON_FILE);
		mkdirSync(env.CRON_DIR, { recursive: true });
		writeFileSync(cronFile, renewalCronEntry(liveDir, certsDir), { mode: 0o644 });
		ui.success(`Renewal scheduled in ${ui.cmd(cronFile)}`);
	}

	installForKeycloak(liveDir, certsDir);
	return true;
}

/** Rollback puts the most recent backup back in place; teardown leaves certbot's files alone. */
export async function cleanup(env: ResolvedEnvironment, mode: CleanupMode): Promise<void> {
	if (mode === "teardown" || !env.SSL_BACKUP_DIR || !env.SSL_DOMAINS) return;
	const latest = latestBackup(env.SSL_BACKUP_DIR);
	if (!latest) {
		ui.skip("No certificate backup to restore");
		return;
	}
	restoreBackup(latest, liveDirectory(env));
	ui.success(`Certificate restored from ${ui.cmd(latest)}`);
}
