import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { checkCertificate, daysUntil, domainCovered, parseDomainList, parseSubjectAltNames, splitPemChain } from "../lib/certificates.js";
import { certbotArgs, renewalCronEntry } from "../steps/certificates.js";

describe("certificate helpers", () => {
	it("keeps only DNS entries of a subject alternative name list", () => {
		expect(parseSubjectAltNames("DNS:Auth.Example.com, IP Address:10.0.0.1, DNS:www.example.com")).toEqual(["auth.example.com", "www.example.com"]);
		expect(parseSubjectAltNames(undefined)).toEqual([]);
	});

	it("counts whole days left", () => {
		expect(daysUntil(new Date("2026-01-31T12:00:00Z"), new Date("2026-01-01T00:00:00Z"))).toBe(30);
		expect(daysUntil(new Date("2026-01-01T00:00:00Z"), new Date("2026-01-02T00:00:00Z"))).toBe(-1);
	});

	it("matches single-label wildcards only", () => {
		expect(domainCovered("Auth.Example.com", ["auth.example.com"])).toBe(true);
		expect(domainCovered("auth.example.com", ["*.example.com"])).toBe(true);
		expect(domainCovered("example.com", ["*.example.com"])).toBe(false);
		expect(domainCovered("a.b.example.com", ["*.example.com"])).toBe(false);
	});

	it("splits domain lists on commas and spaces", () => {
		expect(parseDomainList("auth.example.com, www.example.com  sso.example.com")).toEqual(["auth.example.com", "www.example.com", "sso.example.com"]);
		expect(parseDomainList("")).toEqual([]);
	});

	it("splits a chain into PEM blocks", () => {
		const block = "-----BEGIN CERTIFICATE-----\nAAAA\n-----END CERTIFICATE-----";
		expect(splitPemChain(`${block}\n${block}\n`)).toEqual([block, block]);
	});

	it("rejects a chain file without certificates", () => {
		expect(checkCertificate({ chainPem: "not a pem", keyPem: "", domains: ["auth.example.com"], minDaysValid: 30 })).toEqual({
			valid: false,
			reason: "no certificate found in chain file",
		});
	});

	it("rejects an unparseable certificate", () => {
		const result = checkCertificate({
			chainPem: "-----BEGIN CERTIFICATE-----\nAAAA\n-----END CERTIFICATE-----",
			keyPem: "",
			domains: ["auth.example.com"],
			minDaysValid: 30,
		});
		expect(result.valid).toBe(false);
		expect(result.reason).toMatch(/^unreadable certificate: /);
	});
});

describe("checkCertificate on issued certificates", () => {
	// Leaf for auth.example.com and www.example.com, signed by a test root valid until 2126
	const fixtures = join(dirname(fileURLToPath(import.meta.url)), "fixtures", "certs");
	const pem = (name: string) => readFileSync(join(fixtures, name), "utf-8");
	const base = { chainPem: pem("fullchain.pem"), keyPem: pem("privkey.pem"), domains: ["auth.example.com"], minDaysValid: 30 };

	it("accepts a matching certificate, key and chain", () => {
		const result = checkCertificate({ ...base, now: new Date("2027-01-01T00:00:00Z") });

		expect(result.valid).toBe(true);
		expect(result.reason).toBeUndefined();
		expect(result.expiresAt?.getUTCFullYear()).toBe(2126);
	});

	it("rejects a certificate close to expiry", () => {
		const result = checkCertificate({ ...base, now: new Date("2126-09-01T00:00:00Z") });

		expect(result).toMatchObject({ valid: false, reason: "expires in 24 days (minimum 30)", daysLeft: 24 });
	});

	it("rejects a certificate for other domains", () => {
		const result = checkCertificate({ ...base, domains: ["sso.example.com"] });

		expect(result).toMatchObject({ valid: false, reason: "none of sso.example.com in subject alternative names" });
	});

	it("rejects a private key from another pair", () => {
		const result = checkCertificate({ ...base, keyPem: pem("other-privkey.pem") });

		expect(result).toMatchObject({ valid: false, reason: "private key does not match certificate" });
	});

	it("rejects a chain whose issuer did not sign the leaf", () => {
		const result = checkCertificate({ ...base, chainPem: pem("wrong-issuer-chain.pem") });

		expect(result).toMatchObject({ valid: false, reason: "chain broken at certificate 1" });
	});
});

describe("certbot invocation", () => {
	it("requests every domain and the staging CA when asked", () => {
		expect(certbotArgs(["auth.example.com", "www.example.com"], "ops@example.com", true)).toEqual([
			"certonly",
			"--standalone",
			"--non-interactive",
			"--agree-tos",
			"--email=ops@example.com",
			"-d",
			"auth.example.com",
			"-d",
			"www.example.com",
			"--test-cert",
			"--preferred-challenges",
			"http",
		]);
		expect(certbotArgs(["auth.example.com"], "ops@example.com", false)).not.toContain("--test-cert");
	});

	it("renews monthly and refreshes Keycloak's copy", () => {
		expect(renewalCronEntry("/etc/letsencrypt/live/auth.example.com", "/opt/keycloak/certs")).toBe(
			'0 0 1 * * root certbot renew --quiet --deploy-hook "cp -L /etc/letsencrypt/live/auth.example.com/fullchain.pem /opt/keycloak/certs/tls.crt && cp -L /etc/letsencrypt/live/auth.example.com/privkey.pem /opt/keycloak/certs/tls.key && docker restart keycloak"\n',
		);
	});
});
