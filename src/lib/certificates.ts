import { createPrivateKey, X509Certificate } from "node:crypto";

export interface CertificateCheck {
	valid: boolean;
	/** Why the certificate was rejected. */
	reason?: string;
	expiresAt?: Date;
	daysLeft?: number;
}

export interface CertificateCheckInput {
	/** fullchain.pem: leaf first, then intermediates. */
	chainPem: string;
	keyPem: string;
	domains: string[];
	minDaysValid: number;
	now?: Date;
}

const PEM_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;
const DAY_MS = 24 * 60 * 60 * 1000;

export function splitPemChain(pem: string): string[] {
	return pem.match(PEM_BLOCK) ?? [];
}

/** "DNS:a.example, DNS:b.example, IP Address:10.0.0.1" → ["a.example", "b.example"] */
export function parseSubjectAltNames(san: string | undefined): string[] {
	if (!san) return [];
	return san
		.split(",")
		.map((part) => part.trim())
		.filter((part) => part.startsWith("DNS:"))
		.map((part) => part.slice(4).toLowerCase());
}

/** Whole days until `expiresAt`, rounded down. */
export function daysUntil(expiresAt: Date, now: Date): number {
	return Math.floor((expiresAt.getTime() - now.getTime()) / DAY_MS);
}

/** Exact match, or a single-label wildcard (*.example.com covers a.example.com). */
export function domainCovered(domain: string, names: string[]): boolean {
	const wanted = domain.toLowerCase();
	return names.some((name) => name === wanted || (name.startsWith("*.") && wanted.split(".").slice(1).join(".") === name.slice(2)));
}

/** "a.example, b.example" → ["a.example", "b.example"] */
export function parseDomainList(value: string): string[] {
	return value
		.split(/[,\s]+/)
		.map((d) => d.trim())
		.filter(Boolean);
}

/**
 * Accept a certificate only if it is not near expiry, covers one of the
 * domains, pairs with the private key and has a verifiable chain.
 */
export function checkCertificate(input: CertificateCheckInput): CertificateCheck {
	const blocks = splitPemChain(input.chainPem);
	if (blocks.length === 0) return { valid: false, reason: "no certificate found in chain file" };

	let chain: X509Certificate[];
	try {
		chain = blocks.map((block) => new X509Certificate(block));
	} catch (err) {
		return { valid: false, reason: `unreadable certificate: ${err instanceof Error ? err.message : String(err)}` };
	}
	const [leaf] = chain;
	if (!leaf) return { valid: false, reason: "no certificate found in chain file" };

	const expiresAt = new Date(leaf.validTo);
	const daysLeft = daysUntil(expiresAt, input.now ?? new Date());
	if (daysLeft <= input.minDaysValid) {
		return { valid: false, reason: `expires in ${daysLeft} days (minimum ${input.minDaysValid})`, expiresAt, daysLeft };
	}

	const names = parseSubjectAltNames(leaf.subjectAltName);
	if (!input.domains.some((domain) => domainCovered(domain, names))) {
		return { valid: false, reason: `none of ${input.domains.join(", ")} in subject alternative names`, expiresAt, daysLeft };
	}

	try {
		if (!leaf.checkPrivateKey(createPrivateKey(input.keyPem))) {
			return { valid: false, reason: "private key does not match certificate", expiresAt, daysLeft };
		}
	} catch (err) {
		return { valid: false, reason: `unreadable private key: ${err instanceof Error ? err.message : String(err)}`, expiresAt, daysLeft };
	}

	for (let i = 0; i < chain.length - 1; i++) {
		const cert = chain[i];
		const issuer = chain[i + 1];
		if (!cert || !issuer) break;
		if (!cert.checkIssued(issuer) || !cert.verify(issuer.publicKey)) {
			return { valid: false, reason: `chain broken at certificate ${i + 1}`, expiresAt, daysLeft };
		}
	}

	return { valid: true, expiresAt, daysLeft };
}
