import { DeployError } from "./errors.js";

/** "true", "yes", "1", "on" (any case). */
export function isTrue(value: string | undefined): boolean {
	return /^(true|yes|1|on)$/i.test((value ?? "").trim());
}

/** Positive-or-zero integer variable; anything else is a ValidationFailed. */
export function intValue(env: Readonly<Record<string, string>>, name: string): number {
	const raw = (env[name] ?? "").trim();
	if (!/^\d+$/.test(raw)) {
		throw new DeployError("ValidationFailed", `${name} must be a whole number, got "${raw}"`);
	}
	return Number.parseInt(raw, 10);
}
