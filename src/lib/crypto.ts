import { randomBytes } from "node:crypto";

/** Random service password (database, Keycloak admin, Grafana), base64url encoded. */
export function generatePassword(bytes = 24): string {
	return randomBytes(bytes).toString("base64url");
}
