import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createRunLogger } from "../lib/logger.js";
import * as ui from "../lib/ui.js";

describe("run log", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "kcdeploy-log-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("writes level, message and fields on one line", () => {
		const logger = createRunLogger(join(dir, "deploy.log"));
		logger.info({ step: "docker_setup" }, "step started");

		expect(readFileSync(logger.filePath, "utf-8")).toMatch(/^\S+Z INFO  step started \{"step":"docker_setup"\}\n$/);
	});

	it("mirrors terminal output without colour codes", () => {
		const logger = createRunLogger(join(dir, "deploy.log"));
		ui.attachLog(logger);

		ui.warn(`Network ${ui.bold("keycloak-network")} still in use`);

		expect(readFileSync(logger.filePath, "utf-8")).toMatch(/^\S+Z WARN  ⚠ Network keycloak-network still in use\n$/);
	});

	it("logs debug lines even when they are not shown", () => {
		const logger = createRunLogger(join(dir, "deploy.log"));
		ui.attachLog(logger);

		ui.debug("attempt 1/10 not ready");

		expect(readFileSync(logger.filePath, "utf-8")).toMatch(/DEBUG attempt 1\/10 not ready\n$/);
	});

	it("strips ANSI sequences", () => {
		expect(ui.stripAnsi("\u001b[1mbold\u001b[22m")).toBe("bold");
	});
});
