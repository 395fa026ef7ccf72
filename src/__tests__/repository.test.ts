import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const shell = vi.hoisted(() => ({
	execOrThrow: vi.fn(),
	commandExists: vi.fn(),
}));

vi.mock("../lib/shell.js", async (importOriginal) => {
	const actual = await importOriginal<typeof import("../lib/shell.js")>();
	return { ...actual, execOrThrow: shell.execOrThrow, commandExists: shell.commandExists };
});

import { syncRepository } from "../lib/repository.js";

const REPO = "https://git.example.com/ops/keycloak-deploy.git";

describe("syncRepository", () => {
	let dir: string;
	let target: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "kcdeploy-repo-"));
		target = join(dir, "install");
		shell.execOrThrow.mockResolvedValue("");
		shell.commandExists.mockResolvedValue(true);
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("does nothing with --no-clone", async () => {
		expect(await syncRepository({ repoUrl: REPO, dir: target, clone: false, update: true })).toBe("skipped");
		expect(shell.execOrThrow).not.toHaveBeenCalled();
	});

	it("clones into a missing directory", async () => {
		expect(await syncRepository({ repoUrl: REPO, dir: target, clone: true, update: false })).toBe("cloned");
		expect(shell.execOrThrow).toHaveBeenCalledWith("git", ["clone", REPO, target], expect.anything());
	});

	it("pulls an existing checkout only with --update", async () => {
		mkdirSync(join(target, ".git"), { recursive: true });

		expect(await syncRepository({ repoUrl: REPO, dir: target, clone: true, update: false })).toBe("unchanged");
		expect(await syncRepository({ repoUrl: REPO, dir: target, clone: true, update: true })).toBe("updated");
		expect(shell.execOrThrow).toHaveBeenCalledTimes(1);
		expect(shell.execOrThrow).toHaveBeenCalledWith("git", ["-C", target, "pull", "--ff-only"], expect.anything());
	});

	it("never clones over existing files", async () => {
		mkdirSync(target);
		writeFileSync(join(target, ".env"), "KEYCLOAK_DOMAIN=auth.example.com\n");

		expect(await syncRepository({ repoUrl: REPO, dir: target, clone: true, update: false })).toBe("skipped");
		expect(shell.execOrThrow).not.toHaveBeenCalled();
	});

	it("skips without a repository URL and does not need git", async () => {
		shell.commandExists.mockResolvedValue(false);

		expect(await syncRepository({ dir: target, clone: true, update: false })).toBe("skipped");
	});

	it("needs git before cloning", async () => {
		shell.commandExists.mockResolvedValue(false);

		await expect(syncRepository({ repoUrl: REPO, dir: target, clone: true, update: false })).rejects.toMatchObject({ kind: "ExternalToolUnavailable" });
	});
});
