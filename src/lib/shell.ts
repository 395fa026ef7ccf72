import { execFile, spawn } from "node:child_process";
import { createWriteStream } from "node:fs";

export interface ExecResult {
	stdout: string;
	stderr: string;
	exitCode: number;
}

export interface ExecOptions {
	stdin?: string;
	timeout?: number;
	cwd?: string;
	/** Merged over the current process environment. */
	env?: Record<string, string>;
}

/** Long running installs (apt-get, docker pull, certbot). */
export const LONG_TIMEOUT = 10 * 60_000;

/**
 * Execute a command and return stdout/stderr/exitCode.
 * Never throws on a non-zero exit: callers check exitCode.
 */
export function exec(command: string, args: string[] = [], options?: ExecOptions): Promise<ExecResult> {
	return new Promise((resolve) => {
		const child = execFile(
			command,
			args,
			{
				timeout: options?.timeout ?? 30_000,
				maxBuffer: 10 * 1024 * 1024,
				cwd: options?.cwd,
				env: options?.env ? { ...process.env, ...options.env } : process.env,
			},
			(error, stdout, stderr) => {
				resolve({
					stdout: stdout.toString().trim(),
					stderr: stderr.toString().trim() || (error && typeof error.code === "string" ? error.message : ""),
					exitCode: error ? (typeof error.code === "number" ? error.code : 1) : 0,
				});
			},
		);

		if (options?.stdin !== undefined && child.stdin) {
			child.stdin.write(options.stdin);
			child.stdin.end();
		}
	});
}

/**
 * Execute a command and throw if it fails.
 */
export async function execOrThrow(command: string, args: string[] = [], options?: ExecOptions): Promise<string> {
	const result = await exec(command, args, options);
	if (result.exitCode !== 0) {
		throw new Error(`Command failed: ${command} ${args.join(" ")}\n${result.stderr || result.stdout}`);
	}
	return result.stdout;
}

/**
 * Stream a command's stdout into a file (dumps larger than exec's buffer).
 * Resolves with the exit code and collected stderr; rejects when the command
 * cannot start or the file cannot be written.
 */
export function execToFile(command: string, args: string[], filePath: string, mode = 0o600): Promise<ExecResult> {
	return new Promise((resolve, reject) => {
		const out = createWriteStream(filePath, { mode });
		const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
		let stderr = "";
		let exitCode = 1;
		let failed = false;

		const fail = (err: Error): void => {
			if (failed) return;
			failed = true;
			child.kill();
			out.destroy();
			reject(err);
		};

		// The file is closed once the process has exited, so the exit code is known on finish
		child.stdout.pipe(out, { end: false });
		child.stderr.on("data", (chunk: Buffer) => {
			stderr += chunk.toString();
		});
		out.on("error", fail);
		out.on("finish", () => {
			if (!failed) resolve({ stdout: "", stderr: stderr.trim(), exitCode });
		});
		child.on("error", fail);
		child.on("close", (code) => {
			exitCode = code ?? 1;
			if (!failed) out.end();
		});
	});
}

/**
 * Check if a CLI tool is available on PATH.
 */
export async function commandExists(command: string): Promise<boolean> {
	const result = await exec("which", [command]);
	return result.exitCode === 0;
}

/**
 * Returns install instructions for a CLI tool on hosts without apt.
 */
export function installHint(tool: string): string {
	const hints: Record<string, string> = {
		docker: "https://docs.docker.com/engine/install/",
		certbot: "https://certbot.eff.org/instructions",
		openssl: "install the openssl package with your distribution's package manager",
		git: "install the git package with your distribution's package manager",
	};
	return hints[tool] ?? `Install ${tool} from its official website`;
}
