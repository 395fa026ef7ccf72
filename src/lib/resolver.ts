import { input, password } from "@inquirer/prompts";
import type { ResolvedEnvironment, VariableSpec } from "../types.js";
import { DeployError } from "./errors.js";
import { readSettings, storable, upsertSetting } from "./settings-file.js";
import * as ui from "./ui.js";

export interface ResolverOptions {
	settingsFile: string;
	/** False in batch mode: defaults are taken without asking. */
	interactive: boolean;
	env?: NodeJS.ProcessEnv;
	/** Replaces the terminal prompt. */
	ask?: (spec: VariableSpec, suggestion: string | undefined) => Promise<string>;
}

/** Ask on the terminal. An empty reply takes the suggestion; without one, empty is refused. */
async function askOnTerminal(spec: VariableSpec, suggestion: string | undefined): Promise<string> {
	const validate = (v: string) => {
		if (v.trim() === "" && suggestion === undefined) return `${spec.name} is required`;
		return storable(v) ? true : "This value cannot be saved: it mixes ', ` and \" (or a \\n sequence)";
	};

	if (spec.secret) {
		const extra = suggestion !== undefined ? ui.dim(" (leave empty to generate)") : "";
		const reply = await password({ message: `${ui.cyan(spec.prompt)}${extra}:`, mask: "*", validate });
		return reply === "" && suggestion !== undefined ? suggestion : reply;
	}

	const reply = await input({ message: `${ui.cyan(spec.prompt)}:`, default: suggestion, validate });
	return reply.trim();
}

/**
 * Looks variables up in order: already resolved / exported → settings file → prompt or default.
 * Values obtained from a prompt or default are written back to the settings file.
 */
export class VariableResolver {
	private readonly resolved = new Map<string, string>();
	private readonly env: NodeJS.ProcessEnv;
	private readonly ask: (spec: VariableSpec, suggestion: string | undefined) => Promise<string>;

	constructor(private readonly options: ResolverOptions) {
		this.env = options.env ?? process.env;
		this.ask = options.ask ?? askOnTerminal;
	}

	/** Record values supplied on the command line as already resolved, and persist them. */
	seed(values: Record<string, string | undefined>): void {
		for (const [name, value] of Object.entries(values)) {
			if (value === undefined || value === "") continue;
			this.resolved.set(name, value);
			upsertSetting(this.options.settingsFile, name, value);
		}
	}

	private known(name: string): string | undefined {
		const cached = this.resolved.get(name);
		if (cached !== undefined) return cached;

		const exported = this.env[name];
		if (exported !== undefined && exported !== "") return exported;

		return readSettings(this.options.settingsFile)[name];
	}

	async resolve(spec: VariableSpec): Promise<string> {
		const existing = this.known(spec.name);
		if (existing !== undefined) {
			this.resolved.set(spec.name, existing);
			return existing;
		}

		const suggestion = spec.default ?? spec.generate?.();
		let value: string;
		if (this.options.interactive) {
			value = await this.ask(spec, suggestion);
		} else if (suggestion !== undefined) {
			value = suggestion;
		} else {
			throw new DeployError("MissingRequiredVariable", `${spec.name} is required but has no value (${spec.prompt})`, {
				remediation: `Export ${spec.name}, add it to ${this.options.settingsFile}, or run interactively`,
			});
		}

		upsertSetting(this.options.settingsFile, spec.name, value);
		this.resolved.set(spec.name, value);
		ui.debug(`${spec.name} saved to ${this.options.settingsFile}`);
		return value;
	}

	/** Resolve in declaration order; the result holds exactly the declared names. */
	async resolveAll(specs: VariableSpec[]): Promise<ResolvedEnvironment> {
		const out: Record<string, string> = {};
		for (const spec of specs) {
			out[spec.name] = await this.resolve(spec);
		}
		return Object.freeze(out);
	}

	/**
	 * Everything known without asking or persisting. Used by reset and the maintenance
	 * commands, which must work on whatever a previous run left behind.
	 */
	peekAll(specs: VariableSpec[]): ResolvedEnvironment {
		const out: Record<string, string> = {};
		for (const spec of specs) {
			const value = this.known(spec.name) ?? spec.default;
			if (value !== undefined) out[spec.name] = value;
		}
		return Object.freeze(out);
	}

	/** Every value resolved so far in this run. */
	snapshot(): Record<string, string> {
		return Object.fromEntries(this.resolved);
	}
}
