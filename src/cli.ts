#!/usr/bin/env node
// graphscript CLI
// Compiles script files and prints their functions as text, as JSON
// models, or as model digests

import { existsSync, realpathSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { expandPaths, type Options, parseArgs, readScriptFile } from "./cli-utils.js";
import { DEFAULT_CONFIG_FILE, defaultOpsetOf, loadConfigFile, type ResolvedConfig, resolveConfig } from "./config.js";
import { GraphScriptError } from "./errors.js";
import { printFunction } from "./ir/printer.js";
import { modelDigest, toJson } from "./ir/serialize.js";
import { Opset } from "./schemas/opset.js";
import { compileScript } from "./script.js";
import type { ScriptFunction } from "./script-function.js";

const USAGE = `Usage: graphscript [options] <script...>

Options:
  --format <text|json>     Output format (default: text)
  --digest                 Print the content digest of each model
  --function <name>        Only emit the named function
  --opset <n>              Default-domain version for scripts that pick none
  --domain <name>          Domain of compiled functions (default: this)
  -D, --define NAME=VALUE  Module-level constant visible to scripts
  --config <path>          Configuration file (default: ${DEFAULT_CONFIG_FILE} if present)
  -o, --output <path>      Write to a file instead of stdout
  -v, --verbose            Trace the translation on stderr
  -h, --help               Show this help`;

async function readConfig(options: Options): Promise<ResolvedConfig> {
	if (options.config !== undefined) return loadConfigFile(options.config);
	if (existsSync(DEFAULT_CONFIG_FILE)) return loadConfigFile(DEFAULT_CONFIG_FILE);
	return resolveConfig();
}

/**
 * Command-line flags override the configuration file.
 */
export function mergeOptions(config: ResolvedConfig, options: Options): ResolvedConfig {
	const constants = new Map(config.constants);
	for (const [name, value] of options.defines) constants.set(name, value);
	return {
		opsetVersion: options.opsetVersion ?? config.opsetVersion,
		domain: options.domain ?? config.domain,
		format: options.format ?? config.format,
		verbose: options.verbose || config.verbose,
		constants,
	};
}

function render(fn: ScriptFunction, options: Options, config: ResolvedConfig): string {
	if (options.digest) return `${fn.name} ${modelDigest(fn.toModelProto())}`;
	return config.format === "json" ? toJson(fn.toModelProto()) : printFunction(fn.irFunction);
}

async function compileFile(path: string, options: Options, config: ResolvedConfig): Promise<string[]> {
	const source = await readScriptFile(path);
	try {
		const { functions } = compileScript(source, {
			globals: config.constants,
			thisModule: new Opset(config.domain, 1),
			defaultOpset: defaultOpsetOf(config),
			logger: console,
			verbose: config.verbose,
		});
		const selected = options.functionName === undefined
			? functions
			: functions.filter((f) => f.name === options.functionName);
		return selected.map((fn) => render(fn, options, config));
	} catch (e) {
		if (e instanceof GraphScriptError) throw new Error(`${path}\n${e.format(source)}`, { cause: e });
		throw e;
	}
}

export async function main(args: string[]): Promise<number> {
	const { paths, options } = parseArgs(args);
	if (options.help || paths.length === 0) {
		console.log(USAGE);
		return options.help ? 0 : 1;
	}
	const config = mergeOptions(await readConfig(options), options);

	const outputs: string[] = [];
	for (const path of expandPaths(paths)) {
		outputs.push(...await compileFile(path, options, config));
	}
	const text = outputs.join("\n\n") + "\n";
	if (options.output === undefined) process.stdout.write(text);
	else await writeFile(options.output, text, "utf-8");
	return 0;
}

/**
 * Whether the process was started on the module at `moduleUrl`, directly
 * or through a link such as npm's bin links.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
	if (scriptPath === undefined || !existsSync(scriptPath)) return false;
	return pathToFileURL(realpathSync(scriptPath)).href === moduleUrl;
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
	main(process.argv.slice(2)).then(
		(code) => { process.exitCode = code; },
		(e: unknown) => {
			console.error(e instanceof Error ? e.message : String(e));
			process.exitCode = 1;
		},
	);
}
