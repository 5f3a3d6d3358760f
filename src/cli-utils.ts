/**
 * graphscript CLI Utilities
 *
 * Extracted CLI functions for testability and reusability:
 * - Argument parsing (flags, options with values, subcommands)
 * - `--define NAME=VALUE` constant parsing
 * - Script file discovery and reading
 */

import { readFile } from "node:fs/promises";
import { globSync } from "glob";
import type { PyValue } from "./ast/types.js";
import type { OutputFormat } from "./config.js";

/**
 * CLI options interface
 */
export interface Options {
	verbose: boolean;
	help: boolean;
	/** Print the canonical digest of each model instead of the model */
	digest: boolean;
	format?: OutputFormat;
	config?: string;
	output?: string;
	opsetVersion?: number;
	domain?: string;
	/** Only emit this function */
	functionName?: string;
	defines: [string, PyValue][];
}

/**
 * Parse a literal given on the command line
 *
 * Examples:
 *   "3" → 3n
 *   "0.5" → 0.5
 *   "[1, 2]" → [1n, 2n]
 *   "true" → true
 *   "relu" → "relu"
 */
export function parseLiteral(input: string): PyValue {
	const trimmed = input.trim();
	if (/^[+-]?\d+$/.test(trimmed)) return BigInt(trimmed);
	// JSON covers floats, booleans, null and lists; anything else is a bare string
	let parsed: unknown;
	try {
		parsed = JSON.parse(trimmed);
	} catch {
		return trimmed;
	}
	const value = fromJson(parsed);
	return value === undefined ? trimmed : value;
}

function fromJson(value: unknown): PyValue | undefined {
	if (value === null || typeof value === "boolean" || typeof value === "string") return value;
	if (typeof value === "number") return Number.isInteger(value) ? BigInt(value) : value;
	if (Array.isArray(value)) {
		const items = value.map(fromJson);
		return items.every((v) => v !== undefined) ? items.filter((v): v is PyValue => v !== undefined) : undefined;
	}
	return undefined;
}

/**
 * Parse `NAME=VALUE`; null when there is no `=` or the name is empty
 */
export function parseDefine(input: string): [string, PyValue] | null {
	const eq = input.indexOf("=");
	if (eq <= 0) return null;
	return [input.slice(0, eq).trim(), parseLiteral(input.slice(eq + 1))];
}

/**
 * Expand script paths and glob patterns, keeping the given order and
 * dropping duplicates
 */
export function expandPaths(patterns: string[], cwd = process.cwd()): string[] {
	const seen = new Set<string>();
	for (const pattern of patterns) {
		const matches = /[*?[{]/.test(pattern) ? globSync(pattern, { cwd, nodir: true }).sort() : [pattern];
		for (const match of matches) seen.add(match);
	}
	return [...seen];
}

export async function readScriptFile(filePath: string): Promise<string> {
	return readFile(filePath, "utf-8");
}

/**
 * Parse command-line arguments
 *
 * Supports:
 *   - Positional script paths (globs allowed)
 *   - Flags: --verbose/-v, --help/-h, --digest
 *   - Options with values: --format <text|json>, --config <path>,
 *     --output/-o <path>, --opset <n>, --domain <name>, --function <name>,
 *     --define/-D <NAME=VALUE>
 *   - Subcommand style: help, digest
 */
function normalizeArgs(args: string[]): string[] {
	const subcommands: Record<string, string> = {
		help: "--help",
		digest: "--digest",
	};
	return args.flatMap((arg) => {
		const eq = arg.indexOf("=");
		// --opset=18 style
		if (arg.startsWith("--") && eq > 0) return [arg.slice(0, eq), arg.slice(eq + 1)];
		return [subcommands[arg] ?? arg];
	});
}

function consumeNextArg(normalized: string[], i: number): string | undefined {
	if (i + 1 < normalized.length) {
		const nextArg = normalized[i + 1];
		if (nextArg && !nextArg.startsWith("-")) return nextArg;
	}
	return undefined;
}

function processFlag(options: Options, arg: string): boolean {
	switch (arg) {
	case "--verbose": case "-v": options.verbose = true; return true;
	case "--help": case "-h": options.help = true; return true;
	case "--digest": options.digest = true; return true;
	default: return false;
	}
}

const VALUE_OPTIONS = new Set(["--format", "--config", "--output", "-o", "--opset", "--domain", "--function", "--define", "-D"]);

function processValueOption(options: Options, arg: string, nextVal: string): void {
	switch (arg) {
	case "--format":
		if (nextVal === "text" || nextVal === "json") options.format = nextVal;
		break;
	case "--config": options.config = nextVal; break;
	case "--output": case "-o": options.output = nextVal; break;
	case "--opset": {
		const version = Number(nextVal);
		if (Number.isInteger(version) && version > 0) options.opsetVersion = version;
		break;
	}
	case "--domain": options.domain = nextVal; break;
	case "--function": options.functionName = nextVal; break;
	case "--define": case "-D": {
		const define = parseDefine(nextVal);
		if (define !== null) options.defines.push(define);
		break;
	}
	}
}

interface ArgContext {
	options: Options;
	normalized: string[];
	i: number;
}

function processArg(ctx: ArgContext, arg: string): { i: number; path?: string } {
	if (processFlag(ctx.options, arg)) return { i: ctx.i };
	if (VALUE_OPTIONS.has(arg)) {
		const nextVal = consumeNextArg(ctx.normalized, ctx.i);
		if (nextVal) { processValueOption(ctx.options, arg, nextVal); return { i: ctx.i + 1 }; }
		return { i: ctx.i };
	}
	return !arg.startsWith("-") ? { i: ctx.i, path: arg } : { i: ctx.i };
}

export function parseArgs(args: string[]): { paths: string[]; options: Options } {
	const normalized = normalizeArgs(args);
	const options: Options = { verbose: false, help: false, digest: false, defines: [] };
	const paths: string[] = [];

	for (let i = 0; i < normalized.length; i++) {
		const arg = normalized[i];
		if (arg === undefined) break;
		const result = processArg({ options, normalized, i }, arg);
		i = result.i;
		if (result.path !== undefined) paths.push(result.path);
	}

	return { paths, options };
}
