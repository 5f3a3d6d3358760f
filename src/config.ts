// Configuration file
// Optional JSON file the CLI reads defaults from; flags given on the
// command line take precedence

import { readFile } from "node:fs/promises";
import type { PyValue } from "./ast/types.js";
import { formatValidationErrors, GraphScriptError } from "./errors.js";
import { Opset } from "./schemas/opset.js";
import type { ConfigDocument } from "./zod-schemas.js";
import { validateConfig } from "./validator.js";
import type { GlobalValue } from "./values.js";

export const DEFAULT_CONFIG_FILE = "graphscript.config.json";

export type OutputFormat = "text" | "json";

export interface ResolvedConfig {
	/** Default-domain version; the script's own choice when absent */
	opsetVersion: number | undefined;
	/** Domain compiled functions are registered in */
	domain: string;
	format: OutputFormat;
	verbose: boolean;
	constants: Map<string, GlobalValue>;
}

/**
 * JSON has a single number type; integral values are read as script ints.
 */
export function jsonToPyValue(value: boolean | number | string | (boolean | number | string)[]): PyValue {
	if (Array.isArray(value)) return value.map(jsonToPyValue);
	if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
	return value;
}

export function resolveConfig(doc: ConfigDocument = {}): ResolvedConfig {
	const constants = new Map<string, GlobalValue>();
	for (const [name, value] of Object.entries(doc.constants ?? {})) {
		constants.set(name, jsonToPyValue(value));
	}
	return {
		opsetVersion: doc.opsetVersion,
		domain: doc.domain ?? "this",
		format: doc.format ?? "text",
		verbose: doc.verbose ?? false,
		constants,
	};
}

export function parseConfig(doc: unknown, source = "<config>"): ResolvedConfig {
	const result = validateConfig(doc);
	if (!result.valid || result.value === undefined) {
		throw GraphScriptError.configuration(`Invalid configuration ${source}: ${formatValidationErrors(result.errors)}`);
	}
	return resolveConfig(result.value);
}

export async function loadConfigFile(path: string): Promise<ResolvedConfig> {
	let doc: unknown;
	try {
		doc = JSON.parse(await readFile(path, "utf-8"));
	} catch (e) {
		throw GraphScriptError.configuration(
			`Cannot read configuration ${path}: ${e instanceof Error ? e.message : String(e)}`,
		);
	}
	return parseConfig(doc, path);
}

export function defaultOpsetOf(config: ResolvedConfig): Opset | undefined {
	return config.opsetVersion === undefined ? undefined : new Opset("", config.opsetVersion);
}
