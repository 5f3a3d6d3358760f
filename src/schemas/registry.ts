// Operator schema registry
// Formal-parameter descriptions of operators, keyed by (domain, name)

import { readFileSync } from "node:fs";
import type { PyValue } from "../ast/types.js";
import { formatValidationErrors, GraphScriptError } from "../errors.js";
import type { AttributeType } from "../types/element-types.js";
import { validateOpsetDocument } from "../validator.js";
import type { AttributeSchemaEntry, FormalParameterEntry, OpsetDocument } from "../zod-schemas.js";

//==============================================================================
// Schema Types
//==============================================================================

export type FormalOption = "Single" | "Optional" | "Variadic";

export interface FormalParameter {
	name: string;
	/** A type variable such as `T`, or a concrete type such as `tensor(int64)` */
	typeStr: string;
	option: FormalOption;
	isHomogeneous: boolean;
}

export interface AttributeSchema {
	name: string;
	type: AttributeType;
	required: boolean;
	default?: PyValue | undefined;
}

export interface OpSchema {
	name: string;
	domain: string;
	sinceVersion: number;
	inputs: FormalParameter[];
	outputs: FormalParameter[];
	attributes: AttributeSchema[];
}

/**
 * Concrete type strings always carry a parenthesized element type.
 */
export function isTypeVariable(typeStr: string): boolean {
	return !typeStr.includes("(");
}

//==============================================================================
// Registry
//==============================================================================

export class SchemaRegistry {
	// Versions of each operator, ascending by sinceVersion
	private readonly schemas = new Map<string, OpSchema[]>();

	register(schema: OpSchema): void {
		const key = registryKey(schema.domain, schema.name);
		const versions = this.schemas.get(key) ?? [];
		const filtered = versions.filter((s) => s.sinceVersion !== schema.sinceVersion);
		filtered.push(schema);
		filtered.sort((a, b) => a.sinceVersion - b.sinceVersion);
		this.schemas.set(key, filtered);
	}

	/**
	 * Latest schema for the operator not newer than `version`; the latest
	 * overall when no version is given.
	 */
	get(domain: string, name: string, version?: number): OpSchema | undefined {
		const versions = this.schemas.get(registryKey(domain, name));
		if (versions === undefined) return undefined;
		if (version === undefined) return versions[versions.length - 1];
		let found: OpSchema | undefined;
		for (const schema of versions) {
			if (schema.sinceVersion <= version) found = schema;
		}
		return found;
	}

	has(domain: string, name: string, version?: number): boolean {
		return this.get(domain, name, version) !== undefined;
	}

	names(domain: string): string[] {
		const prefix = registryKey(domain, "");
		return [...this.schemas.keys()]
			.filter((key) => key.startsWith(prefix))
			.map((key) => key.slice(prefix.length))
			.sort();
	}

	/**
	 * Register every operator of a validated opset document.
	 */
	loadDocument(doc: OpsetDocument): void {
		for (const op of doc.operators) {
			this.register({
				name: op.name,
				domain: doc.domain,
				sinceVersion: op.since,
				inputs: op.inputs.map(toFormal),
				outputs: op.outputs.map(toFormal),
				attributes: op.attributes.map(toAttributeSchema),
			});
		}
	}
}

function registryKey(domain: string, name: string): string {
	return `${domain}::${name}`;
}

function toFormal(entry: FormalParameterEntry): FormalParameter {
	return {
		name: entry.name,
		typeStr: entry.type,
		option: entry.option,
		isHomogeneous: entry.homogeneous,
	};
}

function toAttributeSchema(entry: AttributeSchemaEntry): AttributeSchema {
	const schema: AttributeSchema = { name: entry.name, type: entry.type, required: entry.required };
	if (entry.default !== undefined) schema.default = toDefaultValue(entry);
	return schema;
}

// Integer-typed defaults become script ints
function toDefaultValue(entry: AttributeSchemaEntry): PyValue {
	const value = entry.default;
	if (entry.type === "INT" && typeof value === "number") return BigInt(value);
	if (entry.type === "INTS" && Array.isArray(value)) {
		return Array.from<number | string, bigint | string>(value, (v) => (typeof v === "number" ? BigInt(v) : v));
	}
	return value ?? null;
}

//==============================================================================
// Loading
//==============================================================================

function parseOpsetDocument(doc: unknown, source: string): OpsetDocument {
	const result = validateOpsetDocument(doc);
	if (!result.valid || result.value === undefined) {
		throw GraphScriptError.configuration(
			`Invalid operator schema file ${source}: ${formatValidationErrors(result.errors)}`,
		);
	}
	return result.value;
}

/**
 * Build a registry from a JSON opset document (already parsed).
 */
export function registryFromDocument(doc: unknown, source = "<document>"): SchemaRegistry {
	const registry = new SchemaRegistry();
	registry.loadDocument(parseOpsetDocument(doc, source));
	return registry;
}

/**
 * Read an opset document from disk into `registry` (a new one by default).
 */
export function loadRegistryFile(path: string | URL, registry = new SchemaRegistry()): SchemaRegistry {
	const source = String(path);
	let doc: unknown;
	try {
		doc = JSON.parse(readFileSync(path, "utf-8"));
	} catch (e) {
		throw GraphScriptError.configuration(
			`Cannot read operator schema file ${source}: ${e instanceof Error ? e.message : String(e)}`,
		);
	}
	registry.loadDocument(parseOpsetDocument(doc, source));
	return registry;
}

const DEFAULT_OPSET_FILE = new URL("../../data/default-opset.json", import.meta.url);

let defaultInstance: SchemaRegistry | undefined;

/**
 * The registry of default-domain operators shipped with the package.
 */
export function defaultRegistry(): SchemaRegistry {
	defaultInstance ??= loadRegistryFile(DEFAULT_OPSET_FILE);
	return defaultInstance;
}
