// Opsets and operator references
// An opset is a versioned view of one operator domain; an Op names one
// operator of it and exposes the parameter layout calls are checked against.

import type { PyValue } from "../ast/types.js";
import type { AttributeType } from "../types/element-types.js";
import { defaultRegistry, type OpSchema, type SchemaRegistry } from "./registry.js";

//==============================================================================
// Parameter Schemas
//==============================================================================

/**
 * One formal parameter of a callee, inputs first, then attributes.
 */
export interface ParamSchema {
	name: string;
	isInput: boolean;
	isVariadicInput: boolean;
	required: boolean;
	default?: PyValue | undefined;
	/** Attribute type, for attribute parameters */
	type?: AttributeType | undefined;
}

/**
 * Inputs are required unless optional; variadic inputs are required when
 * homogeneous (at least one value).
 */
export function paramSchemasFromOpSchema(schema: OpSchema): ParamSchema[] {
	const params: ParamSchema[] = schema.inputs.map((input) => ({
		name: input.name,
		isInput: true,
		isVariadicInput: input.option === "Variadic",
		required: input.option === "Single" || (input.option === "Variadic" && input.isHomogeneous),
	}));
	for (const attr of schema.attributes) {
		params.push({
			name: attr.name,
			isInput: false,
			isVariadicInput: false,
			required: attr.required,
			default: attr.default,
			type: attr.type,
		});
	}
	return params;
}

//==============================================================================
// Opset
//==============================================================================

export class Opset {
	readonly kind = "opset";

	// Script functions registered in this (custom) domain
	private readonly functions = new Map<string, OpSchema>();

	constructor(
		readonly domain: string,
		readonly version: number,
		readonly registry: SchemaRegistry = defaultRegistry(),
	) {}

	get isDefaultDomain(): boolean {
		return this.domain === "";
	}

	getSchema(name: string): OpSchema | undefined {
		return this.functions.get(name) ?? this.registry.get(this.domain, name, this.version);
	}

	has(name: string): boolean {
		return this.getSchema(name) !== undefined;
	}

	addFunction(schema: OpSchema): void {
		this.functions.set(schema.name, schema);
	}

	op(name: string): Op {
		return new Op(this, name);
	}

	toString(): string {
		return `Opset('${this.domain}', ${this.version})`;
	}
}

//==============================================================================
// Op
//==============================================================================

export class Op {
	readonly kind = "op";
	readonly opSchema: OpSchema | undefined;

	constructor(readonly opset: Opset, readonly name: string) {
		this.opSchema = opset.getSchema(name);
	}

	paramSchemas(): ParamSchema[] | undefined {
		return this.opSchema === undefined ? undefined : paramSchemasFromOpSchema(this.opSchema);
	}

	toString(): string {
		return this.opset.domain === "" ? this.name : `${this.opset.domain}.${this.name}`;
	}
}
