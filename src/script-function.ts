// Compiled script functions
// A translated top-level function, callable from later functions of the
// same module and convertible to the interchange model

import type { Diagnostic } from "./errors.js";
import type { CalledFunction, IRFunction } from "./ir/builder.js";
import type { FunctionProto, GraphProto, ModelProto } from "./ir/model.js";
import { Op, type Opset, type ParamSchema } from "./schemas/opset.js";
import type { OpSchema } from "./schemas/registry.js";

export class ScriptFunction implements CalledFunction {
	readonly kind = "script-function";

	constructor(
		readonly opset: Opset,
		readonly irFunction: IRFunction,
		readonly warnings: readonly Diagnostic[] = [],
	) {}

	get name(): string {
		return this.irFunction.name;
	}

	/**
	 * Every input gets its own type variable, so calls never unify
	 * arguments across parameters.
	 */
	get opSchema(): OpSchema {
		const fn = this.irFunction;
		return {
			name: fn.name,
			domain: this.opset.domain,
			sinceVersion: this.opset.version,
			inputs: fn.inputs.map((v) => ({
				name: v.name,
				typeStr: `T_${v.name}`,
				option: "Single" as const,
				isHomogeneous: true,
			})),
			outputs: fn.outputs.map((v) => ({
				name: v.name,
				typeStr: `T_${v.name}`,
				option: "Single" as const,
				isHomogeneous: true,
			})),
			attributes: fn.attrParams.map((p) => ({
				name: p.name,
				type: p.type,
				required: p.default === undefined,
				default: p.default,
			})),
		};
	}

	/**
	 * Parameters in declaration order, inputs and attributes interleaved.
	 */
	paramSchemas(): ParamSchema[] {
		return this.irFunction.parameters.map((p) => ("type" in p
			? {
				name: p.name,
				isInput: false,
				isVariadicInput: false,
				required: p.default === undefined,
				default: p.default,
				type: p.type,
			}
			: { name: p.name, isInput: true, isVariadicInput: false, required: true }));
	}

	/**
	 * The operator nodes calling this function are emitted with.
	 */
	asOp(): Op {
		return new Op(this.opset, this.name);
	}

	toFunctionProto(): FunctionProto {
		return this.irFunction.toFunctionProto();
	}

	toGraphProto(): GraphProto {
		return this.irFunction.toGraphProto();
	}

	toModelProto(options: { irVersion?: number; producerName?: string } = {}): ModelProto {
		return this.irFunction.toModelProto(options);
	}

	toString(): string {
		return `<script function ${this.opset.domain}.${this.name}>`;
	}
}
