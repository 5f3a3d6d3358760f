// Runtime tensors
// Minimal typed values literals are promoted to when a function runs
// uncompiled

import type { PyValue } from "../ast/types.js";
import { GraphScriptError } from "../errors.js";
import {
	ElementType,
	elementTypeName,
	isFloatElementType,
	isIntegerElementType,
} from "../types/element-types.js";

export type TensorElement = boolean | bigint | number | string;

export class Tensor {
	constructor(
		readonly dtype: ElementType,
		readonly dims: readonly number[],
		readonly data: readonly TensorElement[],
	) {
		const size = dims.reduce((a, b) => a * b, 1);
		if (size !== data.length) {
			throw GraphScriptError.typeMismatch(`Tensor of shape [${dims.join(",")}] needs ${size} elements, got ${data.length}.`);
		}
	}

	get rank(): number {
		return this.dims.length;
	}

	/**
	 * Rank-0 or rank-1 tensor of a literal. Without `dtype` the element
	 * type follows the literal; with it, elements are converted. Empty and
	 * mixed lists are rejected either way.
	 */
	static fromPyValue(value: PyValue, dtype?: ElementType): Tensor {
		const elements = Array.isArray(value) ? value : [value];
		const literalType = literalElementType(value);
		const target = dtype ?? literalType;
		const data = elements.map((e) => convertElement(e, target));
		return new Tensor(target, Array.isArray(value) ? [value.length] : [], data);
	}

	toString(): string {
		const body = this.rank === 0 ? String(this.data[0]) : `[${this.data.map(String).join(", ")}]`;
		return `Tensor<${elementTypeName(this.dtype)}>(${body})`;
	}
}

//==============================================================================
// Literal Element Types
//==============================================================================

function scalarElementType(value: PyValue): ElementType {
	switch (typeof value) {
	case "boolean": return ElementType.BOOL;
	case "bigint": return ElementType.INT64;
	case "number": return ElementType.FLOAT;
	case "string": return ElementType.STRING;
	default:
		throw GraphScriptError.typeMismatch(
			`Tensor element of type ${value === null ? "None" : "list"} not supported.`,
		);
	}
}

/**
 * Element type a literal is promoted to: bool to BOOL, int to INT64,
 * float to FLOAT, a list to the type of its elements, which must agree.
 */
export function literalElementType(value: PyValue): ElementType {
	if (!Array.isArray(value)) return scalarElementType(value);
	const [first] = value;
	if (first === undefined) {
		throw GraphScriptError.emptyList("Cannot determine target type for empty list.");
	}
	const type = scalarElementType(first);
	for (const element of value) {
		if (scalarElementType(element) !== type) {
			throw GraphScriptError.typeMismatch("Cannot convert a list with elements of different types to tensor.");
		}
	}
	return type;
}

function convertElement(value: PyValue, dtype: ElementType): TensorElement {
	if (value === null || Array.isArray(value)) {
		throw GraphScriptError.typeMismatch(`Cannot convert ${value === null ? "None" : "a nested list"} to ${elementTypeName(dtype)}.`);
	}
	if (dtype === ElementType.BOOL) {
		return typeof value === "string" ? value.length > 0 : Boolean(value);
	}
	if (dtype === ElementType.STRING) return String(value);
	if (isIntegerElementType(dtype)) {
		if (typeof value === "bigint") return value;
		if (typeof value === "boolean") return value ? 1n : 0n;
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw GraphScriptError.typeMismatch(`Cannot convert ${value} to ${elementTypeName(dtype)}.`);
			}
			return BigInt(Math.trunc(value));
		}
		throw GraphScriptError.typeMismatch(`Cannot convert '${value}' to ${elementTypeName(dtype)}.`);
	}
	if (isFloatElementType(dtype)) {
		if (typeof value === "string") {
			throw GraphScriptError.typeMismatch(`Cannot convert '${value}' to ${elementTypeName(dtype)}.`);
		}
		const n = typeof value === "boolean" ? (value ? 1 : 0) : Number(value);
		return dtype === ElementType.FLOAT ? Math.fround(n) : n;
	}
	throw GraphScriptError.typeMismatch(`Unsupported element type ${elementTypeName(dtype)}.`);
}
