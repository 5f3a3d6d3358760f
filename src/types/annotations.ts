// Type annotations
// Values that script type annotations evaluate to, and how they classify
// function parameters into graph inputs and attribute parameters

import { GraphScriptError } from "../errors.js";
import { AttributeType, ElementType, elementTypeName } from "./element-types.js";

//==============================================================================
// Annotation Values
//==============================================================================

/** A tensor dimension: fixed size, symbolic name, or unknown */
export type Dim = bigint | string | null;

export class TensorType {
	readonly kind = "tensor";

	constructor(
		readonly elemType: ElementType,
		readonly shape: readonly Dim[] | null = null,
	) {}

	/**
	 * `FLOAT[N, 3]`: the same element type with a shape.
	 */
	withShape(dims: readonly unknown[]): TensorType {
		if (this.shape !== null) {
			throw GraphScriptError.typeMismatch(`Type ${this.toString()} already has a shape.`);
		}
		return new TensorType(this.elemType, dims.map(toDim));
	}

	toString(): string {
		const name = elementTypeName(this.elemType);
		if (this.shape === null) return name;
		return `${name}[${this.shape.map((d) => (d === null ? "None" : String(d))).join(",")}]`;
	}
}

export type ScalarName = "int" | "float" | "str" | "bool";

export class ScalarType {
	readonly kind = "scalar";

	constructor(readonly name: ScalarName) {}

	toString(): string {
		return this.name;
	}
}

export class SequenceType {
	readonly kind = "sequence";

	constructor(readonly of: TypeAnnotation, readonly spelling = "Sequence") {}

	toString(): string {
		return `${this.spelling}[${this.of.toString()}]`;
	}
}

export class TupleType {
	readonly kind = "tuple";

	constructor(readonly elts: readonly TypeAnnotation[]) {}

	toString(): string {
		return `tuple[${this.elts.map((t) => t.toString()).join(", ")}]`;
	}
}

export class OptionalType {
	readonly kind = "optional";

	constructor(readonly of: TypeAnnotation) {}

	toString(): string {
		return `Optional[${this.of.toString()}]`;
	}
}

export type TypeAnnotation = TensorType | ScalarType | SequenceType | TupleType | OptionalType;

//==============================================================================
// Generic Aliases (List[...], tuple[...], Optional[...])
//==============================================================================

type GenericName = "List" | "list" | "Sequence" | "Tuple" | "tuple" | "Optional";

export class GenericAlias {
	readonly kind = "generic";

	constructor(readonly name: GenericName) {}

	subscript(args: readonly unknown[]): TypeAnnotation {
		const types = args.map((arg) => {
			if (!isTypeAnnotation(arg)) {
				throw GraphScriptError.typeMismatch(`Invalid type argument for ${this.name}.`);
			}
			return arg;
		});
		switch (this.name) {
		case "List":
		case "list":
		case "Sequence":
			return new SequenceType(single(this.name, types), this.name);
		case "Optional":
			return new OptionalType(single(this.name, types));
		case "Tuple":
		case "tuple":
			return new TupleType(types);
		}
	}

	toString(): string {
		return this.name;
	}
}

function single(name: string, types: TypeAnnotation[]): TypeAnnotation {
	const [first] = types;
	if (first === undefined || types.length !== 1) {
		throw GraphScriptError.arity(`${name}[...] takes exactly one type argument.`);
	}
	return first;
}

function toDim(value: unknown): Dim {
	if (typeof value === "bigint" || typeof value === "string" || value === null) return value;
	throw GraphScriptError.typeMismatch(`Invalid dimension ${String(value)}.`);
}

export function isTypeAnnotation(value: unknown): value is TypeAnnotation {
	return value instanceof TensorType || value instanceof ScalarType
		|| value instanceof SequenceType || value instanceof TupleType
		|| value instanceof OptionalType;
}

//==============================================================================
// Classification
//==============================================================================

/**
 * Attribute-typed annotations make a parameter a compile-time attribute
 * rather than a graph input.
 */
export function isAttrType(type: TypeAnnotation): boolean {
	if (type instanceof ScalarType) return true;
	return type instanceof SequenceType && type.of instanceof ScalarType && type.of.name !== "bool";
}

export function isValueType(type: TypeAnnotation): boolean {
	if (type instanceof TensorType) return true;
	if (type instanceof OptionalType) return isValueType(type.of);
	return type instanceof SequenceType && isValueType(type.of);
}

export function isValidType(type: unknown): type is TypeAnnotation {
	if (!isTypeAnnotation(type)) return false;
	if (type instanceof TupleType) return type.elts.every((t) => isValidType(t));
	return isAttrType(type) || isValueType(type);
}

export function pytypeToAttrtype(type: TypeAnnotation): AttributeType {
	if (type instanceof ScalarType) {
		switch (type.name) {
		case "int":
		case "bool":
			return AttributeType.INT;
		case "float":
			return AttributeType.FLOAT;
		case "str":
			return AttributeType.STRING;
		}
	}
	if (type instanceof SequenceType && type.of instanceof ScalarType) {
		switch (type.of.name) {
		case "int":
			return AttributeType.INTS;
		case "float":
			return AttributeType.FLOATS;
		case "str":
			return AttributeType.STRINGS;
		case "bool":
			break;
		}
	}
	return AttributeType.UNDEFINED;
}

/**
 * Return annotations list one type per output; `tuple[...]` declares several.
 */
export function getReturnTypes(type: TypeAnnotation): readonly TypeAnnotation[] {
	return type instanceof TupleType ? type.elts : [type];
}

//==============================================================================
// Builtin Type Names
//==============================================================================

/**
 * Names that type annotations may refer to without any import.
 */
export function typeGlobals(): Map<string, TypeAnnotation | GenericAlias> {
	const globals = new Map<string, TypeAnnotation | GenericAlias>();
	for (const [name, code] of Object.entries(ElementType)) {
		if (code !== ElementType.UNDEFINED) globals.set(name, new TensorType(code));
	}
	for (const name of ["int", "float", "str", "bool"] as const) {
		globals.set(name, new ScalarType(name));
	}
	for (const name of ["List", "list", "Sequence", "Tuple", "tuple", "Optional"] as const) {
		globals.set(name, new GenericAlias(name));
	}
	return globals;
}
