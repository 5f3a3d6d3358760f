// Values and bindings
// What a script name can be bound to during translation

import type { PyValue } from "./ast/types.js";
import type { SourceLocation } from "./errors.js";
import type { IRFunction } from "./ir/builder.js";
import type { ScriptFunction } from "./script-function.js";
import { Op, type Opset } from "./schemas/opset.js";
import type { GenericAlias, TypeAnnotation } from "./types/annotations.js";

//==============================================================================
// Graph Values
//==============================================================================

export const DynamicKind = {
	Input: "Input",
	LoopCarried: "LoopCarried",
	Intermediate: "Intermediate",
	Constant: "Constant",
} as const;

export type DynamicKind = (typeof DynamicKind)[keyof typeof DynamicKind];

/**
 * A runtime value of the graph under construction, known by its value name.
 */
export class Dynamic {
	readonly kind = "dynamic";

	constructor(
		readonly value: string,
		readonly provenance: DynamicKind,
		readonly location?: SourceLocation,
		readonly typeinfo?: TypeAnnotation,
	) {}
}

/**
 * A compile-time attribute parameter of the enclosing function.
 */
export class AttrRef {
	readonly kind = "attr";

	constructor(
		readonly value: string,
		readonly typeinfo: TypeAnnotation,
		readonly location?: SourceLocation,
	) {}
}

//==============================================================================
// Module-level Values
//==============================================================================

/**
 * An imported module: `import graphscript` binds one, attribute access
 * reads its members.
 */
export class Namespace {
	readonly kind = "namespace";

	constructor(readonly name: string, readonly members: ReadonlyMap<string, GlobalValue>) {}

	toString(): string {
		return `<module '${this.name}'>`;
	}
}

export type BuiltinImpl = (args: readonly GlobalValue[], keywords: ReadonlyMap<string, GlobalValue>) => GlobalValue;

/**
 * A callable the literal evaluator may apply to constant arguments.
 */
export class BuiltinFunction {
	readonly kind = "builtin";

	constructor(readonly name: string, readonly impl: BuiltinImpl) {}

	toString(): string {
		return `<built-in function ${this.name}>`;
	}
}

export type GlobalValue =
	| PyValue
	| Opset
	| Op
	| ScriptFunction
	| TypeAnnotation
	| GenericAlias
	| Namespace
	| BuiltinFunction;

export type Globals = Map<string, GlobalValue>;

//==============================================================================
// Scope Values
//==============================================================================

/**
 * Anything a name may resolve to: a local binding of the function being
 * translated, or a module-level value.
 */
export type ScopeValue = Dynamic | AttrRef | IRFunction | GlobalValue;

export function isDynamic(value: ScopeValue | undefined): value is Dynamic {
	return value instanceof Dynamic;
}

export function isAttrRef(value: ScopeValue | undefined): value is AttrRef {
	return value instanceof AttrRef;
}

export function isOp(value: ScopeValue | undefined): value is Op {
	return value instanceof Op;
}

/**
 * Literal values: booleans, numbers, strings, None and lists of them.
 */
export function isPyValue(value: unknown): value is PyValue {
	if (value === null) return true;
	switch (typeof value) {
	case "boolean":
	case "bigint":
	case "number":
	case "string":
		return true;
	default:
		return Array.isArray(value) && value.every(isPyValue);
	}
}

/**
 * Identity of a binding as compared by the captured-variable check.
 */
export function bindingIdentity(value: ScopeValue | undefined): unknown {
	if (value instanceof Dynamic || value instanceof AttrRef) return value.value;
	return value;
}

//==============================================================================
// Translated Expressions
//==============================================================================

/**
 * Result of lowering one expression: the value name holding it, and
 * whether it came from a literal. An empty name marks an omitted optional
 * input.
 */
export interface TranslatedExpr {
	name: string;
	kind: "any" | "const";
}

export const OMITTED: TranslatedExpr = { name: "", kind: "any" };
