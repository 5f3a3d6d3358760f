// Graph assembly
// In-progress functions and graphs built up statement by statement, and
// their conversion to the interchange model

import type { PyValue } from "../ast/types.js";
import { GraphScriptError, type SourceLocation } from "../errors.js";
import type { Op } from "../schemas/opset.js";
import {
	OptionalType,
	SequenceType,
	TensorType,
	type TypeAnnotation,
} from "../types/annotations.js";
import { AttributeType } from "../types/element-types.js";
import type { ScopeValue } from "../values.js";
import type {
	AttributeProto,
	FunctionProto,
	GraphProto,
	ModelProto,
	NodeProto,
	OperatorSetIdProto,
	TensorProto,
	TypeProto,
	ValueInfoProto,
} from "./model.js";

//==============================================================================
// Building Blocks
//==============================================================================

export interface IRVar {
	name: string;
	typeinfo?: TypeAnnotation | undefined;
	location?: SourceLocation | undefined;
}

export interface IRAttributeParameter {
	name: string;
	type: AttributeType;
	default?: PyValue | undefined;
}

/**
 * An attribute of a node. Graph-valued attributes keep the function they
 * were built from so opset imports can be collected through them.
 */
export interface IRAttributeValue {
	proto: AttributeProto;
	subgraph?: IRFunction | undefined;
}

/**
 * A function that a node calls by name and that must ship with the model.
 */
export interface CalledFunction {
	readonly name: string;
	toFunctionProto(): FunctionProto;
}

/**
 * An outer-scope name a nested function read, with its binding at the
 * point of definition.
 */
export interface CapturedVariable {
	name: string;
	binding: ScopeValue | undefined;
}

export class IRStmt {
	constructor(
		readonly outputs: readonly string[],
		readonly callee: Op,
		readonly inputs: readonly string[],
		readonly attrs: readonly IRAttributeValue[],
		readonly subFunctions: ReadonlyMap<string, FunctionProto> = new Map(),
	) {}

	toNodeProto(): NodeProto {
		return {
			opType: this.callee.name,
			domain: this.callee.opset.domain,
			input: [...this.inputs],
			output: [...this.outputs],
			attribute: this.attrs.map((a) => a.proto),
		};
	}
}

//==============================================================================
// IRFunction
//==============================================================================

export class IRFunction {
	readonly kind = "function";
	readonly outputs: IRVar[] = [];
	readonly stmts: IRStmt[] = [];
	readonly calledFunctions = new Map<string, CalledFunction>();
	readonly nestedFunctions = new Map<string, IRFunction>();
	/** Every value name some statement of this function writes */
	readonly assignedNames = new Set<string>();
	outerScopeVariables: CapturedVariable[] = [];
	docstring = "";

	// Inputs and attribute parameters in declaration order
	private readonly orderedInputsAndAttrs: (IRVar | IRAttributeParameter)[] = [];

	constructor(readonly name: string, readonly domain = "") {}

	get inputs(): IRVar[] {
		return this.orderedInputsAndAttrs.filter(isIRVar);
	}

	get attrParams(): IRAttributeParameter[] {
		return this.orderedInputsAndAttrs.filter((p): p is IRAttributeParameter => !isIRVar(p));
	}

	/**
	 * Parameters in declaration order, inputs and attributes interleaved.
	 */
	get parameters(): readonly (IRVar | IRAttributeParameter)[] {
		return this.orderedInputsAndAttrs;
	}

	appendInput(v: IRVar): void {
		this.orderedInputsAndAttrs.push(v);
	}

	appendOutput(v: IRVar): void {
		this.outputs.push(v);
	}

	appendStmt(stmt: IRStmt): void {
		this.stmts.push(stmt);
		for (const name of stmt.outputs) this.assignedNames.add(name);
	}

	addAttrParameter(param: IRAttributeParameter): void {
		this.orderedInputsAndAttrs.push(param);
	}

	addNestedFunction(fn: IRFunction): void {
		this.nestedFunctions.set(fn.name, fn);
	}

	addCalledFunction(fn: CalledFunction): void {
		this.calledFunctions.set(fn.name, fn);
	}

	//--------------------------------------------------------------------------
	// Conversion
	//--------------------------------------------------------------------------

	/**
	 * Domains used by this function's nodes, including those of subgraphs.
	 */
	opsetImports(): Map<string, number> {
		const imports = new Map<string, number>();
		for (const stmt of this.stmts) {
			const { domain, version } = stmt.callee.opset;
			if (!imports.has(domain)) imports.set(domain, version);
			for (const attr of stmt.attrs) {
				if (attr.subgraph === undefined) continue;
				for (const [d, v] of attr.subgraph.opsetImports()) {
					if (!imports.has(d)) imports.set(d, v);
				}
			}
		}
		return imports;
	}

	/**
	 * The function as a graph, plus every function its nodes call by name.
	 */
	toGraphAndFunctions(): { graph: GraphProto; functions: Map<string, FunctionProto> } {
		const functions = new Map<string, FunctionProto>();
		for (const stmt of this.stmts) {
			for (const [name, proto] of stmt.subFunctions) functions.set(name, proto);
		}
		for (const [name, fn] of this.calledFunctions) functions.set(name, fn.toFunctionProto());
		const graph: GraphProto = {
			name: this.name,
			node: this.stmts.map((s) => s.toNodeProto()),
			input: this.inputs.map(toValueInfo),
			output: this.outputs.map(toValueInfo),
			initializer: [],
		};
		if (this.docstring !== "") graph.docString = this.docstring;
		return { graph, functions };
	}

	toGraphProto(): GraphProto {
		return this.toGraphAndFunctions().graph;
	}

	toFunctionProto(): FunctionProto {
		const params = this.attrParams;
		const proto: FunctionProto = {
			name: this.name,
			domain: this.domain,
			input: this.inputs.map((v) => v.name),
			output: this.outputs.map((v) => v.name),
			attribute: params.filter((p) => p.default === undefined).map((p) => p.name),
			attributeProto: params.flatMap((p) => (p.default === undefined ? [] : [makeAttr(p.name, p.default).proto])),
			node: this.stmts.map((s) => s.toNodeProto()),
			opsetImport: sortedImports(this.opsetImports()),
		};
		if (this.docstring !== "") proto.docString = this.docstring;
		return proto;
	}

	/**
	 * A model whose main graph is this function, shipping every called
	 * function.
	 */
	toModelProto(options: { irVersion?: number; producerName?: string } = {}): ModelProto {
		const { graph, functions } = this.toGraphAndFunctions();
		const imports = this.opsetImports();
		for (const fn of functions.values()) {
			if (!imports.has(fn.domain)) imports.set(fn.domain, 1);
			for (const { domain, version } of fn.opsetImport) {
				if (!imports.has(domain)) imports.set(domain, version);
			}
		}
		return {
			irVersion: options.irVersion ?? 8,
			producerName: options.producerName ?? "graphscript",
			opsetImport: sortedImports(imports),
			graph,
			functions: [...functions.values()],
		};
	}
}

function isIRVar(p: IRVar | IRAttributeParameter): p is IRVar {
	return !("type" in p);
}

function sortedImports(imports: Map<string, number>): OperatorSetIdProto[] {
	return [...imports]
		.map(([domain, version]) => ({ domain, version }))
		.sort((a, b) => a.domain.localeCompare(b.domain));
}

//==============================================================================
// Attribute Construction
//==============================================================================

export function makeAttr(name: string, value: PyValue | IRFunction | TensorProto): IRAttributeValue {
	if (value instanceof IRFunction) {
		return { proto: { name, type: AttributeType.GRAPH, g: value.toGraphProto() }, subgraph: value };
	}
	if (Array.isArray(value)) return { proto: makeListAttr(name, value) };
	if (typeof value === "object" && value !== null) {
		return { proto: { name, type: AttributeType.TENSOR, t: value } };
	}
	switch (typeof value) {
	case "boolean": return { proto: { name, type: AttributeType.INT, i: value ? 1n : 0n } };
	case "bigint": return { proto: { name, type: AttributeType.INT, i: value } };
	case "number": return { proto: { name, type: AttributeType.FLOAT, f: value } };
	case "string": return { proto: { name, type: AttributeType.STRING, s: value } };
	default:
		throw GraphScriptError.typeMismatch(`Attribute ${name} cannot be None.`);
	}
}

function makeListAttr(name: string, values: PyValue[]): AttributeProto {
	if (values.length === 0) {
		throw GraphScriptError.emptyList(`Cannot infer the type of attribute ${name} from an empty list.`);
	}
	const ints: bigint[] = [];
	const floats: number[] = [];
	const strings: string[] = [];
	for (const v of values) {
		if (typeof v === "bigint" || typeof v === "boolean") {
			const i = typeof v === "bigint" ? v : v ? 1n : 0n;
			ints.push(i);
			floats.push(Number(i));
		} else if (typeof v === "number") {
			floats.push(v);
		} else if (typeof v === "string") {
			strings.push(v);
		} else {
			throw GraphScriptError.typeMismatch(`Unsupported element in list attribute ${name}.`);
		}
	}
	if (ints.length === values.length) return { name, type: AttributeType.INTS, ints };
	if (floats.length === values.length) return { name, type: AttributeType.FLOATS, floats };
	if (strings.length === values.length) return { name, type: AttributeType.STRINGS, strings };
	throw GraphScriptError.typeMismatch(`Mixed element types in list attribute ${name}.`);
}

/**
 * Attribute bound to the enclosing function's attribute parameter `refName`.
 */
export function makeAttrRef(name: string, refName: string, type: AttributeType): IRAttributeValue {
	return { proto: { name, type, refAttrName: refName } };
}

//==============================================================================
// Types
//==============================================================================

export function typeProtoOf(type: TypeAnnotation | undefined): TypeProto | undefined {
	if (type instanceof TensorType) {
		return type.shape === null
			? { kind: "tensor", elemType: type.elemType }
			: { kind: "tensor", elemType: type.elemType, shape: [...type.shape] };
	}
	if (type instanceof SequenceType) {
		const elem = typeProtoOf(type.of);
		return elem === undefined ? undefined : { kind: "sequence", elem };
	}
	if (type instanceof OptionalType) {
		const elem = typeProtoOf(type.of);
		return elem === undefined ? undefined : { kind: "optional", elem };
	}
	return undefined;
}

function toValueInfo(v: IRVar): ValueInfoProto {
	const type = typeProtoOf(v.typeinfo);
	return type === undefined ? { name: v.name } : { name: v.name, type };
}

//==============================================================================
// IRBuilder
//==============================================================================

/**
 * Backend the converter assembles functions through.
 */
export class IRBuilder {
	newFunction(name: string, domain = ""): IRFunction {
		return new IRFunction(name, domain);
	}

	addStmt(
		fn: IRFunction,
		outputs: readonly string[],
		callee: Op,
		inputs: readonly string[],
		attrs: readonly IRAttributeValue[] = [],
		subFunctions: ReadonlyMap<string, FunctionProto> = new Map(),
	): void {
		fn.appendStmt(new IRStmt(outputs, callee, inputs, attrs, subFunctions));
	}

	addInput(fn: IRFunction, name: string, typeinfo?: TypeAnnotation, location?: SourceLocation): void {
		fn.appendInput({ name, typeinfo, location });
	}

	addOutput(fn: IRFunction, name: string, typeinfo?: TypeAnnotation, location?: SourceLocation): void {
		fn.appendOutput({ name, typeinfo, location });
	}

	addAttrParameter(fn: IRFunction, name: string, type: AttributeType, defaultValue?: PyValue): void {
		fn.addAttrParameter(defaultValue === undefined ? { name, type } : { name, type, default: defaultValue });
	}

	addDocstring(fn: IRFunction, docstring: string): void {
		fn.docstring = docstring;
	}

	makeAttr(name: string, value: PyValue | IRFunction | TensorProto): IRAttributeValue {
		return makeAttr(name, value);
	}

	makeAttrRef(name: string, refName: string, type: AttributeType): IRAttributeValue {
		return makeAttrRef(name, refName, type);
	}
}
