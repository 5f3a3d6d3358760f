// Text form of functions
// One line per node, nested graphs indented under the node owning them:
//
//   Abs (X) => (return_val)
//   {
//      return_val = Abs (X)
//   }

import type { PyValue } from "../ast/types.js";
import type { AttributeProto, GraphProto, NodeProto, TensorProto, TypeProto, ValueInfoProto } from "./model.js";
import type { IRAttributeParameter, IRFunction, IRVar } from "./builder.js";
import { typeProtoOf } from "./builder.js";
import { elementTypeName } from "../types/element-types.js";

const INDENT = "   ";

type Scalar = bigint | number | string;

function formatScalar(v: Scalar): string {
	return typeof v === "string" ? JSON.stringify(v) : String(v);
}

function formatLiteral(v: PyValue): string {
	if (v === null) return "None";
	if (Array.isArray(v)) return `[${v.map(formatLiteral).join(", ")}]`;
	if (typeof v === "boolean") return v ? "True" : "False";
	return formatScalar(v);
}

function formatType(type: TypeProto): string {
	switch (type.kind) {
	case "tensor": {
		const elem = elementTypeName(type.elemType);
		if (type.shape === undefined) return elem;
		return `${elem}[${type.shape.map((d) => (d === null ? "?" : String(d))).join(",")}]`;
	}
	case "sequence":
		return `seq(${formatType(type.elem)})`;
	case "optional":
		return `optional(${formatType(type.elem)})`;
	}
}

function formatVar(v: IRVar): string {
	const type = typeProtoOf(v.typeinfo);
	return type === undefined ? v.name : `${v.name}: ${formatType(type)}`;
}

function formatValueInfo(v: ValueInfoProto): string {
	return v.type === undefined ? v.name : `${v.name}: ${formatType(v.type)}`;
}

function formatTensor(t: TensorProto): string {
	const values: readonly Scalar[] = t.int64Data ?? t.int32Data ?? t.floatData ?? t.doubleData ?? t.stringData ?? [];
	const shown = values.map(formatScalar);
	const body = t.dims.length === 0 ? (shown[0] ?? "") : `[${shown.join(", ")}]`;
	return `${elementTypeName(t.dataType)}{${body}}`;
}

function formatAttrValue(attr: AttributeProto, indent: string): string {
	if (attr.refAttrName !== undefined) return `@${attr.refAttrName}`;
	if (attr.g !== undefined) return `\n${formatGraph(attr.g, indent + INDENT)}`;
	if (attr.t !== undefined) return formatTensor(attr.t);
	if (attr.i !== undefined) return String(attr.i);
	if (attr.f !== undefined) return String(attr.f);
	if (attr.s !== undefined) return JSON.stringify(attr.s);
	const list: readonly Scalar[] | undefined = attr.ints ?? attr.floats ?? attr.strings;
	if (list !== undefined) return `[${list.map(formatScalar).join(", ")}]`;
	return "?";
}

function formatNode(node: NodeProto, indent: string): string {
	const callee = node.domain === "" ? node.opType : `${node.domain}.${node.opType}`;
	const attrs = node.attribute.length === 0
		? ""
		: ` <${node.attribute.map((a) => `${a.name}=${formatAttrValue(a, indent)}`).join(", ")}>`;
	return `${indent}${node.output.join(", ")} = ${callee}${attrs} (${node.input.join(", ")})`;
}

function formatGraph(graph: GraphProto, indent: string): string {
	const lines = [
		`${indent}${graph.name} (${graph.input.map(formatValueInfo).join(", ")}) => (${graph.output.map(formatValueInfo).join(", ")})`,
		`${indent}{`,
		...graph.node.map((n) => formatNode(n, indent + INDENT)),
		`${indent}}`,
	];
	return lines.join("\n");
}

function formatAttrParam(p: IRAttributeParameter): string {
	return p.default === undefined ? `${p.name}: ${p.type}` : `${p.name}: ${p.type} = ${formatLiteral(p.default)}`;
}

export function printGraph(graph: GraphProto): string {
	return formatGraph(graph, "");
}

/**
 * Header lists attribute parameters between angle brackets, then inputs
 * and outputs with their declared types.
 */
export function printFunction(fn: IRFunction): string {
	const attrs = fn.attrParams.length === 0 ? "" : `<${fn.attrParams.map(formatAttrParam).join(", ")}> `;
	const lines = [
		`${fn.name} ${attrs}(${fn.inputs.map(formatVar).join(", ")}) => (${fn.outputs.map(formatVar).join(", ")})`,
		"{",
		...fn.stmts.map((s) => formatNode(s.toNodeProto(), INDENT)),
		"}",
	];
	return lines.join("\n");
}
