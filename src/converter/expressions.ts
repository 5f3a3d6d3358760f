// Expression lowering
// Translates one script expression into a value name, emitting the nodes
// that compute it into the current graph

import type {
	BinOpType,
	CmpOpType,
	PyBinOp,
	PyBoolOp,
	PyCall,
	PyCompare,
	PyExpr,
	PyName,
	PyUnaryOp,
	UnaryOpType,
} from "../ast/types.js";
import { isConstant } from "../ast/types.js";
import { staticCastInputs } from "../autocast.js";
import { exhaustive, GraphScriptError } from "../errors.js";
import { isConstantExpr } from "../evaluator/constant-expr.js";
import { IRFunction, type IRAttributeValue } from "../ir/builder.js";
import type { FunctionProto } from "../ir/model.js";
import { Op, Opset, type ParamSchema } from "../schemas/opset.js";
import type { OpSchema } from "../schemas/registry.js";
import { ScriptFunction } from "../script-function.js";
import { pytypeToAttrtype } from "../types/annotations.js";
import {
	AttrRef,
	bindingIdentity,
	Dynamic,
	OMITTED,
	type TranslatedExpr,
} from "../values.js";
import type { TranslationContext } from "./context.js";
import { translateSubscript } from "./subscript.js";

//==============================================================================
// Operator Maps
//==============================================================================

const BINOP_MAP: Partial<Record<BinOpType, string>> = {
	Add: "Add",
	Sub: "Sub",
	Mult: "Mul",
	Div: "Div",
	Mod: "Mod",
	Pow: "Pow",
	MatMult: "MatMul",
	BitAnd: "And",
	BitOr: "Or",
};

const UNARYOP_MAP: Partial<Record<UnaryOpType, string>> = {
	USub: "Neg",
	UAdd: "Identity",
	Not: "Not",
};

// NotEq has no operator of its own: Equal followed by Not
const COMPARE_MAP: Partial<Record<CmpOpType, string>> = {
	Eq: "Equal",
	NotEq: "Equal",
	Lt: "Less",
	LtE: "LessOrEqual",
	Gt: "Greater",
	GtE: "GreaterOrEqual",
};

//==============================================================================
// Node Requests
//==============================================================================

/**
 * A node an expression needs, emitted once its output name is known.
 */
interface NodeRequest {
	callee: Op;
	inputs: string[];
	attrs: IRAttributeValue[];
	subFunctions?: ReadonlyMap<string, FunctionProto>;
}

type Lowered = TranslatedExpr | NodeRequest;

function isNodeRequest(value: Lowered): value is NodeRequest {
	return "callee" in value;
}

//==============================================================================
// Entry Points
//==============================================================================

/**
 * Lower an expression. `target` is the preferred name of the value it
 * produces; constants and nodes take a fresh name derived from it.
 */
export function translateExpr(node: PyExpr, ctx: TranslationContext, target?: string): TranslatedExpr {
	const lowered = lowerExpr(node, ctx, target);
	if (!isNodeRequest(lowered)) return lowered;
	const result = ctx.generateUniqueName(target ?? "tmp");
	ctx.emit([result], lowered.callee, lowered.inputs, lowered.attrs, lowered.subFunctions);
	return { name: result, kind: "any" };
}

/**
 * Lower a call whose node has several outputs, one per target name.
 */
export function translateMultiOutputExpr(node: PyExpr, ctx: TranslationContext, targets: readonly string[]): string[] {
	if (node._type !== "Call") {
		ctx.fail("Only a call can be assigned to several variables.", node);
	}
	const request = translateCall(node, ctx);
	const results = targets.map((t) => ctx.generateUniqueName(t));
	ctx.emit(results, request.callee, request.inputs, request.attrs, request.subFunctions);
	return results;
}

/**
 * An operand that may be `None`, standing for an omitted optional input.
 */
export function translateOptExpr(node: PyExpr, ctx: TranslationContext): TranslatedExpr {
	if (isConstant(node) && node.value === null) return OMITTED;
	return translateExpr(node, ctx);
}

function lowerExpr(node: PyExpr, ctx: TranslationContext, target: string | undefined): Lowered {
	if (isConstantExpr(node)) return ctx.emitConst(ctx.evalLiteral(node), target, node);
	switch (node._type) {
	case "Call":
		return translateCall(node, ctx);
	case "BinOp":
		return translateBinOp(node, ctx);
	case "BoolOp":
		return translateBoolOp(node, ctx);
	case "UnaryOp":
		return translateUnaryOp(node, ctx);
	case "Compare":
		return translateCompare(node, ctx);
	case "Name":
		return translateName(node, ctx);
	case "Subscript":
		return translateSubscript(node, ctx, target);
	default:
		return ctx.fail(`Unsupported expression type ${node._type}.`, node);
	}
}

//==============================================================================
// Operators
//==============================================================================

/**
 * Binary operands go through autocast against the operator's schema, so a
 * literal operand takes the type of the other one.
 */
function castBinary(ctx: TranslationContext, op: Op, left: TranslatedExpr, right: TranslatedExpr): string[] {
	return staticCastInputs(ctx, op.opSchema, [left, right]);
}

function translateBinOp(node: PyBinOp, ctx: TranslationContext): NodeRequest {
	const opName = BINOP_MAP[node.op];
	if (opName === undefined) ctx.fail(`Unsupported operator ${node.op}.`, node);

	const attrs: IRAttributeValue[] = [];
	if (node.op === "Mod" && isConstantExpr(node.right) && typeof ctx.evalLiteral(node.right) === "number") {
		// X % <float literal> is a floating-point remainder
		attrs.push(ctx.builder.makeAttr("fmod", 1n));
	}

	const op = ctx.defaultOp(opName);
	const inputs = castBinary(ctx, op, translateExpr(node.left, ctx), translateExpr(node.right, ctx));
	return { callee: op, inputs, attrs };
}

function translateBoolOp(node: PyBoolOp, ctx: TranslationContext): NodeRequest {
	const op = ctx.defaultOp(node.op);
	const [first, ...rest] = node.values;
	const last = rest.pop();
	if (first === undefined || last === undefined) ctx.fail("Empty boolean expression.", node);

	let expr = translateExpr(first, ctx);
	for (const operand of rest) {
		const inputs = castBinary(ctx, op, expr, translateExpr(operand, ctx));
		const result = ctx.generateUniqueName();
		ctx.emit([result], op, inputs);
		expr = { name: result, kind: "any" };
	}
	// The last node takes the caller's target name
	return { callee: op, inputs: castBinary(ctx, op, expr, translateExpr(last, ctx)), attrs: [] };
}

function translateUnaryOp(node: PyUnaryOp, ctx: TranslationContext): NodeRequest {
	const opName = UNARYOP_MAP[node.op];
	if (opName === undefined) ctx.fail(`Unsupported operator ${node.op}.`, node);
	const operand = translateExpr(node.operand, ctx);
	return { callee: ctx.defaultOp(opName), inputs: [operand.name], attrs: [] };
}

function translateCompare(node: PyCompare, ctx: TranslationContext): NodeRequest {
	const [cmp] = node.ops;
	const [comparator] = node.comparators;
	if (cmp === undefined || comparator === undefined || node.ops.length !== 1) {
		ctx.fail("Chained comparisons are not supported.", node);
	}
	const opName = COMPARE_MAP[cmp];
	if (opName === undefined) ctx.fail(`Unsupported operator ${cmp}.`, node);

	const left = translateExpr(node.left, ctx);
	const right = translateExpr(comparator, ctx);
	const op = ctx.defaultOp(opName);
	const inputs = castBinary(ctx, op, left, right);
	if (cmp === "NotEq") {
		const tmp = ctx.generateUniqueName();
		ctx.emit([tmp], op, inputs);
		return { callee: ctx.defaultOp("Not"), inputs: [tmp], attrs: [] };
	}
	return { callee: op, inputs, attrs: [] };
}

function translateName(node: PyName, ctx: TranslationContext): TranslatedExpr {
	return ctx.toGraphValue(ctx.lookup(node.id, node), node.id, node);
}

//==============================================================================
// Callees
//==============================================================================

type Callee =
	| { kind: "op"; op: Op }
	| { kind: "script"; fn: ScriptFunction }
	| { kind: "nested"; fn: IRFunction };

/**
 * Use a default-domain opset, making it the function's default opset.
 * A second, different default opset is an error.
 */
export function setDefaultOpset(ctx: TranslationContext, opset: Opset): void {
	if (!opset.isDefaultDomain) return;
	const current = ctx.defaultOpset;
	if (current === undefined) {
		ctx.defaultOpset = opset;
		return;
	}
	if (current.domain !== opset.domain || current.version !== opset.version) {
		throw GraphScriptError.configuration(`Two distinct opsets were used (${opset.toString()} != ${current.toString()}).`);
	}
}

function translateOpsetExpr(node: PyExpr, ctx: TranslationContext): Opset {
	const value = node._type === "Name" ? ctx.tryLookup(node.id) : ctx.evalConstant(node);
	if (value instanceof Opset) return value;
	return ctx.fail("Invalid opset expression: an operator must be called as <opset>.<name>(...).", node);
}

function translateCallee(node: PyExpr, ctx: TranslationContext): Callee {
	if (node._type === "Attribute") {
		const opset = translateOpsetExpr(node.value, ctx);
		setDefaultOpset(ctx, opset);
		if (!opset.has(node.attr)) {
			ctx.warn(`'${node.attr}' is not a known op in '${opset.toString()}'.`, node);
		}
		return { kind: "op", op: opset.op(node.attr) };
	}
	if (node._type === "Name") {
		const found = ctx.tryLookup(node.id);
		if (found instanceof ScriptFunction) {
			ctx.currentFn.addCalledFunction(found);
			return { kind: "script", fn: found };
		}
		if (found instanceof Op) return { kind: "op", op: found };
		if (found instanceof IRFunction) return { kind: "nested", fn: found };
		if (found === undefined) {
			const opset = ctx.requireDefaultOpset();
			if (!opset.has(node.id)) {
				ctx.warn(`Unknown function name '${node.id}'. The graph may not work.`, node);
			}
			return { kind: "op", op: opset.op(node.id) };
		}
	}
	return ctx.fail("Invalid callee.", node);
}

//==============================================================================
// Calls
//==============================================================================

interface SplitArguments {
	inputs: (PyExpr | null)[];
	attrs: [string, PyExpr][];
}

/**
 * Assign call arguments to the callee's parameters. Positional arguments
 * fill parameters in order, a variadic input taking every remaining one;
 * keywords fill the rest. Omitted optional inputs hold a `null` slot, and
 * trailing ones are dropped.
 */
export function separateInputsAndAttributes(
	params: readonly ParamSchema[],
	args: readonly PyExpr[],
	keywords: ReadonlyMap<string, PyExpr>,
	calleeName: string,
): SplitArguments {
	const inputs: (PyExpr | null)[] = [];
	const attrs: [string, PyExpr][] = [];
	const used = new Set<string>();
	let position = 0;

	for (const param of params) {
		if (param.isVariadicInput) {
			const rest = args.slice(position);
			position = args.length;
			if (rest.length === 0 && param.required) {
				throw GraphScriptError.arity(`Missing required variadic input ${param.name} of ${calleeName}.`);
			}
			inputs.push(...rest);
			continue;
		}
		let value: PyExpr | undefined;
		if (position < args.length) {
			value = args[position];
			position++;
		} else if (keywords.has(param.name)) {
			value = keywords.get(param.name);
			used.add(param.name);
		}
		if (value === undefined) {
			if (param.required) {
				throw GraphScriptError.arity(`Missing required ${param.isInput ? "input" : "attribute"} ${param.name} of ${calleeName}.`);
			}
			if (param.isInput) inputs.push(null);
			continue;
		}
		if (param.isInput) inputs.push(value);
		else attrs.push([param.name, value]);
	}

	if (position < args.length) {
		throw GraphScriptError.arity(
			`${calleeName} takes ${position} positional arguments but ${args.length} were given.`,
		);
	}
	for (const name of keywords.keys()) {
		if (!used.has(name)) throw GraphScriptError.arity(`${calleeName} got an unexpected keyword argument '${name}'.`);
	}
	while (inputs.length > 0 && inputs[inputs.length - 1] === null) inputs.pop();
	return { inputs, attrs };
}

function splitArguments(node: PyCall, ctx: TranslationContext, params: readonly ParamSchema[] | undefined, calleeName: string): SplitArguments {
	if (params === undefined) {
		return {
			inputs: node.args,
			attrs: node.keywords.map((k): [string, PyExpr] => [k.arg, k.value]),
		};
	}
	const keywords = new Map(node.keywords.map((k): [string, PyExpr] => [k.arg, k.value]));
	try {
		return separateInputsAndAttributes(params, node.args, keywords, calleeName);
	} catch (e) {
		if (e instanceof GraphScriptError) throw new GraphScriptError(e.code, e.message, ctx.location(node));
		throw e;
	}
}

export function translateCall(node: PyCall, ctx: TranslationContext): NodeRequest {
	const callee = translateCallee(node.func, ctx);

	let op: Op;
	let schema: OpSchema | undefined;
	let params: ParamSchema[] | undefined;
	let subFunctions: Map<string, FunctionProto> | undefined;
	switch (callee.kind) {
	case "op":
		op = callee.op;
		schema = op.opSchema;
		params = op.paramSchemas();
		break;
	case "script":
		op = callee.fn.asOp();
		schema = callee.fn.opSchema;
		params = callee.fn.paramSchemas();
		break;
	case "nested":
		checkCapturedVariables(callee.fn, node, ctx);
		op = ctx.thisModule.op(callee.fn.name);
		subFunctions = new Map([[callee.fn.name, callee.fn.toFunctionProto()]]);
		break;
	default:
		return exhaustive(callee);
	}

	const split = splitArguments(node, ctx, params, op.toString());
	const args = split.inputs.map((x) => (x === null ? OMITTED : translateOptExpr(x, ctx)));
	const attrs = split.attrs
		.map(([name, expr]) => translateAttr(name, expr, ctx))
		.filter((a): a is IRAttributeValue => a !== undefined);
	const inputs = staticCastInputs(ctx, schema, args);
	return subFunctions === undefined ? { callee: op, inputs, attrs } : { callee: op, inputs, attrs, subFunctions };
}

//==============================================================================
// Attributes
//==============================================================================

/**
 * A nested function may only be used while every outer variable it read
 * still has the binding it had when the function was defined.
 */
function checkCapturedVariables(fn: IRFunction, use: PyExpr, ctx: TranslationContext): void {
	for (const { name, binding } of fn.outerScopeVariables) {
		const current = ctx.tryLookup(name);
		if (bindingIdentity(current) !== bindingIdentity(binding)) {
			throw GraphScriptError.capturedMutation(name, fn.name, ctx.location(use));
		}
	}
}

/**
 * `name=<expr>` in a call. Literal values become attributes, attribute
 * parameters become references, nested functions become graphs. A value of
 * `None` yields no attribute at all.
 */
export function translateAttr(name: string, expr: PyExpr, ctx: TranslationContext): IRAttributeValue | undefined {
	if (expr._type === "Name") {
		const value = ctx.lookup(expr.id, expr);
		if (value instanceof AttrRef) {
			return ctx.builder.makeAttrRef(name, value.value, pytypeToAttrtype(value.typeinfo));
		}
		if (value instanceof IRFunction) {
			checkCapturedVariables(value, expr, ctx);
			return ctx.builder.makeAttr(name, value);
		}
		if (value instanceof Dynamic) {
			throw GraphScriptError.typeMismatch(
				`Attribute ${name} must be a constant or an attribute parameter, but '${expr.id}' is a graph value.`,
				ctx.location(expr),
			);
		}
	}
	const literal = ctx.evalLiteral(expr);
	if (literal === null) return undefined;
	try {
		return ctx.builder.makeAttr(name, literal);
	} catch (e) {
		if (e instanceof GraphScriptError) throw new GraphScriptError(e.code, e.message, ctx.location(expr));
		throw e;
	}
}
