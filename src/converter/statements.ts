// Statement and function translation
// Lowers statements into the current graph, and function definitions
// (top-level or nested) into graphs of their own

import type {
	PyAnnAssign,
	PyAssign,
	PyExpr,
	PyFunctionDef,
	PyReturn,
	PyStmt,
} from "../ast/types.js";
import { isDocstring, isPrintCall } from "../ast/types.js";
import { exhaustive, GraphScriptError } from "../errors.js";
import type { IRFunction } from "../ir/builder.js";
import {
	getReturnTypes,
	isAttrType,
	isTypeAnnotation,
	isValidType,
	pytypeToAttrtype,
	type TypeAnnotation,
} from "../types/annotations.js";
import { AttrRef, Dynamic, DynamicKind } from "../values.js";
import type { TranslationContext } from "./context.js";
import { translateIf, translateLoop } from "./control-flow.js";
import { translateExpr, translateMultiOutputExpr } from "./expressions.js";

//==============================================================================
// Statements
//==============================================================================

/**
 * Lower one statement. `index` is its position in a function body, and
 * is absent for statements inside control flow.
 */
export function translateStmt(node: PyStmt, ctx: TranslationContext, index?: number): void {
	switch (node._type) {
	case "Assign":
	case "AnnAssign":
		translateAssign(node, ctx);
		return;
	case "Return":
		if (index === undefined) {
			ctx.fail("Return statements are not permitted inside control-flow statements.", node);
		}
		translateReturn(node, ctx);
		return;
	case "If":
		translateIf(node, ctx);
		return;
	case "For":
	case "While":
		translateLoop(node, ctx);
		return;
	case "Expr":
		if (index === 0 && isDocstring(node)) {
			ctx.builder.addDocstring(ctx.currentFn, node.value.value);
			return;
		}
		if (isPrintCall(node)) return;
		ctx.fail("Unsupported statement type Expr.", node);
		return;
	case "FunctionDef":
		translateNestedFunctionDef(node, ctx);
		return;
	case "Pass":
		return;
	case "Break":
		ctx.fail("Instruction break is only supported as 'if <condition>: break' at the end of a loop.", node);
		return;
	case "Import":
	case "ImportFrom":
		ctx.fail("Imports are only supported at module level.", node);
		return;
	default:
		exhaustive(node);
	}
}

function assign(lhs: PyExpr, rhs: PyExpr, typeinfo: TypeAnnotation | undefined, ctx: TranslationContext): void {
	const location = ctx.location(lhs);
	if (lhs._type === "Name") {
		const result = translateExpr(rhs, ctx, lhs.id);
		const provenance = result.kind === "const" ? DynamicKind.Constant : DynamicKind.Intermediate;
		ctx.bind(lhs.id, new Dynamic(result.name, provenance, location, typeinfo));
		return;
	}
	if (lhs._type === "Tuple") {
		const ids = lhs.elts.map((elt) => {
			if (elt._type !== "Name") ctx.fail("Only names can be assigned from a call with several outputs.", elt);
			return elt.id;
		});
		const results = translateMultiOutputExpr(rhs, ctx, ids);
		ids.forEach((id, i) => {
			const result = results[i];
			if (result !== undefined) ctx.bind(id, new Dynamic(result, DynamicKind.Intermediate, location));
		});
		return;
	}
	ctx.fail("Unsupported construct in LHS of assignment.", lhs);
}

function translateAssign(node: PyAssign | PyAnnAssign, ctx: TranslationContext): void {
	const targets = node._type === "Assign" ? node.targets : [node.target];
	const [lhs] = targets;
	if (lhs === undefined || targets.length !== 1) ctx.fail("Multi-assignment not supported.", node);
	const rhs = node.value;
	if (rhs === null) ctx.fail("Annotated declarations need a value.", node);

	let typeinfo: TypeAnnotation | undefined;
	if (node._type === "AnnAssign") {
		const annotation = ctx.evalConstant(node.annotation);
		if (isValidType(annotation)) typeinfo = annotation;
		else ctx.warn(`Unsupported type annotation for variable ${describeTarget(lhs)}.`, node.annotation);
	}

	if (rhs._type === "Tuple") {
		if (lhs._type !== "Tuple") ctx.fail(`Left term must be a tuple not ${lhs._type}.`, lhs);
		if (lhs.elts.length !== rhs.elts.length) {
			ctx.fail("Expected same number of elements on lhs and rhs of assignments.", node);
		}
		lhs.elts.forEach((target, i) => {
			const value = rhs.elts[i];
			if (value !== undefined) assign(target, value, undefined, ctx);
		});
		return;
	}
	assign(lhs, rhs, typeinfo, ctx);
}

function describeTarget(target: PyExpr): string {
	return target._type === "Name" ? target.id : target._type;
}

/**
 * Each returned value becomes a graph output. Graph outputs may alias
 * neither an input nor another output, so such values are copied.
 */
function translateReturn(node: PyReturn, ctx: TranslationContext): void {
	const value = node.value;
	if (value === null) ctx.fail("Return statement without return-value not supported.", node);
	const exprs = value._type === "Tuple" ? value.elts : [value];
	const returnTypes = ctx.returnTypes;
	if (returnTypes !== undefined && returnTypes.length !== exprs.length) {
		throw GraphScriptError.arity(
			`Mismatch in number of return values and types: ${exprs.length} values, ${returnTypes.length} declared types.`,
			ctx.location(node),
		);
	}

	const fn = ctx.currentFn;
	exprs.forEach((expr, i) => {
		const preferred = value._type === "Tuple" ? `return_val${i}` : "return_val";
		let name = translateExpr(expr, ctx, preferred).name;
		if (fn.inputs.some((v) => v.name === name)) name = ctx.emitCopy(name, preferred);
		if (fn.outputs.some((v) => v.name === name)) name = ctx.emitCopy(name, `${name}_copy`);
		ctx.builder.addOutput(fn, name, returnTypes?.[i], ctx.location(node));
	});
}

//==============================================================================
// Functions
//==============================================================================

/**
 * Parameters with an attribute type (`int`, `float`, `str`, `List[int]`,
 * ...) become attribute parameters; all others become graph inputs.
 */
export function translateFunctionSignature(node: PyFunctionDef, ctx: TranslationContext): IRFunction {
	const fn = ctx.currentFn;
	const { args, defaults } = node.args;
	const firstDefault = args.length - defaults.length;

	args.forEach((arg, i) => {
		const defaultExpr = i >= firstDefault ? defaults[i - firstDefault] : undefined;
		const defaultValue = defaultExpr === undefined ? undefined : ctx.evalLiteral(defaultExpr);
		const location = ctx.location(arg);

		let typeinfo: TypeAnnotation | undefined;
		if (arg.annotation !== null) {
			const annotation = ctx.evalConstant(arg.annotation);
			if (isValidType(annotation)) typeinfo = annotation;
			else ctx.warn(`Unsupported type annotation for argument ${arg.arg}.`, arg.annotation);
		}

		if (typeinfo !== undefined && isAttrType(typeinfo)) {
			// A default of None declares an optional attribute with no value
			ctx.builder.addAttrParameter(fn, arg.arg, pytypeToAttrtype(typeinfo), defaultValue ?? undefined);
			ctx.bind(arg.arg, new AttrRef(arg.arg, typeinfo, location));
			return;
		}
		if (defaultValue !== undefined) {
			ctx.warn(`Default value of input ${arg.arg} is ignored.`, arg);
		}
		ctx.builder.addInput(fn, arg.arg, typeinfo, location);
		ctx.names.reserve(arg.arg);
		ctx.bind(arg.arg, new Dynamic(arg.arg, DynamicKind.Input, location, typeinfo));
	});

	ctx.returnTypes = undefined;
	if (node.returns !== null) {
		const annotation = ctx.evalConstant(node.returns);
		if (!isTypeAnnotation(annotation)) {
			ctx.warn(`Unsupported return type annotation of ${node.name}.`, node.returns);
			return fn;
		}
		const returnTypes = getReturnTypes(annotation);
		let valid = true;
		for (const t of returnTypes) {
			if (!isValidType(t)) {
				ctx.warn(`Unsupported type annotation for return value ${String(t)}.`, node.returns);
				valid = false;
			}
		}
		if (valid) ctx.returnTypes = returnTypes;
	}
	return fn;
}

/**
 * Translate a function into the current scope's graph. `return` may only
 * appear as the last statement of the body.
 */
export function translateFunctionDef(node: PyFunctionDef, ctx: TranslationContext): IRFunction {
	ctx.debug(`translate function ${node.name}`);
	translateFunctionSignature(node, ctx);
	node.body.forEach((stmt, i) => {
		if (stmt._type === "Return" && i !== node.body.length - 1) {
			ctx.fail("Return must be the last statement of a function.", stmt);
		}
		translateStmt(stmt, ctx, i);
	});
	return ctx.currentFn;
}

/**
 * A nested function becomes a standalone graph. The outer names it reads
 * are captured with their bindings at this point; every later use checks
 * that none of them was rebound.
 */
function translateNestedFunctionDef(node: PyFunctionDef, ctx: TranslationContext): void {
	const outerReturnTypes = ctx.returnTypes;
	ctx.enterScope(node.name, ctx.thisModule.domain);
	translateFunctionDef(node, ctx);
	const fn = ctx.exitScope();
	ctx.returnTypes = outerReturnTypes;

	fn.outerScopeVariables = [...ctx.oracle.outerScopeVariables(node)].map((name) => ({
		name,
		binding: ctx.lookup(name, node),
	}));
	ctx.bind(node.name, fn);
	ctx.currentFn.addNestedFunction(fn);
}
