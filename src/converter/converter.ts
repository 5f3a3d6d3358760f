// Converter
// Translates top-level function definitions into script functions of the
// module's own domain

import type { PyExpr, PyStmt } from "../ast/types.js";
import { locationOf } from "../ast/types.js";
import { GraphScriptError, type Diagnostic } from "../errors.js";
import { IRBuilder } from "../ir/builder.js";
import { printFunction } from "../ir/printer.js";
import { Opset } from "../schemas/opset.js";
import { ScriptFunction } from "../script-function.js";
import type { Globals } from "../values.js";
import { TranslationContext, type TranslationOptions } from "./context.js";
import { translateFunctionDef } from "./statements.js";

export class Converter {
	private readonly ctx: TranslationContext;

	constructor(options: TranslationOptions = {}) {
		this.ctx = new TranslationContext(
			options.builder ?? new IRBuilder(),
			options.globals ?? new Map(),
			options.thisModule ?? new Opset("this", 1),
			options,
		);
	}

	get globals(): Globals {
		return this.ctx.globals;
	}

	get thisModule(): Opset {
		return this.ctx.thisModule;
	}

	get defaultOpset(): Opset | undefined {
		return this.ctx.defaultOpset;
	}

	/** Warnings of every function translated so far */
	get diagnostics(): readonly Diagnostic[] {
		return this.ctx.diagnostics;
	}

	/**
	 * Translate one top-level statement, which must be a function
	 * definition. The function is registered in the module's domain so later
	 * functions can call it.
	 */
	topLevelStmt(node: PyStmt): ScriptFunction {
		if (node._type !== "FunctionDef") {
			throw GraphScriptError.unsupported(
				`Unsupported top-level statement type ${node._type}.`,
				locationOf(node),
			);
		}
		const ctx = this.ctx;
		const warningsBefore = ctx.diagnostics.length;
		ctx.reset(node);
		if (ctx.defaultOpset === undefined) {
			const opset = findDefaultOpset(node.body, ctx.globals);
			if (opset !== undefined) ctx.defaultOpset = opset;
		}

		ctx.enterScope(node.name, ctx.thisModule.domain);
		translateFunctionDef(node, ctx);
		const fn = ctx.exitScope();
		if (ctx.scopes.depth !== 0) throw new Error(`Unbalanced scopes after ${node.name}`);
		ctx.debug(`\n${printFunction(fn)}`);

		const sf = new ScriptFunction(ctx.thisModule, fn, ctx.diagnostics.slice(warningsBefore));
		ctx.thisModule.addFunction(sf.opSchema);
		return sf;
	}
}

//==============================================================================
// Default Opset Detection
//==============================================================================

/**
 * The opset of the first `X.Op(...)` call whose `X` names an opset of the
 * default domain, searched in statement order.
 */
export function findDefaultOpset(body: readonly PyStmt[], globals: Globals): Opset | undefined {
	for (const stmt of body) {
		const found = findInStmt(stmt, globals);
		if (found !== undefined) return found;
	}
	return undefined;
}

function findInStmt(stmt: PyStmt, globals: Globals): Opset | undefined {
	switch (stmt._type) {
	case "Assign":
		return findInExprs([...stmt.targets, stmt.value], globals);
	case "AnnAssign":
		return stmt.value === null ? undefined : findInExpr(stmt.value, globals);
	case "Return":
		return stmt.value === null ? undefined : findInExpr(stmt.value, globals);
	case "Expr":
		return findInExpr(stmt.value, globals);
	case "If":
	case "While":
		return findInExpr(stmt.test, globals)
			?? findDefaultOpset(stmt.body, globals)
			?? findDefaultOpset(stmt.orelse, globals);
	case "For":
		return findInExpr(stmt.iter, globals)
			?? findDefaultOpset(stmt.body, globals)
			?? findDefaultOpset(stmt.orelse, globals);
	case "FunctionDef":
		return findDefaultOpset(stmt.body, globals);
	default:
		return undefined;
	}
}

function findInExprs(exprs: readonly PyExpr[], globals: Globals): Opset | undefined {
	for (const expr of exprs) {
		const found = findInExpr(expr, globals);
		if (found !== undefined) return found;
	}
	return undefined;
}

function findInExpr(expr: PyExpr, globals: Globals): Opset | undefined {
	switch (expr._type) {
	case "Call": {
		const func = expr.func;
		if (func._type === "Attribute" && func.value._type === "Name") {
			const value = globals.get(func.value.id);
			if (value instanceof Opset && value.isDefaultDomain) return value;
		}
		return findInExprs([...expr.args, ...expr.keywords.map((k) => k.value)], globals);
	}
	case "BinOp":
		return findInExprs([expr.left, expr.right], globals);
	case "UnaryOp":
		return findInExpr(expr.operand, globals);
	case "BoolOp":
		return findInExprs(expr.values, globals);
	case "Compare":
		return findInExprs([expr.left, ...expr.comparators], globals);
	case "Subscript":
		return findInExprs([expr.value, expr.slice], globals);
	case "Tuple":
	case "List":
		return findInExprs(expr.elts, globals);
	default:
		return undefined;
	}
}
