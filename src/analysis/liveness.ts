// Liveness analysis
// Def-use facts the converter needs to decide which names leave a
// control-flow block as explicit outputs

import type { PyExpr, PyFunctionDef, PyStmt } from "../ast/types.js";
import { exhaustive } from "../errors.js";

//==============================================================================
// Oracle Interface
//==============================================================================

/**
 * Name sets are insertion-ordered; `defs` order is the order names are
 * first assigned in source.
 */
export interface LivenessOracle {
	/** Names a statement (or block) assigns */
	defs(stmts: PyStmt | readonly PyStmt[]): Set<string>;
	/** Names whose values are read after the statement completes */
	liveOut(stmt: PyStmt): Set<string>;
	/** Names a block reads before assigning them */
	exposedUses(stmts: readonly PyStmt[]): Set<string>;
	/** Names a nested function reads from enclosing scopes */
	outerScopeVariables(fn: PyFunctionDef): Set<string>;
}

//==============================================================================
// Set Helpers
//==============================================================================

function union(...sets: Iterable<string>[]): Set<string> {
	const result = new Set<string>();
	for (const s of sets) for (const x of s) result.add(x);
	return result;
}

function difference(a: Iterable<string>, b: ReadonlySet<string>): Set<string> {
	const result = new Set<string>();
	for (const x of a) if (!b.has(x)) result.add(x);
	return result;
}

function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
	return a.size === b.size && [...a].every((x) => b.has(x));
}

//==============================================================================
// Defs and Uses
//==============================================================================

function targetNames(target: PyExpr, out: Set<string>): void {
	if (target._type === "Name") out.add(target.id);
	else if (target._type === "Tuple" || target._type === "List") {
		for (const elt of target.elts) targetNames(elt, out);
	}
}

function collectDefs(stmt: PyStmt, out: Set<string>): void {
	switch (stmt._type) {
	case "Assign":
		for (const target of stmt.targets) targetNames(target, out);
		break;
	case "AnnAssign":
		targetNames(stmt.target, out);
		break;
	case "If":
		for (const s of stmt.body) collectDefs(s, out);
		for (const s of stmt.orelse) collectDefs(s, out);
		break;
	case "For":
		targetNames(stmt.target, out);
		for (const s of stmt.body) collectDefs(s, out);
		break;
	case "While":
		for (const s of stmt.body) collectDefs(s, out);
		break;
	case "FunctionDef":
		out.add(stmt.name);
		break;
	case "Import":
		for (const alias of stmt.names) out.add(alias.asname ?? alias.name.split(".")[0] ?? alias.name);
		break;
	case "ImportFrom":
		for (const alias of stmt.names) out.add(alias.asname ?? alias.name);
		break;
	case "Return":
	case "Break":
	case "Pass":
	case "Expr":
		break;
	default:
		exhaustive(stmt);
	}
}

export function defs(stmts: PyStmt | readonly PyStmt[]): Set<string> {
	const out = new Set<string>();
	const list: readonly PyStmt[] = "_type" in stmts ? [stmts] : stmts;
	for (const stmt of list) collectDefs(stmt, out);
	return out;
}

/**
 * Names an expression reads. A call's callee is not a use: it names an
 * operator or function, never a graph value.
 */
export function usedVars(expr: PyExpr | null): Set<string> {
	const out = new Set<string>();
	const visit = (e: PyExpr | null): void => {
		if (e === null) return;
		switch (e._type) {
		case "Name": out.add(e.id); break;
		case "Constant": break;
		case "BinOp": visit(e.left); visit(e.right); break;
		case "UnaryOp": visit(e.operand); break;
		case "BoolOp": e.values.forEach(visit); break;
		case "Compare": visit(e.left); e.comparators.forEach(visit); break;
		case "Call":
			e.args.forEach(visit);
			for (const k of e.keywords) visit(k.value);
			break;
		case "Attribute": visit(e.value); break;
		case "Subscript": visit(e.value); visit(e.slice); break;
		case "Slice": visit(e.lower); visit(e.upper); visit(e.step); break;
		case "Tuple":
		case "List":
			e.elts.forEach(visit);
			break;
		default: exhaustive(e);
		}
	};
	visit(expr);
	return out;
}

function parameterNames(fn: PyFunctionDef): Set<string> {
	return new Set(fn.args.args.map((a) => a.arg));
}

//==============================================================================
// Backward Analysis
//==============================================================================

class LivenessAnalyzer {
	readonly liveOutOf = new WeakMap<PyStmt, Set<string>>();

	constructor(private readonly annotate: boolean) {}

	visitBlock(stmts: readonly PyStmt[], liveOut: Set<string>, loopExit: Set<string>): Set<string> {
		let live = liveOut;
		for (let i = stmts.length - 1; i >= 0; i--) {
			const stmt = stmts[i];
			if (stmt !== undefined) live = this.visit(stmt, live, loopExit);
		}
		return live;
	}

	private visit(stmt: PyStmt, liveOut: Set<string>, loopExit: Set<string>): Set<string> {
		if (this.annotate) this.liveOutOf.set(stmt, liveOut);
		switch (stmt._type) {
		case "Assign":
		case "AnnAssign":
			return union(difference(liveOut, defs(stmt)), usedVars(stmt.value));
		case "Return":
			return usedVars(stmt.value);
		case "If":
			return union(
				this.visitBlock(stmt.body, liveOut, loopExit),
				this.visitBlock(stmt.orelse, liveOut, loopExit),
				usedVars(stmt.test),
			);
		case "For": {
			const loopVars = new Set<string>();
			targetNames(stmt.target, loopVars);
			// Iterate to a fixed point: the body's end flows back to its start
			let bodyOut = liveOut;
			let bodyIn = this.visitBlock(stmt.body, bodyOut, liveOut);
			for (;;) {
				const next = union(liveOut, difference(bodyIn, loopVars));
				if (sameSet(next, bodyOut)) break;
				bodyOut = next;
				bodyIn = this.visitBlock(stmt.body, bodyOut, liveOut);
			}
			return union(difference(bodyIn, loopVars), usedVars(stmt.iter), difference(liveOut, loopVars));
		}
		case "While": {
			const testVars = usedVars(stmt.test);
			let bodyOut = union(liveOut, testVars);
			let bodyIn = this.visitBlock(stmt.body, bodyOut, liveOut);
			for (;;) {
				const next = union(liveOut, testVars, bodyIn);
				if (sameSet(next, bodyOut)) break;
				bodyOut = next;
				bodyIn = this.visitBlock(stmt.body, bodyOut, liveOut);
			}
			return union(bodyIn, testVars, liveOut);
		}
		case "Break":
			return loopExit;
		case "FunctionDef":
			if (this.annotate) this.visitBlock(stmt.body, new Set(), new Set());
			return union(difference(liveOut, new Set([stmt.name])), outerScopeVariables(stmt));
		case "Import":
		case "ImportFrom":
			return difference(liveOut, defs(stmt));
		case "Expr":
			return union(liveOut, usedVars(stmt.value));
		case "Pass":
			return liveOut;
		default:
			return exhaustive(stmt);
		}
	}
}

export function exposedUses(stmts: readonly PyStmt[]): Set<string> {
	return new LivenessAnalyzer(false).visitBlock(stmts, new Set(), new Set());
}

export function outerScopeVariables(fn: PyFunctionDef): Set<string> {
	return difference(exposedUses(fn.body), parameterNames(fn));
}

//==============================================================================
// Default Oracle
//==============================================================================

/**
 * Analyze a function body. Statements of nested functions are analyzed
 * too, each against its own body.
 */
export function analyzeFunction(fn: PyFunctionDef): LivenessOracle {
	const analyzer = new LivenessAnalyzer(true);
	analyzer.visitBlock(fn.body, new Set(), new Set());
	return {
		defs,
		liveOut: (stmt) => analyzer.liveOutOf.get(stmt) ?? new Set(),
		exposedUses,
		outerScopeVariables,
	};
}
