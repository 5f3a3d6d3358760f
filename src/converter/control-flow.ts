// Control-flow lowering
// `if` becomes an If node with two branch graphs; `for ... in range(n)` and
// `while c` become a Loop node with a body graph. Names assigned in a block
// and used after it leave the block as explicit, freshly named outputs.

import type { Located, PyFor, PyIf, PyStmt, PyWhile } from "../ast/types.js";
import { isBreak } from "../ast/types.js";
import type { IRFunction } from "../ir/builder.js";
import type { FunctionProto } from "../ir/model.js";
import { TensorType } from "../types/annotations.js";
import { ElementType } from "../types/element-types.js";
import { Dynamic, DynamicKind } from "../values.js";
import type { TranslationContext } from "./context.js";
import { translateExpr } from "./expressions.js";
import { translateStmt } from "./statements.js";

const INT64 = new TensorType(ElementType.INT64);
const BOOL = new TensorType(ElementType.BOOL);

//==============================================================================
// Blocks
//==============================================================================

/**
 * Translate a branch into its own graph. Every name of `outputs` becomes
 * an output of the graph: a value the branch computed is returned as is,
 * anything else through an Identity copy, since a graph output must be
 * produced inside the graph. Names sharing one value get a copy each.
 */
function translateBlock(
	stmts: readonly PyStmt[],
	name: string,
	outputs: readonly string[],
	parent: Located,
	ctx: TranslationContext,
): IRFunction {
	const info = stmts[0] ?? parent;
	ctx.enterScope(name);
	for (const stmt of stmts) translateStmt(stmt, ctx);

	const declared = new Set<string>();
	for (const pvar of outputs) {
		const local = ctx.scopes.lookupLocal(pvar);
		if (local !== undefined) {
			let output = ctx.toGraphValue(local, pvar, info).name;
			if (!ctx.currentFn.assignedNames.has(output) || declared.has(output)) output = ctx.emitCopy(output, pvar);
			declared.add(output);
			const typeinfo = local instanceof Dynamic ? local.typeinfo : undefined;
			ctx.builder.addOutput(ctx.currentFn, output, typeinfo, ctx.location(info));
			continue;
		}
		const outer = ctx.scopes.lookupOuter(pvar);
		if (outer === undefined) {
			ctx.fail(`Variable ${pvar} is not assigned a value along a conditional branch.`, info);
		}
		const copy = ctx.generateUniqueName(pvar);
		ctx.emit([copy], ctx.defaultOp("Identity"), [ctx.toGraphValue(outer, pvar, info).name]);
		ctx.builder.addOutput(ctx.currentFn, copy, undefined, ctx.location(info));
	}
	return ctx.exitScope();
}

/**
 * Functions called from inside nested graphs must ship with the node
 * that owns them.
 */
function blockFunctions(...blocks: IRFunction[]): Map<string, FunctionProto> {
	const functions = new Map<string, FunctionProto>();
	for (const block of blocks) {
		for (const [name, proto] of block.toGraphAndFunctions().functions) functions.set(name, proto);
	}
	return functions;
}

//==============================================================================
// Conditionals
//==============================================================================

export function translateIf(node: PyIf, ctx: TranslationContext): void {
	const liveOut = ctx.oracle.liveOut(node);
	const liveDefs = [...ctx.oracle.defs(node)].filter((x) => liveOut.has(x));
	const test = translateExpr(node.test, ctx, "cond").name;

	const thenGraph = translateBlock(node.body, `thenGraph_${node.lineno}`, liveDefs, node, ctx);
	const elseGraph = translateBlock(node.orelse, `elseGraph_${node.lineno}`, liveDefs, node, ctx);

	const renamed = liveDefs.map((x) => {
		const r = ctx.generateUniqueName(x);
		ctx.bind(x, new Dynamic(r, DynamicKind.Intermediate, ctx.location(node)));
		return r;
	});
	if (renamed.length === 0) {
		ctx.fail("A conditional must assign at least one variable used after it.", node);
	}
	if (renamed.length === 1 && renamed[0] === test) {
		ctx.fail(`Input and output cannot be the same ${test}.`, node);
	}

	ctx.emit(
		renamed,
		ctx.defaultOp("If"),
		[test],
		[ctx.builder.makeAttr("then_branch", thenGraph), ctx.builder.makeAttr("else_branch", elseGraph)],
		blockFunctions(thenGraph, elseGraph),
	);
}

//==============================================================================
// Loops
//==============================================================================

/**
 * `if <name>: break`, the only accepted form of break.
 */
function isBreakTest(stmt: PyStmt): stmt is PyIf {
	return stmt._type === "If" && stmt.body.length === 1 && stmt.orelse.length === 0
		&& stmt.body[0] !== undefined && isBreak(stmt.body[0]);
}

interface LoopHeader {
	/** Script name the iteration counter is bound to */
	loopVar: string;
	/** Iteration-count input; empty for `while` */
	bound: string;
	/** Name tested by a `while` loop */
	whileTest?: string;
}

function translateLoopHeader(node: PyFor | PyWhile, ctx: TranslationContext): LoopHeader {
	if (node._type === "For") {
		if (node.target._type !== "Name") ctx.fail("For loop target must be a single variable.", node);
		const iter = node.iter;
		if (iter._type !== "Call" || iter.func._type !== "Name" || iter.func.id !== "range") {
			ctx.fail("Unsupported loop bound, only function 'range' is allowed.", node);
		}
		const [count] = iter.args;
		if (count === undefined || iter.args.length !== 1 || iter.keywords.length > 0) {
			ctx.fail("Unsupported loop bound, it should be 'range(?)'.", node);
		}
		return { loopVar: node.target.id, bound: translateExpr(count, ctx, "loop_bound").name };
	}
	if (node.test._type !== "Name") {
		ctx.fail("Unexpected condition for a while loop, it should be 'while <condition_name>:'.", node);
	}
	return { loopVar: "infinite_loop", bound: "", whileTest: node.test.id };
}

/**
 * Both loop forms lower to one Loop node: inputs are the iteration count,
 * the initial condition and one value per loop-carried name; the body
 * graph takes (counter, condition, state...) and returns
 * (condition, state...).
 */
export function translateLoop(node: PyFor | PyWhile, ctx: TranslationContext): void {
	if (node.orelse.length > 0) ctx.fail("Loops with an else clause are not supported.", node);
	const header = translateLoopHeader(node, ctx);
	const location = ctx.location(node);

	// Loop-carried state: assigned in the body, and read by it before being
	// assigned or used after the loop
	const exposed = ctx.oracle.exposedUses(node.body);
	const liveOut = ctx.oracle.liveOut(node);
	const stateVars = [...ctx.oracle.defs(node.body)].filter((x) => exposed.has(x) || liveOut.has(x));

	const initCond = header.whileTest === undefined
		? ctx.emitConst(true, "true", node).name
		: ctx.toGraphValue(ctx.lookup(header.whileTest, node), header.whileTest, node).name;

	ctx.enterScope("loop_body");
	const counter = ctx.generateUniqueName(header.loopVar);
	ctx.builder.addInput(ctx.currentFn, counter, INT64, location);
	ctx.bind(header.loopVar, new Dynamic(counter, DynamicKind.LoopCarried, location));
	const condIn = ctx.generateUniqueName("cond_in");
	ctx.builder.addInput(ctx.currentFn, condIn, BOOL, location);
	for (const pv of stateVars) {
		const ov = ctx.generateUniqueName(pv);
		ctx.builder.addInput(ctx.currentFn, ov, undefined, location);
		ctx.bind(pv, new Dynamic(ov, DynamicKind.LoopCarried, location));
	}

	let breakCond: string | undefined;
	for (const [i, stmt] of node.body.entries()) {
		if (!isBreakTest(stmt)) {
			translateStmt(stmt, ctx);
			continue;
		}
		if (stmt.test._type !== "Name") {
			ctx.fail("Instruction break can only be introduced by a test of the form 'if <condition>: break'.", stmt);
		}
		if (i !== node.body.length - 1) ctx.fail("Instruction break must be the last one of the loop.", stmt);
		const cond = ctx.scopes.lookupLocal(stmt.test.id);
		if (!(cond instanceof Dynamic)) {
			ctx.fail(`Unable to find condition variable '${stmt.test.id}' among the variables of the loop body.`, stmt);
		}
		breakCond = cond.value;
	}

	const condOut = ctx.generateUniqueName("cond_out");
	if (header.whileTest !== undefined) {
		const current = ctx.scopes.lookupLocal(header.whileTest);
		if (!(current instanceof Dynamic)) {
			ctx.fail(`The loop condition '${header.whileTest}' must be assigned in the loop body.`, node);
		}
		if (breakCond === undefined) {
			ctx.emit([condOut], ctx.defaultOp("Identity"), [current.value]);
		} else {
			const notBreak = ctx.generateUniqueName(`${breakCond}_not`);
			ctx.emit([notBreak], ctx.defaultOp("Not"), [breakCond]);
			ctx.emit([condOut], ctx.defaultOp("And"), [current.value, notBreak]);
		}
	} else if (breakCond === undefined) {
		ctx.emit([condOut], ctx.defaultOp("Identity"), [condIn]);
	} else {
		ctx.emit([condOut], ctx.defaultOp("Not"), [breakCond]);
	}
	ctx.builder.addOutput(ctx.currentFn, condOut, BOOL, location);

	const declared = new Set<string>();
	for (const pv of stateVars) {
		let ov = ctx.toGraphValue(ctx.lookup(pv, node), pv, node).name;
		// `x = y` with y from outside the body, or a value already returned
		// for another name, still needs a node of its own
		if (!ctx.currentFn.assignedNames.has(ov) || declared.has(ov)) ov = ctx.emitCopy(ov, pv);
		declared.add(ov);
		ctx.builder.addOutput(ctx.currentFn, ov, undefined, location);
	}
	const body = ctx.exitScope();

	const inputs = [
		header.bound,
		initCond,
		...stateVars.map((pv) => ctx.toGraphValue(ctx.lookup(pv, node), pv, node).name),
	];
	const outputs = stateVars.map((pv) => {
		const r = ctx.generateUniqueName(pv);
		ctx.bind(pv, new Dynamic(r, DynamicKind.Intermediate, location));
		return r;
	});
	ctx.emit(outputs, ctx.defaultOp("Loop"), inputs, [ctx.builder.makeAttr("body", body)], blockFunctions(body));
}
