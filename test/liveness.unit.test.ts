// graphscript Liveness Analysis - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { analyzeFunction, defs, exposedUses, outerScopeVariables, usedVars } from "../src/analysis/liveness.js";
import { parseExpression, parseScript } from "../src/ast/parser.js";
import type { PyFunctionDef, PyStmt } from "../src/ast/types.js";

function parseFunction(source: string): PyFunctionDef {
	const [fn] = parseScript(source).body;
	if (fn?._type !== "FunctionDef") throw new Error("expected a function");
	return fn;
}

function stmt(fn: PyFunctionDef, index: number): PyStmt {
	const s = fn.body[index];
	if (s === undefined) throw new Error(`no statement ${index}`);
	return s;
}

describe("usedVars", () => {
	it("collects names but not callees", () => {
		assert.deepEqual([...usedVars(parseExpression("op.Add(X, Y[i]) * k"))], ["X", "Y", "i", "k"]);
	});

	it("ignores bare function names", () => {
		assert.deepEqual([...usedVars(parseExpression("g(a, b=c)"))], ["a", "c"]);
	});
});

describe("defs", () => {
	it("lists assigned names in source order, through nested blocks", () => {
		const fn = parseFunction([
			"def f(X):",
			"    a = X",
			"    if X:",
			"        b = a",
			"    else:",
			"        c = a",
			"    for i in range(3):",
			"        d, e = op.Split(X)",
			"    return a",
		].join("\n"));
		assert.deepEqual([...defs(fn.body)], ["a", "b", "c", "i", "d", "e"]);
	});
});

describe("liveOut", () => {
	it("keeps only names read later", () => {
		const fn = parseFunction([
			"def f(X):",
			"    a = op.Abs(X)",
			"    b = op.Neg(X)",
			"    if X:",
			"        a = b",
			"    return a",
		].join("\n"));
		const oracle = analyzeFunction(fn);
		assert.deepEqual([...oracle.liveOut(stmt(fn, 2))], ["a"]);
		assert.deepEqual([...oracle.liveOut(stmt(fn, 1))].sort(), ["X", "a", "b"]);
	});

	it("carries names read by a later loop iteration", () => {
		const fn = parseFunction([
			"def f(X, N):",
			"    s = X",
			"    for i in range(N):",
			"        t = op.Add(s, X)",
			"        s = t",
			"    return s",
		].join("\n"));
		const oracle = analyzeFunction(fn);
		const loop = stmt(fn, 1);
		assert.deepEqual([...oracle.liveOut(loop)], ["s"]);
		if (loop._type !== "For") throw new Error("expected a loop");
		const [first, second] = loop.body;
		if (first === undefined || second === undefined) throw new Error("expected two statements");
		// both are read again by the next iteration
		assert.deepEqual([...oracle.liveOut(second)].sort(), ["X", "s"]);
		assert.deepEqual([...oracle.liveOut(first)].sort(), ["X", "t"]);
	});

	it("treats a while test as read at every iteration", () => {
		const fn = parseFunction([
			"def f(X, c):",
			"    while c:",
			"        X = op.Neg(X)",
			"        c = op.Not(c)",
			"    return X",
		].join("\n"));
		const oracle = analyzeFunction(fn);
		const loop = stmt(fn, 0);
		if (loop._type !== "While") throw new Error("expected a loop");
		const last = loop.body[1];
		if (last === undefined) throw new Error("expected two statements");
		assert.deepEqual([...oracle.liveOut(last)].sort(), ["X", "c"]);
	});
});

describe("exposedUses", () => {
	it("returns names read before they are assigned", () => {
		const fn = parseFunction([
			"def f(X):",
			"    X = op.Neg(X)",
			"    c = op.Not(c)",
			"    y = c",
			"    return y",
		].join("\n"));
		assert.deepEqual([...exposedUses(fn.body)].sort(), ["X", "c"]);
	});
});

describe("outerScopeVariables", () => {
	it("excludes the nested function's own parameters", () => {
		const outer = parseFunction([
			"def f(X, W):",
			"    def inner(Y):",
			"        return op.Add(Y, W)",
			"    return inner(X)",
		].join("\n"));
		const inner = stmt(outer, 0);
		if (inner._type !== "FunctionDef") throw new Error("expected a nested function");
		assert.deepEqual([...outerScopeVariables(inner)], ["W"]);
	});
});
