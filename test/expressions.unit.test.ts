// SPDX-License-Identifier: MIT
// graphscript Expression Lowering - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { parseExpression } from "../src/ast/parser.js";
import type { PyExpr } from "../src/ast/types.js";
import { separateInputsAndAttributes } from "../src/converter/expressions.js";
import { ErrorCodes, GraphScriptError } from "../src/errors.js";
import { printFunction } from "../src/ir/printer.js";
import { Opset, paramSchemasFromOpSchema, type ParamSchema } from "../src/schemas/opset.js";
import { compileFunction, compileScript } from "../src/script.js";

//==============================================================================
// Helpers
//==============================================================================

const HEADER = "from graphscript import opset18 as op\n";

// Functions built from operators alone call no `op.X`, so name the opset
const OPTIONS = { defaultOpset: new Opset("", 18) };

/** Node lines of the printed function `f` of a script */
function body(source: string): string[] {
	const fn = compileFunction(HEADER + source, "f", OPTIONS);
	return printFunction(fn.irFunction).split("\n").slice(2, -1);
}

function compileError(source: string): GraphScriptError {
	try {
		compileScript(HEADER + source, OPTIONS);
	} catch (e) {
		if (e instanceof GraphScriptError) return e;
		throw e;
	}
	throw new Error("expected a compilation error");
}

function params(name: string): ParamSchema[] {
	const schema = new Opset("", 18).getSchema(name);
	if (schema === undefined) throw new Error(`no schema for ${name}`);
	return paramSchemasFromOpSchema(schema);
}

function callParts(source: string): { args: PyExpr[]; keywords: Map<string, PyExpr> } {
	const call = parseExpression(source);
	if (call._type !== "Call") throw new Error("expected a call");
	return { args: call.args, keywords: new Map(call.keywords.map((k): [string, PyExpr] => [k.arg, k.value])) };
}

function describeArg(expr: PyExpr | null): string | null {
	if (expr === null) return null;
	return expr._type === "Name" ? expr.id : expr._type;
}

//==============================================================================
// Operators
//==============================================================================

describe("operators", () => {
	it("casts a literal operand like the other operand", () => {
		assert.deepEqual(body("def f(X):\n    return op.Abs(X) + 1"), [
			"   tmp = Abs (X)",
			"   int64_1 = Constant <value=INT64{1}> ()",
			"   int64_1_cast = CastLike (int64_1, tmp)",
			"   return_val = Add (tmp, int64_1_cast)",
		]);
	});

	it("emits no cast between two graph values", () => {
		assert.deepEqual(body("def f(X, Y):\n    return X * Y"), [
			"   return_val = Mul (X, Y)",
		]);
	});

	it("lowers != to Equal followed by Not", () => {
		assert.deepEqual(body("def f(X, Y):\n    return X != Y"), [
			"   tmp = Equal (X, Y)",
			"   return_val = Not (tmp)",
		]);
	});

	it("makes % by a float literal a floating-point remainder", () => {
		assert.deepEqual(body("def f(X):\n    return X % 2.5"), [
			"   const = Constant <value=FLOAT{2.5}> ()",
			"   const_cast = CastLike (const, X)",
			"   return_val = Mod <fmod=1> (X, const_cast)",
		]);
	});

	it("folds negated and arithmetic literals", () => {
		assert.deepEqual(body("def f(X):\n    return op.Add(X, -1) * (2 * 3)"), [
			"   int64_m1 = Constant <value=INT64{-1}> ()",
			"   int64_m1_cast = CastLike (int64_m1, X)",
			"   tmp = Add (X, int64_m1_cast)",
			"   int64_6 = Constant <value=INT64{6}> ()",
			"   int64_6_cast = CastLike (int64_6, tmp)",
			"   return_val = Mul (tmp, int64_6_cast)",
		]);
	});

	it("chains boolean operators", () => {
		assert.deepEqual(body("def f(X, Y, Z):\n    return X and Y or Z"), [
			"   tmp = And (X, Y)",
			"   return_val = Or (tmp, Z)",
		]);
	});

	it("names a boolean operation after its assignment target", () => {
		assert.deepEqual(body("def f(A, B):\n    y = A and B\n    return y"), [
			"   y = And (A, B)",
		]);
	});

	it("lowers unary operators on graph values", () => {
		assert.deepEqual(body("def f(X):\n    return -X"), [
			"   return_val = Neg (X)",
		]);
	});

	it("rejects operators without a graph counterpart", () => {
		const err = compileError("def f(X):\n    return X << 1");
		assert.equal(err.code, ErrorCodes.UnsupportedConstruct);
		assert.equal(err.message, "Unsupported operator LShift.");
		assert.deepEqual(err.location, { line: 3, column: 11, functionName: "f" });
	});

	it("rejects chained comparisons", () => {
		const err = compileError("def f(X, Y, Z):\n    return X < Y < Z");
		assert.equal(err.code, ErrorCodes.UnsupportedConstruct);
		assert.equal(err.message, "Chained comparisons are not supported.");
	});
});

//==============================================================================
// Calls
//==============================================================================

describe("calls", () => {
	it("turns keyword literals into attributes", () => {
		assert.deepEqual(body("def f(X):\n    return op.Transpose(X, perm=[1, 0])"), [
			"   return_val = Transpose <perm=[1, 0]> (X)",
		]);
	});

	it("drops attributes given as None", () => {
		assert.deepEqual(body("def f(X):\n    return op.LeakyRelu(X, alpha=None)"), [
			"   return_val = LeakyRelu (X)",
		]);
	});

	it("keeps an omitted optional input as an empty name", () => {
		assert.deepEqual(body("def f(X, M):\n    return op.Clip(X, None, M)"), [
			"   return_val = Clip (X, , M)",
		]);
	});

	it("reports positional arguments beyond the schema", () => {
		const err = compileError("def f(X):\n    return op.Abs(X, X)");
		assert.equal(err.code, ErrorCodes.ArityError);
		assert.equal(err.message, "Abs takes 1 positional arguments but 2 were given.");
		assert.equal(err.location?.line, 3);
	});

	it("rejects graph values as attributes", () => {
		const err = compileError("def f(X, I):\n    k = op.Abs(X)\n    return op.Gather(X, I, axis=k)");
		assert.equal(err.code, ErrorCodes.TypeMismatch);
		assert.equal(err.message, "Attribute axis must be a constant or an attribute parameter, but 'k' is a graph value.");
	});

	it("rejects empty list attributes", () => {
		const err = compileError("def f(X):\n    return op.Transpose(X, perm=[])");
		assert.equal(err.code, ErrorCodes.EmptyList);
		assert.equal(err.message, "Cannot infer the type of attribute perm from an empty list.");
	});

	it("warns about operators missing from the opset", () => {
		const { functions, diagnostics } = compileScript(HEADER + "def f(X):\n    return op.Foo(X)");
		assert.equal(functions.length, 1);
		assert.deepEqual(diagnostics, [{
			message: "'Foo' is not a known op in 'Opset('', 18)'.",
			location: { line: 3, column: 11, functionName: "f" },
		}]);
		assert.deepEqual(functions[0]?.warnings, diagnostics);
	});
});

describe("separateInputsAndAttributes", () => {
	it("fills inputs positionally and attributes by keyword", () => {
		const { args, keywords } = callParts("Gemm(A, B, alpha=2.0)");
		const split = separateInputsAndAttributes(params("Gemm"), args, keywords, "Gemm");
		assert.deepEqual(split.inputs.map(describeArg), ["A", "B"]);
		assert.deepEqual(split.attrs.map(([name]) => name), ["alpha"]);
	});

	it("leaves a gap for an optional input given later by keyword", () => {
		const { args, keywords } = callParts("Clip(X, max=M)");
		const split = separateInputsAndAttributes(params("Clip"), args, keywords, "Clip");
		assert.deepEqual(split.inputs.map(describeArg), ["X", null, "M"]);
	});

	it("lets positional arguments continue into attributes", () => {
		const { args, keywords } = callParts("LeakyRelu(X, 0.5)");
		const split = separateInputsAndAttributes(params("LeakyRelu"), args, keywords, "LeakyRelu");
		assert.deepEqual(split.inputs.map(describeArg), ["X"]);
		assert.deepEqual(split.attrs.map(([name, e]) => [name, e._type]), [["alpha", "Constant"]]);
	});

	it("gives every remaining argument to a variadic input", () => {
		const { args, keywords } = callParts("Sum(a, b, c)");
		const split = separateInputsAndAttributes(params("Sum"), args, keywords, "Sum");
		assert.deepEqual(split.inputs.map(describeArg), ["a", "b", "c"]);
	});

	it("reports missing required parameters", () => {
		const sum = callParts("Sum()");
		assert.throws(() => separateInputsAndAttributes(params("Sum"), sum.args, sum.keywords, "Sum"),
			/^GraphScriptError: Missing required variadic input data_0 of Sum\.$/);
		const add = callParts("Add(X)");
		assert.throws(() => separateInputsAndAttributes(params("Add"), add.args, add.keywords, "Add"),
			/^GraphScriptError: Missing required input B of Add\.$/);
	});

	it("reports unexpected keywords", () => {
		const { args, keywords } = callParts("Relu(X, foo=1)");
		assert.throws(() => separateInputsAndAttributes(params("Relu"), args, keywords, "Relu"), (e: unknown) =>
			e instanceof GraphScriptError
			&& e.code === ErrorCodes.ArityError
			&& e.message === "Relu got an unexpected keyword argument 'foo'.");
	});
});
