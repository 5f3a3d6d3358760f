// SPDX-License-Identifier: MIT
// graphscript Function Translation - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { parseScript } from "../src/ast/parser.js";
import { Converter, findDefaultOpset } from "../src/converter/converter.js";
import { ErrorCodes, GraphScriptError } from "../src/errors.js";
import { printFunction } from "../src/ir/printer.js";
import { Opset } from "../src/schemas/opset.js";
import { compileFunction, compileScript, type CompileOptions } from "../src/script.js";
import type { Globals } from "../src/values.js";

//==============================================================================
// Helpers
//==============================================================================

const HEADER = "from graphscript import opset18 as op\n";

function printed(source: string, name = "f", options: CompileOptions = {}): string[] {
	return printFunction(compileFunction(HEADER + source, name, options).irFunction).split("\n");
}

function compileError(source: string, options: CompileOptions = {}): GraphScriptError {
	try {
		compileScript(HEADER + source, options);
	} catch (e) {
		if (e instanceof GraphScriptError) return e;
		throw e;
	}
	throw new Error("expected a compilation error");
}

//==============================================================================
// Signatures
//==============================================================================

describe("function signatures", () => {
	it("makes float parameters attributes with their default", () => {
		const source = "def f(X, alpha: float = 0.5):\n    return op.LeakyRelu(X, alpha=alpha)";
		assert.deepEqual(printed(source), [
			"f <alpha: FLOAT = 0.5> (X) => (return_val)",
			"{",
			"   return_val = LeakyRelu <alpha=@alpha> (X)",
			"}",
		]);

		const proto = compileFunction(HEADER + source, "f").toFunctionProto();
		assert.deepEqual(proto.input, ["X"]);
		assert.deepEqual(proto.attribute, []);
		assert.deepEqual(proto.attributeProto, [{ name: "alpha", type: "FLOAT", f: 0.5 }]);
		assert.deepEqual(proto.node[0]?.attribute, [{ name: "alpha", type: "FLOAT", refAttrName: "alpha" }]);
	});

	it("promotes an attribute used as an operand to a Constant", () => {
		const source = "def f(X, k: int):\n    return op.Add(X, k)";
		assert.deepEqual(printed(source), [
			"f <k: INT> (X) => (return_val)",
			"{",
			"   k = Constant <value_int=@k> ()",
			"   k_cast = CastLike (k, X)",
			"   return_val = Add (X, k_cast)",
			"}",
		]);
		assert.deepEqual(compileFunction(HEADER + source, "f").toFunctionProto().attribute, ["k"]);
	});

	it("casts a promoted bool attribute to a boolean tensor", () => {
		const source = "def f(flag: bool = True):\n    return op.Not(flag)";
		assert.deepEqual(printed(source), [
			"f <flag: INT = True> () => (return_val)",
			"{",
			"   flag = Constant <value_int=@flag> ()",
			"   flag_as_bool = Cast <to=9> (flag)",
			"   return_val = Not (flag_as_bool)",
			"}",
		]);
		assert.deepEqual(
			compileFunction(HEADER + source, "f").toFunctionProto().attributeProto,
			[{ name: "flag", type: "INT", i: 1n }],
		);
	});

	it("keeps declared tensor types on inputs and outputs", () => {
		const source = "def f(X: FLOAT['N']) -> FLOAT['N']:\n    return op.Abs(X)";
		assert.equal(printed(source)[0], "f (X: FLOAT[N]) => (return_val: FLOAT[N])");
	});

	it("warns that an input default is ignored", () => {
		const { diagnostics } = compileScript(HEADER + "def f(X=1):\n    return op.Abs(X)");
		assert.deepEqual(diagnostics.map((d) => d.message), ["Default value of input X is ignored."]);
	});
});

//==============================================================================
// Returns
//==============================================================================

describe("return statements", () => {
	it("copies a returned input once", () => {
		const lines = printed("def f(X):\n    return X", "f", { defaultOpset: new Opset("", 18) });
		assert.deepEqual(lines.slice(2, -1), ["   return_val = Identity (X)"]);
	});

	it("copies a value returned twice", () => {
		assert.deepEqual(printed("def f(X):\n    y = op.Abs(X)\n    return y, y"), [
			"f (X) => (y, y_copy)",
			"{",
			"   y = Abs (X)",
			"   y_copy = Identity (y)",
			"}",
		]);
	});

	it("checks the number of returned values against the declared types", () => {
		const err = compileError("def f(X) -> FLOAT:\n    y = op.Abs(X)\n    return y, y");
		assert.equal(err.code, ErrorCodes.ArityError);
		assert.equal(err.message, "Mismatch in number of return values and types: 2 values, 1 declared types.");
	});

	it("requires a default opset when none is used", () => {
		const err = compileError("def f(X):\n    return X");
		assert.equal(err.code, ErrorCodes.ConfigurationError);
		assert.equal(
			err.message,
			"A default opset must be given for functions that do not use any operator of the default domain.",
		);
	});

	it("rejects statements after a return", () => {
		const err = compileError("def f(X):\n    return op.Abs(X)\n    y = op.Neg(X)");
		assert.equal(err.code, ErrorCodes.UnsupportedConstruct);
	});
});

//==============================================================================
// Assignments
//==============================================================================

describe("assignments", () => {
	it("assigns tuples element by element", () => {
		const lines = printed("def f(X):\n    a, b = op.Abs(X), op.Neg(X)\n    return op.Add(a, b)");
		assert.deepEqual(lines.slice(2, -1), [
			"   a = Abs (X)",
			"   b = Neg (X)",
			"   return_val = Add (a, b)",
		]);
	});

	it("binds each output of a multi-output call", () => {
		const source = [
			"def g(X):",
			"    return op.Abs(X), op.Neg(X)",
			"def f(X):",
			"    a, b = g(X)",
			"    return op.Add(a, b)",
		].join("\n");
		assert.deepEqual(printed(source, "g").slice(2, -1), [
			"   return_val0 = Abs (X)",
			"   return_val1 = Neg (X)",
		]);
		assert.deepEqual(printed(source).slice(2, -1), [
			"   a, b = this.g (X)",
			"   return_val = Add (a, b)",
		]);
	});

	it("rejects chained assignment", () => {
		const err = compileError("def f(X):\n    a = b = op.Abs(X)\n    return a");
		assert.equal(err.message, "Multi-assignment not supported.");
		assert.equal(err.location?.line, 3);
	});

	it("warns about annotations that are not types", () => {
		const { diagnostics } = compileScript(HEADER + "def f(X):\n    y: 3 = op.Abs(X)\n    return y");
		assert.deepEqual(diagnostics, [{
			message: "Unsupported type annotation for variable y.",
			location: { line: 3, column: 7, functionName: "f" },
		}]);
	});

	it("reports unbound names with their position", () => {
		const err = compileError("def f(X):\n    return op.Add(X, Z)");
		assert.equal(err.code, ErrorCodes.UnboundName);
		assert.equal(err.message, "Unbound name: Z.");
		assert.deepEqual(err.location, { line: 3, column: 21, functionName: "f" });
	});

	it("skips docstrings and print calls", () => {
		const fn = compileFunction(HEADER + "def f(X):\n    'Absolute value.'\n    print(X)\n    return op.Abs(X)", "f");
		assert.equal(fn.toFunctionProto().docString, "Absolute value.");
		assert.equal(fn.irFunction.stmts.length, 1);
	});
});

//==============================================================================
// Opsets
//==============================================================================

describe("default opset", () => {
	it("is taken from the first default-domain call", () => {
		const globals: Globals = new Map([["op", new Opset("", 17)], ["ms", new Opset("com.example", 1)]]);
		const [fn] = parseScript("def f(X):\n    y = ms.Gelu(X)\n    return op.Abs(y)").body;
		if (fn?._type !== "FunctionDef") throw new Error("expected a function");
		assert.equal(findDefaultOpset(fn.body, globals)?.version, 17);
		assert.equal(findDefaultOpset(fn.body, new Map()), undefined);
	});

	it("rejects two versions of the default domain", () => {
		const err = compileError([
			"from graphscript import opset17 as op17",
			"def f(X):",
			"    y = op17.Abs(X)",
			"    return op.Neg(y)",
		].join("\n"));
		assert.equal(err.code, ErrorCodes.ConfigurationError);
		assert.equal(err.message, "Two distinct opsets were used (Opset('', 18) != Opset('', 17)).");
	});
});

//==============================================================================
// Nested Functions
//==============================================================================

describe("nested functions", () => {
	const source = [
		"def f(X):",
		"    def inner(Y):",
		"        return op.Add(Y, X)",
		"    return inner(X)",
	].join("\n");

	it("calls the nested function through the module domain", () => {
		const fn = compileFunction(HEADER + source, "f");
		assert.deepEqual(printFunction(fn.irFunction).split("\n").slice(2, -1), [
			"   return_val_0 = this.inner (X)",
		]);
	});

	it("ships the nested function with the model", () => {
		const model = compileFunction(HEADER + source, "f").toModelProto();
		assert.deepEqual(model.opsetImport, [{ domain: "", version: 18 }, { domain: "this", version: 1 }]);
		assert.deepEqual(model.functions.map((f) => [f.domain, f.name]), [["this", "inner"]]);
		const [inner] = model.functions;
		assert.deepEqual(inner?.input, ["Y"]);
		assert.deepEqual(inner?.output, ["return_val"]);
		assert.deepEqual(inner?.node.map((n) => [n.opType, n.input]), [["Add", ["Y", "X"]]]);
	});

	it("rejects rebinding a captured variable before the call", () => {
		const err = compileError([
			"def f(X):",
			"    def inner(Y):",
			"        return op.Add(Y, X)",
			"    X = op.Neg(X)",
			"    return inner(X)",
		].join("\n"));
		assert.equal(err.code, ErrorCodes.CapturedVariableMutation);
		assert.equal(err.message, "Outer scope variable X referenced by function 'inner' modified.");
		assert.equal(err.location?.line, 6);
	});
});

describe("Converter", () => {
	it("accepts only function definitions", () => {
		const converter = new Converter({ defaultOpset: new Opset("", 18) });
		const [stmt] = parseScript("x = 1").body;
		if (stmt === undefined) throw new Error("expected a statement");
		assert.throws(() => converter.topLevelStmt(stmt), /Unsupported top-level statement type Assign\./);
	});

	it("registers translated functions in its module domain", () => {
		const converter = new Converter({ defaultOpset: new Opset("", 18) });
		const [stmt] = parseScript("def g(X):\n    return X").body;
		if (stmt === undefined) throw new Error("expected a statement");
		const fn = converter.topLevelStmt(stmt);
		assert.equal(converter.thisModule.has("g"), true);
		assert.equal(fn.toString(), "<script function this.g>");
		assert.deepEqual(fn.opSchema.inputs.map((p) => p.typeStr), ["T_X"]);
	});
});
