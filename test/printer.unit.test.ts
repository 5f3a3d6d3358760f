// graphscript Printer and Serialization - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { GraphProto } from "../src/ir/model.js";
import { printFunction, printGraph } from "../src/ir/printer.js";
import { canonicalize, modelDigest, toJson } from "../src/ir/serialize.js";
import { compileFunction } from "../src/script.js";
import { ElementType } from "../src/types/element-types.js";

const HEADER = "from graphscript import opset18 as op\n";

describe("printFunction", () => {
	it("indents branch graphs under their node", () => {
		const fn = compileFunction(HEADER + [
			"def f(X, C):",
			"    if C:",
			"        y = op.Abs(X)",
			"    else:",
			"        y = op.Neg(X)",
			"    return y",
		].join("\n"), "f");
		assert.equal(printFunction(fn.irFunction), [
			"f (X, C) => (y_1)",
			"{",
			"   y_1 = If <then_branch=",
			"      thenGraph_3 () => (y)",
			"      {",
			"         y = Abs (X)",
			"      }, else_branch=",
			"      elseGraph_3 () => (y_0)",
			"      {",
			"         y_0 = Neg (X)",
			"      }> (C)",
			"}",
		].join("\n"));
	});

	it("shows the declared types of loop body inputs", () => {
		const fn = compileFunction(HEADER + [
			"def f(X, N):",
			"    s = op.Identity(X)",
			"    for i in range(N):",
			"        s = op.Add(s, X)",
			"    return s",
		].join("\n"), "f");
		const lines = printFunction(fn.irFunction).split("\n");
		assert.equal(lines[4], "   s_2 = Loop <body=");
		assert.equal(lines[5], "      loop_body (i: INT64, cond_in: BOOL, s_0) => (cond_out: BOOL, s_1)");
	});
});

describe("printGraph", () => {
	const graph: GraphProto = {
		name: "g",
		node: [
			{
				opType: "Constant",
				domain: "",
				input: [],
				output: ["c"],
				attribute: [{
					name: "value",
					type: "TENSOR",
					t: { name: "c", dataType: ElementType.FLOAT, dims: [2], floatData: [0.5, 1.5] },
				}],
			},
			{
				opType: "Foo",
				domain: "com.example",
				input: ["c", ""],
				output: ["d"],
				attribute: [
					{ name: "names", type: "STRINGS", strings: ["a", "b"] },
					{ name: "mode", type: "STRING", s: "fast" },
				],
			},
		],
		input: [{
			name: "x",
			type: { kind: "sequence", elem: { kind: "tensor", elemType: ElementType.FLOAT, shape: [null, 3n] } },
		}],
		output: [{ name: "d" }],
		initializer: [],
	};

	it("prints tensors, lists, strings and domains", () => {
		assert.equal(printGraph(graph), [
			"g (x: seq(FLOAT[?,3])) => (d)",
			"{",
			"   c = Constant <value=FLOAT{[0.5, 1.5]}> ()",
			"   d = com.example.Foo <names=[\"a\", \"b\"], mode=\"fast\"> (c, )",
			"}",
		].join("\n"));
	});
});

describe("canonicalize", () => {
	it("sorts keys, drops undefined members and writes int64 as strings", () => {
		assert.equal(canonicalize({ b: 1, a: [true, null, 2n], c: undefined }), "{\"a\":[true,null,\"2\"],\"b\":1}");
	});

	it("normalizes negative zero", () => {
		assert.equal(canonicalize({ x: -0 }), "{\"x\":0}");
	});

	it("rejects non-finite numbers", () => {
		assert.throws(() => canonicalize({ x: Number.NaN }), /JCS: non-finite number NaN cannot be serialized/);
	});

	it("is the same for two translations of one function", () => {
		const source = HEADER + "def f(X):\n    return op.Abs(X) + 1";
		const first = compileFunction(source, "f").toModelProto();
		const second = compileFunction(source, "f").toModelProto();
		assert.equal(canonicalize(first), canonicalize(second));
	});
});

describe("toJson", () => {
	it("writes int64 values as decimal strings", () => {
		assert.equal(toJson({ i: 5n, f: 0.5 }, 0), "{\"i\":\"5\",\"f\":0.5}");
	});
});

describe("modelDigest", () => {
	it("ignores key order", () => {
		assert.equal(modelDigest({ a: 1, b: 2 }), modelDigest({ b: 2, a: 1 }));
	});

	it("names the algorithm", () => {
		assert.match(modelDigest({ a: 1 }), /^graphscript-sha256:[0-9a-f]{64}$/);
		assert.match(modelDigest({ a: 1 }, "sha512"), /^graphscript-sha512:[0-9a-f]{128}$/);
	});
});
