// graphscript Literal-Expression Evaluator - Unit Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { parseExpression } from "../src/ast/parser.js";
import { ErrorCodes, GraphScriptError } from "../src/errors.js";
import { evalConstantExpr, evalLiteral, isConstantExpr, isTruthy } from "../src/evaluator/constant-expr.js";
import { Op, Opset } from "../src/schemas/opset.js";
import { GenericAlias, ScalarType, SequenceType, TensorType, typeGlobals } from "../src/types/annotations.js";
import { ElementType } from "../src/types/element-types.js";
import type { GlobalValue, Globals } from "../src/values.js";

function evaluate(source: string, globals: Globals = new Map()): GlobalValue {
	return evalConstantExpr(parseExpression(source), globals);
}

describe("isConstantExpr", () => {
	it("accepts literals and operators over literals", () => {
		for (const source of ["1", "-1", "2 * 3 + 1", "[1, 2, -3]", "1 < 2", "'a'"]) {
			assert.equal(isConstantExpr(parseExpression(source)), true, source);
		}
	});

	it("rejects names, calls and subscripts", () => {
		for (const source of ["x", "x + 1", "f(1)", "[1, x]", "a[0]", "(1, 2)"]) {
			assert.equal(isConstantExpr(parseExpression(source)), false, source);
		}
	});
});

describe("evalConstantExpr", () => {
	describe("arithmetic", () => {
		it("keeps integer arithmetic exact", () => {
			assert.equal(evaluate("2 ** 62 * 2"), 9223372036854775808n);
			assert.equal(evaluate("7 - 10"), -3n);
		});

		it("uses floor semantics for // and %", () => {
			assert.equal(evaluate("-7 // 2"), -4n);
			assert.equal(evaluate("-7 % 3"), 2n);
			assert.equal(evaluate("7 % -3"), -2n);
			assert.equal(evaluate("-7.5 // 2"), -4);
		});

		it("makes true division produce a float", () => {
			assert.equal(evaluate("7 / 2"), 3.5);
			assert.equal(evaluate("4 / 2"), 2);
		});

		it("mixes ints and floats as floats", () => {
			assert.equal(evaluate("1 + 0.5"), 1.5);
		});

		it("treats booleans as integers", () => {
			assert.equal(evaluate("True + True"), 2n);
		});

		it("concatenates strings and lists", () => {
			assert.equal(evaluate("'ab' + 'cd'"), "abcd");
			assert.deepEqual(evaluate("[1] + [2, 3]"), [1n, 2n, 3n]);
		});

		it("reports division by zero as a type mismatch with the location", () => {
			assert.throws(() => evaluate("1 // 0"), (e: unknown) =>
				e instanceof GraphScriptError
				&& e.code === ErrorCodes.TypeMismatch
				&& e.message === "Division by zero."
				&& e.location?.line === 1);
		});

		it("rejects shifts of floats", () => {
			assert.throws(() => evaluate("1.5 << 1"), /Unsupported operand type for LShift: 'float'/);
		});
	});

	describe("operators", () => {
		it("evaluates unary operators", () => {
			assert.equal(evaluate("-(3)"), -3n);
			assert.equal(evaluate("~5"), -6n);
			assert.equal(evaluate("not 0"), true);
		});

		it("returns the deciding operand of and/or", () => {
			assert.equal(evaluate("0 or 'x'"), "x");
			assert.equal(evaluate("1 and 0"), 0n);
		});

		it("evaluates chained comparisons", () => {
			assert.equal(evaluate("1 < 2 < 3"), true);
			assert.equal(evaluate("1 < 3 < 2"), false);
			assert.equal(evaluate("1 == 1.0"), true);
			assert.equal(evaluate("2 in [1, 2]"), true);
			assert.equal(evaluate("'b' not in 'abc'"), false);
		});
	});

	describe("names and attributes", () => {
		it("reads module-level names", () => {
			const globals: Globals = new Map([["N", 4n]]);
			assert.equal(evaluate("N * 2", globals), 8n);
		});

		it("reports unknown names", () => {
			assert.throws(() => evaluate("missing"), (e: unknown) =>
				e instanceof GraphScriptError
				&& e.code === ErrorCodes.UnboundName
				&& e.message === "Unbound name: missing.");
		});

		it("resolves operators through an opset", () => {
			const globals: Globals = new Map([["op", new Opset("", 18)]]);
			const value = evaluate("op.Relu", globals);
			assert.ok(value instanceof Op);
			assert.equal(value.name, "Relu");
			assert.equal(value.opSchema?.name, "Relu");
		});

		it("indexes lists with negative indices", () => {
			const globals: Globals = new Map([["dims", [1n, 2n, 3n]]]);
			assert.equal(evaluate("dims[-1]", globals), 3n);
			assert.throws(() => evaluate("dims[3]", globals), /List index out of range/);
		});
	});

	describe("type annotations", () => {
		const globals: Globals = new Map(typeGlobals());

		it("adds a shape to a tensor type", () => {
			const value = evaluate("FLOAT['N', 3]", globals);
			assert.ok(value instanceof TensorType);
			assert.equal(value.elemType, ElementType.FLOAT);
			assert.deepEqual(value.shape, ["N", 3n]);
			assert.equal(value.toString(), "FLOAT[N,3]");
		});

		it("accepts unknown dimensions", () => {
			const value = evaluate("INT64[None]", globals);
			assert.ok(value instanceof TensorType);
			assert.deepEqual(value.shape, [null]);
		});

		it("specializes generic aliases", () => {
			const value = evaluate("List[int]", globals);
			assert.ok(value instanceof SequenceType);
			assert.ok(value.of instanceof ScalarType);
			assert.equal(value.toString(), "List[int]");
			assert.ok(globals.get("Optional") instanceof GenericAlias);
		});

		it("rejects a second shape", () => {
			assert.throws(() => evaluate("FLOAT[2][3]", globals), /Type FLOAT\[2\] already has a shape/);
		});
	});
});

describe("evalLiteral", () => {
	it("evaluates tuples and lists to arrays", () => {
		assert.deepEqual(evalLiteral(parseExpression("(1, 2.5, 'x')"), new Map()), [1n, 2.5, "x"]);
	});

	it("rejects values that are not literals", () => {
		const globals: Globals = new Map([["op", new Opset("", 18)]]);
		assert.throws(() => evalLiteral(parseExpression("op"), globals), /Expected a literal value, got 'opset'/);
	});
});

describe("isTruthy", () => {
	it("follows script truthiness", () => {
		assert.deepEqual([0n, 1n, 0, "", "a", [], [0n], null, false].map(isTruthy),
			[false, true, false, false, true, false, true, false, false]);
	});
});
