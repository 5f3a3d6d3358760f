// SPDX-License-Identifier: MIT
// graphscript Script Compilation - Integration Tests

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ErrorCodes, GraphScriptError, type Logger } from "../src/errors.js";
import { printFunction } from "../src/ir/printer.js";
import { Opset } from "../src/schemas/opset.js";
import { compileFunction, compileScript, libraryModule, LATEST_OPSET_VERSION } from "../src/script.js";

//==============================================================================
// Helpers
//==============================================================================

function lines(source: string, name = "f"): string[] {
	return printFunction(compileFunction(source, name).irFunction).split("\n");
}

function scriptError(source: string): GraphScriptError {
	try {
		compileScript(source);
	} catch (e) {
		if (e instanceof GraphScriptError) return e;
		throw e;
	}
	throw new Error("expected a compilation error");
}

class RecordingLogger implements Logger {
	readonly warnings: string[] = [];
	readonly traces: string[] = [];

	warn(message: unknown): void {
		this.warnings.push(String(message));
	}

	debug(message: unknown): void {
		this.traces.push(String(message));
	}
}

//==============================================================================
// Library Module
//==============================================================================

describe("library module", () => {
	it("exposes every default-domain version", () => {
		const library = libraryModule();
		const latest = library.members.get(`opset${LATEST_OPSET_VERSION}`);
		assert.ok(latest instanceof Opset);
		assert.equal(latest.domain, "");
		assert.equal(latest.version, 18);
		assert.ok(library.members.get("opset1") instanceof Opset);
		assert.equal(library.members.get("opset19"), undefined);
		assert.equal(library.toString(), "<module 'graphscript'>");
	});

	it("resolves calls through the module namespace", () => {
		const source = "import graphscript\ndef f(X):\n    return graphscript.opset18.Abs(X)";
		assert.deepEqual(lines(source).slice(2, -1), ["   return_val = Abs (X)"]);
	});

	it("rejects other modules", () => {
		const err = scriptError("import numpy\n");
		assert.equal(err.code, ErrorCodes.UnsupportedConstruct);
		assert.equal(err.message, "Unsupported module 'numpy'.");
	});

	it("rejects missing members", () => {
		const err = scriptError("from graphscript import opset99\n");
		assert.equal(err.code, ErrorCodes.UnboundName);
		assert.equal(err.message, "Unbound name: graphscript.opset99.");
	});
});

//==============================================================================
// Module-level Statements
//==============================================================================

describe("module-level constants", () => {
	it("become constants where a function uses them as values", () => {
		const source = [
			"from graphscript import opset18 as op",
			"SCALE = 2",
			"def f(X):",
			"    return op.Mul(X, SCALE)",
		].join("\n");
		assert.deepEqual(lines(source).slice(2, -1), [
			"   SCALE = Constant <value=INT64{2}> ()",
			"   SCALE_cast = CastLike (SCALE, X)",
			"   return_val = Mul (X, SCALE_cast)",
		]);
	});

	it("are evaluated when defined and usable as attributes", () => {
		const source = [
			"from graphscript import opset18 as op",
			"PERM = [1, 0]",
			"AXIS = 2 * 3 - 6",
			"def f(X, I):",
			"    return op.Gather(op.Transpose(X, perm=PERM), I, axis=AXIS)",
		].join("\n");
		const { globals } = compileScript(source);
		assert.equal(globals.get("AXIS"), 0n);
		assert.deepEqual(lines(source).slice(2, -1), [
			"   tmp = Transpose <perm=[1, 0]> (X)",
			"   return_val = Gather <axis=0> (tmp, I)",
		]);
	});

	it("come from the caller's globals too", () => {
		const source = "from graphscript import opset18 as op\ndef f(X):\n    return op.LeakyRelu(X, alpha=ALPHA)";
		const fn = compileFunction(source, "f", { globals: new Map([["ALPHA", 0.25]]) });
		assert.deepEqual(printFunction(fn.irFunction).split("\n").slice(2, -1), [
			"   return_val = LeakyRelu <alpha=0.25> (X)",
		]);
	});

	it("rejects assignments to several names", () => {
		const err = scriptError("a, b = 1, 2\n");
		assert.equal(err.message, "Module-level assignments must bind one name to a value.");
	});

	it("rejects other statements", () => {
		const err = scriptError("for i in range(3):\n    pass\n");
		assert.equal(err.message, "Unsupported module-level statement type For.");
	});

	it("skips a module docstring", () => {
		const { functions } = compileScript("'Helpers.'\nfrom graphscript import opset18 as op\ndef f(X):\n    return op.Abs(X)");
		assert.deepEqual(functions.map((f) => f.name), ["f"]);
	});
});

//==============================================================================
// Functions Calling Functions
//==============================================================================

describe("calls between script functions", () => {
	const source = [
		"from graphscript import opset18 as op",
		"def g(X):",
		"    return op.Abs(X)",
		"def f(X):",
		"    return op.Neg(g(X))",
	].join("\n");

	it("compiles functions in source order", () => {
		assert.deepEqual(compileScript(source).functions.map((f) => f.name), ["g", "f"]);
	});

	it("calls an earlier function through the module domain", () => {
		assert.deepEqual(lines(source).slice(2, -1), [
			"   tmp = this.g (X)",
			"   return_val = Neg (tmp)",
		]);
	});

	it("ships the called function with the model", () => {
		const model = compileFunction(source, "f").toModelProto();
		assert.equal(model.producerName, "graphscript");
		assert.deepEqual(model.opsetImport, [{ domain: "", version: 18 }, { domain: "this", version: 1 }]);
		assert.deepEqual(model.functions.map((f) => `${f.domain}.${f.name}`), ["this.g"]);
	});

	it("registers functions in a chosen domain", () => {
		const fn = compileFunction(source, "f", { thisModule: new Opset("custom", 1) });
		assert.deepEqual(printFunction(fn.irFunction).split("\n")[2], "   tmp = custom.g (X)");
		assert.equal(fn.opset.domain, "custom");
	});

	it("takes a function defined later for an unknown operator", () => {
		const { functions, diagnostics } = compileScript([
			"from graphscript import opset18 as op",
			"def f(X):",
			"    return op.Neg(g(X))",
			"def g(X):",
			"    return op.Abs(X)",
		].join("\n"));
		const [f] = functions;
		if (f === undefined) throw new Error("expected f");
		assert.equal(printFunction(f.irFunction).split("\n")[2], "   tmp = g (X)");
		assert.deepEqual(diagnostics.map((d) => d.message), ["Unknown function name 'g'. The graph may not work."]);
	});
});

//==============================================================================
// Custom Opsets and Diagnostics
//==============================================================================

describe("custom opsets", () => {
	const source = [
		"from graphscript import opset18 as op, Opset",
		"ms = Opset('com.example', 1)",
		"def f(X):",
		"    return ms.Gelu(op.Abs(X))",
	].join("\n");

	it("calls operators of another domain", () => {
		assert.deepEqual(lines(source).slice(2, -1), [
			"   tmp = Abs (X)",
			"   return_val = com.example.Gelu (tmp)",
		]);
		const model = compileFunction(source, "f").toModelProto();
		assert.deepEqual(model.opsetImport, [{ domain: "", version: 18 }, { domain: "com.example", version: 1 }]);
	});

	it("logs unknown operators with the source line", () => {
		const logger = new RecordingLogger();
		compileScript(source, { logger });
		assert.deepEqual(logger.warnings, [[
			"[Converter] WARNING: 'Gelu' is not a known op in 'Opset('com.example', 1)'.",
			"at: Function 'f', line 4",
			"    return ms.Gelu(op.Abs(X))",
			"           ^",
		].join("\n")]);
		assert.deepEqual(logger.traces, []);
	});

	it("traces the translation when verbose", () => {
		const logger = new RecordingLogger();
		compileScript(source, { logger, verbose: true });
		assert.ok(logger.traces.length > 0);
		assert.ok(logger.traces.every((t) => t.startsWith("[Converter] ")));
	});
});
