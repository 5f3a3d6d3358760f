// graphscript CLI - Integration Tests
// Runs the command in process against script files in a temporary directory

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, realpath, rm, symlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { pathToFileURL } from "node:url";

import { isEntryPoint, main } from "../src/cli.js";

const ABS_SCRIPT = [
	"from graphscript import opset18 as op",
	"def f(X):",
	"    return op.Abs(X)",
	"",
].join("\n");

const TWO_FUNCTIONS = [
	"from graphscript import opset18 as op",
	"def g(X):",
	"    return op.Neg(X)",
	"def f(X):",
	"    return op.Abs(g(X))",
	"",
].join("\n");

describe("graphscript CLI", () => {
	let dir: string;
	let outputCount = 0;

	function file(name: string): string {
		return join(dir, name);
	}

	/** Run the command writing to a fresh output file and return its text */
	async function run(...args: string[]): Promise<string> {
		const output = file(`out-${outputCount++}.txt`);
		const code = await main([...args, "-o", output]);
		assert.equal(code, 0);
		return readFile(output, "utf-8");
	}

	before(async () => {
		dir = await mkdtemp(join(tmpdir(), "graphscript-cli-"));
		await writeFile(file("abs.gs"), ABS_SCRIPT);
		await writeFile(file("two.gs"), TWO_FUNCTIONS);
		await writeFile(file("identity.gs"), "def f(X):\n    return X\n");
		await writeFile(file("leaky.gs"), "from graphscript import opset18 as op\ndef f(X):\n    return op.LeakyRelu(X, alpha=ALPHA)\n");
		await writeFile(file("unbound.gs"), "from graphscript import opset18 as op\ndef f(X):\n    return op.Add(X, Z)\n");
		await writeFile(file("custom.json"), JSON.stringify({ domain: "custom", constants: { ALPHA: 0.125 } }));
	});

	after(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("prints each function as text", async () => {
		assert.equal(await run(file("abs.gs")), "f (X) => (return_val)\n{\n   return_val = Abs (X)\n}\n");
	});

	it("separates functions with a blank line", async () => {
		assert.equal(await run(file("two.gs")), [
			"g (X) => (return_val)",
			"{",
			"   return_val = Neg (X)",
			"}",
			"",
			"f (X) => (return_val)",
			"{",
			"   tmp = this.g (X)",
			"   return_val = Abs (tmp)",
			"}",
			"",
		].join("\n"));
	});

	it("emits only the selected function", async () => {
		assert.equal(await run(file("two.gs"), "--function", "g"), "g (X) => (return_val)\n{\n   return_val = Neg (X)\n}\n");
	});

	it("prints digests", async () => {
		const text = await run("digest", file("abs.gs"));
		assert.match(text, /^f graphscript-sha256:[0-9a-f]{64}\n$/);
		assert.equal(await run("--digest", file("abs.gs")), text);
	});

	it("writes models as JSON", async () => {
		const model: unknown = JSON.parse(await run(file("abs.gs"), "--format", "json"));
		assert.deepEqual(model, {
			irVersion: 8,
			producerName: "graphscript",
			opsetImport: [{ domain: "", version: 18 }],
			graph: {
				name: "f",
				node: [{ opType: "Abs", domain: "", input: ["X"], output: ["return_val"], attribute: [] }],
				input: [{ name: "X" }],
				output: [{ name: "return_val" }],
				initializer: [],
			},
			functions: [],
		});
	});

	it("takes the default opset from the command line", async () => {
		const model: unknown = JSON.parse(await run(file("identity.gs"), "--opset", "17", "--format=json"));
		assert.ok(typeof model === "object" && model !== null && "opsetImport" in model);
		assert.deepEqual(model.opsetImport, [{ domain: "", version: 17 }]);
	});

	it("makes defines visible to scripts", async () => {
		const text = await run(file("leaky.gs"), "-D", "ALPHA=0.5");
		assert.equal(text.split("\n")[2], "   return_val = LeakyRelu <alpha=0.5> (X)");
	});

	it("reads a configuration file that defines override", async () => {
		const fromConfig = await run(file("leaky.gs"), "--config", file("custom.json"));
		assert.equal(fromConfig.split("\n")[2], "   return_val = LeakyRelu <alpha=0.125> (X)");
		const overridden = await run(file("leaky.gs"), "--config", file("custom.json"), "-D", "ALPHA=0.75");
		assert.equal(overridden.split("\n")[2], "   return_val = LeakyRelu <alpha=0.75> (X)");
	});

	it("registers functions in the configured domain", async () => {
		const text = await run(file("two.gs"), "--config", file("custom.json"), "--function", "f");
		assert.equal(text.split("\n")[2], "   tmp = custom.g (X)");
	});

	it("reports compilation errors with the file and source line", async () => {
		const path = file("unbound.gs");
		await assert.rejects(main([path, "-o", file("never.txt")]), (e: unknown) => {
			assert.ok(e instanceof Error);
			assert.equal(e.message, [
				path,
				"ERROR: Unbound name: Z.",
				"at: Function 'f', line 3",
				"    return op.Add(X, Z)",
				`${" ".repeat(21)}^`,
			].join("\n"));
			return true;
		});
	});

	it("runs when started through a link to the script", async () => {
		const target = file("abs.gs");
		const link = file("graphscript-link");
		await symlink(target, link);
		const moduleUrl = pathToFileURL(await realpath(target)).href;
		assert.equal(isEntryPoint(link, moduleUrl), true);
		assert.equal(isEntryPoint(target, moduleUrl), true);
		assert.equal(isEntryPoint(file("two.gs"), moduleUrl), false);
		assert.equal(isEntryPoint(file("missing.gs"), moduleUrl), false);
		assert.equal(isEntryPoint(undefined, moduleUrl), false);
	});

	it("shows usage without scripts", async (t) => {
		const log = t.mock.method(console, "log", () => undefined);
		assert.equal(await main([]), 1);
		assert.equal(await main(["--help"]), 0);
		assert.equal(log.mock.callCount(), 2);
		const first = log.mock.calls[0]?.arguments[0];
		assert.ok(typeof first === "string" && first.startsWith("Usage: graphscript [options] <script...>"));
	});
});
