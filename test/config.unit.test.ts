// graphscript Configuration - Unit Tests

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { mergeOptions } from "../src/cli.js";
import {
	defaultOpsetOf,
	jsonToPyValue,
	loadConfigFile,
	parseConfig,
	resolveConfig,
} from "../src/config.js";
import { ErrorCodes, GraphScriptError } from "../src/errors.js";

function isConfigError(pattern: RegExp): (e: unknown) => boolean {
	return (e) => e instanceof GraphScriptError
		&& e.code === ErrorCodes.ConfigurationError
		&& pattern.test(e.message);
}

describe("resolveConfig", () => {
	it("fills in defaults", () => {
		assert.deepStrictEqual(resolveConfig(), {
			opsetVersion: undefined,
			domain: "this",
			format: "text",
			verbose: false,
			constants: new Map(),
		});
	});

	it("reads integral constants as ints", () => {
		const config = resolveConfig({ constants: { N: 4, SCALE: 0.5, NAMES: ["a", "b"], DIMS: [2, 3] } });
		assert.deepStrictEqual(config.constants, new Map<string, unknown>([
			["N", 4n],
			["SCALE", 0.5],
			["NAMES", ["a", "b"]],
			["DIMS", [2n, 3n]],
		]));
	});
});

describe("jsonToPyValue", () => {
	it("keeps booleans and strings", () => {
		assert.equal(jsonToPyValue(true), true);
		assert.equal(jsonToPyValue("x"), "x");
	});
});

describe("parseConfig", () => {
	it("accepts a full document", () => {
		const config = parseConfig({ opsetVersion: 17, domain: "custom", format: "json", verbose: true });
		assert.equal(config.opsetVersion, 17);
		assert.equal(config.domain, "custom");
		assert.equal(config.format, "json");
		assert.equal(config.verbose, true);
	});

	it("rejects unknown formats with the failing path", () => {
		assert.throws(() => parseConfig({ format: "xml" }, "c.json"),
			isConfigError(/^Invalid configuration c\.json: format: /));
	});

	it("rejects unknown keys", () => {
		assert.throws(() => parseConfig({ outputDir: "out" }), isConfigError(/^Invalid configuration <config>: /));
	});
});

describe("loadConfigFile", () => {
	let dir: string;

	before(async () => {
		dir = await mkdtemp(join(tmpdir(), "graphscript-config-"));
		await writeFile(join(dir, "good.json"), JSON.stringify({ opsetVersion: 16, constants: { K: 2 } }));
		await writeFile(join(dir, "broken.json"), "{ opsetVersion: ");
	});

	after(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("reads and validates a file", async () => {
		const config = await loadConfigFile(join(dir, "good.json"));
		assert.equal(config.opsetVersion, 16);
		assert.deepStrictEqual(config.constants, new Map([["K", 2n]]));
	});

	it("reports unreadable files", async () => {
		await assert.rejects(loadConfigFile(join(dir, "missing.json")), isConfigError(/^Cannot read configuration .*missing\.json: /));
		await assert.rejects(loadConfigFile(join(dir, "broken.json")), isConfigError(/^Cannot read configuration .*broken\.json: /));
	});
});

describe("defaultOpsetOf", () => {
	it("makes a default-domain opset of the configured version", () => {
		const opset = defaultOpsetOf(resolveConfig({ opsetVersion: 17 }));
		assert.equal(opset?.domain, "");
		assert.equal(opset?.version, 17);
		assert.equal(defaultOpsetOf(resolveConfig()), undefined);
	});
});

describe("mergeOptions", () => {
	it("lets command-line options override the file", () => {
		const config = resolveConfig({ format: "json", domain: "custom", constants: { A: 1, B: "x" } });
		const merged = mergeOptions(config, {
			verbose: false,
			help: false,
			digest: false,
			opsetVersion: 17,
			defines: [["A", 2n]],
		});
		assert.deepStrictEqual(merged, {
			opsetVersion: 17,
			domain: "custom",
			format: "json",
			verbose: false,
			constants: new Map<string, unknown>([["A", 2n], ["B", "x"]]),
		});
	});

	it("keeps verbose on when either side sets it", () => {
		const merged = mergeOptions(resolveConfig({ verbose: true }), { verbose: false, help: false, digest: false, defines: [] });
		assert.equal(merged.verbose, true);
	});
});
