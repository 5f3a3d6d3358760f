// Script compiler
// Compiles a whole script module: imports and module-level constants feed
// the globals, every top-level function becomes a script function that
// later functions may call.

import { locationOf, type PyImport, type PyImportFrom, type PyStmt } from "./ast/types.js";
import { parseScript } from "./ast/parser.js";
import { Converter } from "./converter/converter.js";
import type { TranslationOptions } from "./converter/context.js";
import { type Diagnostic, GraphScriptError } from "./errors.js";
import { evalConstantExpr } from "./evaluator/constant-expr.js";
import { Opset } from "./schemas/opset.js";
import { defaultRegistry, type SchemaRegistry } from "./schemas/registry.js";
import type { ScriptFunction } from "./script-function.js";
import { typeGlobals } from "./types/annotations.js";
import { BuiltinFunction, type GlobalValue, type Globals, Namespace } from "./values.js";

/** Name scripts import the library under */
export const MODULE_NAME = "graphscript";

/** Latest default-domain version exposed as `opsetN` */
export const LATEST_OPSET_VERSION = 18;

export type CompileOptions = Omit<TranslationOptions, "source"> & {
	registry?: SchemaRegistry | undefined;
};

export interface CompiledScript {
	functions: ScriptFunction[];
	/** Warnings of every function, in translation order */
	diagnostics: readonly Diagnostic[];
	globals: Globals;
	defaultOpset: Opset | undefined;
}

//==============================================================================
// Library Module
//==============================================================================

function opsetBuiltin(registry: SchemaRegistry): BuiltinFunction {
	return new BuiltinFunction("Opset", (args, keywords) => {
		const domain = args[0] ?? keywords.get("domain");
		const version = args[1] ?? keywords.get("version");
		if (typeof domain !== "string" || typeof version !== "bigint") {
			throw GraphScriptError.typeMismatch("Opset(domain, version) takes a string and an integer.");
		}
		return new Opset(domain, Number(version), registry);
	});
}

function typesNamespace(): Namespace {
	return new Namespace(`${MODULE_NAME}.types`, typeGlobals());
}

/**
 * Members of the library module: `opset1` ... `opsetN`, `Opset`, the type
 * names, and the `types` submodule.
 */
export function libraryModule(registry: SchemaRegistry = defaultRegistry()): Namespace {
	const members = new Map<string, GlobalValue>(typeGlobals());
	for (let v = 1; v <= LATEST_OPSET_VERSION; v++) members.set(`opset${v}`, new Opset("", v, registry));
	members.set("Opset", opsetBuiltin(registry));
	members.set("types", typesNamespace());
	return new Namespace(MODULE_NAME, members);
}

function resolveModule(name: string, library: Namespace, node: PyImport | PyImportFrom): Namespace {
	if (name === MODULE_NAME) return library;
	if (name === `${MODULE_NAME}.types`) return typesNamespace();
	throw GraphScriptError.unsupported(`Unsupported module '${name}'.`, locationOf(node));
}

function bindImport(node: PyImport | PyImportFrom, library: Namespace, globals: Globals): void {
	if (node._type === "Import") {
		for (const alias of node.names) {
			const module = resolveModule(alias.name, library, node);
			// `import a.b` binds `a`; `import a.b as c` binds the submodule
			const bound = alias.asname === null && alias.name !== MODULE_NAME ? library : module;
			globals.set(alias.asname ?? MODULE_NAME, bound);
		}
		return;
	}
	const module = resolveModule(node.module, library, node);
	for (const alias of node.names) {
		if (alias.name === "*") {
			for (const [name, value] of module.members) globals.set(name, value);
			continue;
		}
		const value = module.members.get(alias.name);
		if (value === undefined) throw GraphScriptError.unboundName(`${node.module}.${alias.name}`, locationOf(node));
		globals.set(alias.asname ?? alias.name, value);
	}
}

//==============================================================================
// Compilation
//==============================================================================

function moduleStmt(stmt: PyStmt, index: number, converter: Converter, library: Namespace, compiled: ScriptFunction[]): void {
	const globals = converter.globals;
	switch (stmt._type) {
	case "Import":
	case "ImportFrom":
		bindImport(stmt, library, globals);
		return;
	case "Assign":
	case "AnnAssign": {
		const target = stmt._type === "Assign" ? stmt.targets[0] : stmt.target;
		if (target?._type !== "Name" || stmt.value === null || (stmt._type === "Assign" && stmt.targets.length !== 1)) {
			throw GraphScriptError.unsupported("Module-level assignments must bind one name to a value.", locationOf(stmt));
		}
		globals.set(target.id, evalConstantExpr(stmt.value, globals));
		return;
	}
	case "FunctionDef": {
		const fn = converter.topLevelStmt(stmt);
		globals.set(stmt.name, fn);
		compiled.push(fn);
		return;
	}
	case "Expr":
		if (index === 0 && stmt.value._type === "Constant" && typeof stmt.value.value === "string") return;
		break;
	case "Pass":
		return;
	default:
		break;
	}
	throw GraphScriptError.unsupported(`Unsupported module-level statement type ${stmt._type}.`, locationOf(stmt));
}

/**
 * Compile every function of a script. Functions are translated in source
 * order; the first error aborts the compilation.
 */
export function compileScript(source: string, options: CompileOptions = {}): CompiledScript {
	const module = parseScript(source);
	const registry = options.registry ?? defaultRegistry();
	const library = libraryModule(registry);

	const globals: Globals = new Map<string, GlobalValue>(typeGlobals());
	for (const [name, value] of options.globals ?? []) globals.set(name, value);

	const converter = new Converter({ ...options, globals, source });
	const functions: ScriptFunction[] = [];
	module.body.forEach((stmt, i) => moduleStmt(stmt, i, converter, library, functions));
	return {
		functions,
		diagnostics: [...converter.diagnostics],
		globals,
		defaultOpset: converter.defaultOpset,
	};
}

/**
 * Compile a script and return one of its functions.
 */
export function compileFunction(source: string, name: string, options: CompileOptions = {}): ScriptFunction {
	const { functions } = compileScript(source, options);
	const fn = functions.find((f) => f.name === name);
	if (fn === undefined) throw GraphScriptError.unboundName(name);
	return fn;
}
