// Translation context
// Mutable state of one function translation and the emission primitives
// every lowering step goes through

import type { Located, PyExpr, PyFunctionDef, PyValue } from "../ast/types.js";
import { locationOf } from "../ast/types.js";
import { analyzeFunction, type LivenessOracle } from "../analysis/liveness.js";
import { pyvalueToTensorProto, type CastEmitter } from "../autocast.js";
import {
	type Diagnostic,
	formatDiagnostic,
	GraphScriptError,
	type Logger,
	type SourceLocation,
	withLocation,
} from "../errors.js";
import { evalConstantExpr, evalLiteral } from "../evaluator/constant-expr.js";
import type { IRAttributeValue, IRBuilder, IRFunction } from "../ir/builder.js";
import type { FunctionProto } from "../ir/model.js";
import type { Op, Opset } from "../schemas/opset.js";
import { ScalarType, type TypeAnnotation, pytypeToAttrtype } from "../types/annotations.js";
import { constantAttributeName, ElementType } from "../types/element-types.js";
import {
	AttrRef,
	Dynamic,
	DynamicKind,
	type GlobalValue,
	type Globals,
	isPyValue,
	type ScopeValue,
	type TranslatedExpr,
} from "../values.js";
import { UniqueNameGenerator } from "./names.js";
import { ScopeStack } from "./scope.js";

//==============================================================================
// Options
//==============================================================================

export type OracleFactory = (fn: PyFunctionDef) => LivenessOracle;

export interface TranslationOptions {
	/** Module-level names visible to the script */
	globals?: Globals | undefined;
	builder?: IRBuilder | undefined;
	/** Domain script functions of this module are registered in */
	thisModule?: Opset | undefined;
	/** Opset bare operator names and operators resolve against */
	defaultOpset?: Opset | undefined;
	/** Script text, shown under warnings */
	source?: string | undefined;
	logger?: Logger | undefined;
	verbose?: boolean | undefined;
	analyze?: OracleFactory | undefined;
}

//==============================================================================
// Translation Context
//==============================================================================

export class TranslationContext implements CastEmitter {
	readonly names = new UniqueNameGenerator();
	readonly scopes = new ScopeStack();
	readonly diagnostics: Diagnostic[] = [];

	/** Return types declared by the function whose body is being lowered */
	returnTypes: readonly TypeAnnotation[] | undefined;
	/** Name of the top-level function, for source locations */
	functionName: string | undefined;
	defaultOpset: Opset | undefined;
	private oracleOf: LivenessOracle | undefined;

	private readonly logger: Logger | undefined;
	private readonly verbose: boolean;
	readonly analyze: OracleFactory;
	readonly source: string | undefined;

	constructor(
		readonly builder: IRBuilder,
		readonly globals: Globals,
		readonly thisModule: Opset,
		options: TranslationOptions,
	) {
		this.defaultOpset = options.defaultOpset;
		this.logger = options.logger;
		this.verbose = options.verbose ?? false;
		this.analyze = options.analyze ?? analyzeFunction;
		this.source = options.source;
	}

	/**
	 * Start a new top-level function: every name and scope of the previous
	 * one is forgotten.
	 */
	reset(fn: PyFunctionDef): void {
		this.names.reset();
		this.scopes.clear();
		this.returnTypes = undefined;
		this.functionName = fn.name;
		this.oracleOf = this.analyze(fn);
	}

	get oracle(): LivenessOracle {
		if (this.oracleOf === undefined) throw new Error("No function is being translated");
		return this.oracleOf;
	}

	get currentFn(): IRFunction {
		return this.scopes.current().fn;
	}

	//--------------------------------------------------------------------------
	// Diagnostics
	//--------------------------------------------------------------------------

	location(node: Located): SourceLocation {
		return locationOf(node, this.functionName);
	}

	fail(message: string, node?: Located): never {
		throw GraphScriptError.unsupported(message, node === undefined ? undefined : this.location(node));
	}

	warn(message: string, node?: Located): void {
		const diagnostic: Diagnostic = node === undefined ? { message } : { message, location: this.location(node) };
		this.diagnostics.push(diagnostic);
		this.logger?.warn(`[Converter] ${formatDiagnostic(diagnostic, this.source)}`);
	}

	debug(message: string): void {
		if (this.verbose) this.logger?.debug(`[Converter] ${message}`);
	}

	//--------------------------------------------------------------------------
	// Scopes and bindings
	//--------------------------------------------------------------------------

	enterScope(name: string, domain = ""): IRFunction {
		const fn = this.builder.newFunction(name, domain);
		this.scopes.push(name, fn);
		this.debug(`enter scope ${name} (depth ${this.scopes.depth})`);
		return fn;
	}

	exitScope(): IRFunction {
		const frame = this.scopes.pop();
		this.debug(`exit scope ${frame.name}`);
		return frame.fn;
	}

	bind(name: string, value: ScopeValue): void {
		this.scopes.bind(name, value);
		if (value instanceof Dynamic) this.debug(`bind ${name} -> ${value.value} (${value.provenance})`);
	}

	/**
	 * Innermost binding of a name, falling back to the module globals.
	 */
	lookup(name: string, node?: Located): ScopeValue {
		const value = this.scopes.lookup(name) ?? this.globals.get(name);
		if (value === undefined) {
			throw GraphScriptError.unboundName(name, node === undefined ? undefined : this.location(node));
		}
		return value;
	}

	tryLookup(name: string): ScopeValue | undefined {
		return this.scopes.lookup(name) ?? this.globals.get(name);
	}

	//--------------------------------------------------------------------------
	// Constant sub-expressions
	//--------------------------------------------------------------------------

	evalConstant(node: PyExpr): GlobalValue {
		return this.atNode(node, () => evalConstantExpr(node, this.globals));
	}

	evalLiteral(node: PyExpr): PyValue {
		return this.atNode(node, () => evalLiteral(node, this.globals));
	}

	private atNode<T>(node: Located, compute: () => T): T {
		try {
			return compute();
		} catch (e) {
			if (e instanceof GraphScriptError && e.location === undefined) {
				throw withLocation(e, this.location(node));
			}
			throw e;
		}
	}

	generateUniqueName(candidate = "tmp"): string {
		return this.names.generate(candidate);
	}

	//--------------------------------------------------------------------------
	// Emission
	//--------------------------------------------------------------------------

	requireDefaultOpset(): Opset {
		if (this.defaultOpset === undefined) {
			throw GraphScriptError.configuration(
				"A default opset must be given for functions that do not use any operator of the default domain.",
			);
		}
		return this.defaultOpset;
	}

	defaultOp(name: string): Op {
		return this.requireDefaultOpset().op(name);
	}

	emit(
		outputs: readonly string[],
		callee: Op,
		inputs: readonly string[],
		attrs: readonly IRAttributeValue[] = [],
		subFunctions?: ReadonlyMap<string, FunctionProto>,
	): void {
		this.builder.addStmt(this.currentFn, outputs, callee, inputs, attrs, subFunctions);
	}

	emitCastLike(output: string, input: string, like: string): void {
		this.emit([output], this.defaultOp("CastLike"), [input, like]);
	}

	/**
	 * Identity copy of a value under a fresh name derived from `suggested`.
	 */
	emitCopy(original: string, suggested: string): string {
		const result = this.generateUniqueName(suggested);
		this.emit([result], this.defaultOp("Identity"), [original]);
		return result;
	}

	/**
	 * A `Constant` node holding a literal. Without a suggested name, small
	 * integers get descriptive names (`int64_3`, `int64_m1_1d`).
	 */
	emitConst(value: PyValue, suggestedName: string | undefined, node?: Located): TranslatedExpr {
		const name = this.generateUniqueName(suggestedName ?? defaultConstName(value));
		const tensor = node === undefined
			? pyvalueToTensorProto(name, value)
			: this.atNode(node, () => pyvalueToTensorProto(name, value));
		this.emit([name], this.defaultOp("Constant"), [], [this.builder.makeAttr("value", tensor)]);
		return { name, kind: "const" };
	}

	/**
	 * Graph value a binding stands for. Attribute parameters are promoted
	 * to a `Constant` node referring to the attribute; literals become
	 * constants named after `target`.
	 */
	toGraphValue(value: ScopeValue, target: string | undefined, node?: Located): TranslatedExpr {
		if (value instanceof AttrRef) return this.promoteAttrRef(value, target, node);
		if (value instanceof Dynamic) {
			return { name: value.value, kind: value.provenance === DynamicKind.Constant ? "const" : "any" };
		}
		if (isPyValue(value)) return this.emitConst(value, target ?? "tmp", node);
		throw GraphScriptError.typeMismatch(
			`Cannot use ${target ?? "value"} of kind '${value.kind}' as a graph value.`,
			node === undefined ? undefined : this.location(node),
		);
	}

	private promoteAttrRef(ref: AttrRef, target: string | undefined, node?: Located): TranslatedExpr {
		const attrName = constantAttributeName(pytypeToAttrtype(ref.typeinfo));
		if (attrName === undefined) {
			throw GraphScriptError.typeMismatch(
				`Unsupported attribute type ${ref.typeinfo.toString()} for ${ref.value}.`,
				node === undefined ? undefined : this.location(node),
			);
		}
		const result = this.generateUniqueName(target ?? "tmp");
		const attr = this.builder.makeAttrRef(attrName, ref.value, pytypeToAttrtype(ref.typeinfo));
		this.emit([result], this.defaultOp("Constant"), [], [attr]);
		if (ref.typeinfo instanceof ScalarType && ref.typeinfo.name === "bool") {
			// Attributes hold booleans as ints; the tensor must be BOOL
			const asBool = this.generateUniqueName(`${result}_as_bool`);
			this.emit([asBool], this.defaultOp("Cast"), [result], [
				this.builder.makeAttr("to", BigInt(ElementType.BOOL)),
			]);
			return { name: asBool, kind: "const" };
		}
		return { name: result, kind: "const" };
	}
}

function defaultConstName(value: PyValue): string {
	if (typeof value === "bigint") return value >= 0n ? `int64_${value}` : `int64_m${-value}`;
	if (Array.isArray(value) && value.length === 1) {
		const [first] = value;
		if (typeof first === "bigint") return first >= 0n ? `int64_${first}_1d` : `int64_m${-first}_1d`;
	}
	return "const";
}
