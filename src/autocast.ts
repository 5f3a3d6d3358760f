// Autocast
// Promotion of untyped literals used as operator arguments, shared by
// the compiler and by uncompiled execution so both decide alike

import type { PyValue } from "./ast/types.js";
import { GraphScriptError } from "./errors.js";
import type { TensorProto } from "./ir/model.js";
import { literalElementType, Tensor } from "./runtime/tensor.js";
import { isTypeVariable, type OpSchema } from "./schemas/registry.js";
import { ElementType } from "./types/element-types.js";
import { isPyValue, type TranslatedExpr } from "./values.js";

export { literalElementType } from "./runtime/tensor.js";

//==============================================================================
// Type-Variable Binding
//==============================================================================

/**
 * Bind each type variable of the callee's inputs to the first argument
 * whose type is knowable, then cast every argument against its variable's
 * binding. Concrete formal types never bind. Arguments of a heterogeneous
 * variadic input take no binding.
 *
 * Binding is first-writer-wins with no conflict check: `Add(X, Y)` with
 * differently typed X and Y binds T to X's type and leaves Y alone, since
 * Y is not a literal.
 */
export function castInputs<A, T, R>(
	getTypeInfo: (arg: A) => T | undefined,
	cast: (arg: A, binding: T | undefined) => R,
	schema: OpSchema | undefined,
	args: readonly A[],
): R[] {
	if (schema === undefined) {
		return args.map((x) => cast(x, undefined));
	}

	const expected = schema.inputs;
	const last = expected[expected.length - 1];
	const bindings = new Map<string, T>();
	const argTypevars: [A, string | undefined][] = [];

	args.forEach((x, i) => {
		let formal = expected[i];
		if (formal === undefined) {
			if (last?.option !== "Variadic") {
				throw GraphScriptError.arity(
					`Number of actual parameters ${args.length} exceeds number of formal parameters ${expected.length}.`,
				);
			}
			formal = last;
		}
		if (formal.option === "Variadic" && !formal.isHomogeneous) {
			argTypevars.push([x, undefined]);
			return;
		}
		const typevar = formal.typeStr;
		if (isTypeVariable(typevar) && !bindings.has(typevar)) {
			const typeinfo = getTypeInfo(x);
			if (typeinfo !== undefined) bindings.set(typevar, typeinfo);
		}
		argTypevars.push([x, typevar]);
	});

	return argTypevars.map(([x, typevar]) => cast(x, typevar === undefined ? undefined : bindings.get(typevar)));
}

//==============================================================================
// Static Specialization (compilation)
//==============================================================================

/**
 * What the static specialization needs from the converter.
 */
export interface CastEmitter {
	generateUniqueName(candidate: string): string;
	emitCastLike(output: string, input: string, like: string): void;
}

/**
 * Only literal operands with a bound sibling are cast, by a `CastLike`
 * node against that sibling. Everything else keeps its value name.
 */
export function staticCastInputs(
	emitter: CastEmitter,
	schema: OpSchema | undefined,
	args: readonly TranslatedExpr[],
): string[] {
	const getTypeInfo = (x: TranslatedExpr): TranslatedExpr | undefined =>
		x.kind === "const" || x.name === "" ? undefined : x;

	const cast = (x: TranslatedExpr, binding: TranslatedExpr | undefined): string => {
		if (x.kind === "const" && binding !== undefined) {
			const tmp = emitter.generateUniqueName(`${x.name}_cast`);
			emitter.emitCastLike(tmp, x.name, binding.name);
			return tmp;
		}
		return x.name;
	};

	return castInputs(getTypeInfo, cast, schema, args);
}

//==============================================================================
// Dynamic Specialization (uncompiled execution)
//==============================================================================

function isPromotable(value: unknown): value is PyValue {
	if (typeof value === "boolean" || typeof value === "bigint" || typeof value === "number") return true;
	if (Array.isArray(value)) {
		if (value.length === 0) return true;
		const [first]: unknown[] = value;
		return isPromotable(first) && isPyValue(value);
	}
	return false;
}

/**
 * Promote a literal argument to a tensor, of `dtype` when given. Other
 * values pass through unchanged.
 */
export function castPyvalueToTensor(value: unknown, dtype?: ElementType): unknown {
	if (!isPromotable(value)) return value;
	return Tensor.fromPyValue(value, dtype);
}

export function dynamicCastInputs(schema: OpSchema | undefined, args: readonly unknown[]): unknown[] {
	const getTypeInfo = (x: unknown): ElementType | undefined => (x instanceof Tensor ? x.dtype : undefined);
	return castInputs(getTypeInfo, castPyvalueToTensor, schema, args);
}

//==============================================================================
// Literal Constants
//==============================================================================

/**
 * Tensor a `Constant` node holds for a literal, using the same element
 * types as the dynamic promotion.
 */
export function pyvalueToTensorProto(name: string, value: PyValue): TensorProto {
	const type = literalElementType(value);
	const elements = Array.isArray(value) ? value : [value];
	const dims = Array.isArray(value) ? [value.length] : [];
	const tensor = Tensor.fromPyValue(value, type);
	const proto: TensorProto = { name, dataType: type, dims };
	switch (type) {
	case ElementType.BOOL:
		proto.int32Data = tensor.data.map((e) => (e === true ? 1 : 0));
		break;
	case ElementType.INT64:
		proto.int64Data = tensor.data.filter((e): e is bigint => typeof e === "bigint");
		break;
	case ElementType.FLOAT:
		proto.floatData = elements.filter((e): e is number => typeof e === "number");
		break;
	default:
		proto.stringData = tensor.data.map(String);
		break;
	}
	return proto;
}
