// Subscript lowering
// `A[...]` becomes one Slice (+ Squeeze) for ranges and constant indices,
// then one Gather per computed index

import type { PyExpr, PySubscript } from "../ast/types.js";
import { GraphScriptError } from "../errors.js";
import { isConstantExpr } from "../evaluator/constant-expr.js";
import type { TranslatedExpr } from "../values.js";
import type { TranslationContext } from "./context.js";
import { translateExpr } from "./expressions.js";

// Slice bounds standing for "to the end" in either direction
const INT64_MAX = (1n << 63n) - 1n;
const INT64_MIN = -(1n << 63n);

/** A slice bound: an expression, a value known at compile time, or absent */
type Bound = PyExpr | bigint | null;

interface RangeSpec {
	axis: number;
	lower: Bound;
	upper: Bound;
	step: Bound;
}

interface IndexSpec {
	axis: number;
	expr: PyExpr;
}

/**
 * Lower a subscript. Supported: `A[1:5:2]`, `A[:, 1]`, `A[2, 3]`,
 * `A[-1]`, `A[i]`, `A[i:i+1]`, `A[i:j, k]`. The step must be a literal.
 */
export function translateSubscript(node: PySubscript, ctx: TranslationContext, target?: string): TranslatedExpr {
	const varName = translateExpr(node.value, ctx).name;
	const resultName = ctx.generateUniqueName(target ?? `${varName}_subscripted`);
	const indices = node.slice._type === "Tuple" ? node.slice.elts : [node.slice];

	// 1-D integer constants, emitted once per subscript
	const cache = new Map<bigint, string>();
	const const1d = (value: bigint): string => {
		let name = cache.get(value);
		if (name === undefined) {
			name = ctx.emitConst([value], undefined, node).name;
			cache.set(value, name);
		}
		return name;
	};

	const component = (bound: Bound, defaultValue: bigint): string => {
		if (bound === null) return const1d(defaultValue);
		if (typeof bound === "bigint") return const1d(bound);
		if (isConstantExpr(bound)) {
			const value = ctx.evalLiteral(bound);
			if (typeof value !== "bigint") {
				throw GraphScriptError.typeMismatch("Slice component type must be int.", ctx.location(bound));
			}
			return const1d(value);
		}
		const name = translateExpr(bound, ctx).name;
		const reshaped = ctx.generateUniqueName(`${name}_reshaped`);
		ctx.emit([reshaped], ctx.defaultOp("Reshape"), [name, const1d(1n)]);
		return reshaped;
	};

	const literalStep = (step: Bound): bigint => {
		if (step === null) return 1n;
		if (typeof step === "bigint") return step;
		if (!isConstantExpr(step)) {
			ctx.fail("Slice step must be a literal integer.", step);
		}
		const value = ctx.evalLiteral(step);
		if (typeof value !== "bigint") {
			throw GraphScriptError.typeMismatch("Slice component type must be int.", ctx.location(step));
		}
		if (value === 0n) ctx.fail("Slice step cannot be zero.", step);
		return value;
	};

	// Returns [start, end, step] value names
	const translateRange = (range: RangeSpec): [string, string, string] => {
		const step = literalStep(range.step);
		const stepName = component(step, 1n);
		const lower = component(range.lower, step > 0n ? 0n : INT64_MAX);
		const upper = component(range.upper, step > 0n ? INT64_MAX : INT64_MIN);
		return [lower, upper, stepName];
	};

	// Partition: ranges (`::` is a no-op), constant scalars, computed indices
	const ranges: RangeSpec[] = [];
	let scalars: { axis: number; expr: PyExpr; value: bigint }[] = [];
	const computed: IndexSpec[] = [];
	indices.forEach((elt, axis) => {
		if (elt._type === "Slice") {
			if (elt.lower !== null || elt.upper !== null || elt.step !== null) {
				ranges.push({ axis, lower: elt.lower, upper: elt.upper, step: elt.step });
			}
			return;
		}
		if (isConstantExpr(elt)) {
			const value = ctx.evalLiteral(elt);
			if (typeof value === "bigint") {
				scalars.push({ axis, expr: elt, value });
				return;
			}
		}
		computed.push({ axis, expr: elt });
	});

	if (ranges.length === 0 && scalars.length === 0 && computed.length === 0) {
		ctx.emit([resultName], ctx.defaultOp("Identity"), [varName]);
		return { name: resultName, kind: "any" };
	}

	let result = varName;
	if (ranges.length > 0 || scalars.length > 1) {
		// A scalar index i is the range i:i+1:1 with its axis squeezed afterwards
		const squeezedAxes: bigint[] = [];
		for (const { axis, value } of scalars) {
			squeezedAxes.push(BigInt(axis));
			ranges.push({ axis, lower: value, upper: value === -1n ? INT64_MAX : value + 1n, step: 1n });
		}
		scalars = [];

		const starts: string[] = [];
		const ends: string[] = [];
		const axes: string[] = [];
		const steps: string[] = [];
		for (const range of ranges) {
			axes.push(const1d(BigInt(range.axis)));
			const [start, end, step] = translateRange(range);
			starts.push(start);
			ends.push(end);
			steps.push(step);
		}

		let sliceInputs: string[];
		const [start, end, axis, step] = [starts[0], ends[0], axes[0], steps[0]];
		if (starts.length > 1 || start === undefined || end === undefined || axis === undefined || step === undefined) {
			const concat = (values: string[], suffix: string): string => {
				const name = ctx.generateUniqueName(`${varName}_${suffix}`);
				ctx.emit([name], ctx.defaultOp("Concat"), values, [ctx.builder.makeAttr("axis", 0n)]);
				return name;
			};
			sliceInputs = [
				varName,
				concat(starts, "start"),
				concat(ends, "end"),
				concat(axes, "axis"),
				concat(steps, "step"),
			];
		} else {
			sliceInputs = [varName, start, end, axis, step];
		}

		if (squeezedAxes.length > 0) {
			const sliced = ctx.generateUniqueName(`${varName}_sliced`);
			ctx.emit([sliced], ctx.defaultOp("Slice"), sliceInputs);
			const axesConst = ctx.emitConst(squeezedAxes, "squeezed_axes", node);
			result = computed.length > 0 ? ctx.generateUniqueName(`${varName}_squeezed`) : resultName;
			ctx.emit([result], ctx.defaultOp("Squeeze"), [sliced, axesConst.name]);
		} else {
			result = computed.length > 0 ? ctx.generateUniqueName(`${varName}_sliced`) : resultName;
			ctx.emit([result], ctx.defaultOp("Slice"), sliceInputs);
		}
	}

	// Remaining indices gather one axis at a time, in specifier order
	const gathers: IndexSpec[] = [...computed, ...scalars].sort((a, b) => a.axis - b.axis);
	const lastAxis = gathers[gathers.length - 1]?.axis;
	for (const { axis, expr } of gathers) {
		const index = translateExpr(expr, ctx);
		const gathered = axis !== lastAxis ? ctx.generateUniqueName(`${varName}_axis_${axis}`) : resultName;
		ctx.emit([gathered], ctx.defaultOp("Gather"), [result, index.name], [ctx.builder.makeAttr("axis", BigInt(axis))]);
		result = gathered;
	}

	return { name: result, kind: "any" };
}
