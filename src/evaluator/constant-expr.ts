// Literal-expression evaluator
// Evaluates the constant parts of a script (defaults, attribute values,
// type annotations, module-level constants) over a table of globals

import type {
	BinOpType,
	CmpOpType,
	PyBinOp,
	PyCompare,
	PyExpr,
	PySubscript,
	PyUnaryOp,
	PyValue,
} from "../ast/types.js";
import { locationOf } from "../ast/types.js";
import { exhaustive, GraphScriptError, withLocation } from "../errors.js";
import { Opset } from "../schemas/opset.js";
import { GenericAlias, TensorType } from "../types/annotations.js";
import {
	BuiltinFunction,
	type GlobalValue,
	type Globals,
	isPyValue,
	Namespace,
} from "../values.js";

//==============================================================================
// Constant Detection
//==============================================================================

/**
 * Literals, and lists and operators over literals. Names never count,
 * even when bound to a module-level constant.
 */
export function isConstantExpr(node: PyExpr): boolean {
	switch (node._type) {
	case "Constant":
		return true;
	case "UnaryOp":
		return isConstantExpr(node.operand);
	case "BinOp":
		return isConstantExpr(node.left) && isConstantExpr(node.right);
	case "Compare":
		return isConstantExpr(node.left) && node.comparators.every(isConstantExpr);
	case "List":
		return node.elts.every(isConstantExpr);
	default:
		return false;
	}
}

//==============================================================================
// Script Value Semantics
//==============================================================================

type Numeric = bigint | number;

function typeName(value: GlobalValue): string {
	if (value === null) return "NoneType";
	if (Array.isArray(value)) return "list";
	switch (typeof value) {
	case "boolean": return "bool";
	case "bigint": return "int";
	case "number": return "float";
	case "string": return "str";
	default: return value.kind;
	}
}

function toNumeric(value: GlobalValue, op: string): Numeric {
	if (typeof value === "boolean") return value ? 1n : 0n;
	if (typeof value === "bigint" || typeof value === "number") return value;
	throw GraphScriptError.typeMismatch(`Unsupported operand type for ${op}: '${typeName(value)}'.`);
}

export function isTruthy(value: GlobalValue): boolean {
	if (value === null) return false;
	if (Array.isArray(value)) return value.length > 0;
	switch (typeof value) {
	case "boolean": return value;
	case "bigint": return value !== 0n;
	case "number": return value !== 0;
	case "string": return value.length > 0;
	default: return true;
	}
}

function floorDivInt(a: bigint, b: bigint): bigint {
	const q = a / b;
	return a % b !== 0n && (a < 0n) !== (b < 0n) ? q - 1n : q;
}

function modInt(a: bigint, b: bigint): bigint {
	const r = a % b;
	return r !== 0n && (r < 0n) !== (b < 0n) ? r + b : r;
}

function modFloat(a: number, b: number): number {
	const r = a % b;
	return r !== 0 && (r < 0) !== (b < 0) ? r + b : r;
}

function checkDivisor(b: Numeric): void {
	if (b === 0n || b === 0) throw GraphScriptError.typeMismatch("Division by zero.");
}

function arithmetic(op: BinOpType, left: GlobalValue, right: GlobalValue): GlobalValue {
	if (op === "Add" && typeof left === "string" && typeof right === "string") return left + right;
	if (op === "Add" && Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
	if ((op === "BitAnd" || op === "BitOr" || op === "BitXor")
		&& typeof left === "boolean" && typeof right === "boolean") {
		if (op === "BitAnd") return left && right;
		if (op === "BitOr") return left || right;
		return left !== right;
	}

	const a = toNumeric(left, op);
	const b = toNumeric(right, op);

	if (typeof a === "bigint" && typeof b === "bigint") {
		switch (op) {
		case "Add": return a + b;
		case "Sub": return a - b;
		case "Mult": return a * b;
		case "Div": checkDivisor(b); return Number(a) / Number(b);
		case "FloorDiv": checkDivisor(b); return floorDivInt(a, b);
		case "Mod": checkDivisor(b); return modInt(a, b);
		case "Pow": return b >= 0n ? a ** b : Number(a) ** Number(b);
		case "LShift": return a << b;
		case "RShift": return a >> b;
		case "BitAnd": return a & b;
		case "BitOr": return a | b;
		case "BitXor": return a ^ b;
		case "MatMult":
			throw GraphScriptError.typeMismatch("Unsupported operand types for @.");
		default:
			return exhaustive(op);
		}
	}

	const x = Number(a);
	const y = Number(b);
	switch (op) {
	case "Add": return x + y;
	case "Sub": return x - y;
	case "Mult": return x * y;
	case "Div": checkDivisor(y); return x / y;
	case "FloorDiv": checkDivisor(y); return Math.floor(x / y);
	case "Mod": checkDivisor(y); return modFloat(x, y);
	case "Pow": return x ** y;
	case "LShift":
	case "RShift":
	case "BitAnd":
	case "BitOr":
	case "BitXor":
	case "MatMult":
		throw GraphScriptError.typeMismatch(`Unsupported operand type for ${op}: 'float'.`);
	default:
		return exhaustive(op);
	}
}

function equals(left: GlobalValue, right: GlobalValue): boolean {
	if (Array.isArray(left) || Array.isArray(right)) {
		if (!Array.isArray(left) || !Array.isArray(right) || left.length !== right.length) return false;
		return left.every((v, i) => {
			const w = right[i];
			return w !== undefined && equals(v, w);
		});
	}
	const numericLeft = typeof left === "bigint" || typeof left === "number" || typeof left === "boolean";
	const numericRight = typeof right === "bigint" || typeof right === "number" || typeof right === "boolean";
	if (numericLeft && numericRight) {
		return Number(toNumeric(left, "==")) === Number(toNumeric(right, "=="));
	}
	return left === right;
}

function order(left: GlobalValue, right: GlobalValue, op: string): number {
	if (typeof left === "string" && typeof right === "string") {
		return left < right ? -1 : left > right ? 1 : 0;
	}
	const a = toNumeric(left, op);
	const b = toNumeric(right, op);
	return a < b ? -1 : a > b ? 1 : 0;
}

function contains(container: GlobalValue, item: GlobalValue): boolean {
	if (Array.isArray(container)) return container.some((v) => equals(v, item));
	if (typeof container === "string" && typeof item === "string") return container.includes(item);
	throw GraphScriptError.typeMismatch(`Argument of type '${typeName(container)}' is not iterable.`);
}

function compare(op: CmpOpType, left: GlobalValue, right: GlobalValue): boolean {
	switch (op) {
	case "Eq": return equals(left, right);
	case "NotEq": return !equals(left, right);
	case "Lt": return order(left, right, "<") < 0;
	case "LtE": return order(left, right, "<=") <= 0;
	case "Gt": return order(left, right, ">") > 0;
	case "GtE": return order(left, right, ">=") >= 0;
	case "In": return contains(right, left);
	case "NotIn": return !contains(right, left);
	case "Is": return left === right;
	case "IsNot": return left !== right;
	default: return exhaustive(op);
	}
}

//==============================================================================
// Evaluator
//==============================================================================

class ConstantEvaluator {
	constructor(private readonly globals: Globals) {}

	eval(node: PyExpr): GlobalValue {
		switch (node._type) {
		case "Constant":
			return node.value;
		case "Name": {
			const value = this.globals.get(node.id);
			if (value === undefined) throw GraphScriptError.unboundName(node.id, locationOf(node));
			return value;
		}
		case "List":
		case "Tuple":
			return node.elts.map((e) => this.literal(e));
		case "BinOp":
			return this.binOp(node);
		case "UnaryOp":
			return this.unaryOp(node);
		case "BoolOp": {
			// Result is the deciding operand, as in `a or b`
			let result: GlobalValue = null;
			for (const value of node.values) {
				result = this.eval(value);
				if (node.op === "And" ? !isTruthy(result) : isTruthy(result)) return result;
			}
			return result;
		}
		case "Compare":
			return this.compare(node);
		case "Attribute":
			return this.attribute(this.eval(node.value), node.attr);
		case "Subscript":
			return this.subscript(node);
		case "Call":
			return this.call(node.func, node.args, node.keywords.map((k) => [k.arg, k.value]));
		case "Slice":
			throw GraphScriptError.unsupported("Slices cannot be evaluated as constants.", locationOf(node));
		default:
			return exhaustive(node);
		}
	}

	/**
	 * Evaluate an expression that must produce a literal value.
	 */
	literal(node: PyExpr): PyValue {
		const value = this.eval(node);
		if (!isPyValue(value)) {
			throw GraphScriptError.typeMismatch(`Expected a literal value, got '${typeName(value)}'.`, locationOf(node));
		}
		return value;
	}

	private binOp(node: PyBinOp): GlobalValue {
		const left = this.eval(node.left);
		const right = this.eval(node.right);
		try {
			return arithmetic(node.op, left, right);
		} catch (e) {
			throw e instanceof GraphScriptError ? withLocation(e, locationOf(node)) : e;
		}
	}

	private unaryOp(node: PyUnaryOp): GlobalValue {
		const operand = this.eval(node.operand);
		if (node.op === "Not") return !isTruthy(operand);
		const value = toNumeric(operand, node.op);
		switch (node.op) {
		case "USub": return typeof value === "bigint" ? -value : -value;
		case "UAdd": return value;
		case "Invert":
			if (typeof value !== "bigint") throw GraphScriptError.typeMismatch("Bad operand type for unary ~: 'float'.", locationOf(node));
			return ~value;
		default:
			return exhaustive(node.op);
		}
	}

	private compare(node: PyCompare): boolean {
		let left = this.eval(node.left);
		for (let i = 0; i < node.ops.length; i++) {
			const op = node.ops[i];
			const comparator = node.comparators[i];
			if (op === undefined || comparator === undefined) break;
			const right = this.eval(comparator);
			if (!compare(op, left, right)) return false;
			left = right;
		}
		return true;
	}

	private attribute(value: GlobalValue, attr: string): GlobalValue {
		if (value instanceof Opset) return value.op(attr);
		if (value instanceof Namespace) {
			const member = value.members.get(attr);
			if (member === undefined) throw GraphScriptError.unboundName(`${value.name}.${attr}`);
			return member;
		}
		throw GraphScriptError.typeMismatch(`'${typeName(value)}' object has no attribute '${attr}'.`);
	}

	private subscript(node: PySubscript): GlobalValue {
		const value = this.eval(node.value);
		const args = node.slice._type === "Tuple"
			? node.slice.elts.map((e) => this.eval(e))
			: [this.eval(node.slice)];
		if (value instanceof TensorType) return value.withShape(args);
		if (value instanceof GenericAlias) return value.subscript(args);
		if (Array.isArray(value) && args.length === 1) {
			const [index] = args;
			if (typeof index === "bigint") {
				const i = index < 0n ? BigInt(value.length) + index : index;
				const item = value[Number(i)];
				if (i < 0n || item === undefined) throw GraphScriptError.typeMismatch("List index out of range.", locationOf(node));
				return item;
			}
		}
		throw GraphScriptError.typeMismatch(`'${typeName(value)}' object is not subscriptable.`, locationOf(node));
	}

	private call(func: PyExpr, args: PyExpr[], keywords: [string, PyExpr][]): GlobalValue {
		const callee = this.eval(func);
		if (!(callee instanceof BuiltinFunction)) {
			throw GraphScriptError.unsupported(`'${typeName(callee)}' cannot be called in a constant expression.`, locationOf(func));
		}
		const kwargs = new Map(keywords.map(([name, value]): [string, GlobalValue] => [name, this.eval(value)]));
		return callee.impl(args.map((a) => this.eval(a)), kwargs);
	}
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Evaluate a constant sub-expression. Only module-level names are
 * visible; names of the function being translated are not.
 */
export function evalConstantExpr(expr: PyExpr, globals: Globals): GlobalValue {
	return new ConstantEvaluator(globals).eval(expr);
}

export function evalLiteral(expr: PyExpr, globals: Globals): PyValue {
	return new ConstantEvaluator(globals).literal(expr);
}
