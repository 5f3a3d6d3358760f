// Script AST type definitions
// Python-shaped nodes produced by the parser and consumed by the converter

import type { SourceLocation } from "../errors.js";

//==============================================================================
// Literal Values
//==============================================================================

/**
 * A script-level literal. Integers are `bigint` and floats are `number`,
 * so `1` and `1.0` stay distinguishable.
 */
export type PyValue = boolean | bigint | number | string | null | PyValue[];

//==============================================================================
// Positions
//==============================================================================

export interface Located {
	lineno: number;
	col_offset: number;
}

//==============================================================================
// Operators
//==============================================================================

export type BinOpType =
	| "Add" | "Sub" | "Mult" | "Div" | "FloorDiv" | "Mod" | "Pow"
	| "MatMult" | "BitAnd" | "BitOr" | "BitXor" | "LShift" | "RShift";

export type UnaryOpType = "USub" | "UAdd" | "Not" | "Invert";

export type BoolOpType = "And" | "Or";

export type CmpOpType =
	| "Eq" | "NotEq" | "Lt" | "LtE" | "Gt" | "GtE"
	| "In" | "NotIn" | "Is" | "IsNot";

//==============================================================================
// Expressions
//==============================================================================

export interface PyConstant extends Located {
	_type: "Constant";
	value: PyValue;
}

export interface PyName extends Located {
	_type: "Name";
	id: string;
}

export interface PyBinOp extends Located {
	_type: "BinOp";
	left: PyExpr;
	op: BinOpType;
	right: PyExpr;
}

export interface PyUnaryOp extends Located {
	_type: "UnaryOp";
	op: UnaryOpType;
	operand: PyExpr;
}

export interface PyBoolOp extends Located {
	_type: "BoolOp";
	op: BoolOpType;
	values: PyExpr[];
}

export interface PyCompare extends Located {
	_type: "Compare";
	left: PyExpr;
	ops: CmpOpType[];
	comparators: PyExpr[];
}

export interface PyKeyword extends Located {
	_type: "keyword";
	arg: string;
	value: PyExpr;
}

export interface PyCall extends Located {
	_type: "Call";
	func: PyExpr;
	args: PyExpr[];
	keywords: PyKeyword[];
}

export interface PyAttribute extends Located {
	_type: "Attribute";
	value: PyExpr;
	attr: string;
}

export interface PySlice extends Located {
	_type: "Slice";
	lower: PyExpr | null;
	upper: PyExpr | null;
	step: PyExpr | null;
}

export interface PySubscript extends Located {
	_type: "Subscript";
	value: PyExpr;
	slice: PyExpr;
}

export interface PyTuple extends Located {
	_type: "Tuple";
	elts: PyExpr[];
}

export interface PyList extends Located {
	_type: "List";
	elts: PyExpr[];
}

export type PyExpr =
	| PyConstant | PyName | PyBinOp | PyUnaryOp | PyBoolOp | PyCompare
	| PyCall | PyAttribute | PySubscript | PySlice | PyTuple | PyList;

//==============================================================================
// Statements
//==============================================================================

export interface PyArg extends Located {
	_type: "arg";
	arg: string;
	annotation: PyExpr | null;
}

export interface PyArguments {
	_type: "arguments";
	args: PyArg[];
	/** Defaults align with the last `defaults.length` parameters */
	defaults: PyExpr[];
}

export interface PyFunctionDef extends Located {
	_type: "FunctionDef";
	name: string;
	args: PyArguments;
	body: PyStmt[];
	returns: PyExpr | null;
}

export interface PyAssign extends Located {
	_type: "Assign";
	targets: PyExpr[];
	value: PyExpr;
}

export interface PyAnnAssign extends Located {
	_type: "AnnAssign";
	target: PyExpr;
	annotation: PyExpr;
	value: PyExpr | null;
}

export interface PyReturn extends Located {
	_type: "Return";
	value: PyExpr | null;
}

export interface PyIf extends Located {
	_type: "If";
	test: PyExpr;
	body: PyStmt[];
	orelse: PyStmt[];
}

export interface PyFor extends Located {
	_type: "For";
	target: PyExpr;
	iter: PyExpr;
	body: PyStmt[];
	orelse: PyStmt[];
}

export interface PyWhile extends Located {
	_type: "While";
	test: PyExpr;
	body: PyStmt[];
	orelse: PyStmt[];
}

export interface PyBreak extends Located {
	_type: "Break";
}

export interface PyPass extends Located {
	_type: "Pass";
}

export interface PyExprStmt extends Located {
	_type: "Expr";
	value: PyExpr;
}

export interface PyAlias {
	name: string;
	asname: string | null;
}

export interface PyImport extends Located {
	_type: "Import";
	names: PyAlias[];
}

export interface PyImportFrom extends Located {
	_type: "ImportFrom";
	module: string;
	names: PyAlias[];
}

export type PyStmt =
	| PyFunctionDef | PyAssign | PyAnnAssign | PyReturn | PyIf | PyFor
	| PyWhile | PyBreak | PyPass | PyExprStmt | PyImport | PyImportFrom;

export interface PyModule {
	_type: "Module";
	body: PyStmt[];
}

//==============================================================================
// Type Guards
//==============================================================================

export function isName(node: PyExpr): node is PyName {
	return node._type === "Name";
}

export function isConstant(node: PyExpr): node is PyConstant {
	return node._type === "Constant";
}

export function isCall(node: PyExpr): node is PyCall {
	return node._type === "Call";
}

export function isSlice(node: PyExpr): node is PySlice {
	return node._type === "Slice";
}

export function isTuple(node: PyExpr): node is PyTuple {
	return node._type === "Tuple";
}

export function isFunctionDef(node: PyStmt): node is PyFunctionDef {
	return node._type === "FunctionDef";
}

export function isIfStmt(node: PyStmt): node is PyIf {
	return node._type === "If";
}

export function isBreak(node: PyStmt): node is PyBreak {
	return node._type === "Break";
}

/**
 * `print(...)` statements are accepted and dropped by the converter.
 */
export function isPrintCall(node: PyStmt): boolean {
	return node._type === "Expr"
		&& isCall(node.value)
		&& isName(node.value.func)
		&& node.value.func.id === "print";
}

/**
 * A bare string literal statement (docstring position or otherwise).
 */
export function isDocstring(node: PyStmt): node is PyExprStmt & { value: PyConstant & { value: string } } {
	return node._type === "Expr"
		&& isConstant(node.value)
		&& typeof node.value.value === "string";
}

export function locationOf(node: Located, functionName?: string): SourceLocation {
	return { line: node.lineno, column: node.col_offset, functionName };
}
