// Script parser
// Recursive-descent parser producing Python-shaped AST nodes

import { GraphScriptError } from "../errors.js";
import { tokenize, type Token, type TokenType } from "./tokenizer.js";
import type {
	BinOpType,
	CmpOpType,
	Located,
	PyAlias,
	PyArg,
	PyExpr,
	PyFunctionDef,
	PyKeyword,
	PyModule,
	PyStmt,
} from "./types.js";

//==============================================================================
// Operator Tables
//==============================================================================

const AUGMENTED_OPS: Record<string, BinOpType> = {
	"+=": "Add",
	"-=": "Sub",
	"*=": "Mult",
	"/=": "Div",
	"//=": "FloorDiv",
	"%=": "Mod",
	"**=": "Pow",
	"@=": "MatMult",
	"&=": "BitAnd",
	"|=": "BitOr",
	"^=": "BitXor",
	"<<=": "LShift",
	">>=": "RShift",
};

const COMPARE_OPS: Record<string, CmpOpType> = {
	"==": "Eq",
	"!=": "NotEq",
	"<": "Lt",
	"<=": "LtE",
	">": "Gt",
	">=": "GtE",
};

const TERM_OPS: Record<string, BinOpType> = {
	"*": "Mult",
	"/": "Div",
	"//": "FloorDiv",
	"%": "Mod",
	"@": "MatMult",
};

const REJECTED_KEYWORDS = new Set([
	"class", "with", "try", "raise", "assert", "del", "global", "nonlocal",
	"lambda", "yield", "async", "await", "continue",
]);

const RESERVED = new Set([
	"def", "if", "elif", "else", "for", "while", "in", "not", "and", "or",
	"is", "return", "break", "pass", "import", "from", "as", ...REJECTED_KEYWORDS,
]);

//==============================================================================
// Parser
//==============================================================================

class Parser {
	private pos = 0;

	constructor(private readonly tokens: Token[]) {}

	//--------------------------------------------------------------------------
	// Token helpers
	//--------------------------------------------------------------------------

	private peek(offset = 0): Token {
		const token = this.tokens[this.pos + offset] ?? this.tokens[this.tokens.length - 1];
		if (token === undefined) throw GraphScriptError.syntax("Empty token stream.", { line: 1, column: 0 });
		return token;
	}

	private next(): Token {
		const token = this.peek();
		if (this.pos < this.tokens.length - 1) this.pos++;
		return token;
	}

	private check(type: TokenType, value?: string): boolean {
		const token = this.peek();
		return token.type === type && (value === undefined || token.value === value);
	}

	private checkKeyword(value: string): boolean {
		return this.check("Name", value);
	}

	private accept(type: TokenType, value?: string): Token | undefined {
		return this.check(type, value) ? this.next() : undefined;
	}

	private expect(type: TokenType, value?: string): Token {
		const token = this.accept(type, value);
		if (token !== undefined) return token;
		const found = this.peek();
		const wanted = value !== undefined ? `'${value}'` : type;
		this.fail(`Expected ${wanted} but found ${describe(found)}.`, found);
	}

	private fail(message: string, token: Token = this.peek()): never {
		throw GraphScriptError.syntax(message, { line: token.line, column: token.column });
	}

	private unsupported(message: string, token: Token): never {
		throw GraphScriptError.unsupported(message, { line: token.line, column: token.column });
	}

	//--------------------------------------------------------------------------
	// Statements
	//--------------------------------------------------------------------------

	parseModule(): PyModule {
		const body: PyStmt[] = [];
		while (!this.check("EOF")) {
			if (this.accept("Newline")) continue;
			body.push(...this.parseStatement());
		}
		return { _type: "Module", body };
	}

	private parseStatement(): PyStmt[] {
		const token = this.peek();
		if (token.type === "Op" && token.value === "@") this.unsupported("Decorators are not supported.", token);
		if (token.type === "Indent") this.fail("Unexpected indent.", token);
		if (token.type === "Name") {
			switch (token.value) {
			case "def": return [this.parseFunctionDef()];
			case "if": return [this.parseIf()];
			case "for": return [this.parseFor()];
			case "while": return [this.parseWhile()];
			default: break;
			}
		}
		return this.parseSimpleStatementLine();
	}

	private parseSimpleStatementLine(): PyStmt[] {
		const stmts: PyStmt[] = [this.parseSmallStatement()];
		while (this.accept("Op", ";")) {
			if (this.check("Newline")) break;
			stmts.push(this.parseSmallStatement());
		}
		this.expect("Newline");
		return stmts;
	}

	private parseBlock(): PyStmt[] {
		this.expect("Op", ":");
		if (!this.accept("Newline")) return this.parseSimpleStatementLine();
		this.expect("Indent");
		const body: PyStmt[] = [];
		while (!this.check("Dedent") && !this.check("EOF")) {
			body.push(...this.parseStatement());
		}
		this.expect("Dedent");
		return body;
	}

	private parseFunctionDef(): PyFunctionDef {
		const start = this.expect("Name", "def");
		const name = this.parseIdentifier();
		this.expect("Op", "(");
		const args: PyArg[] = [];
		const defaults: PyExpr[] = [];
		while (!this.check("Op", ")")) {
			const paramToken = this.peek();
			if (paramToken.type === "Op" && (paramToken.value === "*" || paramToken.value === "**")) {
				this.unsupported(`${name}: Unsupported feature in function signature.`, paramToken);
			}
			const arg = this.parseIdentifier();
			const annotation = this.accept("Op", ":") ? this.parseTest() : null;
			args.push({ _type: "arg", arg, annotation, ...pos(paramToken) });
			if (this.accept("Op", "=")) defaults.push(this.parseTest());
			else if (defaults.length > 0) this.fail("Non-default argument follows default argument.", paramToken);
			if (!this.accept("Op", ",")) break;
		}
		this.expect("Op", ")");
		const returns = this.accept("Op", "->") ? this.parseTest() : null;
		const body = this.parseBlock();
		return {
			_type: "FunctionDef",
			name,
			args: { _type: "arguments", args, defaults },
			body,
			returns,
			...pos(start),
		};
	}

	private parseIf(): PyStmt {
		const start = this.next();
		const test = this.parseNamedTest();
		const body = this.parseBlock();
		let orelse: PyStmt[] = [];
		if (this.checkKeyword("elif")) orelse = [this.parseIf()];
		else if (this.accept("Name", "else")) orelse = this.parseBlock();
		return { _type: "If", test, body, orelse, ...pos(start) };
	}

	private parseFor(): PyStmt {
		const start = this.expect("Name", "for");
		const target = this.parseTargetList();
		this.expect("Name", "in");
		const iter = this.parseTestList();
		const body = this.parseBlock();
		const orelse = this.accept("Name", "else") ? this.parseBlock() : [];
		return { _type: "For", target, iter, body, orelse, ...pos(start) };
	}

	private parseWhile(): PyStmt {
		const start = this.expect("Name", "while");
		const test = this.parseNamedTest();
		const body = this.parseBlock();
		const orelse = this.accept("Name", "else") ? this.parseBlock() : [];
		return { _type: "While", test, body, orelse, ...pos(start) };
	}

	private parseSmallStatement(): PyStmt {
		const token = this.peek();
		if (token.type === "Name") {
			if (REJECTED_KEYWORDS.has(token.value)) {
				this.unsupported(`Unsupported statement '${token.value}'.`, token);
			}
			switch (token.value) {
			case "pass": this.next(); return { _type: "Pass", ...pos(token) };
			case "break": this.next(); return { _type: "Break", ...pos(token) };
			case "return": return this.parseReturn();
			case "import": return this.parseImport();
			case "from": return this.parseImportFrom();
			default: break;
			}
		}
		return this.parseExpressionStatement();
	}

	private parseReturn(): PyStmt {
		const start = this.next();
		const value = this.check("Newline") || this.check("Op", ";") ? null : this.parseTestList();
		return { _type: "Return", value, ...pos(start) };
	}

	private parseImport(): PyStmt {
		const start = this.next();
		const names: PyAlias[] = [];
		do {
			const name = this.parseDottedName();
			const asname = this.accept("Name", "as") ? this.parseIdentifier() : null;
			names.push({ name, asname });
		} while (this.accept("Op", ","));
		return { _type: "Import", names, ...pos(start) };
	}

	private parseImportFrom(): PyStmt {
		const start = this.next();
		const module = this.parseDottedName();
		this.expect("Name", "import");
		const parenthesized = this.accept("Op", "(") !== undefined;
		const names: PyAlias[] = [];
		if (this.accept("Op", "*")) {
			names.push({ name: "*", asname: null });
		} else {
			do {
				if (parenthesized && this.check("Op", ")")) break;
				const name = this.parseIdentifier();
				const asname = this.accept("Name", "as") ? this.parseIdentifier() : null;
				names.push({ name, asname });
			} while (this.accept("Op", ","));
		}
		if (parenthesized) this.expect("Op", ")");
		return { _type: "ImportFrom", module, names, ...pos(start) };
	}

	private parseExpressionStatement(): PyStmt {
		const start = this.peek();
		const first = this.parseTestList();

		if (this.accept("Op", ":")) {
			const annotation = this.parseTest();
			const value = this.accept("Op", "=") ? this.parseTestList() : null;
			return { _type: "AnnAssign", target: first, annotation, value, ...pos(start) };
		}

		const augmented = this.peek();
		const augOp = augmented.type === "Op" ? AUGMENTED_OPS[augmented.value] : undefined;
		if (augOp !== undefined) {
			this.next();
			if (first._type !== "Name") this.unsupported("Augmented assignment target must be a name.", augmented);
			const right = this.parseTestList();
			const value: PyExpr = { _type: "BinOp", left: first, op: augOp, right, ...located(first) };
			const target: PyExpr = { _type: "Name", id: first.id, ...located(first) };
			return { _type: "Assign", targets: [target], value, ...pos(start) };
		}

		if (!this.check("Op", "=")) return { _type: "Expr", value: first, ...pos(start) };

		const targets: PyExpr[] = [first];
		let value = first;
		while (this.accept("Op", "=")) {
			value = this.parseTestList();
			targets.push(value);
		}
		targets.pop();
		return { _type: "Assign", targets, value, ...pos(start) };
	}

	//--------------------------------------------------------------------------
	// Expressions
	//--------------------------------------------------------------------------

	private parseTestList(): PyExpr {
		const first = this.parseTest();
		if (!this.check("Op", ",")) return first;
		const elts = [first];
		while (this.accept("Op", ",")) {
			if (this.atExpressionEnd()) break;
			elts.push(this.parseTest());
		}
		return { _type: "Tuple", elts, ...located(first) };
	}

	private parseTargetList(): PyExpr {
		const first = this.parseBitOr();
		if (!this.check("Op", ",")) return first;
		const elts = [first];
		while (this.accept("Op", ",")) {
			if (this.checkKeyword("in")) break;
			elts.push(this.parseBitOr());
		}
		return { _type: "Tuple", elts, ...located(first) };
	}

	private atExpressionEnd(): boolean {
		const token = this.peek();
		if (token.type === "Newline" || token.type === "EOF") return true;
		return token.type === "Op" && [")", "]", "=", ":", ";"].includes(token.value);
	}

	private parseNamedTest(): PyExpr {
		const test = this.parseTest();
		const walrus = this.peek();
		if (walrus.type === "Op" && walrus.value === ":=") this.unsupported("Assignment expressions are not supported.", walrus);
		return test;
	}

	private parseTest(): PyExpr {
		const token = this.peek();
		if (token.type === "Name" && token.value === "lambda") this.unsupported("Lambda expressions are not supported.", token);
		const expr = this.parseOr();
		if (this.checkKeyword("if")) this.unsupported("Conditional expressions are not supported.", this.peek());
		return expr;
	}

	private parseOr(): PyExpr {
		const first = this.parseAnd();
		if (!this.checkKeyword("or")) return first;
		const values = [first];
		while (this.accept("Name", "or")) values.push(this.parseAnd());
		return { _type: "BoolOp", op: "Or", values, ...located(first) };
	}

	private parseAnd(): PyExpr {
		const first = this.parseNot();
		if (!this.checkKeyword("and")) return first;
		const values = [first];
		while (this.accept("Name", "and")) values.push(this.parseNot());
		return { _type: "BoolOp", op: "And", values, ...located(first) };
	}

	private parseNot(): PyExpr {
		const token = this.accept("Name", "not");
		if (token === undefined) return this.parseComparison();
		return { _type: "UnaryOp", op: "Not", operand: this.parseNot(), ...pos(token) };
	}

	private parseComparison(): PyExpr {
		const left = this.parseBitOr();
		const ops: CmpOpType[] = [];
		const comparators: PyExpr[] = [];
		for (;;) {
			const op = this.parseCompareOp();
			if (op === undefined) break;
			ops.push(op);
			comparators.push(this.parseBitOr());
		}
		if (ops.length === 0) return left;
		return { _type: "Compare", left, ops, comparators, ...located(left) };
	}

	private parseCompareOp(): CmpOpType | undefined {
		const token = this.peek();
		if (token.type === "Op") {
			const op = COMPARE_OPS[token.value];
			if (op !== undefined) this.next();
			return op;
		}
		if (token.type !== "Name") return undefined;
		if (token.value === "in") {
			this.next();
			return "In";
		}
		if (token.value === "not" && this.peek(1).type === "Name" && this.peek(1).value === "in") {
			this.next();
			this.next();
			return "NotIn";
		}
		if (token.value === "is") {
			this.next();
			return this.accept("Name", "not") ? "IsNot" : "Is";
		}
		return undefined;
	}

	private parseBinaryLevel(
		operand: () => PyExpr,
		table: Record<string, BinOpType>,
	): PyExpr {
		let left = operand();
		for (;;) {
			const token = this.peek();
			const op = token.type === "Op" ? table[token.value] : undefined;
			if (op === undefined) return left;
			this.next();
			const right = operand();
			left = { _type: "BinOp", left, op, right, ...located(left) };
		}
	}

	private parseBitOr(): PyExpr {
		return this.parseBinaryLevel(() => this.parseBitXor(), { "|": "BitOr" });
	}

	private parseBitXor(): PyExpr {
		return this.parseBinaryLevel(() => this.parseBitAnd(), { "^": "BitXor" });
	}

	private parseBitAnd(): PyExpr {
		return this.parseBinaryLevel(() => this.parseShift(), { "&": "BitAnd" });
	}

	private parseShift(): PyExpr {
		return this.parseBinaryLevel(() => this.parseArith(), { "<<": "LShift", ">>": "RShift" });
	}

	private parseArith(): PyExpr {
		return this.parseBinaryLevel(() => this.parseTerm(), { "+": "Add", "-": "Sub" });
	}

	private parseTerm(): PyExpr {
		return this.parseBinaryLevel(() => this.parseFactor(), TERM_OPS);
	}

	private parseFactor(): PyExpr {
		const token = this.peek();
		if (token.type === "Op") {
			const op = token.value === "-" ? "USub" : token.value === "+" ? "UAdd" : token.value === "~" ? "Invert" : undefined;
			if (op !== undefined) {
				this.next();
				return { _type: "UnaryOp", op, operand: this.parseFactor(), ...pos(token) };
			}
		}
		return this.parsePower();
	}

	private parsePower(): PyExpr {
		const base = this.parseAtomExpr();
		if (!this.accept("Op", "**")) return base;
		const exponent = this.parseFactor();
		return { _type: "BinOp", left: base, op: "Pow", right: exponent, ...located(base) };
	}

	private parseAtomExpr(): PyExpr {
		let expr = this.parseAtom();
		for (;;) {
			if (this.accept("Op", "(")) {
				expr = this.parseCallTrailer(expr);
			} else if (this.accept("Op", "[")) {
				const slice = this.parseSubscriptList();
				this.expect("Op", "]");
				expr = { _type: "Subscript", value: expr, slice, ...located(expr) };
			} else if (this.accept("Op", ".")) {
				const attr = this.parseIdentifier();
				expr = { _type: "Attribute", value: expr, attr, ...located(expr) };
			} else {
				return expr;
			}
		}
	}

	private parseCallTrailer(func: PyExpr): PyExpr {
		const args: PyExpr[] = [];
		const keywords: PyKeyword[] = [];
		while (!this.check("Op", ")")) {
			const token = this.peek();
			if (token.type === "Op" && (token.value === "*" || token.value === "**")) {
				this.unsupported("Star arguments are not supported.", token);
			}
			if (token.type === "Name" && this.peek(1).type === "Op" && this.peek(1).value === "=") {
				this.next();
				this.next();
				keywords.push({ _type: "keyword", arg: token.value, value: this.parseTest(), ...pos(token) });
			} else {
				if (keywords.length > 0) this.fail("Positional argument follows keyword argument.", token);
				args.push(this.parseTest());
			}
			if (!this.accept("Op", ",")) break;
		}
		this.expect("Op", ")");
		return { _type: "Call", func, args, keywords, ...located(func) };
	}

	private parseSubscriptList(): PyExpr {
		const first = this.parseSubscript();
		if (!this.check("Op", ",")) return first;
		const elts = [first];
		while (this.accept("Op", ",")) {
			if (this.check("Op", "]")) break;
			elts.push(this.parseSubscript());
		}
		return { _type: "Tuple", elts, ...located(first) };
	}

	private parseSubscript(): PyExpr {
		const start = this.peek();
		const lower = this.check("Op", ":") ? null : this.parseTest();
		if (!this.accept("Op", ":")) {
			if (lower === null) this.fail("Expected subscript.", start);
			return lower;
		}
		const upper = this.atSliceEnd() ? null : this.parseTest();
		let step: PyExpr | null = null;
		if (this.accept("Op", ":")) step = this.atSliceEnd() ? null : this.parseTest();
		return { _type: "Slice", lower, upper, step, ...pos(start) };
	}

	private atSliceEnd(): boolean {
		const token = this.peek();
		return token.type === "Op" && (token.value === ":" || token.value === "," || token.value === "]");
	}

	private parseAtom(): PyExpr {
		const token = this.peek();
		switch (token.type) {
		case "Number":
			this.next();
			return { _type: "Constant", value: parseNumber(token), ...pos(token) };
		case "String": {
			this.next();
			let value = token.value;
			while (this.check("String")) value += this.next().value;
			return { _type: "Constant", value, ...pos(token) };
		}
		case "Name":
			return this.parseNameAtom(token);
		case "Op":
			return this.parseBracketAtom(token);
		default:
			this.fail(`Unexpected ${describe(token)}.`, token);
		}
	}

	private parseNameAtom(token: Token): PyExpr {
		this.next();
		switch (token.value) {
		case "True": return { _type: "Constant", value: true, ...pos(token) };
		case "False": return { _type: "Constant", value: false, ...pos(token) };
		case "None": return { _type: "Constant", value: null, ...pos(token) };
		default:
			if (RESERVED.has(token.value)) this.fail(`Unexpected keyword '${token.value}'.`, token);
			return { _type: "Name", id: token.value, ...pos(token) };
		}
	}

	private parseBracketAtom(token: Token): PyExpr {
		if (token.value === "(") {
			this.next();
			if (this.accept("Op", ")")) return { _type: "Tuple", elts: [], ...pos(token) };
			const inner = this.parseTestList();
			this.expect("Op", ")");
			return inner;
		}
		if (token.value === "[") {
			this.next();
			const elts: PyExpr[] = [];
			while (!this.check("Op", "]")) {
				elts.push(this.parseTest());
				if (this.checkKeyword("for")) this.unsupported("Comprehensions are not supported.", this.peek());
				if (!this.accept("Op", ",")) break;
			}
			this.expect("Op", "]");
			return { _type: "List", elts, ...pos(token) };
		}
		if (token.value === "{") this.unsupported("Dictionary and set displays are not supported.", token);
		if (token.value === "...") this.unsupported("Ellipsis is not supported.", token);
		this.fail(`Unexpected ${describe(token)}.`, token);
	}

	private parseIdentifier(): string {
		const token = this.expect("Name");
		if (RESERVED.has(token.value)) this.fail(`Unexpected keyword '${token.value}'.`, token);
		return token.value;
	}

	private parseDottedName(): string {
		let name = this.parseIdentifier();
		while (this.accept("Op", ".")) name += "." + this.parseIdentifier();
		return name;
	}
}

//==============================================================================
// Helpers
//==============================================================================

function pos(token: Token): Located {
	return { lineno: token.line, col_offset: token.column };
}

function located(node: Located): Located {
	return { lineno: node.lineno, col_offset: node.col_offset };
}

function describe(token: Token): string {
	switch (token.type) {
	case "EOF": return "end of input";
	case "Newline": return "end of line";
	case "Indent": return "indent";
	case "Dedent": return "dedent";
	default: return `'${token.value}'`;
	}
}

function parseNumber(token: Token): bigint | number {
	const text = token.value.replace(/_/g, "");
	if (/^0[xXoObB]/.test(text) || !/[.eE]/.test(text)) return BigInt(text);
	return Number(text);
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Parse script source into a module.
 */
export function parseScript(source: string): PyModule {
	return new Parser(tokenize(source)).parseModule();
}

/**
 * Parse a single expression, e.g. a type annotation given on the command line.
 */
export function parseExpression(source: string): PyExpr {
	const module = parseScript(source);
	const [stmt] = module.body;
	if (module.body.length !== 1 || stmt?._type !== "Expr") {
		throw GraphScriptError.syntax("Expected a single expression.", { line: 1, column: 0 });
	}
	return stmt.value;
}
