// Script tokenizer
// Indentation-aware lexer for the accepted script subset

import { GraphScriptError } from "../errors.js";

//==============================================================================
// Tokens
//==============================================================================

export type TokenType =
	| "Name"
	| "Number"
	| "String"
	| "Op"
	| "Newline"
	| "Indent"
	| "Dedent"
	| "EOF";

export interface Token {
	type: TokenType;
	value: string;
	line: number;
	column: number;
}

const THREE_CHAR_OPS = ["**=", "//=", ">>=", "<<=", "..."];

const TWO_CHAR_OPS = [
	"**", "//", "==", "!=", "<=", ">=", "->", "+=", "-=", "*=", "/=",
	"%=", "@=", "&=", "|=", "^=", "<<", ">>", ":=",
];

const ONE_CHAR_OPS = "+-*/%@&|^~<>()[]{},:.;=";

const ESCAPES: Record<string, string> = {
	n: "\n",
	t: "\t",
	r: "\r",
	"0": "\0",
	"\\": "\\",
	"'": "'",
	"\"": "\"",
};

//==============================================================================
// Lexer State
//==============================================================================

interface LexerState {
	source: string;
	pos: number;
	line: number;
	column: number;
	depth: number;
	indents: number[];
	atLineStart: boolean;
	tokens: Token[];
}

function peekChar(state: LexerState, offset = 0): string {
	return state.source.charAt(state.pos + offset);
}

function advance(state: LexerState, count = 1): void {
	for (let i = 0; i < count; i++) {
		if (state.source.charAt(state.pos) === "\n") {
			state.line++;
			state.column = 0;
		} else {
			state.column++;
		}
		state.pos++;
	}
}

function push(state: LexerState, type: TokenType, value: string, line: number, column: number): void {
	state.tokens.push({ type, value, line, column });
}

function lexError(state: LexerState, message: string): never {
	throw GraphScriptError.syntax(message, { line: state.line, column: state.column });
}

function lastTokenType(state: LexerState): TokenType | undefined {
	return state.tokens[state.tokens.length - 1]?.type;
}

//==============================================================================
// Indentation
//==============================================================================

/**
 * Measure the indentation of the line starting at `state.pos`.
 * Returns null for blank and comment-only lines, which produce no tokens.
 */
function measureIndent(state: LexerState): number | null {
	let width = 0;
	let i = state.pos;
	for (; i < state.source.length; i++) {
		const ch = state.source.charAt(i);
		if (ch === " ") width++;
		else if (ch === "\t") width = (Math.floor(width / 8) + 1) * 8;
		else break;
	}
	const next = state.source.charAt(i);
	if (next === "" || next === "\n" || next === "#" || next === "\r") return null;
	return width;
}

function handleIndent(state: LexerState, width: number): void {
	const current = state.indents[state.indents.length - 1] ?? 0;
	if (width > current) {
		state.indents.push(width);
		push(state, "Indent", "", state.line, width);
		return;
	}
	while (width < (state.indents[state.indents.length - 1] ?? 0)) {
		state.indents.pop();
		push(state, "Dedent", "", state.line, width);
	}
	if (width !== (state.indents[state.indents.length - 1] ?? 0)) {
		lexError(state, "Unindent does not match any outer indentation level.");
	}
}

function skipLine(state: LexerState): void {
	while (state.pos < state.source.length && peekChar(state) !== "\n") advance(state);
	if (state.pos < state.source.length) advance(state);
}

//==============================================================================
// Token Readers
//==============================================================================

function isNameStart(ch: string): boolean {
	return /[A-Za-z_]/.test(ch);
}

function isNamePart(ch: string): boolean {
	return /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string): boolean {
	return ch >= "0" && ch <= "9";
}

function readName(state: LexerState): void {
	const { line, column } = state;
	const start = state.pos;
	while (isNamePart(peekChar(state))) advance(state);
	push(state, "Name", state.source.slice(start, state.pos), line, column);
}

function readNumber(state: LexerState): void {
	const { line, column } = state;
	const start = state.pos;
	if (peekChar(state) === "0" && /[xXoObB]/.test(peekChar(state, 1))) {
		advance(state, 2);
		while (/[0-9a-fA-F_]/.test(peekChar(state))) advance(state);
	} else {
		while (isDigit(peekChar(state)) || peekChar(state) === "_") advance(state);
		if (peekChar(state) === "." && peekChar(state, 1) !== ".") {
			advance(state);
			while (isDigit(peekChar(state)) || peekChar(state) === "_") advance(state);
		}
		if (/[eE]/.test(peekChar(state))) {
			const sign = /[+-]/.test(peekChar(state, 1)) ? 1 : 0;
			if (isDigit(peekChar(state, 1 + sign))) {
				advance(state, 1 + sign);
				while (isDigit(peekChar(state))) advance(state);
			}
		}
	}
	if (/[jJ]/.test(peekChar(state))) lexError(state, "Complex literals are not supported.");
	if (isNameStart(peekChar(state))) lexError(state, "Invalid numeric literal.");
	push(state, "Number", state.source.slice(start, state.pos), line, column);
}

function readString(state: LexerState): void {
	const { line, column } = state;
	const quote = peekChar(state);
	const triple = peekChar(state, 1) === quote && peekChar(state, 2) === quote;
	const delimiter = triple ? quote.repeat(3) : quote;
	advance(state, delimiter.length);
	let text = "";
	for (;;) {
		if (state.pos >= state.source.length) lexError(state, "Unterminated string literal.");
		if (state.source.startsWith(delimiter, state.pos)) {
			advance(state, delimiter.length);
			break;
		}
		const ch = peekChar(state);
		if (ch === "\n" && !triple) lexError(state, "Unterminated string literal.");
		if (ch === "\\") {
			const escaped = peekChar(state, 1);
			if (escaped === "\n") {
				advance(state, 2);
				continue;
			}
			text += ESCAPES[escaped] ?? "\\" + escaped;
			advance(state, 2);
			continue;
		}
		text += ch;
		advance(state);
	}
	push(state, "String", text, line, column);
}

function readOperator(state: LexerState): void {
	const { line, column } = state;
	for (const candidates of [THREE_CHAR_OPS, TWO_CHAR_OPS]) {
		for (const op of candidates) {
			if (state.source.startsWith(op, state.pos)) {
				advance(state, op.length);
				push(state, "Op", op, line, column);
				return;
			}
		}
	}
	const ch = peekChar(state);
	if (!ONE_CHAR_OPS.includes(ch)) lexError(state, `Unexpected character '${ch}'.`);
	if ("([{".includes(ch)) state.depth++;
	if (")]}".includes(ch)) state.depth = Math.max(0, state.depth - 1);
	advance(state);
	push(state, "Op", ch, line, column);
}

function readNewline(state: LexerState): void {
	if (state.depth === 0) {
		const previous = lastTokenType(state);
		if (previous !== undefined && previous !== "Newline" && previous !== "Indent" && previous !== "Dedent") {
			push(state, "Newline", "", state.line, state.column);
		}
		state.atLineStart = true;
	}
	advance(state);
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Split script source into tokens. Blank and comment-only lines are
 * dropped; brackets join lines; `Indent`/`Dedent` bracket every block.
 */
export function tokenize(source: string): Token[] {
	const state: LexerState = {
		source: source.replace(/\r\n?/g, "\n"),
		pos: 0,
		line: 1,
		column: 0,
		depth: 0,
		indents: [0],
		atLineStart: true,
		tokens: [],
	};

	while (state.pos < state.source.length) {
		if (state.atLineStart && state.depth === 0) {
			const width = measureIndent(state);
			if (width === null) {
				skipLine(state);
				continue;
			}
			advance(state, countLeadingWhitespace(state));
			handleIndent(state, width);
			state.atLineStart = false;
		}
		const ch = peekChar(state);
		if (ch === " " || ch === "\t") advance(state);
		else if (ch === "#") {
			while (state.pos < state.source.length && peekChar(state) !== "\n") advance(state);
		} else if (ch === "\\" && peekChar(state, 1) === "\n") advance(state, 2);
		else if (ch === "\n") readNewline(state);
		else if (isNameStart(ch)) readName(state);
		else if (isDigit(ch) || (ch === "." && isDigit(peekChar(state, 1)))) readNumber(state);
		else if (ch === "'" || ch === "\"") readString(state);
		else readOperator(state);
	}

	const previous = lastTokenType(state);
	if (previous !== undefined && previous !== "Newline" && previous !== "Dedent") {
		push(state, "Newline", "", state.line, state.column);
	}
	while (state.indents.length > 1) {
		state.indents.pop();
		push(state, "Dedent", "", state.line, 0);
	}
	push(state, "EOF", "", state.line, state.column);
	return state.tokens;
}

function countLeadingWhitespace(state: LexerState): number {
	let count = 0;
	while (peekChar(state, count) === " " || peekChar(state, count) === "\t") count++;
	return count;
}
