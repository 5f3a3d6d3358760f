// graphscript Error Types
// Error domain for parsing and translating scripts into graphs

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Input outside the accepted subset
	UnsupportedConstruct: "UnsupportedConstruct",
	SyntaxError: "SyntaxError",

	// Lookup errors
	UnboundName: "UnboundName",

	// Type and arity errors
	ArityError: "ArityError",
	TypeMismatch: "TypeMismatch",
	EmptyList: "EmptyList",

	// Nested function capture
	CapturedVariableMutation: "CapturedVariableMutation",

	// Opsets, schema and configuration files
	ConfigurationError: "ConfigurationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// Source Locations
//==============================================================================

export interface SourceLocation {
	line: number;
	column: number;
	functionName?: string | undefined;
}

/**
 * Render a location the way error and warning messages show it,
 * optionally followed by the source line and a caret under the column.
 */
export function formatLocation(location: SourceLocation, source?: string): string {
	const where = location.functionName !== undefined
		? `Function '${location.functionName}', line ${location.line}`
		: `Line ${location.line}`;
	if (source === undefined) return `at: ${where}`;
	const line = source.split("\n")[location.line - 1];
	if (line === undefined) return `at: ${where}`;
	return `at: ${where}\n${line}\n${" ".repeat(location.column)}^`;
}

//==============================================================================
// graphscript Error Class
//==============================================================================

export class GraphScriptError extends Error {
	readonly code: ErrorCode;
	// An own property only when given
	declare readonly location?: SourceLocation;

	constructor(code: ErrorCode, message: string, location?: SourceLocation) {
		super(message);
		this.name = "GraphScriptError";
		this.code = code;
		if (location !== undefined) this.location = location;
	}

	/**
	 * Full message with the source position, as printed by the CLI.
	 */
	format(source?: string): string {
		if (this.location === undefined) return `ERROR: ${this.message}`;
		return `ERROR: ${this.message}\n${formatLocation(this.location, source)}`;
	}

	static unsupported(message: string, location?: SourceLocation): GraphScriptError {
		return new GraphScriptError(ErrorCodes.UnsupportedConstruct, message, location);
	}

	static syntax(message: string, location: SourceLocation): GraphScriptError {
		return new GraphScriptError(ErrorCodes.SyntaxError, message, location);
	}

	static unboundName(name: string, location?: SourceLocation): GraphScriptError {
		return new GraphScriptError(ErrorCodes.UnboundName, "Unbound name: " + name + ".", location);
	}

	/**
	 * Create an ArityError
	 */
	static arity(message: string, location?: SourceLocation): GraphScriptError {
		return new GraphScriptError(ErrorCodes.ArityError, message, location);
	}

	static typeMismatch(message: string, location?: SourceLocation): GraphScriptError {
		return new GraphScriptError(ErrorCodes.TypeMismatch, message, location);
	}

	static emptyList(message: string, location?: SourceLocation): GraphScriptError {
		return new GraphScriptError(ErrorCodes.EmptyList, message, location);
	}

	static capturedMutation(
		variable: string,
		fnName: string,
		location?: SourceLocation,
	): GraphScriptError {
		return new GraphScriptError(
			ErrorCodes.CapturedVariableMutation,
			`Outer scope variable ${variable} referenced by function '${fnName}' modified.`,
			location,
		);
	}

	static configuration(message: string): GraphScriptError {
		return new GraphScriptError(ErrorCodes.ConfigurationError, message);
	}
}

/**
 * Re-attach a location to an error raised by a helper that had none.
 */
export function withLocation(error: GraphScriptError, location: SourceLocation): GraphScriptError {
	if (error.location !== undefined) return error;
	return new GraphScriptError(error.code, error.message, location);
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
	value?: unknown;
}

export interface ValidationResult<T> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

export function formatValidationErrors(errors: readonly ValidationError[]): string {
	return errors.map((e) => `${e.path}: ${e.message}`).join("; ");
}

//==============================================================================
// Warnings
//==============================================================================

export interface Diagnostic {
	message: string;
	location?: SourceLocation | undefined;
}

export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
	if (diagnostic.location === undefined) return `WARNING: ${diagnostic.message}`;
	return `WARNING: ${diagnostic.message}\n${formatLocation(diagnostic.location, source)}`;
}

/**
 * Sink for warnings and debug traces. `console` satisfies it.
 */
export type Logger = Pick<Console, "warn" | "debug">;

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
