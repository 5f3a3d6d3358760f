// graphscript Document Validator
// Two-phase validation: Zod safeParse for structure, then semantic checks.

import { z } from "zod/v4";
import {
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.js";
import {
	type AttributeSchemaEntry,
	type ConfigDocument,
	ConfigSchema,
	type OperatorEntry,
	type OpsetDocument,
	OpsetDocumentSchema,
} from "./zod-schemas.js";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Operator Schema Semantics
//==============================================================================

function checkOperator(op: OperatorEntry, path: string, errors: ValidationError[]): void {
	op.inputs.forEach((input, i) => {
		if (input.option === "Variadic" && i !== op.inputs.length - 1) {
			errors.push({ path: `${path}.inputs.${i}`, message: "Only the last input may be variadic", value: input.name });
		}
	});
	const seen = new Set<string>();
	op.attributes.forEach((attr, i) => {
		const attrPath = `${path}.attributes.${i}`;
		if (seen.has(attr.name)) {
			errors.push({ path: attrPath, message: "Duplicate attribute", value: attr.name });
		}
		seen.add(attr.name);
		if (attr.default !== undefined && !defaultMatchesType(attr)) {
			errors.push({ path: attrPath, message: `Default does not match attribute type ${attr.type}`, value: attr.default });
		}
		if (attr.required && attr.default !== undefined) {
			errors.push({ path: attrPath, message: "Required attribute cannot have a default", value: attr.name });
		}
	});
}

function defaultMatchesType(attr: AttributeSchemaEntry): boolean {
	const value = attr.default;
	switch (attr.type) {
	case "INT": return typeof value === "number" && Number.isInteger(value);
	case "FLOAT": return typeof value === "number";
	case "STRING": return typeof value === "string";
	case "INTS": return Array.isArray(value) && value.every((v) => typeof v === "number" && Number.isInteger(v));
	case "FLOATS": return Array.isArray(value) && value.every((v) => typeof v === "number");
	case "STRINGS": return Array.isArray(value) && value.every((v) => typeof v === "string");
	case "TENSOR":
	case "GRAPH":
		return false;
	}
}

//==============================================================================
// Public API
//==============================================================================

export function validateOpsetDocument(doc: unknown): ValidationResult<OpsetDocument> {
	// Phase 1: Structural validation via Zod
	const parsed = OpsetDocumentSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<OpsetDocument>(zodToValidationErrors(parsed.error));
	}

	// Phase 2: Semantic validation on typed data
	const errors: ValidationError[] = [];
	const names = new Set<string>();
	parsed.data.operators.forEach((op, i) => {
		const path = `operators.${i}`;
		// Several versions of an operator may coexist, each with its own `since`
		const key = `${op.name}@${op.since}`;
		if (names.has(key)) errors.push({ path, message: "Duplicate operator version", value: op.name });
		names.add(key);
		checkOperator(op, path, errors);
	});
	return errors.length > 0 ? invalidResult(errors) : validResult(parsed.data);
}

export function validateConfig(doc: unknown): ValidationResult<ConfigDocument> {
	const parsed = ConfigSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<ConfigDocument>(zodToValidationErrors(parsed.error));
	}
	return validResult(parsed.data);
}
