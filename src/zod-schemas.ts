// graphscript Zod Schemas
// Structural schemas for the untyped files the compiler reads: the
// operator-schema data file and the CLI configuration file.

import { z } from "zod/v4";

//==============================================================================
// Operator Schema Documents
//==============================================================================

export const FormalOptionSchema = z.enum(["Single", "Optional", "Variadic"]);

export const FormalParameterSchema = z.object({
	name: z.string().min(1),
	/** Type variable (`T`) or concrete type string (`tensor(int64)`) */
	type: z.string().min(1),
	option: FormalOptionSchema.default("Single"),
	homogeneous: z.boolean().default(true),
}).meta({ id: "FormalParameter", title: "Formal Parameter" });

export const AttributeTypeNameSchema = z.enum([
	"FLOAT", "INT", "STRING", "TENSOR", "GRAPH", "FLOATS", "INTS", "STRINGS",
]);

const AttributeDefaultSchema = z.union([
	z.number(),
	z.string(),
	z.array(z.number()),
	z.array(z.string()),
]);

export const AttributeSchemaEntrySchema = z.object({
	name: z.string().min(1),
	type: AttributeTypeNameSchema,
	required: z.boolean(),
	default: AttributeDefaultSchema.optional(),
}).meta({ id: "AttributeSchema", title: "Attribute Schema" });

export const OperatorEntrySchema = z.object({
	name: z.string().min(1),
	since: z.number().int().nonnegative(),
	inputs: z.array(FormalParameterSchema),
	outputs: z.array(FormalParameterSchema),
	attributes: z.array(AttributeSchemaEntrySchema).default([]),
}).meta({ id: "OperatorSchema", title: "Operator Schema" });

export const OpsetDocumentSchema = z.object({
	domain: z.string(),
	version: z.number().int().positive(),
	operators: z.array(OperatorEntrySchema),
}).meta({ id: "OpsetDocument", title: "Opset Document", description: "Operators of one domain at one version" });

export type FormalParameterEntry = z.infer<typeof FormalParameterSchema>;
export type AttributeSchemaEntry = z.infer<typeof AttributeSchemaEntrySchema>;
export type OperatorEntry = z.infer<typeof OperatorEntrySchema>;
export type OpsetDocument = z.infer<typeof OpsetDocumentSchema>;

//==============================================================================
// CLI Configuration
//==============================================================================

const ConstantValueSchema = z.union([
	z.boolean(),
	z.number(),
	z.string(),
	z.array(z.union([z.boolean(), z.number(), z.string()])),
]);

export const ConfigSchema = z.object({
	opsetVersion: z.number().int().positive().optional(),
	domain: z.string().optional(),
	format: z.enum(["text", "json"]).optional(),
	verbose: z.boolean().optional(),
	/** Module-level names made available to every script */
	constants: z.record(z.string(), ConstantValueSchema).optional(),
}).strict().meta({ id: "GraphScriptConfig", title: "graphscript configuration" });

export type ConfigDocument = z.infer<typeof ConfigSchema>;
