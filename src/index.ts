// graphscript - script-to-dataflow-graph compiler
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	Located, PyExpr, PyFunctionDef, PyModule, PyStmt, PyValue,
} from "./ast/types.js";

export type {
	Diagnostic, ErrorCode, Logger, SourceLocation, ValidationError, ValidationResult,
} from "./errors.js";

export type {
	AttributeProto, FunctionProto, GraphProto, ModelProto, NodeProto,
	OperatorSetIdProto, TensorProto, TypeProto, ValueInfoProto,
} from "./ir/model.js";

export type { FormalParameter, OpSchema } from "./schemas/registry.js";
export type { ParamSchema } from "./schemas/opset.js";
export type { LivenessOracle } from "./analysis/liveness.js";
export type { OracleFactory, TranslationOptions } from "./converter/context.js";
export type { CastEmitter } from "./autocast.js";
export type { GlobalValue, Globals, ScopeValue, TranslatedExpr } from "./values.js";
export type { CompiledScript, CompileOptions } from "./script.js";
export type { ResolvedConfig } from "./config.js";

//==============================================================================
// Errors
//==============================================================================

export { ErrorCodes, exhaustive, formatDiagnostic, GraphScriptError } from "./errors.js";

//==============================================================================
// Parsing and Evaluation
//==============================================================================

export { parseExpression, parseScript } from "./ast/parser.js";
export { evalConstantExpr, evalLiteral, isConstantExpr } from "./evaluator/constant-expr.js";
export { analyzeFunction } from "./analysis/liveness.js";

//==============================================================================
// Types, Opsets and Schemas
//==============================================================================

export {
	GenericAlias, OptionalType, ScalarType, SequenceType, TensorType, TupleType,
	isAttrType, isValidType, isValueType, pytypeToAttrtype,
} from "./types/annotations.js";
export { AttributeType, ElementType, elementTypeName } from "./types/element-types.js";
export { defaultRegistry, loadRegistryFile, registryFromDocument, SchemaRegistry } from "./schemas/registry.js";
export { Op, Opset } from "./schemas/opset.js";
export { validateConfig, validateOpsetDocument } from "./validator.js";

//==============================================================================
// Translation
//==============================================================================

export { AttrRef, Dynamic, DynamicKind, Namespace } from "./values.js";
export { Converter, findDefaultOpset } from "./converter/converter.js";
export { TranslationContext } from "./converter/context.js";
export { separateInputsAndAttributes } from "./converter/expressions.js";
export { ScriptFunction } from "./script-function.js";
export { compileFunction, compileScript, libraryModule } from "./script.js";

//==============================================================================
// Autocast
//==============================================================================

export {
	castInputs, castPyvalueToTensor, dynamicCastInputs, literalElementType, staticCastInputs,
} from "./autocast.js";
export { Tensor } from "./runtime/tensor.js";

//==============================================================================
// Graph Assembly and Output
//==============================================================================

export { IRBuilder, IRFunction } from "./ir/builder.js";
export { printFunction, printGraph } from "./ir/printer.js";
export { canonicalize, modelDigest, toJson } from "./ir/serialize.js";
export { loadConfigFile, parseConfig } from "./config.js";
