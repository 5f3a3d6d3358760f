// Interchange model
// Plain-data form of graphs, functions and models handed to serializers

import type { AttributeType, ElementType } from "../types/element-types.js";
import type { Dim } from "../types/annotations.js";

//==============================================================================
// Tensors and Types
//==============================================================================

export interface TensorProto {
	name: string;
	dataType: ElementType;
	dims: number[];
	/** BOOL elements, stored as 0/1 */
	int32Data?: number[] | undefined;
	int64Data?: bigint[] | undefined;
	floatData?: number[] | undefined;
	doubleData?: number[] | undefined;
	stringData?: string[] | undefined;
}

export type TypeProto =
	| { kind: "tensor"; elemType: ElementType; shape?: Dim[] | undefined }
	| { kind: "sequence"; elem: TypeProto }
	| { kind: "optional"; elem: TypeProto };

export interface ValueInfoProto {
	name: string;
	type?: TypeProto | undefined;
}

//==============================================================================
// Attributes and Nodes
//==============================================================================

export interface AttributeProto {
	name: string;
	type: AttributeType;
	f?: number | undefined;
	i?: bigint | undefined;
	s?: string | undefined;
	t?: TensorProto | undefined;
	g?: GraphProto | undefined;
	floats?: number[] | undefined;
	ints?: bigint[] | undefined;
	strings?: string[] | undefined;
	/** Set when the value is the enclosing function's attribute parameter */
	refAttrName?: string | undefined;
}

export interface NodeProto {
	opType: string;
	domain: string;
	input: string[];
	output: string[];
	attribute: AttributeProto[];
}

//==============================================================================
// Graphs, Functions and Models
//==============================================================================

export interface GraphProto {
	name: string;
	node: NodeProto[];
	input: ValueInfoProto[];
	output: ValueInfoProto[];
	initializer: TensorProto[];
	docString?: string | undefined;
}

export interface OperatorSetIdProto {
	domain: string;
	version: number;
}

export interface FunctionProto {
	name: string;
	domain: string;
	input: string[];
	output: string[];
	/** Attribute parameters without a default */
	attribute: string[];
	/** Attribute parameters with their default values */
	attributeProto: AttributeProto[];
	node: NodeProto[];
	opsetImport: OperatorSetIdProto[];
	docString?: string | undefined;
}

export interface ModelProto {
	irVersion: number;
	producerName: string;
	opsetImport: OperatorSetIdProto[];
	graph: GraphProto;
	functions: FunctionProto[];
}
