// Tensor element types and attribute types of the interchange format

//==============================================================================
// Element Types
//==============================================================================

export const ElementType = {
	UNDEFINED: 0,
	FLOAT: 1,
	UINT8: 2,
	INT8: 3,
	UINT16: 4,
	INT16: 5,
	INT32: 6,
	INT64: 7,
	STRING: 8,
	BOOL: 9,
	FLOAT16: 10,
	DOUBLE: 11,
	UINT32: 12,
	UINT64: 13,
	BFLOAT16: 16,
} as const;

export type ElementType = (typeof ElementType)[keyof typeof ElementType];

const ELEMENT_TYPE_NAMES = new Map<ElementType, string>(
	Object.entries(ElementType).map(([name, code]): [ElementType, string] => [code, name]),
);

export function elementTypeName(type: ElementType): string {
	return ELEMENT_TYPE_NAMES.get(type) ?? "UNDEFINED";
}

export function isIntegerElementType(type: ElementType): boolean {
	return type === ElementType.INT8 || type === ElementType.INT16
		|| type === ElementType.INT32 || type === ElementType.INT64
		|| type === ElementType.UINT8 || type === ElementType.UINT16
		|| type === ElementType.UINT32 || type === ElementType.UINT64;
}

export function isFloatElementType(type: ElementType): boolean {
	return type === ElementType.FLOAT || type === ElementType.DOUBLE
		|| type === ElementType.FLOAT16 || type === ElementType.BFLOAT16;
}

//==============================================================================
// Attribute Types
//==============================================================================

export const AttributeType = {
	UNDEFINED: "UNDEFINED",
	FLOAT: "FLOAT",
	INT: "INT",
	STRING: "STRING",
	TENSOR: "TENSOR",
	GRAPH: "GRAPH",
	FLOATS: "FLOATS",
	INTS: "INTS",
	STRINGS: "STRINGS",
} as const;

export type AttributeType = (typeof AttributeType)[keyof typeof AttributeType];

/**
 * Name of the `Constant` attribute that holds a value of the given
 * attribute type, used when an attribute parameter is promoted to a value.
 */
export function constantAttributeName(type: AttributeType): string | undefined {
	switch (type) {
	case AttributeType.FLOAT: return "value_float";
	case AttributeType.INT: return "value_int";
	case AttributeType.STRING: return "value_string";
	case AttributeType.FLOATS: return "value_floats";
	case AttributeType.INTS: return "value_ints";
	case AttributeType.STRINGS: return "value_strings";
	default: return undefined;
	}
}
