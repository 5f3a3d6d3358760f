// Model serialization
// JSON forms of models and functions. 64-bit integers are written as
// decimal strings, as in the protobuf JSON mapping; the canonical form
// follows RFC 8785 and is what digests are computed over.

import { createHash, type Hash } from "node:crypto";

//==============================================================================
// JCS Serialization (RFC 8785)
//==============================================================================

function jcsNumber(value: number): string {
	if (!Number.isFinite(value)) {
		throw new Error(`JCS: non-finite number ${value} cannot be serialized`);
	}
	if (Object.is(value, -0)) return "0";
	return JSON.stringify(value);
}

function isRecord(val: unknown): val is Record<string, unknown> {
	return val !== null && typeof val === "object" && !Array.isArray(val);
}

/** Keys sorted by UTF-16 code unit comparison; undefined members dropped */
function jcsObject(obj: Record<string, unknown>): string {
	const entries: string[] = [];
	for (const key of Object.keys(obj).sort()) {
		const val = obj[key];
		if (val === undefined) continue;
		entries.push(JSON.stringify(key) + ":" + jcsSerialize(val));
	}
	return "{" + entries.join(",") + "}";
}

function jcsSerialize(value: unknown): string {
	if (value === null || value === undefined) return "null";
	if (typeof value === "boolean") return value ? "true" : "false";
	if (typeof value === "number") return jcsNumber(value);
	if (typeof value === "bigint") return JSON.stringify(value.toString());
	if (typeof value === "string") return JSON.stringify(value);
	if (Array.isArray(value)) return "[" + value.map(jcsSerialize).join(",") + "]";
	if (isRecord(value)) return jcsObject(value);
	throw new Error(`JCS: unsupported type ${typeof value}`);
}

//==============================================================================
// Public API
//==============================================================================

/**
 * Canonical JSON of a model, function or graph: deterministic, suitable
 * for hashing or comparison.
 */
export function canonicalize(value: object): string {
	return jcsSerialize(value);
}

/**
 * Indented JSON for humans, with the same value mapping as
 * {@link canonicalize} but the producer's key order.
 */
export function toJson(value: object, indent = 2): string {
	return JSON.stringify(
		value,
		(_key, val: unknown) => (typeof val === "bigint" ? val.toString() : val),
		indent,
	);
}

/**
 * Content digest of a model or function, in the format
 * `graphscript-{algorithm}:{hex}`.
 */
export function modelDigest(value: object, algorithm = "sha256"): string {
	const hash: Hash = createHash(algorithm);
	hash.update(canonicalize(value), "utf8");
	return `graphscript-${algorithm}:${hash.digest("hex")}`;
}
