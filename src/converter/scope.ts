// Scope stack
// One frame per function or control-flow body being translated, each
// owning the graph its statements are emitted into

import type { IRFunction } from "../ir/builder.js";
import type { ScopeValue } from "../values.js";

export interface ScopeFrame {
	readonly name: string;
	readonly fn: IRFunction;
	readonly bindings: Map<string, ScopeValue>;
}

/**
 * Frames are pushed and popped strictly LIFO. Index 0 is the innermost
 * frame; lookups walk outwards from it.
 */
export class ScopeStack {
	private readonly frames: ScopeFrame[] = [];

	get depth(): number {
		return this.frames.length;
	}

	push(name: string, fn: IRFunction): ScopeFrame {
		const frame: ScopeFrame = { name, fn, bindings: new Map() };
		this.frames.unshift(frame);
		return frame;
	}

	pop(): ScopeFrame {
		const frame = this.frames.shift();
		if (frame === undefined) throw new Error("Scope stack underflow");
		return frame;
	}

	current(): ScopeFrame {
		const frame = this.frames[0];
		if (frame === undefined) throw new Error("No scope has been entered");
		return frame;
	}

	bind(name: string, value: ScopeValue): void {
		this.current().bindings.set(name, value);
	}

	/** Innermost binding of `name`, searching every frame */
	lookup(name: string): ScopeValue | undefined {
		for (const frame of this.frames) {
			const value = frame.bindings.get(name);
			if (value !== undefined) return value;
		}
		return undefined;
	}

	/** Binding of `name` in the innermost frame only */
	lookupLocal(name: string): ScopeValue | undefined {
		return this.current().bindings.get(name);
	}

	/** Binding of `name` in any frame enclosing the innermost one */
	lookupOuter(name: string): ScopeValue | undefined {
		for (const frame of this.frames.slice(1)) {
			const value = frame.bindings.get(name);
			if (value !== undefined) return value;
		}
		return undefined;
	}

	clear(): void {
		this.frames.length = 0;
	}
}
