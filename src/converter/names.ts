// Unique value names
// Every value name emitted during one function translation is distinct

export class UniqueNameGenerator {
	private readonly used = new Set<string>();
	private counter = 0;

	/**
	 * Return `candidate` if unused, otherwise `candidate_<n>` for the next
	 * free counter value. The counter is shared by all candidates and never
	 * moves backwards.
	 */
	generate(candidate = "tmp"): string {
		let name = candidate;
		while (this.used.has(name)) {
			name = `${candidate}_${this.counter}`;
			this.counter++;
		}
		this.used.add(name);
		return name;
	}

	/** Mark a name as taken without generating it */
	reserve(name: string): void {
		this.used.add(name);
	}

	has(name: string): boolean {
		return this.used.has(name);
	}

	reset(): void {
		this.used.clear();
		this.counter = 0;
	}
}
