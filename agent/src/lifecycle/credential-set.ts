/**
 * Ordered candidate credentials (e.g. primary then secondary key).
 *
 * The head is the credential in use. A credential rejected by the hub is
 * discarded and never tried again.
 */
export class CredentialSet<T> {
	private readonly candidates: T[];

	constructor(candidates: readonly T[]) {
		if (candidates.length === 0) {
			throw new RangeError('At least one credential must be provided');
		}
		this.candidates = [...candidates];
	}

	current(): T | undefined {
		return this.candidates[0];
	}

	/**
	 * Drop the head credential.
	 * @returns the credential now at the head, if any remain
	 */
	discardCurrent(): T | undefined {
		this.candidates.shift();
		return this.candidates[0];
	}

	hasAny(): boolean {
		return this.candidates.length > 0;
	}

	get size(): number {
		return this.candidates.length;
	}
}
