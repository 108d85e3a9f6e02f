/**
 * A safe initial value is 1: every desired-property version the hub has
 * issued after creating the twin is newer, so the first reconciliation
 * processes all outstanding requests.
 */
export const INITIAL_DESIRED_PROPERTY_VERSION = 1;

/**
 * High-water mark of the desired-property versions applied locally.
 * Never moves backwards.
 */
export class TwinVersionWatermark {
	private version: number;

	constructor(initial: number = INITIAL_DESIRED_PROPERTY_VERSION) {
		this.version = initial;
	}

	get current(): number {
		return this.version;
	}

	/**
	 * True if the hub holds a version not yet applied here.
	 */
	isBehind(serverVersion: number): boolean {
		return serverVersion > this.version;
	}

	/**
	 * Claim `version` for application. Check and update happen in the same
	 * synchronous step, so two concurrent callers can never both claim it.
	 * @returns false if the version is not newer than the mark
	 */
	tryAdvance(version: number): boolean {
		if (version <= this.version) {
			return false;
		}
		this.version = version;
		return true;
	}
}
