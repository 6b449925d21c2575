/**
 * Counting semaphore with FIFO hand-off.
 */
export class Semaphore {
	private available: number;
	private readonly waiters: Array<() => void> = [];

	constructor(private readonly permits: number) {
		if (!Number.isInteger(permits) || permits < 1) {
			throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`);
		}
		this.available = permits;
	}

	/**
	 * Wait for a permit.
	 * @returns A release function; calling it more than once has no further effect
	 */
	async acquire(): Promise<() => void> {
		if (this.available > 0) {
			this.available--;
		} else {
			await new Promise<void>((resolve) => this.waiters.push(resolve));
		}

		let released = false;
		return () => {
			if (released) {
				return;
			}
			released = true;
			const next = this.waiters.shift();
			if (next) {
				// The permit passes straight to the next waiter.
				next();
			} else {
				this.available++;
			}
		};
	}

	inUse(): number {
		return this.permits - this.available;
	}

	waiting(): number {
		return this.waiters.length;
	}
}
