import { JobStatistics } from '../types';

export type RunOutcome = 'succeeded' | 'failed' | 'cancelled';

/**
 * Tracks timing and outcome counts while a job's waves execute.
 */
export class JobStatisticsCollector {
	private startTime: number = 0;
	private analyzerDurations: Map<string, number> = new Map();
	private analyzersExecuted: number = 0;
	private cacheHits: number = 0;
	private failures: number = 0;
	private skipped: number = 0;
	private waves: number = 0;
	private inFlight: number = 0;
	private peakConcurrency: number = 0;

	constructor(private readonly now: () => number = Date.now) {}

	startExecution(): void {
		this.reset();
		this.startTime = this.now();
	}

	/**
	 * Stop timing and return the final statistics.
	 */
	stopExecution(): JobStatistics {
		return this.snapshot(this.now() - this.startTime);
	}

	recordWave(): void {
		this.waves++;
	}

	/**
	 * Mark the start of an analyzer run; updates the peak concurrency.
	 */
	recordRunStarted(): void {
		this.inFlight++;
		this.peakConcurrency = Math.max(this.peakConcurrency, this.inFlight);
	}

	/**
	 * Mark the end of an analyzer run. A cancelled run counts as skipped.
	 */
	recordRunFinished(analyzerId: string, durationMs: number, outcome: RunOutcome): void {
		this.inFlight--;
		this.analyzerDurations.set(analyzerId, durationMs);
		switch (outcome) {
			case 'succeeded':
				this.analyzersExecuted++;
				break;
			case 'failed':
				this.failures++;
				break;
			case 'cancelled':
				this.skipped++;
				break;
		}
	}

	/**
	 * Count a failure for an analyzer that never started running.
	 */
	recordFailure(): void {
		this.failures++;
	}

	recordCacheHit(): void {
		this.cacheHits++;
	}

	recordSkipped(): void {
		this.skipped++;
	}

	/**
	 * Current statistics without stopping the timer.
	 */
	getCurrentStats(): JobStatistics {
		return this.snapshot(this.startTime === 0 ? 0 : this.now() - this.startTime);
	}

	/**
	 * The slowest analyzer run so far, or null if nothing ran.
	 */
	getSlowestAnalyzer(): { analyzerId: string; durationMs: number } | null {
		let slowest: { analyzerId: string; durationMs: number } | null = null;
		for (const [analyzerId, durationMs] of this.analyzerDurations) {
			if (!slowest || durationMs > slowest.durationMs) {
				slowest = { analyzerId, durationMs };
			}
		}
		return slowest;
	}

	reset(): void {
		this.startTime = 0;
		this.analyzerDurations.clear();
		this.analyzersExecuted = 0;
		this.cacheHits = 0;
		this.failures = 0;
		this.skipped = 0;
		this.waves = 0;
		this.inFlight = 0;
		this.peakConcurrency = 0;
	}

	private snapshot(totalDurationMs: number): JobStatistics {
		return {
			analyzersExecuted: this.analyzersExecuted,
			cacheHits: this.cacheHits,
			failures: this.failures,
			skipped: this.skipped,
			waves: this.waves,
			peakConcurrency: this.peakConcurrency,
			analyzerDurations: Object.fromEntries(this.analyzerDurations),
			totalDurationMs,
		};
	}
}
