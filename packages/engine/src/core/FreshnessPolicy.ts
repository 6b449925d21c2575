import { FreshnessLevel } from '../types';

/**
 * Age bands as multiples of an analyzer's TTL.
 * Fresh up to 1×TTL, stale up to `staleMultiplier`×TTL, very stale up to
 * `veryStaleMultiplier`×TTL, expired beyond.
 */
export interface FreshnessThresholds {
	readonly staleMultiplier: number;
	readonly veryStaleMultiplier: number;
}

export const DEFAULT_FRESHNESS_THRESHOLDS: FreshnessThresholds = {
	staleMultiplier: 7,
	veryStaleMultiplier: 30,
};

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Classifies artifact age against TTLs.
 */
export class FreshnessPolicy {
	constructor(private readonly thresholds: FreshnessThresholds = DEFAULT_FRESHNESS_THRESHOLDS) {}

	/**
	 * @param ageMs Time since the artifact was produced; negative ages (clock skew) count as fresh
	 */
	classify(ageMs: number, ttlMs: number): FreshnessLevel {
		if (ageMs <= ttlMs) {
			return 'fresh';
		}
		if (ageMs <= ttlMs * this.thresholds.staleMultiplier) {
			return 'stale';
		}
		if (ageMs <= ttlMs * this.thresholds.veryStaleMultiplier) {
			return 'very-stale';
		}
		return 'expired';
	}

	/**
	 * Whether an artifact at this level must be re-run.
	 * Best-effort mode tolerates 'stale' but nothing older.
	 */
	needsRefresh(level: FreshnessLevel, bestEffort: boolean = false): boolean {
		if (level === 'fresh') {
			return false;
		}
		return !(bestEffort && level === 'stale');
	}

	getThresholds(): FreshnessThresholds {
		return this.thresholds;
	}
}

/**
 * Human-readable age, e.g. "3 hours ago".
 */
export function describeAge(ageMs: number): string {
	const hours = Math.floor(ageMs / HOUR_MS);
	if (hours < 1) {
		return 'less than an hour ago';
	}
	if (hours < 24) {
		return `${pluralize(hours, 'hour')} ago`;
	}

	const days = Math.floor(ageMs / DAY_MS);
	if (days < 7) {
		return `${pluralize(days, 'day')} ago`;
	}

	const weeks = Math.floor(days / 7);
	if (weeks < 4) {
		return `${pluralize(weeks, 'week')} ago`;
	}
	return `${pluralize(Math.max(1, Math.floor(days / 30)), 'month')} ago`;
}

function pluralize(count: number, singular: string): string {
	return count === 1 ? `1 ${singular}` : `${count} ${singular}s`;
}
