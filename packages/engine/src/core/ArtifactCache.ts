import { Artifact, ArtifactPayload, CacheDecision, FreshnessLevel, ScanOptions } from '../types';
import { ArtifactStore } from '../stores/ArtifactStore';
import { MemoryArtifactStore } from '../stores/MemoryArtifactStore';
import { DEFAULT_FRESHNESS_THRESHOLDS, FreshnessPolicy, FreshnessThresholds } from './FreshnessPolicy';
import { OrchestratorError } from './OrchestratorError';

/**
 * Error thrown when a second run of the same analyzer for the same target is
 * attempted while the first is still in flight.
 */
export class ConflictingRunError extends OrchestratorError {
	constructor(
		public readonly target: string,
		public readonly analyzerIds: string[],
	) {
		super('CONFLICTING_RUN', `Analyzers already running for '${target}': ${analyzerIds.join(', ')}`);
		this.name = 'ConflictingRunError';
	}
}

export interface ArtifactLookup {
	readonly artifact: Artifact;
	readonly level: FreshnessLevel;
}

/**
 * Outcome of a cache check. `usable` is set when the engine may skip the run.
 */
export interface CacheCheck {
	readonly decision: CacheDecision;
	readonly level?: FreshnessLevel;
	readonly usable?: Artifact;
}

/**
 * Exclusive right to run one analyzer for one target.
 */
export interface RunLease {
	release(): void;
}

export interface ArtifactCacheOptions {
	store?: ArtifactStore;

	/**
	 * TTL of an analyzer in milliseconds. Analyzers it does not know fall back to `defaultTtlMs`.
	 */
	ttlFor?: (analyzerId: string) => number | undefined;

	defaultTtlMs?: number;
	thresholds?: FreshnessThresholds;
	now?: () => number;
}

const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Cache/freshness manager: decides whether a stored artifact can be reused and
 * persists new ones. Also guards against concurrent runs of the same key.
 */
export class ArtifactCache {
	private readonly backend: ArtifactStore;
	private readonly policy: FreshnessPolicy;
	private readonly ttlFor: (analyzerId: string) => number | undefined;
	private readonly defaultTtlMs: number;
	private readonly now: () => number;
	private readonly leases: Set<string> = new Set();

	constructor(options: ArtifactCacheOptions = {}) {
		this.backend = options.store ?? new MemoryArtifactStore();
		this.policy = new FreshnessPolicy(options.thresholds ?? DEFAULT_FRESHNESS_THRESHOLDS);
		this.ttlFor = options.ttlFor ?? (() => undefined);
		this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Look up the artifact for a key together with its freshness level.
	 * @param ttlOverrideMs TTL to judge freshness against instead of the analyzer's
	 */
	async lookup(target: string, analyzerId: string, ttlOverrideMs?: number): Promise<ArtifactLookup | undefined> {
		const artifact = await this.backend.read(target, analyzerId);
		if (!artifact) {
			return undefined;
		}
		return { artifact, level: this.levelOf(artifact, ttlOverrideMs) };
	}

	/**
	 * Write a new artifact, superseding any previous one for the key.
	 */
	async store(target: string, analyzerId: string, payload: ArtifactPayload): Promise<Artifact> {
		const artifact: Artifact = {
			analyzerId,
			target,
			producedAt: this.now(),
			payload,
			status: 'ok',
		};
		await this.backend.write(artifact);
		return artifact;
	}

	/**
	 * Remove one artifact, or every artifact of the target when no analyzer is given.
	 * @returns The number of artifacts removed
	 */
	async invalidate(target: string, analyzerId?: string): Promise<number> {
		if (analyzerId === undefined) {
			return this.backend.deleteTarget(target);
		}
		return (await this.backend.delete(target, analyzerId)) ? 1 : 0;
	}

	/**
	 * List a target's artifacts with their freshness.
	 */
	async list(target: string, ttlOverrideMs?: number): Promise<ArtifactLookup[]> {
		const artifacts = await this.backend.list(target);
		return artifacts.map((artifact) => ({ artifact, level: this.levelOf(artifact, ttlOverrideMs) }));
	}

	/**
	 * Decide whether an analyzer must run for a target.
	 * Error artifacts and forced scans are misses. A stale artifact is usable only in
	 * best-effort mode, and only at the 'stale' level.
	 */
	async check(target: string, analyzerId: string, options: ScanOptions = {}): Promise<CacheCheck> {
		if (options.force) {
			return { decision: 'miss' };
		}

		const found = await this.lookup(target, analyzerId, options.ttlOverrideMs);
		if (!found || found.artifact.status !== 'ok') {
			return { decision: 'miss' };
		}

		if (found.level === 'fresh') {
			return { decision: 'hit', level: found.level, usable: found.artifact };
		}

		const usable = this.policy.needsRefresh(found.level, options.bestEffort ?? false) ? undefined : found.artifact;
		return { decision: 'stale', level: found.level, usable };
	}

	/**
	 * Take the run lease for a key.
	 * @throws ConflictingRunError if the key is already leased
	 */
	acquire(target: string, analyzerId: string): RunLease {
		const key = this.leaseKey(target, analyzerId);
		if (this.leases.has(key)) {
			throw new ConflictingRunError(target, [analyzerId]);
		}
		this.leases.add(key);

		let released = false;
		return {
			release: () => {
				if (!released) {
					released = true;
					this.leases.delete(key);
				}
			},
		};
	}

	isRunning(target: string, analyzerId: string): boolean {
		return this.leases.has(this.leaseKey(target, analyzerId));
	}

	/**
	 * Effective TTL for an analyzer, ignoring any per-request override.
	 */
	ttlOf(analyzerId: string): number {
		return this.ttlFor(analyzerId) ?? this.defaultTtlMs;
	}

	private levelOf(artifact: Artifact, ttlOverrideMs?: number): FreshnessLevel {
		const ttl = ttlOverrideMs ?? this.ttlOf(artifact.analyzerId);
		return this.policy.classify(this.now() - artifact.producedAt, ttl);
	}

	private leaseKey(target: string, analyzerId: string): string {
		return JSON.stringify([target, analyzerId]);
	}
}
