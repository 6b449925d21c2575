/**
 * JSON value produced by an analyzer and persisted inside an artifact.
 */
export type ArtifactPayload = string | number | boolean | null | ArtifactPayload[] | { [key: string]: ArtifactPayload };

/**
 * Outcome recorded on an artifact. Artifacts written by the engine are always 'ok';
 * 'error' artifacts can come from stores populated by external tooling.
 */
export type ArtifactStatus = 'ok' | 'error';

/**
 * The stored output of one analyzer run for one target.
 * Immutable once written: a re-run replaces the artifact for its key.
 */
export interface Artifact {
	readonly analyzerId: string;
	readonly target: string;

	/**
	 * Epoch milliseconds at which the artifact was written.
	 */
	readonly producedAt: number;

	readonly payload: ArtifactPayload;
	readonly status: ArtifactStatus;
}

/**
 * Read access to the artifacts of an analyzer's dependencies.
 */
export interface ArtifactSet {
	/**
	 * Get the artifact produced by a dependency.
	 * @param analyzerId The dependency's analyzer ID
	 * @returns The artifact if available, undefined otherwise
	 */
	accessor(analyzerId: string): Artifact | undefined;

	/**
	 * Check if the set contains an artifact for the given analyzer.
	 */
	contains(analyzerId: string): boolean;

	size(): number;

	isEmpty(): boolean;
}

/**
 * Everything an analyzer run receives from the engine.
 */
export interface AnalyzerRunContext {
	/**
	 * The thing being scanned, e.g. "owner/repo". Opaque to the core.
	 */
	readonly target: string;

	/**
	 * Aborted when the job is cancelled or the analyzer's timeout elapses.
	 * Runs must stop promptly once it fires.
	 */
	readonly signal: AbortSignal;

	/**
	 * Artifacts of the analyzer's declared dependencies.
	 */
	readonly dependencies: ArtifactSet;
}

/**
 * Capability interface the engine dispatches to. One implementation per analyzer.
 */
export interface Runnable {
	run(context: AnalyzerRunContext): Promise<ArtifactPayload>;
}

/**
 * Static description of an analyzer used for planning and cache decisions.
 */
export interface AnalyzerDescriptor {
	/**
	 * Unique analyzer identifier, e.g. "package-sbom".
	 */
	readonly id: string;

	/**
	 * IDs of analyzers that must reach a terminal state before this one runs.
	 */
	readonly dependencies: readonly string[];

	/**
	 * How long an artifact stays fresh, in milliseconds.
	 */
	readonly defaultTtlMs: number;

	/**
	 * Per-run timeout in milliseconds. Falls back to the configured default.
	 */
	readonly timeoutMs?: number;

	readonly description?: string;
}

/**
 * A descriptor together with its run function, as held by the registry.
 */
export interface RegisteredAnalyzer {
	readonly descriptor: AnalyzerDescriptor;
	readonly runnable: Runnable;
}

/**
 * Staleness of an artifact relative to its TTL.
 */
export type FreshnessLevel = 'fresh' | 'stale' | 'very-stale' | 'expired';

/**
 * Cache decision for one (target, analyzer) pair.
 * - hit: reuse the stored artifact
 * - miss: no usable artifact, or a re-run was forced
 * - stale: an artifact exists but is past its TTL
 */
export type CacheDecision = 'hit' | 'miss' | 'stale';

export type JobStatus = 'queued' | 'running' | 'done' | 'error' | 'cancelled';

export type AnalyzerStatus = 'pending' | 'running' | 'done' | 'failed' | 'skipped';

/**
 * Per-analyzer state inside a job.
 */
export interface AnalyzerState {
	readonly status: AnalyzerStatus;

	/**
	 * Why the analyzer was skipped, e.g. "dependency failed: package-sbom".
	 */
	readonly reason?: string;

	/**
	 * Error message of a failed run.
	 */
	readonly error?: string;

	/**
	 * True when the analyzer completed from a cached artifact without running.
	 */
	readonly cached?: boolean;

	readonly durationMs?: number;
}

/**
 * Options a caller can attach to a scan request.
 */
export interface ScanOptions {
	/**
	 * Ignore cached artifacts and re-run every analyzer.
	 */
	readonly force?: boolean;

	/**
	 * Accept stale (but not very stale or expired) artifacts without re-running.
	 */
	readonly bestEffort?: boolean;

	/**
	 * TTL in milliseconds applied to every analyzer instead of its own.
	 */
	readonly ttlOverrideMs?: number;
}

/**
 * Statistics collected while a job executes.
 */
export interface JobStatistics {
	readonly analyzersExecuted: number;
	readonly cacheHits: number;
	readonly failures: number;
	readonly skipped: number;
	readonly waves: number;

	/**
	 * Highest number of analyzer runs observed in flight at once.
	 */
	readonly peakConcurrency: number;

	readonly analyzerDurations: Record<string, number>;
	readonly totalDurationMs: number;
}

/**
 * Immutable copy of a job handed to readers.
 */
export interface JobSnapshot {
	readonly id: string;
	readonly target: string;
	readonly requestedAnalyzers: readonly string[];
	readonly waves: readonly (readonly string[])[];
	readonly status: JobStatus;
	readonly analyzers: Readonly<Record<string, AnalyzerState>>;
	readonly options: ScanOptions;
	readonly createdAt: number;
	readonly startedAt?: number;
	readonly finishedAt?: number;
	readonly error?: string;
	readonly statistics?: JobStatistics;
}
