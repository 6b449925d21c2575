import { AnalyzerState, AnalyzerStatus, JobSnapshot, JobStatistics, JobStatus, ScanOptions } from '../types';
import { ExecutionPlan } from './ExecutionPlanner';
import { OrchestratorError } from './OrchestratorError';

/**
 * Error thrown when a job that already reached a terminal status is mutated or cancelled.
 */
export class AlreadyTerminalError extends OrchestratorError {
	constructor(
		public readonly jobId: string,
		public readonly status: JobStatus,
	) {
		super('ALREADY_TERMINAL', `Job '${jobId}' already finished with status '${status}'`);
		this.name = 'AlreadyTerminalError';
	}
}

const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set(['done', 'error', 'cancelled']);
const TERMINAL_ANALYZER_STATUSES: ReadonlySet<AnalyzerStatus> = new Set(['done', 'failed', 'skipped']);

export function isTerminalJobStatus(status: JobStatus): boolean {
	return TERMINAL_JOB_STATUSES.has(status);
}

export function isTerminalAnalyzerStatus(status: AnalyzerStatus): boolean {
	return TERMINAL_ANALYZER_STATUSES.has(status);
}

export interface JobInit {
	readonly id: string;
	readonly target: string;
	readonly plan: ExecutionPlan;
	readonly options?: ScanOptions;
	readonly createdAt: number;
}

/**
 * One orchestrated execution of a plan against one target.
 *
 * Only the execution engine and the cancellation path mutate a job; everyone
 * else reads it through snapshot(). Once the status is terminal nothing changes.
 */
export class Job {
	readonly id: string;
	readonly target: string;
	readonly plan: ExecutionPlan;
	readonly options: ScanOptions;
	readonly createdAt: number;

	private status: JobStatus = 'queued';
	private readonly analyzers: Map<string, AnalyzerState> = new Map();
	private startedAt?: number;
	private finishedAt?: number;
	private error?: string;
	private statistics?: JobStatistics;
	private readonly abortController = new AbortController();
	private readonly finishWaiters: Array<(snapshot: JobSnapshot) => void> = [];

	constructor(init: JobInit) {
		this.id = init.id;
		this.target = init.target;
		this.plan = init.plan;
		this.options = { ...init.options };
		this.createdAt = init.createdAt;
		for (const analyzerId of init.plan.order) {
			this.analyzers.set(analyzerId, { status: 'pending' });
		}
	}

	/**
	 * Aborted once cancellation has been requested.
	 */
	get signal(): AbortSignal {
		return this.abortController.signal;
	}

	get requestedAnalyzers(): readonly string[] {
		return this.plan.requested;
	}

	getStatus(): JobStatus {
		return this.status;
	}

	getFinishedAt(): number | undefined {
		return this.finishedAt;
	}

	isTerminal(): boolean {
		return isTerminalJobStatus(this.status);
	}

	isCancellationRequested(): boolean {
		return this.abortController.signal.aborted;
	}

	getAnalyzerState(analyzerId: string): AnalyzerState | undefined {
		return this.analyzers.get(analyzerId);
	}

	/**
	 * Transition queued → running.
	 */
	markRunning(now: number): void {
		this.assertMutable();
		this.status = 'running';
		this.startedAt = now;
	}

	/**
	 * Record a per-analyzer transition.
	 * @throws AlreadyTerminalError once the job has finished
	 */
	setAnalyzerState(analyzerId: string, state: AnalyzerState): void {
		this.assertMutable();
		this.analyzers.set(analyzerId, state);
	}

	setStatistics(statistics: JobStatistics): void {
		this.assertMutable();
		this.statistics = statistics;
	}

	/**
	 * Move the job to a terminal status and notify waiters.
	 */
	finish(status: 'done' | 'error' | 'cancelled', now: number, error?: string): void {
		this.assertMutable();
		this.status = status;
		this.finishedAt = now;
		this.error = error;

		const snapshot = this.snapshot();
		for (const resolve of this.finishWaiters.splice(0)) {
			resolve(snapshot);
		}
	}

	/**
	 * Request cancellation. The engine observes the signal and unwinds.
	 * @throws AlreadyTerminalError if the job already finished
	 */
	requestCancel(): void {
		this.assertMutable();
		if (!this.abortController.signal.aborted) {
			this.abortController.abort();
		}
	}

	/**
	 * Resolve with the terminal snapshot once the job finishes.
	 */
	whenFinished(): Promise<JobSnapshot> {
		if (this.isTerminal()) {
			return Promise.resolve(this.snapshot());
		}
		return new Promise((resolve) => this.finishWaiters.push(resolve));
	}

	/**
	 * Copy of the job's current state. Never shares mutable structures with the job.
	 */
	snapshot(): JobSnapshot {
		return {
			id: this.id,
			target: this.target,
			requestedAnalyzers: [...this.plan.requested],
			waves: this.plan.waves.map((wave) => [...wave]),
			status: this.status,
			analyzers: Object.fromEntries(Array.from(this.analyzers, ([id, state]) => [id, { ...state }])),
			options: { ...this.options },
			createdAt: this.createdAt,
			startedAt: this.startedAt,
			finishedAt: this.finishedAt,
			error: this.error,
			statistics: this.statistics && {
				...this.statistics,
				analyzerDurations: { ...this.statistics.analyzerDurations },
			},
		};
	}

	private assertMutable(): void {
		if (this.isTerminal()) {
			throw new AlreadyTerminalError(this.id, this.status);
		}
	}
}
