/**
 * Base class for every error raised by the orchestration core.
 * `code` is stable and meant for callers that branch on the failure kind.
 */
export class OrchestratorError extends Error {
	constructor(
		public readonly code: string,
		message: string,
		public readonly cause?: Error,
	) {
		super(message);
		this.name = 'OrchestratorError';
	}
}

/**
 * Error thrown when a job or artifact does not exist.
 */
export class NotFoundError extends OrchestratorError {
	constructor(kind: 'job' | 'artifact' | 'analyzer', key: string) {
		super('NOT_FOUND', `No ${kind} found for '${key}'`);
		this.name = 'NotFoundError';
	}
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}
