import { OrchestratorError } from './OrchestratorError';

/**
 * Error recorded when an analyzer run exceeds its timeout.
 */
export class AnalyzerTimeoutError extends OrchestratorError {
	constructor(
		public readonly analyzerId: string,
		public readonly timeoutMs: number,
	) {
		super('ANALYZER_TIMEOUT', `Analyzer '${analyzerId}' timed out after ${timeoutMs}ms`);
		this.name = 'AnalyzerTimeoutError';
	}
}

/**
 * Error recorded when an analyzer run is interrupted by job cancellation.
 */
export class AnalyzerCancelledError extends OrchestratorError {
	constructor(public readonly analyzerId: string) {
		super('ANALYZER_CANCELLED', `Analyzer '${analyzerId}' was cancelled`);
		this.name = 'AnalyzerCancelledError';
	}
}

/**
 * Run `task` under a child signal of `parent` with its own timeout.
 *
 * Parent cancellation aborts the child signal and waits for the task to settle.
 * A timeout aborts the child signal and rejects right away with AnalyzerTimeoutError,
 * so a task that ignores its signal cannot hold up the caller. Sibling runs are unaffected
 * either way.
 */
export async function runWithDeadline<T>(
	parent: AbortSignal,
	analyzerId: string,
	timeoutMs: number,
	task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
	const controller = new AbortController();
	const onParentAbort = () => controller.abort(new AnalyzerCancelledError(analyzerId));
	if (parent.aborted) {
		onParentAbort();
	} else {
		parent.addEventListener('abort', onParentAbort, { once: true });
	}

	let timer: NodeJS.Timeout | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			const error = new AnalyzerTimeoutError(analyzerId, timeoutMs);
			controller.abort(error);
			reject(error);
		}, timeoutMs);
	});

	try {
		return await Promise.race([task(controller.signal), deadline]);
	} catch (error) {
		if (controller.signal.aborted && controller.signal.reason instanceof OrchestratorError) {
			throw controller.signal.reason;
		}
		throw error;
	} finally {
		clearTimeout(timer);
		parent.removeEventListener('abort', onParentAbort);
	}
}
