import { AnalyzerDescriptor, AnalyzerRunContext, ArtifactPayload, Runnable } from '../src/types';

export const HOUR_MS = 60 * 60 * 1000;

export interface Deferred<T> {
	promise: Promise<T>;
	resolve(value: T): void;
	reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => undefined;
	let reject: (error: unknown) => void = () => undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Let pending promise chains run to completion.
 */
export async function flush(rounds: number = 5): Promise<void> {
	for (let i = 0; i < rounds; i++) {
		await new Promise((resolve) => setImmediate(resolve));
	}
}

/**
 * Manually advanced clock for injecting as `now`.
 */
export class FakeClock {
	constructor(public current: number = Date.UTC(2024, 0, 1)) {}

	readonly now = (): number => this.current;

	advance(ms: number): void {
		this.current += ms;
	}
}

export function descriptor(id: string, dependencies: string[] = [], overrides: Partial<AnalyzerDescriptor> = {}): AnalyzerDescriptor {
	return { id, dependencies, defaultTtlMs: HOUR_MS, ...overrides };
}

/**
 * Runnable that records every call and delegates to a behavior function.
 */
export class TestRunnable implements Runnable {
	readonly calls: AnalyzerRunContext[] = [];

	constructor(private readonly behavior: (context: AnalyzerRunContext) => Promise<ArtifactPayload> = async () => ({ ok: true })) {}

	async run(context: AnalyzerRunContext): Promise<ArtifactPayload> {
		this.calls.push(context);
		return this.behavior(context);
	}
}

/**
 * Tracks how many wrapped runs are in flight at once.
 */
export class ConcurrencyProbe {
	active = 0;
	peak = 0;
	readonly events: string[] = [];

	runnable(id: string, durationMs: number, payload: ArtifactPayload = { id }): TestRunnable {
		return new TestRunnable(async () => {
			this.active++;
			this.peak = Math.max(this.peak, this.active);
			this.events.push(`start:${id}`);
			await sleep(durationMs);
			this.events.push(`end:${id}`);
			this.active--;
			return payload;
		});
	}
}

/**
 * Runnable that blocks until released, or rejects once its signal aborts.
 */
export function gatedRunnable(gate: Promise<ArtifactPayload>): TestRunnable {
	return new TestRunnable(
		(context) =>
			new Promise<ArtifactPayload>((resolve, reject) => {
				context.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
				gate.then(resolve, reject);
			}),
	);
}

/**
 * Run `fn` and return what it threw, or undefined if it returned normally.
 */
export function captureError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (error) {
		return error;
	}
	return undefined;
}
