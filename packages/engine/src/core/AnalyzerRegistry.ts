import { AnalyzerDescriptor, RegisteredAnalyzer, Runnable } from '../types';
import { OrchestratorError } from './OrchestratorError';

/**
 * Error thrown when attempting to register an analyzer ID twice.
 */
export class DuplicateIdError extends OrchestratorError {
	constructor(public readonly id: string) {
		super('DUPLICATE_ID', `Analyzer '${id}' is already registered`);
		this.name = 'DuplicateIdError';
	}
}

/**
 * Error thrown when one or more requested analyzer IDs are not registered.
 */
export class UnknownIdError extends OrchestratorError {
	constructor(public readonly ids: string[]) {
		super('UNKNOWN_ID', `Unknown analyzer IDs: ${ids.join(', ')}`);
		this.name = 'UnknownIdError';
	}
}

/**
 * Catalog of analyzers and their run functions.
 * Built once at startup and passed by reference to the planner and engine.
 * Iteration order is registration order, which the planner uses as its tie-break.
 */
export class AnalyzerRegistry {
	private analyzers: Map<string, RegisteredAnalyzer> = new Map();

	/**
	 * Register an analyzer.
	 * @throws DuplicateIdError if the ID is already registered
	 */
	register(descriptor: AnalyzerDescriptor, runnable: Runnable): void {
		if (this.analyzers.has(descriptor.id)) {
			throw new DuplicateIdError(descriptor.id);
		}
		this.analyzers.set(descriptor.id, {
			descriptor: { ...descriptor, dependencies: [...descriptor.dependencies] },
			runnable,
		});
	}

	/**
	 * Register several analyzers at once, stopping at the first duplicate.
	 */
	registerMany(entries: RegisteredAnalyzer[]): void {
		for (const entry of entries) {
			this.register(entry.descriptor, entry.runnable);
		}
	}

	/**
	 * Resolve analyzer IDs to their descriptors, in the order requested.
	 * @throws UnknownIdError naming every ID that is not registered
	 */
	resolve(ids: readonly string[]): AnalyzerDescriptor[] {
		const missing = ids.filter((id) => !this.analyzers.has(id));
		if (missing.length > 0) {
			throw new UnknownIdError(missing);
		}
		return ids.map((id) => this.getRequired(id).descriptor);
	}

	get(id: string): RegisteredAnalyzer | undefined {
		return this.analyzers.get(id);
	}

	/**
	 * Get a registered analyzer, throwing if it does not exist.
	 * @throws UnknownIdError if the analyzer is not registered
	 */
	getRequired(id: string): RegisteredAnalyzer {
		const entry = this.analyzers.get(id);
		if (!entry) {
			throw new UnknownIdError([id]);
		}
		return entry;
	}

	has(id: string): boolean {
		return this.analyzers.has(id);
	}

	/**
	 * Get every descriptor in registration order.
	 */
	getAllDescriptors(): AnalyzerDescriptor[] {
		return Array.from(this.analyzers.values()).map((entry) => entry.descriptor);
	}

	getIds(): string[] {
		return Array.from(this.analyzers.keys());
	}

	size(): number {
		return this.analyzers.size;
	}

	isEmpty(): boolean {
		return this.analyzers.size === 0;
	}

	toString(): string {
		return `AnalyzerRegistry(${this.size()} analyzers: [${this.getIds().join(', ')}])`;
	}
}
