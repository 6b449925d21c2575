import { AnalyzerRegistry } from './AnalyzerRegistry';
import { DependencyGraph } from './DependencyGraph';
import { OrchestratorError } from './OrchestratorError';

/**
 * Error thrown when execution planning fails.
 */
export class ExecutionPlanningError extends OrchestratorError {
	constructor(code: string, message: string, cause?: Error) {
		super(code, message, cause);
		this.name = 'ExecutionPlanningError';
	}
}

/**
 * Error thrown when the requested analyzers depend on each other in a cycle.
 * `ids` lists the analyzers on the cycle in dependency order.
 */
export class CycleDetectedError extends ExecutionPlanningError {
	constructor(public readonly ids: string[]) {
		super('CYCLE_DETECTED', `Circular dependency detected: ${[...ids, ids[0]].join(' -> ')}`);
		this.name = 'CycleDetectedError';
	}
}

/**
 * Error thrown when an analyzer declares a dependency that is not registered.
 */
export class UnknownDependencyError extends ExecutionPlanningError {
	constructor(
		public readonly id: string,
		public readonly missing: string,
	) {
		super('UNKNOWN_DEPENDENCY', `Analyzer '${id}' depends on unregistered analyzer '${missing}'`);
		this.name = 'UnknownDependencyError';
	}
}

/**
 * Waves of analyzers for one scan. Every analyzer of the transitive closure of
 * `requested` appears in exactly one wave, after all of its dependencies.
 */
export interface ExecutionPlan {
	/**
	 * The analyzers the caller asked for, deduplicated, in request order.
	 */
	readonly requested: readonly string[];

	/**
	 * Sets of analyzers runnable in parallel, in execution order.
	 */
	readonly waves: readonly (readonly string[])[];

	/**
	 * All planned analyzers flattened wave by wave.
	 */
	readonly order: readonly string[];

	/**
	 * Size of the widest wave.
	 */
	readonly maxConcurrency: number;
}

/**
 * Turns a requested analyzer set into an execution plan.
 */
export class ExecutionPlanner {
	constructor(private readonly registry: AnalyzerRegistry) {}

	/**
	 * Create an execution plan for the requested analyzers.
	 * @param requested Analyzer IDs the caller asked for; their dependencies are pulled in
	 * @throws UnknownIdError if a requested ID is not registered
	 * @throws UnknownDependencyError if a dependency in the closure is not registered
	 * @throws CycleDetectedError if the closure contains a cycle
	 */
	plan(requested: readonly string[]): ExecutionPlan {
		const unique = Array.from(new Set(requested));
		this.registry.resolve(unique);

		const graph = this.buildDependencyGraph();

		const [missing] = graph.findMissingDependencies(unique);
		if (missing) {
			throw new UnknownDependencyError(missing.id, missing.missing);
		}

		const closure = graph.closure(unique);
		const { layers, unplaced } = graph.layers(closure);
		if (unplaced.length > 0) {
			throw new CycleDetectedError(graph.findCycle(unplaced));
		}

		return {
			requested: unique,
			waves: layers,
			order: layers.flat(),
			maxConcurrency: layers.reduce((max, wave) => Math.max(max, wave.length), 0),
		};
	}

	/**
	 * Check the whole registry for cycles and unknown dependencies.
	 * @returns Human-readable problems, empty when every analyzer can be planned
	 */
	validateRegistry(): string[] {
		const graph = this.buildDependencyGraph();
		const issues = graph
			.findMissingDependencies(this.registry.getIds())
			.map(({ id, missing }) => `Analyzer '${id}' depends on unregistered analyzer '${missing}'`);

		const cycle = graph.detectCycle();
		if (cycle.length > 0) {
			issues.push(`Circular dependency detected: ${[...cycle, cycle[0]].join(' -> ')}`);
		}
		return issues;
	}

	private buildDependencyGraph(): DependencyGraph {
		const graph = new DependencyGraph();
		for (const descriptor of this.registry.getAllDescriptors()) {
			graph.addAnalyzer(descriptor);
		}
		graph.buildGraph();
		return graph;
	}
}
