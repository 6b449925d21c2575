import { OrchestratorError } from '../core/OrchestratorError';
import {
	AnalyzerDescriptor,
	AnalyzerRunContext,
	Artifact,
	ArtifactPayload,
	ArtifactSet,
	RegisteredAnalyzer,
	Runnable,
} from '../types';

/**
 * Error thrown when a dependency's artifact is missing from the run context.
 */
export class RequiredArtifactNotFoundError extends OrchestratorError {
	constructor(dependencyId: string, analyzerId: string) {
		super('REQUIRED_ARTIFACT_NOT_FOUND', `Required artifact of '${dependencyId}' not available to analyzer '${analyzerId}'`);
		this.name = 'RequiredArtifactNotFoundError';
	}
}

export interface AnalyzerOptions {
	timeoutMs?: number;
	description?: string;
}

/**
 * Abstract base class for analyzers that provides common functionality.
 * Subclasses implement analyze() and declare their id, dependencies and TTL.
 */
export abstract class AbstractAnalyzer implements Runnable {
	/**
	 * Unique analyzer ID.
	 */
	abstract readonly id: string;

	/**
	 * IDs of analyzers whose artifacts this one reads.
	 */
	abstract readonly dependencies: readonly string[];

	/**
	 * How long this analyzer's artifacts stay fresh, in milliseconds.
	 */
	abstract readonly defaultTtlMs: number;

	readonly timeoutMs?: number;
	readonly description?: string;

	constructor(options: AnalyzerOptions = {}) {
		this.timeoutMs = options.timeoutMs;
		this.description = options.description;
	}

	/**
	 * Produce the analyzer's payload.
	 * @param context Target, abort signal and dependency artifacts of this run
	 */
	protected abstract analyze(context: AnalyzerRunContext): Promise<ArtifactPayload>;

	/**
	 * Check that every declared dependency delivered an artifact, then analyze.
	 */
	async run(context: AnalyzerRunContext): Promise<ArtifactPayload> {
		this.validateDependencies(context.dependencies);
		return this.analyze(context);
	}

	/**
	 * Get a dependency's artifact.
	 * @throws RequiredArtifactNotFoundError if the artifact is not in the set
	 */
	protected require(artifacts: ArtifactSet, dependencyId: string): Artifact {
		const artifact = artifacts.accessor(dependencyId);
		if (!artifact) {
			throw new RequiredArtifactNotFoundError(dependencyId, this.id);
		}
		return artifact;
	}

	protected optional(artifacts: ArtifactSet, dependencyId: string): Artifact | undefined {
		return artifacts.accessor(dependencyId);
	}

	protected has(artifacts: ArtifactSet, dependencyId: string): boolean {
		return artifacts.contains(dependencyId);
	}

	/**
	 * @throws RequiredArtifactNotFoundError for the first declared dependency that is missing
	 */
	protected validateDependencies(artifacts: ArtifactSet): void {
		for (const dependencyId of this.dependencies) {
			if (!artifacts.contains(dependencyId)) {
				throw new RequiredArtifactNotFoundError(dependencyId, this.id);
			}
		}
	}

	/**
	 * Payloads of all declared dependencies that are present, keyed by analyzer ID.
	 */
	protected getDependencyPayloads(artifacts: ArtifactSet): Map<string, ArtifactPayload> {
		const result = new Map<string, ArtifactPayload>();
		for (const dependencyId of this.dependencies) {
			const artifact = artifacts.accessor(dependencyId);
			if (artifact) {
				result.set(dependencyId, artifact.payload);
			}
		}
		return result;
	}

	/**
	 * The descriptor the registry and planner work with.
	 */
	describe(): AnalyzerDescriptor {
		return {
			id: this.id,
			dependencies: [...this.dependencies],
			defaultTtlMs: this.defaultTtlMs,
			timeoutMs: this.timeoutMs,
			description: this.description,
		};
	}

	toRegistration(): RegisteredAnalyzer {
		return { descriptor: this.describe(), runnable: this };
	}

	toString(): string {
		return `${this.constructor.name}(id: ${this.id}, dependencies: [${this.dependencies.join(', ')}])`;
	}
}

/**
 * Base class for analyzers that depend on nothing and work from the target alone.
 */
export abstract class SourceAnalyzer extends AbstractAnalyzer {
	readonly dependencies: readonly string[] = [];
}

/**
 * Base class for analyzers that derive their payload from exactly one dependency.
 */
export abstract class TransformAnalyzer extends AbstractAnalyzer {
	/**
	 * The analyzer whose artifact is transformed.
	 */
	abstract readonly inputId: string;

	get dependencies(): readonly string[] {
		return [this.inputId];
	}

	/**
	 * Transform the dependency's payload into this analyzer's payload.
	 */
	protected abstract transform(input: ArtifactPayload, context: AnalyzerRunContext): Promise<ArtifactPayload>;

	protected async analyze(context: AnalyzerRunContext): Promise<ArtifactPayload> {
		const input = this.require(context.dependencies, this.inputId);
		return this.transform(input.payload, context);
	}
}
