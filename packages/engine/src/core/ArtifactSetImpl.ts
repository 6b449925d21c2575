import { Artifact, ArtifactSet } from '../types';

/**
 * Concrete ArtifactSet handed to analyzer runs, keyed by analyzer ID.
 */
export class ArtifactSetImpl implements ArtifactSet {
	private artifacts: Map<string, Artifact> = new Map();

	constructor(initial?: Iterable<Artifact>) {
		for (const artifact of initial ?? []) {
			this.add(artifact);
		}
	}

	accessor(analyzerId: string): Artifact | undefined {
		return this.artifacts.get(analyzerId);
	}

	contains(analyzerId: string): boolean {
		return this.artifacts.has(analyzerId);
	}

	size(): number {
		return this.artifacts.size;
	}

	isEmpty(): boolean {
		return this.artifacts.size === 0;
	}

	/**
	 * Add an artifact, replacing any artifact from the same analyzer.
	 */
	add(artifact: Artifact): void {
		this.artifacts.set(artifact.analyzerId, artifact);
	}

	getAnalyzerIds(): string[] {
		return Array.from(this.artifacts.keys());
	}

	toString(): string {
		const ids = this.getAnalyzerIds();
		return `ArtifactSet(${ids.length} artifacts: [${ids.join(', ')}])`;
	}
}
