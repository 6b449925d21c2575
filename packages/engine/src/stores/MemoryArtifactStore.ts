import { Artifact } from '../types';
import { ArtifactStore } from './ArtifactStore';

function copyArtifact(artifact: Artifact): Artifact {
	return { ...artifact, payload: structuredClone(artifact.payload) };
}

/**
 * In-process artifact store. Replacing a Map entry is atomic for readers.
 * Payloads are copied on the way in and out, so callers never hold the stored object.
 */
export class MemoryArtifactStore implements ArtifactStore {
	private artifacts: Map<string, Map<string, Artifact>> = new Map();

	async read(target: string, analyzerId: string): Promise<Artifact | undefined> {
		const artifact = this.artifacts.get(target)?.get(analyzerId);
		return artifact && copyArtifact(artifact);
	}

	async write(artifact: Artifact): Promise<void> {
		let byAnalyzer = this.artifacts.get(artifact.target);
		if (!byAnalyzer) {
			byAnalyzer = new Map();
			this.artifacts.set(artifact.target, byAnalyzer);
		}
		byAnalyzer.set(artifact.analyzerId, copyArtifact(artifact));
	}

	async delete(target: string, analyzerId: string): Promise<boolean> {
		const byAnalyzer = this.artifacts.get(target);
		if (!byAnalyzer) {
			return false;
		}
		const removed = byAnalyzer.delete(analyzerId);
		if (byAnalyzer.size === 0) {
			this.artifacts.delete(target);
		}
		return removed;
	}

	async deleteTarget(target: string): Promise<number> {
		const count = this.artifacts.get(target)?.size ?? 0;
		this.artifacts.delete(target);
		return count;
	}

	async list(target: string): Promise<Artifact[]> {
		return Array.from(this.artifacts.get(target)?.values() ?? [], copyArtifact).sort((a, b) => a.analyzerId.localeCompare(b.analyzerId));
	}

	size(): number {
		let total = 0;
		for (const byAnalyzer of this.artifacts.values()) {
			total += byAnalyzer.size;
		}
		return total;
	}
}
