import { Artifact } from '../types';

/**
 * Persistence backend for artifacts, keyed by (target, analyzerId).
 * `write` must replace the previous artifact for the key atomically: a reader
 * sees either the old artifact or the new one, never a partial write.
 */
export interface ArtifactStore {
	read(target: string, analyzerId: string): Promise<Artifact | undefined>;
	write(artifact: Artifact): Promise<void>;

	/**
	 * @returns true if an artifact was removed
	 */
	delete(target: string, analyzerId: string): Promise<boolean>;

	/**
	 * Remove every artifact of a target.
	 * @returns The number of artifacts removed
	 */
	deleteTarget(target: string): Promise<number>;

	list(target: string): Promise<Artifact[]>;
}
