import { mkdir, readFile, readdir, rename, rm, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { Artifact } from '../types';
import { toError } from '../core/OrchestratorError';
import { createContextLogger } from '../utils/logger';
import { artifactPayloadSchema } from '../utils/payload';
import { ArtifactStore } from './ArtifactStore';

const log = createContextLogger('FileArtifactStore');

const artifactSchema = z.object({
	analyzerId: z.string(),
	target: z.string(),
	producedAt: z.number(),
	payload: artifactPayloadSchema,
	status: z.enum(['ok', 'error']),
});

const ARTIFACT_EXTENSION = '.json';

// Keeps every target directory a plain child of the root, including targets such as '.', '..' or ''.
const TARGET_DIR_PREFIX = 't_';

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores each artifact as a JSON file at `<root>/t_<target>/<analyzerId>.json`
 * (both path segments URI-encoded). Writes go to a temporary file that is then
 * renamed over the destination, so a reader never sees a partial artifact.
 */
export class FileArtifactStore implements ArtifactStore {
	constructor(private readonly rootDir: string) {}

	async read(target: string, analyzerId: string): Promise<Artifact | undefined> {
		const file = this.artifactPath(target, analyzerId);
		let content: string;
		try {
			content = await readFile(file, 'utf8');
		} catch (error) {
			if (isMissingFile(error)) {
				return undefined;
			}
			throw error;
		}
		return this.parse(file, content);
	}

	async write(artifact: Artifact): Promise<void> {
		const file = this.artifactPath(artifact.target, artifact.analyzerId);
		const temporary = `${file}.${uuidv4()}.tmp`;
		await mkdir(path.dirname(file), { recursive: true });
		await writeFile(temporary, JSON.stringify(artifact, null, 2), 'utf8');
		try {
			await rename(temporary, file);
		} catch (error) {
			await rm(temporary, { force: true });
			throw error;
		}
	}

	async delete(target: string, analyzerId: string): Promise<boolean> {
		try {
			await unlink(this.artifactPath(target, analyzerId));
			return true;
		} catch (error) {
			if (isMissingFile(error)) {
				return false;
			}
			throw error;
		}
	}

	async deleteTarget(target: string): Promise<number> {
		const artifacts = await this.list(target);
		await rm(this.targetDir(target), { recursive: true, force: true });
		return artifacts.length;
	}

	async list(target: string): Promise<Artifact[]> {
		let entries: string[];
		try {
			entries = await readdir(this.targetDir(target));
		} catch (error) {
			if (isMissingFile(error)) {
				return [];
			}
			throw error;
		}

		const artifacts: Artifact[] = [];
		for (const entry of entries.filter((name) => name.endsWith(ARTIFACT_EXTENSION)).sort()) {
			const analyzerId = decodeURIComponent(entry.slice(0, -ARTIFACT_EXTENSION.length));
			const artifact = await this.read(target, analyzerId);
			if (artifact) {
				artifacts.push(artifact);
			}
		}
		return artifacts;
	}

	private parse(file: string, content: string): Artifact | undefined {
		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch (error) {
			log.warn(`Ignoring unreadable artifact ${file}`, { error: toError(error).message });
			return undefined;
		}

		const result = artifactSchema.safeParse(raw);
		if (!result.success) {
			log.warn(`Ignoring malformed artifact ${file}`, { issues: result.error.issues.map((issue) => issue.message) });
			return undefined;
		}
		return result.data;
	}

	private targetDir(target: string): string {
		return path.join(this.rootDir, `${TARGET_DIR_PREFIX}${encodeURIComponent(target)}`);
	}

	private artifactPath(target: string, analyzerId: string): string {
		return path.join(this.targetDir(target), `${encodeURIComponent(analyzerId)}${ARTIFACT_EXTENSION}`);
	}
}
