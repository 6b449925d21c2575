import { AnalyzerRegistry } from './AnalyzerRegistry';
import { OrchestratorError } from './OrchestratorError';

/**
 * Error thrown when a scan names a profile that is not configured.
 */
export class UnknownProfileError extends OrchestratorError {
	constructor(public readonly profile: string) {
		super('UNKNOWN_PROFILE', `Unknown scan profile '${profile}'`);
		this.name = 'UnknownProfileError';
	}
}

/**
 * A named set of analyzers to run for a scan request.
 */
export interface ScanProfile {
	readonly name: string;
	readonly description?: string;
	readonly analyzers: readonly string[];
}

/**
 * Maps a profile name, or an explicit analyzer list, to the analyzer IDs of a scan.
 */
export class ProfileResolver {
	private readonly profiles: Map<string, ScanProfile>;

	constructor(
		private readonly registry: AnalyzerRegistry,
		profiles: readonly ScanProfile[] = [],
	) {
		this.profiles = new Map(profiles.map((profile) => [profile.name, profile]));
	}

	/**
	 * Expand a request into analyzer IDs. Duplicates are dropped, first occurrence wins.
	 * @param request A profile name or an explicit list of analyzer IDs
	 * @throws UnknownProfileError for an unconfigured profile name
	 * @throws UnknownIdError if any resulting analyzer is not registered
	 */
	resolve(request: string | readonly string[]): string[] {
		let ids: readonly string[];
		if (typeof request === 'string') {
			const profile = this.profiles.get(request);
			if (!profile) {
				throw new UnknownProfileError(request);
			}
			ids = profile.analyzers;
		} else {
			ids = request;
		}

		const unique = Array.from(new Set(ids));
		this.registry.resolve(unique);
		return unique;
	}

	hasProfile(name: string): boolean {
		return this.profiles.has(name);
	}

	listProfiles(): ScanProfile[] {
		return Array.from(this.profiles.values());
	}
}
