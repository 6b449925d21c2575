import { describe, expect, test } from 'vitest';
import { RequiredArtifactNotFoundError, SourceAnalyzer, TransformAnalyzer } from '../src/analyzers/AbstractAnalyzer';
import { CommandAnalyzer, CommandFailedError, CommandOutput, CommandRunner, CommandRunOptions, createCommandAnalyzers } from '../src/analyzers/CommandAnalyzer';
import { CommandAnalyzerConfig, loadConfig } from '../src/config';
import { ArtifactSetImpl } from '../src/core/ArtifactSetImpl';
import { AnalyzerRunContext, Artifact, ArtifactPayload, ArtifactSet } from '../src/types';
import { HOUR_MS } from './helpers';

const TARGET = 'acme/widgets';

function artifact(analyzerId: string, payload: ArtifactPayload): Artifact {
	return { analyzerId, target: TARGET, producedAt: 0, payload, status: 'ok' };
}

function context(dependencies: Artifact[] = []): AnalyzerRunContext {
	return { target: TARGET, signal: new AbortController().signal, dependencies: new ArtifactSetImpl(dependencies) };
}

class ManifestAnalyzer extends SourceAnalyzer {
	readonly id = 'manifest';
	readonly defaultTtlMs = HOUR_MS;

	protected async analyze(ctx: AnalyzerRunContext): Promise<ArtifactPayload> {
		return { target: ctx.target, files: 3 };
	}
}

class FileCountAnalyzer extends TransformAnalyzer {
	readonly id = 'file-count';
	readonly inputId = 'manifest';
	readonly defaultTtlMs = 2 * HOUR_MS;

	constructor() {
		super({ timeoutMs: 5000, description: 'Counts manifest files' });
	}

	protected async transform(input: ArtifactPayload): Promise<ArtifactPayload> {
		const files = typeof input === 'object' && input !== null && !Array.isArray(input) ? input.files : undefined;
		return { count: typeof files === 'number' ? files : 0 };
	}
}

// Exposes the protected helpers.
class ReportAnalyzer extends SourceAnalyzer {
	readonly id = 'report';
	readonly defaultTtlMs = HOUR_MS;
	readonly dependencies = ['manifest', 'file-count'];

	protected async analyze(): Promise<ArtifactPayload> {
		return 'report';
	}

	payloads(artifacts: ArtifactSet): Map<string, ArtifactPayload> {
		return this.getDependencyPayloads(artifacts);
	}

	lookup(artifacts: ArtifactSet, id: string): Artifact | undefined {
		return this.optional(artifacts, id);
	}

	present(artifacts: ArtifactSet, id: string): boolean {
		return this.has(artifacts, id);
	}
}

interface RunnerCall {
	command: string;
	args: string[];
	options: CommandRunOptions;
}

function fakeRunner(result: Partial<CommandOutput> | Error): { runner: CommandRunner; calls: RunnerCall[] } {
	const calls: RunnerCall[] = [];
	const runner: CommandRunner = async (command, args, options) => {
		calls.push({ command, args: [...args], options });
		if (result instanceof Error) {
			throw result;
		}
		return { stdout: result.stdout ?? '', stderr: result.stderr ?? '' };
	};
	return { runner, calls };
}

function commandConfig(definition: Record<string, unknown>): CommandAnalyzerConfig {
	return loadConfig({ analyzers: { tool: definition } }).analyzers.tool;
}

describe('AbstractAnalyzer', () => {
	test('source analyzers have no dependencies and run from the target', async () => {
		const analyzer = new ManifestAnalyzer();

		expect(analyzer.dependencies).toEqual([]);
		await expect(analyzer.run(context())).resolves.toEqual({ target: TARGET, files: 3 });
	});

	test('transform analyzers depend on their input and receive its payload', async () => {
		const analyzer = new FileCountAnalyzer();

		expect(analyzer.dependencies).toEqual(['manifest']);
		await expect(analyzer.run(context([artifact('manifest', { files: 7 })]))).resolves.toEqual({ count: 7 });
	});

	test('run rejects before analyzing when a declared dependency is missing', async () => {
		const analyzer = new FileCountAnalyzer();

		await expect(analyzer.run(context())).rejects.toBeInstanceOf(RequiredArtifactNotFoundError);
		await expect(analyzer.run(context())).rejects.toThrow("Required artifact of 'manifest' not available to analyzer 'file-count'");
	});

	test('describe reflects the declared fields', () => {
		expect(new FileCountAnalyzer().describe()).toEqual({
			id: 'file-count',
			dependencies: ['manifest'],
			defaultTtlMs: 2 * HOUR_MS,
			timeoutMs: 5000,
			description: 'Counts manifest files',
		});
	});

	test('toRegistration pairs the descriptor with the analyzer itself', () => {
		const analyzer = new ManifestAnalyzer();
		const registration = analyzer.toRegistration();

		expect(registration.runnable).toBe(analyzer);
		expect(registration.descriptor.id).toBe('manifest');
		expect(registration.descriptor.timeoutMs).toBeUndefined();
	});

	test('dependency helpers read from the artifact set', () => {
		const analyzer = new ReportAnalyzer();
		const artifacts = new ArtifactSetImpl([artifact('manifest', { files: 1 }), artifact('unrelated', 1)]);

		expect(analyzer.payloads(artifacts)).toEqual(new Map([['manifest', { files: 1 }]]));
		expect(analyzer.lookup(artifacts, 'file-count')).toBeUndefined();
		expect(analyzer.present(artifacts, 'manifest')).toBe(true);
		expect(analyzer.present(artifacts, 'file-count')).toBe(false);
	});

	test('toString names the class and dependencies', () => {
		expect(new FileCountAnalyzer().toString()).toBe('FileCountAnalyzer(id: file-count, dependencies: [manifest])');
	});
});

describe('CommandAnalyzer', () => {
	test('replaces every target placeholder in the arguments', () => {
		const analyzer = new CommandAnalyzer('sbom', commandConfig({ command: 'syft', args: ['scan', '{target}', '--name={target}'] }));

		expect(analyzer.argumentsFor(TARGET)).toEqual(['scan', TARGET, `--name=${TARGET}`]);
	});

	test('runs the command and returns its JSON output', async () => {
		const { runner, calls } = fakeRunner({ stdout: '{"packages":[{"name":"left-pad"}]}' });
		const analyzer = new CommandAnalyzer(
			'sbom',
			commandConfig({ command: 'syft', args: ['{target}', '-o', 'json'], cwd: '/work', env: { SYFT_QUIET: '1' } }),
			runner,
		);
		const ctx = context();

		await expect(analyzer.run(ctx)).resolves.toEqual({ packages: [{ name: 'left-pad' }] });
		expect(calls).toHaveLength(1);
		expect(calls[0].command).toBe('syft');
		expect(calls[0].args).toEqual([TARGET, '-o', 'json']);
		expect(calls[0].options).toEqual({ cwd: '/work', env: { SYFT_QUIET: '1' }, signal: ctx.signal });
	});

	test('rejects output that is not JSON', async () => {
		const { runner } = fakeRunner({ stdout: 'Scanning...', stderr: 'warning: slow disk' });
		const analyzer = new CommandAnalyzer('sbom', commandConfig({ command: 'syft' }), runner);

		const error = await analyzer.run(context()).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(CommandFailedError);
		expect(error).toMatchObject({
			message: "Analyzer 'sbom' command failed: output is not valid JSON",
			analyzerId: 'sbom',
			stderr: 'warning: slow disk',
			code: 'COMMAND_FAILED',
		});
	});

	test('wraps runner failures with the captured stderr', async () => {
		const { runner } = fakeRunner(Object.assign(new Error('Command failed: grype'), { stderr: 'db not found' }));
		const analyzer = new CommandAnalyzer('vulns', commandConfig({ command: 'grype' }), runner);

		const error = await analyzer.run(context()).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(CommandFailedError);
		expect(error).toMatchObject({
			message: "Analyzer 'vulns' command failed: Command failed: grype",
			stderr: 'db not found',
		});
	});

	test('does not start the command while a dependency artifact is missing', async () => {
		const { runner, calls } = fakeRunner({ stdout: '{}' });
		const analyzer = new CommandAnalyzer('vulns', commandConfig({ command: 'grype', dependencies: ['sbom'] }), runner);

		await expect(analyzer.run(context())).rejects.toBeInstanceOf(RequiredArtifactNotFoundError);
		expect(calls).toHaveLength(0);
	});

	test('describes itself from the configuration', () => {
		const analyzer = new CommandAnalyzer(
			'vulns',
			commandConfig({ command: 'grype', args: ['sbom:{target}'], dependencies: ['sbom'], ttlMs: HOUR_MS, timeoutMs: 60000 }),
		);

		expect(analyzer.describe()).toEqual({
			id: 'vulns',
			dependencies: ['sbom'],
			defaultTtlMs: HOUR_MS,
			timeoutMs: 60000,
			description: 'grype sbom:{target}',
		});
	});

	test('defaults to a one-day TTL and prefers a configured description', () => {
		const analyzer = new CommandAnalyzer('lint', commandConfig({ command: 'eslint', description: 'Lints sources' }));

		expect(analyzer.defaultTtlMs).toBe(24 * HOUR_MS);
		expect(analyzer.description).toBe('Lints sources');
		expect(analyzer.timeoutMs).toBeUndefined();
	});
});

describe('createCommandAnalyzers', () => {
	test('creates one analyzer per definition sharing the runner', async () => {
		const { runner, calls } = fakeRunner({ stdout: '[]' });
		const config = loadConfig({
			analyzers: {
				sbom: { command: 'syft', args: ['{target}'] },
				vulns: { command: 'grype', dependencies: ['sbom'] },
			},
		});

		const analyzers = createCommandAnalyzers(config.analyzers, runner);

		expect(analyzers.map((analyzer) => analyzer.id)).toEqual(['sbom', 'vulns']);
		expect(analyzers[1].dependencies).toEqual(['sbom']);
		await expect(analyzers[0].run(context())).resolves.toEqual([]);
		expect(calls.map((call) => call.command)).toEqual(['syft']);
	});
});
