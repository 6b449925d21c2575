import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { loadCliConfig, parseAnalyzerList } from '../src/cli/context';
import { resolveScanRequest } from '../src/cli/commands/scan';
import { createCli } from '../src/cli';
import { loadConfig } from '../src/config';
import { ScanService } from '../src/core/ScanService';
import { FileArtifactStore } from '../src/stores/FileArtifactStore';
import { MemoryArtifactStore } from '../src/stores/MemoryArtifactStore';

vi.mock('chalk', () => {
	const plain = (s: string) => s;
	return {
		default: { bold: plain, dim: plain, cyan: plain, green: plain, red: plain, yellow: plain, magenta: plain },
	};
});

const TARGET = 'acme/widgets';

const CONFIG = {
	storagePath: 'cache',
	defaultProfile: 'standard',
	profiles: { standard: { analyzers: ['vulns'] } },
	analyzers: {
		sbom: { command: 'syft', args: ['{target}'] },
		vulns: { command: 'grype', dependencies: ['sbom'] },
	},
};

describe('cli', () => {
	let dir: string;
	let configPath: string;
	let previousExitCode: typeof process.exitCode;
	const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), 'scanctl-'));
		configPath = path.join(dir, 'scanctl.config.json');
		await writeFile(configPath, JSON.stringify(CONFIG), 'utf8');
		previousExitCode = process.exitCode;
		logSpy.mockClear();
	});

	afterEach(async () => {
		process.exitCode = previousExitCode;
		await rm(dir, { recursive: true, force: true });
	});

	async function run(...args: string[]): Promise<void> {
		await createCli().parseAsync(args, { from: 'user' });
	}

	function printed(): string[] {
		return logSpy.mock.calls.map((call) => String(call[0]));
	}

	describe('context', () => {
		test('resolves the storage path against the config file directory', async () => {
			const config = await loadCliConfig(configPath);

			expect(config.storagePath).toBe(path.join(dir, 'cache'));
			expect(config.defaultProfile).toBe('standard');
		});

		test('parseAnalyzerList trims entries and drops blanks', () => {
			expect(parseAnalyzerList(' sbom, ,vulns ')).toEqual(['sbom', 'vulns']);
			expect(parseAnalyzerList('')).toEqual([]);
		});
	});

	describe('resolveScanRequest', () => {
		const service = ScanService.fromConfig(loadConfig(CONFIG), { store: new MemoryArtifactStore() });

		test('prefers explicit analyzers over a profile', () => {
			expect(resolveScanRequest(service, { analyzers: ['sbom'], profile: 'standard' })).toEqual(['sbom']);
		});

		test('falls back to the named profile, then the default profile', () => {
			expect(resolveScanRequest(service, { profile: 'nightly', analyzers: [] })).toBe('nightly');
			expect(resolveScanRequest(service, {})).toBe('standard');
		});

		test('fails when nothing selects analyzers', () => {
			const bare = ScanService.fromConfig(loadConfig({}), { store: new MemoryArtifactStore() });

			expect(() => resolveScanRequest(bare, {})).toThrow('Pass --profile or --analyzers, or set defaultProfile in the configuration');
		});
	});

	describe('plan', () => {
		test('prints the waves as JSON', async () => {
			await run('plan', 'vulns', '--config', configPath, '--json');

			expect(printed()).toEqual([JSON.stringify({ requested: ['vulns'], waves: [['sbom'], ['vulns']] }, null, 2)]);
		});

		test('prints one line per wave for a profile', async () => {
			await run('plan', '--profile', 'standard', '--config', configPath);

			expect(printed()).toEqual(['Plan for vulns', '  wave 1  sbom', '  wave 2  vulns']);
		});

		test('sets a failing exit code for unknown analyzers', async () => {
			await run('plan', 'licenses', '--config', configPath);

			expect(printed()).toEqual([]);
			expect(process.exitCode).toBe(1);
		});

		test('sets a failing exit code when the config file is missing', async () => {
			await run('plan', 'vulns', '--config', path.join(dir, 'missing.json'));

			expect(process.exitCode).toBe(1);
		});
	});

	describe('artifacts and invalidate', () => {
		async function storeArtifact(analyzerId: string, producedAt: number = Date.now()): Promise<void> {
			const store = new FileArtifactStore(path.join(dir, 'cache'));
			await store.write({ analyzerId, target: TARGET, producedAt, payload: { analyzerId }, status: 'ok' });
		}

		test('lists stored artifacts as JSON', async () => {
			const producedAt = Date.now();
			await storeArtifact('sbom', producedAt);

			await run('artifacts', TARGET, '--config', configPath, '--json');

			expect(printed()).toEqual([
				JSON.stringify([{ analyzerId: 'sbom', producedAt: new Date(producedAt).toISOString(), status: 'ok', level: 'fresh' }], null, 2),
			]);
		});

		test('says when a target has no artifacts', async () => {
			await run('artifacts', TARGET, '--config', configPath);

			expect(printed()).toEqual([`No artifacts stored for ${TARGET}`]);
		});

		test('removes one analyzer artifact', async () => {
			await storeArtifact('sbom');
			await storeArtifact('vulns');

			await run('invalidate', TARGET, 'sbom', '--config', configPath);

			expect(printed()).toEqual([`Removed 1 artifact for ${TARGET}`]);
		});

		test('removes every artifact of a target', async () => {
			await storeArtifact('sbom');
			await storeArtifact('vulns');

			await run('invalidate', TARGET, '--config', configPath);
			await run('invalidate', TARGET, '--config', configPath);

			expect(printed()).toEqual([`Removed 2 artifacts for ${TARGET}`, `Removed 0 artifacts for ${TARGET}`]);
		});
	});
});
