import path from 'path';
import { loadConfigFile, OrchestratorConfig } from '../config';
import { ProgressEvent } from '../core/ExecutionEngine';
import { ScanService } from '../core/ScanService';

export const DEFAULT_CONFIG_PATH = 'scanctl.config.json';

export interface ConfigOption {
	config: string;
}

/**
 * Load the configuration named on the command line. A relative `storagePath`
 * is resolved against the configuration file's directory.
 */
export async function loadCliConfig(configPath: string): Promise<OrchestratorConfig> {
	const absolute = path.resolve(process.cwd(), configPath);
	const config = await loadConfigFile(absolute);
	return { ...config, storagePath: path.resolve(path.dirname(absolute), config.storagePath) };
}

export async function createCliService(configPath: string, onProgress?: (event: ProgressEvent) => void): Promise<ScanService> {
	const config = await loadCliConfig(configPath);
	return ScanService.fromConfig(config, { onProgress });
}

/**
 * Split a comma-separated analyzer list, dropping blanks.
 */
export function parseAnalyzerList(value: string): string[] {
	return value
		.split(',')
		.map((id) => id.trim())
		.filter((id) => id.length > 0);
}
