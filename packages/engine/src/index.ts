// Core types and interfaces
export * from './types';

// Entry point
export { ScanService, profilesFromConfig, type ScanRequest, type ScanServiceConfigOptions, type ScanServiceOptions } from './core/ScanService';

// Errors
export { NotFoundError, OrchestratorError } from './core/OrchestratorError';
export { DuplicateIdError, UnknownIdError } from './core/AnalyzerRegistry';
export { UnknownProfileError } from './core/ProfileResolver';
export { CycleDetectedError, ExecutionPlanningError, UnknownDependencyError } from './core/ExecutionPlanner';
export { ConflictingRunError } from './core/ArtifactCache';
export { QueueFullError } from './core/JobQueue';
export { AlreadyTerminalError } from './core/Job';
export { AnalyzerCancelledError, AnalyzerTimeoutError } from './core/cancellation';

// Building blocks (advanced usage)
export { AnalyzerRegistry } from './core/AnalyzerRegistry';
export { ProfileResolver, type ScanProfile } from './core/ProfileResolver';
export { DependencyGraph, DependencyNode } from './core/DependencyGraph';
export { ExecutionPlanner, type ExecutionPlan } from './core/ExecutionPlanner';
export { ArtifactCache, type ArtifactCacheOptions, type ArtifactLookup, type CacheCheck, type RunLease } from './core/ArtifactCache';
export { ArtifactSetImpl } from './core/ArtifactSetImpl';
export { DEFAULT_FRESHNESS_THRESHOLDS, FreshnessPolicy, describeAge, type FreshnessThresholds } from './core/FreshnessPolicy';
export {
	DEFAULT_ANALYZER_TIMEOUT_MS,
	DEFAULT_PARALLEL_SCANNERS,
	ExecutionEngine,
	type ExecutionEngineOptions,
	type ProgressEvent,
} from './core/ExecutionEngine';
export { Job, isTerminalAnalyzerStatus, isTerminalJobStatus, type JobInit } from './core/Job';
export { DEFAULT_PARALLEL_REPOS, DEFAULT_QUEUE_CAPACITY, DEFAULT_RETENTION_MS, JobQueue, type JobQueueOptions } from './core/JobQueue';
export { JobStatisticsCollector, type RunOutcome } from './core/JobStatisticsCollector';
export { Semaphore } from './core/Semaphore';

// Storage
export { type ArtifactStore } from './stores/ArtifactStore';
export { MemoryArtifactStore } from './stores/MemoryArtifactStore';
export { FileArtifactStore } from './stores/FileArtifactStore';

// Configuration
export {
	ConfigurationError,
	OrchestratorConfigSchema,
	loadConfig,
	loadConfigFile,
	type CommandAnalyzerConfig,
	type OrchestratorConfig,
	type OrchestratorConfigInput,
	type ProfileConfig,
} from './config';

// Base classes for analyzers
export {
	AbstractAnalyzer,
	RequiredArtifactNotFoundError,
	SourceAnalyzer,
	TransformAnalyzer,
	type AnalyzerOptions,
} from './analyzers/AbstractAnalyzer';
export {
	CommandAnalyzer,
	CommandFailedError,
	createCommandAnalyzers,
	runCommand,
	type CommandOutput,
	type CommandRunOptions,
	type CommandRunner,
} from './analyzers/CommandAnalyzer';

// Logging
export { createContextLogger, logger } from './utils/logger';
