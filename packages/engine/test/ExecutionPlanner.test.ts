import { beforeEach, describe, expect, test } from 'vitest';
import { AnalyzerRegistry, UnknownIdError } from '../src/core/AnalyzerRegistry';
import { CycleDetectedError, ExecutionPlanner, UnknownDependencyError } from '../src/core/ExecutionPlanner';
import { captureError, descriptor, TestRunnable } from './helpers';

function registryOf(...descriptors: ReturnType<typeof descriptor>[]): AnalyzerRegistry {
	const registry = new AnalyzerRegistry();
	for (const entry of descriptors) {
		registry.register(entry, new TestRunnable());
	}
	return registry;
}

describe('ExecutionPlanner', () => {
	let planner: ExecutionPlanner;

	beforeEach(() => {
		planner = new ExecutionPlanner(
			registryOf(
				descriptor('sbom'),
				descriptor('licenses', ['sbom']),
				descriptor('vulns', ['sbom']),
				descriptor('report', ['licenses', 'vulns']),
				descriptor('secrets'),
			),
		);
	});

	test('should plan a single analyzer with its dependencies', () => {
		const plan = planner.plan(['vulns']);

		expect(plan.requested).toEqual(['vulns']);
		expect(plan.waves).toEqual([['sbom'], ['vulns']]);
		expect(plan.order).toEqual(['sbom', 'vulns']);
		expect(plan.maxConcurrency).toBe(1);
	});

	test('should order analyzers within a wave by registration order', () => {
		const plan = planner.plan(['secrets', 'report']);

		expect(plan.waves).toEqual([['sbom', 'secrets'], ['licenses', 'vulns'], ['report']]);
		expect(plan.maxConcurrency).toBe(2);
	});

	test('should place every analyzer exactly once after all of its dependencies', () => {
		const registry = registryOf(
			descriptor('a'),
			descriptor('b', ['a']),
			descriptor('c', ['a', 'b']),
			descriptor('d', ['c']),
			descriptor('e', ['a', 'd']),
			descriptor('f', ['b']),
		);
		const plan = new ExecutionPlanner(registry).plan(['e', 'f']);

		const waveOf = new Map<string, number>();
		plan.waves.forEach((wave, index) => wave.forEach((id) => waveOf.set(id, index)));

		expect(plan.order).toHaveLength(6);
		expect(new Set(plan.order).size).toBe(6);
		for (const id of plan.order) {
			for (const dependencyId of registry.getRequired(id).descriptor.dependencies) {
				expect(waveOf.get(dependencyId)).toBeLessThan(waveOf.get(id) ?? -1);
			}
		}
		expect(plan.waves).toEqual([['a'], ['b'], ['c', 'f'], ['d'], ['e']]);
	});

	test('should deduplicate the request', () => {
		expect(planner.plan(['vulns', 'sbom', 'vulns']).requested).toEqual(['vulns', 'sbom']);
	});

	test('should produce identical plans for identical requests', () => {
		expect(planner.plan(['report', 'secrets'])).toEqual(planner.plan(['report', 'secrets']));
	});

	test('should reject unknown requested IDs', () => {
		expect(() => planner.plan(['vulns', 'dast'])).toThrow(UnknownIdError);
	});

	test('should name the analyzer with an unregistered dependency', () => {
		const broken = new ExecutionPlanner(registryOf(descriptor('sbom'), descriptor('vulns', ['sbom', 'advisory-db'])));

		const error = captureError(() => broken.plan(['vulns']));

		expect(error).toBeInstanceOf(UnknownDependencyError);
		if (error instanceof UnknownDependencyError) {
			expect(error.id).toBe('vulns');
			expect(error.missing).toBe('advisory-db');
			expect(error.code).toBe('UNKNOWN_DEPENDENCY');
		}
	});

	test('should name the analyzers on a cycle', () => {
		const cyclic = new ExecutionPlanner(
			registryOf(descriptor('sbom'), descriptor('report', ['vulns']), descriptor('vulns', ['sbom', 'triage']), descriptor('triage', ['vulns'])),
		);

		const error = captureError(() => cyclic.plan(['report']));

		expect(error).toBeInstanceOf(CycleDetectedError);
		if (error instanceof CycleDetectedError) {
			expect(error.ids).toEqual(['vulns', 'triage']);
			expect(error.message).toBe('Circular dependency detected: vulns -> triage -> vulns');
		}
	});

	test('should not report a cycle outside the requested closure', () => {
		const isolated = new ExecutionPlanner(registryOf(descriptor('sbom'), descriptor('x', ['y']), descriptor('y', ['x'])));

		expect(isolated.plan(['sbom']).waves).toEqual([['sbom']]);
		expect(isolated.validateRegistry()).toEqual(['Circular dependency detected: x -> y -> x']);
	});

	test('validateRegistry should report unregistered dependencies', () => {
		const broken = new ExecutionPlanner(registryOf(descriptor('vulns', ['sbom'])));

		expect(broken.validateRegistry()).toEqual(["Analyzer 'vulns' depends on unregistered analyzer 'sbom'"]);
		expect(planner.validateRegistry()).toEqual([]);
	});
});
