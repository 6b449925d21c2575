import { beforeEach, describe, expect, test } from 'vitest';
import { AnalyzerRegistry, DuplicateIdError, UnknownIdError } from '../src/core/AnalyzerRegistry';
import { captureError, descriptor, TestRunnable } from './helpers';

describe('AnalyzerRegistry', () => {
	let registry: AnalyzerRegistry;

	beforeEach(() => {
		registry = new AnalyzerRegistry();
	});

	describe('register', () => {
		test('should store descriptor and runnable', () => {
			const runnable = new TestRunnable();
			registry.register(descriptor('sbom'), runnable);

			expect(registry.has('sbom')).toBe(true);
			expect(registry.get('sbom')?.runnable).toBe(runnable);
			expect(registry.size()).toBe(1);
			expect(registry.isEmpty()).toBe(false);
		});

		test('should reject a duplicate ID', () => {
			registry.register(descriptor('sbom'), new TestRunnable());

			expect(() => registry.register(descriptor('sbom'), new TestRunnable())).toThrow(DuplicateIdError);
			expect(() => registry.register(descriptor('sbom'), new TestRunnable())).toThrow("Analyzer 'sbom' is already registered");
		});

		test('should copy the dependency list', () => {
			const dependencies = ['sbom'];
			registry.register(descriptor('sbom'), new TestRunnable());
			registry.register(descriptor('vulns', dependencies), new TestRunnable());

			dependencies.push('licenses');

			expect(registry.getRequired('vulns').descriptor.dependencies).toEqual(['sbom']);
		});

		test('registerMany should stop at the first duplicate', () => {
			const runnable = new TestRunnable();
			expect(() =>
				registry.registerMany([
					{ descriptor: descriptor('a'), runnable },
					{ descriptor: descriptor('a'), runnable },
					{ descriptor: descriptor('b'), runnable },
				]),
			).toThrow(DuplicateIdError);

			expect(registry.getIds()).toEqual(['a']);
		});
	});

	describe('resolve', () => {
		beforeEach(() => {
			registry.register(descriptor('sbom'), new TestRunnable());
			registry.register(descriptor('vulns', ['sbom']), new TestRunnable());
		});

		test('should return descriptors in request order', () => {
			expect(registry.resolve(['vulns', 'sbom']).map((d) => d.id)).toEqual(['vulns', 'sbom']);
		});

		test('should name every unknown ID', () => {
			const error = captureError(() => registry.resolve(['sbom', 'secrets', 'licenses']));

			expect(error).toBeInstanceOf(UnknownIdError);
			if (error instanceof UnknownIdError) {
				expect(error.ids).toEqual(['secrets', 'licenses']);
				expect(error.code).toBe('UNKNOWN_ID');
				expect(error.message).toBe('Unknown analyzer IDs: secrets, licenses');
			}
		});

		test('getRequired should throw for an unknown ID', () => {
			expect(() => registry.getRequired('secrets')).toThrow(UnknownIdError);
			expect(registry.get('secrets')).toBeUndefined();
		});
	});

	test('should list descriptors in registration order', () => {
		registry.register(descriptor('c'), new TestRunnable());
		registry.register(descriptor('a'), new TestRunnable());
		registry.register(descriptor('b'), new TestRunnable());

		expect(registry.getAllDescriptors().map((d) => d.id)).toEqual(['c', 'a', 'b']);
		expect(registry.toString()).toBe('AnalyzerRegistry(3 analyzers: [c, a, b])');
	});
});
