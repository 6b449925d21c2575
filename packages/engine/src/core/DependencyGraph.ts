import { AnalyzerDescriptor } from '../types';

/**
 * A node in the dependency graph. Edges are stored as analyzer IDs, not references.
 */
export class DependencyNode {
	/**
	 * IDs this node depends on (must reach a terminal state before this node runs).
	 */
	public readonly dependencies: Set<string> = new Set();

	/**
	 * IDs that depend on this node.
	 */
	public readonly dependents: Set<string> = new Set();

	constructor(
		public readonly descriptor: AnalyzerDescriptor,
		public readonly index: number,
	) {}

	get id(): string {
		return this.descriptor.id;
	}

	hasDependencies(): boolean {
		return this.dependencies.size > 0;
	}

	hasDependents(): boolean {
		return this.dependents.size > 0;
	}

	toString(): string {
		return `DependencyNode(${this.id})`;
	}
}

/**
 * A dependency edge whose target is not part of the graph.
 */
export interface MissingDependency {
	readonly id: string;
	readonly missing: string;
}

/**
 * Analyzer dependency graph as adjacency lists keyed by analyzer ID.
 * `index` records insertion order and is the stable tie-break for ordering.
 */
export class DependencyGraph {
	private nodes: Map<string, DependencyNode> = new Map();

	/**
	 * Add an analyzer. Re-adding an existing ID is ignored.
	 */
	addAnalyzer(descriptor: AnalyzerDescriptor): void {
		if (!this.nodes.has(descriptor.id)) {
			this.nodes.set(descriptor.id, new DependencyNode(descriptor, this.nodes.size));
		}
	}

	/**
	 * Build edges from each descriptor's declared dependencies.
	 * Must be called after adding all analyzers. Unknown dependencies get no edge;
	 * use findMissingDependencies to report them.
	 */
	buildGraph(): void {
		for (const node of this.nodes.values()) {
			node.dependencies.clear();
			node.dependents.clear();
		}

		for (const node of this.nodes.values()) {
			for (const dependencyId of node.descriptor.dependencies) {
				const dependency = this.nodes.get(dependencyId);
				if (dependency) {
					node.dependencies.add(dependencyId);
					dependency.dependents.add(node.id);
				}
			}
		}
	}

	/**
	 * Collect the transitive closure of the given IDs: the IDs themselves plus every
	 * analyzer they depend on, directly or not. Unknown IDs are left out.
	 * @returns IDs in graph insertion order
	 */
	closure(targetIds: readonly string[]): string[] {
		const collected = new Set<string>();
		const stack = targetIds.filter((id) => this.nodes.has(id));

		while (stack.length > 0) {
			const id = stack.pop();
			if (id === undefined || collected.has(id)) {
				continue;
			}
			collected.add(id);
			for (const dependencyId of this.getNode(id)?.dependencies ?? []) {
				stack.push(dependencyId);
			}
		}

		return this.sortByIndex(collected);
	}

	/**
	 * Find declared dependencies that are not in the graph, within the closure of the targets.
	 */
	findMissingDependencies(targetIds: readonly string[]): MissingDependency[] {
		const missing: MissingDependency[] = [];
		for (const id of this.closure(targetIds)) {
			const node = this.nodes.get(id);
			for (const dependencyId of node?.descriptor.dependencies ?? []) {
				if (!this.nodes.has(dependencyId)) {
					missing.push({ id, missing: dependencyId });
				}
			}
		}
		return missing;
	}

	/**
	 * Layered topological sort (Kahn) over a subset of the graph.
	 * Edges to nodes outside the subset are ignored.
	 * @returns The layers that could be placed, plus the IDs that could not (they lie on or behind a cycle)
	 */
	layers(subset: readonly string[]): { layers: string[][]; unplaced: string[] } {
		const members = new Set(subset);
		const inDegree = new Map<string, number>();

		for (const id of members) {
			const node = this.nodes.get(id);
			let degree = 0;
			for (const dependencyId of node?.dependencies ?? []) {
				if (members.has(dependencyId)) {
					degree++;
				}
			}
			inDegree.set(id, degree);
		}

		const layers: string[][] = [];
		let current = this.sortByIndex([...members].filter((id) => inDegree.get(id) === 0));
		const placed = new Set<string>();

		while (current.length > 0) {
			layers.push(current);
			const next: string[] = [];
			for (const id of current) {
				placed.add(id);
				for (const dependentId of this.nodes.get(id)?.dependents ?? []) {
					if (!members.has(dependentId)) {
						continue;
					}
					const remaining = (inDegree.get(dependentId) ?? 0) - 1;
					inDegree.set(dependentId, remaining);
					if (remaining === 0) {
						next.push(dependentId);
					}
				}
			}
			current = this.sortByIndex(next);
		}

		const unplaced = this.sortByIndex([...members].filter((id) => !placed.has(id)));
		return { layers, unplaced };
	}

	/**
	 * Extract one concrete cycle from a set of nodes that could not be placed.
	 * Every unplaced node has at least one unplaced dependency, so following those
	 * edges must revisit a node.
	 * @returns The IDs on the cycle in dependency order, or an empty array if none exists
	 */
	findCycle(unplaced: readonly string[]): string[] {
		const members = new Set(unplaced);
		const start = unplaced[0];
		if (start === undefined) {
			return [];
		}

		const path: string[] = [];
		const position = new Map<string, number>();
		let current: string | undefined = start;

		while (current !== undefined && !position.has(current)) {
			position.set(current, path.length);
			path.push(current);
			const node = this.nodes.get(current);
			current = this.sortByIndex([...(node?.dependencies ?? [])].filter((id) => members.has(id)))[0];
		}

		if (current === undefined) {
			return [];
		}
		return path.slice(position.get(current));
	}

	/**
	 * Check the whole graph for a cycle.
	 * @returns The IDs on one cycle, or an empty array for an acyclic graph
	 */
	detectCycle(): string[] {
		const { unplaced } = this.layers(Array.from(this.nodes.keys()));
		return this.findCycle(unplaced);
	}

	getNode(id: string): DependencyNode | undefined {
		return this.nodes.get(id);
	}

	getAllNodes(): DependencyNode[] {
		return Array.from(this.nodes.values());
	}

	size(): number {
		return this.nodes.size;
	}

	isEmpty(): boolean {
		return this.nodes.size === 0;
	}

	toString(): string {
		const edgeCount = this.getAllNodes().reduce((total, node) => total + node.dependencies.size, 0);
		return `DependencyGraph(${this.size()} nodes, ${edgeCount} edges)`;
	}

	private sortByIndex(ids: Iterable<string>): string[] {
		return Array.from(ids).sort((a, b) => (this.nodes.get(a)?.index ?? 0) - (this.nodes.get(b)?.index ?? 0));
	}
}
