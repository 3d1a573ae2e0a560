/**
 * Resources keyed by address, with an edge from each dependency to its dependents.
 */
export class DependencyGraph<T> {
  private nodes: Map<string, T> = new Map();
  private dependents: Map<string, Set<string>> = new Map();

  addNode(id: string, data: T): void {
    if (this.nodes.has(id)) throw new Error(`Node ${id} already exists`);
    this.nodes.set(id, data);
    this.dependents.set(id, new Set());
  }

  /** `dependent` needs `dependency` applied first */
  addDependency(dependent: string, dependency: string): void {
    if (!this.nodes.has(dependency)) throw new Error(`Node ${dependency} does not exist`);
    const edges = this.dependents.get(dependency);
    if (!edges || !this.nodes.has(dependent)) throw new Error(`Node ${dependent} does not exist`);

    edges.add(dependent);
  }

  getNode(id: string): T | undefined {
    return this.nodes.get(id);
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  get size(): number {
    return this.nodes.size;
  }

  /*
   * Nodes grouped in layers: every node comes after all of its dependencies.
   * Within a layer, insertion order is kept.
   */
  layers(): string[][] {
    const inDegree = this.calculateInDegrees();
    const result: string[][] = [];
    let queue: string[] = [];

    for (const [node, degree] of inDegree.entries()) if (degree === 0) queue.push(node);

    while (queue.length > 0) {
      result.push(queue);
      const next: string[] = [];

      for (const node of queue)
        for (const dependent of this.dependents.get(node) ?? []) {
          const degree = (inDegree.get(dependent) ?? 0) - 1;
          inDegree.set(dependent, degree);
          if (degree === 0) next.push(dependent);
        }

      queue = next;
    }

    const sorted = new Set(result.flat());
    if (sorted.size !== this.nodes.size) {
      const cyclic = [...this.nodes.keys()].filter((node) => !sorted.has(node));
      throw new Error(`Dependency cycle between: ${cyclic.join(', ')}`);
    }

    return result;
  }

  /** Apply order */
  order(): string[] {
    return this.layers().flat();
  }

  /** Teardown order: dependents before their dependencies */
  reverseOrder(): string[] {
    return this.order().reverse();
  }

  private calculateInDegrees(): Map<string, number> {
    const inDegree: Map<string, number> = new Map();

    for (const node of this.nodes.keys()) inDegree.set(node, 0);
    for (const edges of this.dependents.values()) for (const dependent of edges) inDegree.set(dependent, (inDegree.get(dependent) ?? 0) + 1);

    return inDegree;
  }
}
