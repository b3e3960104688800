import { DependencyCycleError, MissingDependencyError } from './errors';

/**
 * A `[node, requiredNodes]` pair as accepted by the DependencyGraph constructor
 */
export type DependencyGraphEntry = readonly [string, Iterable<string>];

/**
 * Directed graph of "node requires node" edges with a stable topological sort
 *
 * An edge `(a, b)` means `a` requires `b`, so `b` is ordered before `a`.
 * Nodes that have no ordering relation between them keep their insertion order,
 * which makes the boot order reproducible from one run to the next.
 *
 * @example
 * ```typescript
 * const graph = new DependencyGraph([
 *   ['pool', ['timer']],
 *   ['timer', []],
 * ]);
 *
 * graph.topsort(); // ['timer', 'pool']
 * ```
 */
export class DependencyGraph implements Iterable<string> {
  private readonly adjacency = new Map<string, string[]>();
  private readonly label?: string;

  /**
   * @param entries - Initial nodes with the nodes each one requires
   * @param label - Namespace name used in error messages
   */
  constructor(entries: Iterable<DependencyGraphEntry> = [], label?: string) {
    this.label = label;

    for (const [node, requires] of entries) {
      this.addArc(node);
      for (const required of requires) {
        this.addEdge(node, required);
      }
    }
  }

  public get size(): number {
    return this.adjacency.size;
  }

  /**
   * Add a node with no edges (no-op if it already exists)
   */
  public addArc(node: string): void {
    if (!this.adjacency.has(node)) {
      this.adjacency.set(node, []);
    }
  }

  /**
   * Add an edge: `node` requires `requiredNode`
   *
   * Only `node` is created if missing. A required node that never gets added
   * is reported by topsort() as a MissingDependencyError.
   */
  public addEdge(node: string, requiredNode: string): void {
    this.addArc(node);
    const edges = this.adjacency.get(node) ?? [];

    if (!edges.includes(requiredNode)) {
      edges.push(requiredNode);
    }
  }

  public has(node: string): boolean {
    return this.adjacency.has(node);
  }

  /**
   * Nodes that `node` requires, in the order the edges were added
   */
  public edgesOf(node: string): readonly string[] {
    return this.adjacency.get(node) ?? [];
  }

  public [Symbol.iterator](): Iterator<string> {
    return this.adjacency.keys();
  }

  /**
   * Sort the nodes so every node comes after the nodes it requires
   *
   * Kahn's algorithm; when several nodes are ready at once the one added first wins.
   *
   * @throws {MissingDependencyError} If an edge points at a node that isn't in the graph
   * @throws {DependencyCycleError} If no valid order exists
   */
  public topsort(): string[] {
    const nodes = [...this.adjacency.keys()];
    const insertionIndex = new Map(nodes.map((node, idx) => [node, idx]));
    const pending = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const node of nodes) {
      dependents.set(node, []);
    }

    for (const node of nodes) {
      const requires = this.edgesOf(node);
      pending.set(node, requires.length);

      for (const required of requires) {
        const requiredBy = dependents.get(required);
        if (!requiredBy) {
          throw new MissingDependencyError({
            componentName: node,
            missingDependency: required,
            namespace: this.label,
          });
        }
        requiredBy.push(node);
      }
    }

    const ready = nodes.filter((node) => pending.get(node) === 0);
    const order: string[] = [];

    while (ready.length > 0) {
      // Stable pick: lowest insertion index
      ready.sort(
        (a, b) => (insertionIndex.get(a) ?? 0) - (insertionIndex.get(b) ?? 0),
      );
      const next = ready.shift();
      if (next === undefined) {
        break;
      }

      order.push(next);

      for (const dependent of dependents.get(next) ?? []) {
        const remaining = (pending.get(dependent) ?? 0) - 1;
        pending.set(dependent, remaining);
        if (remaining === 0) {
          ready.push(dependent);
        }
      }
    }

    if (order.length !== nodes.length) {
      const cycle = this.findCycle();
      throw new DependencyCycleError({
        cycle:
          cycle.length > 0
            ? cycle
            : nodes.filter((node) => !order.includes(node)),
        namespace: this.label,
      });
    }

    return order;
  }

  /**
   * Find one cycle (depth-first, following "requires" edges)
   *
   * @returns The nodes on the cycle in edge order, or an empty array
   */
  public findCycle(): string[] {
    const visited = new Set<string>();
    const inStack = new Set<string>();
    const path: string[] = [];

    const visit = (node: string): string[] | null => {
      visited.add(node);
      inStack.add(node);
      path.push(node);

      for (const neighbor of this.edgesOf(node)) {
        if (!visited.has(neighbor)) {
          const result = visit(neighbor);
          if (result) {
            return result;
          }
        } else if (inStack.has(neighbor)) {
          return path.slice(path.indexOf(neighbor));
        }
      }

      inStack.delete(node);
      path.pop();
      return null;
    };

    for (const node of this.adjacency.keys()) {
      if (visited.has(node)) {
        continue;
      }
      const result = visit(node);
      if (result) {
        return result;
      }
    }

    return [];
  }

  /**
   * Render the graph in Graphviz DOT syntax
   */
  public formatAsDOT(name = 'dependencies'): string {
    const lines = [`digraph "${name}" {`];

    for (const [node, requires] of this.adjacency) {
      if (requires.length === 0) {
        lines.push(`  "${node}";`);
      }
      for (const required of requires) {
        lines.push(`  "${node}" -> "${required}";`);
      }
    }

    lines.push('}');
    return lines.join('\n');
  }
}
