import { describe, expect, test } from 'vitest';
import { DependencyGraph } from './dependency-graph';
import { DependencyCycleError, MissingDependencyError } from './errors';

describe('DependencyGraph', () => {
  describe('structure', () => {
    test('iterates nodes in insertion order', () => {
      const graph = new DependencyGraph([
        ['pool', ['timer']],
        ['timer', []],
      ]);
      graph.addArc('consumer');

      expect([...graph]).toEqual(['pool', 'timer', 'consumer']);
      expect(graph.size).toBe(3);
      expect(graph.has('timer')).toBe(true);
      expect(graph.has('hub')).toBe(false);
    });

    test('addEdge creates the node and ignores duplicate edges', () => {
      const graph = new DependencyGraph();
      graph.addEdge('pool', 'timer');
      graph.addEdge('pool', 'timer');
      graph.addEdge('pool', 'hub');

      expect(graph.edgesOf('pool')).toEqual(['timer', 'hub']);
      expect(graph.edgesOf('unknown')).toEqual([]);
      // Only the dependent node is created
      expect([...graph]).toEqual(['pool']);
    });
  });

  describe('topsort', () => {
    test('orders required nodes first', () => {
      const graph = new DependencyGraph([
        ['pool', ['timer']],
        ['timer', []],
      ]);

      expect(graph.topsort()).toEqual(['timer', 'pool']);
    });

    test('keeps insertion order between unrelated nodes', () => {
      const graph = new DependencyGraph([
        ['c', []],
        ['b', []],
        ['a', []],
      ]);

      expect(graph.topsort()).toEqual(['c', 'b', 'a']);
    });

    test('resolves a diamond with stable tie-breaks', () => {
      const graph = new DependencyGraph([
        ['d', ['b', 'c']],
        ['b', ['a']],
        ['c', ['a']],
        ['a', []],
      ]);

      expect(graph.topsort()).toEqual(['a', 'b', 'c', 'd']);
    });

    test('returns an empty order for an empty graph', () => {
      expect(new DependencyGraph().topsort()).toEqual([]);
    });

    test('throws MissingDependencyError for an unknown required node', () => {
      const graph = new DependencyGraph([['pool', ['timer']]], 'worker');

      expect(() => graph.topsort()).toThrow(MissingDependencyError);
      expect(() => graph.topsort()).toThrow(
        'Component "pool" requires "timer", but it is not registered in namespace "worker".',
      );
    });

    test('throws DependencyCycleError naming the cycle', () => {
      const graph = new DependencyGraph(
        [
          ['a', ['b']],
          ['b', ['a']],
          ['c', []],
        ],
        'worker',
      );

      let caught: unknown;
      try {
        graph.topsort();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(DependencyCycleError);
      if (caught instanceof DependencyCycleError) {
        expect(caught.additionalInfo.cycle).toEqual(['a', 'b']);
        expect(caught.message).toBe(
          'Circular dependency detected in namespace "worker": a -> b -> a',
        );
      }
    });

    test('detects a node that requires itself', () => {
      const graph = new DependencyGraph();
      graph.addEdge('a', 'a');

      expect(() => graph.topsort()).toThrow('Circular dependency detected: a -> a');
    });
  });

  describe('findCycle', () => {
    test('returns an empty array for an acyclic graph', () => {
      const graph = new DependencyGraph([
        ['b', ['a']],
        ['a', []],
      ]);

      expect(graph.findCycle()).toEqual([]);
    });

    test('returns only the nodes on the cycle', () => {
      const graph = new DependencyGraph([
        ['entry', ['x']],
        ['x', ['y']],
        ['y', ['z']],
        ['z', ['x']],
      ]);

      expect(graph.findCycle()).toEqual(['x', 'y', 'z']);
    });
  });

  test('formatAsDOT renders nodes and edges', () => {
    const graph = new DependencyGraph([
      ['timer', []],
      ['pool', ['timer']],
    ]);

    expect(graph.formatAsDOT()).toBe(
      ['digraph "dependencies" {', '  "timer";', '  "pool" -> "timer";', '}'].join('\n'),
    );
    expect(graph.formatAsDOT('worker').split('\n')[0]).toBe('digraph "worker" {');
  });
});
