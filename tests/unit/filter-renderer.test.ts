import { describe, it, expect } from 'vitest';
import { UnrenderableGraphError } from '../../src/errors.js';
import { ExpressionGraph, type GroupNode, type LogicalNode, type PartNode } from '../../src/filter/graph.js';
import { FilterOptionBuilder, buildFilterPart, renderFilter } from '../../src/filter/renderer.js';

function part(graph: ExpressionGraph, name: string, operand = '1'): PartNode {
  return graph.addPart({ name, operator: 'eq', operand });
}

function connect(left: PartNode | GroupNode, logical: LogicalNode, right: PartNode | GroupNode): void {
  logical.leftId = left.id;
  left.rightId = logical.id;
  logical.rightId = right.id;
  right.leftId = logical.id;
}

function enclose(group: GroupNode, logical: LogicalNode): void {
  logical.groupId = group.id;
  group.memberIds.push(logical.id);
}

function renderError(graph: ExpressionGraph): UnrenderableGraphError {
  try {
    renderFilter(graph);
  } catch (err) {
    if (err instanceof UnrenderableGraphError) return err;
    throw err;
  }
  throw new Error('expected rendering to fail');
}

/** A eq 1 and B eq 2 or C eq 3, connectives in generator order (last created first). */
function chain(): { graph: ExpressionGraph; a: PartNode; b: PartNode; c: PartNode; and: LogicalNode; or: LogicalNode } {
  const graph = new ExpressionGraph();
  const a = part(graph, 'A', '1');
  const and = graph.addLogical('and');
  const b = part(graph, 'B', '2');
  const or = graph.addLogical('or');
  const c = part(graph, 'C', '3');
  connect(a, and, b);
  connect(b, or, c);
  graph.reverseLogicals();
  return { graph, a, b, c, and, or };
}

describe('FilterOptionBuilder', () => {

  // ---------------------------------------------------------------------------
  // Well-formed graphs
  // ---------------------------------------------------------------------------
  describe('well-formed graphs', () => {
    it('renders a lone part', () => {
      const graph = new ExpressionGraph();
      part(graph, 'Name', "'x'");
      expect(renderFilter(graph)).toBe("Name eq 'x'");
    });

    it('renders a function part by its call text', () => {
      const graph = new ExpressionGraph();
      const p = graph.addPart({
        name: "startswith(Name, 'ab')",
        operator: 'eq',
        operand: 'true',
        func: { name: 'startswith', properties: ['Name'], params: ["'ab'"] },
      });
      expect(buildFilterPart(p)).toBe("startswith(Name, 'ab') eq true");
    });

    it('renders a flat chain left to right', () => {
      expect(renderFilter(chain().graph)).toBe('A eq 1 and B eq 2 or C eq 3');
    });

    it('renders an unmutated graph identically every time', () => {
      const { graph } = chain();
      expect(renderFilter(graph)).toBe(renderFilter(graph));
    });

    it('renders the same chain whichever connective comes first', () => {
      const { graph } = chain();
      graph.reverseLogicals();
      expect(renderFilter(graph)).toBe('A eq 1 and B eq 2 or C eq 3');
    });

    it('puts parentheses around a group', () => {
      const graph = new ExpressionGraph();
      const group = graph.addGroup();
      const a = part(graph, 'A', '1');
      const inner = graph.addLogical('and');
      const b = part(graph, 'B', '2');
      const outer = graph.addLogical('or');
      const c = part(graph, 'C', '3');
      enclose(group, inner);
      connect(a, inner, b);
      connect(group, outer, c);
      graph.reverseLogicals();
      expect(renderFilter(graph)).toBe('(A eq 1 and B eq 2) or C eq 3');
    });

    it('climbs out of a group on the right of its connective', () => {
      const graph = new ExpressionGraph();
      const a = part(graph, 'A', '1');
      const outer = graph.addLogical('and');
      const group = graph.addGroup();
      const b = part(graph, 'B', '2');
      const inner = graph.addLogical('or');
      const c = part(graph, 'C', '3');
      connect(a, outer, group);
      enclose(group, inner);
      connect(b, inner, c);
      graph.reverseLogicals();
      // logicals[0] is the inner connective
      expect(graph.logicals[0]).toBe(inner);
      expect(renderFilter(graph)).toBe('A eq 1 and (B eq 2 or C eq 3)');
    });

    it('renders nested groups', () => {
      const graph = new ExpressionGraph();
      const outerGroup = graph.addGroup();
      const innerGroup = graph.addGroup();
      const a = part(graph, 'A', '1');
      const l1 = graph.addLogical('and');
      const b = part(graph, 'B', '2');
      const l2 = graph.addLogical('or');
      const c = part(graph, 'C', '3');
      const l3 = graph.addLogical('and');
      const d = part(graph, 'D', '4');
      enclose(innerGroup, l1);
      connect(a, l1, b);
      enclose(outerGroup, l2);
      connect(innerGroup, l2, c);
      connect(outerGroup, l3, d);
      graph.reverseLogicals();
      expect(renderFilter(graph)).toBe('((A eq 1 and B eq 2) or C eq 3) and D eq 4');
    });

    it('renders a group that is the whole expression', () => {
      const graph = new ExpressionGraph();
      const group = graph.addGroup();
      const a = part(graph, 'A', '1');
      const logical = graph.addLogical('and');
      const b = part(graph, 'B', '2');
      enclose(group, logical);
      connect(a, logical, b);
      expect(renderFilter(graph)).toBe('(A eq 1 and B eq 2)');
    });

    it('memoizes build()', () => {
      const { graph, a } = chain();
      const builder = new FilterOptionBuilder(graph);
      const first = builder.build();
      a.operand = '9';
      expect(builder.build()).toBe(first);
      expect(renderFilter(graph)).toBe('A eq 9 and B eq 2 or C eq 3');
    });
  });

  // ---------------------------------------------------------------------------
  // Mutated graphs
  // ---------------------------------------------------------------------------
  describe('mutated graphs', () => {
    it('reflects edited operands and operators', () => {
      const { graph, b } = chain();
      b.operator = 'ne';
      b.operand = '20';
      expect(renderFilter(graph)).toBe('A eq 1 and B ne 20 or C eq 3');
    });

    it('fails on a connective whose operand was removed', () => {
      const graph = new ExpressionGraph();
      const a = part(graph, 'A', '1');
      const logical = graph.addLogical('and');
      const b = part(graph, 'B', '2');
      connect(a, logical, b);
      graph.removeNode(b.id);
      const err = renderError(graph);
      expect(err.nodeId).toBe(b.id);
      expect(err.message).toBe(`Node ${logical.id} references missing node ${b.id}`);
    });

    it('hangs a detached first connective off the rendered rest', () => {
      const { graph, b } = chain();
      delete b.leftId;
      expect(renderFilter(graph)).toBe('A eq 1 and (B eq 2 or C eq 3)');
    });

    it('fails when a connective in the middle is cut off from both sides', () => {
      const graph = new ExpressionGraph();
      const a = part(graph, 'A', '1');
      const first = graph.addLogical('and');
      const b = part(graph, 'B', '2');
      const middle = graph.addLogical('or');
      const c = part(graph, 'C', '3');
      const last = graph.addLogical('and');
      const d = part(graph, 'D', '4');
      connect(a, first, b);
      connect(b, middle, c);
      connect(c, last, d);
      graph.reverseLogicals();
      delete b.rightId;
      delete c.leftId;
      const err = renderError(graph);
      expect(err.nodeId).toBe(middle.id);
      expect(err.message).toBe(`Connective ${middle.id} is not reachable from the rendered expression`);
    });

    it('fails when a connective lost its right operand', () => {
      const graph = new ExpressionGraph();
      const a = part(graph, 'A', '1');
      const logical = graph.addLogical('or');
      logical.leftId = a.id;
      a.rightId = logical.id;
      expect(() => renderFilter(graph)).toThrow(`Connective ${logical.id} has no right operand`);
    });

    it('fails when an operand link points at a connective', () => {
      const { graph, and, or } = chain();
      or.leftId = and.id;
      expect(() => renderFilter(graph)).toThrow(`Node ${or.id} expects an operand but ${and.id} is a connective`);
    });

    it('fails instead of looping on a cycle', () => {
      const { graph, a, and } = chain();
      a.leftId = and.id;
      expect(() => renderFilter(graph)).toThrow(`Connective ${and.id} is reached twice`);
    });

    it('fails on an empty group', () => {
      const graph = new ExpressionGraph();
      const a = part(graph, 'A', '1');
      const logical = graph.addLogical('and');
      const group = graph.addGroup();
      connect(a, logical, group);
      expect(() => renderFilter(graph)).toThrow(`Group ${group.id} has no connectives`);
    });
  });

  // ---------------------------------------------------------------------------
  // Degenerate graphs
  // ---------------------------------------------------------------------------
  describe('degenerate graphs', () => {
    it('fails on a graph without parts', () => {
      expect(() => renderFilter(new ExpressionGraph())).toThrow('Expression graph has no parts');
    });

    it('fails on parts without a connective', () => {
      const graph = new ExpressionGraph();
      part(graph, 'A');
      part(graph, 'B');
      expect(() => renderFilter(graph)).toThrow('Expression graph has 2 parts but no connective');
    });
  });
});
