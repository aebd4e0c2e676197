import { UnrenderableGraphError } from '../errors.js';
import type { ExpressionGraph, GroupNode, LogicalNode, NodeId, PartNode } from './graph.js';

export function buildFilterPart(part: PartNode): string {
  return `${part.name} ${part.operator} ${part.operand}`;
}

/**
 * Rebuilds the filter string of an expression graph from its links alone,
 * so the result does not depend on the order in which nodes were created.
 *
 * One builder renders one snapshot of a graph: `build()` is memoized, so
 * render a mutated graph with a new builder (or `renderFilter`).
 */
export class FilterOptionBuilder {
  private optionString: string | null = null;
  private readonly usedLogicals = new Set<NodeId>();
  private readonly openGroups = new Set<NodeId>();

  constructor(private readonly option: ExpressionGraph) {}

  build(): string {
    if (this.optionString === null) {
      this.optionString = this.buildAll();
    }
    return this.optionString;
  }

  private buildAll(): string {
    const parts = this.option.parts;
    const [onlyPart] = parts;
    if (onlyPart === undefined) {
      throw new UnrenderableGraphError('Expression graph has no parts');
    }
    const first = this.option.logicals[0];
    if (parts.length === 1 && first === undefined) {
      return buildFilterPart(onlyPart);
    }
    if (first === undefined) {
      throw new UnrenderableGraphError(`Expression graph has ${parts.length} parts but no connective`);
    }
    const root = this.outermost(first);
    const optionString = root.kind === 'group' ? this.buildGroup(root) : this.buildLogical(root);
    const repaired = this.checkLastLogical(optionString);
    this.checkAllConsumed();
    return repaired;
  }

  /**
   * Climbs from a connective to the top-level one: while the connective sits
   * inside a group, continue with the connective next to that group.
   * A group with no neighbours is returned as the root itself.
   */
  private outermost(logical: LogicalNode): LogicalNode | GroupNode {
    const visited = new Set<NodeId>();
    let current = logical;
    while (current.groupId !== undefined) {
      if (visited.has(current.groupId)) {
        throw new UnrenderableGraphError(`Group ${current.groupId} encloses itself`, current.groupId);
      }
      visited.add(current.groupId);
      const group = this.requireGroup(current.groupId, current.id);
      const outer = group.leftId ?? group.rightId;
      if (outer === undefined) {
        return group;
      }
      current = this.requireLogical(outer, group.id);
    }
    return current;
  }

  /**
   * Repair for mutated graphs: when the first connective ever created was
   * cut off from the rest, hang the rendered text off its right side.
   */
  private checkLastLogical(optionString: string): string {
    const last = this.option.logicals[this.option.logicals.length - 1];
    if (last === undefined || this.usedLogicals.has(last.id)) {
      return optionString;
    }
    this.consume(last);
    return `${this.buildLeft(last)} ${last.connective} (${optionString})`;
  }

  private checkAllConsumed(): void {
    const dropped = this.option.logicals.find((logical) => !this.usedLogicals.has(logical.id));
    if (dropped !== undefined) {
      throw new UnrenderableGraphError(
        `Connective ${dropped.id} is not reachable from the rendered expression`,
        dropped.id,
      );
    }
  }

  private buildLogical(logical: LogicalNode): string {
    this.consume(logical);
    return `${this.buildLeft(logical)} ${logical.connective} ${this.buildRight(logical)}`;
  }

  /** Left operand of a connective plus everything chained further left of it. */
  private buildLeft(logical: LogicalNode): string {
    if (logical.leftId === undefined) {
      throw new UnrenderableGraphError(`Connective ${logical.id} has no left operand`, logical.id);
    }
    const element = this.requireElement(logical.leftId, logical.id);
    let generated = this.buildElement(element);
    if (element.leftId !== undefined) {
      const previous = this.requireLogical(element.leftId, element.id);
      this.consume(previous);
      generated = `${this.buildLeft(previous)} ${previous.connective} ${generated}`;
    }
    return generated;
  }

  /** Right operand of a connective plus everything chained further right of it. */
  private buildRight(logical: LogicalNode): string {
    if (logical.rightId === undefined) {
      throw new UnrenderableGraphError(`Connective ${logical.id} has no right operand`, logical.id);
    }
    const element = this.requireElement(logical.rightId, logical.id);
    let generated = this.buildElement(element);
    if (element.rightId !== undefined) {
      const next = this.requireLogical(element.rightId, element.id);
      this.consume(next);
      generated = `${generated} ${next.connective} ${this.buildRight(next)}`;
    }
    return generated;
  }

  private buildElement(element: PartNode | GroupNode): string {
    return element.kind === 'part' ? buildFilterPart(element) : this.buildGroup(element);
  }

  private buildGroup(group: GroupNode): string {
    const firstId = group.memberIds[0];
    if (firstId === undefined) {
      throw new UnrenderableGraphError(`Group ${group.id} has no connectives`, group.id);
    }
    if (this.openGroups.has(group.id)) {
      throw new UnrenderableGraphError(`Group ${group.id} contains itself`, group.id);
    }
    this.openGroups.add(group.id);
    const inner = this.buildLogical(this.requireLogical(firstId, group.id));
    this.openGroups.delete(group.id);
    return `(${inner})`;
  }

  private consume(logical: LogicalNode): void {
    if (this.usedLogicals.has(logical.id)) {
      throw new UnrenderableGraphError(`Connective ${logical.id} is reached twice`, logical.id);
    }
    this.usedLogicals.add(logical.id);
  }

  private requireElement(id: NodeId, referrer: NodeId): PartNode | GroupNode {
    const node = this.option.node(id);
    if (node === undefined) {
      throw new UnrenderableGraphError(`Node ${referrer} references missing node ${id}`, id);
    }
    if (node.kind === 'logical') {
      throw new UnrenderableGraphError(`Node ${referrer} expects an operand but ${id} is a connective`, id);
    }
    return node;
  }

  private requireLogical(id: NodeId, referrer: NodeId): LogicalNode {
    const node = this.option.logical(id);
    if (node === undefined) {
      throw new UnrenderableGraphError(`Node ${referrer} references missing connective ${id}`, id);
    }
    return node;
  }

  private requireGroup(id: NodeId, referrer: NodeId): GroupNode {
    const node = this.option.group(id);
    if (node === undefined) {
      throw new UnrenderableGraphError(`Node ${referrer} references missing group ${id}`, id);
    }
    return node;
  }
}

/** Renders a graph with a fresh builder. */
export function renderFilter(option: ExpressionGraph): string {
  return new FilterOptionBuilder(option).build();
}
