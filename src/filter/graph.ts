import type { ComparisonOperator, Connective } from '../edm/types.js';

/**
 * Integer handle of a node, unique across all node kinds of one graph and
 * never reused, even after the node is removed.
 */
export type NodeId = number;

export interface FunctionCall {
  readonly name: string;
  /** Names of the properties passed as arguments. */
  readonly properties: readonly string[];
  /** Literal arguments, in call order. */
  readonly params: readonly string[];
}

/** Leaf predicate: `name operator operand`. */
export interface PartNode {
  readonly kind: 'part';
  readonly id: NodeId;
  leftId?: NodeId;
  rightId?: NodeId;
  /** Property name, or the full call text for function predicates. */
  name: string;
  operator: ComparisonOperator;
  operand: string;
  func?: FunctionCall;
}

export interface LogicalNode {
  readonly kind: 'logical';
  readonly id: NodeId;
  connective: Connective;
  leftId?: NodeId;
  rightId?: NodeId;
  /** Group whose parentheses directly enclose this connective. */
  groupId?: NodeId;
}

export interface GroupNode {
  readonly kind: 'group';
  readonly id: NodeId;
  /** Connectives directly inside the parentheses, in creation order. */
  memberIds: NodeId[];
  leftId?: NodeId;
  rightId?: NodeId;
}

export type GraphNode = PartNode | LogicalNode | GroupNode;

export interface NewPart {
  name: string;
  operator: ComparisonOperator;
  operand: string;
  func?: FunctionCall;
}

/**
 * Mutable node-and-link representation of one boolean filter expression.
 * Nodes reference each other only by id, so an external process may remove
 * or relink nodes between generation and rendering.
 */
export class ExpressionGraph {
  private _parts: PartNode[] = [];
  private _logicals: LogicalNode[] = [];
  private _groups: GroupNode[] = [];
  private readonly index: Map<NodeId, GraphNode> = new Map();
  private nextId: NodeId = 1;

  get parts(): readonly PartNode[] {
    return this._parts;
  }

  /** Connectives; reversed once generation finishes, so the last created comes first. */
  get logicals(): readonly LogicalNode[] {
    return this._logicals;
  }

  get groups(): readonly GroupNode[] {
    return this._groups;
  }

  get size(): number {
    return this.index.size;
  }

  get lastPart(): PartNode | undefined {
    return this._parts[this._parts.length - 1];
  }

  get lastLogical(): LogicalNode | undefined {
    return this._logicals[this._logicals.length - 1];
  }

  get lastGroup(): GroupNode | undefined {
    return this._groups[this._groups.length - 1];
  }

  addPart(part: NewPart): PartNode {
    const node: PartNode = { kind: 'part', id: this.allocateId(), ...part };
    this._parts.push(node);
    this.index.set(node.id, node);
    return node;
  }

  addLogical(connective: Connective): LogicalNode {
    const node: LogicalNode = { kind: 'logical', id: this.allocateId(), connective };
    this._logicals.push(node);
    this.index.set(node.id, node);
    return node;
  }

  addGroup(): GroupNode {
    const node: GroupNode = { kind: 'group', id: this.allocateId(), memberIds: [] };
    this._groups.push(node);
    this.index.set(node.id, node);
    return node;
  }

  has(id: NodeId): boolean {
    return this.index.has(id);
  }

  node(id: NodeId): GraphNode | undefined {
    return this.index.get(id);
  }

  part(id: NodeId): PartNode | undefined {
    const node = this.index.get(id);
    return node?.kind === 'part' ? node : undefined;
  }

  logical(id: NodeId): LogicalNode | undefined {
    const node = this.index.get(id);
    return node?.kind === 'logical' ? node : undefined;
  }

  group(id: NodeId): GroupNode | undefined {
    const node = this.index.get(id);
    return node?.kind === 'group' ? node : undefined;
  }

  /**
   * Removes a node. Links pointing at it are left as they are; repairing
   * them is the caller's job, otherwise rendering fails on the dangling id.
   */
  removeNode(id: NodeId): boolean {
    const node = this.index.get(id);
    if (node === undefined) {
      return false;
    }
    this.index.delete(id);
    switch (node.kind) {
      case 'part':
        this._parts = this._parts.filter((p) => p.id !== id);
        break;
      case 'logical':
        this._logicals = this._logicals.filter((l) => l.id !== id);
        break;
      case 'group':
        this._groups = this._groups.filter((g) => g.id !== id);
        break;
    }
    return true;
  }

  reverseLogicals(): void {
    this._logicals.reverse();
  }

  /** Deep copy with identical ids; the copy allocates ids after the source graph's. */
  clone(): ExpressionGraph {
    const copy = new ExpressionGraph();
    copy.nextId = this.nextId;
    for (const part of this._parts) {
      const node: PartNode = { ...part };
      if (part.func !== undefined) {
        node.func = {
          name: part.func.name,
          properties: [...part.func.properties],
          params: [...part.func.params],
        };
      }
      copy._parts.push(node);
      copy.index.set(node.id, node);
    }
    for (const logical of this._logicals) {
      const node: LogicalNode = { ...logical };
      copy._logicals.push(node);
      copy.index.set(node.id, node);
    }
    for (const group of this._groups) {
      const node: GroupNode = { ...group, memberIds: [...group.memberIds] };
      copy._groups.push(node);
      copy.index.set(node.id, node);
    }
    return copy;
  }

  private allocateId(): NodeId {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }
}
