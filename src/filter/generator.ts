import { FUNCTION_WEIGHT, LOGICAL_OPERATORS, RECURSION_LIMIT } from '../constants.js';
import type { FilterProperty } from '../edm/types.js';
import { GeneratorConfigurationError } from '../errors.js';
import { type RandomSource, choice, coin, weightEntries, weightedChoice } from '../random.js';
import { type CategorySelection, type FunctionCategoryName, FilterFunctionsGroup } from './functions.js';
import { ExpressionGraph, type GroupNode, type LogicalNode, type PartNode } from './graph.js';
import { NestingStack } from './stack.js';

export interface FilterQueryOptions {
  random: RandomSource;
  /** Deepest level at which a group may still open. */
  recursionLimit?: number;
  /** Probability of a function call instead of a bare property. */
  functionWeight?: number;
  excludedFunctions?: ReadonlySet<string>;
  categorySelection?: CategorySelection;
  categoryWeights?: Readonly<Partial<Record<FunctionCategoryName, number>>>;
}

/**
 * Random `$filter` generator for one entity set.
 *
 * Grammar, expanded recursively with a fair coin at every choice:
 * ```
 * expression := element | child
 * child      := parent logical parent
 * parent     := expression | child | "(" child ")"
 * element    := (function-call | property) operator operand
 * ```
 * Every `child` goes one level deeper; past `recursionLimit` only the
 * terminal branch is taken, so groups never nest deeper than the limit.
 */
export class FilterQuery {
  readonly functions: FilterFunctionsGroup;
  private readonly random: RandomSource;
  private readonly recursionLimit: number;
  private readonly functionWeight: number;

  private option: ExpressionGraph = new ExpressionGraph();
  private groupsStack: NestingStack<GroupNode> = new NestingStack();
  private finalizingGroups = 0;
  private rightPart = false;
  private _optionString = '';

  constructor(
    readonly entitySetName: string,
    private readonly properties: readonly FilterProperty[],
    options: FilterQueryOptions,
  ) {
    this.random = options.random;
    this.recursionLimit = options.recursionLimit ?? RECURSION_LIMIT;
    this.functionWeight = options.functionWeight ?? FUNCTION_WEIGHT;
    this.functions = new FilterFunctionsGroup(properties, {
      random: options.random,
      ...(options.excludedFunctions !== undefined ? { excludedFunctions: options.excludedFunctions } : {}),
      ...(options.categorySelection !== undefined ? { selection: options.categorySelection } : {}),
      ...(options.categoryWeights !== undefined ? { weights: options.categoryWeights } : {}),
    });
    if (properties.length === 0 && this.functions.isEmpty) {
      throw new GeneratorConfigurationError(entitySetName);
    }
  }

  /** Text emitted by the last generate() call, before any external mutation. */
  get optionString(): string {
    return this._optionString;
  }

  generate(): ExpressionGraph {
    this.initVariables();
    this.expression(0);
    this.option.reverseLogicals();
    return this.option;
  }

  private initVariables(): void {
    this.option = new ExpressionGraph();
    this.groupsStack = new NestingStack();
    this.finalizingGroups = 0;
    this.rightPart = false;
    this._optionString = '';
  }

  private terminates(depth: number): boolean {
    return depth > this.recursionLimit || coin(this.random);
  }

  private expression(depth: number): void {
    if (this.terminates(depth)) {
      this.element();
    } else {
      this.child(depth);
    }
  }

  private parent(depth: number): void {
    if (this.terminates(depth)) {
      this.expression(depth);
    } else if (coin(this.random)) {
      this.child(depth);
    } else {
      this.childGroup(depth);
    }
  }

  private child(depth: number): void {
    this.parent(depth + 1);
    this.logical();
    this.parent(depth + 1);
  }

  private childGroup(depth: number): void {
    this._optionString += '(';
    const group = this.option.addGroup();
    if (this.rightPart) {
      this.rightPart = false;
      const logical = this.requireLastLogical();
      logical.rightId = group.id;
      group.leftId = logical.id;
    }
    this.groupsStack.push(group);
    this.child(depth);
    this.finalizingGroups += 1;
    this._optionString += ')';
  }

  private logical(): void {
    const connective = weightedChoice(this.random, weightEntries(LOGICAL_OPERATORS));
    this._optionString += ` ${connective} `;
    const logical = this.option.addLogical(connective);

    // Left neighbour: the outermost group closed since the previous
    // connective, otherwise the last part.
    const left = this.finalizingGroups > 0
      ? this.groupsStack.pop(this.finalizingGroups)
      : this.option.lastPart;
    this.finalizingGroups = 0;
    if (left === undefined) {
      throw new Error('Connective generated without a left operand');
    }
    logical.leftId = left.id;
    left.rightId = logical.id;

    const owner = this.groupsStack.top();
    if (owner !== undefined) {
      logical.groupId = owner.id;
      owner.memberIds.push(logical.id);
    }
    this.rightPart = true;
  }

  private element(): void {
    const part = this.random.next() < this.functionWeight && !this.functions.isEmpty
      ? this.functionPart()
      : this.propertyPart();
    this._optionString += `${part.name} ${part.operator} ${part.operand}`;

    if (this.rightPart) {
      this.rightPart = false;
      const logical = this.requireLastLogical();
      logical.rightId = part.id;
      part.leftId = logical.id;
    }
  }

  private functionPart(): PartNode {
    const fn = this.functions.generate();
    const operator = weightedChoice(this.random, weightEntries(fn.returnType.operators));
    const operand = fn.returnType.generate();
    return this.option.addPart({
      name: fn.text,
      operator,
      operand,
      func: {
        name: fn.name,
        properties: fn.properties.map((p) => p.name),
        params: [...fn.params],
      },
    });
  }

  private propertyPart(): PartNode {
    if (this.properties.length === 0) {
      return this.functionPart();
    }
    const property = choice(this.random, this.properties);
    const operator = weightedChoice(this.random, weightEntries(property.operators()));
    const operand = property.generate();
    return this.option.addPart({ name: property.name, operator, operand });
  }

  private requireLastLogical(): LogicalNode {
    const logical = this.option.lastLogical;
    if (logical === undefined) {
      throw new Error('Right operand generated without a pending connective');
    }
    return logical;
  }
}
