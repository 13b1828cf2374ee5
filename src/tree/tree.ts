/**
 * Immutable tree of dialog nodes built once from definitions
 */

import type {
  DialogDefinition,
  DialogNodeDefinition,
  NodeDefinition,
  SubtreeDefinition,
  SubtreeRefDefinition,
} from '../types/dialog.types';
import { TreeError } from '../errors';
import { logger } from '../logger';
import { Expression } from '../scenario';
import { DialogDefinitionSchema } from '../schema/definition-schema';
import { formatIssues } from '../schema/format-issues';
import { Branch, BranchItem, Subtree } from './branch';
import { DialogNode } from './node';

/**
 * A tree of nodes with a catalog of labeled nodes
 *
 * @example
 * ```typescript
 * const tree = new Tree([
 *   {
 *     label: 'greeting',
 *     condition: (ctx) => ctx.intents.get('greeting'),
 *     response: 'Hello! What is your name?',
 *     followup: [{ condition: true, response: 'Nice to meet you!' }],
 *   },
 * ]);
 * ```
 */
export class Tree {
  /**
   * Validate the definition and build a tree
   *
   * @throws TreeError when the definition is malformed or inconsistent
   */
  static fromDefinition(definition: unknown): Tree {
    const parsed = DialogDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw new TreeError(
        `Invalid dialog definition: ${formatIssues(parsed.error)}`
      );
    }
    return new Tree(parsed.data.dialog, parsed.data.subtrees ?? []);
  }

  private readonly labeled = new Map<string, DialogNode>();
  readonly rootNodes: Branch;

  /** Subtree definitions by name, `null` once the subtree is used */
  private subtreeMap: Map<string, SubtreeDefinition | null> | null = null;

  constructor(
    dialog: DialogDefinition['dialog'],
    subtrees: readonly SubtreeDefinition[] = []
  ) {
    const subtreeMap = new Map<string, SubtreeDefinition | null>();
    for (const subtree of subtrees) {
      if (subtreeMap.has(subtree.name)) {
        throw new TreeError(`Duplicate subtree name '${subtree.name}'`);
      }
      subtreeMap.set(subtree.name, subtree);
    }
    this.subtreeMap = subtreeMap;

    this.rootNodes = this.createBranch(dialog, null);

    const unused = [...subtreeMap].filter(([, d]) => d !== null).map(([n]) => n);
    if (unused.length > 0) {
      logger.warn({ event: 'unused_subtrees', subtrees: unused.join(', ') });
    }
    this.subtreeMap = null;
  }

  /** Labeled nodes by label */
  get catalog(): ReadonlyMap<string, DialogNode> {
    return this.labeled;
  }

  /**
   * Create a branch: an enumeration of nodes and subtrees
   */
  createBranch(
    definitions: readonly DialogNodeDefinition[],
    parent: DialogNode | null
  ): Branch {
    const items: BranchItem[] = definitions.map((d) =>
      'subtree' in d ? this.createSubtree(d, parent) : this.createNode(d, parent)
    );
    for (const item of items) {
      if (item.kind === 'node') {
        item.attachSiblings(items);
      }
    }
    return new Branch(items);
  }

  private createSubtree(
    definition: SubtreeRefDefinition,
    parent: DialogNode | null
  ): Subtree {
    if (!this.subtreeMap) {
      throw new TreeError('The tree is already built');
    }
    const name = definition.subtree;
    if (!this.subtreeMap.has(name)) {
      throw new TreeError(`Sub-tree '${name}' not found`);
    }
    const subtree = this.subtreeMap.get(name);
    if (!subtree) {
      throw new TreeError(`Sub-tree '${name}' already used`);
    }
    this.subtreeMap.set(name, null);

    return new Subtree(
      name,
      Expression.compile(subtree.guard ?? true),
      this.createBranch(subtree.nodes, parent)
    );
  }

  private createNode(
    definition: NodeDefinition,
    parent: DialogNode | null
  ): DialogNode {
    const node = new DialogNode(definition, this, parent);
    if (node.label !== undefined) {
      if (this.labeled.has(node.label)) {
        throw new TreeError(`Duplicate node label '${node.label}'`);
      }
      this.labeled.set(node.label, node);
    }
    return node;
  }
}
