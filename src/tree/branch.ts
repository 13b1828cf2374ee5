import type { TurnContext } from '../context/turn-context';
import type { Expression } from '../scenario';
import type { DialogNode } from './node';

/**
 * A named group of nodes resolved into its parent branch
 */
export class Subtree {
  readonly kind = 'subtree' as const;

  constructor(
    readonly name: string,
    /** Gates the whole group */
    readonly guard: Expression,
    readonly nodes: Branch
  ) {}
}

export type BranchItem = DialogNode | Subtree;

/**
 * An ordered list of nodes and subtrees
 */
export class Branch {
  constructor(readonly items: readonly BranchItem[]) {}

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Enumerate nodes in declaration order, expanding subtrees whose
   * guard holds
   */
  *nodes(ctx: TurnContext): Generator<DialogNode, void, undefined> {
    for (const item of this.items) {
      if (item.kind === 'node') {
        yield item;
      } else if (item.guard.test(ctx)) {
        yield* item.nodes.nodes(ctx);
      }
    }
  }
}
