import type { Transition } from '../constants';
import type { NodeStackEntry } from '../schema/state-schema';
import { FlowError } from '../errors';
import type { DialogNode } from './node';
import type { Tree } from './tree';

export type FocusedNode = {
  node: DialogNode;
  transition: Transition;
};

/**
 * Holds the current and digressed nodes
 *
 * A view over the `[label, transition]` list stored in the dialog state,
 * all changes are made in place.
 */
export class NodeStack {
  constructor(
    private readonly stack: NodeStackEntry[],
    private readonly tree: Tree
  ) {}

  get entries(): readonly NodeStackEntry[] {
    return this.stack;
  }

  /**
   * Drop nodes that were removed from the tree
   */
  gc(): void {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      if (!this.tree.catalog.has(this.stack[i][0])) {
        this.stack.splice(i, 1);
      }
    }
  }

  /**
   * Push the node on top of the stack, removing its other occurrences
   */
  push(node: DialogNode, transition: Transition): void {
    if (node.label === undefined) {
      throw new FlowError(`Node ${node.title} has no label to keep it in focus`);
    }
    this.remove(node);
    this.stack.push([node.label, transition]);
  }

  /**
   * Remove and return the node from the top of the stack
   */
  pop(): FocusedNode | null {
    const entry = this.stack.pop();
    return entry ? this.resolve(entry) : null;
  }

  /**
   * Return the node from the top of the stack
   */
  peek(): FocusedNode | null {
    const entry = this.stack[this.stack.length - 1];
    return entry ? this.resolve(entry) : null;
  }

  /**
   * Remove the node from the stack
   *
   * @returns whether the node was found on the stack
   */
  remove(node: DialogNode): boolean {
    let found = false;
    for (let i = this.stack.length - 1; i >= 0; i--) {
      if (this.stack[i][0] === node.label) {
        this.stack.splice(i, 1);
        found = true;
      }
    }
    return found;
  }

  clear(): void {
    this.stack.length = 0;
  }

  private resolve([label, transition]: NodeStackEntry): FocusedNode {
    const node = this.tree.catalog.get(label);
    if (!node) {
      throw new FlowError(`Unknown node label '${label}' on the stack`);
    }
    return { node, transition };
  }
}
