import type { NodeDefinition, NodeSettings } from '../types/dialog.types';
import type { SlotFillingState } from '../schema/state-schema';
import { Expression, Scenario } from '../scenario';
import { TreeError } from '../errors';
import { FlowComponent } from '../flows/flow-component';
import { SlotFilling } from '../flows/slot-filling';
import { Branch, BranchItem } from './branch';
import type { Tree } from './tree';

const DEFAULT_SETTINGS: NodeSettings = {
  afterDigressionFollowup: 'allow_return',
};

/**
 * Node of the dialog tree
 */
export class DialogNode {
  readonly kind = 'node' as const;
  readonly label?: string;
  readonly condition: Expression;
  readonly response: Scenario;
  readonly followup: Branch;
  readonly slotFilling: FlowComponent<SlotFillingState> | null = null;
  readonly settings: NodeSettings;

  private siblings: readonly BranchItem[] = [];
  private rightSiblings?: Branch;

  constructor(
    definition: NodeDefinition,
    tree: Tree,
    readonly parent: DialogNode | null
  ) {
    this.label = definition.label;
    this.condition = Expression.compile(definition.condition);
    this.response = Scenario.compile(definition.response);
    this.settings = {
      afterDigressionFollowup:
        definition.settings?.afterDigressionFollowup ??
        DEFAULT_SETTINGS.afterDigressionFollowup,
    };

    if (
      definition.label === undefined &&
      (definition.followup !== undefined || definition.slotFilling !== undefined)
    ) {
      throw new TreeError(
        `Stateful node must have a label (node ${this.condition.source})`
      );
    }

    this.followup = tree.createBranch(definition.followup ?? [], this);

    if (definition.label !== undefined && definition.slotFilling) {
      this.slotFilling = new FlowComponent(
        definition.label,
        new SlotFilling(definition.slotFilling, definition.slotHandlers ?? [])
      );
    }
  }

  /**
   * Attach the items of the branch the node belongs to
   */
  attachSiblings(items: readonly BranchItem[]): void {
    this.siblings = items;
    this.rightSiblings = undefined;
  }

  /**
   * The node itself and its next siblings on the tree
   */
  meAndRightSiblings(): Branch {
    if (!this.rightSiblings) {
      this.rightSiblings = new Branch(
        this.siblings.slice(this.siblings.indexOf(this))
      );
    }
    return this.rightSiblings;
  }

  /**
   * Whether the dialog may return to the node after a digression
   * triggered after its response
   */
  get followupAllowReturn(): boolean {
    return this.settings.afterDigressionFollowup === 'allow_return';
  }

  /**
   * Human readable unique title of the node
   */
  get title(): string {
    if (this.label !== undefined) {
      return `'${this.label}'`;
    }
    if (this.parent) {
      return `${this.parent.title} -> ${this.condition.source}`;
    }
    return this.condition.source;
  }

  toString(): string {
    return this.title;
  }
}
