/**
 * Results of intent and entity recognition as seen by conditions and
 * slot expressions
 *
 * Recognition itself is done outside of the engine, these classes only
 * provide convenient lookups: an unknown name is an error, a known name
 * that was not recognized is falsy.
 */

import { FlowError } from '../errors';

/**
 * An intent recognized from the user utterance
 */
export class RecognizedIntent {
  constructor(
    /** The name of the intent */
    readonly name: string,
    /** How confident the recognizer is, in the range (0, 1] */
    readonly confidence: number
  ) {}
}

export type IntentDefinition = { name: string };

/**
 * The result of intent recognition in the user utterance
 */
export class IntentsResult {
  /**
   * Create an instance from the list of recognized intents
   *
   * @param topThreshold - minimum confidence for the `top` intent
   * @param definitions - all intents known to the bot, enables strict name lookups
   */
  static resolve(
    intents: readonly RecognizedIntent[],
    options: {
      topThreshold?: number;
      definitions?: readonly IntentDefinition[];
    } = {}
  ): IntentsResult {
    const { topThreshold = 0.5, definitions } = options;
    const ranking = [...intents].sort((a, b) => b.confidence - a.confidence);
    let top: RecognizedIntent | null = ranking[0] ?? null;
    if (top && top.confidence < topThreshold) {
      top = null;
    }
    return new IntentsResult(top, ranking, definitions);
  }

  private readonly known?: ReadonlySet<string>;

  constructor(
    /** The intent with the highest confidence above the threshold */
    readonly top: RecognizedIntent | null = null,
    /** All recognized intents in descending order of confidence */
    readonly ranking: readonly RecognizedIntent[] = [],
    definitions?: readonly IntentDefinition[]
  ) {
    if (definitions) {
      this.known = new Set(definitions.map((d) => d.name));
    }
  }

  /** True when no intent is recognized */
  get irrelevant(): boolean {
    return !this.top;
  }

  /**
   * Return the top intent if it has the given name
   *
   * @throws FlowError when definitions are known and the name is not among them
   */
  get(name: string): RecognizedIntent | null {
    if (this.known && !this.known.has(name)) {
      throw new FlowError(`No such intent: '${name}'.`);
    }
    if (this.top && this.top.name === name) {
      return this.top;
    }
    return null;
  }
}

/**
 * An entity recognized from the user utterance
 */
export class RecognizedEntity {
  constructor(
    readonly name: string,
    readonly value: string | number,
    /** How exactly the entity was present in the utterance */
    readonly literal: string,
    readonly startChar: number,
    readonly endChar: number
  ) {}
}

export type EntityDefinition = {
  name: string;
  values?: readonly { name: string }[];
};

/**
 * All entities with the same name recognized from the user utterance
 */
export class EntitiesProxy {
  constructor(
    readonly allObjects: readonly RecognizedEntity[],
    readonly definition?: EntityDefinition
  ) {}

  get allValues(): (string | number)[] {
    return this.allObjects.map((e) => e.value);
  }

  get first(): RecognizedEntity | null {
    return this.allObjects[0] ?? null;
  }

  /** Value of the first entity */
  get value(): string | number | undefined {
    return this.first?.value;
  }

  /** Literal of the first entity */
  get literal(): string | undefined {
    return this.first?.literal;
  }

  /** Whether any entity is recognized */
  get recognized(): boolean {
    return this.allObjects.length > 0;
  }

  /**
   * Check that the value is among the recognized ones
   *
   * @throws FlowError when the value is neither recognized nor defined
   */
  has(value: string): boolean {
    if (this.allValues.includes(value)) {
      return true;
    }
    if (this.definition?.values?.some((v) => v.name === value)) {
      return false;
    }
    throw new FlowError(
      `No such value '${value}' for entity '${this.definition?.name ?? this.first?.name ?? '?'}'.`
    );
  }
}

/**
 * The result of entity recognition in the user utterance
 */
export class EntitiesResult {
  /**
   * Create an instance from entities in the order they appear in the utterance
   */
  static resolve(
    entities: readonly RecognizedEntity[],
    definitions?: readonly EntityDefinition[]
  ): EntitiesResult {
    const grouped = new Map<string, RecognizedEntity[]>();
    for (const entity of entities) {
      const group = grouped.get(entity.name) ?? [];
      group.push(entity);
      grouped.set(entity.name, group);
    }
    const byName = new Map(definitions?.map((d) => [d.name, d]));
    const proxies = new Map<string, EntitiesProxy>();
    for (const [name, objects] of grouped) {
      proxies.set(name, new EntitiesProxy(objects, byName.get(name)));
    }
    for (const definition of definitions ?? []) {
      if (!proxies.has(definition.name)) {
        proxies.set(definition.name, new EntitiesProxy([], definition));
      }
    }
    return new EntitiesResult(proxies, entities);
  }

  constructor(
    readonly proxies: ReadonlyMap<string, EntitiesProxy> = new Map(),
    readonly allObjects: readonly RecognizedEntity[] = []
  ) {}

  /**
   * Entities that matched the name
   *
   * @throws FlowError for a name that is neither recognized nor defined
   */
  get(name: string): EntitiesProxy {
    const proxy = this.proxies.get(name);
    if (!proxy) {
      throw new FlowError(`No such entity: '${name}'.`);
    }
    return proxy;
  }
}

/**
 * Turn a `checkFor` result into a value stored in a slot
 *
 * Entities are unwrapped to their value, intents become `true`.
 */
export function unwrapSlotValue(value: unknown): unknown {
  if (value instanceof EntitiesProxy || value instanceof RecognizedEntity) {
    return value.value;
  }
  if (value instanceof RecognizedIntent) {
    return true;
  }
  return value;
}

/**
 * Whether a value counts as found
 *
 * Entity proxies with no entities are falsy, as are empty strings and
 * empty collections.
 */
export function isTruthy(value: unknown): boolean {
  if (value instanceof EntitiesProxy) {
    return value.recognized;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return Boolean(value);
}
