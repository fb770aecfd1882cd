import type { EventEmitter } from "events";
import type pino from "pino";
import { describeError } from "./errors";
import { itemKey, listKey } from "./keys";
import type { TaggedCache } from "./tagged-cache";

export type MutationKind = "create" | "update" | "delete";

/** A record of some entity type, referenced by type and id. */
export type EntityRef = {
  entity: string;
  id: string | number;
};

/** A change to the system of record that cached data may depend on. */
export type MutationEvent = {
  entity: string;
  kind: MutationKind;
  /** Absent for creates that have no id yet. */
  id?: string | number;
  /** Records whose cached views embed the mutated one, e.g. the user behind a passenger. */
  related?: EntityRef[];
};

export type InvalidationRule = {
  /** Tags to invalidate whenever the entity changes. */
  tags?: string[];
};

export type InvalidationRules = Record<string, InvalidationRule>;

/**
 * Translates domain mutations into cache invalidation. For each event it drops the entity's
 * list entry, its item entry (on update/delete), the list and item entries of every related
 * record, and finally every tag the entity's rule names.
 *
 * How the event is raised (ORM hook, message, direct call) is up to the caller.
 */
export class MutationInvalidator {
  private readonly logger: pino.Logger;

  constructor(
    private readonly cache: TaggedCache,
    private readonly rules: InvalidationRules = {},
    logger?: pino.Logger
  ) {
    this.logger = logger ?? cache.log.child({ component: "invalidation" });
  }

  /** Apply one mutation. Resolves to the keys removed. */
  async handle(event: MutationEvent): Promise<string[]> {
    const keys = new Set<string>([listKey(event.entity)]);
    if (event.kind !== "create" && event.id !== undefined) keys.add(itemKey(event.entity, event.id));
    for (const ref of event.related ?? []) {
      keys.add(listKey(ref.entity));
      keys.add(itemKey(ref.entity, ref.id));
    }

    const removed: string[] = [];
    for (const key of keys) {
      if (await this.cache.delete(key)) removed.push(key);
    }
    for (const tag of this.rules[event.entity]?.tags ?? []) {
      for (const key of await this.cache.invalidateTag(tag)) {
        if (!removed.includes(key)) removed.push(key);
      }
    }

    this.logger.info(
      { entity: event.entity, kind: event.kind, id: event.id, keys: removed },
      `invalidated cache for ${event.entity} after ${event.kind}`
    );
    return removed;
  }

  /**
   * Handle every `eventName` emitted by `emitter`. Failures are logged.
   * @returns A function that detaches the listener.
   */
  attach(emitter: EventEmitter, eventName = "mutation"): () => void {
    const listener = (event: MutationEvent) => {
      this.handle(event).catch((e: unknown) => {
        this.logger.error({ entity: event.entity, kind: event.kind, err: describeError(e) }, "cache invalidation failed");
      });
    };
    emitter.on(eventName, listener);
    return () => {
      emitter.off(eventName, listener);
    };
  }
}
