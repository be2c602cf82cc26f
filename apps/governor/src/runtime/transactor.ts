/**
 * All-or-nothing execution for the stateful components.
 *
 * Components with small, fixed-size state enlist and hand out a rollback
 * closure on checkpoint(), taken before every outermost run. Components
 * with per-account state journal lazily instead: touch() records an undo
 * entry the first time a run writes a given slice, so a run pays only for
 * what it changes. If the outermost run throws, undo entries replay newest
 * first, then the checkpoints restore. Nested run() calls join the
 * enclosing transaction.
 */

export type Rollback = () => void;

export interface Journaled {
  checkpoint(): Rollback;
}

export class Transactor {
  private readonly participants: Journaled[] = [];
  private depth = 0;
  private undo: Rollback[] = [];
  private readonly touched = new Map<object, Set<string>>();

  enlist(participant: Journaled): void {
    this.participants.push(participant);
  }

  get inTransaction(): boolean {
    return this.depth > 0;
  }

  /** Undo entries recorded by the running transaction. */
  get journalSize(): number {
    return this.undo.length;
  }

  /**
   * Call before the first write to `owner`'s slice `key`. `save` runs once
   * per transaction and slice. Outside a transaction there is nothing to
   * roll back to.
   */
  touch(owner: object, key: string, save: () => Rollback): void {
    if (this.depth === 0) return;
    let keys = this.touched.get(owner);
    if (!keys) {
      keys = new Set();
      this.touched.set(owner, keys);
    }
    if (keys.has(key)) return;
    keys.add(key);
    this.undo.push(save());
  }

  /** touch() for one entry of a keyed map. */
  touchEntry<K, V>(owner: object, name: string, map: Map<K, V>, key: K, copy?: (value: V) => V): void {
    this.touch(owner, `${name}:${String(key)}`, () => saveEntry(map, key, copy));
  }

  run<T>(fn: () => T): T {
    if (this.depth > 0) {
      this.depth++;
      try {
        return fn();
      } finally {
        this.depth--;
      }
    }

    const rollbacks = this.participants.map((p) => p.checkpoint());
    this.depth = 1;
    try {
      return fn();
    } catch (err) {
      for (const rollback of this.undo.reverse()) rollback();
      for (const rollback of rollbacks.reverse()) rollback();
      throw err;
    } finally {
      this.depth = 0;
      this.undo = [];
      this.touched.clear();
    }
  }
}

/** Puts back a copy of the entry's current value, or removes an entry that was absent. */
export function saveEntry<K, V>(map: Map<K, V>, key: K, copy: (value: V) => V = (value) => value): Rollback {
  const current = map.get(key);
  const saved = current === undefined ? undefined : copy(current);
  return () => {
    if (saved === undefined) map.delete(key);
    else map.set(key, saved);
  };
}
