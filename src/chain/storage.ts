import { toAddress } from "./accounts";
import { requires } from "./errors";

/** Anything that can take undo entries for the transaction in progress. */
export interface Journal {
  recordUndo(undo: () => void): void;
}

/** Sets and maps refuse to enumerate past this many entries; page through them with `at` instead. */
export const MAX_ENUMERABLE_LENGTH = 10_000;

export type KeyOf<K> = (key: K) => string;

export const numberKey: KeyOf<number> = key => key.toString();
export const stringKey: KeyOf<string> = key => key;
export const addressKey: KeyOf<string> = key => toAddress(key);

export class Slot<T> {
  constructor(private readonly journal: Journal, private value: T) {}

  get(): T {
    return this.value;
  }

  set(value: T): void {
    const previous = this.value;
    this.journal.recordUndo(() => {
      this.value = previous;
    });
    this.value = value;
  }
}

type Entry<V> = { readonly value: V };

export class Mapping<K, V> {
  private readonly entries = new Map<string, Entry<V>>();

  constructor(private readonly journal: Journal, private readonly keyOf: KeyOf<K>) {}

  get(key: K): V | undefined {
    return this.entries.get(this.keyOf(key))?.value;
  }

  has(key: K): boolean {
    return this.entries.has(this.keyOf(key));
  }

  set(key: K, value: V): void {
    this.write(this.keyOf(key), { value });
  }

  delete(key: K): boolean {
    const id = this.keyOf(key);
    if (!this.entries.has(id)) {
      return false;
    }
    this.write(id, undefined);
    return true;
  }

  private write(id: string, entry: Entry<V> | undefined): void {
    const previous = this.entries.get(id);
    this.journal.recordUndo(() => this.restore(id, previous));
    this.restore(id, entry);
  }

  private restore(id: string, entry: Entry<V> | undefined): void {
    if (entry) {
      this.entries.set(id, entry);
    } else {
      this.entries.delete(id);
    }
  }
}

/**
 * Insertion-ordered set with O(1) add, remove and indexed access. Removal moves the last element into the
 * removed slot, so ordering is not preserved across removals.
 */
export class EnumerableSet<T> {
  private readonly items: Mapping<number, T>;
  private readonly positions: Mapping<T, number>;
  private readonly size: Slot<number>;

  constructor(journal: Journal, keyOf: KeyOf<T>) {
    this.items = new Mapping(journal, numberKey);
    this.positions = new Mapping(journal, keyOf);
    this.size = new Slot(journal, 0);
  }

  get length(): number {
    return this.size.get();
  }

  contains(value: T): boolean {
    return this.positions.has(value);
  }

  add(value: T): boolean {
    if (this.contains(value)) {
      return false;
    }
    const length = this.size.get();
    this.items.set(length, value);
    this.positions.set(value, length);
    this.size.set(length + 1);
    return true;
  }

  remove(value: T): boolean {
    const position = this.positions.get(value);
    if (position === undefined) {
      return false;
    }
    const lastPosition = this.size.get() - 1;
    if (position !== lastPosition) {
      const last = this.at(lastPosition);
      this.items.set(position, last);
      this.positions.set(last, position);
    }
    this.items.delete(lastPosition);
    this.positions.delete(value);
    this.size.set(lastPosition);
    return true;
  }

  at(index: number): T {
    const value = index < this.size.get() ? this.items.get(index) : undefined;
    requires(value !== undefined, "EnumerableSet: index out of bounds");
    return value;
  }

  values(): T[] {
    const length = this.size.get();
    requires(length <= MAX_ENUMERABLE_LENGTH, "EnumerableSet: too many entries to enumerate");
    return Array.from({ length }, (_, index) => this.at(index));
  }
}

export class EnumerableMap<K, V> {
  private readonly keys: EnumerableSet<K>;
  private readonly values: Mapping<K, V>;

  constructor(journal: Journal, keyOf: KeyOf<K>) {
    this.keys = new EnumerableSet(journal, keyOf);
    this.values = new Mapping(journal, keyOf);
  }

  get length(): number {
    return this.keys.length;
  }

  contains(key: K): boolean {
    return this.keys.contains(key);
  }

  /** Returns true when the key was not present before. */
  set(key: K, value: V): boolean {
    this.values.set(key, value);
    return this.keys.add(key);
  }

  remove(key: K): boolean {
    this.values.delete(key);
    return this.keys.remove(key);
  }

  tryGet(key: K): V | undefined {
    return this.values.get(key);
  }

  get(key: K, reason = "EnumerableMap: nonexistent key"): V {
    const value = this.values.get(key);
    requires(value !== undefined, reason);
    return value;
  }

  at(index: number): [K, V] {
    const key = this.keys.at(index);
    return [key, this.get(key)];
  }

  entries(): Array<[K, V]> {
    return this.keys.values().map((key): [K, V] => [key, this.get(key)]);
  }
}
