/**
 * Slot Map
 *
 * Arena with stable integer keys. A key packs a slot index with the slot's
 * generation, so a key whose value was removed never resolves again even
 * after its slot is reused.
 */

export type SlotKey = number;

const INDEX_BITS = 24;
const INDEX_SPAN = 2 ** INDEX_BITS;

interface Slot<T> {
  generation: number;
  value: T | undefined;
  occupied: boolean;
}

export class SlotMap<T> {
  private readonly slots: Slot<T>[] = [];
  private readonly free: number[] = [];
  private count = 0;

  get size(): number {
    return this.count;
  }

  insert(value: T): SlotKey {
    return this.insertWith(() => value);
  }

  /**
   * Insert a value built from its own key.
   */
  insertWith(make: (key: SlotKey) => T): SlotKey {
    const index = this.free.pop() ?? this.slots.length;
    const slot = this.slots[index] ?? { generation: 0, value: undefined, occupied: false };
    this.slots[index] = slot;

    const key = slot.generation * INDEX_SPAN + index;
    slot.value = make(key);
    slot.occupied = true;
    this.count++;
    return key;
  }

  get(key: SlotKey): T | undefined {
    const slot = this.resolve(key);
    return slot?.value;
  }

  has(key: SlotKey): boolean {
    return this.resolve(key) !== undefined;
  }

  remove(key: SlotKey): T | undefined {
    const slot = this.resolve(key);
    if (!slot) {
      return undefined;
    }
    const value = slot.value;
    slot.value = undefined;
    slot.occupied = false;
    slot.generation++;
    this.free.push(key % INDEX_SPAN);
    this.count--;
    return value;
  }

  *values(): IterableIterator<T> {
    for (const slot of this.slots) {
      if (slot.occupied && slot.value !== undefined) {
        yield slot.value;
      }
    }
  }

  clear(): void {
    for (const [index, slot] of this.slots.entries()) {
      if (slot.occupied) {
        this.remove(slot.generation * INDEX_SPAN + index);
      }
    }
  }

  private resolve(key: SlotKey): Slot<T> | undefined {
    const index = key % INDEX_SPAN;
    const generation = Math.floor(key / INDEX_SPAN);
    const slot = this.slots[index];
    if (!slot || !slot.occupied || slot.generation !== generation) {
      return undefined;
    }
    return slot;
  }
}
