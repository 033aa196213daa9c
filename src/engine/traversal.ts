import type * as z from "zod"
import { joinPath } from "@/utils"

/**
 * A node waiting to be converted: the raw data and the schema governing it (if any)
 */
export type Pending = {
  data: unknown
  schema: z.ZodType | undefined
}

/**
 * One field of an expanded record: either ready to be written, or a child to convert first.
 * `segment` is the field's name in error paths.
 */
export type RecordEntry<TValue> =
  | { key: string; ready: true; value: TValue }
  | { key: string; ready: false; segment: string; child: Pending }

/**
 * What a node turns into when it is first processed
 */
export type Expansion<TValue> =
  | { kind: "leaf"; value: TValue }
  | { kind: "record"; entries: RecordEntry<TValue>[] }
  | { kind: "sequence"; elements: Pending[] }

/**
 * Progress of a composite node. Slots are filled by position as children are promoted.
 */
type WorkState<TValue> =
  | { kind: "raw" }
  | { kind: "leaf" }
  | { kind: "record"; keys: string[]; slots: TValue[]; pending: number }
  | { kind: "sequence"; slots: TValue[]; pending: number }

/**
 * The traversal's unit of work. Items refer to their parent by id, never by reference.
 */
export interface WorkItem<TValue> {
  readonly id: number
  /** id of the item this one is attached to, null for the root */
  readonly parent: number | null
  /** position in the parent's slots */
  readonly slot: number
  /** dotted path from the root, for error messages */
  readonly path: string
  readonly source: Pending
  state: WorkState<TValue>
  /** the finished value, set when `finalized` */
  result: { value: TValue } | undefined
  /** children have been enumerated */
  normalized: boolean
  /** value is ready to be attached to the parent */
  finalized: boolean
}

/**
 * Iterative depth-first conversion of a tree, shared by the marshaller and the unmarshaller.
 *
 * The work-list is a stack of {@link WorkItem}s. Processing an item either finishes it (leaves)
 * or splits it into children, which go to a side-buffer ("dump") first and are moved back onto
 * the work-list in reverse, so the first child is handled first. After each step, finished items
 * are promoted: written into the slot they came from in the item below them. Items that can't be
 * promoted yet are parked in the dump for the rest of the pass and put back afterwards.
 *
 * The run ends when the work-list is empty; the last item taken off holds the result.
 * Cyclic input does not terminate.
 *
 * Subclasses decide how a node expands and how a finished record or sequence is assembled.
 */
export abstract class Traversal<TValue> {
  #work: WorkItem<TValue>[] = []
  #dump: WorkItem<TValue>[] = []
  #nextId = 0

  /**
   * Turn a raw item into a leaf value, a list of record entries, or a list of sequence elements.
   * Called exactly once per item.
   */
  protected abstract expand(item: WorkItem<TValue>): Expansion<TValue>

  /**
   * Build the finished value of a record once every field has been promoted.
   * `entries` are in declaration order.
   */
  protected abstract assembleRecord(item: WorkItem<TValue>, entries: [string, TValue][]): TValue

  /**
   * Build the finished value of a sequence once every element has been promoted, in input order.
   */
  protected abstract assembleSequence(item: WorkItem<TValue>, elements: TValue[]): TValue

  /**
   * Convert `data` (governed by `schema`) to completion and return the result
   */
  protected run(data: unknown, schema: z.ZodType | undefined): TValue {
    this.#work = [this.#createItem({ data, schema }, null, 0, "")]
    this.#dump = []

    let item = this.#work.pop()
    while (item) {
      if (this.#work.length === 0 && item.finalized) {
        return this.#valueOf(item)
      }

      this.#step(item)
      this.#work.push(item)
      this.#promote()

      item = this.#work.pop()
    }

    throw new Error("Traversal ended without a result")
  }

  #createItem(source: Pending, parent: WorkItem<TValue> | null, slot: number, segment: string | number): WorkItem<TValue> {
    return {
      id: this.#nextId++,
      parent: parent?.id ?? null,
      slot,
      path: parent ? joinPath(parent.path, segment) : "",
      source,
      state: { kind: "raw" },
      result: undefined,
      normalized: false,
      finalized: false,
    }
  }

  /**
   * Advance one item: expand it if it is raw, finalize it if all of its children are in
   */
  #step(item: WorkItem<TValue>): void {
    if (item.finalized) return

    if (!item.normalized) {
      this.#normalize(item)
    }

    const state = item.state
    if ((state.kind === "record" || state.kind === "sequence") && state.pending === 0 && this.#dump.length === 0) {
      const value =
        state.kind === "record"
          ? this.assembleRecord(
              item,
              state.keys.map((key, index): [string, TValue] => [key, state.slots[index]]),
            )
          : this.assembleSequence(item, state.slots)
      item.result = { value }
      item.finalized = true
    }
  }

  #normalize(item: WorkItem<TValue>): void {
    const expansion = this.expand(item)
    item.normalized = true

    switch (expansion.kind) {
      case "leaf":
        item.state = { kind: "leaf" }
        item.result = { value: expansion.value }
        item.finalized = true
        return

      case "record": {
        const keys: string[] = []
        const slots: TValue[] = new Array<TValue>(expansion.entries.length)
        let pending = 0

        expansion.entries.forEach((entry, index) => {
          keys.push(entry.key)
          if (entry.ready) {
            slots[index] = entry.value
          } else {
            this.#dump.push(this.#createItem(entry.child, item, index, entry.segment))
            pending++
          }
        })

        item.state = { kind: "record", keys, slots, pending }
        return
      }

      case "sequence": {
        expansion.elements.forEach((element, index) => {
          this.#dump.push(this.#createItem(element, item, index, index))
        })
        item.state = {
          kind: "sequence",
          slots: new Array<TValue>(expansion.elements.length),
          pending: expansion.elements.length,
        }
        return
      }
    }
  }

  /**
   * Attach finished items to their parents, scanning down the work-list in pairs
   */
  #promote(): void {
    if (this.#dump.length > 0) {
      // children were just created; process them before reassembling anything
      this.#flush()
      return
    }

    while (this.#work.length >= 2) {
      const child = this.#work.pop()
      const parent = this.#work.pop()
      if (!child || !parent) break

      if (!child.finalized) {
        // not ready; park it and look at the pair below
        this.#dump.push(child)
        this.#work.push(parent)
        continue
      }

      if (child.parent !== parent.id) {
        // a sibling's subtree sits in between; keep looking further down for the parent
        this.#work.push(child)
        this.#dump.push(parent)
        continue
      }

      this.#attach(parent, child)
      this.#work.push(parent)
    }

    this.#flush()
  }

  #attach(parent: WorkItem<TValue>, child: WorkItem<TValue>): void {
    const state = parent.state
    if (state.kind !== "record" && state.kind !== "sequence") {
      throw new Error(`Cannot attach '${child.path}' to a ${state.kind} item`)
    }

    state.slots[child.slot] = this.#valueOf(child)
    state.pending--
  }

  /**
   * Move parked items back onto the work-list, restoring their order
   */
  #flush(): void {
    let item = this.#dump.pop()
    while (item) {
      this.#work.push(item)
      item = this.#dump.pop()
    }
  }

  #valueOf(item: WorkItem<TValue>): TValue {
    if (!item.finalized || !item.result) {
      throw new Error(`Item '${item.path}' read before it was finalized`)
    }
    return item.result.value
  }
}
