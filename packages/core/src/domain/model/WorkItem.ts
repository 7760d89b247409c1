/** A single unit of input together with its original position in the sequence. */
export interface WorkItem<T> {
  /** Zero-based position of this item in the input sequence. Stable identity for the run. */
  readonly index: number;
  /** Opaque input value handed to the unit operation. */
  readonly value: T;
}

/** Materialize an ordered sequence of values into frozen work items. */
export function createWorkItems<T>(values: Iterable<T>): readonly WorkItem<T>[] {
  const items: WorkItem<T>[] = [];
  let index = 0;
  for (const value of values) {
    items.push(Object.freeze({ index, value }));
    index++;
  }
  return items;
}
