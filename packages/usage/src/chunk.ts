import { PayloadTooLargeError } from "./errors.js";

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Split `items` into contiguous slices of at most `size` items, in order.
 * The last slice may be shorter; an empty input yields nothing.
 *
 * `size` is checked when called, not on first iteration.
 */
export function chunkByCount<T>(items: readonly T[], size: number): Generator<T[], void, undefined> {
  assertPositiveInt("size", size);
  return sliceByCount(items, size);
}

function* sliceByCount<T>(items: readonly T[], size: number): Generator<T[], void, undefined> {
  for (let i = 0; i < items.length; i += size) {
    yield items.slice(i, i + size);
  }
}

export interface SizeChunkOptions<T> {
  /** Serialized size of one item in bytes. */
  measure: (item: T) => number;
  /** Upper bound on `overhead + items + separators` for one chunk. */
  maxSize: number;
  /** Fixed cost of the enclosing envelope. */
  overhead?: number;
  /** Cost between two adjacent items, e.g. 1 for a JSON comma. */
  separator?: number;
}

/**
 * Greedily pack consecutive `items` into slices whose total measured size,
 * envelope included, stays within `maxSize`. Order is preserved.
 *
 * Throws PayloadTooLargeError when one item cannot fit even alone.
 */
export function chunkBySize<T>(
  items: readonly T[],
  options: SizeChunkOptions<T>,
): Generator<T[], void, undefined> {
  assertPositiveInt("maxSize", options.maxSize);
  return sliceBySize(items, options);
}

function* sliceBySize<T>(
  items: readonly T[],
  { measure, maxSize, overhead = 0, separator = 0 }: SizeChunkOptions<T>,
): Generator<T[], void, undefined> {
  let current: T[] = [];
  let currentSize = overhead;

  for (const item of items) {
    const itemSize = measure(item);
    if (overhead + itemSize > maxSize) {
      throw new PayloadTooLargeError(overhead + itemSize, maxSize);
    }

    const added = current.length === 0 ? itemSize : separator + itemSize;
    if (currentSize + added > maxSize) {
      yield current;
      current = [item];
      currentSize = overhead + itemSize;
    } else {
      current.push(item);
      currentSize += added;
    }
  }

  if (current.length > 0) yield current;
}
