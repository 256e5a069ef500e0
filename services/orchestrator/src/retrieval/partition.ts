/**
 * Partitioned Work Distribution
 * Splits a list into contiguous partitions, maps a pure function over each one
 * as an independent task and reassembles the results in input order.
 */

import { availableParallelism } from 'os';
import { setImmediate as yieldToEventLoop } from 'timers/promises';

export interface PartitionOptions {
  /** Below this many items everything runs in one pass */
  parallelThreshold: number;
  /** Upper bound on partitions */
  maxWorkers: number;
  /** Defaults to os.availableParallelism() */
  parallelism?: number;
}

/** Items processed between event-loop yields */
const YIELD_EVERY = 256;

/**
 * Number of partitions for `count` items: min(parallelism - 1, count, maxWorkers),
 * or 1 below the threshold
 */
export function planPartitions(count: number, options: PartitionOptions): number {
  if (count < options.parallelThreshold) {
    return 1;
  }
  const parallelism = options.parallelism ?? availableParallelism();
  return Math.max(1, Math.min(Math.max(1, parallelism - 1), count, options.maxWorkers));
}

export function splitIntoPartitions<T>(items: readonly T[], partitions: number): T[][] {
  const size = Math.ceil(items.length / Math.max(1, partitions));
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

async function mapPartition<T, R>(chunk: readonly T[], fn: (item: T) => R): Promise<R[]> {
  const out: R[] = [];
  await yieldToEventLoop();
  for (const [i, item] of chunk.entries()) {
    out.push(fn(item));
    if ((i + 1) % YIELD_EVERY === 0) {
      await yieldToEventLoop();
    }
  }
  return out;
}

/**
 * Map `fn` over `items`. Output order always matches input order.
 */
export async function mapPartitioned<T, R>(
  items: readonly T[],
  fn: (item: T) => R,
  options: PartitionOptions
): Promise<R[]> {
  const partitions = planPartitions(items.length, options);
  if (partitions <= 1) {
    return items.map((item) => fn(item));
  }

  const chunks = splitIntoPartitions(items, partitions);
  const results = await Promise.all(chunks.map((chunk) => mapPartition(chunk, fn)));
  return results.flat();
}
