"use strict";

export type Range<T extends number | bigint> = readonly [start: T, count: T];

export function inRange(value: number, range: Range<number>): boolean;
export function inRange(value: bigint, range: Range<bigint>): boolean;
export function inRange(value: number | bigint, [start, count]: Range<number> | Range<bigint>): boolean {
  if (typeof value === "bigint" && typeof start === "bigint" && typeof count === "bigint") {
    return start <= value && value - start < count;
  }
  const x = Number(value);
  const s = Number(start);
  return s <= x && x - s < Number(count);
}

const clampIndex = (value: number | bigint, limit: number): number => {
  if (typeof value === "bigint") return value <= 0n ? 0 : value >= BigInt(limit) ? limit : Number(value);
  if (!(value > 0)) return 0;
  return value >= limit ? limit : Math.floor(value);
};

export const slice = <T extends number | bigint>([start, count]: Range<T>, bytes: Uint8Array): Uint8Array => {
  const begin = clampIndex(start, bytes.length);
  const length = clampIndex(count, bytes.length - begin);
  return bytes.subarray(begin, begin + length);
};

const toByteCount = (value: number | bigint): bigint => {
  if (typeof value === "bigint") return value < 0n ? 0n : value;
  return Number.isFinite(value) && value > 0 ? BigInt(Math.floor(value)) : 0n;
};

export function* sliceChunks<T extends number | bigint>(
  [start, count]: Range<T>,
  chunks: Iterable<Uint8Array>
): Generator<Uint8Array, void, undefined> {
  let skip = toByteCount(start);
  let remaining = toByteCount(count);
  if (remaining <= 0n) return;
  for (const chunk of chunks) {
    const size = BigInt(chunk.length);
    if (skip >= size) {
      skip -= size;
      continue;
    }
    const begin = Number(skip);
    skip = 0n;
    const take = remaining < size - BigInt(begin) ? Number(remaining) : chunk.length - begin;
    remaining -= BigInt(take);
    if (take > 0) yield chunk.subarray(begin, begin + take);
    if (remaining <= 0n) return;
  }
}
