"use strict";

import type { Elf } from "./elf.js";
import type { ElfDataRegion } from "./regions.js";
import type { ElfWidth } from "./width.js";

/**
 * Pre-order walk: each region is yielded, and a segment region is followed by
 * all regions nested in it before its next sibling.
 */
export function* walkDataRegions<W extends ElfWidth>(
  regions: readonly ElfDataRegion<W>[]
): Generator<ElfDataRegion<W>, void, undefined> {
  for (const region of regions) {
    yield region;
    if (region.kind === "segment") yield* walkDataRegions(region.segment.data);
  }
}

export const findDataRegion = <W extends ElfWidth, T>(
  elf: Elf<W>,
  visit: (region: ElfDataRegion<W>) => T | null | undefined
): T | null => {
  for (const region of walkDataRegions(elf.fileData)) {
    const result = visit(region);
    if (result !== null && result !== undefined) return result;
  }
  return null;
};

export const collectDataRegions = <W extends ElfWidth, T>(
  elf: Elf<W>,
  visit: (region: ElfDataRegion<W>) => readonly T[]
): T[] => {
  const out: T[] = [];
  for (const region of walkDataRegions(elf.fileData)) out.push(...visit(region));
  return out;
};
