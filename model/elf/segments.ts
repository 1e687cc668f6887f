"use strict";

import { toHexWord } from "../../binary-utils.js";
import { PROGRAM_FLAGS, PROGRAM_TYPES, decodeOption, formatFlags } from "./constants.js";
import type { ElfDataRegion } from "./regions.js";
import type { ElfWidth, ElfWordType } from "./width.js";

export type ElfSegmentType = number;

export type ElfSegmentFlags = number;

export type SegmentIndex = number;

export const elfSegmentTypeName = (type: ElfSegmentType): string => {
  const name = decodeOption(type, PROGRAM_TYPES);
  return name ? `PT_${name}` : toHexWord(type >>> 0, 32);
};

export const formatElfSegmentFlags = (flags: ElfSegmentFlags): string =>
  formatFlags(flags >>> 0, PROGRAM_FLAGS, "PF_NONE");

export function hasPermissions(value: number, required: number): boolean;
export function hasPermissions(value: bigint, required: bigint): boolean;
export function hasPermissions(value: number | bigint, required: number | bigint): boolean {
  if (typeof value === "bigint" || typeof required === "bigint") {
    const req = BigInt(required);
    return (BigInt(value) & req) === req;
  }
  return (value & required) >>> 0 === required >>> 0;
}

/**
 * Memory footprint of a segment. A writer computes the size of the contents
 * first; an absolute size replaces it only when larger, a relative size is
 * added to it.
 */
export type ElfMemSize<W extends ElfWidth> =
  | { readonly kind: "absolute"; readonly size: ElfWordType<W> }
  | { readonly kind: "relative"; readonly size: ElfWordType<W> };

export interface ElfSegment<W extends ElfWidth> {
  readonly type: ElfSegmentType;
  readonly flags: ElfSegmentFlags;
  readonly index: SegmentIndex;
  readonly vaddr: ElfWordType<W>;
  readonly paddr: ElfWordType<W>;
  readonly align: ElfWordType<W>;
  readonly memSize: ElfMemSize<W>;
  readonly data: readonly ElfDataRegion<W>[];
}
