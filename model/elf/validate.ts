"use strict";

import type { Elf } from "./elf.js";
import { elfSegments } from "./queries.js";
import { walkDataRegions } from "./traversal.js";
import { isPowerOfTwo } from "./width.js";
import type { ElfWidth } from "./width.js";

const checkSegmentIndices = <W extends ElfWidth>(elf: Elf<W>, issues: string[]): void => {
  const labelled: Array<[number, string]> = elfSegments(elf).map(
    (segment): [number, string] => [segment.index, "segment"]
  );
  if (elf.gnuStackSegment) labelled.push([elf.gnuStackSegment.segmentIndex, "GNU stack"]);
  for (const relro of elf.gnuRelroRegions) labelled.push([relro.segmentIndex, "GNU relro region"]);

  const seen = new Set<number>();
  for (const [index, label] of labelled) {
    if (seen.has(index)) issues.push(`Segment index ${index} is used more than once (${label}).`);
    seen.add(index);
  }
  for (const index of seen) {
    if (!Number.isInteger(index) || index < 0 || index >= labelled.length) {
      issues.push(`Segment index ${index} is outside 0..${labelled.length - 1}.`);
    }
  }
  for (let index = 0; index < labelled.length; index++) {
    if (!seen.has(index)) issues.push(`Segment index ${index} is missing.`);
  }
};

export const collectElfModelIssues = <W extends ElfWidth>(elf: Elf<W>): string[] => {
  const issues: string[] = [];
  const { word } = elf.elfClass;
  checkSegmentIndices(elf, issues);

  const segmentIndices = new Set<number>();
  for (const segment of elfSegments(elf)) {
    segmentIndices.add(segment.index);
    if (word.compare(segment.align, word.of(1)) > 0 && !isPowerOfTwo(word, segment.align)) {
      issues.push(`Segment ${segment.index} alignment ${segment.align.toString()} is not a power of two.`);
    }
  }

  for (const relro of elf.gnuRelroRegions) {
    if (!segmentIndices.has(relro.refSegmentIndex)) {
      issues.push(`GNU relro region ${relro.segmentIndex} refers to missing segment ${relro.refSegmentIndex}.`);
    }
  }

  let contentSeen = false;
  for (const region of walkDataRegions(elf.fileData)) {
    if (region.kind === "elfHeader" && contentSeen) {
      issues.push("ELF header is not the first region of the file.");
    }
    if (region.kind === "symtab" && region.symtab.localEntries > region.symtab.entries.length) {
      issues.push(
        `Symbol table ${region.symtab.index} declares ${region.symtab.localEntries} local entries but holds ${region.symtab.entries.length}.`
      );
    }
    if (region.kind !== "segment") contentSeen = true;
  }
  return issues;
};
