"use strict";

import type { Elf } from "./elf.js";
import { elfGotSection } from "./got.js";
import type { ElfSection } from "./sections.js";
import type { ElfSegment } from "./segments.js";
import type { ElfSymbolTable } from "./symbols.js";
import { collectDataRegions, findDataRegion } from "./traversal.js";
import type { ElfWidth } from "./width.js";

export const elfSegments = <W extends ElfWidth>(elf: Elf<W>): ElfSegment<W>[] =>
  collectDataRegions(elf, region => (region.kind === "segment" ? [region.segment] : []));

export const elfSegmentCount = <W extends ElfWidth>(elf: Elf<W>): number =>
  elfSegments(elf).length + (elf.gnuStackSegment ? 1 : 0) + elf.gnuRelroRegions.length;

export const elfSections = <W extends ElfWidth>(elf: Elf<W>): ElfSection<W>[] =>
  collectDataRegions(elf, region => {
    if (region.kind === "section") return [region.section];
    if (region.kind === "got") return [elfGotSection(elf.elfClass, region.got)];
    return [];
  });

export const findSymbolTable = <W extends ElfWidth>(elf: Elf<W>): ElfSymbolTable<W> | null =>
  findDataRegion(elf, region => (region.kind === "symtab" ? region.symtab : null));
