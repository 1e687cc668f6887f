"use strict";

import { toHexWord } from "../../binary-utils.js";
import {
  SECTION_FLAGS,
  SECTION_INDICES,
  SECTION_TYPES,
  SYMBOL_BINDINGS,
  SYMBOL_TYPES,
  decodeOption,
  formatFlags
} from "../../model/elf/constants.js";
import type { ElfGOT } from "../../model/elf/got.js";
import type { ElfDataRegion } from "../../model/elf/regions.js";
import type { ElfSection } from "../../model/elf/sections.js";
import { elfSegmentTypeName, formatElfSegmentFlags } from "../../model/elf/segments.js";
import type { ElfSegment } from "../../model/elf/segments.js";
import type { ElfSymbolTable, ElfSymbolTableEntry } from "../../model/elf/symbols.js";
import type { ElfClass, ElfWidth } from "../../model/elf/width.js";
import { formatElfHex, formatElfMemSize, formatElfName, formatElfOption, formatElfRawBytes } from "./value-format.js";

const INDENT = "  ";

const formatGot = <W extends ElfWidth>(cls: ElfClass<W>, got: ElfGOT<W>): string =>
  `${formatElfName(got.name)} (section number ${got.index}) addr=${formatElfHex(cls, got.addr)} ` +
  `align=${got.addrAlign.toString()} entsize=${got.entSize.toString()} size=${got.data.length}`;

const formatSection = <W extends ElfWidth>(cls: ElfClass<W>, section: ElfSection<W>): string => {
  const typeName = decodeOption(section.type, SECTION_TYPES) || toHexWord(section.type >>> 0, 32);
  return (
    `${formatElfName(section.name)} (section number ${section.index}) ${typeName} ` +
    `flags=${formatFlags(cls.word.of(section.flags), SECTION_FLAGS, "SHF_NONE")} addr=${formatElfHex(cls, section.addr)} ` +
    `size=${section.size.toString()} link=${section.link} info=${section.info} ` +
    `align=${section.addrAlign.toString()} entsize=${section.entSize.toString()} data=${section.data.length} bytes`
  );
};

const formatSymbol = <W extends ElfWidth>(cls: ElfClass<W>, entry: ElfSymbolTableEntry<W>, index: number): string =>
  `${index}: ${formatElfName(entry.name)} ${formatElfOption(entry.type, SYMBOL_TYPES, "STT_")} ` +
  `${formatElfOption(entry.binding, SYMBOL_BINDINGS, "STB_")} other=${entry.other} ` +
  `shndx=${formatElfOption(entry.sectionIndex, SECTION_INDICES, "")} value=${formatElfHex(cls, entry.value)} ` +
  `size=${entry.size.toString()}`;

const renderSymbolTable = <W extends ElfWidth>(
  cls: ElfClass<W>,
  symtab: ElfSymbolTable<W>,
  out: string[],
  indent: string
): void => {
  out.push(
    `${indent}symtab section: section number ${symtab.index}, ${symtab.entries.length} entries (${symtab.localEntries} local)`
  );
  symtab.entries.forEach((entry, index) => out.push(`${indent}${INDENT}${formatSymbol(cls, entry, index)}`));
};

export function renderElfRegion<W extends ElfWidth>(
  cls: ElfClass<W>,
  region: ElfDataRegion<W>,
  out: string[],
  indent = ""
): void {
  switch (region.kind) {
    case "elfHeader":
      out.push(`${indent}ELF header`);
      return;
    case "segmentHeaders":
      out.push(`${indent}segment header table`);
      return;
    case "segment":
      out.push(`${indent}contained segment`);
      renderElfSegment(cls, region.segment, out, indent + INDENT);
      return;
    case "sectionHeaders":
      out.push(`${indent}section header table`);
      return;
    case "sectionNameTable":
      out.push(`${indent}section name table (section number ${region.sectionIndex})`);
      return;
    case "got":
      out.push(`${indent}global offset table: ${formatGot(cls, region.got)}`);
      return;
    case "strtab":
      out.push(`${indent}strtab section (section number ${region.sectionIndex})`);
      return;
    case "symtab":
      renderSymbolTable(cls, region.symtab, out, indent);
      return;
    case "section":
      out.push(`${indent}other section: ${formatSection(cls, region.section)}`);
      return;
    case "raw":
      out.push(`${indent}raw bytes: ${formatElfRawBytes(region.bytes)}`);
      return;
  }
}

export function renderElfSegment<W extends ElfWidth>(
  cls: ElfClass<W>,
  segment: ElfSegment<W>,
  out: string[],
  indent = ""
): void {
  out.push(`${indent}type: ${elfSegmentTypeName(segment.type)}`);
  out.push(`${indent}flags: ${formatElfSegmentFlags(segment.flags)}`);
  out.push(`${indent}index: ${segment.index}`);
  out.push(`${indent}vaddr: ${formatElfHex(cls, segment.vaddr)}`);
  out.push(`${indent}paddr: ${formatElfHex(cls, segment.paddr)}`);
  out.push(`${indent}align: ${segment.align.toString()}`);
  out.push(`${indent}msize: ${formatElfMemSize(cls, segment.memSize)}`);
  out.push(`${indent}data:`);
  for (const region of segment.data) renderElfRegion(cls, region, out, indent + INDENT);
}

export const formatElfRegion = <W extends ElfWidth>(cls: ElfClass<W>, region: ElfDataRegion<W>): string => {
  const out: string[] = [];
  renderElfRegion(cls, region, out);
  return out.join("\n");
};

export const formatElfSegment = <W extends ElfWidth>(cls: ElfClass<W>, segment: ElfSegment<W>): string => {
  const out: string[] = [];
  renderElfSegment(cls, segment, out);
  return out.join("\n");
};
