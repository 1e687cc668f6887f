"use strict";

import { toHex32 } from "../../binary-utils.js";
import { ELF_MACHINE, ELF_OSABI, ELF_TYPE } from "../../model/elf/constants.js";
import type { Elf } from "../../model/elf/elf.js";
import type { ElfWidth } from "../../model/elf/width.js";
import { renderElfRegion } from "./segments.js";
import { formatElfHex, formatElfOption } from "./value-format.js";

const INDENT = "  ";

export function renderElf<W extends ElfWidth>(elf: Elf<W>, out: string[]): void {
  const cls = elf.elfClass;
  out.push(`class: ${cls.name}`);
  out.push(`encoding: ${elf.data}`);
  out.push(`osabi: ${formatElfOption(elf.osabi, ELF_OSABI, "ELFOSABI_")}`);
  out.push(`abi version: ${elf.abiVersion}`);
  out.push(`type: ${formatElfOption(elf.type, ELF_TYPE, "ET_")}`);
  out.push(`machine: ${formatElfOption(elf.machine, ELF_MACHINE, "EM_")}`);
  out.push(`entry: ${formatElfHex(cls, elf.entry)}`);
  out.push(`flags: ${toHex32(elf.flags)}`);
  out.push("regions:");
  for (const region of elf.fileData) renderElfRegion(cls, region, out, INDENT);

  const stack = elf.gnuStackSegment;
  if (stack) {
    out.push(`gnu stack: segment ${stack.segmentIndex}, ${stack.isExecutable ? "executable" : "not executable"}`);
  }
  for (const relro of elf.gnuRelroRegions) {
    out.push(
      `gnu relro: segment ${relro.segmentIndex} protects segment ${relro.refSegmentIndex} ` +
        `from ${formatElfHex(cls, relro.addrStart)} size ${relro.size.toString()}`
    );
  }
}

export const formatElf = <W extends ElfWidth>(elf: Elf<W>): string => {
  const out: string[] = [];
  renderElf(elf, out);
  return out.join("\n");
};
