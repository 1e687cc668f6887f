"use strict";

import { ELFOSABI_SYSV } from "./constants.js";
import type { ElfData } from "./encoding.js";
import type { GnuRelroRegion, GnuStack } from "./gnu.js";
import type { ElfDataRegion } from "./regions.js";
import type { ElfClass, ElfWidth, ElfWordType } from "./width.js";

export const expectedElfVersion = 1;

export interface Elf<W extends ElfWidth> {
  readonly data: ElfData;
  readonly elfClass: ElfClass<W>;
  readonly osabi: number;
  readonly abiVersion: number;
  readonly type: number;
  readonly machine: number;
  readonly entry: ElfWordType<W>;
  readonly flags: number;
  readonly fileData: readonly ElfDataRegion<W>[];
  readonly gnuStackSegment: GnuStack | null;
  readonly gnuRelroRegions: readonly GnuRelroRegion<W>[];
}

export interface ElfHeader<W extends ElfWidth> {
  readonly data: ElfData;
  readonly elfClass: ElfClass<W>;
  readonly osabi: number;
  readonly abiVersion: number;
  readonly type: number;
  readonly machine: number;
  readonly entry: ElfWordType<W>;
  readonly flags: number;
}

export const emptyElf = <W extends ElfWidth>(
  data: ElfData,
  elfClass: ElfClass<W>,
  type: number,
  machine: number
): Elf<W> => ({
  data,
  elfClass,
  osabi: ELFOSABI_SYSV,
  abiVersion: 0,
  type,
  machine,
  entry: elfClass.word.zero,
  flags: 0,
  fileData: [],
  gnuStackSegment: null,
  gnuRelroRegions: []
});

export const elfHeader = <W extends ElfWidth>(elf: Elf<W>): ElfHeader<W> => ({
  data: elf.data,
  elfClass: elf.elfClass,
  osabi: elf.osabi,
  abiVersion: elf.abiVersion,
  type: elf.type,
  machine: elf.machine,
  entry: elf.entry,
  flags: elf.flags
});

export const getElfFileData = <W extends ElfWidth>(elf: Elf<W>): readonly ElfDataRegion<W>[] => elf.fileData;

export const setElfFileData = <W extends ElfWidth>(elf: Elf<W>, fileData: readonly ElfDataRegion<W>[]): Elf<W> => ({
  ...elf,
  fileData
});

export const updateElfFileData = <W extends ElfWidth>(
  elf: Elf<W>,
  update: (fileData: readonly ElfDataRegion<W>[]) => readonly ElfDataRegion<W>[]
): Elf<W> => setElfFileData(elf, update(elf.fileData));
