"use strict";

export type ElfData = "ELFDATA2LSB" | "ELFDATA2MSB";

export const ELFDATA2LSB: ElfData = "ELFDATA2LSB";
export const ELFDATA2MSB: ElfData = "ELFDATA2MSB";

export const toElfData = (dataByte: number): ElfData | null => {
  switch (dataByte) {
    case 1:
      return ELFDATA2LSB;
    case 2:
      return ELFDATA2MSB;
    default:
      return null;
  }
};

export const fromElfData = (data: ElfData): number => (data === ELFDATA2LSB ? 1 : 2);

export const isLittleEndian = (data: ElfData): boolean => data === ELFDATA2LSB;
