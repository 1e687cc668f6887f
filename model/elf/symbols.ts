"use strict";

import type { ElfSectionIndex } from "./sections.js";
import type { ElfWidth, ElfWordType } from "./width.js";

export interface ElfSymbolTableEntry<W extends ElfWidth> {
  readonly name: Uint8Array;
  readonly type: number;
  readonly binding: number;
  readonly other: number;
  readonly sectionIndex: ElfSectionIndex;
  readonly value: ElfWordType<W>;
  readonly size: ElfWordType<W>;
}

export interface ElfSymbolTable<W extends ElfWidth> {
  readonly index: ElfSectionIndex;
  readonly entries: readonly ElfSymbolTableEntry<W>[];
  readonly localEntries: number;
}

export interface ElfSymbolTypeAndBinding {
  type: number;
  binding: number;
}

export const infoToTypeAndBind = (info: number): ElfSymbolTypeAndBinding => ({
  type: info & 0x0f,
  binding: (info >>> 4) & 0x0f
});

export const typeAndBindToInfo = (type: number, binding: number): number => (type | (binding << 4)) & 0xff;

const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean =>
  a.length === b.length && a.every((byteValue, index) => byteValue === b[index]);

export const symbolTableEntriesEqual = <W extends ElfWidth>(
  a: ElfSymbolTableEntry<W>,
  b: ElfSymbolTableEntry<W>
): boolean =>
  bytesEqual(a.name, b.name) &&
  a.type === b.type &&
  a.binding === b.binding &&
  a.other === b.other &&
  a.sectionIndex === b.sectionIndex &&
  a.value === b.value &&
  a.size === b.size;

export const localSymbols = <W extends ElfWidth>(table: ElfSymbolTable<W>): readonly ElfSymbolTableEntry<W>[] =>
  table.entries.slice(0, table.localEntries);

export const globalSymbols = <W extends ElfWidth>(table: ElfSymbolTable<W>): readonly ElfSymbolTableEntry<W>[] =>
  table.entries.slice(table.localEntries);
