"use strict";

import { SHF_ALLOC, SHF_WRITE, SHT_PROGBITS } from "./constants.js";
import type { ElfSection, ElfSectionFlags, ElfSectionIndex } from "./sections.js";
import type { ElfClass, ElfWidth, ElfWordType } from "./width.js";

export interface ElfGOT<W extends ElfWidth> {
  readonly index: ElfSectionIndex;
  readonly name: Uint8Array;
  readonly addr: ElfWordType<W>;
  readonly addrAlign: ElfWordType<W>;
  readonly entSize: ElfWordType<W>;
  readonly data: Uint8Array;
}

export const elfGotSize = <W extends ElfWidth>(cls: ElfClass<W>, got: ElfGOT<W>): ElfWordType<W> =>
  cls.word.of(got.data.length);

export const elfGotSectionFlags = <W extends ElfWidth>(cls: ElfClass<W>): ElfSectionFlags<W> =>
  cls.word.of(SHF_WRITE | SHF_ALLOC);

export const elfGotSection = <W extends ElfWidth>(cls: ElfClass<W>, got: ElfGOT<W>): ElfSection<W> => ({
  index: got.index,
  name: got.name,
  type: SHT_PROGBITS,
  flags: elfGotSectionFlags(cls),
  addr: got.addr,
  size: elfGotSize(cls, got),
  link: 0,
  info: 0,
  addrAlign: got.addrAlign,
  entSize: got.entSize,
  data: got.data
});
