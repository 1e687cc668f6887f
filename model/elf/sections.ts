"use strict";

import type { ElfWidth, ElfWordType } from "./width.js";

export type ElfSectionIndex = number;

export type ElfSectionFlags<W extends ElfWidth> = ElfWordType<W>;

export interface ElfSection<W extends ElfWidth> {
  readonly index: ElfSectionIndex;
  readonly name: Uint8Array;
  readonly type: number;
  readonly flags: ElfSectionFlags<W>;
  readonly addr: ElfWordType<W>;
  readonly size: ElfWordType<W>;
  readonly link: number;
  readonly info: number;
  readonly addrAlign: ElfWordType<W>;
  readonly entSize: ElfWordType<W>;
  readonly data: Uint8Array;
}
