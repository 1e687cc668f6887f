"use strict";

import type { ElfGOT } from "./got.js";
import type { ElfSection, ElfSectionIndex } from "./sections.js";
import type { ElfSegment } from "./segments.js";
import type { ElfSymbolTable } from "./symbols.js";
import type { ElfWidth } from "./width.js";

export type ElfDataRegion<W extends ElfWidth> =
  | { readonly kind: "elfHeader" }
  | { readonly kind: "segmentHeaders" }
  | { readonly kind: "segment"; readonly segment: ElfSegment<W> }
  | { readonly kind: "sectionHeaders" }
  | { readonly kind: "sectionNameTable"; readonly sectionIndex: ElfSectionIndex }
  | { readonly kind: "got"; readonly got: ElfGOT<W> }
  | { readonly kind: "strtab"; readonly sectionIndex: ElfSectionIndex }
  | { readonly kind: "symtab"; readonly symtab: ElfSymbolTable<W> }
  | { readonly kind: "section"; readonly section: ElfSection<W> }
  | { readonly kind: "raw"; readonly bytes: Uint8Array };
