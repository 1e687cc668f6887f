"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { PF_R, PF_X, PT_NOTE, SHF_ALLOC, SHT_PROGBITS } from "../../model/elf/constants.js";
import { ELFCLASS64, ELFCLASS32 } from "../../model/elf/width.js";
import { formatElfRegion, formatElfSegment, renderElfRegion } from "../../renderers/elf/segments.js";
import { bytesOf, got64, segment32, symtab64, textSection64 } from "../fixtures/elf-model-sample.js";

void test("formatElfSegment prints fields then nested regions", () => {
  const inner = segment32({
    type: PT_NOTE,
    index: 1,
    vaddr: 0x8048100,
    paddr: 0x8048100,
    align: 4,
    memSize: { kind: "absolute", size: 0x20 },
    data: [{ kind: "strtab", sectionIndex: 5 }]
  });
  const outer = segment32({
    flags: PF_R | PF_X,
    vaddr: 0x8048000,
    paddr: 0x8048000,
    data: [
      { kind: "elfHeader" },
      { kind: "segmentHeaders" },
      { kind: "segment", segment: inner },
      { kind: "raw", bytes: new Uint8Array([0x90, 0x90]) }
    ]
  });
  assert.equal(
    formatElfSegment(ELFCLASS32, outer),
    [
      "type: PT_LOAD",
      "flags: PF_X | PF_R",
      "index: 0",
      "vaddr: 0x08048000",
      "paddr: 0x08048000",
      "align: 4096",
      "msize: relative 0x00000000",
      "data:",
      "  ELF header",
      "  segment header table",
      "  contained segment",
      "    type: PT_NOTE",
      "    flags: PF_R",
      "    index: 1",
      "    vaddr: 0x08048100",
      "    paddr: 0x08048100",
      "    align: 4",
      "    msize: absolute 0x00000020",
      "    data:",
      "      strtab section (section number 5)",
      "  raw bytes: (2 bytes) 9090"
    ].join("\n")
  );
});

void test("formatElfRegion renders table markers", () => {
  assert.equal(formatElfRegion(ELFCLASS64, { kind: "sectionHeaders" }), "section header table");
  assert.equal(
    formatElfRegion(ELFCLASS64, { kind: "sectionNameTable", sectionIndex: 6 }),
    "section name table (section number 6)"
  );
});

void test("formatElfRegion summarises a GOT", () => {
  assert.equal(
    formatElfRegion(ELFCLASS64, { kind: "got", got: got64() }),
    'global offset table: ".got" (section number 2) addr=0x0000000000601000 align=8 entsize=8 size=16'
  );
});

void test("formatElfRegion lists symbol table entries", () => {
  assert.equal(
    formatElfRegion(ELFCLASS64, { kind: "symtab", symtab: symtab64() }),
    [
      "symtab section: section number 4, 2 entries (1 local)",
      '  0: "" STT_NOTYPE STB_LOCAL other=0 shndx=SHN_UNDEF value=0x0000000000000000 size=0',
      '  1: "main" STT_FUNC STB_GLOBAL other=0 shndx=1 value=0x0000000000401000 size=42'
    ].join("\n")
  );
});

void test("formatElfRegion describes generic sections", () => {
  assert.equal(
    formatElfRegion(ELFCLASS64, { kind: "section", section: textSection64() }),
    'other section: ".text" (section number 1) SHT_PROGBITS flags=SHF_ALLOC | SHF_EXECINSTR ' +
      "addr=0x0000000000401000 size=3 link=0 info=0 align=16 entsize=0 data=3 bytes"
  );
});

void test("formatElfRegion prints 32-bit section flags with the top bit set as unsigned", () => {
  assert.equal(
    formatElfRegion(ELFCLASS32, {
      kind: "section",
      section: {
        index: 3,
        name: bytesOf(".data"),
        type: SHT_PROGBITS,
        flags: 0x80000000 | SHF_ALLOC,
        addr: 0x8049000,
        size: 4,
        link: 0,
        info: 0,
        addrAlign: 4,
        entSize: 0,
        data: new Uint8Array(4)
      }
    }),
    'other section: ".data" (section number 3) SHT_PROGBITS flags=SHF_ALLOC | 0x80000000 ' +
      "addr=0x08049000 size=4 link=0 info=0 align=4 entsize=0 data=4 bytes"
  );
});

void test("renderElfRegion appends indented lines to the output", () => {
  const out = ["before"];
  renderElfRegion(ELFCLASS64, { kind: "raw", bytes: new Uint8Array(0) }, out, "    ");
  assert.deepEqual(out, ["before", "    raw bytes: (0 bytes)"]);
});
