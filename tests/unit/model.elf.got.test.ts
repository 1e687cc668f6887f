"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { SHF_ALLOC, SHF_WRITE, SHT_PROGBITS } from "../../model/elf/constants.js";
import { elfGotSection, elfGotSectionFlags, elfGotSize } from "../../model/elf/got.js";
import type { ElfGOT } from "../../model/elf/got.js";
import { ELFCLASS32, ELFCLASS64 } from "../../model/elf/width.js";
import { bytesOf, got64 } from "../fixtures/elf-model-sample.js";

void test("elfGotSize is the length of the table contents", () => {
  assert.equal(elfGotSize(ELFCLASS64, got64()), 16n);
});

void test("elfGotSection keeps the GOT fields and marks it writable PROGBITS", () => {
  const got = got64();
  const section = elfGotSection(ELFCLASS64, got);
  assert.equal(section.index, 2);
  assert.equal(section.name, got.name);
  assert.equal(section.type, SHT_PROGBITS);
  assert.equal(section.flags, BigInt(SHF_WRITE | SHF_ALLOC));
  assert.equal(section.addr, 0x601000n);
  assert.equal(section.size, 16n);
  assert.equal(section.link, 0);
  assert.equal(section.info, 0);
  assert.equal(section.addrAlign, 8n);
  assert.equal(section.entSize, 8n);
  assert.equal(section.data, got.data);
});

void test("32-bit GOTs convert with 32-bit words", () => {
  const got: ElfGOT<32> = {
    index: 9,
    name: bytesOf(".got.plt"),
    addr: 0x804a000,
    addrAlign: 4,
    entSize: 4,
    data: new Uint8Array(12)
  };
  assert.equal(elfGotSectionFlags(ELFCLASS32), 3);
  const section = elfGotSection(ELFCLASS32, got);
  assert.equal(section.size, 12);
  assert.equal(section.flags, 3);
  assert.equal(section.addr, 0x804a000);
});
