"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { ELFOSABI_LINUX, ELFOSABI_SYSV, EM_386, EM_X86_64, ET_DYN, ET_EXEC } from "../../model/elf/constants.js";
import {
  elfHeader,
  emptyElf,
  expectedElfVersion,
  getElfFileData,
  setElfFileData,
  updateElfFileData
} from "../../model/elf/elf.js";
import { ELFDATA2LSB, ELFDATA2MSB } from "../../model/elf/encoding.js";
import { ELFCLASS32, ELFCLASS64 } from "../../model/elf/width.js";

void test("emptyElf zeroes everything but the identifying fields", () => {
  const elf = emptyElf(ELFDATA2LSB, ELFCLASS64, ET_EXEC, EM_X86_64);
  assert.equal(elf.data, ELFDATA2LSB);
  assert.equal(elf.elfClass, ELFCLASS64);
  assert.equal(elf.osabi, ELFOSABI_SYSV);
  assert.equal(elf.abiVersion, 0);
  assert.equal(elf.type, ET_EXEC);
  assert.equal(elf.machine, EM_X86_64);
  assert.equal(elf.entry, 0n);
  assert.equal(elf.flags, 0);
  assert.deepEqual(elf.fileData, []);
  assert.equal(elf.gnuStackSegment, null);
  assert.deepEqual(elf.gnuRelroRegions, []);
});

void test("emptyElf uses number words for 32-bit files", () => {
  const elf = emptyElf(ELFDATA2MSB, ELFCLASS32, ET_DYN, EM_386);
  assert.equal(elf.entry, 0);
  assert.equal(typeof elf.entry, "number");
});

void test("elfHeader reflects the container at call time", () => {
  const elf = emptyElf(ELFDATA2LSB, ELFCLASS64, ET_EXEC, EM_X86_64);
  const edited = { ...elf, osabi: ELFOSABI_LINUX, abiVersion: 1, entry: 0x401000n, flags: 0x10 };
  assert.deepEqual(elfHeader(edited), {
    data: ELFDATA2LSB,
    elfClass: ELFCLASS64,
    osabi: ELFOSABI_LINUX,
    abiVersion: 1,
    type: ET_EXEC,
    machine: EM_X86_64,
    entry: 0x401000n,
    flags: 0x10
  });
  assert.equal(elfHeader(elf).entry, 0n);
});

void test("file data setters return new containers", () => {
  const elf = emptyElf(ELFDATA2LSB, ELFCLASS64, ET_EXEC, EM_X86_64);
  const withHeader = setElfFileData(elf, [{ kind: "elfHeader" }]);
  const withTables = updateElfFileData(withHeader, regions => [...regions, { kind: "sectionHeaders" }]);
  assert.deepEqual(getElfFileData(elf), []);
  assert.deepEqual(getElfFileData(withHeader), [{ kind: "elfHeader" }]);
  assert.deepEqual(
    getElfFileData(withTables).map(region => region.kind),
    ["elfHeader", "sectionHeaders"]
  );
  assert.equal(withTables.machine, EM_X86_64);
});

void test("expectedElfVersion is EV_CURRENT", () => {
  assert.equal(expectedElfVersion, 1);
});
