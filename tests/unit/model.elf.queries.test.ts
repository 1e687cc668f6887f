"use strict";

import assert from "node:assert/strict";
import { test } from "node:test";
import { SHT_DYNAMIC, SHT_PROGBITS } from "../../model/elf/constants.js";
import { emptyElf } from "../../model/elf/elf.js";
import { ELFDATA2LSB } from "../../model/elf/encoding.js";
import { elfSections, elfSegmentCount, elfSegments, findSymbolTable } from "../../model/elf/queries.js";
import { ELFCLASS32 } from "../../model/elf/width.js";
import { buildSampleElf64 } from "../fixtures/elf-model-sample.js";

const decoder = new TextDecoder();

void test("elfSegments lists nested segments in pre-order", () => {
  assert.deepEqual(
    elfSegments(buildSampleElf64()).map(segment => segment.index),
    [0, 1, 2]
  );
});

void test("elfSegmentCount includes the GNU stack and relro entries", () => {
  assert.equal(elfSegmentCount(buildSampleElf64()), 5);
  assert.equal(elfSegmentCount(emptyElf(ELFDATA2LSB, ELFCLASS32, 0, 0)), 0);
});

void test("elfSections converts GOTs to generic sections", () => {
  const sections = elfSections(buildSampleElf64());
  assert.deepEqual(
    sections.map(section => decoder.decode(section.name)),
    [".text", ".got", ".dynamic"]
  );
  assert.deepEqual(
    sections.map(section => section.type),
    [SHT_PROGBITS, SHT_PROGBITS, SHT_DYNAMIC]
  );
  assert.equal(sections[1]?.flags, 3n);
});

void test("findSymbolTable returns the first symbol table or null", () => {
  assert.equal(findSymbolTable(buildSampleElf64())?.index, 4);
  assert.equal(findSymbolTable(emptyElf(ELFDATA2LSB, ELFCLASS32, 0, 0)), null);
});
