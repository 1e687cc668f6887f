"use strict";

export type ElfWidth = 32 | 64;

export type ElfWordType<W extends ElfWidth> = W extends 32 ? number : bigint;

/**
 * Width-generic operations over the words of one ELF class. All arithmetic
 * wraps modulo 2^bitWidth.
 */
export interface ElfWordOps<W extends ElfWidth> {
  readonly bitWidth: W;
  readonly zero: ElfWordType<W>;
  readonly maxValue: ElfWordType<W>;
  of(value: number | bigint): ElfWordType<W>;
  toBigInt(value: ElfWordType<W>): bigint;
  toNumber(value: ElfWordType<W>): number;
  add(a: ElfWordType<W>, b: ElfWordType<W>): ElfWordType<W>;
  sub(a: ElfWordType<W>, b: ElfWordType<W>): ElfWordType<W>;
  and(a: ElfWordType<W>, b: ElfWordType<W>): ElfWordType<W>;
  or(a: ElfWordType<W>, b: ElfWordType<W>): ElfWordType<W>;
  xor(a: ElfWordType<W>, b: ElfWordType<W>): ElfWordType<W>;
  not(a: ElfWordType<W>): ElfWordType<W>;
  shiftLeft(a: ElfWordType<W>, count: number): ElfWordType<W>;
  shiftRight(a: ElfWordType<W>, count: number): ElfWordType<W>;
  testBit(a: ElfWordType<W>, bit: number): boolean;
  compare(a: ElfWordType<W>, b: ElfWordType<W>): -1 | 0 | 1;
}

const word32: ElfWordOps<32> = {
  bitWidth: 32,
  zero: 0,
  maxValue: 0xffffffff,
  of: value => (typeof value === "bigint" ? Number(BigInt.asUintN(32, value)) : value >>> 0),
  toBigInt: value => BigInt(value),
  toNumber: value => value,
  add: (a, b) => (a + b) >>> 0,
  sub: (a, b) => (a - b) >>> 0,
  and: (a, b) => (a & b) >>> 0,
  or: (a, b) => (a | b) >>> 0,
  xor: (a, b) => (a ^ b) >>> 0,
  not: a => ~a >>> 0,
  shiftLeft: (a, count) => (count >= 32 ? 0 : (a << count) >>> 0),
  shiftRight: (a, count) => (count >= 32 ? 0 : a >>> count),
  testBit: (a, bit) => bit >= 0 && bit < 32 && ((a >>> bit) & 1) === 1,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0)
};

const word64: ElfWordOps<64> = {
  bitWidth: 64,
  zero: 0n,
  maxValue: 0xffffffffffffffffn,
  of: value => BigInt.asUintN(64, typeof value === "bigint" ? value : BigInt(Math.trunc(value))),
  toBigInt: value => value,
  toNumber: value => Number(value),
  add: (a, b) => BigInt.asUintN(64, a + b),
  sub: (a, b) => BigInt.asUintN(64, a - b),
  and: (a, b) => a & b,
  or: (a, b) => a | b,
  xor: (a, b) => a ^ b,
  not: a => BigInt.asUintN(64, ~a),
  shiftLeft: (a, count) => (count >= 64 ? 0n : BigInt.asUintN(64, a << BigInt(count))),
  shiftRight: (a, count) => (count >= 64 ? 0n : a >> BigInt(count)),
  testBit: (a, bit) => bit >= 0 && bit < 64 && ((a >> BigInt(bit)) & 1n) === 1n,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0)
};

export interface ElfClass<W extends ElfWidth> {
  readonly name: W extends 32 ? "ELFCLASS32" : "ELFCLASS64";
  readonly classByte: W extends 32 ? 1 : 2;
  readonly bitWidth: W;
  readonly byteWidth: W extends 32 ? 4 : 8;
  readonly word: ElfWordOps<W>;
}

export const ELFCLASS32: ElfClass<32> = {
  name: "ELFCLASS32",
  classByte: 1,
  bitWidth: 32,
  byteWidth: 4,
  word: word32
};

export const ELFCLASS64: ElfClass<64> = {
  name: "ELFCLASS64",
  classByte: 2,
  bitWidth: 64,
  byteWidth: 8,
  word: word64
};

export type SomeElfClass = ElfClass<32> | ElfClass<64>;

export const toSomeElfClass = (classByte: number): SomeElfClass | null => {
  switch (classByte) {
    case 1:
      return ELFCLASS32;
    case 2:
      return ELFCLASS64;
    default:
      return null;
  }
};

export const fromElfClass = <W extends ElfWidth>(cls: ElfClass<W>): number => cls.classByte;

export const elfClassName = <W extends ElfWidth>(cls: ElfClass<W>): string => cls.name;

export const elfClassByteWidth = <W extends ElfWidth>(cls: ElfClass<W>): number => cls.byteWidth;

export const elfClassBitWidth = <W extends ElfWidth>(cls: ElfClass<W>): number => cls.bitWidth;

export const elfClassInstances = <W extends ElfWidth>(cls: ElfClass<W>): ElfWordOps<W> => cls.word;

export const isPowerOfTwo = <W extends ElfWidth>(word: ElfWordOps<W>, value: ElfWordType<W>): boolean =>
  word.compare(value, word.zero) !== 0 && word.compare(word.and(value, word.sub(value, word.of(1))), word.zero) === 0;
