"use strict";

export const toHexWord = (value: number | bigint, bitWidth = 0): string => {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new Error(`toHexWord given non-integer value ${value}`);
  }
  if (value < 0) throw new Error(`toHexWord given negative value ${value.toString()}`);
  const digits = value.toString(16);
  const width = bitWidth > 0 && bitWidth % 4 === 0 ? bitWidth / 4 : 0;
  return "0x" + digits.padStart(width, "0");
};

export const toHex32 = (value: number): string => toHexWord(value >>> 0, 32);

export const isPrintableByte = (byteValue: number): boolean =>
  byteValue >= 0x20 && byteValue <= 0x7e;

export const bufferToHex = (arrayBuffer: ArrayBuffer | ArrayBufferView): string => {
  const bytes =
    arrayBuffer instanceof ArrayBuffer
      ? new Uint8Array(arrayBuffer)
      : new Uint8Array(arrayBuffer.buffer, arrayBuffer.byteOffset, arrayBuffer.byteLength);
  return [...bytes].map(byteValue => byteValue.toString(16).padStart(2, "0")).join("");
};

export const quoteBytes = (bytes: Uint8Array): string => {
  let result = '"';
  for (const byteValue of bytes) {
    if (byteValue === 0x22 || byteValue === 0x5c) result += "\\" + String.fromCharCode(byteValue);
    else if (isPrintableByte(byteValue)) result += String.fromCharCode(byteValue);
    else result += "\\x" + byteValue.toString(16).padStart(2, "0");
  }
  return result + '"';
};
