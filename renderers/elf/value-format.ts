"use strict";

import { bufferToHex, quoteBytes, toHexWord } from "../../binary-utils.js";
import { decodeOption } from "../../model/elf/constants.js";
import type { ElfOptionEntry } from "../../model/elf/constants.js";
import type { ElfMemSize } from "../../model/elf/segments.js";
import type { ElfClass, ElfWidth, ElfWordType } from "../../model/elf/width.js";

export const formatElfHex = <W extends ElfWidth>(cls: ElfClass<W>, value: ElfWordType<W>): string =>
  toHexWord(value, cls.bitWidth);

export const formatElfName = (name: Uint8Array): string => quoteBytes(name);

export const formatElfRawBytes = (bytes: Uint8Array): string =>
  bytes.length ? `(${bytes.length} bytes) ${bufferToHex(bytes)}` : "(0 bytes)";

export const formatElfMemSize = <W extends ElfWidth>(cls: ElfClass<W>, memSize: ElfMemSize<W>): string =>
  `${memSize.kind} ${formatElfHex(cls, memSize.size)}`;

export const formatElfOption = (value: number, options: readonly ElfOptionEntry[], fallbackPrefix: string): string =>
  decodeOption(value, options) || `${fallbackPrefix}${value}`;
