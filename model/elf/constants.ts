"use strict";

export type ElfOptionEntry = readonly [number, string, string?];

export const decodeOption = (value: number, options: readonly ElfOptionEntry[]): string | null =>
  options.find(entry => entry[0] === value)?.[1] || null;

export const decodeFlags = (mask: number | bigint, flags: readonly ElfOptionEntry[]): string[] => {
  const bits = BigInt(mask);
  return flags.filter(([bit]) => (bits & BigInt(bit)) !== 0n).map(([, name]) => name);
};

export const formatFlags = (mask: number | bigint, flags: readonly ElfOptionEntry[], noneName: string): string => {
  const bits = BigInt(mask);
  const known = flags.reduce((acc, [bit]) => acc | BigInt(bit), 0n);
  const unknown = bits & ~known;
  const names = decodeFlags(bits, flags);
  if (unknown !== 0n) names.push(`0x${unknown.toString(16)}`);
  return names.length ? names.join(" | ") : noneName;
};

// OS/ABI identification (e_ident[EI_OSABI])
export const ELFOSABI_SYSV = 0;
export const ELFOSABI_HPUX = 1;
export const ELFOSABI_NETBSD = 2;
export const ELFOSABI_LINUX = 3;
export const ELFOSABI_SOLARIS = 6;
export const ELFOSABI_AIX = 7;
export const ELFOSABI_IRIX = 8;
export const ELFOSABI_FREEBSD = 9;
export const ELFOSABI_TRU64 = 10;
export const ELFOSABI_MODESTO = 11;
export const ELFOSABI_OPENBSD = 12;
export const ELFOSABI_ARM_AEABI = 64;
export const ELFOSABI_ARM = 97;
export const ELFOSABI_STANDALONE = 255;

export const ELF_OSABI: readonly ElfOptionEntry[] = [
  [ELFOSABI_SYSV, "ELFOSABI_SYSV", "UNIX System V ABI."],
  [ELFOSABI_HPUX, "ELFOSABI_HPUX", "HP-UX."],
  [ELFOSABI_NETBSD, "ELFOSABI_NETBSD", "NetBSD."],
  [ELFOSABI_LINUX, "ELFOSABI_LINUX", "GNU/Linux."],
  [ELFOSABI_SOLARIS, "ELFOSABI_SOLARIS", "Sun Solaris."],
  [ELFOSABI_AIX, "ELFOSABI_AIX", "IBM AIX."],
  [ELFOSABI_IRIX, "ELFOSABI_IRIX", "SGI Irix."],
  [ELFOSABI_FREEBSD, "ELFOSABI_FREEBSD", "FreeBSD."],
  [ELFOSABI_TRU64, "ELFOSABI_TRU64", "Compaq TRU64 UNIX."],
  [ELFOSABI_MODESTO, "ELFOSABI_MODESTO", "Novell Modesto."],
  [ELFOSABI_OPENBSD, "ELFOSABI_OPENBSD", "OpenBSD."],
  [ELFOSABI_ARM_AEABI, "ELFOSABI_ARM_AEABI", "ARM EABI."],
  [ELFOSABI_ARM, "ELFOSABI_ARM", "ARM."],
  [ELFOSABI_STANDALONE, "ELFOSABI_STANDALONE", "Standalone (embedded) application."]
];

// Object file types (e_type)
export const ET_NONE = 0;
export const ET_REL = 1;
export const ET_EXEC = 2;
export const ET_DYN = 3;
export const ET_CORE = 4;

export const ELF_TYPE: readonly ElfOptionEntry[] = [
  [ET_NONE, "ET_NONE", "Unspecified."],
  [ET_REL, "ET_REL", "Object file used for linking."],
  [ET_EXEC, "ET_EXEC", "Loadable image with an entry point."],
  [ET_DYN, "ET_DYN", "Position-independent library."],
  [ET_CORE, "ET_CORE", "Process image captured after a crash."]
];

// Machine architectures (e_machine)
export const EM_NONE = 0;
export const EM_386 = 3;
export const EM_MIPS = 8;
export const EM_PPC = 20;
export const EM_PPC64 = 21;
export const EM_ARM = 40;
export const EM_IA_64 = 50;
export const EM_X86_64 = 62;
export const EM_AARCH64 = 183;
export const EM_RISCV = 243;

export const ELF_MACHINE: readonly ElfOptionEntry[] = [
  [EM_NONE, "EM_NONE", "No machine."],
  [EM_386, "EM_386", "Intel 80386."],
  [EM_MIPS, "EM_MIPS", "MIPS."],
  [EM_PPC, "EM_PPC", "PowerPC."],
  [EM_PPC64, "EM_PPC64", "PowerPC64."],
  [EM_ARM, "EM_ARM", "ARM."],
  [EM_IA_64, "EM_IA_64", "IA-64."],
  [EM_X86_64, "EM_X86_64", "x86-64."],
  [EM_AARCH64, "EM_AARCH64", "AArch64."],
  [EM_RISCV, "EM_RISCV", "RISC-V."]
];

// Section types (sh_type)
export const SHT_NULL = 0;
export const SHT_PROGBITS = 1;
export const SHT_SYMTAB = 2;
export const SHT_STRTAB = 3;
export const SHT_RELA = 4;
export const SHT_HASH = 5;
export const SHT_DYNAMIC = 6;
export const SHT_NOTE = 7;
export const SHT_NOBITS = 8;
export const SHT_REL = 9;
export const SHT_SHLIB = 10;
export const SHT_DYNSYM = 11;

export const SECTION_TYPES: readonly ElfOptionEntry[] = [
  [SHT_NULL, "SHT_NULL", "Unused."],
  [SHT_PROGBITS, "SHT_PROGBITS", "Program-defined contents."],
  [SHT_SYMTAB, "SHT_SYMTAB", "Linker symbol table."],
  [SHT_STRTAB, "SHT_STRTAB", "String table."],
  [SHT_RELA, "SHT_RELA", "Relocation entries with addends."],
  [SHT_HASH, "SHT_HASH", "Symbol hash table."],
  [SHT_DYNAMIC, "SHT_DYNAMIC", "Dynamic linking information."],
  [SHT_NOTE, "SHT_NOTE", "Auxiliary information notes."],
  [SHT_NOBITS, "SHT_NOBITS", "Zero-initialized data (BSS)."],
  [SHT_REL, "SHT_REL", "Relocation entries without addends."],
  [SHT_SHLIB, "SHT_SHLIB", "Reserved (should not appear)."],
  [SHT_DYNSYM, "SHT_DYNSYM", "Dynamic symbol table."]
];

// Section flags (sh_flags)
export const SHF_WRITE = 0x1;
export const SHF_ALLOC = 0x2;
export const SHF_EXECINSTR = 0x4;
export const SHF_MERGE = 0x10;
export const SHF_STRINGS = 0x20;
export const SHF_INFO_LINK = 0x40;
export const SHF_LINK_ORDER = 0x80;
export const SHF_OS_NONCONFORMING = 0x100;
export const SHF_GROUP = 0x200;
export const SHF_TLS = 0x400;

export const SECTION_FLAGS: readonly ElfOptionEntry[] = [
  [SHF_WRITE, "SHF_WRITE", "Section is writable at runtime."],
  [SHF_ALLOC, "SHF_ALLOC", "Occupies memory when loaded."],
  [SHF_EXECINSTR, "SHF_EXECINSTR", "Contains executable code."],
  [SHF_MERGE, "SHF_MERGE", "May be merged to eliminate duplicates."],
  [SHF_STRINGS, "SHF_STRINGS", "Contains NUL-terminated strings."],
  [SHF_INFO_LINK, "SHF_INFO_LINK", "sh_info field has extra meaning."],
  [SHF_LINK_ORDER, "SHF_LINK_ORDER", "Special ordering requirements."],
  [SHF_OS_NONCONFORMING, "SHF_OS_NONCONFORMING", "Requires OS-specific processing."],
  [SHF_GROUP, "SHF_GROUP", "Section is part of a group."],
  [SHF_TLS, "SHF_TLS", "Thread-local storage."]
];

// Special section indices (st_shndx)
export const SHN_UNDEF = 0;
export const SHN_ABS = 0xfff1;
export const SHN_COMMON = 0xfff2;

export const SECTION_INDICES: readonly ElfOptionEntry[] = [
  [SHN_UNDEF, "SHN_UNDEF", "Undefined symbol."],
  [SHN_ABS, "SHN_ABS", "Absolute value, not affected by relocation."],
  [SHN_COMMON, "SHN_COMMON", "Common block not yet allocated."]
];

// Symbol types (low nibble of st_info)
export const STT_NOTYPE = 0;
export const STT_OBJECT = 1;
export const STT_FUNC = 2;
export const STT_SECTION = 3;
export const STT_FILE = 4;
export const STT_COMMON = 5;
export const STT_TLS = 6;
export const STT_GNU_IFUNC = 10;

export const SYMBOL_TYPES: readonly ElfOptionEntry[] = [
  [STT_NOTYPE, "STT_NOTYPE"],
  [STT_OBJECT, "STT_OBJECT"],
  [STT_FUNC, "STT_FUNC"],
  [STT_SECTION, "STT_SECTION"],
  [STT_FILE, "STT_FILE"],
  [STT_COMMON, "STT_COMMON"],
  [STT_TLS, "STT_TLS"],
  [STT_GNU_IFUNC, "STT_GNU_IFUNC"]
];

// Symbol bindings (high nibble of st_info)
export const STB_LOCAL = 0;
export const STB_GLOBAL = 1;
export const STB_WEAK = 2;
export const STB_GNU_UNIQUE = 10;

export const SYMBOL_BINDINGS: readonly ElfOptionEntry[] = [
  [STB_LOCAL, "STB_LOCAL"],
  [STB_GLOBAL, "STB_GLOBAL"],
  [STB_WEAK, "STB_WEAK"],
  [STB_GNU_UNIQUE, "STB_GNU_UNIQUE"]
];

// Segment types (p_type)
export const PT_NULL = 0;
export const PT_LOAD = 1;
export const PT_DYNAMIC = 2;
export const PT_INTERP = 3;
export const PT_NOTE = 4;
export const PT_SHLIB = 5;
export const PT_PHDR = 6;
export const PT_TLS = 7;
export const PT_NUM = 8;
export const PT_LOOS = 0x60000000;
export const PT_GNU_EH_FRAME = 0x6474e550;
export const PT_GNU_STACK = 0x6474e551;
export const PT_GNU_RELRO = 0x6474e552;
export const PT_PAX_FLAGS = 0x65041580;
export const PT_HIOS = 0x6fffffff;
export const PT_LOPROC = 0x70000000;
export const PT_HIPROC = 0x7fffffff;

// PT_NUM and the OS/processor range markers have no display name.
export const PROGRAM_TYPES: readonly ElfOptionEntry[] = [
  [PT_NULL, "NULL", "Unused program header entry."],
  [PT_LOAD, "LOAD", "Loadable segment."],
  [PT_DYNAMIC, "DYNAMIC", "Dynamic linking information."],
  [PT_INTERP, "INTERP", "Program interpreter path."],
  [PT_NOTE, "NOTE", "Auxiliary information notes."],
  [PT_SHLIB, "SHLIB", "Reserved (should not appear)."],
  [PT_PHDR, "PHDR", "Program header table itself."],
  [PT_TLS, "TLS", "Thread-local storage template."],
  [PT_GNU_EH_FRAME, "GNU_EH_FRAME", "Exception handling frames (GNU)."],
  [PT_GNU_STACK, "GNU_STACK", "Stack flags (GNU)."],
  [PT_GNU_RELRO, "GNU_RELRO", "Read-only after relocations (GNU)."],
  [PT_PAX_FLAGS, "PAX_FLAGS", "PaX protection flags."]
];

// Segment permission flags (p_flags)
export const PF_NONE = 0;
export const PF_X = 0x1;
export const PF_W = 0x2;
export const PF_R = 0x4;

export const PROGRAM_FLAGS: readonly ElfOptionEntry[] = [
  [PF_X, "PF_X", "Execute permission."],
  [PF_W, "PF_W", "Writable."],
  [PF_R, "PF_R", "Readable."]
];
