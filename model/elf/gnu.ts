"use strict";

import type { SegmentIndex } from "./segments.js";
import type { ElfWidth, ElfWordType } from "./width.js";

export interface GnuStack {
  readonly segmentIndex: SegmentIndex;
  readonly isExecutable: boolean;
}

export interface GnuRelroRegion<W extends ElfWidth> {
  readonly segmentIndex: SegmentIndex;
  readonly refSegmentIndex: SegmentIndex;
  readonly addrStart: ElfWordType<W>;
  readonly size: ElfWordType<W>;
}
