// types & constants for the CPR cartridge container (Amstrad Plus / GX4000).

import { kbToBytes } from "../bin";

// offset   size   description
// -----------------------------------------
// 0        4      "RIFF"
// 4        4      total size, u32 LE = file size - 8
// 8        4      "AMS!"
// 12       ...    chunks
//
// each chunk:
// 0        4      "cb" + 2 decimal digits (cb00, cb01, ...)
// 4        4      declared data length, u32 LE
// 8        16384  data slot (always full size on disk)

export const kCprContainerTag = "RIFF";
export const kCprFormTag = "AMS!";
export const kCprChunkIdPrefix = "cb";

export const kCprHeaderSize = 12;
export const kCprChunkHeaderSize = 8;

export const kBlockSize = kbToBytes(16);
export const kMaxBlockCount = 32;
export const kMaxImageSize = kBlockSize * kMaxBlockCount; // 512kb

// a block is always exactly kBlockSize bytes.
export type Block = Uint8Array;

export type RomImage = {
  readonly blocks: readonly Block[];
};

// decoded view of one chunk, for diagnostics.
export type CprChunk = {
  id: string;
  index: number; // from the id digits; not necessarily the position
  declaredLength: number;
  offset: number; // file offset of the chunk header
  data: Block;
};

export type CprContainer = {
  totalSize: number;
  chunks: CprChunk[];
};

type FormatErrorKindInfo = {
  title: string;
};

export const kFormatErrorKinds = {
  Truncated: { title: "Input ends before the structure being read" },
  BadMagic: { title: "Container tag is not RIFF" },
  BadFormTag: { title: "Form tag is not AMS!" },
  BadChunkId: { title: "Chunk id is not cb + two digits" },
  SizeMismatch: { title: "RIFF size field disagrees with file length" },
  ChunkTooLarge: { title: "Chunk larger than one block" },
  BlockCountOutOfRange: { title: `Block count outside 1..${kMaxBlockCount}` },
  SizeOutOfRange: { title: `Raw image size outside 1..${kMaxImageSize} bytes` },
} as const satisfies Record<string, FormatErrorKindInfo>;

export type FormatErrorKind = keyof typeof kFormatErrorKinds;

export class FormatError extends Error {
  constructor(
    public readonly kind: FormatErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "FormatError";
  }
}

export function formatChunkId(index: number): string {
  return `${kCprChunkIdPrefix}${String(index).padStart(2, "0")}`;
}

// "cb07" -> 7; anything else -> null
export function parseChunkId(id: string): number | null {
  const match = /^cb([0-9]{2})$/.exec(id);
  if (!match) {
    return null;
  }
  return parseInt(match[1], 10);
}

export function checkBlockCount(count: number): void {
  if (count < 1 || count > kMaxBlockCount) {
    throw new FormatError("BlockCountOutOfRange", `Block count ${count} out of range (1..${kMaxBlockCount})`);
  }
}
