import { readFourCC, readUint32LE } from "../bin";
import {
  checkBlockCount,
  CprChunk,
  CprContainer,
  FormatError,
  kBlockSize,
  kCprChunkHeaderSize,
  kCprContainerTag,
  kCprFormTag,
  kCprHeaderSize,
  kMaxBlockCount,
  parseChunkId,
  RomImage,
} from "./cpr";

function parseContainerHeader(data: Uint8Array): number {
  if (data.length < kCprHeaderSize) {
    throw new FormatError("Truncated", `File too short for CPR header: ${data.length} bytes`);
  }
  const tag = readFourCC(data, 0);
  if (tag !== kCprContainerTag) {
    throw new FormatError("BadMagic", `Not a RIFF file (found "${tag}")`);
  }
  const formTag = readFourCC(data, 8);
  if (formTag !== kCprFormTag) {
    throw new FormatError("BadFormTag", `Not a CPR file (form tag "${formTag}", expected "${kCprFormTag}")`);
  }
  const totalSize = readUint32LE(data, 4);
  if (totalSize !== data.length - 8) {
    throw new FormatError(
      "SizeMismatch",
      `RIFF size field is ${totalSize} but ${data.length - 8} bytes follow it`,
    );
  }
  return totalSize;
}

function parseThisChunk(data: Uint8Array, offset: number): { chunk: CprChunk; nextOffset: number } {
  if (offset + kCprChunkHeaderSize > data.length) {
    throw new FormatError("Truncated", `Unexpected end of data while reading chunk header at offset ${offset}`);
  }
  const id = readFourCC(data, offset);
  const index = parseChunkId(id);
  if (index === null) {
    throw new FormatError("BadChunkId", `Bad chunk id "${id}" at offset ${offset}`);
  }
  const declaredLength = readUint32LE(data, offset + 4);
  if (declaredLength > kBlockSize) {
    throw new FormatError("ChunkTooLarge", `Chunk ${id} declares ${declaredLength} bytes (max ${kBlockSize})`);
  }
  // the slot is always full size; declaredLength is informational.
  const dataOffset = offset + kCprChunkHeaderSize;
  const nextOffset = dataOffset + kBlockSize;
  if (nextOffset > data.length) {
    throw new FormatError("Truncated", `Unexpected end of data while reading chunk ${id} data`);
  }
  return {
    chunk: {
      id,
      index,
      declaredLength,
      offset,
      data: data.slice(dataOffset, nextOffset),
    },
    nextOffset,
  };
}

export function parseCprContainer(data: Uint8Array): CprContainer {
  const totalSize = parseContainerHeader(data);
  const chunks: CprChunk[] = [];
  let offset = kCprHeaderSize;
  while (offset < data.length) {
    // anything past the last allowed chunk is already too many
    if (chunks.length === kMaxBlockCount) {
      checkBlockCount(chunks.length + 1);
    }
    const { chunk, nextOffset } = parseThisChunk(data, offset);
    chunks.push(chunk);
    offset = nextOffset;
  }
  checkBlockCount(chunks.length);
  return { totalSize, chunks };
}

// onChunk sees every chunk in file order, for diagnostics.
export function decodeCpr(data: Uint8Array, onChunk?: (chunk: CprChunk, position: number) => void): RomImage {
  const { chunks } = parseCprContainer(data);
  if (onChunk) {
    chunks.forEach(onChunk);
  }
  return { blocks: chunks.map((chunk) => chunk.data) };
}
