import { concatBytes, padToSize, writeFourCC, writeUint32LE } from "../bin";
import { assert } from "../errorHandling";
import {
  checkBlockCount,
  FormatError,
  formatChunkId,
  kBlockSize,
  kCprChunkHeaderSize,
  kCprContainerTag,
  kCprFormTag,
  kCprHeaderSize,
  RomImage,
} from "./cpr";

// id + declared length, then the full data slot.
// declared length is always kBlockSize in this direction.
export function serializeChunk(index: number, data: Uint8Array): Uint8Array {
  if (data.length > kBlockSize) {
    throw new FormatError("ChunkTooLarge", `Block ${index} is ${data.length} bytes (max ${kBlockSize})`);
  }
  const result = new Uint8Array(kCprChunkHeaderSize + kBlockSize);
  writeFourCC(result, 0, formatChunkId(index));
  writeUint32LE(result, 4, kBlockSize);
  result.set(padToSize(data, kBlockSize), kCprChunkHeaderSize);
  return result;
}

export function encodeCpr(image: RomImage): Uint8Array {
  checkBlockCount(image.blocks.length);

  const serializedChunks = image.blocks.map((block, index) => serializeChunk(index, block));

  const header = new Uint8Array(kCprHeaderSize);
  writeFourCC(header, 0, kCprContainerTag);
  // everything after the size field: form tag + chunks
  const totalSize = 4 + serializedChunks.length * (kCprChunkHeaderSize + kBlockSize);
  writeUint32LE(header, 4, totalSize);
  writeFourCC(header, 8, kCprFormTag);

  const output = concatBytes([header, ...serializedChunks]);
  assert(output.length === totalSize + 8, "RIFF size field out of step with output length");
  return output;
}
