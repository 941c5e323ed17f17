// BIN has no structure; it's just the blocks back to back.

import { concatBytes, padToSize } from "../bin";
import { FormatError, kBlockSize, kMaxImageSize, RomImage } from "./cpr";

export function decodeBin(data: Uint8Array): RomImage {
  if (data.length < 1 || data.length > kMaxImageSize) {
    throw new FormatError("SizeOutOfRange", `Raw image is ${data.length} bytes (must be 1..${kMaxImageSize})`);
  }
  const blocks: Uint8Array[] = [];
  for (let offset = 0; offset < data.length; offset += kBlockSize) {
    // final partial block gets zero-padded
    blocks.push(padToSize(data.subarray(offset, Math.min(offset + kBlockSize, data.length)), kBlockSize));
  }
  return { blocks };
}

// no trimming of trailing zeros; output is always blockCount * kBlockSize.
export function encodeBin(image: RomImage): Uint8Array {
  return concatBytes(image.blocks.map((block) => padToSize(block, kBlockSize)));
}
