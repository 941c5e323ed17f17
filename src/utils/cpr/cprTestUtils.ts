// builds arbitrary (possibly malformed) CPR containers for tests.

import { concatBytes, writeFourCC, writeUint32LE } from "../bin";
import { FormatError, FormatErrorKind, kBlockSize } from "./cpr";

export type RawChunk = {
  id: string;
  declaredLength?: number;
  slot?: Uint8Array; // defaults to a full zeroed slot
};

export function buildRawChunk(chunk: RawChunk): Uint8Array {
  const slot = chunk.slot ?? new Uint8Array(kBlockSize);
  const header = new Uint8Array(8);
  writeFourCC(header, 0, chunk.id);
  writeUint32LE(header, 4, chunk.declaredLength ?? kBlockSize);
  return concatBytes([header, slot]);
}

export function buildRawCpr(chunks: RawChunk[], sizeField?: number): Uint8Array {
  const body = concatBytes(chunks.map(buildRawChunk));
  const header = new Uint8Array(12);
  writeFourCC(header, 0, "RIFF");
  writeUint32LE(header, 4, sizeField ?? 4 + body.length);
  writeFourCC(header, 8, "AMS!");
  return concatBytes([header, body]);
}

export function chunkIds(count: number): RawChunk[] {
  return Array.from({ length: count }, (_, i) => ({ id: `cb${String(i).padStart(2, "0")}` }));
}

// returns the FormatError kind thrown by fn, or null if it didn't throw.
export function formatErrorKindOf(fn: () => unknown): FormatErrorKind | null {
  try {
    fn();
  } catch (e) {
    if (e instanceof FormatError) {
      return e.kind;
    }
    throw e;
  }
  return null;
}

export function filledBlock(value: number): Uint8Array {
  return new Uint8Array(kBlockSize).fill(value);
}
