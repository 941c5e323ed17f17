import { loadSettings } from "../backend/settings";
import * as cons from "../utils/console";
import { CprChunk, FormatError, kBlockSize, kFormatErrorKinds, RomImage } from "../utils/cpr/cpr";
import { decodeCpr } from "../utils/cpr/cprLoader";
import { encodeCpr } from "../utils/cpr/cprWriter";
import { decodeBin, encodeBin } from "../utils/cpr/binImage";
import { describeError } from "../utils/errorHandling";
import { readBinaryFileAsync, writeBinaryFileAtomic } from "../utils/fileSystem";
import { formatBytes } from "../utils/utils";
import { ConversionDirection } from "./parseOptions";

export type ConvertResult = {
  blockCount: number;
  inputBytes: number;
  outputBytes: number;
};

// reports anything odd about the chunk table.
function reportChunk(chunk: CprChunk, position: number, verbose: boolean): void {
  if (verbose) {
    cons.dim(`  ${chunk.id} @ 0x${chunk.offset.toString(16).padStart(6, "0")}  declared ${chunk.declaredLength} bytes`);
  }
  if (chunk.index !== position) {
    cons.warning(`Chunk ${chunk.id} found at position ${position}; keeping file order`);
  }
  if (chunk.declaredLength < kBlockSize) {
    cons.warning(`Chunk ${chunk.id} declares ${chunk.declaredLength} bytes; reading the full ${kBlockSize}-byte slot`);
  }
}

export type ConvertedBytes = {
  image: RomImage;
  output: Uint8Array;
};

export function convertBytes(direction: ConversionDirection, input: Uint8Array, verbose: boolean = false): ConvertedBytes {
  switch (direction) {
    case "toBin": {
      const image = decodeCpr(input, (chunk, position) => reportChunk(chunk, position, verbose));
      return { image, output: encodeBin(image) };
    }
    case "toCpr": {
      const image = decodeBin(input);
      return { image, output: encodeCpr(image) };
    }
  }
}

// the whole output is built in memory before anything is written.
export async function convertCore(
  direction: ConversionDirection,
  inputPath: string,
  outputPath: string,
  verbose: boolean = false,
): Promise<ConvertResult> {
  const input = await readBinaryFileAsync(inputPath);
  const { image, output } = convertBytes(direction, input, verbose);
  await writeBinaryFileAtomic(outputPath, output);
  return {
    blockCount: image.blocks.length,
    inputBytes: input.length,
    outputBytes: output.length,
  };
}

export async function convertCommand(direction: ConversionDirection, inputPath: string, outputPath: string): Promise<void> {
  const settings = loadSettings(process.cwd());
  cons.setLogFile(settings.logFilePath);

  try {
    const result = await convertCore(direction, inputPath, outputPath, settings.verbose);
    cons.success(`Successfully converted ${inputPath} to ${outputPath}`);
    cons.info(
      `  ${result.blockCount} block(s) of ${formatBytes(kBlockSize)}; ${formatBytes(result.inputBytes)} in, ${formatBytes(result.outputBytes)} out`,
    );
  } catch (e) {
    if (e instanceof FormatError) {
      cons.error(`${e.kind}: ${e.message}`);
      cons.dim(`  (${kFormatErrorKinds[e.kind].title})`);
    } else {
      cons.error(`Error: ${describeError(e)}`);
    }
    process.exit(1);
  }
}
