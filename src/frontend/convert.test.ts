import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import * as cons from "../utils/console";
import { FormatError } from "../utils/cpr/cpr";
import { buildRawCpr } from "../utils/cpr/cprTestUtils";
import { convertCommand, convertCore } from "./convert";

function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "cprbin-convert-"));
}

describe("File conversion", () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should convert BIN to CPR and back again", async () => {
    const binPath = path.join(dir, "game.bin");
    const cprPath = path.join(dir, "game.cpr");
    const roundTripPath = path.join(dir, "roundtrip.bin");
    const input = new Uint8Array(20000).fill(0x3c);
    fs.writeFileSync(binPath, input);

    const toCpr = await convertCore("toCpr", binPath, cprPath);
    expect(toCpr).toEqual({ blockCount: 2, inputBytes: 20000, outputBytes: 12 + 2 * 16392 });
    expect(fs.readFileSync(cprPath).subarray(0, 4).toString("latin1")).toBe("RIFF");

    const toBin = await convertCore("toBin", cprPath, roundTripPath);
    expect(toBin).toEqual({ blockCount: 2, inputBytes: 12 + 2 * 16392, outputBytes: 32768 });
    const output = fs.readFileSync(roundTripPath);
    expect(output.subarray(0, 20000).every((b) => b === 0x3c)).toBe(true);
    expect(output.subarray(20000).every((b) => b === 0)).toBe(true);
  });

  it("should leave no output behind when decoding fails", async () => {
    const cprPath = path.join(dir, "bad.cpr");
    const binPath = path.join(dir, "bad.bin");
    fs.writeFileSync(cprPath, Buffer.from("RIFX\0\0\0\0AMS!", "latin1"));

    await expect(convertCore("toBin", cprPath, binPath)).rejects.toBeInstanceOf(FormatError);
    expect(fs.readdirSync(dir)).toEqual(["bad.cpr"]);
  });

  it("should warn about short declared chunk lengths", async () => {
    const cprPath = path.join(dir, "short.cpr");
    fs.writeFileSync(cprPath, buildRawCpr([{ id: "cb00", declaredLength: 100 }]));
    const warnSpy = jest.spyOn(cons, "warning").mockImplementation(() => undefined);

    try {
      await convertCore("toBin", cprPath, path.join(dir, "short.bin"));
      expect(warnSpy).toHaveBeenCalledWith("Chunk cb00 declares 100 bytes; reading the full 16384-byte slot");
    } finally {
      warnSpy.mockRestore();
    }
  });

  it("should warn about chunks out of sequence and keep file order", async () => {
    const cprPath = path.join(dir, "swapped.cpr");
    const binPath = path.join(dir, "swapped.bin");
    fs.writeFileSync(
      cprPath,
      buildRawCpr([
        { id: "cb01", slot: new Uint8Array(16384).fill(1) },
        { id: "cb00", slot: new Uint8Array(16384).fill(2) },
      ]),
    );
    const warnSpy = jest.spyOn(cons, "warning").mockImplementation(() => undefined);

    try {
      await convertCore("toBin", cprPath, binPath);
      expect(warnSpy).toHaveBeenCalledWith("Chunk cb01 found at position 0; keeping file order");
      expect(warnSpy).toHaveBeenCalledWith("Chunk cb00 found at position 1; keeping file order");
      const output = fs.readFileSync(binPath);
      expect(output[0]).toBe(1);
      expect(output[16384]).toBe(2);
    } finally {
      warnSpy.mockRestore();
    }
  });

  it("should report the error kind and exit nonzero", async () => {
    const binPath = path.join(dir, "empty.bin");
    fs.writeFileSync(binPath, new Uint8Array(0));
    const errorSpy = jest.spyOn(cons, "error").mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit: ${code}`);
    });

    try {
      await expect(convertCommand("toCpr", binPath, path.join(dir, "empty.cpr"))).rejects.toThrow("process.exit: 1");
      expect(errorSpy).toHaveBeenCalledWith("SizeOutOfRange: Raw image is 0 bytes (must be 1..524288)");
      expect(fs.existsSync(path.join(dir, "empty.cpr"))).toBe(false);
    } finally {
      errorSpy.mockRestore();
      exitSpy.mockRestore();
      cons.setLogFile(null);
    }
  });
});
