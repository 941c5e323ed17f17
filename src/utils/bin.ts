// utilities for dealing with binary data / parsing / etc

export function kbToBytes(kb: number): number {
  return kb * 1024;
}

export function readUint32LE(data: Uint8Array, offset: number): number {
  // >>> 0 keeps the top bit from turning the result negative.
  return (data[offset] | (data[offset + 1] << 8) | (data[offset + 2] << 16) | (data[offset + 3] << 24)) >>> 0;
}

export function writeUint32LE(data: Uint8Array, offset: number, value: number): void {
  data[offset] = value & 0xff;
  data[offset + 1] = (value >>> 8) & 0xff;
  data[offset + 2] = (value >>> 16) & 0xff;
  data[offset + 3] = (value >>> 24) & 0xff;
}

// four-character codes are plain 7-bit ascii.
export function readFourCC(data: Uint8Array, offset: number): string {
  return String.fromCharCode(data[offset], data[offset + 1], data[offset + 2], data[offset + 3]);
}

export function writeFourCC(data: Uint8Array, offset: number, fourCC: string): void {
  if (fourCC.length !== 4) {
    throw new Error(`FourCC must be exactly 4 characters: "${fourCC}"`);
  }
  for (let i = 0; i < 4; i++) {
    data[offset + i] = fourCC.charCodeAt(i) & 0x7f;
  }
}

export function concatBytes(parts: Uint8Array[]): Uint8Array {
  let totalLength = 0;
  for (const part of parts) {
    totalLength += part.length;
  }
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

// copies `data` into a zeroed buffer of `size` bytes. never truncates.
export function padToSize(data: Uint8Array, size: number): Uint8Array {
  if (data.length > size) {
    throw new Error(`Data too large to pad: ${data.length} bytes (max ${size})`);
  }
  const result = new Uint8Array(size);
  result.set(data, 0);
  return result;
}
