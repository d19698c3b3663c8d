/**
 * Incremental FNV-1a, 64-bit variant, feeding the dungeon checksum.
 */

const OFFSET_BASIS = 0xcbf29ce484222325n;
const PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

export class FNV64Hasher {
  private state = OFFSET_BASIS;

  updateByte(byte: number): this {
    this.state = ((this.state ^ BigInt(byte & 0xff)) * PRIME) & MASK_64;
    return this;
  }

  updateBytes(data: Uint8Array): this {
    for (const byte of data) {
      this.updateByte(byte);
    }
    return this;
  }

  /**
   * Feed a 32-bit integer as four little-endian bytes. Negative values are
   * taken as their two's complement.
   */
  updateInt32(value: number): this {
    const bits = value >>> 0;
    for (let shift = 0; shift < 32; shift += 8) {
      this.updateByte(bits >>> shift);
    }
    return this;
  }

  /** Current state as 16 lowercase hex digits */
  digest(): string {
    return this.state.toString(16).padStart(16, "0");
  }
}

export function createFNV64Hasher(): FNV64Hasher {
  return new FNV64Hasher();
}
