import { ErrorKind, fail } from "../common/errors.js";
import { Width, toUnsigned } from "./registers.js";

/**
 * The only memory an asm block can touch: its data slots followed by its
 * stack. Addresses are offsets into this region.
 */
export class Memory {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;

  constructor(readonly size: number) {
    this.bytes = new Uint8Array(size);
    this.view = new DataView(this.bytes.buffer);
  }

  read(address: bigint, width: Width): bigint {
    const at = this.check(address, width);
    switch (width) {
      case 8:
        return BigInt(this.view.getUint8(at));
      case 16:
        return BigInt(this.view.getUint16(at, true));
      case 32:
        return BigInt(this.view.getUint32(at, true));
      case 64:
        return this.view.getBigUint64(at, true);
    }
  }

  write(address: bigint, width: Width, value: bigint) {
    const at = this.check(address, width);
    const v = toUnsigned(value, width);
    switch (width) {
      case 8:
        this.view.setUint8(at, Number(v));
        break;
      case 16:
        this.view.setUint16(at, Number(v), true);
        break;
      case 32:
        this.view.setUint32(at, Number(v), true);
        break;
      case 64:
        this.view.setBigUint64(at, v, true);
        break;
    }
  }

  writeBytes(address: number, data: Uint8Array) {
    this.check(BigInt(address), 8, data.length);
    this.bytes.set(data, address);
  }

  private check(address: bigint, width: Width, length = width / 8): number {
    if (address < 0n || address + BigInt(length) > BigInt(this.size)) {
      return fail(ErrorKind.MemoryFault, {
        address: address.toString(),
        size: length,
        limit: this.size,
      });
    }
    return Number(address);
  }
}
