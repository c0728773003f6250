/**
 * Growable byte buffer for assembling DER output.
 * Bytes are appended at the end; the buffer doubles its capacity as needed.
 */
export class ByteBuffer {
  private _data: Uint8Array;
  private _length: number;

  private constructor(data: Uint8Array, length: number) {
    this._data = data;
    this._length = length;
  }

  /** Allocate an empty buffer with optional initial byte capacity. */
  static alloc(initialByteCapacity = 64): ByteBuffer {
    return new ByteBuffer(new Uint8Array(Math.max(1, initialByteCapacity)), 0);
  }

  /** Number of bytes written so far. */
  get length(): number {
    return this._length;
  }

  /** Append a single byte (0..255). */
  writeByte(byte: number): void {
    if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) {
      throw new Error(`writeByte: byte must be 0..255, got ${byte}`);
    }
    this.ensureCapacity(this._length + 1);
    this._data[this._length++] = byte;
  }

  /** Append raw bytes. */
  writeBytes(data: Uint8Array | readonly number[]): void {
    this.ensureCapacity(this._length + data.length);
    this._data.set(data, this._length);
    this._length += data.length;
  }

  /** Return a compact copy of the written bytes. */
  toUint8Array(): Uint8Array {
    return this._data.slice(0, this._length);
  }

  private ensureCapacity(bytesNeeded: number): void {
    if (bytesNeeded <= this._data.length) return;
    let newSize = this._data.length;
    while (newSize < bytesNeeded) {
      newSize *= 2;
    }
    const newData = new Uint8Array(newSize);
    newData.set(this._data.subarray(0, this._length));
    this._data = newData;
  }
}
