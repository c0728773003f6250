import { ByteBuffer } from '../src/ByteBuffer';

describe('ByteBuffer', () => {
  it('starts empty', () => {
    const buf = ByteBuffer.alloc();
    expect(buf.length).toBe(0);
    expect(buf.toUint8Array()).toEqual(new Uint8Array([]));
  });

  describe('writeByte', () => {
    it('appends single bytes', () => {
      const buf = ByteBuffer.alloc();
      buf.writeByte(0x30);
      buf.writeByte(0x00);
      expect(buf.length).toBe(2);
      expect(buf.toUint8Array()).toEqual(new Uint8Array([0x30, 0x00]));
    });

    it('rejects values outside 0..255', () => {
      const buf = ByteBuffer.alloc();
      expect(() => buf.writeByte(256)).toThrow('byte must be 0..255, got 256');
      expect(() => buf.writeByte(-1)).toThrow('byte must be 0..255');
      expect(() => buf.writeByte(1.5)).toThrow('byte must be 0..255');
    });
  });

  describe('writeBytes', () => {
    it('accepts arrays and Uint8Arrays', () => {
      const buf = ByteBuffer.alloc();
      buf.writeBytes([0x02, 0x01]);
      buf.writeBytes(new Uint8Array([0x05]));
      expect(buf.toUint8Array()).toEqual(new Uint8Array([0x02, 0x01, 0x05]));
    });

    it('grows past the initial capacity', () => {
      const buf = ByteBuffer.alloc(1);
      const data = new Uint8Array(1000).map((_, i) => i & 0xff);
      buf.writeBytes(data.subarray(0, 3));
      buf.writeBytes(data.subarray(3));
      expect(buf.length).toBe(1000);
      expect(buf.toUint8Array()).toEqual(data);
    });
  });

  it('toUint8Array returns a copy', () => {
    const buf = ByteBuffer.alloc();
    buf.writeBytes([1, 2, 3]);
    const out = buf.toUint8Array();
    out[0] = 9;
    expect(buf.toUint8Array()).toEqual(new Uint8Array([1, 2, 3]));
  });
});
