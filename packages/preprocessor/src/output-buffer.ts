/**
 * Growable byte buffer for preprocessor output.
 *
 * Capacity is checked on every append and doubled when exhausted, so the
 * initial size is only a hint.
 */

const MIN_CAPACITY = 64;

export class OutputBuffer {
  private bytes: Uint8Array;
  private used = 0;

  constructor(capacityHint: number = MIN_CAPACITY) {
    this.bytes = new Uint8Array(Math.max(MIN_CAPACITY, Math.ceil(capacityHint)));
  }

  /** Number of bytes written so far (the write position) */
  get length(): number {
    return this.used;
  }

  get capacity(): number {
    return this.bytes.length;
  }

  appendByte(byte: number): void {
    this.ensureCapacity(this.used + 1);
    this.bytes[this.used++] = byte & 0xff;
  }

  /**
   * Append `text[start, end)` from a byte string.
   */
  appendByteString(text: string, start: number = 0, end: number = text.length): void {
    if (end <= start) return;
    this.ensureCapacity(this.used + (end - start));
    for (let i = start; i < end; i++) {
      this.bytes[this.used++] = text.charCodeAt(i) & 0xff;
    }
  }

  /**
   * Copy of the written bytes.
   */
  toBytes(): Uint8Array {
    return this.bytes.slice(0, this.used);
  }

  private ensureCapacity(required: number): void {
    if (required <= this.bytes.length) return;

    let capacity = this.bytes.length;
    while (capacity < required) {
      capacity *= 2;
    }

    const grown = new Uint8Array(capacity);
    grown.set(this.bytes.subarray(0, this.used));
    this.bytes = grown;
  }
}
