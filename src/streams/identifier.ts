const ID_PATTERN = /^(\d+)(?:-(\d+))?$/;
const MAX_PART = (1n << 64n) - 1n;

/**
 * Stream entry id: `<milliseconds>-<sequence>`.
 * Ids are strictly increasing within a stream and never reused.
 */
export class StreamId {
  static readonly MIN = new StreamId(0n, 0n);

  private constructor(
    readonly timestamp: bigint,
    readonly sequence: bigint
  ) {}

  static of(timestamp: bigint | number, sequence: bigint | number = 0n): StreamId {
    const ts = BigInt(timestamp);
    const seq = BigInt(sequence);
    if (ts < 0n || seq < 0n || ts > MAX_PART || seq > MAX_PART) {
      throw new RangeError(`Stream id parts out of range: ${ts}-${seq}`);
    }
    return new StreamId(ts, seq);
  }

  /**
   * Parse `"<ms>-<seq>"`; a bare `"<ms>"` means sequence 0
   */
  static tryParse(value: string): StreamId | undefined {
    const match = ID_PATTERN.exec(value);
    if (!match) {
      return undefined;
    }
    const ts = BigInt(match[1]);
    const seq = match[2] === undefined ? 0n : BigInt(match[2]);
    if (ts > MAX_PART || seq > MAX_PART) {
      return undefined;
    }
    return new StreamId(ts, seq);
  }

  static parse(value: string): StreamId {
    const id = StreamId.tryParse(value);
    if (!id) {
      throw new RangeError(`Invalid stream id: "${value}"`);
    }
    return id;
  }

  static max(a: StreamId, b: StreamId): StreamId {
    return a.compare(b) >= 0 ? a : b;
  }

  compare(other: StreamId): -1 | 0 | 1 {
    if (this.timestamp !== other.timestamp) {
      return this.timestamp < other.timestamp ? -1 : 1;
    }
    if (this.sequence !== other.sequence) {
      return this.sequence < other.sequence ? -1 : 1;
    }
    return 0;
  }

  equals(other: StreamId): boolean {
    return this.compare(other) === 0;
  }

  isAfter(other: StreamId): boolean {
    return this.compare(other) > 0;
  }

  isBefore(other: StreamId): boolean {
    return this.compare(other) < 0;
  }

  /**
   * Smallest id strictly greater than this one
   */
  next(): StreamId {
    if (this.sequence < MAX_PART) {
      return new StreamId(this.timestamp, this.sequence + 1n);
    }
    if (this.timestamp < MAX_PART) {
      return new StreamId(this.timestamp + 1n, 0n);
    }
    throw new RangeError('Stream id space exhausted');
  }

  toString(): string {
    return `${this.timestamp}-${this.sequence}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
