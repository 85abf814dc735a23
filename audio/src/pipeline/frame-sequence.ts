import { CancelledError } from '../errors.js';

/**
 * Replayable, lazily produced sequence of encoded audio frames.
 *
 * One producer appends frames; any number of readers replay them from the
 * start and wait for the producer when they catch up. A completed sequence is
 * immutable and is what the audio cache stores.
 *
 * Readers hold a lease. When the last lease of an unfinished sequence is
 * released, `onAbandoned` fires so the producer can stop work nobody wants.
 *
 * Once more than `maxRetainedBytes` have been produced the sequence stops
 * being replayable: frames every open reader has passed are dropped and no
 * new reader may open it.
 */
export class FrameSequence {
  private frames: Buffer[] = [];
  /** Index of `frames[0]` in the whole sequence. */
  private base = 0;
  private bytes = 0;
  private done = false;
  private failure: Error | null = null;
  private listeners = new Set<() => void>();
  private readers = new Set<FrameReader>();
  private retaining = true;

  constructor(
    readonly key: string,
    private readonly onAbandoned?: () => void,
    private readonly maxRetainedBytes: number = Infinity,
  ) {}

  static of(key: string, frames: readonly Buffer[]): FrameSequence {
    const sequence = new FrameSequence(key);
    for (const frame of frames) sequence.push(frame);
    sequence.complete();
    return sequence;
  }

  /** Frames produced so far, including dropped ones. */
  get length(): number {
    return this.base + this.frames.length;
  }

  get retainedFrames(): number {
    return this.frames.length;
  }

  get isReplayable(): boolean {
    return this.retaining;
  }

  get byteLength(): number {
    return this.bytes;
  }

  get isComplete(): boolean {
    return this.done;
  }

  get error(): Error | null {
    return this.failure;
  }

  get isSettled(): boolean {
    return this.done || this.failure !== null;
  }

  get activeReaders(): number {
    return this.readers.size;
  }

  push(frame: Buffer): void {
    if (this.isSettled) {
      throw new Error(`Frame sequence ${this.key} is already settled`);
    }
    this.frames.push(frame);
    this.bytes += frame.length;
    if (this.retaining && this.bytes > this.maxRetainedBytes) {
      this.retaining = false;
    }
    this.discardConsumed();
    this.notify();
  }

  complete(): void {
    if (this.isSettled) return;
    this.done = true;
    this.notify();
  }

  fail(error: Error): void {
    if (this.isSettled) return;
    this.failure = error;
    this.notify();
  }

  frameAt(index: number): Buffer | undefined {
    if (index < this.base) {
      throw new Error(`Frame ${index} of ${this.key} was already dropped`);
    }
    return this.frames[index - this.base];
  }

  /**
   * Opens a reader that replays the sequence from the first frame. Waits are
   * cut short with CancelledError when `signal` aborts.
   */
  open(signal?: AbortSignal): FrameReader {
    if (!this.retaining) {
      throw new Error(`Frame sequence ${this.key} is no longer replayable`);
    }
    const reader: FrameReader = new FrameReader(this, signal, () => this.release(reader));
    this.readers.add(reader);
    return reader;
  }

  /**
   * Drops frames behind the slowest open reader once the sequence is no
   * longer replayable.
   */
  discardConsumed(): void {
    if (this.retaining || this.readers.size === 0) return;

    let slowest = Infinity;
    for (const reader of this.readers) slowest = Math.min(slowest, reader.framesRead);
    const count = slowest - this.base;
    if (count <= 0) return;

    this.frames.splice(0, count);
    this.base += count;
  }

  /**
   * Resolves once something changes: a frame, completion or failure.
   */
  waitForChange(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new CancelledError());

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        this.listeners.delete(listener);
        reject(new CancelledError());
      };
      const listener = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.listeners.add(listener);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private release(reader: FrameReader): void {
    this.readers.delete(reader);
    if (this.readers.size === 0 && !this.isSettled) {
      this.onAbandoned?.();
      return;
    }
    this.discardConsumed();
  }

  private notify(): void {
    const listeners = Array.from(this.listeners);
    this.listeners.clear();
    for (const listener of listeners) listener();
  }
}

/**
 * A single lease-holding cursor over a FrameSequence.
 */
export class FrameReader implements AsyncIterable<Buffer> {
  private position = 0;
  private closed = false;

  constructor(
    readonly sequence: FrameSequence,
    private readonly signal: AbortSignal | undefined,
    private readonly onClose: () => void,
  ) {}

  get framesRead(): number {
    return this.position;
  }

  /**
   * Resolves when at least one frame is available or the sequence completed;
   * rejects if the sequence failed before producing anything.
   */
  async ready(): Promise<void> {
    while (this.sequence.length === 0 && !this.sequence.isSettled) {
      await this.sequence.waitForChange(this.signal);
    }
    const failure = this.sequence.error;
    if (failure && this.sequence.length === 0) throw failure;
  }

  /**
   * Next frame, or null at the end of a completed sequence. Throws the
   * producer's error once every produced frame has been read.
   */
  async next(): Promise<Buffer | null> {
    if (this.closed) return null;

    for (;;) {
      if (this.signal?.aborted) throw new CancelledError();

      const frame = this.sequence.frameAt(this.position);
      if (frame) {
        this.position++;
        this.sequence.discardConsumed();
        return frame;
      }
      if (this.sequence.isComplete) return null;
      const failure = this.sequence.error;
      if (failure) throw failure;

      await this.sequence.waitForChange(this.signal);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Buffer> {
    try {
      for (;;) {
        const frame = await this.next();
        if (frame === null) return;
        yield frame;
      }
    } finally {
      this.close();
    }
  }
}
