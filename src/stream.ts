import { createReceiverContext, ReceiverContext } from "./context";
import { MidiParseError } from "./errors";
import { decodeWithContext, MidiMsg } from "./message";

export type MidiMessageHandler = (msg: MidiMsg) => void;

export interface MidiStreamDecoderOptions {
  complexCc?: boolean;
  /**
   * Called with each decoding error and the bytes dropped to recover from it.
   * Without it, `feed` rethrows the error.
   */
  onError?: (err: MidiParseError, dropped: number[]) => void;
}

/**
 * Decodes a byte stream that arrives in arbitrary chunks, such as the data of a serial port
 * or a socket. A message cut by a chunk boundary is completed by a later `feed`.
 */
export class MidiStreamDecoder {
  private readonly complexCc: boolean;
  private readonly onError?: (err: MidiParseError, dropped: number[]) => void;
  private readonly handlers = new Set<MidiMessageHandler>();
  private ctx: ReceiverContext;
  private pending: number[] = [];

  constructor(options?: MidiStreamDecoderOptions) {
    this.complexCc = options?.complexCc ?? false;
    this.onError = options?.onError;
    this.ctx = createReceiverContext({ complexCc: this.complexCc });
  }

  onMessage(handler: MidiMessageHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  get context(): ReceiverContext {
    return this.ctx;
  }

  /** Bytes received but not yet decoded. */
  get buffered(): number {
    return this.pending.length + this.ctx.interrupted.length;
  }

  /** Decodes every complete message in the stream so far and dispatches it. */
  feed(chunk: ArrayLike<number>): MidiMsg[] {
    for (let i = 0; i < chunk.length; i++) this.pending.push(chunk[i] & 0xff);
    const decoded: MidiMsg[] = [];
    while (this.pending.length > 0) {
      let message: MidiMsg;
      let consumed: number;
      try {
        ({ message, consumed } = decodeWithContext(this.pending, this.ctx));
      } catch (err) {
        if (!(err instanceof MidiParseError)) throw err;
        if (err.kind === "unexpectedEnd" || err.kind === "noEndOfSystemExclusiveFlag") break;
        this.recover(err);
        continue;
      }
      this.pending.splice(0, consumed);
      decoded.push(message);
      this.emit(message);
    }
    return decoded;
  }

  reset(): void {
    this.ctx = createReceiverContext({ complexCc: this.complexCc });
    this.pending = [];
  }

  private recover(err: MidiParseError): void {
    let dropped: number[];
    if (this.ctx.interrupted.length > 0) {
      dropped = this.ctx.interrupted;
      this.ctx.interrupted = [];
    } else {
      dropped = this.pending.splice(0, 1);
    }
    if (this.onError === undefined) throw err;
    this.onError(err, dropped);
  }

  private emit(message: MidiMsg): void {
    for (const handler of this.handlers) {
      try {
        handler(message);
      } catch (err) {
        console.error("midi1: handler threw", err);
      }
    }
  }
}
