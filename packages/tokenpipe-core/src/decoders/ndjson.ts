import { debugLog } from "../debug";
import { DecodeError, TransportError, errorOutcome } from "../errors";
import type { RecordDecoder, StreamOutcome } from "../types";

export interface NdjsonDecoderOptions<T> {
  /** Maps a parsed JSON record to the payload type. Throwing marks the record malformed. */
  parse?: (record: unknown) => T;
  /** Reads the completion flag from the raw record. Defaults to `record.done === true`. */
  isDone?: (record: unknown) => boolean;
  /** `error` ends the stream with a decode error; `skip` drops the line. */
  malformed?: "error" | "skip";
}

// Chunk-size lines from chunked transfer encoding when reading a raw socket.
const CHUNK_SIZE_LINE = /^[0-9a-fA-F]+$/;
const MAX_LOGGED_LINE = 100;

function defaultIsDone(record: unknown): boolean {
  return typeof record === "object" && record !== null && "done" in record && record.done === true;
}

class NdjsonDecoder<T> implements RecordDecoder<T> {
  private readonly iterator: AsyncIterator<Uint8Array | string>;
  private readonly textDecoder = new TextDecoder();
  private readonly parse: (record: unknown) => T;
  private readonly isDone: (record: unknown) => boolean;
  private readonly malformed: "error" | "skip";
  private buffer = "";
  private ended = false;
  private finished = false;

  constructor(source: AsyncIterable<Uint8Array | string>, options: NdjsonDecoderOptions<unknown>, parse: (record: unknown) => T) {
    this.iterator = source[Symbol.asyncIterator]();
    this.parse = parse;
    this.isDone = options.isDone ?? defaultIsDone;
    this.malformed = options.malformed ?? "error";
  }

  async next(): Promise<StreamOutcome<T> | undefined> {
    while (!this.finished) {
      const newline = this.buffer.indexOf("\n");
      if (newline !== -1) {
        const line = this.buffer.slice(0, newline).trim();
        this.buffer = this.buffer.slice(newline + 1);
        const outcome = this.decodeLine(line);
        if (outcome) return outcome;
        continue;
      }

      if (this.ended) {
        const rest = this.buffer.trim();
        this.buffer = "";
        this.finished = true;
        if (rest.length > 0) {
          return this.decodeLine(rest) ?? undefined;
        }
        return undefined;
      }

      let chunk: IteratorResult<Uint8Array | string>;
      try {
        chunk = await this.iterator.next();
      } catch (error) {
        this.finished = true;
        if (error instanceof TransportError) {
          return errorOutcome<T>(error);
        }
        const message = error instanceof Error ? error.message : String(error);
        return errorOutcome<T>(new TransportError(`read failed: ${message}`, { cause: error }));
      }

      if (chunk.done) {
        this.buffer += this.textDecoder.decode();
        this.ended = true;
        continue;
      }
      this.buffer += typeof chunk.value === "string" ? chunk.value : this.textDecoder.decode(chunk.value, { stream: true });
    }
    return undefined;
  }

  async close(): Promise<void> {
    const wasFinished = this.finished && this.ended;
    this.finished = true;
    if (!wasFinished) {
      await this.iterator.return?.();
    }
  }

  private decodeLine(line: string): StreamOutcome<T> | null {
    if (line.length === 0 || CHUNK_SIZE_LINE.test(line)) {
      return null;
    }

    let payload: T;
    let record: unknown;
    try {
      record = JSON.parse(line);
      payload = this.parse(record);
    } catch (error) {
      const preview = line.slice(0, MAX_LOGGED_LINE);
      if (this.malformed === "skip") {
        debugLog("poller", "skipping malformed record", { line: preview, error: String(error) });
        return null;
      }
      this.finished = true;
      const reason = error instanceof Error ? error.message : String(error);
      return errorOutcome<T>(new DecodeError(`malformed record: ${reason} (line: ${preview})`, { cause: error }));
    }

    const done = this.isDone(record);
    if (done) {
      this.finished = true;
    }
    return { ok: true, event: { payload, done } };
  }
}

/**
 * Decodes newline-delimited JSON from a byte or text source. Blank lines and
 * bare hexadecimal lines are ignored; a final record without a trailing
 * newline is still decoded.
 */
export function createNdjsonDecoder<T>(
  source: AsyncIterable<Uint8Array | string>,
  options: NdjsonDecoderOptions<T> & { parse: (record: unknown) => T },
): RecordDecoder<T>;
export function createNdjsonDecoder(source: AsyncIterable<Uint8Array | string>, options?: NdjsonDecoderOptions<unknown>): RecordDecoder<unknown>;
export function createNdjsonDecoder<T>(source: AsyncIterable<Uint8Array | string>, options: NdjsonDecoderOptions<T> = {}): RecordDecoder<T> | RecordDecoder<unknown> {
  if (options.parse) {
    return new NdjsonDecoder<T>(source, options, options.parse);
  }
  return new NdjsonDecoder<unknown>(source, options, (record) => record);
}
