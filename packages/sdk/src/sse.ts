/**
 * Server-Sent Events reader.
 *
 * Splits a byte stream into frames. Handles CRLF line endings, comment
 * lines, multi-line data and frames split across chunks.
 */

import type { ReadableStream, ReadableStreamDefaultReader } from "node:stream/web";

export interface SseFrame {
  readonly event: string;
  readonly data: string;
  readonly id?: string | undefined;
}

export class SseReader {
  private readonly _reader: ReadableStreamDefaultReader<Uint8Array>;
  private readonly _decoder = new TextDecoder();
  private readonly _frames: SseFrame[] = [];
  private _buffer = "";
  private _event: string | undefined;
  private _id: string | undefined;
  private _data: string[] = [];
  private _done = false;

  constructor(stream: ReadableStream<Uint8Array>) {
    this._reader = stream.getReader();
  }

  /** Next complete frame, or undefined once the stream has ended. */
  async next(): Promise<SseFrame | undefined> {
    for (;;) {
      const frame = this._frames.shift();
      if (frame !== undefined) {
        return frame;
      }
      if (this._done) {
        return undefined;
      }

      const { done, value } = await this._reader.read();
      if (done) {
        this._done = true;
        this._consume(this._decoder.decode());
        // A trailing frame without its blank line still counts
        this._consume("\n\n");
      } else {
        this._consume(this._decoder.decode(value, { stream: true }));
      }
    }
  }

  async cancel(): Promise<void> {
    this._done = true;
    this._frames.length = 0;
    await this._reader.cancel();
  }

  private _consume(text: string): void {
    this._buffer += text;
    let idx: number;
    while ((idx = this._buffer.indexOf("\n")) >= 0) {
      let line = this._buffer.slice(0, idx);
      this._buffer = this._buffer.slice(idx + 1);
      if (line.endsWith("\r")) {
        line = line.slice(0, -1);
      }
      this._line(line);
    }
  }

  private _line(line: string): void {
    if (line === "") {
      this._flush();
      return;
    }
    if (line.startsWith(":")) {
      return;
    }

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? "" : line.slice(colon + 1);
    if (value.startsWith(" ")) {
      value = value.slice(1);
    }

    switch (field) {
      case "event":
        this._event = value;
        break;
      case "data":
        this._data.push(value);
        break;
      case "id":
        this._id = value;
        break;
      default:
        break;
    }
  }

  private _flush(): void {
    if (this._data.length > 0) {
      this._frames.push({
        event: this._event ?? "message",
        data: this._data.join("\n"),
        id: this._id,
      });
    }
    this._event = undefined;
    this._id = undefined;
    this._data = [];
  }
}
