import { concat } from "uint8arrays";

const NEWLINE = 0x0a;

/** An array of growing bytes from which complete newline-terminated lines can be taken. */
export class LineSplitter {
  array: Uint8Array = new Uint8Array();

  /** Append a chunk and return every line it completed, without the separator. Empty lines are skipped. */
  push(chunk: Uint8Array): Uint8Array[] {
    this.array = this.array.byteLength === 0
      ? chunk
      : concat([this.array, chunk]);

    const lines: Uint8Array[] = [];
    let start = 0;

    for (let i = this.array.indexOf(NEWLINE); i !== -1; i = this.array.indexOf(NEWLINE, start)) {
      if (i > start) {
        lines.push(this.array.slice(start, i));
      }

      start = i + 1;
    }

    this.prune(start);

    return lines;
  }

  /** Whatever is left after the last separator. */
  get remainder(): Uint8Array {
    return this.array;
  }

  /** Prunes the array by the given bytelength. */
  prune(length: number) {
    if (length > 0) {
      this.array = this.array.slice(length);
    }
  }
}

/** Yield the complete lines of a chunked byte stream. A trailing unterminated line is yielded last. */
export async function* splitLines(
  incoming: AsyncIterable<Uint8Array>,
): AsyncGenerator<Uint8Array> {
  const splitter = new LineSplitter();

  for await (const chunk of incoming) {
    yield* splitter.push(chunk);
  }

  if (splitter.remainder.byteLength > 0) {
    yield splitter.remainder;
  }
}
