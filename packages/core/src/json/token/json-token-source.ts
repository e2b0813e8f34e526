/**
 * Character source read one UTF-16 code unit at a time.
 */
export interface CharReader {
  /**
   * @returns The next code unit, or -1 at the end of input
   */
  read(): number;
}

export class StringReader implements CharReader {
  private position = 0;

  constructor(private readonly text: string) {}

  public read(): number {
    if (this.position >= this.text.length) {
      return -1;
    }
    return this.text.charCodeAt(this.position++);
  }
}

/**
 * Reads a sequence of text chunks as one continuous input, e.g. the
 * decoded chunks of a streamed response body.
 */
export class ChunkReader implements CharReader {
  private readonly chunks: Iterator<string>;
  private current = "";
  private position = 0;
  private done = false;

  constructor(chunks: Iterable<string>) {
    this.chunks = chunks[Symbol.iterator]();
  }

  public read(): number {
    while (this.position >= this.current.length) {
      if (this.done) {
        return -1;
      }
      const result = this.chunks.next();
      if (result.done) {
        this.done = true;
        return -1;
      }
      this.current = result.value;
      this.position = 0;
    }
    return this.current.charCodeAt(this.position++);
  }
}

/**
 * Indexed character stream with a single-level mark.
 *
 * {@link JsonTokenSource.reset} rewinds to the last {@link JsonTokenSource.mark}
 * and keeps the mark, so the same position can be revisited again.
 */
export default class JsonTokenSource {
  private position = 0;
  private marked: number[] | undefined;
  private markedPosition = 0;
  private replay: number[] = [];

  constructor(private readonly reader: CharReader) {}

  /**
   * Absolute index of the next character to be read.
   */
  public get index(): number {
    return this.position;
  }

  /**
   * @returns The next code unit, or -1 at the end of input
   */
  public read(): number {
    const code = this.replay.length > 0 ? this.replay.shift() : this.reader.read();
    if (code === undefined || code < 0) {
      return -1;
    }
    this.position++;
    this.marked?.push(code);
    return code;
  }

  public mark(): void {
    this.marked = [];
    this.markedPosition = this.position;
  }

  /**
   * @throws {Error} If the source was never marked
   */
  public reset(): void {
    if (this.marked === undefined) {
      throw new Error("Source is not marked");
    }
    this.replay = [...this.marked, ...this.replay];
    this.marked = [];
    this.position = this.markedPosition;
  }
}
