const CONTEXT_LENGTH = 25;

/**
 * Raised by the tokenizer on malformed input.
 * The message is the bare reason; {@link JsonTokenError.formatMessage}
 * adds the surrounding source text.
 */
export class JsonTokenError extends Error {
  /**
   * @param message - What went wrong, e.g. `Expected: ,`
   * @param index - Absolute index of the offending character
   */
  constructor(
    message: string,
    public readonly index: number
  ) {
    super(message);
    this.name = "JsonTokenError";
  }

  /**
   * Renders the message followed by up to 25 characters on each side of
   * the offending one, which is wrapped in `<>`. Line breaks and tabs in the
   * excerpt are replaced by spaces.
   *
   * @param source - The full text that was tokenized
   * @returns e.g. `Expected: ,: ["element"<">element"]`
   */
  public formatMessage(source: string): string {
    const before = source.slice(Math.max(0, this.index - CONTEXT_LENGTH), this.index);
    const target = source.charAt(this.index);
    const after = source.slice(this.index + 1, this.index + 1 + CONTEXT_LENGTH);
    const reference = `${before}<${target}>${after}`.replace(/[\r\n\t]/g, " ");
    return `${this.message}: ${reference}`;
  }
}

/**
 * Raised when a complete JSON text cannot be parsed.
 */
export class JsonParseError extends Error {
  public readonly index: number;

  constructor(error: JsonTokenError, source: string) {
    super(error.formatMessage(source), { cause: error });
    this.name = "JsonParseError";
    this.index = error.index;
  }
}
