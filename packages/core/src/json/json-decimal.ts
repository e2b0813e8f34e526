const DECIMAL_PATTERN =
  /^([+-])?(?:(\d+)(?:\.(\d*))?|\.(\d+))(?:[eE]([+-]?\d+))?$/;

const JSON_NUMBER_PATTERN = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

/** Largest power of ten {@link JsonDecimal.toBigInt} expands. */
export const MAX_BIGINT_EXPONENT = 100_000;

/**
 * Arbitrary-precision decimal number held as `(-1)^sign * coefficient * 10^exponent`.
 *
 * Values are normalized (trailing zeros of the coefficient are folded into
 * the exponent) so that comparison works by value: `1.50`, `15e-1` and
 * `0.15E1` are equal. The source text is kept for serialization.
 */
export default class JsonDecimal {
  private constructor(
    /** Whether the value is below zero. Always false for zero. */
    public readonly negative: boolean,
    /** Non-negative coefficient without trailing zeros. */
    public readonly coefficient: bigint,
    public readonly exponent: number,
    private readonly text: string
  ) {}

  /**
   * Parses a decimal literal such as `-0.3e+10`, `.5` or `+12`.
   *
   * @param text - The literal to parse
   * @returns The decimal, or `undefined` when `text` is not a decimal literal
   */
  public static tryParse(text: string): JsonDecimal | undefined {
    const match = DECIMAL_PATTERN.exec(text);
    if (!match) {
      return undefined;
    }
    const [, sign, integer = "", fraction = "", bareFraction = "", power] =
      match;
    const decimals = fraction || bareFraction;
    const exponent = Number(power ?? "0") - decimals.length;
    if (!Number.isSafeInteger(exponent)) {
      return undefined;
    }

    let digits = (integer + decimals).replace(/^0+/, "");
    if (digits === "") {
      return new JsonDecimal(false, 0n, 0, text);
    }
    let shift = 0;
    while (digits.endsWith("0")) {
      digits = digits.slice(0, -1);
      shift++;
    }
    return new JsonDecimal(sign === "-", BigInt(digits), exponent + shift, text);
  }

  /**
   * @param text - The literal to parse
   * @throws {RangeError} If `text` is not a decimal literal
   */
  public static parse(text: string): JsonDecimal {
    const decimal = JsonDecimal.tryParse(text);
    if (decimal === undefined) {
      throw new RangeError(`Invalid decimal: ${text}`);
    }
    return decimal;
  }

  /**
   * @param value - A finite number or a bigint
   * @throws {RangeError} If `value` is `NaN` or infinite
   */
  public static from(value: number | bigint): JsonDecimal {
    if (typeof value === "number" && !Number.isFinite(value)) {
      throw new RangeError(`Not a finite number: ${value}`);
    }
    return JsonDecimal.parse(String(value));
  }

  /**
   * @returns -1, 0 or 1 as the value is negative, zero or positive
   */
  public signum(): number {
    if (this.coefficient === 0n) {
      return 0;
    }
    return this.negative ? -1 : 1;
  }

  /**
   * Compares by numeric value, ignoring representation.
   *
   * @returns A negative number, zero or a positive number as this value is
   * less than, equal to or greater than `other`
   */
  public compareTo(other: JsonDecimal): number {
    const signum = this.signum();
    if (signum !== other.signum()) {
      return signum < other.signum() ? -1 : 1;
    }
    if (signum === 0) {
      return 0;
    }
    return signum * compareMagnitude(this, other);
  }

  public equals(other: JsonDecimal): boolean {
    return this.compareTo(other) === 0;
  }

  /**
   * @returns The nearest double-precision value
   */
  public toNumber(): number {
    return Number(this.canonical());
  }

  /**
   * @throws {RangeError} If the value has a fractional part, or an exponent
   * above {@link MAX_BIGINT_EXPONENT}
   */
  public toBigInt(): bigint {
    if (this.exponent < 0) {
      throw new RangeError(`Not an integer: ${this.text}`);
    }
    if (this.exponent > MAX_BIGINT_EXPONENT) {
      throw new RangeError(`Exponent too large for a bigint: ${this.text}`);
    }
    const magnitude = this.coefficient * 10n ** BigInt(this.exponent);
    return this.negative ? -magnitude : magnitude;
  }

  /**
   * @returns The text this value was parsed from
   */
  public toString(): string {
    return this.text;
  }

  /**
   * @returns The source text when it is a valid JSON number, otherwise the
   * canonical `<coefficient>e<exponent>` form
   */
  public toJsonText(): string {
    return JSON_NUMBER_PATTERN.test(this.text) ? this.text : this.canonical();
  }

  private canonical(): string {
    const sign = this.negative ? "-" : "";
    if (this.exponent === 0) {
      return `${sign}${this.coefficient}`;
    }
    return `${sign}${this.coefficient}e${this.exponent}`;
  }
}

function compareMagnitude(left: JsonDecimal, right: JsonDecimal): number {
  const leftDigits = left.coefficient.toString().length;
  const rightDigits = right.coefficient.toString().length;
  const leftAdjusted = left.exponent + leftDigits - 1;
  const rightAdjusted = right.exponent + rightDigits - 1;
  if (leftAdjusted !== rightAdjusted) {
    return leftAdjusted < rightAdjusted ? -1 : 1;
  }

  // Same leading power of ten, so the exponent gap is bounded by the digit counts.
  const gap = left.exponent - right.exponent;
  const leftScaled = gap > 0 ? left.coefficient * 10n ** BigInt(gap) : left.coefficient;
  const rightScaled = gap < 0 ? right.coefficient * 10n ** BigInt(-gap) : right.coefficient;
  if (leftScaled === rightScaled) {
    return 0;
  }
  return leftScaled < rightScaled ? -1 : 1;
}
