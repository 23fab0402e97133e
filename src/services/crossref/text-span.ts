/**
 * A view into a backing string delimited by [start, end).
 * The text is only sliced out when asked for, so lexing and parsing never
 * copy the input.
 */
export class TextSpan {
  constructor(
    public readonly source: string,
    public readonly start: number,
    public readonly end: number
  ) {
    if (start < 0 || end < start || end > source.length) {
      throw new RangeError(`Invalid span [${start}, ${end}) for input of length ${source.length}`);
    }
  }

  get length(): number {
    return this.end - this.start;
  }

  get isEmpty(): boolean {
    return this.start === this.end;
  }

  text(): string {
    return this.source.slice(this.start, this.end);
  }
}
