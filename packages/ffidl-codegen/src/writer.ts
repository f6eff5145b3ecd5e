// Line-oriented code writer shared by the emitters.

export class CodeWriter {
  private buffer: string[] = [];
  private depth = 0;

  constructor(private readonly indentUnit: string) {}

  line(text = ""): this {
    this.buffer.push(text === "" ? "" : this.indentUnit.repeat(this.depth) + text);
    return this;
  }

  /** Write several lines at the current indentation. */
  lines(texts: readonly string[]): this {
    for (const text of texts) this.line(text);
    return this;
  }

  /** Write `open`, the body one level deeper, then `close`. */
  block(open: string, body: () => void, close = "}"): this {
    this.line(open);
    this.indented(body);
    if (close !== "") this.line(close);
    return this;
  }

  indented(body: () => void): this {
    this.depth++;
    try {
      body();
    } finally {
      this.depth--;
    }
    return this;
  }

  /** Blank separator line, never doubled. */
  blank(): this {
    if (this.buffer.length > 0 && this.buffer[this.buffer.length - 1] !== "") {
      this.buffer.push("");
    }
    return this;
  }

  toString(): string {
    const end = this.buffer.length > 0 && this.buffer[this.buffer.length - 1] === "" ? -1 : undefined;
    return this.buffer.slice(0, end).join("\n") + "\n";
  }
}

/**
 * Pad rows into aligned columns, the way gofmt aligns struct fields and
 * const blocks. The last column is never padded.
 */
export function alignColumns(rows: readonly (readonly string[])[], separator = " "): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      if (index < row.length - 1) widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row.map((cell, index) => (index < row.length - 1 ? cell.padEnd(widths[index] ?? 0) : cell)).join(separator),
  );
}
