/**
 * CodeBuilder - string builder with indentation support.
 *
 * Multi-line content written at an indentation level has every one of its
 * lines shifted to that level, so a sub-expression rendered on its own keeps
 * its relative layout wherever it is placed. Empty lines are never indented.
 */

export class CodeBuilder {
  private parts: string[] = [];
  private indentLevel: number = 0;
  private indentStr: string;
  private atLineStart: boolean = true;

  constructor(indentStr: string = "    ") {
    this.indentStr = indentStr;
  }

  /**
   * Add content, indenting each line that starts at the beginning of a line.
   */
  write(content: string): this {
    if (content.length === 0) return this;

    const lines = content.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (i > 0) {
        this.newline();
      }
      if (line.length > 0) {
        if (this.atLineStart) {
          this.parts.push(this.indentStr.repeat(this.indentLevel));
          this.atLineStart = false;
        }
        this.parts.push(line);
      }
    }
    return this;
  }

  newline(): this {
    this.parts.push("\n");
    this.atLineStart = true;
    return this;
  }

  writeLine(content: string = ""): this {
    this.write(content);
    return this.newline();
  }

  /**
   * A header line followed by content one level deeper:
   *
   * ```
   * header
   *     content
   * ```
   */
  nested(header: string, content: string): this {
    this.writeLine(header);
    this.indent();
    this.write(content);
    return this.dedent();
  }

  indent(): this {
    this.indentLevel++;
    return this;
  }

  dedent(): this {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
    return this;
  }

  build(): string {
    return this.parts.join("");
  }
}

/**
 * Prefix the first line of `content` and align the remaining lines under the
 * text that follows the prefix.
 */
export function alignUnder(prefix: string, content: string): string {
  const pad = " ".repeat(prefix.length);
  return content
    .split("\n")
    .map((line, i) => (i === 0 ? prefix + line : line.length > 0 ? pad + line : line))
    .join("\n");
}

export function parensWhen(condition: boolean, code: string): string {
  return condition ? `(${code})` : code;
}

/**
 * A bracketed, comma separated sequence: `{ a, b }` on one line, or one
 * entry per line when any entry spans several lines:
 *
 * ```
 * { a
 * , b
 * }
 * ```
 */
export function delimited(open: string, close: string, entries: readonly string[]): string {
  if (entries.length === 0) {
    return `${open}${close}`;
  }
  if (entries.every((entry) => !entry.includes("\n"))) {
    return `${open} ${entries.join(", ")} ${close}`;
  }
  const lines = entries.map((entry, i) => alignUnder(i === 0 ? `${open} ` : ", ", entry));
  return [...lines, close].join("\n");
}
