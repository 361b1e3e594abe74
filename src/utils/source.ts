/**
 * Source file handling utilities
 */

import { readFile } from "node:fs/promises";

export class SourceFile {
  readonly name: string;
  readonly content: string;
  private lineStarts: number[];

  constructor(name: string, content: string) {
    this.name = name;
    this.content = content;
    this.lineStarts = this.computeLineStarts();
  }

  private computeLineStarts(): number[] {
    const starts = [0];
    for (let i = 0; i < this.content.length; i++) {
      if (this.content[i] === "\n") {
        starts.push(i + 1);
      }
    }
    return starts;
  }

  /**
   * Text of a 1-indexed line without its newline, or null when out of range.
   */
  getLine(lineNumber: number): string | null {
    if (lineNumber < 1 || lineNumber > this.lineStarts.length) {
      return null;
    }
    const start = this.lineStarts[lineNumber - 1];
    const end =
      lineNumber < this.lineStarts.length
        ? this.lineStarts[lineNumber] - 1
        : this.content.length;
    return this.content.slice(start, end);
  }
}

export async function readSourceFile(path: string): Promise<SourceFile> {
  const content = await readFile(path, "utf8");
  return new SourceFile(path, content);
}

export function sourceFromString(name: string, content: string): SourceFile {
  return new SourceFile(name, content);
}
