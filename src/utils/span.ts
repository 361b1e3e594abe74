/**
 * Source location tracking utilities
 *
 * Comprehensions arrive already parsed, so spans are whatever the producer
 * attached. Nodes built in memory have none; diagnostics fall back to a
 * synthetic span naming the input.
 */

export interface Position {
  /** 1-indexed line number */
  line: number;
  /** 1-indexed column number */
  column: number;
  /** 0-indexed byte offset */
  offset: number;
}

export interface SourceSpan {
  file: string;
  start: Position;
  end: Position;
}

export function position(line: number, column: number, offset: number): Position {
  return { line, column, offset };
}

export function span(file: string, start: Position, end: Position): SourceSpan {
  return { file, start, end };
}

/**
 * A zero-width span at the start of `file`, for nodes with no recorded location.
 */
export function syntheticSpan(file: string): SourceSpan {
  const origin = position(1, 1, 0);
  return span(file, origin, origin);
}

export function formatPosition(pos: Position): string {
  return `${pos.line}:${pos.column}`;
}

export function formatSpan(span: SourceSpan): string {
  return `${span.file}:${formatPosition(span.start)}`;
}
