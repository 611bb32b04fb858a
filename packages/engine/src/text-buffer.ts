/**
 * Text buffer operations
 *
 * Pure functions over an immutable multi-line buffer. The cursor column may
 * equal the line length (cursor after the last character).
 */

import type { TextBuffer } from './types.js';

export function createBuffer(text: string): TextBuffer {
  const lines = text.split(/\r?\n/);
  return { lines, row: 0, col: 0 };
}

export function bufferText(buffer: TextBuffer): string {
  return buffer.lines.join('\n');
}

export function insertText(buffer: TextBuffer, text: string): TextBuffer {
  const [first, ...rest] = text.split(/\r?\n/);
  const line = buffer.lines[buffer.row];
  const before = line.slice(0, buffer.col);
  const after = line.slice(buffer.col);

  if (rest.length === 0) {
    const lines = replaceLines(buffer.lines, buffer.row, 1, [before + first + after]);
    return { lines, row: buffer.row, col: buffer.col + first.length };
  }

  const last = rest[rest.length - 1];
  const inserted = [before + first, ...rest.slice(0, -1), last + after];
  return {
    lines: replaceLines(buffer.lines, buffer.row, 1, inserted),
    row: buffer.row + rest.length,
    col: last.length,
  };
}

export function insertNewline(buffer: TextBuffer): TextBuffer {
  return insertText(buffer, '\n');
}

export function deleteBackward(buffer: TextBuffer): TextBuffer {
  const { lines, row, col } = buffer;
  if (col > 0) {
    const line = lines[row];
    return { lines: replaceLines(lines, row, 1, [line.slice(0, col - 1) + line.slice(col)]), row, col: col - 1 };
  }
  if (row === 0) return buffer;

  const previous = lines[row - 1];
  return {
    lines: replaceLines(lines, row - 1, 2, [previous + lines[row]]),
    row: row - 1,
    col: previous.length,
  };
}

export function deleteForward(buffer: TextBuffer): TextBuffer {
  const { lines, row, col } = buffer;
  const line = lines[row];
  if (col < line.length) {
    return { lines: replaceLines(lines, row, 1, [line.slice(0, col) + line.slice(col + 1)]), row, col };
  }
  if (row === lines.length - 1) return buffer;
  return { lines: replaceLines(lines, row, 2, [line + lines[row + 1]]), row, col };
}

export type CursorMove = 'left' | 'right' | 'up' | 'down' | 'home' | 'end';

export function moveCursor(buffer: TextBuffer, move: CursorMove): TextBuffer {
  const { lines, row, col } = buffer;
  switch (move) {
    case 'left':
      if (col > 0) return { ...buffer, col: col - 1 };
      return row > 0 ? { ...buffer, row: row - 1, col: lines[row - 1].length } : buffer;
    case 'right':
      if (col < lines[row].length) return { ...buffer, col: col + 1 };
      return row < lines.length - 1 ? { ...buffer, row: row + 1, col: 0 } : buffer;
    case 'up':
      return row > 0 ? { ...buffer, row: row - 1, col: Math.min(col, lines[row - 1].length) } : buffer;
    case 'down':
      return row < lines.length - 1
        ? { ...buffer, row: row + 1, col: Math.min(col, lines[row + 1].length) }
        : buffer;
    case 'home':
      return { ...buffer, col: 0 };
    case 'end':
      return { ...buffer, col: lines[row].length };
  }
}

function replaceLines(lines: string[], start: number, count: number, replacement: string[]): string[] {
  return [...lines.slice(0, start), ...replacement, ...lines.slice(start + count)];
}
