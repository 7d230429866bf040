import terminalKit from 'terminal-kit';
import type { FrameSize, Rect } from './layout.js';

export type Color = 'default' | 'yellow';

export interface CellStyle {
  fg: Color;
}

export interface Cell {
  /** Empty for the second column of a double-width character. */
  symbol: string;
  style: CellStyle;
}

export interface CursorPosition {
  x: number;
  y: number;
}

export const DEFAULT_STYLE: CellStyle = { fg: 'default' };

export type Alignment = 'left' | 'center';

/**
 * A fully composed screen: one cell per column and row, plus the hardware
 * cursor position (null keeps it hidden). Coordinates are 0-based.
 */
export class Frame {
  readonly width: number;
  readonly height: number;
  readonly cells: Cell[][];
  cursor: CursorPosition | null = null;

  constructor(size: FrameSize) {
    this.width = Math.max(0, size.width);
    this.height = Math.max(0, size.height);
    this.cells = [];
    for (let y = 0; y < this.height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < this.width; x++) row.push({ symbol: ' ', style: DEFAULT_STYLE });
      this.cells.push(row);
    }
  }

  cell(x: number, y: number): Cell | undefined {
    return this.cells[y]?.[x];
  }

  private put(x: number, y: number, symbol: string, style: CellStyle): void {
    const row = this.cells[y];
    if (!row || x < 0 || x >= row.length) return;
    row[x] = { symbol, style };
  }

  /**
   * Writes `text` starting at (x, y) without going past `maxWidth` columns.
   * Returns the number of columns written.
   */
  setString(x: number, y: number, text: string, style: CellStyle, maxWidth: number): number {
    const limit = Math.min(maxWidth, this.width - x);
    let used = 0;
    for (const ch of Array.from(text)) {
      const width = terminalKit.stringWidth(ch);
      if (width === 0) {
        // Combining marks ride on the previous cell.
        const previous = this.cell(x + used - 1, y);
        if (previous && used > 0) this.put(x + used - 1, y, previous.symbol + ch, previous.style);
        continue;
      }
      if (used + width > limit) break;
      this.put(x + used, y, ch, style);
      if (width === 2) this.put(x + used + 1, y, '', style);
      used += width;
    }
    return used;
  }

  setAlignedString(area: Rect, y: number, text: string, style: CellStyle, alignment: Alignment): void {
    if (area.width <= 0) return;
    const textWidth = terminalKit.stringWidth(text);
    const offset = alignment === 'center' ? Math.max(0, Math.floor((area.width - textWidth) / 2)) : 0;
    this.setString(area.x + offset, y, text, style, area.width - offset);
  }

  setStyle(area: Rect, style: CellStyle): void {
    for (let y = area.y; y < area.y + area.height; y++) {
      for (let x = area.x; x < area.x + area.width; x++) {
        const cell = this.cell(x, y);
        if (cell) this.put(x, y, cell.symbol, style);
      }
    }
  }

  /** Text of one row, for tests and debugging; wide-character tails are skipped. */
  lineText(y: number): string {
    return (this.cells[y] ?? []).map((cell) => cell.symbol).join('');
  }
}
