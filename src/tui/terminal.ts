import terminalKit from 'terminal-kit';
import { TerminalIoError } from '../cli/errors.js';
import type { EventQueue } from './events.js';
import type { Cell, CellStyle, Frame } from './frame.js';
import type { FrameSize } from './layout.js';

type Terminal = typeof terminalKit.terminal;

/**
 * Everything the application needs from the terminal. The terminal-kit
 * implementation below is the only code that touches the real TTY.
 */
export interface TerminalDriver {
  isTTY(): boolean;
  size(): FrameSize;
  /** Alternate screen, raw input, hidden cursor. */
  enter(): void;
  /** Undoes `enter`. */
  leave(): void;
  draw(frame: Frame): void;
  /** Feeds key, resize and stdin/stdout error events into `queue`; returns the unsubscribe function. */
  subscribe(queue: EventQueue): () => void;
}

interface StyledRun {
  text: string;
  style: CellStyle;
}

function sameStyle(a: CellStyle, b: CellStyle): boolean {
  return a.fg === b.fg;
}

export function toStyledRuns(row: readonly Cell[]): StyledRun[] {
  const runs: StyledRun[] = [];
  for (const cell of row) {
    const last = runs[runs.length - 1];
    if (last && sameStyle(last.style, cell.style)) {
      last.text += cell.symbol;
    } else {
      runs.push({ text: cell.symbol, style: cell.style });
    }
  }
  return runs;
}

function writeRun(term: Terminal, run: StyledRun): void {
  if (!run.text) return;
  // noFormat: search text is user input and must not be read as markup.
  if (run.style.fg === 'yellow') term.yellow.noFormat(run.text);
  else term.noFormat(run.text);
}

export function createTerminalKitDriver(
  term: Terminal = terminalKit.terminal,
  stdout: NodeJS.WriteStream = process.stdout,
  stdin: NodeJS.ReadStream = process.stdin
): TerminalDriver {
  const size = (): FrameSize => ({
    width: stdout.columns ?? term.width,
    height: stdout.rows ?? term.height,
  });

  return {
    isTTY: () => Boolean(stdout.isTTY) && Boolean(stdin.isTTY),
    size,

    enter() {
      term.fullscreen(true);
      term.grabInput(true);
      term.hideCursor();
    },

    leave() {
      term.grabInput(false);
      term.fullscreen(false);
      // terminal-kit shows the cursor via hideCursor(false).
      term.hideCursor(false);
      term.styleReset();
    },

    draw(frame) {
      try {
        term.hideCursor();
        term.styleReset();
        frame.cells.forEach((row, y) => {
          term.moveTo(1, y + 1);
          for (const run of toStyledRuns(row)) writeRun(term, run);
        });
        term.styleReset();
        if (frame.cursor) {
          // terminal-kit coordinates are 1-based.
          term.moveTo(frame.cursor.x + 1, frame.cursor.y + 1);
          term.hideCursor(false);
        }
      } catch (error) {
        throw TerminalIoError.wrap('draw', error);
      }
    },

    subscribe(queue) {
      const onKey = (name: string): void => {
        // terminal-kit only reports presses.
        queue.push({ type: 'key', kind: 'press', name });
      };
      const onResize = (): void => {
        queue.push({ type: 'resize', ...size() });
      };
      const onReadError = (error: Error): void => {
        queue.fail(error, 'read');
      };
      // terminal-kit writes asynchronously: EPIPE/EIO arrive here, not in draw().
      const onWriteError = (error: Error): void => {
        queue.fail(error, 'draw');
      };

      term.on('key', onKey);
      stdout.on('resize', onResize);
      stdin.on('error', onReadError);
      stdout.on('error', onWriteError);
      return () => {
        term.removeListener('key', onKey);
        stdout.removeListener('resize', onResize);
        stdin.removeListener('error', onReadError);
        stdout.removeListener('error', onWriteError);
      };
    },
  };
}
