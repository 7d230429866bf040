import { TerminalIoError } from '../cli/errors.js';

export type KeyEventKind = 'press' | 'release' | 'repeat';

export interface KeyEvent {
  type: 'key';
  kind: KeyEventKind;
  /** terminal-kit key name: the character itself, or `ENTER`, `ESCAPE`, `CTRL_A`, ... */
  name: string;
}

export interface ResizeEvent {
  type: 'resize';
  width: number;
  height: number;
}

export type InputEvent = KeyEvent | ResizeEvent;

export function isKeyPress(event: InputEvent): event is KeyEvent & { kind: 'press' } {
  return event.type === 'key' && event.kind === 'press';
}

export interface EventSource {
  /** Resolves with the next event, waiting for one if none is buffered. */
  read(): Promise<InputEvent>;
}

interface PendingRead {
  resolve: (event: InputEvent) => void;
  reject: (error: Error) => void;
}

/**
 * Bridges callback-style terminal events to awaited reads. Events that arrive
 * with no reader waiting are buffered in arrival order.
 */
export class EventQueue implements EventSource {
  private readonly buffered: InputEvent[] = [];
  private readonly waiting: PendingRead[] = [];
  private failure: TerminalIoError | null = null;

  push(event: InputEvent): void {
    if (this.failure) return;
    const reader = this.waiting.shift();
    if (reader) {
      reader.resolve(event);
      return;
    }
    this.buffered.push(event);
  }

  /**
   * Fails every pending and future read. Events already buffered are still
   * delivered first. `operation` names the side of the terminal that broke:
   * stdin errors are read failures, async stdout write errors draw failures.
   */
  fail(error: unknown, operation: 'draw' | 'read' = 'read'): void {
    if (this.failure) return;
    this.failure = TerminalIoError.wrap(operation, error);
    for (const reader of this.waiting.splice(0)) reader.reject(this.failure);
  }

  read(): Promise<InputEvent> {
    const next = this.buffered.shift();
    if (next) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);
    return new Promise<InputEvent>((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }
}
