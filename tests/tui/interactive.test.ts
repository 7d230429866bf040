import { describe, expect, it, vi } from 'vitest';
import { TerminalIoError } from '../../src/cli/errors.js';
import { createAppState } from '../../src/tui/app-state.js';
import { EventQueue } from '../../src/tui/events.js';
import type { Frame } from '../../src/tui/frame.js';
import { runAppLoop, runInteractiveTui } from '../../src/tui/interactive.js';
import { HELP_TEXT } from '../../src/tui/render.js';
import { visualScroll } from '../../src/tui/text-input.js';
import type { SearchProvider } from '../../src/search/provider.js';
import { createFakeTerminal, key, keys } from '../helpers/fake-terminal.js';

const RENDER = { colorsDisabled: false };

describe('runInteractiveTui', () => {
  it('quits on q after a single frame and restores the terminal', async () => {
    const terminal = createFakeTerminal({ script: keys('q') });
    const state = await runInteractiveTui({ driver: terminal, render: RENDER });

    expect(state.exit).toBe(true);
    expect(terminal.frames).toHaveLength(1);
    expect(terminal.calls).toEqual(['enter', 'subscribe', 'draw', 'unsubscribe', 'leave']);
  });

  it('shows the cursor in the search box after s', async () => {
    const terminal = createFakeTerminal({ script: keys('s', 'ESCAPE', 'q') });
    const state = await runInteractiveTui({ driver: terminal, render: RENDER });

    expect(terminal.frames).toHaveLength(3);
    expect(terminal.frames[0]?.cursor).toBeNull();
    expect(terminal.frames[1]?.cursor).toEqual({ x: 2, y: 2 });
    expect(terminal.frames[2]?.cursor).toBeNull();
    expect(state.mode).toBe('normal');
  });

  it('collects typed text without scrolling a short query', async () => {
    const terminal = createFakeTerminal({ script: keys('s', 'h', 'e', 'l', 'l', 'o', 'ESCAPE', 'q') });
    const state = await runInteractiveTui({ driver: terminal, render: RENDER });

    expect(state.input).toEqual({ value: 'hello', cursor: 5 });
    expect(visualScroll(state.input, 10)).toBe(0);
  });

  it('keeps the text and hides the cursor after ESCAPE', async () => {
    const terminal = createFakeTerminal({ script: keys('s', 'h', 'i', 'ESCAPE', 'q') });
    const state = await runInteractiveTui({ driver: terminal, render: RENDER });

    expect(state.mode).toBe('normal');
    expect(state.input.value).toBe('hi');
    const afterEscape = terminal.frames[4];
    expect(afterEscape?.cursor).toBeNull();
    expect(afterEscape?.lineText(2)).toBe(`│ hi${' '.repeat(35)}│`);
  });

  it('leaves the results alone on ENTER without a search provider', async () => {
    const terminal = createFakeTerminal({ script: keys('s', 'a', 'ENTER', 'q') });
    const state = await runInteractiveTui({ driver: terminal, render: RENDER });

    expect(state.mode).toBe('normal');
    expect(state.results).toEqual([]);
    expect(state.exit).toBe(true);
  });

  it('ignores key release and repeat events', async () => {
    const terminal = createFakeTerminal({
      script: [key('q', 'release'), key('q', 'repeat'), key('q')],
    });
    const state = await runInteractiveTui({ driver: terminal, render: RENDER });

    expect(state.exit).toBe(true);
    expect(terminal.frames).toHaveLength(3);
  });

  it('submits the trimmed query to a search provider', async () => {
    const provider: SearchProvider = { search: vi.fn(async () => ['lofi mix', 'lofi beats']) };
    const terminal = createFakeTerminal({ script: keys('s', 'l', 'o', 'f', 'i', ' ', 'ENTER', 'q') });
    const state = await runInteractiveTui({ driver: terminal, render: RENDER, searchProvider: provider });

    expect(provider.search).toHaveBeenCalledWith('lofi');
    expect(state.results).toEqual(['lofi mix', 'lofi beats']);
    const last = terminal.frames[terminal.frames.length - 1];
    expect(last?.lineText(5)).toBe(`│${'lofi mix'.padEnd(38)}│`);
  });

  it('does not search for an empty query', async () => {
    const provider: SearchProvider = { search: vi.fn(async () => ['unexpected']) };
    const terminal = createFakeTerminal({ script: keys('s', 'ENTER', 'q') });
    const state = await runInteractiveTui({ driver: terminal, render: RENDER, searchProvider: provider });

    expect(provider.search).not.toHaveBeenCalled();
    expect(state.results).toEqual([]);
  });

  it('shows a notice when the search provider fails', async () => {
    const provider: SearchProvider = {
      search: vi.fn(async () => {
        throw new Error('offline');
      }),
    };
    const terminal = createFakeTerminal({ script: keys('s', 'x', 'ENTER', 'q') });
    const state = await runInteractiveTui({ driver: terminal, render: RENDER, searchProvider: provider });

    const last = terminal.frames[terminal.frames.length - 1];
    expect(last?.lineText(11)).toBe(`${' '.repeat(9)}Search failed: offline${' '.repeat(9)}`);
    expect(state.notice).toBeNull();
    expect(state.results).toEqual([]);
  });

  it('restores the terminal when drawing fails', async () => {
    const terminal = createFakeTerminal({ script: keys('q') });
    const failure = new TerminalIoError('Terminal draw failed: EPIPE', 'draw');
    terminal.draw = vi.fn(() => {
      throw failure;
    });

    await expect(runInteractiveTui({ driver: terminal, render: RENDER })).rejects.toBe(failure);
    expect(terminal.calls).toEqual(['enter', 'subscribe', 'unsubscribe', 'leave']);
  });

  it('restores the terminal when reading input fails', async () => {
    const terminal = createFakeTerminal();
    terminal.subscribe = vi.fn((queue: EventQueue) => {
      queue.fail(new Error('EIO'));
      return () => {};
    });

    await expect(runInteractiveTui({ driver: terminal, render: RENDER })).rejects.toThrow('Terminal read failed: EIO');
    expect(terminal.leave).toHaveBeenCalledTimes(1);
  });
});

describe('runAppLoop', () => {
  it('lays the next frame out for the new size after a resize', async () => {
    const state = createAppState();
    const queue = new EventQueue();
    const frames: Frame[] = [];
    let size = { width: 40, height: 12 };

    const terminal = {
      size: () => size,
      draw: (frame: Frame) => {
        frames.push(frame);
        if (frames.length === 1) {
          size = { width: 60, height: 20 };
          queue.push({ type: 'resize', width: 60, height: 20 });
        } else {
          queue.push({ type: 'key', kind: 'press', name: 'q' });
        }
      },
    };

    await runAppLoop(state, terminal, queue, { render: RENDER });

    expect(frames.map((frame) => [frame.width, frame.height])).toEqual([
      [40, 12],
      [60, 20],
    ]);
    expect(frames[1]?.lineText(18)).toBe(`└${'─'.repeat(58)}┘`);
    expect(frames[1]?.lineText(19)).toBe(HELP_TEXT.slice(0, 60));
  });

  it('draws nothing once the exit flag is set', async () => {
    const state = createAppState();
    state.exit = true;
    const draw = vi.fn();

    await runAppLoop(state, { size: () => ({ width: 40, height: 12 }), draw }, new EventQueue(), { render: RENDER });
    expect(draw).not.toHaveBeenCalled();
  });
});
