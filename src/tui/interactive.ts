import type { SearchProvider } from '../search/provider.js';
import { createAppState, type AppState } from './app-state.js';
import { EventQueue, isKeyPress, type EventSource } from './events.js';
import { handleKey } from './key-handler.js';
import { renderFrame, type RenderOptions } from './render.js';
import { withTerminalSession } from './session.js';
import type { TerminalDriver } from './terminal.js';

export interface AppLoopOptions {
  render: RenderOptions;
  /** When set, ENTER in the search field submits the query. */
  searchProvider?: SearchProvider;
}

export interface TuiOptions extends AppLoopOptions {
  driver: TerminalDriver;
}

async function submitSearch(state: AppState, provider: SearchProvider, query: string): Promise<void> {
  const trimmed = query.trim();
  if (!trimmed) return;
  try {
    const results = await provider.search(trimmed);
    state.results = [...results];
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    state.notice = `Search failed: ${msg}`;
  }
}

/**
 * Draws, waits for one event, applies it; repeats until a key sets the exit
 * flag. Frames are only drawn in response to events, resizes included.
 */
export async function runAppLoop(
  state: AppState,
  terminal: Pick<TerminalDriver, 'draw' | 'size'>,
  events: EventSource,
  options: AppLoopOptions
): Promise<void> {
  while (!state.exit) {
    terminal.draw(renderFrame(state, terminal.size(), options.render));

    const event = await events.read();
    if (!isKeyPress(event)) continue;

    const outcome = handleKey(state, event.name);
    if (outcome.kind === 'submit' && options.searchProvider) {
      await submitSearch(state, options.searchProvider, outcome.query);
    }
  }
}

export async function runInteractiveTui(options: TuiOptions): Promise<AppState> {
  const state = createAppState();
  const queue = new EventQueue();

  await withTerminalSession(options.driver, async (session) => {
    const unsubscribe = session.driver.subscribe(queue);
    try {
      await runAppLoop(state, session.driver, queue, options);
    } finally {
      unsubscribe();
    }
  });

  return state;
}
