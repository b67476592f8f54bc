// Viewer: fetch -> parse -> table, then the terminal session, input pump and render loop

import { fetchFeed } from './feed/fetcher.js';
import { getFeedVariant } from './feed/variants.js';
import { setActiveTerminal } from './fatal.js';
import { Channel } from './input/channel.js';
import { InputPump } from './input/input-pump.js';
import { logger } from './logger.js';
import { SelectableTable } from './table/selectable-table.js';
import { RenderLoop } from './tui/render-loop.js';
import { TableScreen } from './tui/table-screen.js';
import { TerminalSession, assertInteractive } from './tui/terminal.js';
import type { BuoytermConfig, FeedKind, FeedVariant, InputEvent } from './types.js';

export interface ViewerOptions {
  config: BuoytermConfig;
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
}

export async function loadTable(variant: FeedVariant, config: BuoytermConfig): Promise<SelectableTable> {
  const body = await fetchFeed(variant.url, { timeoutMs: config.requestTimeoutMs });
  const rows = variant.parse(body);
  logger.info('Parsed %d %s rows', rows.length, variant.kind);
  return new SelectableTable(rows);
}

/**
 * Run the viewer until the user quits. Fetch, parse and terminal failures reject.
 */
export async function runViewer(kind: FeedKind, options: ViewerOptions): Promise<void> {
  const { config, input = process.stdin, output = process.stdout } = options;
  const variant = getFeedVariant(kind, config);

  const table = await loadTable(variant, config);

  assertInteractive(input, output);

  const session = new TerminalSession({ input, output, mouse: config.mouse });
  session.enter();
  setActiveTerminal(session);

  const screen = new TableScreen(variant, config, output, input);
  const events = new Channel<InputEvent>();
  const pump = new InputPump(input, events);
  pump.start();

  const loop = new RenderLoop({ table, events, draw: current => screen.draw(current) });

  try {
    await loop.run();
  } finally {
    pump.stop();
    screen.close();
    session.leave();
    setActiveTerminal(undefined);
  }
}
