// Render loop: draw, wait for the next input event, apply it, repeat until quit

import { logger } from '../logger.js';
import type { Channel } from '../input/channel.js';
import type { SelectableTable } from '../table/selectable-table.js';
import type { InputEvent } from '../types.js';
import { commandFor } from './commands.js';

export type DrawFn = (table: SelectableTable) => void;

export interface RenderLoopOptions {
  table: SelectableTable;
  events: Channel<InputEvent>;
  draw: DrawFn;
}

export class RenderLoop {
  private readonly table: SelectableTable;
  private readonly events: Channel<InputEvent>;
  private readonly draw: DrawFn;
  private draws = 0;

  constructor(options: RenderLoopOptions) {
    this.table = options.table;
    this.events = options.events;
    this.draw = options.draw;
  }

  /**
   * Runs until a quit command arrives. Rejects when the event channel closes with an error.
   */
  async run(): Promise<void> {
    for (;;) {
      this.draw(this.table);
      this.draws++;

      const event = await this.events.recv();
      const command = commandFor(event);

      switch (command) {
        case 'quit':
          logger.info('Quit requested after %d draws', this.draws);
          return;
        case 'next':
          this.table.next();
          break;
        case 'previous':
          this.table.previous();
          break;
        case 'none':
          break;
      }
    }
  }

  get drawCount(): number {
    return this.draws;
  }
}
