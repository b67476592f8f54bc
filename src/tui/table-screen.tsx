// Table screen: draws the table model through ink

import React from 'react';
import { Box, render } from 'ink';
import type { Instance } from 'ink';

import type { SelectableTable } from '../table/selectable-table.js';
import type { BuoytermConfig, FeedVariant } from '../types.js';
import { BuoyTable } from './buoy-table.js';

// Title and header lines above the rows
const CHROME_LINES = 2;
// ink clears and redraws the whole screen once a frame reaches the terminal height
const BOTTOM_GAP = 1;

export interface ScreenSize {
  columns: number;
  rows: number;
}

export function renderTable(
  variant: FeedVariant,
  table: SelectableTable,
  config: BuoytermConfig,
  size: ScreenSize
): React.ReactElement {
  const margin = config.margin;
  const width = Math.max(1, size.columns - margin * 2);
  const height = Math.max(1, size.rows - margin * 2 - CHROME_LINES - BOTTOM_GAP);
  const { start, end } = table.visibleRange(height);

  return (
    <Box margin={margin}>
      <BuoyTable
        title={variant.title}
        columns={variant.columns}
        rows={table.rows.slice(start, end)}
        start={start}
        total={table.length}
        selected={table.selected}
        width={width}
        theme={config.theme}
      />
    </Box>
  );
}

export class TableScreen {
  private instance: Instance | undefined;

  constructor(
    private readonly variant: FeedVariant,
    private readonly config: BuoytermConfig,
    private readonly output: NodeJS.WriteStream,
    private readonly input: NodeJS.ReadStream
  ) {}

  /**
   * Draw the whole table with the current selection. The first call mounts the ink app.
   */
  draw(table: SelectableTable): void {
    const element = renderTable(this.variant, table, this.config, this.size());
    if (this.instance) {
      this.instance.rerender(element);
      return;
    }
    this.instance = render(element, {
      stdout: this.output,
      stdin: this.input,
      exitOnCtrlC: false,
      patchConsole: false,
    });
  }

  close(): void {
    this.instance?.unmount();
    this.instance = undefined;
  }

  private size(): ScreenSize {
    return { columns: this.output.columns || 80, rows: this.output.rows || 24 };
  }
}
