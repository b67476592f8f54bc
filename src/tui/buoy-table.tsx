// Buoy table view

import React from 'react';
import { Box, Text } from 'ink';
import type { ColumnSpec, Row, ThemeConfig } from '../types.js';

export interface BuoyTableProps {
  title: string;
  columns: ColumnSpec[];
  /** The visible slice of rows */
  rows: readonly Row[];
  /** Index of rows[0] in the full table */
  start: number;
  total: number;
  selected: number | undefined;
  /** Available width in columns */
  width: number;
  theme: ThemeConfig;
}

export function columnWidths(columns: ColumnSpec[], width: number): number[] {
  return columns.map(column => Math.max(1, Math.floor((width * column.width) / 100)));
}

/**
 * Fit a cell into `width` characters: truncated with one trailing space as a gutter, padded otherwise.
 */
export function fitCell(text: string, width: number): string {
  if (width <= 1) {
    return text.slice(0, width);
  }
  const room = width - 1;
  const clipped = text.length > room ? text.slice(0, room - 1) + '…' : text;
  return clipped.padEnd(width);
}

export function formatRow(fields: readonly string[], widths: number[]): string {
  return widths.map((w, i) => fitCell(fields[i] ?? '', w)).join('').trimEnd();
}

export const BuoyTable: React.FC<BuoyTableProps> = ({
  title,
  columns,
  rows,
  start,
  total,
  selected,
  width,
  theme,
}) => {
  // Two characters for the selection marker
  const widths = columnWidths(columns, Math.max(1, width - 2));
  const header = formatRow(columns.map(c => c.header), widths);

  return (
    <Box flexDirection="column">
      <Text bold>
        {title} <Text dimColor>({selected === undefined ? '-' : selected + 1}/{total})</Text>
      </Text>
      <Text bold color="yellow">{`  ${header}`}</Text>
      {rows.length === 0 ? (
        <Text dimColor>No rows.</Text>
      ) : (
        rows.map((row, index) => {
          const isSelected = start + index === selected;
          return (
            <Text key={start + index} color={isSelected ? theme.selectedColor : theme.normalColor} bold={isSelected}>
              {`${isSelected ? '▶' : ' '} ${formatRow(row, widths)}`}
            </Text>
          );
        })
      )}
    </Box>
  );
};

export default BuoyTable;
