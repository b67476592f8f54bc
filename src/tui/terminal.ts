// Terminal session: raw mode, alternate screen, mouse capture

import type { Readable, Writable } from 'stream';

const CSI = '\x1b[';

export const TERMINAL_CODES = {
  altScreenOn: `${CSI}?1049h`,
  altScreenOff: `${CSI}?1049l`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  // Button tracking + SGR extended coordinates
  mouseOn: `${CSI}?1000h${CSI}?1006h`,
  mouseOff: `${CSI}?1006l${CSI}?1000l`,
} as const;

export class TerminalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TerminalError';
  }
}

type RawModeInput = Readable & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export interface TerminalSessionOptions {
  input: RawModeInput;
  output: Writable;
  mouse: boolean;
}

export class TerminalSession {
  private active = false;

  constructor(private readonly options: TerminalSessionOptions) {}

  enter(): void {
    if (this.active) return;
    const { input, output, mouse } = this.options;

    if (input.isTTY && input.setRawMode) {
      input.setRawMode(true);
    }
    input.setEncoding('utf-8');

    output.write(TERMINAL_CODES.altScreenOn + TERMINAL_CODES.hideCursor + (mouse ? TERMINAL_CODES.mouseOn : ''));
    this.active = true;
  }

  /**
   * Restore the terminal. Safe to call more than once.
   */
  leave(): void {
    if (!this.active) return;
    const { input, output, mouse } = this.options;
    this.active = false;

    output.write((mouse ? TERMINAL_CODES.mouseOff : '') + TERMINAL_CODES.showCursor + TERMINAL_CODES.altScreenOff);

    if (input.isTTY && input.setRawMode) {
      input.setRawMode(false);
    }
  }

  get isActive(): boolean {
    return this.active;
  }
}

/**
 * Throws unless the streams are an interactive terminal.
 */
export function assertInteractive(input: RawModeInput, output: Writable & { isTTY?: boolean }): void {
  if (!input.isTTY || !output.isTTY) {
    throw new TerminalError('buoyterm needs an interactive terminal (stdin and stdout must be a TTY)');
  }
}
