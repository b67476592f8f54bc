// Terminal input decoding: raw bytes from a raw-mode TTY -> InputEvents

import type { InputEvent, MouseAction, NamedKey } from '../types.js';

const ESC = '\x1b';

// SGR extended mouse: ESC [ < button ; x ; y (M press | m release)
const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
// Generic CSI: ESC [ params final
const CSI_SEQUENCE = /^\x1b\[([0-9;]*)([A-Za-z~])/;
// SS3 cursor keys (application cursor mode)
const SS3_SEQUENCE = /^\x1bO([A-DHF])/;

const FINAL_KEYS: Record<string, NamedKey> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  H: 'home',
  F: 'end',
};

const TILDE_KEYS: Record<string, NamedKey> = {
  '1': 'home',
  '4': 'end',
  '5': 'pageup',
  '6': 'pagedown',
  '7': 'home',
  '8': 'end',
};

function key(name: string, ctrl = false): InputEvent {
  return { type: 'key', key: { name, ctrl } };
}

function mouse(action: MouseAction): InputEvent {
  return { type: 'mouse', action };
}

export function mouseAction(button: number, released: boolean): MouseAction {
  if (button & 64) {
    switch (button & 3) {
      case 0:
        return 'scroll-up';
      case 1:
        return 'scroll-down';
      default:
        return 'press';
    }
  }
  if (released) return 'release';
  if (button & 32) return 'move';
  return 'press';
}

function csiKey(params: string, final: string): NamedKey {
  if (final === '~') {
    return TILDE_KEYS[params.split(';')[0] ?? ''] ?? 'unknown';
  }
  return FINAL_KEYS[final] ?? 'unknown';
}

function controlKey(code: number): InputEvent {
  switch (code) {
    case 0x0d:
    case 0x0a:
      return key('enter');
    case 0x09:
      return key('tab');
    case 0x7f:
    case 0x08:
      return key('backspace');
    default:
      if (code >= 0x01 && code <= 0x1a) {
        return key(String.fromCharCode(code + 0x60), true);
      }
      return key('unknown');
  }
}

/**
 * Decode one chunk of terminal input. A chunk may carry several keys or mouse reports
 * (key repeat, pasted text); they are returned in order.
 */
export function decodeInput(data: string): InputEvent[] {
  const events: InputEvent[] = [];
  let i = 0;

  while (i < data.length) {
    const rest = data.slice(i);

    if (rest.startsWith(ESC)) {
      const sgr = SGR_MOUSE.exec(rest);
      if (sgr) {
        events.push(mouse(mouseAction(Number(sgr[1]), sgr[4] === 'm')));
        i += sgr[0].length;
        continue;
      }

      // X10 mouse: ESC [ M followed by button, x, y bytes offset by 32
      if (rest.startsWith(`${ESC}[M`) && rest.length >= 6) {
        const button = rest.charCodeAt(3) - 32;
        events.push(mouse(mouseAction(button, (button & 3) === 3 && (button & 64) === 0)));
        i += 6;
        continue;
      }

      const csi = CSI_SEQUENCE.exec(rest);
      if (csi) {
        events.push(key(csiKey(csi[1] ?? '', csi[2] ?? '')));
        i += csi[0].length;
        continue;
      }

      const ss3 = SS3_SEQUENCE.exec(rest);
      if (ss3) {
        events.push(key(FINAL_KEYS[ss3[1] ?? ''] ?? 'unknown'));
        i += ss3[0].length;
        continue;
      }

      events.push(key('escape'));
      i += 1;
      continue;
    }

    const code = rest.codePointAt(0) ?? 0;
    if (code < 0x20 || code === 0x7f) {
      events.push(controlKey(code));
      i += 1;
      continue;
    }

    const char = String.fromCodePoint(code);
    events.push(key(char));
    i += char.length;
  }

  return events;
}
