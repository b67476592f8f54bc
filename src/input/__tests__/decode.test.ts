import { describe, it, expect } from 'vitest';
import { decodeInput, mouseAction } from '../decode.js';

describe('decodeInput', () => {
  describe('keys', () => {
    it('should decode printable characters', () => {
      expect(decodeInput('q')).toEqual([{ type: 'key', key: { name: 'q', ctrl: false } }]);
    });

    it('should decode CSI cursor keys', () => {
      expect(decodeInput('\x1b[A\x1b[B\x1b[C\x1b[D').map(e => (e.type === 'key' ? e.key.name : e.action))).toEqual([
        'up',
        'down',
        'right',
        'left',
      ]);
    });

    it('should decode SS3 cursor keys', () => {
      expect(decodeInput('\x1bOA\x1bOB')).toEqual([
        { type: 'key', key: { name: 'up', ctrl: false } },
        { type: 'key', key: { name: 'down', ctrl: false } },
      ]);
    });

    it('should decode paging keys', () => {
      expect(decodeInput('\x1b[5~\x1b[6~\x1b[H\x1b[F').map(e => (e.type === 'key' ? e.key.name : ''))).toEqual([
        'pageup',
        'pagedown',
        'home',
        'end',
      ]);
    });

    it('should decode unrecognised CSI sequences as unknown', () => {
      expect(decodeInput('\x1b[15~')).toEqual([{ type: 'key', key: { name: 'unknown', ctrl: false } }]);
    });

    it('should decode control characters', () => {
      expect(decodeInput('\x03')).toEqual([{ type: 'key', key: { name: 'c', ctrl: true } }]);
      expect(decodeInput('\r')).toEqual([{ type: 'key', key: { name: 'enter', ctrl: false } }]);
      expect(decodeInput('\t')).toEqual([{ type: 'key', key: { name: 'tab', ctrl: false } }]);
      expect(decodeInput('\x7f')).toEqual([{ type: 'key', key: { name: 'backspace', ctrl: false } }]);
    });

    it('should decode a lone escape', () => {
      expect(decodeInput('\x1b')).toEqual([{ type: 'key', key: { name: 'escape', ctrl: false } }]);
    });

    it('should keep astral characters whole', () => {
      expect(decodeInput('🌊')).toEqual([{ type: 'key', key: { name: '🌊', ctrl: false } }]);
    });
  });

  describe('mouse', () => {
    it('should decode SGR wheel reports', () => {
      expect(decodeInput('\x1b[<64;10;5M')).toEqual([{ type: 'mouse', action: 'scroll-up' }]);
      expect(decodeInput('\x1b[<65;10;5M')).toEqual([{ type: 'mouse', action: 'scroll-down' }]);
    });

    it('should decode SGR press and release', () => {
      expect(decodeInput('\x1b[<0;3;4M\x1b[<0;3;4m')).toEqual([
        { type: 'mouse', action: 'press' },
        { type: 'mouse', action: 'release' },
      ]);
    });

    it('should decode X10 wheel reports', () => {
      // button 64 + 32 = 96 (`), button 65 + 32 = 97 (a), coordinates 33 (!)
      expect(decodeInput('\x1b[M`!!')).toEqual([{ type: 'mouse', action: 'scroll-up' }]);
      expect(decodeInput('\x1b[Ma!!')).toEqual([{ type: 'mouse', action: 'scroll-down' }]);
    });

    it('should decode X10 release', () => {
      // button 3 + 32 = 35 (#)
      expect(decodeInput('\x1b[M#!!')).toEqual([{ type: 'mouse', action: 'release' }]);
    });

    it('should classify motion reports', () => {
      expect(mouseAction(32, false)).toBe('move');
      expect(mouseAction(66, false)).toBe('press');
    });
  });

  it('should decode several sequences from one chunk in order', () => {
    expect(decodeInput('\x1b[B\x1b[B\x1b[<65;1;1Mq')).toEqual([
      { type: 'key', key: { name: 'down', ctrl: false } },
      { type: 'key', key: { name: 'down', ctrl: false } },
      { type: 'mouse', action: 'scroll-down' },
      { type: 'key', key: { name: 'q', ctrl: false } },
    ]);
  });

  it('should return nothing for an empty chunk', () => {
    expect(decodeInput('')).toEqual([]);
  });
});
