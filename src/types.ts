// Shared types for buoyterm

/** One parsed record: one station or one observation, one field per displayed column. */
export type Row = string[];

export type FeedKind = 'observations' | 'stations';

export interface ColumnSpec {
  header: string;
  /** Share of the available width, in percent */
  width: number;
}

export interface FeedVariant {
  kind: FeedKind;
  title: string;
  url: string;
  columns: ColumnSpec[];
  parse: (body: string) => Row[];
}

// ===== Input =====

export type NamedKey =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'enter'
  | 'escape'
  | 'tab'
  | 'backspace'
  | 'pageup'
  | 'pagedown'
  | 'home'
  | 'end'
  | 'unknown';

export interface KeyPress {
  /** A named key, or the single character typed */
  name: NamedKey | string;
  ctrl: boolean;
}

export type MouseAction = 'scroll-up' | 'scroll-down' | 'press' | 'release' | 'move';

export type InputEvent =
  | { type: 'key'; key: KeyPress }
  | { type: 'mouse'; action: MouseAction };

// ===== Configuration =====

export interface ThemeConfig {
  selectedColor: string;
  normalColor: string;
}

export interface BuoytermConfig {
  feeds: {
    observationsUrl: string;
    stationsUrl: string;
  };
  requestTimeoutMs: number;
  mouse: boolean;
  margin: number;
  theme: ThemeConfig;
}
