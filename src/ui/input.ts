/**
 * Terminal input events and a decoder for raw stdin data.
 *
 * Handles the sequences common xterm-compatible terminals send in raw mode:
 * CSI/SS3 cursor keys, control characters and SGR (1006) mouse reports.
 */

export type KeyName =
  | 'char'
  | 'enter'
  | 'tab'
  | 'backspace'
  | 'delete'
  | 'escape'
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'home'
  | 'end'
  | 'pageup'
  | 'pagedown'
  | 'unknown';

export interface KeyEvent {
  type: 'key';
  name: KeyName;
  /** The typed character for `char` keys; the letter for ctrl combinations. */
  char?: string;
  ctrl: boolean;
}

export type MouseAction = 'press' | 'release' | 'move' | 'wheel-up' | 'wheel-down';
export type MouseButton = 'left' | 'middle' | 'right' | 'none';

export interface MouseEvent {
  type: 'mouse';
  action: MouseAction;
  button: MouseButton;
  /** 0-based column */
  x: number;
  /** 0-based row */
  y: number;
}

export interface ResizeEvent {
  type: 'resize';
  width: number;
  height: number;
}

export type InputEvent = KeyEvent | MouseEvent | ResizeEvent;

export function key(name: KeyName, ctrl = false): KeyEvent {
  return { type: 'key', name, ctrl };
}

export function char(value: string): KeyEvent {
  return { type: 'key', name: 'char', char: value, ctrl: false };
}

export function ctrl(letter: string): KeyEvent {
  return { type: 'key', name: 'char', char: letter, ctrl: true };
}

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
const CSI = /^\x1b\[([\d;]*)([A-Za-z~])/;
const SS3 = /^\x1bO([A-Za-z])/;

const FINAL_KEYS: Record<string, KeyName> = {
  A: 'up',
  B: 'down',
  C: 'right',
  D: 'left',
  H: 'home',
  F: 'end',
};

const TILDE_KEYS: Record<string, KeyName> = {
  '1': 'home',
  '7': 'home',
  '4': 'end',
  '8': 'end',
  '3': 'delete',
  '5': 'pageup',
  '6': 'pagedown',
};

function decodeMouse(code: number, column: number, row: number, final: string): MouseEvent {
  const x = column - 1;
  const y = row - 1;

  if (code & 64) {
    return { type: 'mouse', action: (code & 1) === 0 ? 'wheel-up' : 'wheel-down', button: 'none', x, y };
  }

  const buttons: MouseButton[] = ['left', 'middle', 'right', 'none'];
  const button = buttons[code & 3];
  if (code & 32) {
    return { type: 'mouse', action: 'move', button, x, y };
  }
  return { type: 'mouse', action: final === 'M' ? 'press' : 'release', button, x, y };
}

function decodeCsi(params: string, final: string): KeyEvent {
  if (final === '~') {
    const name = TILDE_KEYS[params.split(';')[0]];
    return key(name ?? 'unknown');
  }
  if (final === 'Z') {
    return key('tab');
  }
  return key(FINAL_KEYS[final] ?? 'unknown');
}

/**
 * Split one chunk of raw terminal input into events.
 */
export function decodeInput(data: string): InputEvent[] {
  const events: InputEvent[] = [];
  let index = 0;

  while (index < data.length) {
    const rest = data.slice(index);
    const first = rest[0];

    if (first === '\x1b') {
      const mouse = SGR_MOUSE.exec(rest);
      if (mouse) {
        events.push(decodeMouse(Number(mouse[1]), Number(mouse[2]), Number(mouse[3]), mouse[4]));
        index += mouse[0].length;
        continue;
      }
      const csi = CSI.exec(rest);
      if (csi) {
        events.push(decodeCsi(csi[1], csi[2]));
        index += csi[0].length;
        continue;
      }
      const ss3 = SS3.exec(rest);
      if (ss3) {
        events.push(key(FINAL_KEYS[ss3[1]] ?? 'unknown'));
        index += ss3[0].length;
        continue;
      }
      events.push(key('escape'));
      index += 1;
      continue;
    }

    if (first === '\r' || first === '\n') {
      events.push(key('enter'));
      index += rest.startsWith('\r\n') ? 2 : 1;
      continue;
    }
    if (first === '\t') {
      events.push(key('tab'));
      index += 1;
      continue;
    }
    if (first === '\x7f' || first === '\b') {
      events.push(key('backspace'));
      index += 1;
      continue;
    }

    const code = first.charCodeAt(0);
    if (code < 0x20) {
      events.push(ctrl(String.fromCharCode(code + 0x60)));
      index += 1;
      continue;
    }

    const point = rest.codePointAt(0) ?? code;
    const value = String.fromCodePoint(point);
    events.push(char(value));
    index += value.length;
  }

  return events;
}
