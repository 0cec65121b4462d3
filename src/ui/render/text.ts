// Width helpers. Widths count code points; styling is applied after fitting.

export function codePointLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Cut `text` to `width` code points, marking the cut with an ellipsis.
 */
export function fit(text: string, width: number): string {
  const chars = Array.from(text);
  if (chars.length <= width) {
    return text;
  }
  return width <= 0 ? '' : chars.slice(0, width - 1).join('') + '…';
}

export function pad(text: string, width: number): string {
  const fitted = fit(text, width);
  return fitted + ' '.repeat(Math.max(0, width - codePointLength(fitted)));
}

/**
 * Show `text` with a caret marker at code point `caret`, scrolled
 * horizontally so the marker stays within `width`.
 */
export function caretWindow(text: string, caret: number, marker: string, width: number): string {
  const chars = Array.from(text);
  chars.splice(caret, 0, marker);
  if (chars.length <= width) {
    return chars.join('');
  }
  const start = Math.max(0, caret - width + 1);
  return chars.slice(start, start + width).join('');
}
