import { marked, type Token, type Tokens } from 'marked';
import { codePointLength, fit } from './text.js';
import type { Style, Theme } from './theme.js';

export type MarkdownRenderer = (markdown: string, width: number) => string[];

interface Segment {
  text: string;
  style: Style;
}

const plain: Style = (text) => text;
const HARD_BREAK = '\n';

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity);
}

/**
 * Narrow a token by its type; the token union also has a catch-all member
 * that a plain `switch` would not exclude.
 */
function isToken<K extends string>(token: Token, type: K): token is Extract<Token, { type: K }> {
  return token.type === type;
}

function compose(outer: Style, inner: Style): Style {
  return (text) => outer(inner(text));
}

function splitLong(word: string, width: number): string[] {
  const chars = Array.from(word);
  if (chars.length <= width) {
    return [word];
  }
  const pieces: string[] = [];
  for (let i = 0; i < chars.length; i += width) {
    pieces.push(chars.slice(i, i + width).join(''));
  }
  return pieces;
}

/**
 * Word-wrap styled segments to `width` columns. Styling is applied per word so
 * line lengths are measured on plain text.
 */
export function wrapSegments(segments: Segment[], width: number): string[] {
  const limit = Math.max(1, width);
  const lines: string[] = [];
  let line = '';
  let lineWidth = 0;
  let pendingSpace = false;

  const flush = () => {
    lines.push(line);
    line = '';
    lineWidth = 0;
    pendingSpace = false;
  };

  for (const segment of segments) {
    if (segment.text === HARD_BREAK) {
      flush();
      continue;
    }

    for (const part of segment.text.split(/(\s+)/)) {
      if (part === '') {
        continue;
      }
      if (/^\s+$/.test(part)) {
        pendingSpace = lineWidth > 0;
        continue;
      }
      for (const chunk of splitLong(part, limit)) {
        const chunkWidth = codePointLength(chunk);
        const spacer = pendingSpace ? 1 : 0;
        if (lineWidth > 0 && lineWidth + spacer + chunkWidth > limit) {
          flush();
        } else if (spacer) {
          line += ' ';
          lineWidth += 1;
        }
        line += segment.style(chunk);
        lineWidth += chunkWidth;
        pendingSpace = false;
      }
    }
  }

  if (lineWidth > 0 || lines.length === 0) {
    lines.push(line);
  }
  return lines;
}

class TerminalMarkdown {
  constructor(private readonly theme: Theme) {}

  render(markdown: string, width: number): string[] {
    const tokens = marked.lexer(markdown);
    return this.blocks(tokens, width);
  }

  /**
   * @param separated - put a blank line between blocks (false for tight list items)
   */
  private blocks(tokens: Token[], width: number, separated = true): string[] {
    const out: string[] = [];
    for (const token of tokens) {
      const lines = this.block(token, width);
      if (lines.length === 0) {
        continue;
      }
      if (separated && out.length > 0) {
        out.push('');
      }
      out.push(...lines);
    }
    return out;
  }

  private block(token: Token, width: number): string[] {
    const { theme } = this;

    if (isToken(token, 'space')) {
      return [];
    }
    if (isToken(token, 'heading')) {
      const marker = '#'.repeat(token.depth);
      const style = token.depth === 1 ? theme.title : theme.heading;
      return wrapSegments([{ text: `${marker} `, style }, ...this.inline(token.tokens, style)], width);
    }
    if (isToken(token, 'paragraph')) {
      return wrapSegments(this.inline(token.tokens, plain), width);
    }
    if (isToken(token, 'text')) {
      return token.tokens
        ? wrapSegments(this.inline(token.tokens, plain), width)
        : wrapSegments([{ text: decodeEntities(token.text), style: plain }], width);
    }
    if (isToken(token, 'code')) {
      return token.text
        .split('\n')
        .map((line) => theme.code(fit(`  ${line.replace(/\t/g, '    ')}`, width)));
    }
    if (isToken(token, 'blockquote')) {
      return this.blocks(token.tokens, Math.max(1, width - 2)).map((line) => theme.quote('│ ') + line);
    }
    if (isToken(token, 'hr')) {
      return [theme.divider('─'.repeat(Math.max(1, Math.min(width, 80))))];
    }
    if (isToken(token, 'list')) {
      return this.list(token, width);
    }
    if (isToken(token, 'table')) {
      return this.table(token, width);
    }
    return token.raw
      .replace(/\n+$/, '')
      .split('\n')
      .map((line) => fit(line, width));
  }

  private list(token: Tokens.List, width: number): string[] {
    const out: string[] = [];
    const start = typeof token.start === 'number' ? token.start : 1;

    token.items.forEach((item, index) => {
      let marker = token.ordered ? `${start + index}. ` : '• ';
      if (item.task) {
        marker += item.checked ? '[x] ' : '[ ] ';
      }
      const indent = ' '.repeat(codePointLength(marker));
      const body = this.blocks(item.tokens, Math.max(1, width - indent.length), token.loose);
      const lines = body.length > 0 ? body : [''];
      lines.forEach((line, i) => out.push((i === 0 ? marker : indent) + line));
    });

    return out;
  }

  private table(token: Tokens.Table, width: number): string[] {
    const rows = [token.header, ...token.rows].map((row) =>
      row.map((cell) => decodeEntities(cell.text))
    );
    const widths = token.header.map((_, column) =>
      Math.max(...rows.map((row) => codePointLength(row[column] ?? '')))
    );
    const format = (row: string[]) =>
      row.map((cell, column) => cell + ' '.repeat(widths[column] - codePointLength(cell))).join(' │ ');

    const cut = (line: string) => fit(line, Math.max(1, width));

    const [header, ...body] = rows;
    const separator = widths.map((w) => '─'.repeat(w)).join('─┼─');
    return [
      this.theme.bold(cut(format(header))),
      this.theme.divider(cut(separator)),
      ...body.map((row) => cut(format(row))),
    ];
  }

  private inline(tokens: Token[], style: Style): Segment[] {
    const { theme } = this;
    const segments: Segment[] = [];

    for (const token of tokens) {
      if (isToken(token, 'text')) {
        segments.push(
          ...(token.tokens
            ? this.inline(token.tokens, style)
            : [{ text: decodeEntities(token.text), style }])
        );
      } else if (isToken(token, 'escape')) {
        segments.push({ text: decodeEntities(token.text), style });
      } else if (isToken(token, 'strong')) {
        segments.push(...this.inline(token.tokens, compose(theme.bold, style)));
      } else if (isToken(token, 'em')) {
        segments.push(...this.inline(token.tokens, compose(theme.italic, style)));
      } else if (isToken(token, 'del')) {
        segments.push(...this.inline(token.tokens, compose(theme.strike, style)));
      } else if (isToken(token, 'codespan')) {
        segments.push({ text: decodeEntities(token.text), style: theme.code });
      } else if (isToken(token, 'br')) {
        segments.push({ text: HARD_BREAK, style });
      } else if (isToken(token, 'link')) {
        const label = this.inline(token.tokens, compose(theme.link, style));
        segments.push(...label);
        const labelText = label.map((segment) => segment.text).join('');
        if (token.href && token.href !== labelText) {
          segments.push({ text: ` (${token.href})`, style: theme.muted });
        }
      } else if (isToken(token, 'image')) {
        segments.push({ text: `[image: ${token.text || token.href}]`, style: theme.muted });
      } else {
        segments.push({ text: token.raw, style });
      }
    }
    return segments;
  }
}

/**
 * Markdown to wrapped, styled terminal lines.
 * Throws if tokenizing fails; callers fall back to the raw text.
 */
export function createMarkdownRenderer(theme: Theme): MarkdownRenderer {
  const renderer = new TerminalMarkdown(theme);
  return (markdown, width) => renderer.render(markdown, width);
}
