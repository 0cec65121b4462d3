import chalk, { Chalk, type ColorSupportLevel } from 'chalk';

export type Style = (text: string) => string;

/**
 * Styles for UI chrome and rendered markdown.
 */
export interface Theme {
  title: Style;
  heading: Style;
  selected: Style;
  muted: Style;
  divider: Style;
  error: Style;
  bold: Style;
  italic: Style;
  strike: Style;
  code: Style;
  link: Style;
  quote: Style;
}

/**
 * @param level - color support; defaults to what chalk detected for stdout.
 *   Level 0 produces plain text.
 */
export function createTheme(level: ColorSupportLevel = chalk.level): Theme {
  const c = new Chalk({ level });
  return {
    title: (text) => c.bold.ansi256(69)(text),
    heading: (text) => c.bold.ansi256(75)(text),
    selected: (text) => c.ansi256(170)(text),
    muted: (text) => c.ansi256(241)(text),
    divider: (text) => c.ansi256(240)(text),
    error: (text) => c.ansi256(196)(text),
    bold: (text) => c.bold(text),
    italic: (text) => c.italic(text),
    strike: (text) => c.strikethrough(text),
    code: (text) => c.ansi256(203)(text),
    link: (text) => c.underline.ansi256(39)(text),
    quote: (text) => c.ansi256(245)(text),
  };
}

export const plainTheme: Theme = createTheme(0);
