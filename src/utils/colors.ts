/**
 * Minimal terminal colors for the CLI
 *
 * Honors NO_COLOR and FORCE_COLOR, otherwise colors only a TTY (or CI).
 * Nestable: colors.bold(colors.red('text'))
 */

const hasColors = (() => {
  // https://no-color.org/
  if ('NO_COLOR' in process.env) return false;
  if ('FORCE_COLOR' in process.env) return true;
  if (process.env.TERM === 'dumb') return false;
  if (process.stdout?.isTTY) return true;
  if (process.env.CI) return true;
  return false;
})();

const code = (open: number, close: number) => {
  if (!hasColors) return (s: string | number) => String(s);

  const openCode = `\x1b[${open}m`;
  const closeCode = `\x1b[${close}m`;
  const closeRe = new RegExp(`\\x1b\\[${close}m`, 'g');

  return (s: string | number): string => openCode + String(s).replace(closeRe, openCode) + closeCode;
};

export const bold = code(1, 22);
export const red = code(31, 39);
export const green = code(32, 39);
export const yellow = code(33, 39);
export const cyan = code(36, 39);
export const gray = code(90, 39);

const colors = {
  bold,
  red,
  green,
  yellow,
  cyan,
  gray,
  grey: gray,
};

export default colors;
