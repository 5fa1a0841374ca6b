/**
 * CLI Colors
 *
 * Named colors and styles come from tuiuiu.js text-utils; the azure blues
 * are ANSI 256 codes. Supports NO_COLOR and FORCE_COLOR.
 */

import { colorize, style, styles as tuiStyles } from 'tuiuiu.js'

type StyleName = keyof typeof tuiStyles

// Colors go to stderr, so that is the stream to check
const isColorEnabled = (): boolean => {
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

const color = (text: string, name: string): string => enabled ? colorize(text, name) : text

const styled = (text: string, ...names: StyleName[]): string => enabled ? style(text, ...names) : text

// 256-color foreground
const tone = (code: number) => (text: string): string =>
  enabled ? `\x1b[38;5;${code}m${text}\x1b[39m` : text

/**
 * Azure palette
 *
 * - 33: azure (#0087FF), arrows and headers
 * - 39: sky (#00AFFF), counts and provider names
 * - 75: steel (#5FAFFF), paths
 */
export const ansi = {
  bold: (s: string) => styled(s, 'bold'),
  dim: (s: string) => styled(s, 'dim'),

  azure: tone(33),
  sky: tone(39),
  steel: tone(75),

  gray: (s: string) => color(s, 'gray'),
  red: (s: string) => color(s, 'redBright'),
  green: (s: string) => color(s, 'greenBright'),
  yellow: (s: string) => color(s, 'yellowBright'),
}

export const c = {
  path: (text: string) => ansi.steel(text),
  count: (text: string | number) => ansi.bold(ansi.sky(String(text))),
  provider: (text: string) => ansi.sky(text),

  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),

  // delta markers
  added: (text: string) => ansi.green(text),
  removed: (text: string) => ansi.red(text),

  header: (text: string) => ansi.bold(ansi.azure(text)),
  label: (text: string) => ansi.gray(text),
  muted: (text: string) => ansi.dim(text),
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  arrow: enabled ? ansi.azure('→') : '->',
  plus: enabled ? ansi.green('+') : '+',
  minus: enabled ? ansi.red('-') : '-',
}

export function labeled(label: string, value: string): string {
  return `${c.label(label + ':')} ${value}`
}

// stderr only; stdout carries data
export const print = {
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
}
