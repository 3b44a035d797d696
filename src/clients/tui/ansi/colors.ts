/**
 * ANSI Colors
 *
 * 24-bit SGR color sequences from '#rrggbb', '#rgb' or a basic color name.
 */

const ESC = '\x1b';
const CSI = `${ESC}[`;

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export const NAMED_COLORS: Record<string, RGB> = {
  black: { r: 0, g: 0, b: 0 },
  red: { r: 205, g: 49, b: 49 },
  green: { r: 13, g: 188, b: 121 },
  yellow: { r: 229, g: 229, b: 16 },
  blue: { r: 36, g: 114, b: 200 },
  magenta: { r: 188, g: 63, b: 188 },
  cyan: { r: 17, g: 168, b: 205 },
  white: { r: 229, g: 229, b: 229 },
  gray: { r: 128, g: 128, b: 128 },
};

/**
 * Parse '#rgb' or '#rrggbb'. Returns null for anything else.
 */
export function hexToRgb(hex: string): RGB | null {
  const match = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(hex);
  if (!match) return null;

  let digits = match[1] ?? '';
  if (digits.length === 3) {
    digits = digits
      .split('')
      .map((d) => d + d)
      .join('');
  }

  return {
    r: parseInt(digits.slice(0, 2), 16),
    g: parseInt(digits.slice(2, 4), 16),
    b: parseInt(digits.slice(4, 6), 16),
  };
}

export function parseColor(color: string): RGB | null {
  if (color.startsWith('#')) {
    return hexToRgb(color);
  }
  return NAMED_COLORS[color.toLowerCase()] ?? null;
}

export function resetColor(): string {
  return `${CSI}0m`;
}

/**
 * Foreground sequence. 'default', '' and unparseable colors give the
 * terminal's default foreground.
 */
export function fgColor(color: string): string {
  const rgb = parseColor(color);
  return rgb ? `${CSI}38;2;${rgb.r};${rgb.g};${rgb.b}m` : `${CSI}39m`;
}

export function bgColor(color: string): string {
  const rgb = parseColor(color);
  return rgb ? `${CSI}48;2;${rgb.r};${rgb.g};${rgb.b}m` : `${CSI}49m`;
}
