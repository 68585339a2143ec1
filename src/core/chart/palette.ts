/** Series colors, cycled by series index */
export const SERIES_PALETTE = ['black', 'red', 'green3', 'blue', 'cyan', 'magenta', 'gray'] as const;

/** Filled circle */
export const SERIES_MARKER = 20;

export function paletteColor(index: number): string {
  const color = SERIES_PALETTE[index % SERIES_PALETTE.length];
  if (color === undefined) {
    throw new RangeError(`Invalid series index: ${index}`);
  }
  return color;
}
