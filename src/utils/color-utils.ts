/** Convert a 0xRRGGBB number to a CSS hex color string. */
export function hexColor(c: number): string {
  return `#${c.toString(16).padStart(6, "0")}`;
}

/** Convert a 0xRRGGBB integer to [r, g, b] in 0..255. */
export function intToRGB(c: number): [number, number, number] {
  // eslint-disable-next-line no-bitwise
  return [(c >> 16) & 0xff, (c >> 8) & 0xff, c & 0xff];
}

/** CSS rgba() string for a 0xRRGGBB color at the given opacity. */
export function rgbaColor(c: number, alpha: number): string {
  const [r, g, b] = intToRGB(c);
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
}
