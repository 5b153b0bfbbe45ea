export function lpad(val: number | string, width: number, padChar = '0'): string {
  const s = String(val);
  if (s.length >= width) return s;
  return padChar.repeat(width - s.length) + s;
}

const TIE_EPSILON = 1e-7;

/**
 * Fixed-decimal formatting where an exact .5 at the last digit goes to the
 * odd neighbour: 2.5 -> "3", 3.5 -> "3". A fraction within 1e-7 of one half
 * counts as a tie. The sign is put back after rounding the magnitude, so small
 * negative values keep it ("-0.00").
 */
export function formatFixedOdd(value: number, decimals: number): string {
  const scale = Math.pow(10, decimals);
  const scaled = value * scale;
  const negative = scaled < 0;
  const abs = Math.abs(scaled);
  const floor = Math.floor(abs);
  const frac = abs - floor;

  let rounded: number;
  if (frac > 0.5 + TIE_EPSILON) {
    rounded = floor + 1;
  } else if (frac < 0.5 - TIE_EPSILON) {
    rounded = floor;
  } else {
    rounded = floor % 2 === 0 ? floor + 1 : floor;
  }

  const text = (rounded / scale).toFixed(decimals);
  return negative ? '-' + text : text;
}

// Field values never carry quotes or commas, so no escaping.
export function toCsvLine(fields: string[]): string {
  return fields.map(f => `"${f}"`).join(',');
}
