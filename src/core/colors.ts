/** Approximate hue per named colour. */
export const BASE_COLORS: Readonly<Record<string, number>> = Object.freeze({
  red: 0,
  orange: 4000,
  yellow: 8000,
  lime: 12000,
  green: 16000,
  dark_green: 20000,
  forest_green: 24000,
  teal: 28000,
  cyan: 32000,
  light_blue: 36000,
  blue: 40000,
  dark_blue: 44000,
  magenta: 48000,
  purple: 52000,
  pink: 56000,
  bright_pink: 60000,
});

export function colorNames(): string[] {
  return Object.keys(BASE_COLORS);
}

export function hueForColor(name: string): number | undefined {
  return Object.hasOwn(BASE_COLORS, name) ? BASE_COLORS[name] : undefined;
}

/** Name of the base colour whose hue is closest; ties go to the earlier entry. */
export function nearestColorName(hue: number): string {
  let best = "red";
  let bestDistance = Infinity;
  for (const [name, value] of Object.entries(BASE_COLORS)) {
    const distance = Math.abs(hue - value);
    if (distance < bestDistance) {
      best = name;
      bestDistance = distance;
    }
  }
  return best;
}
