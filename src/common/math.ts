export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function randomBetween(min: number, max: number, random: () => number = Math.random): number {
  if (max <= min) {
    return min;
  }
  return min + clamp(random(), 0, 1) * (max - min);
}
