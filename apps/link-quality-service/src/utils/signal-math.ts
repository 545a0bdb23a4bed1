/**
 * Arithmetic helpers for signal aggregation
 */

/**
 * Linearly map a value from one range to another, clamped to the output range
 */
export function mapRange(
  value: number,
  inputMin: number,
  inputMax: number,
  outputMin: number,
  outputMax: number
): number {
  const mapped = outputMin + ((value - inputMin) * (outputMax - outputMin)) / (inputMax - inputMin);
  return Math.max(outputMin, Math.min(outputMax, mapped));
}

/**
 * Mean of both antenna channels. An empty list yields [0, 0].
 */
export function antennaMeans(samples: ReadonlyArray<{ ant1: number; ant2: number }>): [number, number] {
  if (samples.length === 0) {
    return [0, 0];
  }

  let sum1 = 0;
  let sum2 = 0;
  for (const sample of samples) {
    sum1 += sample.ant1;
    sum2 += sample.ant2;
  }

  return [sum1 / samples.length, sum2 / samples.length];
}
