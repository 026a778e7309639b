export interface SweepRange {
  startMhz: number;
  endMhz: number;
  stepMhz: number;
}

// Absorbs accumulated float error so the end frequency is still included.
const END_TOLERANCE = 1e-9;

function roundMhz(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export function isEmptySweep({ startMhz, endMhz, stepMhz }: SweepRange): boolean {
  return (
    !Number.isFinite(startMhz) ||
    !Number.isFinite(endMhz) ||
    !Number.isFinite(stepMhz) ||
    stepMhz <= 0 ||
    startMhz > endMhz
  );
}

/**
 * Lazily yields the sweep frequencies, start and end inclusive, rounded to
 * 1 Hz. An invalid range yields nothing.
 */
export function* frequencyPlan(range: SweepRange): Generator<number> {
  if (isEmptySweep(range)) return;

  for (let i = 0; ; i++) {
    const frequency = range.startMhz + i * range.stepMhz;
    if (frequency > range.endMhz + END_TOLERANCE) return;
    yield roundMhz(frequency);
  }
}
