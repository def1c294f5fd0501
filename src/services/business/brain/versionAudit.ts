/**
 * Version Audit
 * Which axis scores changed sign between two lexicon versions. Scores inside
 * the dead zone count as neutral so small wobbles are not reported.
 */

import type { Signature } from "./types.js";

export const FLIP_DEAD_ZONE = 0.05;

export interface AxisFlip {
  transcriptId: string;
  axis: string;
  before: number;
  after: number;
}

export interface FlipAudit {
  compared: number;
  flips: AxisFlip[];
  flipsByAxis: Record<string, number>;
}

export function signWithDeadZone(value: number, deadZone: number): -1 | 0 | 1 {
  if (value > deadZone) return 1;
  if (value < -deadZone) return -1;
  return 0;
}

/**
 * Pairs signatures by transcript and reports axes whose non-neutral sign
 * reversed. Only transcripts and axes present on both sides are compared.
 */
export function findAxisFlips(
  before: readonly Signature[],
  after: readonly Signature[],
  deadZone = FLIP_DEAD_ZONE
): FlipAudit {
  const previous = new Map(before.map((s) => [s.transcriptId, s]));
  const flips: AxisFlip[] = [];
  const flipsByAxis: Record<string, number> = {};
  let compared = 0;

  for (const current of after) {
    const old = previous.get(current.transcriptId);
    if (!old) continue;
    compared++;

    for (const [axis, value] of Object.entries(current.axisScores)) {
      const oldValue = old.axisScores[axis];
      if (oldValue === undefined) continue;

      const a = signWithDeadZone(oldValue, deadZone);
      const b = signWithDeadZone(value, deadZone);
      if (a !== 0 && b !== 0 && a !== b) {
        flips.push({ transcriptId: current.transcriptId, axis, before: oldValue, after: value });
        flipsByAxis[axis] = (flipsByAxis[axis] ?? 0) + 1;
      }
    }
  }

  flips.sort((x, y) => x.transcriptId.localeCompare(y.transcriptId) || x.axis.localeCompare(y.axis));
  return { compared, flips, flipsByAxis };
}
