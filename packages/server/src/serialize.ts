/**
 * Wire form of key moments
 */

import type { KeyMoment, KeyMomentKind, KeyMomentSeverity } from '@bridge-analyst/types';

export interface WireAlternative {
  action: string;
  score?: number;
}

export interface WireKeyMoment {
  type: KeyMomentKind;
  position: number;
  trick?: number;
  played: string;
  recommended: string;
  imp_cost: number;
  severity: KeyMomentSeverity;
  alternatives: WireAlternative[];
  quality?: number;
  explanation?: string;
}

export function toWireMoment(moment: KeyMoment): WireKeyMoment {
  const wire: WireKeyMoment = {
    type: moment.kind,
    position: moment.position,
    played: moment.actual,
    recommended: moment.recommended,
    imp_cost: moment.cost,
    severity: moment.severity,
    alternatives: moment.alternatives.map((a) =>
      a.score === undefined ? { action: a.action } : { action: a.action, score: a.score },
    ),
  };
  if (moment.trick !== undefined) wire.trick = moment.trick;
  if (moment.quality !== undefined) wire.quality = moment.quality;
  if (moment.explanation !== undefined) wire.explanation = moment.explanation;
  return wire;
}

/**
 * Serialize moments, keeping their order
 */
export function toWireMoments(moments: KeyMoment[]): WireKeyMoment[] {
  return moments.map(toWireMoment);
}
