import { EngineError, EngineErrorCode } from '../engine/errors';
import type { MovePlan, MoveRejectionCode, MoveRequest } from '../engine/types';

/**
 * Explicit state model for one move resolution inside PuzzleEngine.
 *
 * State transitions:
 *   idle → validating → rejected  → idle
 *                     → executing → idle
 *
 * Resolution is synchronous, so outside the engine the phase is always
 * `idle`; anything else observed from a listener means a re-entrant call.
 */
export type MoveResolutionPhase =
  | { kind: 'idle' }
  | { kind: 'validating'; request: MoveRequest; startedAt: number }
  | {
      kind: 'rejected';
      request: MoveRequest;
      code: MoveRejectionCode;
      reason: string;
      completedAt: number;
    }
  | { kind: 'executing'; request: MoveRequest; plan: MovePlan; startedAt: number };

export const idleMoveResolution: MoveResolutionPhase = { kind: 'idle' };

export function isResolving(phase: MoveResolutionPhase): boolean {
  return phase.kind !== 'idle';
}

function invalidTransition(from: MoveResolutionPhase, to: MoveResolutionPhase['kind']): EngineError {
  return new EngineError(
    EngineErrorCode.FSM_INVALID_TRANSITION,
    `Cannot move from ${from.kind} to ${to}`,
    { from: from.kind, to },
    'MoveResolution'
  );
}

export function markValidating(
  previous: MoveResolutionPhase,
  request: MoveRequest,
  now: number = Date.now()
): MoveResolutionPhase {
  if (previous.kind !== 'idle') {
    throw invalidTransition(previous, 'validating');
  }
  return { kind: 'validating', request, startedAt: now };
}

export function markRejected(
  previous: MoveResolutionPhase,
  code: MoveRejectionCode,
  reason: string,
  now: number = Date.now()
): MoveResolutionPhase {
  if (previous.kind !== 'validating') {
    throw invalidTransition(previous, 'rejected');
  }
  return { kind: 'rejected', request: previous.request, code, reason, completedAt: now };
}

export function markExecuting(
  previous: MoveResolutionPhase,
  plan: MovePlan,
  now: number = Date.now()
): MoveResolutionPhase {
  if (previous.kind !== 'validating') {
    throw invalidTransition(previous, 'executing');
  }
  return { kind: 'executing', request: previous.request, plan, startedAt: now };
}

/** Back to idle from either terminal step. */
export function markIdle(previous: MoveResolutionPhase): MoveResolutionPhase {
  if (previous.kind !== 'rejected' && previous.kind !== 'executing') {
    throw invalidTransition(previous, 'idle');
  }
  return idleMoveResolution;
}
