/**
 * Unit tests for the move resolution state machine.
 */
import {
  idleMoveResolution,
  isResolving,
  markExecuting,
  markIdle,
  markRejected,
  markValidating,
} from '../../../src/shared/stateMachines/moveResolution';
import { EngineErrorCode } from '../../../src/shared/engine/errors';
import { MoveRejectionCode, type MovePlan, type MoveRequest } from '../../../src/shared/engine/types';

describe('moveResolution state machine', () => {
  const request: MoveRequest = { snakeId: 0, end: 'head', target: { x: 1, y: 0 } };
  const plan: MovePlan = {
    snakeId: 0,
    end: 'head',
    start: { x: 0, y: 0 },
    target: { x: 1, y: 0 },
    direction: { x: 1, y: 0 },
    finalCell: { x: 1, y: 0 },
  };

  it('walks the accepted path', () => {
    const validating = markValidating(idleMoveResolution, request, 100);
    expect(validating).toEqual({ kind: 'validating', request, startedAt: 100 });
    expect(isResolving(validating)).toBe(true);

    const executing = markExecuting(validating, plan, 105);
    expect(executing).toEqual({ kind: 'executing', request, plan, startedAt: 105 });

    const idle = markIdle(executing);
    expect(idle).toBe(idleMoveResolution);
    expect(isResolving(idle)).toBe(false);
  });

  it('walks the rejected path', () => {
    const rejected = markRejected(
      markValidating(idleMoveResolution, request, 100),
      MoveRejectionCode.NOT_ADJACENT,
      'Too far',
      101
    );

    expect(rejected).toEqual({
      kind: 'rejected',
      request,
      code: MoveRejectionCode.NOT_ADJACENT,
      reason: 'Too far',
      completedAt: 101,
    });
    expect(markIdle(rejected).kind).toBe('idle');
  });

  it('refuses to start a second resolution mid-flight', () => {
    const validating = markValidating(idleMoveResolution, request);

    expect(() => markValidating(validating, request)).toThrow(
      expect.objectContaining({
        code: EngineErrorCode.FSM_INVALID_TRANSITION,
        message: 'Cannot move from validating to validating',
        domain: 'MoveResolution',
      })
    );
  });

  it('refuses out-of-order transitions', () => {
    expect(() => markExecuting(idleMoveResolution, plan)).toThrow(
      'Cannot move from idle to executing'
    );
    expect(() => markRejected(idleMoveResolution, MoveRejectionCode.OBSTRUCTED, 'x')).toThrow(
      'Cannot move from idle to rejected'
    );
    expect(() => markIdle(idleMoveResolution)).toThrow('Cannot move from idle to idle');
    expect(() => markIdle(markValidating(idleMoveResolution, request))).toThrow(
      'Cannot move from validating to idle'
    );
  });
});
