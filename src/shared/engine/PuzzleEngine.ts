import type { Cell, LevelData, SnakeColor } from '../types/puzzle';
import {
  idleMoveResolution,
  markExecuting,
  markIdle,
  markRejected,
  markValidating,
  type MoveResolutionPhase,
} from '../stateMachines/moveResolution';
import { createInitialState } from './initialState';
import { applyMove } from './mutators/MoveMutator';
import { renderBoard } from './notation';
import { DEFAULT_RULES, type PuzzleRules } from './rulesConfig';
import { refreshState } from './stateRefresher';
import {
  Entity,
  MoveRequest,
  MoveResolution,
  MutationContext,
  PuzzleEvent,
  PuzzleState,
  PuzzleStatus,
  ResolverContext,
  SnakeId,
} from './types';
import { validateMove } from './validators/MoveValidator';

export interface SnakeSnapshot {
  id: SnakeId;
  color: SnakeColor;
  body: Cell[];
}

/** Detached copy of the level state for collaborators. */
export interface PuzzleSnapshot {
  levelId: string;
  width: number;
  height: number;
  status: PuzzleStatus;
  moveCount: number;
  snakes: SnakeSnapshot[];
  entities: Entity[];
}

const IDLE_CONTEXT: ResolverContext = { presentationBusy: false };

function cloneEntity(entity: Entity): Entity {
  switch (entity.kind) {
    case 'box':
    case 'ice_cube':
      return { ...entity, cells: entity.cells.map((c) => ({ ...c })) };
    case 'fruit':
      return { ...entity, position: { ...entity.position }, colors: [...entity.colors] };
    default:
      return { ...entity, position: { ...entity.position } };
  }
}

/**
 * Owns one live level: validates and commits moves, runs the refresher and
 * buffers the resulting events until the host drains them.
 */
export class PuzzleEngine {
  private state: PuzzleState;
  private phase: MoveResolutionPhase = idleMoveResolution;
  private events: PuzzleEvent[] = [];

  constructor(
    private readonly level: LevelData,
    private readonly rules: PuzzleRules = DEFAULT_RULES
  ) {
    this.state = createInitialState(level, rules);
  }

  public getState(): PuzzleState {
    return this.state;
  }

  public getPhase(): MoveResolutionPhase {
    return this.phase;
  }

  /**
   * Validate the request and, when legal, commit it with all cascades.
   * Rejections leave the state untouched and buffer no events.
   */
  public resolveMove(request: MoveRequest, context: ResolverContext = IDLE_CONTEXT): MoveResolution {
    this.phase = markValidating(this.phase, request);

    let outcome: ReturnType<typeof validateMove>;
    try {
      outcome = validateMove(this.state, request, context);
    } catch (error) {
      this.phase = idleMoveResolution;
      throw error;
    }
    if (!outcome.valid) {
      this.phase = markIdle(markRejected(this.phase, outcome.code, outcome.reason));
      return {
        accepted: false,
        code: outcome.code,
        reason: outcome.reason,
        context: outcome.context,
      };
    }

    this.phase = markExecuting(this.phase, outcome.data);
    const ctx: MutationContext = { state: this.state, events: this.events };
    try {
      applyMove(ctx, outcome.data);
      refreshState(ctx);
    } finally {
      this.phase = markIdle(this.phase);
    }
    return { accepted: true, plan: outcome.data };
  }

  /** Hand over buffered events in emission order and clear the buffer. */
  public drainEvents(): PuzzleEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  /** Rebuild the level from its original data. Pending events are dropped. */
  public reload(): void {
    this.state = createInitialState(this.level, this.rules);
    this.events = [];
    this.phase = idleMoveResolution;
  }

  public getSnapshot(): PuzzleSnapshot {
    const { state } = this;
    return {
      levelId: state.levelId,
      width: state.board.width,
      height: state.board.height,
      status: state.status,
      moveCount: state.moveCount,
      snakes: [...state.snakes.values()]
        .sort((a, b) => a.id - b.id)
        .map((s) => ({ id: s.id, color: s.color, body: s.body.map((c) => ({ ...c })) })),
      entities: state.board.allEntities().map(cloneEntity),
    };
  }

  public render(): string {
    return renderBoard(this.state);
  }
}
