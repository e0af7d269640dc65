import { v4 as uuidv4 } from 'uuid';
import { wrapEngineError } from '../../shared/engine/errors';
import { PuzzleEngine, type PuzzleSnapshot } from '../../shared/engine/PuzzleEngine';
import { formatMoveRequest, formatRejection } from '../../shared/engine/notation';
import type { PuzzleRules } from '../../shared/engine/rulesConfig';
import type {
  MoveRejectionCode,
  MoveRequest,
  MoveResolution,
  PuzzleEvent,
} from '../../shared/engine/types';
import type { LevelData } from '../../shared/types/puzzle';
import { config } from '../config';
import { logger, runWithSessionContext } from '../utils/logger';
import { loadLevelById } from './levelLoader';

/**
 * Events delivered to session listeners: every engine event plus the
 * session's own lifecycle notices.
 */
export type SessionEvent =
  | PuzzleEvent
  | { type: 'LEVEL_LOADED'; levelId: string; snapshot: PuzzleSnapshot }
  | { type: 'MOVE_REJECTED'; request: MoveRequest; code: MoveRejectionCode; reason: string };

export type SessionListener = (event: SessionEvent) => void;

export type MoveRequestOutcome =
  | { status: 'resolved'; resolution: MoveResolution }
  | { status: 'queued'; position: number };

export type ReloadOutcome = { status: 'reloaded' } | { status: 'queued'; position: number };

export interface PuzzleSessionOptions {
  rules?: PuzzleRules;
  sessionId?: string;
}

type QueuedRequest = { kind: 'move'; request: MoveRequest } | { kind: 'reload' };

/**
 * PuzzleSession owns one PuzzleEngine and is the only thing hosts talk to:
 * - forwards move and reload requests
 * - drains engine events and republishes them, in order, to listeners
 * - queues requests made from inside a listener until delivery finishes,
 *   so the engine is never entered re-entrantly
 */
export class PuzzleSession {
  public readonly sessionId: string;
  private readonly engine: PuzzleEngine;
  private readonly listeners = new Set<SessionListener>();
  private readonly queue: QueuedRequest[] = [];
  private presentationBusy = false;
  private dispatching = false;

  constructor(
    private readonly level: LevelData,
    options: PuzzleSessionOptions = {}
  ) {
    this.sessionId = options.sessionId ?? uuidv4();
    this.engine = new PuzzleEngine(level, options.rules ?? config.puzzle.rules);
    this.withContext(() => {
      logger.info('PuzzleSession initialized', {
        width: level.width,
        height: level.height,
        snakes: level.snakes.length,
      });
    });
  }

  /** Build a session for a level file in the configured levels directory. */
  public static forLevel(levelId: string, options: PuzzleSessionOptions = {}): PuzzleSession {
    return new PuzzleSession(loadLevelById(levelId), options);
  }

  public get levelId(): string {
    return this.level.id;
  }

  /** Register a listener; the returned function unregisters it. */
  public subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Announce the current level to listeners that subscribed after construction. */
  public start(): void {
    this.withContext(() => {
      this.dispatch([this.levelLoadedEvent()]);
      this.drainQueue();
    });
  }

  public setPresentationBusy(busy: boolean): void {
    this.presentationBusy = busy;
  }

  public isPresentationBusy(): boolean {
    return this.presentationBusy;
  }

  public requestMove(request: MoveRequest): MoveRequestOutcome {
    if (this.dispatching) {
      this.queue.push({ kind: 'move', request });
      logger.debug('Move queued during dispatch', { request: formatMoveRequest(request) });
      return { status: 'queued', position: this.queue.length };
    }
    return this.withContext(() => {
      const resolution = this.resolve(request);
      this.dispatch(this.engine.drainEvents());
      this.drainQueue();
      return { status: 'resolved', resolution };
    });
  }

  public requestReloadLevel(): ReloadOutcome {
    if (this.dispatching) {
      this.queue.push({ kind: 'reload' });
      return { status: 'queued', position: this.queue.length };
    }
    return this.withContext(() => {
      this.reload();
      this.drainQueue();
      return { status: 'reloaded' };
    });
  }

  public getSnapshot(): PuzzleSnapshot {
    return this.engine.getSnapshot();
  }

  public render(): string {
    return this.engine.render();
  }

  private withContext<T>(fn: () => T): T {
    return runWithSessionContext({ sessionId: this.sessionId, levelId: this.level.id }, fn);
  }

  private levelLoadedEvent(): SessionEvent {
    return { type: 'LEVEL_LOADED', levelId: this.level.id, snapshot: this.engine.getSnapshot() };
  }

  private resolve(request: MoveRequest): MoveResolution {
    const resolution = this.engine.resolveMove(request, {
      presentationBusy: this.presentationBusy,
    });
    if (resolution.accepted) {
      logger.debug('Move applied', {
        request: formatMoveRequest(request),
        moveCount: this.engine.getState().moveCount,
      });
    } else {
      logger.debug('Move rejected', {
        request: formatMoveRequest(request),
        rejection: formatRejection(resolution),
      });
    }
    return resolution;
  }

  private reload(): void {
    this.engine.reload();
    logger.info('Level reloaded');
    this.dispatch([this.levelLoadedEvent()]);
  }

  private drainQueue(): void {
    let next = this.queue.shift();
    while (next) {
      if (next.kind === 'reload') {
        this.reload();
      } else {
        const resolution = this.resolve(next.request);
        const events: SessionEvent[] = this.engine.drainEvents();
        if (!resolution.accepted) {
          events.push({
            type: 'MOVE_REJECTED',
            request: next.request,
            code: resolution.code,
            reason: resolution.reason,
          });
        }
        this.dispatch(events);
      }
      next = this.queue.shift();
    }
  }

  private dispatch(events: readonly SessionEvent[]): void {
    this.dispatching = true;
    try {
      for (const event of events) {
        for (const listener of [...this.listeners]) {
          try {
            listener(event);
          } catch (error) {
            logger.error('Session listener failed', {
              eventType: event.type,
              error: wrapEngineError(error, 'PuzzleSession', { eventType: event.type }).toJSON(),
            });
          }
        }
      }
    } finally {
      this.dispatching = false;
    }
  }
}
