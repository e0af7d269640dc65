import { z } from 'zod';
import { EngineErrorCode, LevelDataError } from '../engine/errors';
import { GROUP_COLORS, SNAKE_COLORS, type Cell, type LevelData } from '../types/puzzle';

// Cell validation
export const CellSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

export const SnakeColorSchema = z.enum(SNAKE_COLORS);
export const GroupColorSchema = z.enum(GROUP_COLORS);

/** A single cell or a list of cells; both become a footprint. */
export const FootprintSchema = z
  .union([CellSchema, z.array(CellSchema).min(1)])
  .transform((value): Cell[] => (Array.isArray(value) ? value : [value]));

const BodySnakeSchema = z.object({
  color: SnakeColorSchema,
  body: z.array(CellSchema).min(1),
});

/** Short form: head and tail only. Equal cells make a one-segment snake. */
const HeadTailSnakeSchema = z
  .object({
    color: SnakeColorSchema,
    head: CellSchema,
    tail: CellSchema,
  })
  .transform(({ color, head, tail }) => ({
    color,
    body: head.x === tail.x && head.y === tail.y ? [head] : [head, tail],
  }));

export const SnakeSchema = z.union([BodySnakeSchema, HeadTailSnakeSchema]);

const GroupedCellSchema = z.object({
  position: CellSchema,
  color: GroupColorSchema,
});

export const LevelDataSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    width: z.number().int().min(1).max(256),
    height: z.number().int().min(1).max(256),
    walls: z.array(CellSchema).default([]),
    holes: z.array(CellSchema).default([]),
    boxes: z.array(FootprintSchema).default([]),
    iceCubes: z.array(FootprintSchema).default([]),
    fruits: z
      .array(z.object({ position: CellSchema, colors: z.array(SnakeColorSchema).min(1) }))
      .default([]),
    exits: z
      .array(
        z.object({
          position: CellSchema,
          color: SnakeColorSchema,
          minLength: z.number().int().min(0).default(0),
        })
      )
      .default([]),
    pressurePlates: z.array(GroupedCellSchema).default([]),
    liftGates: z.array(GroupedCellSchema).default([]),
    laserGates: z.array(GroupedCellSchema).default([]),
    portals: z.array(z.object({ position: CellSchema, color: z.string().min(1) })).default([]),
    snakes: z.array(SnakeSchema).min(1),
  })
  .superRefine((level, ctx) => {
    const check = (cell: Cell, path: (string | number)[]): void => {
      if (cell.x < 0 || cell.y < 0 || cell.x >= level.width || cell.y >= level.height) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Cell (${cell.x},${cell.y}) is outside the ${level.width}x${level.height} board`,
          path,
        });
      }
    };
    level.walls.forEach((c, i) => check(c, ['walls', i]));
    level.holes.forEach((c, i) => check(c, ['holes', i]));
    level.boxes.forEach((cells, i) => cells.forEach((c, j) => check(c, ['boxes', i, j])));
    level.iceCubes.forEach((cells, i) => cells.forEach((c, j) => check(c, ['iceCubes', i, j])));
    level.fruits.forEach((f, i) => check(f.position, ['fruits', i, 'position']));
    level.exits.forEach((e, i) => check(e.position, ['exits', i, 'position']));
    level.pressurePlates.forEach((p, i) => check(p.position, ['pressurePlates', i, 'position']));
    level.liftGates.forEach((g, i) => check(g.position, ['liftGates', i, 'position']));
    level.laserGates.forEach((g, i) => check(g.position, ['laserGates', i, 'position']));
    level.portals.forEach((p, i) => check(p.position, ['portals', i, 'position']));
    level.snakes.forEach((s, i) => s.body.forEach((c, j) => check(c, ['snakes', i, 'body', j])));
  });

export type LevelDataInput = z.input<typeof LevelDataSchema>;

/**
 * Validate raw level JSON into typed LevelData. Throws LevelDataError with
 * one `{ path, message }` entry per schema issue.
 */
export function parseLevelData(raw: unknown): LevelData {
  const result = LevelDataSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    throw new LevelDataError(
      EngineErrorCode.LEVEL_SCHEMA_INVALID,
      first ? `Invalid level data at "${first.path}": ${first.message}` : 'Invalid level data',
      { issues },
      'LevelSchema'
    );
  }
  return result.data;
}
