/**
 * Serializer — save/load/export autotile maps.
 *
 * Defines the project JSON schema and provides pure functions for
 * serializing and deserializing an AutotilemapModel: map options,
 * occupancy and rulesets. Baked tiles are not stored; they are derived
 * by baking after load. Also supports a raw 2D array export of the baked
 * tile ids.
 */

import { z } from 'zod';
import {
  createRuleset,
  formatRulesetPattern,
  type AutotileRuleset,
} from './autotile-ruleset.js';
import { AutotilemapModel } from './autotilemap-model.js';
import type { TileId } from './tilemap-model.js';

// ── Project JSON Schema ──────────────────────────────────────────────

/** Schema version for forward compatibility. */
export const SCHEMA_VERSION = 1;

const dimension = z.number().int().positive();

const RulesetSchema = z.object({
  tileId: z.number().int().nonnegative(),
  /** Pattern in shorthand rows, see parseRulesetPattern. */
  pattern: z.array(z.string()),
});

const VersionSchema = z.object({
  version: z.number().int().positive(),
});

export const ProjectSchema = z
  .object({
    version: z.number().int().positive(),
    map: z.object({
      width: dimension,
      height: dimension,
      tileWidth: dimension,
      tileHeight: dimension,
      tilesheet: z.string(),
    }),
    /** Flat occupancy in row-major order: 0 = none, 1 = tile. */
    autotiles: z.array(z.union([z.literal(0), z.literal(1)])),
    rulesets: z.array(RulesetSchema),
  })
  .superRefine((data, ctx) => {
    const expected = data.map.width * data.map.height;
    if (data.autotiles.length !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${expected} autotiles, got ${data.autotiles.length}`,
        path: ['autotiles'],
      });
    }
  });

export type ProjectData = z.infer<typeof ProjectSchema>;
export type RulesetData = z.infer<typeof RulesetSchema>;

/** Thrown when project data cannot be loaded. */
export class SerializationError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: ErrorOptions) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'SerializationError';
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

// ── Serialize (Save) ─────────────────────────────────────────────────

/** Serialize an AutotilemapModel to plain project data. */
export function serializeAutotilemap(model: AutotilemapModel): ProjectData {
  return {
    version: SCHEMA_VERSION,
    map: {
      width: model.width,
      height: model.height,
      tileWidth: model.tileSize.width,
      tileHeight: model.tileSize.height,
      tilesheet: model.tilesheet,
    },
    autotiles: model.autotiles.map((a): 0 | 1 => (a === 'tile' ? 1 : 0)),
    rulesets: model.rulesets.map(serializeRuleset),
  };
}

/** Serialize an AutotilemapModel to a JSON string. */
export function saveToJson(model: AutotilemapModel): string {
  return JSON.stringify(serializeAutotilemap(model), null, 2);
}

function serializeRuleset(ruleset: AutotileRuleset): RulesetData {
  return {
    tileId: ruleset.tileId,
    pattern: formatRulesetPattern(ruleset.grid),
  };
}

// ── Deserialize (Load) ───────────────────────────────────────────────

/**
 * Validate project data and build an AutotilemapModel from it.
 *
 * The returned model is not baked.
 */
export function loadFromSchema(data: unknown): AutotilemapModel {
  const versioned = VersionSchema.safeParse(data);
  if (!versioned.success) {
    throw new SerializationError('Invalid project', formatIssues(versioned.error));
  }
  if (versioned.data.version > SCHEMA_VERSION) {
    throw new SerializationError(
      `Unsupported schema version ${versioned.data.version} (max supported: ${SCHEMA_VERSION})`,
    );
  }

  const parsed = ProjectSchema.safeParse(data);
  if (!parsed.success) {
    throw new SerializationError('Invalid project', formatIssues(parsed.error));
  }
  const project = parsed.data;

  const model = new AutotilemapModel({
    ...project.map,
    rulesets: project.rulesets.map(deserializeRuleset),
  });

  project.autotiles.forEach((value, i) => {
    if (value === 1) {
      model.setTile(i % project.map.width, Math.floor(i / project.map.width));
    }
  });

  return model;
}

/** Parse a JSON string and load it into an AutotilemapModel. */
export function loadFromJson(json: string): AutotilemapModel {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new SerializationError('Project is not valid JSON', [], { cause: err });
  }
  return loadFromSchema(data);
}

function deserializeRuleset(data: RulesetData, index: number): AutotileRuleset {
  try {
    return createRuleset(data.tileId, data.pattern);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SerializationError(
      'Invalid project',
      [`rulesets.${index}.pattern: ${reason}`],
      { cause: err },
    );
  }
}

// ── Raw 2D Array Export ──────────────────────────────────────────────

/** Simple 2D array export of baked tile ids for custom engines. */
export interface RawExport {
  tilesheet: string;
  data: Array<Array<TileId | null>>;
}

/** Export the baked tile grid as rows of tile ids (null = empty). */
export function exportToRawArrays(model: AutotilemapModel): string {
  const rows: Array<Array<TileId | null>> = [];
  for (let y = 0; y < model.height; y++) {
    const row: Array<TileId | null> = [];
    for (let x = 0; x < model.width; x++) {
      row.push(model.getTileId(x, y));
    }
    rows.push(row);
  }

  const result: RawExport = { tilesheet: model.tilesheet, data: rows };
  return JSON.stringify(result, null, 2);
}
