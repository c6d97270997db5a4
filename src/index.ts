export { BoundsError, getTilemapIndex, isInBounds } from './models/grid-index.js';
export {
  TilemapModel,
  assertPositiveInteger,
  assertTileId,
  type TileId,
  type TilemapOptions,
} from './models/tilemap-model.js';
export {
  RULESET_CENTER,
  RULESET_GRID_SIZE,
  RulesetPatternError,
  buildRulesetGrid,
  createRuleset,
  createRulesetGrid,
  formatRulesetPattern,
  matchesRuleset,
  parseRulesetPattern,
  resolveRulesetValue,
  type AutotileOccupancy,
  type AutotileRuleset,
  type AutotileRulesetValue,
  type RulesetGrid,
  type RulesetRow,
} from './models/autotile-ruleset.js';
export { DirtyTracker, type CellCoord } from './models/dirty-tracker.js';
export {
  AutotilemapModel,
  type AutotilemapOptions,
} from './models/autotilemap-model.js';
export {
  ProjectSchema,
  SCHEMA_VERSION,
  SerializationError,
  exportToRawArrays,
  loadFromJson,
  loadFromSchema,
  saveToJson,
  serializeAutotilemap,
  type ProjectData,
  type RawExport,
  type RulesetData,
} from './models/serializer.js';
