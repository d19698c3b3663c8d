/**
 * Dungeon Validation & Statistics
 *
 * Public facade for validation and statistics utilities.
 * For testing utilities (determinism checks), see testing.ts.
 */

export {
  computeStats,
  type GenerationStats,
  type TileName,
} from "./validation/compute-stats";
export { validateDungeon } from "./validation/validate-dungeon";
export {
  type DungeonValidationResult,
  hasErrorViolations,
  type ValidationFailure,
  type ValidationSuccess,
  type Violation,
} from "./validation/result-types";
