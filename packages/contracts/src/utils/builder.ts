import { z } from "zod";
import {
  type ConfigurationInput,
  ConfigurationInputSchema,
  GenerationRequestSchema,
} from "../schemas/configuration";
import {
  type Configuration,
  DEFAULT_CONFIGURATION,
  isValidConfiguration,
  minimumGridDimension,
} from "../types/configuration";
import { DungeonError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

/**
 * Fully resolved generation request.
 */
export interface GenerationRequest {
  readonly width: number;
  readonly height: number;
  readonly seed: number;
  readonly targetRoomCount: number | undefined;
  readonly configuration: Configuration;
  readonly trace: boolean;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Merge a partial configuration over the defaults and check validity.
 */
export function resolveConfiguration(
  input: unknown = {},
): Result<Configuration, DungeonError> {
  const parsed = ConfigurationInputSchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      DungeonError.configInvalid(describeIssues(parsed.error), {
        issues: parsed.error.issues,
      }),
    );
  }

  const configuration = mergeConfiguration(parsed.data);
  if (!isValidConfiguration(configuration)) {
    return Err(
      DungeonError.configInvalid("Configuration violates generator bounds", {
        configuration,
      }),
    );
  }

  return Ok(configuration);
}

function mergeConfiguration(input: ConfigurationInput): Configuration {
  return Object.freeze({
    minRoomDimension:
      input.minRoomDimension ?? DEFAULT_CONFIGURATION.minRoomDimension,
    maxRoomDimension:
      input.maxRoomDimension ?? DEFAULT_CONFIGURATION.maxRoomDimension,
    minPadding: input.minPadding ?? DEFAULT_CONFIGURATION.minPadding,
    doorwayOffset: input.doorwayOffset ?? DEFAULT_CONFIGURATION.doorwayOffset,
    maxFailCount: input.maxFailCount ?? DEFAULT_CONFIGURATION.maxFailCount,
    reintroducedCorridorDensity:
      input.reintroducedCorridorDensity ??
      DEFAULT_CONFIGURATION.reintroducedCorridorDensity,
    corridorCost: input.corridorCost ?? DEFAULT_CONFIGURATION.corridorCost,
    straightCost: input.straightCost ?? DEFAULT_CONFIGURATION.straightCost,
    standardCost: input.standardCost ?? DEFAULT_CONFIGURATION.standardCost,
    minMazeDimension:
      input.minMazeDimension ?? DEFAULT_CONFIGURATION.minMazeDimension,
    mazeChance: input.mazeChance ?? DEFAULT_CONFIGURATION.mazeChance,
  });
}

/**
 * Validate raw generation input and resolve every default.
 */
export function buildGenerationRequest(
  input: unknown,
): Result<GenerationRequest, DungeonError> {
  const parsed = GenerationRequestSchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      DungeonError.configInvalid(describeIssues(parsed.error), {
        issues: parsed.error.issues,
      }),
    );
  }

  const resolved = resolveConfiguration(parsed.data.configuration ?? {});
  if (!resolved.success) return resolved;

  const { width, height } = parsed.data;
  const minimum = minimumGridDimension(resolved.value);
  if (width < minimum || height < minimum) {
    return Err(
      DungeonError.dimensionTooSmall(
        `Grid ${width}x${height} cannot hold a padded room (needs ${minimum}x${minimum})`,
        { width, height, minimum },
      ),
    );
  }

  return Ok({
    width,
    height,
    seed: parsed.data.seed,
    targetRoomCount: parsed.data.targetRoomCount,
    configuration: resolved.value,
    trace: parsed.data.trace ?? false,
  });
}
