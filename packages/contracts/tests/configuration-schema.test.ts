import { describe, expect, it } from "vitest";
import {
  ConfigurationInputSchema,
  DEFAULT_CONFIGURATION,
  GenerationRequestSchema,
  isValidConfiguration,
  SeedSchema,
} from "../src";

describe("Configuration", () => {
  it("considers the defaults valid", () => {
    expect(isValidConfiguration(DEFAULT_CONFIGURATION)).toBe(true);
  });

  it("rejects a minimum room dimension above the maximum", () => {
    expect(
      isValidConfiguration({
        ...DEFAULT_CONFIGURATION,
        minRoomDimension: 12,
        maxRoomDimension: 10,
      }),
    ).toBe(false);
  });

  it("rejects padding below three", () => {
    expect(
      isValidConfiguration({ ...DEFAULT_CONFIGURATION, minPadding: 2 }),
    ).toBe(false);
  });

  it("rejects a density numerator above the denominator", () => {
    expect(
      isValidConfiguration({
        ...DEFAULT_CONFIGURATION,
        reintroducedCorridorDensity: [3, 2],
      }),
    ).toBe(false);
  });

  it("rejects a doorway offset that leaves no room for a doorway", () => {
    expect(
      isValidConfiguration({ ...DEFAULT_CONFIGURATION, doorwayOffset: 3 }),
    ).toBe(false);
  });

  it("rejects a maze chance outside [0, 1]", () => {
    expect(
      isValidConfiguration({ ...DEFAULT_CONFIGURATION, mazeChance: 1.5 }),
    ).toBe(false);
  });

  it("rejects fractional counts", () => {
    expect(
      isValidConfiguration({ ...DEFAULT_CONFIGURATION, straightCost: 1.5 }),
    ).toBe(false);
  });
});

describe("Configuration schemas", () => {
  it("accepts a partial configuration", () => {
    const res = ConfigurationInputSchema.safeParse({ mazeChance: 0.5 });
    expect(res.success).toBe(true);
  });

  it("rejects unknown keys", () => {
    const res = ConfigurationInputSchema.safeParse({ roomCount: 4 });
    expect(res.success).toBe(false);
  });

  it("rejects a density with numerator above denominator", () => {
    const res = ConfigurationInputSchema.safeParse({
      reintroducedCorridorDensity: [2, 1],
    });
    expect(res.success).toBe(false);
  });

  it("rejects negative and oversized seeds", () => {
    expect(SeedSchema.safeParse(-1).success).toBe(false);
    expect(SeedSchema.safeParse(0x100000000).success).toBe(false);
    expect(SeedSchema.safeParse(42).success).toBe(true);
  });

  it("validates a generation request", () => {
    const res = GenerationRequestSchema.safeParse({
      width: 64,
      height: 48,
      seed: 7,
      targetRoomCount: 12,
    });
    expect(res.success).toBe(true);
  });
});
