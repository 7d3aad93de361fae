import { validateConfig } from "@cavern/contracts";
import {
  genDrunkWalk,
  Grid,
  regenRandom,
  renderAscii,
  SIMPLE_CHARSET,
} from "@cavern/engine";
import { describe, expect, it } from "vitest";
import { asciiWorld } from "../src/print";

describe("asciiWorld", () => {
  it("prints a random fill for paint mode", () => {
    const config = validateConfig({
      worldWidth: 12,
      worldHeight: 6,
      seed: 3,
    }).getOrThrow();
    const grid = new Grid(12, 6);
    regenRandom(grid, 3n, config.fillProbability);

    const expected = renderAscii(grid, { charset: SIMPLE_CHARSET });
    expect(asciiWorld(config)).toBe(`${expected}\n`);
  });

  it("prints a drunk walk for drunk-walk mode", () => {
    const config = validateConfig({
      worldWidth: 12,
      worldHeight: 6,
      seed: 3,
      initialMode: "drunk-walk",
    }).getOrThrow();
    const grid = new Grid(12, 6);
    genDrunkWalk(grid, 3n, config.walkRatio);

    const expected = renderAscii(grid, { charset: SIMPLE_CHARSET });
    expect(asciiWorld(config)).toBe(`${expected}\n`);
  });

  it("walls in the border", () => {
    const config = validateConfig({
      worldWidth: 5,
      worldHeight: 4,
      seed: 1,
    }).getOrThrow();
    const lines = asciiWorld(config).split("\n");

    expect(lines).toHaveLength(5);
    expect(lines[0]).toBe("#####");
    expect(lines[3]).toBe("#####");
    expect(lines[4]).toBe("");
  });
});
