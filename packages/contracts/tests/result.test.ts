import { describe, expect, it } from "vitest";
import { CaveError, Err, Ok, type Result } from "../src";

describe("Result", () => {
  it("maps and chains ok values", () => {
    const res = Ok<number, string>(2)
      .map((n) => n * 3)
      .flatMap(
        (n): Result<number, string> => (n > 5 ? Ok(n) : Err("too small")),
      );
    expect(res.isOk()).toBe(true);
    expect(res.value).toBe(6);
  });

  it("short-circuits on errors", () => {
    let called = false;
    const res: Result<number, string> = Err("boom");
    const mapped = res.map((n) => {
      called = true;
      return n + 1;
    });
    expect(called).toBe(false);
    expect(mapped.isErr()).toBe(true);
    expect(mapped.getOrElse(10)).toBe(10);
    expect(mapped.mapErr((e) => e.toUpperCase()).error).toBe("BOOM");
  });

  it("match picks the branch", () => {
    expect(Ok(1).match((v) => `ok ${v}`, () => "err")).toBe("ok 1");
    expect(Err("x").match(() => "ok", (e) => `err ${e}`)).toBe("err x");
  });

  it("getOrThrow rethrows the stored error", () => {
    const error = CaveError.configInvalid("bad");
    expect(() => Err(error).getOrThrow()).toThrow(error);
  });

  it("guards value and error accessors", () => {
    expect(() => Err("x").value).toThrow("Result holds an error, not a value");
    expect(() => Ok(1).error).toThrow("Result holds a value, not an error");
  });
});

describe("CaveError", () => {
  it("serializes code, message and details", () => {
    const error = new CaveError("DIMENSION_INVALID", "too small", { width: 0 });
    expect(error.toJSON()).toEqual({
      name: "CaveError",
      code: "DIMENSION_INVALID",
      message: "too small",
      details: { width: 0 },
    });
    expect(CaveError.isCaveError(error)).toBe(true);
    expect(CaveError.isCaveError(new Error("plain"))).toBe(false);
  });

  it("omits details when there are none", () => {
    expect(CaveError.seedInvalid("nope").toJSON()).toEqual({
      name: "CaveError",
      code: "SEED_INVALID",
      message: "nope",
    });
  });
});

describe("CaveError factories", () => {
  it("reports grid dimensions in the message and details", () => {
    const error = CaveError.dimensionInvalid(0, 12);
    expect(error.code).toBe("DIMENSION_INVALID");
    expect(error.message).toBe("Invalid grid dimensions: 0x12");
    expect(error.details).toEqual({ width: 0, height: 12 });
  });

  it("marks a missing terminal", () => {
    const error = CaveError.terminalUnavailable("no tty");
    expect(error.code).toBe("TERMINAL_UNAVAILABLE");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("CaveError");
  });
});
