import { describe, expect, it } from "vitest";
import { Err, Ok, type Result } from "../types/result.js";

function parsePort(text: string): Result<number, string> {
  const port = Number(text);
  return Number.isInteger(port) && port > 0 ? Ok(port) : Err(`not a port: ${text}`);
}

describe("Result", () => {
  it("carries the value of a success", () => {
    expect(parsePort("8080")).toEqual({ ok: true, value: 8080 });
  });

  it("carries the error of a failure", () => {
    expect(parsePort("http")).toEqual({ ok: false, error: "not a port: http" });
  });

  it("narrows on the ok flag", () => {
    const result = parsePort("443");

    if (!result.ok) {
      throw new Error(result.error);
    }
    expect(result.value + 1).toBe(444);
  });
});
