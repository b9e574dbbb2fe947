import { describe, expect, it } from "vitest";
import {
  RocketApiBadResponseError,
  RocketApiNotFoundError,
  RocketApiRequestError,
} from "@rocket-social/rocketapi";
import { exitCodeFor, formatJson } from "./output.js";

describe("formatJson", () => {
  it("prints bigint ids as strings", () => {
    expect(formatJson({ userId: 3141592653589793238n, name: "a" })).toBe(
      '{\n  "userId": "3141592653589793238",\n  "name": "a"\n}',
    );
  });
});

describe("exitCodeFor", () => {
  it("maps each error kind to its exit code", () => {
    expect(exitCodeFor(new RocketApiNotFoundError("gone"))).toBe(3);
    expect(exitCodeFor(new RocketApiBadResponseError("bad"))).toBe(4);
    expect(exitCodeFor(new RocketApiRequestError("down", new Error("reset")))).toBe(5);
    expect(exitCodeFor(new Error("other"))).toBe(1);
    expect(exitCodeFor("text")).toBe(1);
  });
});
