import { describe, expect, it, vi } from "vitest";

import { resolveFirst, resolveFirstOr } from "../resolve.js";

describe("resolveFirst", () => {
  it("returns the first non-empty candidate", () => {
    expect(resolveFirst<number>(undefined, null, 640, 320)).toBe(640);
  });

  it("keeps falsy values that are not null or undefined", () => {
    expect(resolveFirst<number>(undefined, 0, 12)).toBe(0);
    expect(resolveFirst<boolean>(null, false, true)).toBe(false);
  });

  it("returns undefined when every candidate is empty", () => {
    expect(resolveFirst<string>(undefined, null)).toBeUndefined();
  });

  it("evaluates thunks lazily and in order", () => {
    const late = vi.fn(() => 3);

    expect(resolveFirst<number>(() => undefined, () => 2, late)).toBe(2);
    expect(late).not.toHaveBeenCalled();
  });
});

describe("resolveFirstOr", () => {
  it("falls back when nothing resolves", () => {
    expect(resolveFirstOr(48, undefined, () => null)).toBe(48);
  });

  it("prefers a resolved candidate over the fallback", () => {
    expect(resolveFirstOr(48, undefined, 32)).toBe(32);
  });
});
