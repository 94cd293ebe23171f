import { describe, it, expect } from "vitest";
import { BoundedList } from "./bounded.js";
import { LengthExceededError } from "../types/errors.js";

describe("BoundedList", () => {
  it("accepts up to max items", () => {
    const list = BoundedList.from([1, 2, 3], 3, "numbers");
    expect(list.length).toBe(3);
    expect(list.max).toBe(3);
    expect([...list]).toEqual([1, 2, 3]);
    expect(list.isEmpty).toBe(false);
  });

  it("throws LengthExceededError past the bound", () => {
    expect(() => BoundedList.from([1, 2, 3], 2, "pricing")).toThrow(
      LengthExceededError,
    );
    expect(() => BoundedList.from([1, 2, 3], 2, "pricing")).toThrow(
      "pricing holds at most 2 items, got 3",
    );
  });

  it("copies its input", () => {
    const source = ["a"];
    const list = BoundedList.from(source, 5, "letters");
    source.push("b");
    expect(list.items).toEqual(["a"]);
  });

  it("reports an empty list", () => {
    expect(BoundedList.from([], 1, "empty").isEmpty).toBe(true);
  });
});
