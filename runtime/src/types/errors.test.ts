import { describe, it, expect } from "vitest";
import {
  RuntimeErrorCodes,
  RuntimeError,
  CalculationOverflowError,
  LengthExceededError,
  TimestampConversionError,
  ConfigValidationError,
  hasErrorCode,
  errorMessage,
} from "./errors.js";

describe("RuntimeErrorCodes", () => {
  it("maps every code to its own name", () => {
    for (const [key, value] of Object.entries(RuntimeErrorCodes)) {
      expect(value).toBe(key);
    }
  });

  it("contains the admission, lifecycle and severe codes", () => {
    expect(RuntimeErrorCodes.SCHEDULE_OVERLAP).toBe("SCHEDULE_OVERLAP");
    expect(RuntimeErrorCodes.MORE_REPORTS_THAN_EXPECTED).toBe(
      "MORE_REPORTS_THAN_EXPECTED",
    );
    expect(RuntimeErrorCodes.CAPACITY_NOT_FOUND).toBe("CAPACITY_NOT_FOUND");
  });
});

describe("RuntimeError", () => {
  it("carries message, code and name", () => {
    const err = new RuntimeError("boom", RuntimeErrorCodes.EMPTY_MATCHING);
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe("boom");
    expect(err.code).toBe("EMPTY_MATCHING");
    expect(err.name).toBe("RuntimeError");
  });
});

describe("specific errors", () => {
  it("CalculationOverflowError names the operation", () => {
    const err = new CalculationOverflowError("total fee");
    expect(err).toBeInstanceOf(RuntimeError);
    expect(err.code).toBe(RuntimeErrorCodes.CALCULATION_OVERFLOW);
    expect(err.message).toBe("Calculation overflow in total fee");
    expect(err.operation).toBe("total fee");
  });

  it("LengthExceededError reports bound and actual size", () => {
    const err = new LengthExceededError("pricing", 2, 3);
    expect(err.message).toBe("pricing holds at most 2 items, got 3");
    expect(err.max).toBe(2);
    expect(err.actual).toBe(3);
    expect(new LengthExceededError("slots", 1, 2).message).toBe(
      "slots holds at most 1 item, got 2",
    );
  });

  it("TimestampConversionError uses the timestamp code", () => {
    const err = new TimestampConversionError(Number.NaN);
    expect(err.code).toBe(RuntimeErrorCodes.FAILED_TIMESTAMP_CONVERSION);
    expect(err.message).toBe(
      "Clock returned an invalid millisecond timestamp: NaN",
    );
  });

  it("ConfigValidationError keeps the individual problems", () => {
    const err = new ConfigValidationError("bad config", ["a", "b"]);
    expect(err.errors).toEqual(["a", "b"]);
    expect(err.code).toBe(RuntimeErrorCodes.CONFIG_VALIDATION_ERROR);
  });
});

describe("helpers", () => {
  it("hasErrorCode matches only runtime errors with that code", () => {
    const err = new CalculationOverflowError("x");
    expect(hasErrorCode(err, RuntimeErrorCodes.CALCULATION_OVERFLOW)).toBe(true);
    expect(hasErrorCode(err, RuntimeErrorCodes.EMPTY_PRICING)).toBe(false);
    expect(hasErrorCode(new Error("x"), RuntimeErrorCodes.EMPTY_PRICING)).toBe(
      false,
    );
    expect(hasErrorCode("CALCULATION_OVERFLOW", RuntimeErrorCodes.CALCULATION_OVERFLOW)).toBe(
      false,
    );
  });

  it("errorMessage handles non-errors", () => {
    expect(errorMessage(new Error("oops"))).toBe("oops");
    expect(errorMessage(42)).toBe("42");
  });
});
