import { describe, expect, it } from "vitest";

import {
  DEFAULT_MAX_ROW_BUFFER,
  parseExecutionOptions,
  parseExecutorCacheOptions,
} from "../src/config";
import { ConfigurationError } from "../src/errors";

function configurationErrorOf(run: () => unknown): ConfigurationError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error("expected a ConfigurationError");
}

describe("parseExecutionOptions", () => {
  it("fills in defaults", () => {
    expect(parseExecutionOptions()).toEqual({
      streamResults: false,
      maxRowBuffer: DEFAULT_MAX_ROW_BUFFER,
      growthFactor: 5,
      initialBufferSize: 1,
      bufferFully: false,
      arraySize: 1,
    });
  });

  it("keeps given values", () => {
    const options = parseExecutionOptions({ yieldPer: 50, growthFactor: 0 });
    expect(options.yieldPer).toBe(50);
    expect(options.growthFactor).toBe(0);
  });

  it("rejects conflicting buffering modes", () => {
    const error = configurationErrorOf(() =>
      parseExecutionOptions({ bufferFully: true, streamResults: true }),
    );
    expect(error.details["issues"]).toEqual([
      {
        path: "bufferFully",
        message: "bufferFully and streamResults cannot both be set",
        code: "custom",
      },
    ]);
  });

  it("rejects unknown options", () => {
    const error = configurationErrorOf(() =>
      parseExecutionOptions({ chunkSize: 10 }),
    );
    expect(error.details["subject"]).toBe("execution options");
    expect(error.suggestion).toBe(
      "Check the following fields: (root). See error.details.issues for specific validation failures.",
    );
  });

  it("rejects non-positive sizes", () => {
    const error = configurationErrorOf(() =>
      parseExecutionOptions({ maxRowBuffer: 0 }),
    );
    expect(error.details["issues"]).toMatchObject([
      { path: "maxRowBuffer", code: "too_small" },
    ]);
  });
});

describe("parseExecutorCacheOptions", () => {
  it("fills in defaults", () => {
    expect(parseExecutorCacheOptions()).toEqual({
      compiledCacheSize: 500,
      metadataCacheSize: 500,
    });
  });

  it("rejects fractional sizes", () => {
    expect(() => parseExecutorCacheOptions({ compiledCacheSize: 1.5 })).toThrow(
      ConfigurationError,
    );
  });
});
