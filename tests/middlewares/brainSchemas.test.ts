import { describe, expect, it } from "vitest";
import { climateQuerySchema, convergenceQuerySchema } from "../../src/middlewares/schemas/brainSchemas.js";
import { parseRequest } from "../../src/middlewares/validation.js";
import { ValidationError } from "../../src/utils/errors.js";

describe("convergenceQuerySchema", () => {
  it("normalizes dates and coerces limits", () => {
    const query = parseRequest(convergenceQuerySchema, {
      from: "2026-01-01",
      to: "2026-02-01T00:00:00Z",
      outliers: "3",
    });

    expect(query).toEqual({
      from: "2026-01-01T00:00:00.000Z",
      to: "2026-02-01T00:00:00.000Z",
      outliers: 3,
    });
  });

  it("reports each invalid field", () => {
    try {
      parseRequest(convergenceQuerySchema, { from: "soon", to: "2026-02-01" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.statusCode).toBe(400);
        expect(error.details).toEqual([{ path: "from", message: "Must be an ISO date" }]);
      }
    }
  });

  it("rejects a period that ends before it starts", () => {
    expect(() =>
      parseRequest(convergenceQuerySchema, { from: "2026-02-01", to: "2026-01-01" })
    ).toThrow(ValidationError);
  });
});

describe("climateQuerySchema", () => {
  it("defaults to thirty days", () => {
    expect(parseRequest(climateQuerySchema, {})).toEqual({ days: 30 });
  });

  it("rejects periods over a year", () => {
    expect(() => parseRequest(climateQuerySchema, { days: "400" })).toThrow(ValidationError);
  });
});
