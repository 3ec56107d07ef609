import { describe, expect, it } from "vitest";
import { adjustInflatedEta, arrivalAfter, estimateTripCost } from "./trip-estimate.helper";

const COST_SETTINGS = { costMpg: 25, costPricePerGallon: 3.5 };
const ADJUST_SETTINGS = { adjustMinSeconds: 14400, adjustRatio: 5, adjustMaxMiles: 10, adjustFactor: 1.2 };

describe("estimateTripCost", () => {
  it("should split fuel cost across seats", () => {
    expect(estimateTripCost(160934.4, 4, COST_SETTINGS)).toEqual({ miles: 100, totalCost: 14, perSeatCost: 3.5 });
  });

  it.each([0, null, undefined])("should divide by at least one seat when seats is %j", (seats) => {
    expect(estimateTripCost(160934.4, seats, COST_SETTINGS).perSeatCost).toBe(14);
  });

  it("should round to two decimals", () => {
    expect(estimateTripCost(5210.4, 3, COST_SETTINGS)).toEqual({ miles: 3.24, totalCost: 0.45, perSeatCost: 0.15 });
  });
});

describe("arrivalAfter", () => {
  it("should add the ETA to the departure time", () => {
    expect(arrivalAfter(new Date("2026-03-01T23:50:00.000Z"), 1200)).toEqual(new Date("2026-03-02T00:10:00.000Z"));
  });

  it("should return null without a departure time", () => {
    expect(arrivalAfter(null, 1200)).toBeNull();
  });
});

describe("adjustInflatedEta", () => {
  it("should scale the great-circle estimate when every condition holds", () => {
    expect(adjustInflatedEta(20000, 3, 308, null, ADJUST_SETTINGS)).toEqual({
      seconds: 370,
      human: "6m",
      arrival: null,
    });
  });

  it("should never go below one minute", () => {
    expect(adjustInflatedEta(20000, 0.1, 10, null, ADJUST_SETTINGS)?.seconds).toBe(60);
  });

  it("should accept a zero-second estimate for identical points", () => {
    expect(adjustInflatedEta(20000, 0, 0, null, ADJUST_SETTINGS)?.seconds).toBe(60);
  });

  const unchangedCases: Array<[string, number, number | null, number | null]> = [
    ["the ETA is not above the minimum", 14400, 3, 308],
    ["the ETA is within the ratio of the estimate", 20000, 3, 4000],
    ["the hop is not short", 20000, 10, 308],
    ["the distance is unknown", 20000, null, 308],
    ["the estimate is unknown", 20000, 3, null],
  ];

  it.each(unchangedCases)("should not adjust when %s", (_case, eta, miles, estimate) => {
    expect(adjustInflatedEta(eta, miles, estimate, null, ADJUST_SETTINGS)).toBeNull();
  });
});
