import { describe, expect, it } from "vitest";
import { isRouteReasonable } from "./route-plausibility.helper";

// ~3 miles apart; straight-line estimate at 35 mph is 308 seconds
const ORIGIN = { latitude: 40.0, longitude: -75.0 };
const DESTINATION = { latitude: 40.0434, longitude: -75.0 };

describe("isRouteReasonable", () => {
  it("rejects a missing route", () => {
    expect(isRouteReasonable(null, ORIGIN, DESTINATION)).toBe(false);
    expect(isRouteReasonable(undefined, ORIGIN, DESTINATION)).toBe(false);
  });

  it("accepts a route in line with the straight-line baseline", () => {
    const route = { distanceMeters: 6000, durationSeconds: 600 };

    expect(isRouteReasonable(route, ORIGIN, DESTINATION)).toBe(true);
  });

  it("rejects any route longer than 24 hours regardless of distance", () => {
    for (const distanceMeters of [null, 10, 6000, 5_000_000]) {
      const route = { distanceMeters, durationSeconds: 100_000 };
      expect(isRouteReasonable(route, ORIGIN, DESTINATION)).toBe(false);
      expect(isRouteReasonable(route, null, null)).toBe(false);
    }
  });

  it("accepts routes missing a metric", () => {
    expect(isRouteReasonable({ distanceMeters: null, durationSeconds: 600 }, ORIGIN, DESTINATION)).toBe(true);
    expect(isRouteReasonable({ distanceMeters: 900_000, durationSeconds: null }, ORIGIN, DESTINATION)).toBe(true);
  });

  it("accepts when the straight line cannot be computed or is zero", () => {
    const route = { distanceMeters: 900_000, durationSeconds: 40_000 };

    expect(isRouteReasonable(route, null, DESTINATION)).toBe(true);
    expect(isRouteReasonable(route, ORIGIN, ORIGIN)).toBe(true);
  });

  it("rejects a road distance more than ten times the straight line", () => {
    const route = { distanceMeters: 60_000, durationSeconds: 900 };

    expect(isRouteReasonable(route, ORIGIN, DESTINATION)).toBe(false);
  });

  it("rejects a duration more than five times the 35 mph estimate", () => {
    const route = { distanceMeters: 6000, durationSeconds: 50_000 };

    expect(isRouteReasonable(route, ORIGIN, DESTINATION)).toBe(false);
  });

  it("accepts a duration just under five times the estimate", () => {
    const route = { distanceMeters: 6000, durationSeconds: 1540 };

    expect(isRouteReasonable(route, ORIGIN, DESTINATION)).toBe(true);
  });

  it("honours custom bounds", () => {
    const route = { distanceMeters: 6000, durationSeconds: 600 };

    expect(isRouteReasonable(route, ORIGIN, DESTINATION, { maxDurationSeconds: 500 })).toBe(false);
    expect(isRouteReasonable(route, ORIGIN, DESTINATION, { maxDistanceRatio: 1.1 })).toBe(false);
  });
});
