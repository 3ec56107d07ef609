import { afterEach, describe, expect, it, vi } from "vitest";
import { validateEnvironment } from "./env.config";

describe("validateEnvironment", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("applies defaults when nothing is configured", () => {
    const env = validateEnvironment({});

    expect(env.PORT).toBe(3000);
    expect(env.MAPBOX_TOKEN).toBeUndefined();
    expect(env.ORS_API_KEY).toBeUndefined();
    expect(env.ETA_FLAG_THRESHOLD_SECONDS).toBe(21600);
    expect(env.ETA_ADJUST_MIN_SECONDS).toBe(14400);
    expect(env.ETA_ADJUST_RATIO).toBe(5);
    expect(env.ETA_ADJUST_MAX_MILES).toBe(10);
    expect(env.ETA_ADJUST_FACTOR).toBe(1.2);
    expect(env.TRIP_COST_MPG).toBe(25);
    expect(env.TRIP_COST_PRICE_PER_GALLON).toBe(3.5);
  });

  it("treats blank credentials as absent", () => {
    const env = validateEnvironment({ MAPBOX_TOKEN: "   ", ORS_API_KEY: "" });

    expect(env.MAPBOX_TOKEN).toBeUndefined();
    expect(env.ORS_API_KEY).toBeUndefined();
  });

  it("coerces numeric thresholds from strings", () => {
    const env = validateEnvironment({ ETA_FLAG_THRESHOLD_SECONDS: "7200", PORT: "8080" });

    expect(env.ETA_FLAG_THRESHOLD_SECONDS).toBe(7200);
    expect(env.PORT).toBe(8080);
  });

  it("throws on invalid values", () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);

    expect(() => validateEnvironment({ ETA_ADJUST_RATIO: "-1" })).toThrow(
      "Invalid environment configuration. Please check your .env file.",
    );
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("ETA_ADJUST_RATIO:"));
  });
});
