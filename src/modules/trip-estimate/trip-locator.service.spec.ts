import { Test, type TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { GeocodingService } from "../geo/geocoding/geocoding.service";
import type { Coordinate } from "../geo/geo.interface";
import { EtaService } from "./eta.service";
import type { EtaComputation, Trip } from "./trip-estimate.interface";
import { hasLocationChanges, TripLocatorService } from "./trip-locator.service";

const ORIGIN: Coordinate = { latitude: 40, longitude: -75 };
const DESTINATION: Coordinate = { latitude: 40.0434, longitude: -75 };

const ROUTED_ETA: EtaComputation = {
  seconds: 418,
  source: "routed",
  routeDistanceMeters: 5210.4,
  routeProvider: "mapbox",
  routeRejected: false,
};

describe("TripLocatorService", () => {
  let service: TripLocatorService;
  let geocodingService: { geocodeAny: ReturnType<typeof vi.fn> };
  let etaService: { computeEta: ReturnType<typeof vi.fn> };

  beforeEach(async () => {
    geocodingService = { geocodeAny: vi.fn() };
    etaService = { computeEta: vi.fn().mockResolvedValue(ROUTED_ETA) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TripLocatorService,
        { provide: GeocodingService, useValue: geocodingService },
        { provide: EtaService, useValue: etaService },
      ],
    }).compile();

    service = module.get<TripLocatorService>(TripLocatorService);
  });

  it("should geocode both ends, then compute the ETA", async () => {
    geocodingService.geocodeAny
      .mockResolvedValueOnce({ coordinate: ORIGIN, provider: "ors" })
      .mockResolvedValueOnce({ coordinate: DESTINATION, provider: "nominatim" });

    const update = await service.locate({ origin: "Main St", destination: "Oak Ave" });

    expect(update).toEqual({
      originCoordinate: ORIGIN,
      originProvider: "ors",
      destinationCoordinate: DESTINATION,
      destinationProvider: "nominatim",
      etaSeconds: 418,
      etaSource: "routed",
      etaUpdatedAt: expect.any(Date),
    });
    expect(geocodingService.geocodeAny).toHaveBeenNthCalledWith(1, "Main St");
    expect(geocodingService.geocodeAny).toHaveBeenNthCalledWith(2, "Oak Ave");
    expect(etaService.computeEta).toHaveBeenCalledWith(ORIGIN, DESTINATION);
  });

  it("should change nothing for a trip that is already located", async () => {
    const trip: Trip = {
      origin: "Main St",
      destination: "Oak Ave",
      originCoordinate: ORIGIN,
      destinationCoordinate: DESTINATION,
      etaSeconds: 420,
    };

    const update = await service.locate(trip);

    expect(update).toEqual({});
    expect(hasLocationChanges(update)).toBe(false);
    expect(geocodingService.geocodeAny).not.toHaveBeenCalled();
    expect(etaService.computeEta).not.toHaveBeenCalled();
  });

  it("should only compute the ETA when coordinates are already stored", async () => {
    const update = await service.locate({
      origin: "Main St",
      destination: "Oak Ave",
      originCoordinate: ORIGIN,
      destinationCoordinate: DESTINATION,
    });

    expect(update).toEqual({ etaSeconds: 418, etaSource: "routed", etaUpdatedAt: expect.any(Date) });
    expect(geocodingService.geocodeAny).not.toHaveBeenCalled();
  });

  it("should skip the ETA when an address cannot be geocoded", async () => {
    geocodingService.geocodeAny
      .mockResolvedValueOnce({ coordinate: ORIGIN, provider: "ors" })
      .mockResolvedValueOnce(null);

    const update = await service.locate({ origin: "Main St", destination: "Nowhere" });

    expect(update).toEqual({ originCoordinate: ORIGIN, originProvider: "ors" });
    expect(etaService.computeEta).not.toHaveBeenCalled();
  });

  it("should geocode again and recompute when regeocode is set", async () => {
    const moved: Coordinate = { latitude: 40.05, longitude: -75.01 };
    geocodingService.geocodeAny
      .mockResolvedValueOnce({ coordinate: moved, provider: "mapbox" })
      .mockResolvedValueOnce(null);

    const update = await service.locate(
      {
        origin: "Elm St",
        destination: "Oak Ave",
        originCoordinate: ORIGIN,
        destinationCoordinate: DESTINATION,
        etaSeconds: 420,
      },
      { regeocode: true },
    );

    expect(update).toMatchObject({ originCoordinate: moved, originProvider: "mapbox", etaSeconds: 418 });
    expect(etaService.computeEta).toHaveBeenCalledWith(moved, DESTINATION);
  });

  it("should leave the ETA out when none can be computed", async () => {
    etaService.computeEta.mockResolvedValueOnce(null);

    const update = await service.locate({
      origin: "Main St",
      destination: "Oak Ave",
      originCoordinate: ORIGIN,
      destinationCoordinate: DESTINATION,
    });

    expect(update).toEqual({});
  });
});
