import { Test, type TestingModule } from "@nestjs/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Coordinate } from "../geo/geo.interface";
import { RoutingService } from "../geo/routing/routing.service";
import { DetourService } from "./detour.service";
import type { Trip } from "./trip-estimate.interface";

const ORIGIN: Coordinate = { latitude: 40, longitude: -75 };
const DESTINATION: Coordinate = { latitude: 40.0434, longitude: -75 };
const PICKUP: Coordinate = { latitude: 40.02, longitude: -74.99 };

const trip: Trip = {
  origin: "Main St",
  destination: "Oak Ave",
  originCoordinate: ORIGIN,
  destinationCoordinate: DESTINATION,
};

describe("DetourService", () => {
  let service: DetourService;
  let routingService: { routeAny: ReturnType<typeof vi.fn> };

  beforeEach(async () => {
    routingService = { routeAny: vi.fn().mockResolvedValue(null) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [DetourService, { provide: RoutingService, useValue: routingService }],
    }).compile();

    service = module.get<DetourService>(DetourService);
  });

  it("should return the routed difference, requesting the base route first", async () => {
    routingService.routeAny
      .mockResolvedValueOnce({ distanceMeters: 5200, durationSeconds: 420 })
      .mockResolvedValueOnce({ distanceMeters: 6900, durationSeconds: 600 });

    const result = await service.addedTime(trip, PICKUP);

    expect(result).toEqual({ addedSeconds: 180, addedHuman: "3m" });
    expect(routingService.routeAny).toHaveBeenNthCalledWith(1, [ORIGIN, DESTINATION]);
    expect(routingService.routeAny).toHaveBeenNthCalledWith(2, [ORIGIN, PICKUP, DESTINATION]);
  });

  it("should clamp a detour shorter than the base route to zero", async () => {
    routingService.routeAny
      .mockResolvedValueOnce({ distanceMeters: 5200, durationSeconds: 420 })
      .mockResolvedValueOnce({ distanceMeters: 5100, durationSeconds: 400 });

    await expect(service.addedTime(trip, PICKUP)).resolves.toEqual({ addedSeconds: 0, addedHuman: "<1m" });
  });

  it("should fall back to great-circle legs when routing is unavailable", async () => {
    // base 308s; legs 152s + 175s
    await expect(service.addedTime(trip, PICKUP)).resolves.toEqual({ addedSeconds: 19, addedHuman: "<1m" });
  });

  it("should use the estimate for a route that came back without a duration", async () => {
    routingService.routeAny
      .mockResolvedValueOnce({ distanceMeters: 5200, durationSeconds: null })
      .mockResolvedValueOnce({ distanceMeters: 6900, durationSeconds: 608 });

    await expect(service.addedTime(trip, PICKUP)).resolves.toEqual({ addedSeconds: 300, addedHuman: "5m" });
  });

  it("should return no estimate when a trip coordinate is missing", async () => {
    const result = await service.addedTime({ ...trip, destinationCoordinate: undefined }, PICKUP);

    expect(result).toEqual({ addedSeconds: null, addedHuman: null });
    expect(routingService.routeAny).not.toHaveBeenCalled();
  });
});
