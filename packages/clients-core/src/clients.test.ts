import { describe, it, expect, afterEach, vi } from "vitest";
import axios, { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";
import { ApiError } from "./baseClient.js";
import { CarClient } from "./carClient.js";
import { EventClient } from "./eventClient.js";
import { HealthClient } from "./healthClient.js";
import { TickClient } from "./tickClient.js";
import { TownClient } from "./townClient.js";

const config = { baseUrl: "http://localhost:3000" };

function ok<T>(data: T): AxiosResponse<T> {
  return { data, status: 200, statusText: "OK", headers: {}, config: { headers: new AxiosHeaders() } };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("CarClient", () => {
  it("requests cars by encoded id", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValue(ok({ id: "car 1" }));
    await new CarClient(config).getCar("car 1");
    expect(get).toHaveBeenCalledWith("/api/cars/car%201", expect.objectContaining({ baseURL: config.baseUrl }));
  });

  it("posts moves to the car's action path", async () => {
    const post = vi.spyOn(axios, "post").mockResolvedValue(ok({}));
    const client = new CarClient(config);
    await client.departCar("car-2");
    await client.advanceCar("car-2");
    expect(post.mock.calls.map((call) => call[0])).toEqual(["/api/cars/car-2/depart", "/api/cars/car-2/advance"]);
  });

  it("raises ApiError for an error response", async () => {
    const requestConfig = { headers: new AxiosHeaders() };
    vi.spyOn(axios, "get").mockRejectedValue(
      new AxiosError("Request failed with status code 404", "ERR_BAD_REQUEST", requestConfig, undefined, {
        data: { message: 'Unknown car "car-9"', kind: "unknown-car" },
        status: 404,
        statusText: "Not Found",
        headers: {},
        config: requestConfig,
      }),
    );
    const failure = new CarClient(config).getCar("car-9");
    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({ status: 404, kind: "unknown-car" });
  });
});

describe("TownClient", () => {
  it("sends weight updates to the edge path", async () => {
    const put = vi.spyOn(axios, "put").mockResolvedValue(ok({ edge: {}, rerouted: [] }));
    await new TownClient(config).updateEdge("Main St", "B", null);
    expect(put).toHaveBeenCalledWith(
      "/api/town/edges/Main%20St/B",
      { weight: null },
      expect.objectContaining({ baseURL: config.baseUrl }),
    );
  });

  it("lists town configs from their own resource", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValue(ok([]));
    await new TownClient(config).listTownConfigs();
    expect(get.mock.calls[0]?.[0]).toBe("/api/towns");
  });
});

describe("TickClient and EventClient", () => {
  it("posts a tick body as given", async () => {
    const result = { edges: [], rerouted: [], advanced: [], stalled: ["car-1"] };
    const post = vi.spyOn(axios, "post").mockResolvedValue(ok(result));
    const request = { advances: ["car-1"] };
    expect(await new TickClient(config).applyTick(request)).toEqual(result);
    expect(post.mock.calls[0]?.[1]).toEqual(request);
  });

  it("only sends a limit when one is given", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValue(ok({ events: [] }));
    const client = new EventClient(config);
    await client.listEvents();
    await client.listEvents(5);
    expect(get.mock.calls.map((call) => call[1]?.params)).toEqual([undefined, { limit: 5 }]);
  });
});

describe("HealthClient", () => {
  const health = { status: "ok", uptime: 12, town: { name: "five-corners", vertices: 5, edges: 12, cars: 1 } };

  it("reads the town statistics from the health check", async () => {
    const get = vi.spyOn(axios, "get").mockResolvedValue(ok(health));
    expect(await new HealthClient(config).getTownStats()).toEqual(health.town);
    expect(get.mock.calls[0]?.[0]).toBe("/health");
  });

  it("reports the server up when the check answers", async () => {
    vi.spyOn(axios, "get").mockResolvedValue(ok(health));
    expect(await new HealthClient(config).isUp()).toBe(true);
  });

  it("reports the server down for a refused connection or an error status", async () => {
    const requestConfig = { headers: new AxiosHeaders() };
    vi.spyOn(axios, "get")
      .mockRejectedValueOnce(new AxiosError("connect ECONNREFUSED", "ECONNREFUSED"))
      .mockRejectedValueOnce(
        new AxiosError("Request failed with status code 503", "ERR_BAD_RESPONSE", requestConfig, undefined, {
          data: { message: "Service unavailable" },
          status: 503,
          statusText: "Service Unavailable",
          headers: {},
          config: requestConfig,
        }),
      );
    const client = new HealthClient(config);
    expect(await client.isUp()).toBe(false);
    expect(await client.isUp()).toBe(false);
  });

  it("rethrows failures that did not come from the request", async () => {
    vi.spyOn(axios, "get").mockRejectedValue(new TypeError("bad config"));
    await expect(new HealthClient(config).isUp()).rejects.toThrow("bad config");
  });
});
