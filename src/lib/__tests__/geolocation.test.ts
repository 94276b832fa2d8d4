import { resolveCurrentLocation } from "../geolocation";
import { errorResponse, jsonResponse, silenceConsole } from "./fetchMocks";

describe("resolveCurrentLocation", () => {
  const originalFetch = global.fetch;
  const originalGeoUrl = process.env.GEOLOCATION_API_URL;

  beforeEach(() => {
    process.env.GEOLOCATION_API_URL = "https://geo.test";
    silenceConsole();
  });

  afterEach(() => {
    global.fetch = originalFetch;
    if (originalGeoUrl === undefined) {
      delete process.env.GEOLOCATION_API_URL;
    } else {
      process.env.GEOLOCATION_API_URL = originalGeoUrl;
    }
    jest.restoreAllMocks();
  });

  it("parses the loc field", async () => {
    const fetchMock = jest.fn().mockResolvedValue(jsonResponse({ ip: "198.51.100.4", loc: "48.8534,2.3488" }));
    global.fetch = fetchMock as unknown as typeof fetch;

    await expect(resolveCurrentLocation()).resolves.toEqual({ lat: 48.8534, lng: 2.3488 });
    expect(fetchMock.mock.calls[0][0]).toBe("https://geo.test");
  });

  it("looks up the caller address when one is known", async () => {
    const fetchMock = jest.fn().mockResolvedValue(jsonResponse({ loc: "52.3740,4.8897" }));
    global.fetch = fetchMock as unknown as typeof fetch;

    await expect(resolveCurrentLocation("203.0.113.7")).resolves.toEqual({ lat: 52.374, lng: 4.8897 });
    expect(fetchMock.mock.calls[0][0]).toBe("https://geo.test/203.0.113.7");
  });

  it("does not append an unknown caller address", async () => {
    const fetchMock = jest.fn().mockResolvedValue(jsonResponse({ loc: "0,0" }));
    global.fetch = fetchMock as unknown as typeof fetch;

    await resolveCurrentLocation("unknown");

    expect(fetchMock.mock.calls[0][0]).toBe("https://geo.test");
  });

  it("returns null when loc is missing", async () => {
    global.fetch = jest.fn().mockResolvedValue(jsonResponse({ ip: "127.0.0.1", bogon: true })) as unknown as typeof fetch;

    await expect(resolveCurrentLocation()).resolves.toBeNull();
  });

  it("returns null when loc cannot be parsed", async () => {
    global.fetch = jest.fn().mockResolvedValue(jsonResponse({ loc: "somewhere" })) as unknown as typeof fetch;

    await expect(resolveCurrentLocation()).resolves.toBeNull();
  });

  it("returns null on an error status", async () => {
    global.fetch = jest.fn().mockResolvedValue(errorResponse(429)) as unknown as typeof fetch;

    await expect(resolveCurrentLocation()).resolves.toBeNull();
  });

  it("returns null when the request fails", async () => {
    global.fetch = jest.fn().mockRejectedValue(new TypeError("fetch failed")) as unknown as typeof fetch;

    await expect(resolveCurrentLocation()).resolves.toBeNull();
  });
});
