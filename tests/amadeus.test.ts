import { describe, expect, it } from "vitest";

import { AmadeusClient } from "../src/amadeus.ts";
import { RequestDispatcher } from "../src/dispatcher.ts";
import { fakeTokens, jsonResponse, queuedFetch } from "./helpers.ts";

const BASE_URL = "https://test.api.amadeus.com";

function client(body: unknown = { data: [] }) {
  const fake = queuedFetch([jsonResponse(200, body)]);
  const http = new RequestDispatcher({ baseUrl: BASE_URL, tokens: fakeTokens().provider, fetch: fake.fetch });
  return { amadeus: new AmadeusClient(http), calls: fake.calls };
}

function query(url: string): Record<string, string> {
  return Object.fromEntries(new URL(url).searchParams);
}

describe("AmadeusClient", () => {
  it("searches flight offers with upper-cased codes and defaults", async () => {
    const { amadeus, calls } = client();

    await amadeus.searchFlightOffers({ origin: "lhr", destination: "bcn", departureDate: "2026-03-15" });

    expect(calls[0].url).toBe(
      `${BASE_URL}/v2/shopping/flight-offers?originLocationCode=LHR&destinationLocationCode=BCN` +
        "&departureDate=2026-03-15&adults=1&currencyCode=GBP&max=20",
    );
  });

  it("passes the optional search filters and caps max at 250", async () => {
    const { amadeus, calls } = client();

    await amadeus.searchFlightOffers({
      origin: "LHR",
      destination: "JFK",
      departureDate: "2026-03-15",
      returnDate: "2026-03-22",
      adults: 2,
      children: 1,
      travelClass: "BUSINESS",
      nonStop: true,
      maxPrice: 999.9,
      currency: "USD",
      max: 500,
    });

    expect(query(calls[0].url)).toEqual({
      originLocationCode: "LHR",
      destinationLocationCode: "JFK",
      departureDate: "2026-03-15",
      returnDate: "2026-03-22",
      adults: "2",
      children: "1",
      travelClass: "BUSINESS",
      nonStop: "true",
      maxPrice: "999",
      currencyCode: "USD",
      max: "250",
    });
  });

  it("wraps offers for the pricing endpoint", async () => {
    const { amadeus, calls } = client({ data: { flightOffers: [] } });

    await amadeus.confirmPrice([{ id: "1" }]);

    expect(calls[0].url).toBe(`${BASE_URL}/v1/shopping/flight-offers/pricing`);
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({
      data: { type: "flight-offers-pricing", flightOffers: [{ id: "1" }] },
    });
  });

  it("builds the cheapest-dates query", async () => {
    const { amadeus, calls } = client();

    await amadeus.findCheapestDates({ origin: "mad", destination: "muc", oneWay: true, duration: 3 });

    expect(calls[0].url.startsWith(`${BASE_URL}/v1/shopping/flight-dates?`)).toBe(true);
    expect(query(calls[0].url)).toEqual({
      origin: "MAD",
      oneWay: "true",
      duration: "3",
      currency: "GBP",
      destination: "MUC",
    });
  });

  it("formats the delay prediction time and duration", async () => {
    const { amadeus, calls } = client();

    await amadeus.predictDelay({
      origin: "nce",
      destination: "ist",
      departureDate: "2026-08-01",
      departureTime: "18:20",
      carrier: "tk",
      flightNumber: "1816",
      durationMinutes: 225,
    });

    expect(query(calls[0].url)).toEqual({
      originLocationCode: "NCE",
      destinationLocationCode: "IST",
      departureDate: "2026-08-01",
      departureTime: "18:20:00",
      carrierCode: "TK",
      flightNumber: "1816",
      duration: "PT225M",
    });
  });

  it("searches points of interest with a category list", async () => {
    const { amadeus, calls } = client();

    await amadeus.searchPointsOfInterest(41.3851, 2.1734, 1, ["SIGHTS", "RESTAURANT"]);

    expect(query(calls[0].url)).toEqual({
      latitude: "41.3851",
      longitude: "2.1734",
      radius: "1",
      categories: "SIGHTS,RESTAURANT",
    });
  });

  it("escapes activity ids in the path", async () => {
    const { amadeus, calls } = client({ data: { id: "a/b", name: "Tour" } });

    await amadeus.getActivity("a/b");

    expect(calls[0].url).toBe(`${BASE_URL}/v1/shopping/activities/a%2Fb`);
  });

  it("posts transfer searches with prefixed location fields", async () => {
    const { amadeus, calls } = client();

    await amadeus.searchTransfers({
      start: { locationCode: "cdg" },
      end: { addressLine: "5 Avenue Anatole France", cityName: "Paris", countryCode: "fr" },
      startDateTime: "2026-03-15T10:30:00",
      passengers: 2,
      transferType: "PRIVATE",
    });

    expect(calls[0].init?.method).toBe("POST");
    expect(JSON.parse(String(calls[0].init?.body))).toEqual({
      passengers: 2,
      startDateTime: "2026-03-15T10:30:00",
      startLocationCode: "CDG",
      endAddressLine: "5 Avenue Anatole France",
      endCityName: "Paris",
      endCountryCode: "FR",
      transferType: "PRIVATE",
    });
  });
});
