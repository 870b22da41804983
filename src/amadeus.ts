// amadeus.ts

import { DEFAULT_CURRENCY, MAX_FLIGHT_OFFERS, READ_TIMEOUT_MS, SEARCH_TIMEOUT_MS } from "./config.ts";
import type { QueryParams, RequestDispatcher } from "./dispatcher.ts";

export interface AmadeusSegment {
  departure: { iataCode: string; at: string; terminal?: string };
  arrival: { iataCode: string; at: string; terminal?: string };
  carrierCode: string;
  number: string;
  aircraft?: { code: string };
}

export interface AmadeusItinerary {
  duration: string; // ISO duration, e.g. PT10H25M
  segments: AmadeusSegment[];
}

export interface AmadeusPrice {
  currency: string;
  total: string;
  base?: string;
  grandTotal?: string;
  fees?: { amount: string; type: string }[];
}

export interface AmadeusOffer {
  id: string;
  price: AmadeusPrice;
  itineraries: AmadeusItinerary[];
  validatingAirlineCodes?: string[];
  lastTicketingDate?: string;
  travelerPricings?: { fareDetailsBySegment?: { cabin?: string }[] }[];
}

export interface Dictionaries {
  carriers?: Record<string, string>;
  aircraft?: Record<string, string>;
  locations?: Record<string, { cityCode?: string; countryCode?: string }>;
}

/** The { data, dictionaries } envelope every search endpoint returns. */
export interface AmadeusEnvelope<T> {
  data: T;
  dictionaries?: Dictionaries;
  meta?: { count?: number };
}

export type FlightOffersResponse = AmadeusEnvelope<AmadeusOffer[]>;

export type FlightPricingResponse = AmadeusEnvelope<{ type?: string; flightOffers: AmadeusOffer[] }>;

export interface FlightDateResult {
  type?: string;
  origin: string;
  destination: string;
  departureDate: string;
  returnDate?: string;
  price: { total: string };
}

export interface Location {
  type?: string;
  subType?: string;
  name?: string;
  iataCode?: string;
  address?: { cityName?: string; countryName?: string; countryCode?: string };
}

export interface RouteDestination {
  type?: string;
  subtype?: string;
  name?: string;
  iataCode: string;
}

export interface Airline {
  iataCode?: string;
  icaoCode?: string;
  businessName?: string;
  commonName?: string;
}

export interface CheckinLink {
  id: string;
  href: string;
  channel: string;
}

export interface DelayPrediction {
  id: string;
  result: string;
  probability: string;
  subType?: string;
}

export interface Activity {
  id: string;
  name: string;
  shortDescription?: string;
  rating?: string | number;
  price?: { amount?: string; currencyCode?: string };
  pictures?: string[];
  bookingLink?: string;
}

export interface PointOfInterest {
  id?: string;
  name: string;
  category?: string;
  rank?: number;
  tags?: string[];
}

export interface TransferOffer {
  id: string;
  transferType: string;
  start?: { dateTime?: string; locationCode?: string };
  end?: { dateTime?: string; locationCode?: string; address?: { line?: string; cityName?: string } };
  vehicle?: { description?: string; seats?: { count?: number }[] };
  serviceProvider?: { name?: string };
  quotation?: { monetaryAmount?: string; currencyCode?: string; isEstimated?: boolean };
  distance?: { value?: number; unit?: string };
}

export type TravelClass = "ECONOMY" | "PREMIUM_ECONOMY" | "BUSINESS" | "FIRST";

/** Passenger and filter options shared by offer searches and date comparisons. */
export interface FlightSearchOptions {
  adults?: number;
  children?: number;
  infants?: number;
  travelClass?: TravelClass;
  nonStop?: boolean;
  maxPrice?: number;
  currency?: string;
}

export interface FlightSearchQuery extends FlightSearchOptions {
  origin: string;
  destination: string;
  departureDate: string;
  returnDate?: string;
  max?: number;
}

export interface DateSearchQuery {
  origin: string;
  departureDate?: string; // date or "from,to" range
  oneWay?: boolean;
  duration?: number;
  nonStop?: boolean;
  maxPrice?: number;
  viewBy?: string;
  currency?: string;
}

export interface BoundingSquare {
  north: number;
  south: number;
  east: number;
  west: number;
}

export type PoiCategory = "SIGHTS" | "NIGHTLIFE" | "RESTAURANT" | "SHOPPING";

export type TransferType = "PRIVATE" | "SHARED" | "TAXI" | "HOURLY" | "AIRPORT_EXPRESS" | "AIRPORT_BUS";

export interface TransferPoint {
  locationCode?: string;
  addressLine?: string;
  cityName?: string;
  countryCode?: string;
  geoCode?: string; // "lat,lng"
}

export interface TransferQuery {
  start: TransferPoint;
  end: TransferPoint;
  startDateTime: string; // YYYY-MM-DDTHH:MM:SS
  passengers?: number;
  transferType?: TransferType;
  currency?: string;
}

function upper(code: string): string {
  return code.trim().toUpperCase();
}

function flag(value: boolean | undefined): string | undefined {
  return value ? "true" : undefined;
}

export class AmadeusClient {
  private readonly http: RequestDispatcher;

  constructor(http: RequestDispatcher) {
    this.http = http;
  }

  async searchFlightOffers(q: FlightSearchQuery): Promise<FlightOffersResponse> {
    const params: QueryParams = {
      originLocationCode: upper(q.origin),
      destinationLocationCode: upper(q.destination),
      departureDate: q.departureDate,
      returnDate: q.returnDate,
      adults: q.adults ?? 1,
      children: q.children ? q.children : undefined,
      infants: q.infants ? q.infants : undefined,
      travelClass: q.travelClass,
      nonStop: flag(q.nonStop),
      maxPrice: q.maxPrice ? Math.floor(q.maxPrice) : undefined,
      currencyCode: q.currency ?? DEFAULT_CURRENCY,
      max: Math.min(q.max ?? 20, MAX_FLIGHT_OFFERS),
    };
    return await this.http.get<FlightOffersResponse>("/v2/shopping/flight-offers", params, SEARCH_TIMEOUT_MS);
  }

  async confirmPrice(offers: unknown[]): Promise<FlightPricingResponse> {
    const body = { data: { type: "flight-offers-pricing", flightOffers: offers } };
    return await this.http.post<FlightPricingResponse>("/v1/shopping/flight-offers/pricing", body, SEARCH_TIMEOUT_MS);
  }

  async findCheapestDates(q: DateSearchQuery & { destination: string }): Promise<AmadeusEnvelope<FlightDateResult[]>> {
    return await this.http.get<AmadeusEnvelope<FlightDateResult[]>>(
      "/v1/shopping/flight-dates",
      { ...dateSearchParams(q), destination: upper(q.destination) },
      SEARCH_TIMEOUT_MS,
    );
  }

  async findDestinations(q: DateSearchQuery): Promise<AmadeusEnvelope<FlightDateResult[]>> {
    return await this.http.get<AmadeusEnvelope<FlightDateResult[]>>("/v1/shopping/flight-destinations", dateSearchParams(q), SEARCH_TIMEOUT_MS);
  }

  async searchLocations(keyword: string, subType = "AIRPORT,CITY"): Promise<AmadeusEnvelope<Location[]>> {
    return await this.http.get<AmadeusEnvelope<Location[]>>("/v1/reference-data/locations", { keyword, subType }, READ_TIMEOUT_MS);
  }

  async airportDestinations(airport: string, max = 100): Promise<AmadeusEnvelope<RouteDestination[]>> {
    return await this.http.get<AmadeusEnvelope<RouteDestination[]>>(
      "/v1/airport/direct-destinations",
      { departureAirportCode: upper(airport), max },
      READ_TIMEOUT_MS,
    );
  }

  async airlineDestinations(airline: string, max = 100): Promise<AmadeusEnvelope<RouteDestination[]>> {
    return await this.http.get<AmadeusEnvelope<RouteDestination[]>>("/v1/airline/destinations", { airlineCode: upper(airline), max }, READ_TIMEOUT_MS);
  }

  async lookupAirlines(codes: string): Promise<AmadeusEnvelope<Airline[]>> {
    return await this.http.get<AmadeusEnvelope<Airline[]>>("/v1/reference-data/airlines", { airlineCodes: upper(codes) }, READ_TIMEOUT_MS);
  }

  async checkinLinks(airline: string, language = "en"): Promise<AmadeusEnvelope<CheckinLink[]>> {
    return await this.http.get<AmadeusEnvelope<CheckinLink[]>>(
      "/v2/reference-data/urls/checkin-links",
      { airlineCode: upper(airline), language },
      READ_TIMEOUT_MS,
    );
  }

  async predictDelay(q: {
    origin: string;
    destination: string;
    departureDate: string;
    departureTime: string; // HH:MM
    carrier: string;
    flightNumber: string;
    aircraftCode?: string;
    durationMinutes?: number;
  }): Promise<AmadeusEnvelope<DelayPrediction[]>> {
    const params: QueryParams = {
      originLocationCode: upper(q.origin),
      destinationLocationCode: upper(q.destination),
      departureDate: q.departureDate,
      departureTime: q.departureTime.length === 5 ? `${q.departureTime}:00` : q.departureTime,
      carrierCode: upper(q.carrier),
      flightNumber: q.flightNumber,
      aircraftCode: q.aircraftCode,
      duration: q.durationMinutes ? `PT${q.durationMinutes}M` : undefined,
    };
    return await this.http.get<AmadeusEnvelope<DelayPrediction[]>>("/v1/travel/predictions/flight-delay", params, READ_TIMEOUT_MS);
  }

  async searchActivities(latitude: number, longitude: number, radiusKm = 5): Promise<AmadeusEnvelope<Activity[]>> {
    return await this.http.get<AmadeusEnvelope<Activity[]>>(
      "/v1/shopping/activities",
      { latitude, longitude, radius: radiusKm },
      SEARCH_TIMEOUT_MS,
    );
  }

  async searchActivitiesBySquare(square: BoundingSquare): Promise<AmadeusEnvelope<Activity[]>> {
    return await this.http.get<AmadeusEnvelope<Activity[]>>("/v1/shopping/activities/by-square", { ...square }, SEARCH_TIMEOUT_MS);
  }

  async getActivity(id: string): Promise<AmadeusEnvelope<Activity>> {
    return await this.http.get<AmadeusEnvelope<Activity>>(`/v1/shopping/activities/${encodeURIComponent(id)}`, undefined, SEARCH_TIMEOUT_MS);
  }

  async searchPointsOfInterest(
    latitude: number,
    longitude: number,
    radiusKm = 2,
    categories?: PoiCategory[],
  ): Promise<AmadeusEnvelope<PointOfInterest[]>> {
    return await this.http.get<AmadeusEnvelope<PointOfInterest[]>>(
      "/v1/reference-data/locations/pois",
      { latitude, longitude, radius: radiusKm, categories: categories?.length ? categories.join(",") : undefined },
      READ_TIMEOUT_MS,
    );
  }

  async searchPointsOfInterestBySquare(
    square: BoundingSquare,
    categories?: PoiCategory[],
  ): Promise<AmadeusEnvelope<PointOfInterest[]>> {
    return await this.http.get<AmadeusEnvelope<PointOfInterest[]>>(
      "/v1/reference-data/locations/pois/by-square",
      { ...square, categories: categories?.length ? categories.join(",") : undefined },
      READ_TIMEOUT_MS,
    );
  }

  async searchTransfers(q: TransferQuery): Promise<AmadeusEnvelope<TransferOffer[]>> {
    const body: Record<string, string | number> = {
      passengers: q.passengers ?? 1,
      startDateTime: q.startDateTime,
    };
    Object.assign(body, transferPoint("start", q.start), transferPoint("end", q.end));
    if (q.transferType) body.transferType = q.transferType;
    if (q.currency) body.currency = upper(q.currency);

    return await this.http.post<AmadeusEnvelope<TransferOffer[]>>("/v1/shopping/transfer-offers", body, SEARCH_TIMEOUT_MS);
  }
}

function dateSearchParams(q: DateSearchQuery): QueryParams {
  return {
    origin: upper(q.origin),
    departureDate: q.departureDate,
    oneWay: q.oneWay === undefined ? undefined : String(q.oneWay),
    duration: q.duration,
    nonStop: flag(q.nonStop),
    maxPrice: q.maxPrice,
    viewBy: q.viewBy?.toUpperCase(),
    currency: q.currency ?? DEFAULT_CURRENCY,
  };
}

function transferPoint(prefix: "start" | "end", p: TransferPoint): Record<string, string> {
  const out: Record<string, string> = {};
  if (p.locationCode) out[`${prefix}LocationCode`] = upper(p.locationCode);
  if (p.addressLine) out[`${prefix}AddressLine`] = p.addressLine;
  if (p.cityName) out[`${prefix}CityName`] = p.cityName;
  if (p.countryCode) out[`${prefix}CountryCode`] = upper(p.countryCode);
  if (p.geoCode) out[`${prefix}GeoCode`] = p.geoCode;
  return out;
}
