import { describe, it, expect } from "vitest";
import {
  itineraryRequestSchema,
  locationQuerySchema,
  quickItineraryQuerySchema,
  searchParamsToObject,
  toItineraryRequest,
} from "./itinerary-request";

describe("itineraryRequestSchema", () => {
  it("should map a snake_case body onto an ItineraryRequest", () => {
    const parsed = itineraryRequestSchema.parse({
      city: " Cairo ",
      country: "Egypt",
      theme: "foodies",
      plan_size: 4,
      start_time: "10:30",
      end_time: "20:00",
      language: "AR",
    });

    expect(toItineraryRequest(parsed)).toEqual({
      city: "Cairo",
      country: "Egypt",
      theme: "foodies",
      planSize: 4,
      startTime: "10:30",
      endTime: "20:00",
      language: "ar",
    });
  });

  it("should fill defaults", () => {
    const parsed = itineraryRequestSchema.parse({ city: "Cairo", country: "Egypt", theme: "couples" });

    expect(parsed).toMatchObject({ plan_size: 6, start_time: "09:00", end_time: "22:00", language: "en" });
  });

  it("should reject fractional plan sizes", () => {
    const result = itineraryRequestSchema.safeParse({ city: "Cairo", country: "Egypt", theme: "family", plan_size: 2.5 });
    expect(result.success).toBe(false);
  });

  it("should accept region codes up to five characters and reject longer ones", () => {
    const base = { city: "Cairo", country: "Egypt", theme: "family" };

    expect(itineraryRequestSchema.parse({ ...base, language: "pt-BR" }).language).toBe("pt-br");
    expect(itineraryRequestSchema.safeParse({ ...base, language: "en-latn" }).success).toBe(false);
    expect(itineraryRequestSchema.safeParse({ ...base, language: "e" }).success).toBe(false);
  });

  it("should reject blank cities", () => {
    const result = itineraryRequestSchema.safeParse({ city: "   ", country: "Egypt", theme: "family" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("city is required");
    }
  });
});

describe("quickItineraryQuerySchema", () => {
  it("should default the theme to cultural and coerce numbers", () => {
    const parsed = quickItineraryQuerySchema.parse({ city: "Cairo", country: "Egypt", plan_size: "3" });

    expect(parsed.theme).toBe("cultural");
    expect(parsed.plan_size).toBe(3);
  });
});

describe("locationQuerySchema", () => {
  it("should accept an empty query", () => {
    expect(locationQuerySchema.parse({})).toEqual({});
  });
});

describe("searchParamsToObject", () => {
  it("should drop blank values", () => {
    const params = new URLSearchParams("city=Cairo&country=&theme=family");
    expect(searchParamsToObject(params)).toEqual({ city: "Cairo", theme: "family" });
  });
});
