// Fakes shared by the test files
import type { Geocoder } from "./geocoders";
import type { Clock } from "./rate_limiter";
import type { Coordinates, FacilityRecord } from "./types";

/** Clock whose sleep advances time instantly. */
export class FakeClock implements Clock {
  t = 0;
  sleeps: number[] = [];

  now(): number {
    return this.t;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.t += ms;
  }
}

export type Answer = Coordinates | null | Error;

/**
 * Geocoder answering from a table keyed by query. Unknown queries return null.
 * An array of answers is consumed one per call (the last one repeats).
 */
export class StubGeocoder implements Geocoder {
  readonly name = "stub";
  readonly queries: string[] = [];
  readonly callTimes: number[] = [];

  constructor(
    private readonly answers: Record<string, Answer | Answer[]> = {},
    private readonly clock?: Clock,
  ) {}

  async lookup(query: string): Promise<Coordinates | null> {
    const seen = this.queries.filter((q) => q === query).length;
    this.queries.push(query);
    if (this.clock) this.callTimes.push(this.clock.now());

    const configured = Object.hasOwn(this.answers, query) ? this.answers[query] : null;
    const answer = Array.isArray(configured)
      ? configured[Math.min(seen, configured.length - 1)]
      : configured;
    if (answer instanceof Error) throw answer;
    return answer ?? null;
  }
}

export function facility(overrides: Partial<FacilityRecord> = {}): FacilityRecord {
  return {
    name: "Test Processing Center",
    address: "1 Main St",
    city: "A",
    state: "TX",
    zip: "00001",
    male_criminal: 10,
    male_non_criminal: 20,
    female_criminal: 1,
    female_non_criminal: 2,
    threat_level_1: null,
    threat_level_2: null,
    threat_level_3: null,
    no_threat_level: null,
    ...overrides,
  };
}
