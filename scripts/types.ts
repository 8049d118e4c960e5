// Shared types for script files

export type FacilityRecord = {
  name: string;
  address: string;
  city: string;
  state: string;
  zip: string;

  // Average daily population; null = not reported (distinct from 0)
  male_criminal: number | null;
  male_non_criminal: number | null;
  female_criminal: number | null;
  female_non_criminal: number | null;

  threat_level_1: number | null;
  threat_level_2: number | null;
  threat_level_3: number | null;
  no_threat_level: number | null;

  // Absent until geocoded; null = lookup failed or skipped
  latitude?: number | null;
  longitude?: number | null;
};

export type FacilityMetadata = {
  source_file: string;
  source_date: string | null;
  extraction_date: string | null;
  last_checked_date: string;
  total_facilities: number;
  geocoded_at?: string;
};

export type FacilityDataFile = {
  metadata: FacilityMetadata;
  facilities: FacilityRecord[];
};

export type Coordinates = {
  lat: number;
  lon: number;
};

export type GeocodeSource = "api" | "manual";

export type GeocodeCacheEntry = {
  latitude: number | null;
  longitude: number | null;
  source: GeocodeSource;
};

/** Address key -> entry. Persisted wholesale as one JSON object. */
export type GeocodeCache = Record<string, GeocodeCacheEntry>;
