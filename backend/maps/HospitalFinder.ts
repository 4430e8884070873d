/*
Hospital Lookup Contract
- Stand-in for a real geospatial facility search.
- Pure: no I/O, no AI calls, no ranking.
- Location is accepted but not used for matching yet.
*/

import type { LatLng } from "../domain/Location";

export type LookupQuery = Readonly<{
  specialty: string;
  facilityType: string;
  location: LatLng;
}>;

type FacilityRule = Readonly<{
  specialty: string;
  // Omitted means any facility type.
  facilityType?: string;
  advisory: string;
}>;

// First match wins. Keys are lower-case.
const RULES: readonly FacilityRule[] = [
  {
    specialty: "pulmonology",
    facilityType: "government",
    advisory:
      "Found 2 hospitals near your mock location. **Govt. City Hospital** (4km, free care available) " +
      "and **Dr. R.K. Clinic** (6km, General Practitioner, low cost). " +
      "Please use Feature 1: Hospital Locator & Details for navigation and real-time availability.",
  },
  {
    specialty: "cardiology",
    advisory:
      "Found 1 specialist center: **Apollo Cardiac Unit** (8km, Private, High Price Range). " +
      "Use Feature 2: Appointment Booking to check available slots.",
  },
];

export const NO_FACILITY_ADVISORY =
  "No specialized facilities found matching your criteria nearby. Consider consulting a General Practitioner.";

function normalizeKey(s: string): string {
  return s.toLowerCase();
}

export function findNearestHospital(query: LookupQuery): string {
  const specialty = normalizeKey(query.specialty);
  const facilityType = normalizeKey(query.facilityType);

  const rule = RULES.find(
    (r) => r.specialty === specialty && (r.facilityType === undefined || r.facilityType === facilityType),
  );
  return rule ? rule.advisory : NO_FACILITY_ADVISORY;
}
