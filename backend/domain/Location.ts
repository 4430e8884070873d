export type LatLng = Readonly<{ latitude: number; longitude: number }>;

// Stand-in coordinate used until the client supplies a real location.
export const MOCK_USER_LOCATION: LatLng = Object.freeze({ latitude: 40.7128, longitude: -74.006 });

export type LocationFallbackPolicy = "mock" | "reject";
