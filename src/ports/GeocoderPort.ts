export interface GeoLocation {
  lat: number;
  lon: number;
  /** Human-readable place name returned by the lookup service */
  displayName?: string;
}

export interface GeocoderPort {
  /**
   * Resolve a postal code to coordinates.
   * Rejects with NotFoundError when there is no match, TransportError when the call fails.
   */
  geocode(postalCode: string): Promise<GeoLocation>;
}
