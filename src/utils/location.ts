import type { PhotoLocation } from '../types';

const EARTH_RADIUS_METERS = 6371e3;
const GOOGLE_MAPS_URL = 'https://www.google.com/maps';

export function isValidCoordinate(latitude: unknown, longitude: unknown): boolean {
  return (
    typeof latitude === 'number' &&
    typeof longitude === 'number' &&
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    Math.abs(latitude) <= 90 &&
    Math.abs(longitude) <= 180
  );
}

export function haversineDistanceMeters(
  latitudeA: number,
  longitudeA: number,
  latitudeB: number,
  longitudeB: number
): number {
  const toRad = (value: number) => (value * Math.PI) / 180;
  const dLat = toRad(latitudeB - latitudeA);
  const dLon = toRad(longitudeB - longitudeA);
  const latARad = toRad(latitudeA);
  const latBRad = toRad(latitudeB);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.sin(dLon / 2) * Math.sin(dLon / 2) * Math.cos(latARad) * Math.cos(latBRad);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_METERS * c;
}

export function distanceBetween(location: PhotoLocation, target: { latitude: number; longitude: number }): number {
  return haversineDistanceMeters(location.latitude, location.longitude, target.latitude, target.longitude);
}

/** Link that opens the coordinates in Google Maps. */
export function externalMapUrl(latitude: number, longitude: number): string {
  return `${GOOGLE_MAPS_URL}?q=${latitude},${longitude}`;
}

export function formatCoordinates(latitude: number, longitude: number, digits = 6): string {
  return `${latitude.toFixed(digits)}, ${longitude.toFixed(digits)}`;
}
