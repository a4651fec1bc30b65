const EARTH_RADIUS_MILES = 3958.8;

export const METERS_PER_MILE = 1609.34;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

export const haversineDistanceMiles = (
  latitude1: number,
  longitude1: number,
  latitude2: number,
  longitude2: number
): number => {
  const deltaLatitude = toRadians(latitude2 - latitude1);
  const deltaLongitude = toRadians(longitude2 - longitude1);
  const intermediateResult =
    Math.sin(deltaLatitude / 2) ** 2 +
    Math.cos(toRadians(latitude1)) *
      Math.cos(toRadians(latitude2)) *
      Math.sin(deltaLongitude / 2) ** 2;

  const centralAngle =
    2 * Math.atan2(Math.sqrt(intermediateResult), Math.sqrt(1 - intermediateResult));
  return EARTH_RADIUS_MILES * centralAngle;
};

export const milesToMeters = (miles: number): number => miles * METERS_PER_MILE;
