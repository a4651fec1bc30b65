import { useEffect, useRef } from "react";
import type { GeoPoint } from "../api";

/** Asks for the browser position once; a refusal leaves the default center. */
export const useUserLocation = (onLocated: (location: GeoPoint) => void) => {
  const onLocatedReference = useRef(onLocated);
  onLocatedReference.current = onLocated;

  useEffect(() => {
    if (typeof navigator === "undefined" || !("geolocation" in navigator)) {
      return;
    }

    navigator.geolocation.getCurrentPosition(
      (position) => {
        onLocatedReference.current({
          latitude: position.coords.latitude,
          longitude: position.coords.longitude
        });
      },
      () => undefined
    );
  }, []);
};
