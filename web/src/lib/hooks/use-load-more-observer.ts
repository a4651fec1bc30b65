import { useEffect, useRef, type RefObject } from "react";

const LOAD_MORE_VISIBILITY_THRESHOLD = 0.5;

export const useLoadMoreObserver = ({
  targetReference,
  isEnabled,
  onVisible
}: {
  targetReference: RefObject<HTMLElement>;
  isEnabled: boolean;
  onVisible: () => void;
}) => {
  const onVisibleReference = useRef(onVisible);
  onVisibleReference.current = onVisible;

  useEffect(() => {
    const target = targetReference.current;
    if (!target || !isEnabled || typeof IntersectionObserver === "undefined") {
      return;
    }

    const observer = new IntersectionObserver(
      (entries) => {
        if (entries.some((entry) => entry.isIntersecting)) {
          onVisibleReference.current();
        }
      },
      {
        root: null,
        rootMargin: "0px",
        threshold: LOAD_MORE_VISIBILITY_THRESHOLD
      }
    );

    observer.observe(target);

    return () => {
      observer.disconnect();
    };
  }, [isEnabled, targetReference]);
};
