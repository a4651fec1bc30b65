import { useCallback, useRef, useState } from "react";
import { getVisibleListCount, hasMoreListPages } from "../airport-search";

type PaginationState<T> = {
  items: readonly T[];
  page: number;
};

const scheduleFrame = (callback: () => void) => {
  if (typeof requestAnimationFrame === "function") {
    requestAnimationFrame(() => callback());
    return;
  }

  setTimeout(callback, 0);
};

/**
 * Pages through `items`, starting over at the first page whenever a new
 * `items` array arrives.
 */
export const useListPagination = <T>(items: readonly T[]) => {
  const [paginationState, setPaginationState] = useState<PaginationState<T>>({
    items,
    page: 0
  });
  const isLoadingMoreReference = useRef(false);

  const page = paginationState.items === items ? paginationState.page : 0;
  const hasMore = hasMoreListPages(page, items.length);

  const loadMore = useCallback(() => {
    if (isLoadingMoreReference.current || !hasMoreListPages(page, items.length)) {
      return;
    }

    isLoadingMoreReference.current = true;
    scheduleFrame(() => {
      setPaginationState((currentState) => ({
        items,
        page: (currentState.items === items ? currentState.page : 0) + 1
      }));
      isLoadingMoreReference.current = false;
    });
  }, [items, page]);

  return {
    page,
    hasMore,
    visibleItems: items.slice(0, getVisibleListCount(page, items.length)),
    loadMore
  };
};
