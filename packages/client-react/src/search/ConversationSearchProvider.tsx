import type { PropsWithChildren } from "react";
import { createContext, useContext, useEffect, useRef, useSyncExternalStore } from "react";

import type {
  ConversationSearchController,
  ConversationSearchState,
  NodeSearchHighlight,
  SearchResult,
  SearchResultSelectionHandler
} from "@nodecanvas/client-core";

/**
 * React bindings for the conversational search controller. Components read controller state via
 * `useSyncExternalStore`; the controller itself stays framework-agnostic and is owned by the
 * host's search session.
 */

export interface ConversationSearchProviderProps extends PropsWithChildren {
  readonly controller: ConversationSearchController;
}

const ConversationSearchContext = createContext<ConversationSearchController | null>(null);

export const ConversationSearchProvider = ({ controller, children }: ConversationSearchProviderProps) => {
  return <ConversationSearchContext.Provider value={controller}>{children}</ConversationSearchContext.Provider>;
};

export const useConversationSearchController = (): ConversationSearchController => {
  const controller = useContext(ConversationSearchContext);
  if (!controller) {
    throw new Error("useConversationSearchController must be used within ConversationSearchProvider");
  }
  return controller;
};

export const useConversationSearchState = (): ConversationSearchState => {
  const controller = useConversationSearchController();
  return useSyncExternalStore(controller.subscribe, controller.getState, controller.getState);
};

export const useConversationSearchResults = (): readonly SearchResult[] => {
  return useConversationSearchState().results;
};

/**
 * Registers a selection handler for the lifetime of the calling component. The latest handler is
 * always invoked, so callers may pass inline closures.
 */
export const useSearchResultSelection = (handler: SearchResultSelectionHandler): void => {
  const controller = useConversationSearchController();
  const handlerRef = useRef(handler);
  handlerRef.current = handler;

  useEffect(() => {
    return controller.onSelectResult((result: SearchResult, highlight: NodeSearchHighlight) => {
      handlerRef.current(result, highlight);
    });
  }, [controller]);
};
