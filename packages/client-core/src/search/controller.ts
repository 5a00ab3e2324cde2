/**
 * Debounced front end for conversational search. The controller owns the live query string and
 * the derived result state, schedules searches after typing pauses and forwards result selection
 * to the host; it never navigates anywhere itself. UI adapters observe it through
 * `subscribe`/`getState`.
 *
 * Every run takes a sequence number. A source may answer asynchronously (for example an index
 * living in a worker), so answers from anything but the latest run are discarded.
 */
import { DEFAULT_SEARCH_CONFIG } from "../config";
import { createNoopLogger, type Logger } from "../logger";
import type { CanvasPoint } from "../types";
import type { NodeSearchHighlight, SearchResult } from "./types";

interface TimerHandle {
  cancel(): void;
}

export interface SearchSource {
  search(
    query: string,
    viewportCenter?: CanvasPoint | null
  ): readonly SearchResult[] | Promise<readonly SearchResult[]>;
}

export interface ConversationSearchState {
  readonly query: string;
  readonly results: readonly SearchResult[];
  readonly isSearching: boolean;
  readonly hasSearched: boolean;
}

export type SearchResultSelectionHandler = (result: SearchResult, highlight: NodeSearchHighlight) => void;

export interface ConversationSearchControllerOptions {
  readonly source: SearchSource;
  readonly debounceMs?: number;
  readonly scheduleTimeout?: (callback: () => void, delayMs: number) => TimerHandle;
  readonly logger?: Logger;
  readonly now?: () => number;
}

export interface ConversationSearchController {
  getState(): ConversationSearchState;
  subscribe(listener: () => void): () => void;
  setQuery(value: string): void;
  getViewportCenter(): CanvasPoint | null;
  updateViewportCenter(center: CanvasPoint | null): void;
  clearSearch(): void;
  /** Cancels any pending debounce and searches the current query now. */
  searchImmediately(): void;
  onSelectResult(handler: SearchResultSelectionHandler): () => void;
  selectResult(result: SearchResult): void;
  dispose(): void;
}

const INITIAL_STATE: ConversationSearchState = {
  query: "",
  results: [],
  isSearching: false,
  hasSearched: false
};

const startTimer = (fn: () => void, delayMs: number): TimerHandle => {
  const id = setTimeout(fn, delayMs);
  return {
    cancel() {
      clearTimeout(id);
    }
  } satisfies TimerHandle;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const createConversationSearchController = (
  options: ConversationSearchControllerOptions
): ConversationSearchController => {
  const source = options.source;
  const debounceMs = options.debounceMs ?? DEFAULT_SEARCH_CONFIG.debounceMs;
  const scheduleTimeout = options.scheduleTimeout ?? startTimer;
  const logger = (options.logger ?? createNoopLogger()).child("controller");
  const now = options.now ?? (() => Date.now());

  let state: ConversationSearchState = INITIAL_STATE;
  let viewportCenter: CanvasPoint | null = null;
  let pendingTimer: TimerHandle | null = null;
  let latestSequence = 0;
  let disposed = false;

  const listeners = new Set<() => void>();
  const selectionHandlers = new Set<SearchResultSelectionHandler>();

  const notify = () => {
    for (const listener of listeners) {
      listener();
    }
  };

  const setState = (patch: Partial<ConversationSearchState>) => {
    state = { ...state, ...patch };
    notify();
  };

  const cancelPendingTimer = () => {
    pendingTimer?.cancel();
    pendingTimer = null;
  };

  const applyResults = (sequence: number, results: readonly SearchResult[]) => {
    if (disposed || sequence !== latestSequence) {
      return;
    }
    setState({ results, isSearching: false, hasSearched: true });
  };

  const handleFailure = (sequence: number, query: string, error: unknown) => {
    if (disposed || sequence !== latestSequence) {
      return;
    }
    logger.error("conversation search failed", { query, error: describeError(error) });
    setState({ isSearching: false });
  };

  const runSearch = (rawQuery: string) => {
    latestSequence += 1;
    const sequence = latestSequence;
    const query = rawQuery.trim();

    if (query.length === 0) {
      setState({ results: [], isSearching: false, hasSearched: false });
      return;
    }

    setState({ isSearching: true });

    let outcome: readonly SearchResult[] | Promise<readonly SearchResult[]>;
    try {
      outcome = source.search(query, viewportCenter);
    } catch (error) {
      handleFailure(sequence, query, error);
      return;
    }

    if (outcome instanceof Promise) {
      void outcome
        .then((results) => applyResults(sequence, results))
        .catch((error: unknown) => handleFailure(sequence, query, error));
      return;
    }
    applyResults(sequence, outcome);
  };

  const setQuery = (value: string) => {
    if (disposed || value === state.query) {
      return;
    }
    setState({ query: value });
    cancelPendingTimer();
    pendingTimer = scheduleTimeout(() => {
      pendingTimer = null;
      runSearch(state.query);
    }, debounceMs);
  };

  const clearSearch = () => {
    cancelPendingTimer();
    latestSequence += 1;
    state = INITIAL_STATE;
    notify();
  };

  const searchImmediately = () => {
    if (disposed) {
      return;
    }
    cancelPendingTimer();
    runSearch(state.query);
  };

  const selectResult = (result: SearchResult) => {
    const highlight: NodeSearchHighlight = {
      nodeId: result.nodeId,
      textUnitId: result.textUnitId,
      query: state.query.trim(),
      timestamp: now()
    };
    for (const handler of selectionHandlers) {
      handler(result, highlight);
    }
  };

  return {
    getState: () => state,
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    setQuery,
    getViewportCenter: () => viewportCenter,
    updateViewportCenter(center) {
      viewportCenter = center;
    },
    clearSearch,
    searchImmediately,
    onSelectResult(handler) {
      selectionHandlers.add(handler);
      return () => {
        selectionHandlers.delete(handler);
      };
    },
    selectResult,
    dispose() {
      disposed = true;
      cancelPendingTimer();
      latestSequence += 1;
      listeners.clear();
      selectionHandlers.clear();
    }
  };
};
