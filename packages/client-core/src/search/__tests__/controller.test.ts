import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { Logger } from "../../logger";
import {
  createConversationSearchController,
  type ConversationSearchState,
  type SearchSource
} from "../controller";
import type { SearchResult } from "../types";

const makeResult = (nodeId: string, textUnitId: string): SearchResult => ({
  nodeId,
  nodeTitle: "Budget Plan",
  nodeColorTag: "none",
  textUnitId,
  matchedRole: "user",
  snippet: "What is our Q3 budget?",
  fullUnitText: "What is our Q3 budget?",
  matchRange: { start: 15, end: 21 },
  timestamp: 1,
  nodePosition: { x: 0, y: 0 },
  matchKind: "conversation"
});

const createSearchSpy = () =>
  vi.fn<Parameters<SearchSource["search"]>, ReturnType<SearchSource["search"]>>();

const createLoggerSpy = () => {
  const logger = {
    info: vi.fn<Parameters<Logger["info"]>, void>(),
    warn: vi.fn<Parameters<Logger["warn"]>, void>(),
    error: vi.fn<Parameters<Logger["error"]>, void>(),
    child: vi.fn<Parameters<Logger["child"]>, Logger>()
  };
  logger.child.mockReturnValue(logger);
  return logger;
};

interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

const flushPromises = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

const EMPTY_STATE: ConversationSearchState = {
  query: "",
  results: [],
  isSearching: false,
  hasSearched: false
};

describe("createConversationSearchController", () => {
  describe("debouncing", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("searches once the debounce interval elapses", () => {
      const result = makeResult("N1", "m1");
      const search = createSearchSpy().mockReturnValue([result]);
      const controller = createConversationSearchController({ source: { search } });

      controller.setQuery("bud");
      vi.advanceTimersByTime(199);

      expect(search).not.toHaveBeenCalled();
      expect(controller.getState()).toEqual({ ...EMPTY_STATE, query: "bud" });

      vi.advanceTimersByTime(1);

      expect(search).toHaveBeenCalledWith("bud", null);
      expect(controller.getState()).toEqual({
        query: "bud",
        results: [result],
        isSearching: false,
        hasSearched: true
      });
    });

    it("re-arms the timer on every keystroke", () => {
      const search = createSearchSpy().mockReturnValue([]);
      const controller = createConversationSearchController({ source: { search } });

      controller.setQuery("b");
      vi.advanceTimersByTime(150);
      controller.setQuery("bu");
      vi.advanceTimersByTime(150);

      expect(search).not.toHaveBeenCalled();

      vi.advanceTimersByTime(50);

      expect(search).toHaveBeenCalledTimes(1);
      expect(search).toHaveBeenCalledWith("bu", null);
    });

    it("honours a custom debounce interval", () => {
      const search = createSearchSpy().mockReturnValue([]);
      const controller = createConversationSearchController({ source: { search }, debounceMs: 50 });

      controller.setQuery("bud");
      vi.advanceTimersByTime(50);

      expect(search).toHaveBeenCalledTimes(1);
    });

    it("ignores a query identical to the current one", () => {
      const search = createSearchSpy().mockReturnValue([]);
      const controller = createConversationSearchController({ source: { search } });
      const listener = vi.fn();
      controller.subscribe(listener);

      controller.setQuery("bud");
      vi.advanceTimersByTime(200);
      listener.mockClear();
      controller.setQuery("bud");
      vi.advanceTimersByTime(200);

      expect(listener).not.toHaveBeenCalled();
      expect(search).toHaveBeenCalledTimes(1);
    });

    it("clears results for a blank query without calling the source", () => {
      const search = createSearchSpy().mockReturnValue([makeResult("N1", "m1")]);
      const controller = createConversationSearchController({ source: { search } });

      controller.setQuery("bud");
      vi.advanceTimersByTime(200);
      controller.setQuery("   ");
      vi.advanceTimersByTime(200);

      expect(search).toHaveBeenCalledTimes(1);
      expect(controller.getState()).toEqual({ ...EMPTY_STATE, query: "   " });
    });

    it("searches immediately and cancels the pending timer", () => {
      const search = createSearchSpy().mockReturnValue([]);
      const controller = createConversationSearchController({ source: { search } });

      controller.setQuery("bud");
      controller.searchImmediately();
      vi.advanceTimersByTime(500);

      expect(search).toHaveBeenCalledTimes(1);
    });

    it("passes the trimmed query and the viewport centre to the source", () => {
      const search = createSearchSpy().mockReturnValue([]);
      const controller = createConversationSearchController({ source: { search } });

      controller.updateViewportCenter({ x: 10, y: 20 });
      controller.setQuery("  bud ");
      vi.advanceTimersByTime(200);

      expect(controller.getViewportCenter()).toEqual({ x: 10, y: 20 });
      expect(search).toHaveBeenCalledWith("bud", { x: 10, y: 20 });
    });

    it("uses an injected scheduler", () => {
      const search = createSearchSpy().mockReturnValue([]);
      const scheduled: Array<{ callback: () => void; delayMs: number; cancelled: boolean }> = [];
      const controller = createConversationSearchController({
        source: { search },
        debounceMs: 75,
        scheduleTimeout: (callback, delayMs) => {
          const entry = { callback, delayMs, cancelled: false };
          scheduled.push(entry);
          return {
            cancel() {
              entry.cancelled = true;
            }
          };
        }
      });

      controller.setQuery("a");
      controller.setQuery("ab");

      expect(scheduled.map((entry) => [entry.delayMs, entry.cancelled])).toEqual([
        [75, true],
        [75, false]
      ]);

      scheduled[1].callback();

      expect(search).toHaveBeenCalledWith("ab", null);
    });

    it("resets everything on clearSearch", () => {
      const search = createSearchSpy().mockReturnValue([makeResult("N1", "m1")]);
      const controller = createConversationSearchController({ source: { search } });

      controller.setQuery("bud");
      vi.advanceTimersByTime(200);
      controller.setQuery("budget");
      controller.clearSearch();
      vi.advanceTimersByTime(200);

      expect(search).toHaveBeenCalledTimes(1);
      expect(controller.getState()).toEqual(EMPTY_STATE);
    });

    it("stops reacting after dispose", () => {
      const search = createSearchSpy().mockReturnValue([]);
      const controller = createConversationSearchController({ source: { search } });
      const listener = vi.fn();
      controller.subscribe(listener);

      controller.setQuery("bud");
      controller.dispose();
      vi.advanceTimersByTime(200);
      controller.setQuery("other");

      expect(search).not.toHaveBeenCalled();
      expect(listener).toHaveBeenCalledTimes(1);
      expect(controller.getState().query).toBe("bud");
    });
  });

  describe("asynchronous sources", () => {
    it("reports isSearching until the source answers", async () => {
      const deferred = createDeferred<readonly SearchResult[]>();
      const search = createSearchSpy().mockReturnValue(deferred.promise);
      const controller = createConversationSearchController({ source: { search } });

      controller.setQuery("bud");
      controller.searchImmediately();

      expect(controller.getState().isSearching).toBe(true);

      const result = makeResult("N1", "m1");
      deferred.resolve([result]);
      await flushPromises();

      expect(controller.getState()).toEqual({
        query: "bud",
        results: [result],
        isSearching: false,
        hasSearched: true
      });
    });

    it("discards answers from superseded runs", async () => {
      const first = createDeferred<readonly SearchResult[]>();
      const second = createDeferred<readonly SearchResult[]>();
      const search = createSearchSpy().mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);
      const controller = createConversationSearchController({ source: { search } });
      const latest = makeResult("N2", "m2");

      controller.setQuery("bu");
      controller.searchImmediately();
      controller.setQuery("bud");
      controller.searchImmediately();

      second.resolve([latest]);
      await flushPromises();
      first.resolve([makeResult("N1", "m1")]);
      await flushPromises();

      expect(controller.getState().results).toEqual([latest]);
    });

    it("discards answers that arrive after clearSearch", async () => {
      const deferred = createDeferred<readonly SearchResult[]>();
      const search = createSearchSpy().mockReturnValue(deferred.promise);
      const controller = createConversationSearchController({ source: { search } });

      controller.setQuery("bud");
      controller.searchImmediately();
      controller.clearSearch();
      deferred.resolve([makeResult("N1", "m1")]);
      await flushPromises();

      expect(controller.getState()).toEqual(EMPTY_STATE);
    });

    it("logs a rejected search and leaves isSearching false", async () => {
      const logger = createLoggerSpy();
      const search = createSearchSpy().mockReturnValue(Promise.reject(new Error("worker crashed")));
      const controller = createConversationSearchController({ source: { search }, logger });

      controller.setQuery("bud");
      controller.searchImmediately();
      await flushPromises();

      expect(logger.child).toHaveBeenCalledWith("controller");
      expect(logger.error).toHaveBeenCalledWith("conversation search failed", {
        query: "bud",
        error: "worker crashed"
      });
      expect(controller.getState().isSearching).toBe(false);
    });
  });

  describe("failures and selection", () => {
    it("keeps previous results when the source throws", () => {
      const logger = createLoggerSpy();
      const result = makeResult("N1", "m1");
      const search = createSearchSpy()
        .mockReturnValueOnce([result])
        .mockImplementationOnce(() => {
          throw new Error("index unavailable");
        });
      const controller = createConversationSearchController({ source: { search }, logger });

      controller.setQuery("bud");
      controller.searchImmediately();
      controller.setQuery("broken");
      controller.searchImmediately();

      expect(logger.error).toHaveBeenCalledWith("conversation search failed", {
        query: "broken",
        error: "index unavailable"
      });
      expect(controller.getState()).toEqual({
        query: "broken",
        results: [result],
        isSearching: false,
        hasSearched: true
      });
    });

    it("forwards selected results with a highlight", () => {
      const search = createSearchSpy().mockReturnValue([]);
      const controller = createConversationSearchController({ source: { search }, now: () => 42 });
      const handler = vi.fn();
      const unsubscribe = controller.onSelectResult(handler);
      const result = makeResult("N1", "m1");

      controller.setQuery("  Budget ");
      controller.selectResult(result);

      expect(handler).toHaveBeenCalledWith(result, {
        nodeId: "N1",
        textUnitId: "m1",
        query: "Budget",
        timestamp: 42
      });

      unsubscribe();
      controller.selectResult(result);

      expect(handler).toHaveBeenCalledTimes(1);
      controller.dispose();
    });

    it("notifies subscribers until they unsubscribe", () => {
      const search = createSearchSpy().mockReturnValue([]);
      const controller = createConversationSearchController({ source: { search } });
      const listener = vi.fn();
      const unsubscribe = controller.subscribe(listener);

      controller.setQuery("a");
      unsubscribe();
      controller.setQuery("ab");

      expect(listener).toHaveBeenCalledTimes(1);
      controller.dispose();
    });
  });
});
