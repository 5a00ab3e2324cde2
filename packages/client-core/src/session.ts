/**
 * Top-level owner of the search subsystem for one open canvas. Hosts construct a session and pass
 * its index and controller to whatever needs them; nothing here is global.
 */
import { bindSearchIndexToCanvas } from "./canvas/searchBinding";
import { resolveSearchConfig, type SearchConfig } from "./config";
import { createNoopLogger, type Logger } from "./logger";
import {
  createConversationSearchController,
  type ConversationSearchController,
  type ConversationSearchControllerOptions
} from "./search/controller";
import { createConversationSearchIndex, type ConversationSearchIndex } from "./search/index";
import type { CanvasDoc } from "./types";

export interface SearchSessionOptions {
  /** When given, the index follows this document for the session's lifetime. */
  readonly canvas?: CanvasDoc;
  readonly config?: Partial<SearchConfig>;
  readonly logger?: Logger;
  readonly scheduleTimeout?: ConversationSearchControllerOptions["scheduleTimeout"];
  readonly now?: () => number;
}

export interface SearchSession {
  readonly config: SearchConfig;
  readonly index: ConversationSearchIndex;
  readonly controller: ConversationSearchController;
  dispose(): void;
}

export const createSearchSession = (options: SearchSessionOptions = {}): SearchSession => {
  const config = resolveSearchConfig(options.config);
  const logger = options.logger ?? createNoopLogger();

  const index = createConversationSearchIndex({ config, logger, now: options.now });
  const controller = createConversationSearchController({
    source: index,
    debounceMs: config.debounceMs,
    scheduleTimeout: options.scheduleTimeout,
    logger,
    now: options.now
  });
  const unbindCanvas = options.canvas ? bindSearchIndexToCanvas(options.canvas, index) : null;

  return {
    config,
    index,
    controller,
    dispose() {
      unbindCanvas?.();
      controller.dispose();
    }
  };
};
