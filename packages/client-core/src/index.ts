/**
 * nodecanvas client-core exposes the canvas node model and the conversational search subsystem:
 * the inverted index, the debounced query controller, the Yjs canvas document with its index
 * binding, and the session object that owns them.
 */
export {
  createMessageId,
  createNodeId,
  deriveAssignedRoleUnitId
} from "./ids";
export type { MessageId, NodeId, TextUnitId } from "./ids";

export { createConsoleLogger, createNoopLogger } from "./logger";
export type { Logger } from "./logger";

export { DEFAULT_SEARCH_CONFIG, resolveSearchConfig, searchConfigFromEnv } from "./config";
export type { SearchConfig, UnmatchedPhrasePolicy } from "./config";

export type {
  CanvasDoc,
  CanvasNodeRecord,
  CanvasNodeSnapshot,
  CanvasNodeStore,
  CanvasNodeType,
  CanvasPoint,
  ConversationMessage,
  MessageRole
} from "./types";

export * from "./canvas/index";

export { createConversationSearchIndex } from "./search/index";
export type { ConversationSearchIndex, ConversationSearchIndexOptions } from "./search/index";
export { createConversationSearchController } from "./search/controller";
export type {
  ConversationSearchController,
  ConversationSearchControllerOptions,
  ConversationSearchState,
  SearchResultSelectionHandler,
  SearchSource
} from "./search/controller";
export { tokenize } from "./search/tokenize";
export { generateSnippet, stripMarkdown } from "./search/snippet";
export { compareSearchResults, rankSearchResults } from "./search/ranking";
export type { RankingOptions } from "./search/ranking";
export {
  ASSIGNED_ROLE_LABEL,
  ASSIGNED_ROLE_UNIT_INDEX,
  NOTE_UNIT_INDEX,
  TITLE_UNIT_INDEX
} from "./search/types";
export type {
  IndexedTextUnit,
  MatchRange,
  NodeSearchHighlight,
  NodeSearchMetadata,
  Posting,
  SearchIndexInspection,
  SearchIndexStats,
  SearchResult,
  TextUnitKey,
  TextUnitKind
} from "./search/types";

export { createSearchSession } from "./session";
export type { SearchSession, SearchSessionOptions } from "./session";
