/**
 * In-memory inverted index over canvas node content. Every node contributes text units (its
 * title, note body, assigned-role label and one unit per conversation message); each unit is
 * tokenised into postings so queries resolve through prefix lookups instead of scanning text.
 *
 * Reindexing a node is always remove-then-insert. Removal walks a unit-to-tokens reverse index so
 * it only touches the buckets a node actually contributed to. All calls run to completion on the
 * caller's thread, so queries never observe a half-indexed node.
 */
import { resolveSearchConfig, type SearchConfig } from "../config";
import { deriveAssignedRoleUnitId, type NodeId, type TextUnitId } from "../ids";
import { createNoopLogger, type Logger } from "../logger";
import type { CanvasNodeSnapshot, CanvasPoint, MessageRole } from "../types";
import { rankSearchResults } from "./ranking";
import { generateSnippet } from "./snippet";
import { tokenize } from "./tokenize";
import {
  ASSIGNED_ROLE_LABEL,
  ASSIGNED_ROLE_UNIT_INDEX,
  NOTE_UNIT_INDEX,
  TITLE_UNIT_INDEX,
  type IndexedTextUnit,
  type MatchRange,
  type NodeSearchMetadata,
  type Posting,
  type SearchIndexInspection,
  type SearchIndexStats,
  type SearchResult,
  type TextUnitKey,
  type TextUnitKind
} from "./types";

export interface ConversationSearchIndex {
  /** Clears every table, then indexes the nodes in order. */
  rebuild(nodes: Iterable<CanvasNodeSnapshot>): void;
  indexNode(node: CanvasNodeSnapshot): void;
  removeNode(nodeId: NodeId): void;
  /** Refreshes title, colour, position and role label without touching postings. */
  updateNodeMetadata(node: CanvasNodeSnapshot): void;
  search(query: string, viewportCenter?: CanvasPoint | null): SearchResult[];
  getStats(): SearchIndexStats;
  inspect(): SearchIndexInspection;
}

export interface ConversationSearchIndexOptions {
  readonly config?: Partial<SearchConfig>;
  readonly logger?: Logger;
  readonly now?: () => number;
}

const UNTITLED_NODE_TITLE = "Untitled";

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const toUnitKey = (kind: TextUnitKind, textUnitId: TextUnitId): TextUnitKey => `${kind}:${textUnitId}`;

const findCaseInsensitive = (text: string, needle: string): MatchRange | null => {
  const match = new RegExp(escapeRegExp(needle), "iu").exec(text);
  if (!match) {
    return null;
  }
  return { start: match.index, end: match.index + match[0].length };
};

const readAssignedRole = (node: CanvasNodeSnapshot): string | null => {
  const trimmed = node.assignedRole?.trim() ?? "";
  return trimmed.length > 0 ? trimmed : null;
};

const buildMetadata = (node: CanvasNodeSnapshot): NodeSearchMetadata => ({
  title: node.title.length > 0 ? node.title : UNTITLED_NODE_TITLE,
  colorTag: node.color,
  position: { x: node.position.x, y: node.position.y },
  assignedRoleLabel: readAssignedRole(node)
});

const compareKeys = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const createConversationSearchIndex = (
  options: ConversationSearchIndexOptions = {}
): ConversationSearchIndex => {
  const config = resolveSearchConfig(options.config);
  const logger = (options.logger ?? createNoopLogger()).child("index");
  const now = options.now ?? (() => Date.now());

  /** Token to postings. */
  const postings = new Map<string, Posting[]>();
  /** Full text per unit, in indexing order. */
  const units = new Map<TextUnitKey, IndexedTextUnit>();
  const nodeUnits = new Map<NodeId, Set<TextUnitKey>>();
  /** Reverse index used by removal. */
  const unitTokens = new Map<TextUnitKey, Set<string>>();
  const metadata = new Map<NodeId, NodeSearchMetadata>();

  const addUnit = (
    nodeId: NodeId,
    kind: TextUnitKind,
    textUnitId: TextUnitId,
    unitIndex: number,
    text: string,
    indexedText: string,
    role: MessageRole | null
  ): void => {
    const key = toUnitKey(kind, textUnitId);
    const existing = units.get(key);
    if (existing) {
      logger.warn("skipping text unit already owned by another entry", {
        textUnitId,
        nodeId,
        ownerNodeId: existing.nodeId
      });
      return;
    }

    units.set(key, { key, nodeId, textUnitId, unitIndex, kind, role, text });

    let owned = nodeUnits.get(nodeId);
    if (!owned) {
      owned = new Set();
      nodeUnits.set(nodeId, owned);
    }
    owned.add(key);

    const tokens = new Set<string>();
    tokenize(indexedText).forEach((token, tokenPosition) => {
      let bucket = postings.get(token);
      if (!bucket) {
        bucket = [];
        postings.set(token, bucket);
      }
      bucket.push({ nodeId, unitKey: key, textUnitId, unitIndex, tokenPosition });
      tokens.add(token);
    });
    unitTokens.set(key, tokens);
  };

  const purgeNodeUnits = (nodeId: NodeId): void => {
    const owned = nodeUnits.get(nodeId);
    if (!owned) {
      return;
    }
    owned.forEach((key) => {
      unitTokens.get(key)?.forEach((token) => {
        const bucket = postings.get(token);
        if (!bucket) {
          return;
        }
        const remaining = bucket.filter((posting) => posting.unitKey !== key);
        if (remaining.length === 0) {
          postings.delete(token);
        } else {
          postings.set(token, remaining);
        }
      });
      unitTokens.delete(key);
      units.delete(key);
    });
    nodeUnits.delete(nodeId);
  };

  const removeNode = (nodeId: NodeId): void => {
    purgeNodeUnits(nodeId);
    metadata.delete(nodeId);
  };

  const updateNodeMetadata = (node: CanvasNodeSnapshot): void => {
    metadata.set(node.id, buildMetadata(node));
  };

  const indexNode = (node: CanvasNodeSnapshot): void => {
    purgeNodeUnits(node.id);
    updateNodeMetadata(node);

    if (node.title.trim().length > 0) {
      addUnit(node.id, "title", node.id, TITLE_UNIT_INDEX, node.title, node.title, null);
    }

    const roleName = readAssignedRole(node);
    if (roleName) {
      addUnit(
        node.id,
        "assignedRole",
        deriveAssignedRoleUnitId(node.id),
        ASSIGNED_ROLE_UNIT_INDEX,
        `${ASSIGNED_ROLE_LABEL} ${roleName}`,
        roleName,
        null
      );
    }

    node.conversation.forEach((message, ordinal) => {
      if (message.content.trim().length === 0) {
        return;
      }
      addUnit(node.id, "conversation", message.id, ordinal, message.content, message.content, message.role);
    });

    if (node.type === "note" && node.description.trim().length > 0) {
      addUnit(node.id, "note", node.id, NOTE_UNIT_INDEX, node.description, node.description, null);
    }
  };

  const clear = (): void => {
    postings.clear();
    units.clear();
    nodeUnits.clear();
    unitTokens.clear();
    metadata.clear();
  };

  const getStats = (): SearchIndexStats => {
    let postingCount = 0;
    postings.forEach((bucket) => {
      postingCount += bucket.length;
    });
    return {
      indexedNodeCount: nodeUnits.size,
      indexedUnitCount: units.size,
      uniqueTokenCount: postings.size,
      postingCount
    };
  };

  const rebuild = (nodes: Iterable<CanvasNodeSnapshot>): void => {
    const startedAt = now();
    clear();
    for (const node of nodes) {
      indexNode(node);
    }
    logger.info("search index rebuilt", { ...getStats(), durationMs: now() - startedAt });
  };

  /** Units containing every query token as a token prefix; null when some token has no match. */
  const findTokenCandidates = (queryTokens: readonly string[]): Set<TextUnitKey> | null => {
    let candidates: Set<TextUnitKey> | null = null;
    for (const queryToken of queryTokens) {
      const matches = new Set<TextUnitKey>();
      postings.forEach((bucket, token) => {
        if (!token.startsWith(queryToken)) {
          return;
        }
        bucket.forEach((posting) => matches.add(posting.unitKey));
      });

      const previous: Set<TextUnitKey> | null = candidates;
      candidates = previous === null ? matches : new Set([...previous].filter((key: TextUnitKey) => matches.has(key)));
      if (candidates.size === 0) {
        return null;
      }
    }
    return candidates;
  };

  const findFirstTokenRange = (text: string, queryTokens: readonly string[]): MatchRange | null => {
    let earliest: MatchRange | null = null;
    for (const token of queryTokens) {
      const range = findCaseInsensitive(text, token);
      if (range && (earliest === null || range.start < earliest.start)) {
        earliest = range;
      }
    }
    return earliest;
  };

  const buildResult = (unit: IndexedTextUnit, range: MatchRange, timestamp: number): SearchResult | null => {
    const nodeMetadata = metadata.get(unit.nodeId);
    if (!nodeMetadata) {
      return null;
    }
    return {
      nodeId: unit.nodeId,
      nodeTitle: nodeMetadata.title,
      nodeColorTag: nodeMetadata.colorTag,
      textUnitId: unit.textUnitId,
      matchedRole: unit.role,
      snippet: generateSnippet(unit.text, range, config.snippetContext),
      fullUnitText: unit.text,
      matchRange: range,
      timestamp,
      nodePosition: nodeMetadata.position,
      matchKind: unit.kind,
      ...(nodeMetadata.assignedRoleLabel ? { assignedRoleLabel: nodeMetadata.assignedRoleLabel } : {})
    };
  };

  const rank = (results: readonly SearchResult[], query: string, viewportCenter?: CanvasPoint | null) =>
    rankSearchResults(results, query, {
      viewportCenter,
      proximityThreshold: config.proximityThreshold,
      limit: config.maxResults
    });

  const substringSearch = (query: string, viewportCenter?: CanvasPoint | null): SearchResult[] => {
    const timestamp = now();
    const results: SearchResult[] = [];
    for (const unit of units.values()) {
      const range = findCaseInsensitive(unit.text, query);
      if (!range) {
        continue;
      }
      const result = buildResult(unit, range, timestamp);
      if (!result) {
        continue;
      }
      results.push(result);
      if (results.length >= config.maxResults) {
        break;
      }
    }
    return rank(results, query, viewportCenter);
  };

  const search = (query: string, viewportCenter?: CanvasPoint | null): SearchResult[] => {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      return [];
    }

    const queryTokens = tokenize(trimmed);
    const candidates = queryTokens.length > 0 ? findTokenCandidates(queryTokens) : null;
    if (!candidates) {
      return substringSearch(trimmed, viewportCenter);
    }

    const timestamp = now();
    const results: SearchResult[] = [];
    for (const unit of units.values()) {
      if (!candidates.has(unit.key)) {
        continue;
      }
      const range =
        findCaseInsensitive(unit.text, trimmed)
        ?? (config.unmatchedPhrasePolicy === "tokenSnippet" ? findFirstTokenRange(unit.text, queryTokens) : null);
      if (!range) {
        continue;
      }
      const result = buildResult(unit, range, timestamp);
      if (result) {
        results.push(result);
      }
    }
    return rank(results, trimmed, viewportCenter);
  };

  const inspect = (): SearchIndexInspection => ({
    postings: Array.from(postings.entries())
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([token, bucket]) => [token, [...bucket]] as const),
    units: Array.from(units.values()).sort((a, b) => compareKeys(a.key, b.key)),
    nodeUnits: Array.from(nodeUnits.entries())
      .sort(([a], [b]) => compareKeys(a, b))
      .map(([nodeId, keys]) => [nodeId, Array.from(keys).sort(compareKeys)] as const),
    metadata: Array.from(metadata.entries()).sort(([a], [b]) => compareKeys(a, b))
  });

  return {
    rebuild,
    indexNode,
    removeNode,
    updateNodeMetadata,
    search,
    getStats,
    inspect
  };
};
