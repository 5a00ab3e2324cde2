/**
 * Search domain model shared by the index, the query controller and UI adapters. Postings and
 * unit records are internal to the index; results, highlights and statistics are what crosses
 * into host code.
 */
import type { NodeId, TextUnitId } from "../ids";
import type { CanvasPoint, MessageRole } from "../types";

/** Which part of a node produced an indexed text unit. */
export type TextUnitKind = "title" | "note" | "assignedRole" | "conversation";

/** `unitIndex` sentinels for the non-conversation unit kinds. */
export const TITLE_UNIT_INDEX = -1;
export const NOTE_UNIT_INDEX = -2;
export const ASSIGNED_ROLE_UNIT_INDEX = -3;

/** Prefix stored ahead of a role name in the assigned-role unit's text. */
export const ASSIGNED_ROLE_LABEL = "Team Member:";

/**
 * Title and note units share the node id as `textUnitId`, so units are keyed by kind and id
 * together.
 */
export type TextUnitKey = `${TextUnitKind}:${string}`;

export interface Posting {
  readonly nodeId: NodeId;
  readonly unitKey: TextUnitKey;
  readonly textUnitId: TextUnitId;
  readonly unitIndex: number;
  readonly tokenPosition: number;
}

export interface IndexedTextUnit {
  readonly key: TextUnitKey;
  readonly nodeId: NodeId;
  readonly textUnitId: TextUnitId;
  readonly unitIndex: number;
  readonly kind: TextUnitKind;
  readonly role: MessageRole | null;
  readonly text: string;
}

export interface NodeSearchMetadata {
  readonly title: string;
  readonly colorTag: string;
  readonly position: CanvasPoint;
  readonly assignedRoleLabel: string | null;
}

export interface MatchRange {
  readonly start: number;
  readonly end: number;
}

export interface SearchResult {
  readonly nodeId: NodeId;
  readonly nodeTitle: string;
  readonly nodeColorTag: string;
  readonly textUnitId: TextUnitId;
  /** Author of the matched message; null for title, note and role units. */
  readonly matchedRole: MessageRole | null;
  readonly snippet: string;
  readonly fullUnitText: string;
  /** Range of the match inside `fullUnitText`. */
  readonly matchRange: MatchRange;
  /** Millisecond timestamp of result construction. */
  readonly timestamp: number;
  readonly nodePosition: CanvasPoint;
  readonly matchKind: TextUnitKind;
  readonly assignedRoleLabel?: string;
}

/** Handed to the host when a result is selected so the node view can highlight the match. */
export interface NodeSearchHighlight {
  readonly nodeId: NodeId;
  readonly textUnitId: TextUnitId;
  readonly query: string;
  /** Distinguishes repeated selections of the same query. */
  readonly timestamp: number;
}

export interface SearchIndexStats {
  readonly indexedNodeCount: number;
  readonly indexedUnitCount: number;
  readonly uniqueTokenCount: number;
  readonly postingCount: number;
}

/** Deterministic plain dump of the index tables, sorted by key. */
export interface SearchIndexInspection {
  readonly postings: ReadonlyArray<readonly [string, readonly Posting[]]>;
  readonly units: readonly IndexedTextUnit[];
  readonly nodeUnits: ReadonlyArray<readonly [NodeId, readonly TextUnitKey[]]>;
  readonly metadata: ReadonlyArray<readonly [NodeId, NodeSearchMetadata]>;
}
