/**
 * Plain data shapes for canvas nodes as the rest of the client sees them. Yjs structures stay
 * inside the canvas module; everything crossing a module boundary is one of these snapshots.
 */
import type * as Y from "yjs";

import type { MessageId, NodeId } from "./ids";

export interface CanvasPoint {
  readonly x: number;
  readonly y: number;
}

export type CanvasNodeType = "standard" | "note";

export type MessageRole = "user" | "assistant";

export interface ConversationMessage {
  readonly id: MessageId;
  readonly role: MessageRole;
  readonly content: string;
  /** Millisecond UTC timestamp. */
  readonly timestamp?: number;
}

export interface CanvasNodeSnapshot {
  readonly id: NodeId;
  readonly title: string;
  /** Palette tag such as "blue"; "none" or "" for uncoloured nodes. */
  readonly color: string;
  readonly position: CanvasPoint;
  readonly type: CanvasNodeType;
  readonly description: string;
  /** Display name of the role assigned to the node's team member, when one is assigned. */
  readonly assignedRole?: string | null;
  readonly conversation: readonly ConversationMessage[];
}

export type CanvasNodeRecord = Y.Map<unknown>;
export type CanvasNodeStore = Y.Map<CanvasNodeRecord>;

export interface CanvasDoc {
  readonly doc: Y.Doc;
  readonly nodes: CanvasNodeStore;
}
