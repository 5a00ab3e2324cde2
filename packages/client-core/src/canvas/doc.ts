/**
 * Canvas node document helpers. Each node is a Y.Map record holding scalar fields and a Y.Array of
 * conversation messages. Mutations always run inside transactions and callers only ever see plain
 * `CanvasNodeSnapshot`s.
 */
import * as Y from "yjs";

import { createMessageId, createNodeId, type MessageId, type NodeId } from "../ids";
import type {
  CanvasDoc,
  CanvasNodeRecord,
  CanvasNodeSnapshot,
  CanvasNodeType,
  CanvasPoint,
  ConversationMessage,
  MessageRole
} from "../types";
import {
  DEFAULT_NODE_COLOR,
  NODES_COLLECTION_KEY,
  NODE_ASSIGNED_ROLE_KEY,
  NODE_COLOR_KEY,
  NODE_DESCRIPTION_KEY,
  NODE_MESSAGES_KEY,
  NODE_TITLE_KEY,
  NODE_TYPE_KEY,
  NODE_X_KEY,
  NODE_Y_KEY
} from "./constants";

export class CanvasError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CanvasError";
  }
}

export interface AddCanvasNodeOptions {
  readonly id?: NodeId;
  readonly title?: string;
  readonly color?: string;
  readonly position?: CanvasPoint;
  readonly type?: CanvasNodeType;
  readonly description?: string;
  readonly assignedRole?: string | null;
  readonly conversation?: readonly ConversationMessage[];
  readonly origin?: unknown;
}

export interface AppendCanvasMessageOptions {
  readonly id?: MessageId;
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp?: number;
  readonly origin?: unknown;
}

export const createCanvasDoc = (): CanvasDoc => canvasFromDoc(new Y.Doc());

export const canvasFromDoc = (doc: Y.Doc): CanvasDoc => ({
  doc,
  nodes: doc.getMap<CanvasNodeRecord>(NODES_COLLECTION_KEY)
});

export const withTransaction = <T>(
  canvas: CanvasDoc,
  fn: (transaction: Y.Transaction) => T,
  origin?: unknown
): T => {
  return canvas.doc.transact((transaction) => fn(transaction), origin);
};

const getNodeRecord = (canvas: CanvasDoc, nodeId: NodeId): CanvasNodeRecord => {
  const record = canvas.nodes.get(nodeId);
  if (!record) {
    throw new CanvasError(`Node ${nodeId} not found`);
  }
  return record;
};

const getMessagesArray = (canvas: CanvasDoc, nodeId: NodeId): Y.Array<unknown> => {
  const messages = getNodeRecord(canvas, nodeId).get(NODE_MESSAGES_KEY);
  if (!(messages instanceof Y.Array)) {
    throw new CanvasError(`Node ${nodeId} has no message list`);
  }
  return messages;
};

const toStoredMessage = (message: ConversationMessage): Record<string, unknown> => ({
  id: message.id,
  role: message.role,
  content: message.content,
  ...(message.timestamp === undefined ? {} : { timestamp: message.timestamp })
});

export const addCanvasNode = (canvas: CanvasDoc, options: AddCanvasNodeOptions = {}): NodeId => {
  const nodeId = options.id ?? createNodeId();

  withTransaction(
    canvas,
    () => {
      if (canvas.nodes.has(nodeId)) {
        throw new CanvasError(`Node ${nodeId} already exists`);
      }
      const record: CanvasNodeRecord = new Y.Map<unknown>();
      record.set(NODE_TITLE_KEY, options.title ?? "");
      record.set(NODE_COLOR_KEY, options.color ?? DEFAULT_NODE_COLOR);
      record.set(NODE_X_KEY, options.position?.x ?? 0);
      record.set(NODE_Y_KEY, options.position?.y ?? 0);
      record.set(NODE_TYPE_KEY, options.type ?? "standard");
      record.set(NODE_DESCRIPTION_KEY, options.description ?? "");
      record.set(NODE_ASSIGNED_ROLE_KEY, options.assignedRole ?? null);

      const messages = new Y.Array<unknown>();
      messages.push((options.conversation ?? []).map(toStoredMessage));
      record.set(NODE_MESSAGES_KEY, messages);

      canvas.nodes.set(nodeId, record);
    },
    options.origin
  );

  return nodeId;
};

export const canvasNodeExists = (canvas: CanvasDoc, nodeId: NodeId): boolean => canvas.nodes.has(nodeId);

const setNodeField = (canvas: CanvasDoc, nodeId: NodeId, key: string, value: unknown, origin?: unknown): void => {
  withTransaction(canvas, () => {
    getNodeRecord(canvas, nodeId).set(key, value);
  }, origin);
};

export const setCanvasNodeTitle = (canvas: CanvasDoc, nodeId: NodeId, title: string, origin?: unknown): void =>
  setNodeField(canvas, nodeId, NODE_TITLE_KEY, title, origin);

export const setCanvasNodeDescription = (
  canvas: CanvasDoc,
  nodeId: NodeId,
  description: string,
  origin?: unknown
): void => setNodeField(canvas, nodeId, NODE_DESCRIPTION_KEY, description, origin);

export const setCanvasNodeType = (canvas: CanvasDoc, nodeId: NodeId, type: CanvasNodeType, origin?: unknown): void =>
  setNodeField(canvas, nodeId, NODE_TYPE_KEY, type, origin);

export const setCanvasNodeRole = (
  canvas: CanvasDoc,
  nodeId: NodeId,
  assignedRole: string | null,
  origin?: unknown
): void => setNodeField(canvas, nodeId, NODE_ASSIGNED_ROLE_KEY, assignedRole, origin);

export const setCanvasNodeColor = (canvas: CanvasDoc, nodeId: NodeId, color: string, origin?: unknown): void =>
  setNodeField(canvas, nodeId, NODE_COLOR_KEY, color, origin);

export const moveCanvasNode = (canvas: CanvasDoc, nodeId: NodeId, position: CanvasPoint, origin?: unknown): void => {
  withTransaction(canvas, () => {
    const record = getNodeRecord(canvas, nodeId);
    record.set(NODE_X_KEY, position.x);
    record.set(NODE_Y_KEY, position.y);
  }, origin);
};

export const appendCanvasMessage = (
  canvas: CanvasDoc,
  nodeId: NodeId,
  options: AppendCanvasMessageOptions
): MessageId => {
  const message: ConversationMessage = {
    id: options.id ?? createMessageId(),
    role: options.role,
    content: options.content,
    timestamp: options.timestamp ?? Date.now()
  };
  withTransaction(canvas, () => {
    getMessagesArray(canvas, nodeId).push([toStoredMessage(message)]);
  }, options.origin);
  return message.id;
};

export const removeCanvasNode = (canvas: CanvasDoc, nodeId: NodeId, origin?: unknown): void => {
  withTransaction(canvas, () => {
    if (!canvas.nodes.has(nodeId)) {
      throw new CanvasError(`Node ${nodeId} not found`);
    }
    canvas.nodes.delete(nodeId);
  }, origin);
};

const readString = (value: unknown, fallback: string): string => (typeof value === "string" ? value : fallback);

const readNumber = (value: unknown): number => (typeof value === "number" && Number.isFinite(value) ? value : 0);

const readMessage = (value: unknown): ConversationMessage | null => {
  if (typeof value !== "object" || value === null) {
    return null;
  }
  if (!("id" in value) || typeof value.id !== "string") {
    return null;
  }
  if (!("content" in value) || typeof value.content !== "string") {
    return null;
  }
  const role: MessageRole = "role" in value && value.role === "assistant" ? "assistant" : "user";
  const timestamp = "timestamp" in value && typeof value.timestamp === "number" ? value.timestamp : undefined;
  return { id: value.id, role, content: value.content, timestamp };
};

export const readCanvasNodeSnapshot = (nodeId: NodeId, record: CanvasNodeRecord): CanvasNodeSnapshot => {
  const messages = record.get(NODE_MESSAGES_KEY);
  const storedMessages: unknown[] = messages instanceof Y.Array ? messages.toArray() : [];
  const conversation = storedMessages
    .map(readMessage)
    .filter((message): message is ConversationMessage => message !== null);
  const assignedRole = record.get(NODE_ASSIGNED_ROLE_KEY);

  return {
    id: nodeId,
    title: readString(record.get(NODE_TITLE_KEY), ""),
    color: readString(record.get(NODE_COLOR_KEY), DEFAULT_NODE_COLOR),
    position: {
      x: readNumber(record.get(NODE_X_KEY)),
      y: readNumber(record.get(NODE_Y_KEY))
    },
    type: record.get(NODE_TYPE_KEY) === "note" ? "note" : "standard",
    description: readString(record.get(NODE_DESCRIPTION_KEY), ""),
    assignedRole: typeof assignedRole === "string" ? assignedRole : null,
    conversation
  };
};

export const getCanvasNodeSnapshot = (canvas: CanvasDoc, nodeId: NodeId): CanvasNodeSnapshot => {
  return readCanvasNodeSnapshot(nodeId, getNodeRecord(canvas, nodeId));
};

export const listCanvasNodeSnapshots = (canvas: CanvasDoc): CanvasNodeSnapshot[] => {
  const snapshots: CanvasNodeSnapshot[] = [];
  canvas.nodes.forEach((record, nodeId) => {
    snapshots.push(readCanvasNodeSnapshot(nodeId, record));
  });
  return snapshots;
};
