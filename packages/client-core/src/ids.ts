/**
 * Identifier utilities for canvas nodes and their conversation messages. Node and message IDs are
 * ULIDs so they sort chronologically while remaining collision-resistant for offline creation.
 */
import * as sha256 from "lib0/hash/sha256";
import * as buffer from "lib0/buffer";
import * as string from "lib0/string";
import { ulid } from "ulidx";

export type NodeId = string;
export type MessageId = string;
/** Identifier under which one indexed text unit's full text is stored. */
export type TextUnitId = string;

const ASSIGNED_ROLE_UNIT_NAMESPACE = "nodecanvas/assigned-role";
const ASSIGNED_ROLE_UNIT_PREFIX = "role:";

export const createNodeId = (): NodeId => ulid();

export const createMessageId = (): MessageId => ulid();

/**
 * Derives the text unit id of a node's assigned-role label. The digest is namespaced so the result
 * can never equal a ULID node or message id, and it is stable across rebuilds.
 */
export const deriveAssignedRoleUnitId = (nodeId: NodeId): TextUnitId => {
  const digest = sha256.digest(string.encodeUtf8(`${ASSIGNED_ROLE_UNIT_NAMESPACE}:${nodeId}`));
  return `${ASSIGNED_ROLE_UNIT_PREFIX}${buffer.toBase64(digest)}`;
};
