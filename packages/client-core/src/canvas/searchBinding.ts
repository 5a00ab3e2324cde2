/**
 * Keeps a conversation search index in step with a canvas document. The index is rebuilt once on
 * bind; afterwards each transaction is folded into one change per node so a node edited several
 * times in a transaction is reindexed once, and geometry-only edits skip reindexing entirely.
 */
import * as Y from "yjs";

import type { NodeId } from "../ids";
import type { ConversationSearchIndex } from "../search/index";
import type { CanvasDoc } from "../types";
import { GEOMETRY_KEYS } from "./constants";
import { listCanvasNodeSnapshots, readCanvasNodeSnapshot } from "./doc";

export type CanvasSearchIndexTarget = Pick<
  ConversationSearchIndex,
  "rebuild" | "indexNode" | "removeNode" | "updateNodeMetadata"
>;

type NodeChange = "metadata" | "content" | "removed";

const CHANGE_PRIORITY: Record<NodeChange, number> = {
  metadata: 0,
  content: 1,
  removed: 2
};

const isGeometryOnlyEvent = (event: Y.YEvent<Y.AbstractType<unknown>>): boolean => {
  if (!(event instanceof Y.YMapEvent) || event.path.length !== 1) {
    return false;
  }
  for (const key of event.keysChanged) {
    if (typeof key !== "string" || !GEOMETRY_KEYS.has(key)) {
      return false;
    }
  }
  return true;
};

export const bindSearchIndexToCanvas = (canvas: CanvasDoc, index: CanvasSearchIndexTarget): (() => void) => {
  index.rebuild(listCanvasNodeSnapshots(canvas));

  const observer = (events: ReadonlyArray<Y.YEvent<Y.AbstractType<unknown>>>) => {
    const changes = new Map<NodeId, NodeChange>();
    const mark = (nodeId: NodeId, change: NodeChange) => {
      const previous = changes.get(nodeId);
      if (previous === undefined || CHANGE_PRIORITY[change] > CHANGE_PRIORITY[previous]) {
        changes.set(nodeId, change);
      }
    };

    events.forEach((event) => {
      if (event.target === canvas.nodes) {
        event.changes.keys.forEach((change, nodeId) => {
          mark(nodeId, change.action === "delete" ? "removed" : "content");
        });
        return;
      }
      const nodeId = event.path[0];
      if (typeof nodeId !== "string") {
        return;
      }
      mark(nodeId, isGeometryOnlyEvent(event) ? "metadata" : "content");
    });

    changes.forEach((change, nodeId) => {
      const record = canvas.nodes.get(nodeId);
      if (change === "removed" || !record) {
        index.removeNode(nodeId);
        return;
      }
      const snapshot = readCanvasNodeSnapshot(nodeId, record);
      if (change === "metadata") {
        index.updateNodeMetadata(snapshot);
      } else {
        index.indexNode(snapshot);
      }
    });
  };

  canvas.nodes.observeDeep(observer);
  return () => {
    canvas.nodes.unobserveDeep(observer);
  };
};
