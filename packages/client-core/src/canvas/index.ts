export {
  CanvasError,
  addCanvasNode,
  appendCanvasMessage,
  canvasFromDoc,
  canvasNodeExists,
  createCanvasDoc,
  getCanvasNodeSnapshot,
  listCanvasNodeSnapshots,
  moveCanvasNode,
  readCanvasNodeSnapshot,
  removeCanvasNode,
  setCanvasNodeColor,
  setCanvasNodeDescription,
  setCanvasNodeRole,
  setCanvasNodeTitle,
  setCanvasNodeType,
  withTransaction
} from "./doc";
export type { AddCanvasNodeOptions, AppendCanvasMessageOptions } from "./doc";
export { bindSearchIndexToCanvas } from "./searchBinding";
export type { CanvasSearchIndexTarget } from "./searchBinding";
