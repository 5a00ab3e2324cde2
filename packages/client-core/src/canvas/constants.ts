/**
 * Yjs map keys for the canvas document. Node helpers and the search binding both read them, so
 * they live in one place.
 */
export const NODES_COLLECTION_KEY = "nodes";

export const NODE_TITLE_KEY = "title";
export const NODE_COLOR_KEY = "color";
export const NODE_X_KEY = "x";
export const NODE_Y_KEY = "y";
export const NODE_TYPE_KEY = "type";
export const NODE_DESCRIPTION_KEY = "description";
export const NODE_ASSIGNED_ROLE_KEY = "assignedRole";
export const NODE_MESSAGES_KEY = "messages";

/** Keys whose changes never alter indexed text. */
export const GEOMETRY_KEYS: ReadonlySet<string> = new Set([NODE_X_KEY, NODE_Y_KEY, NODE_COLOR_KEY]);

export const DEFAULT_NODE_COLOR = "none";
