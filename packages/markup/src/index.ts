// =============================================================================
// Public API
// =============================================================================

// Element creation
export { h, createTextElement, normalizeChildren, tagList, singleton, tags } from "./h.js";

// Tree manipulation
export { classNames, hasClass, appendClass, appendAttributes, updateChild } from "./tags.js";

// Serialization
export { renderToString, renderDocument, escapeHtml } from "./server.js";

// Types
export type {
  VElement,
  VChild,
  VNode,
  ElementType,
  Primitive,
  Component,
  Attributes,
} from "./shared.js";
export { RenderError, METADATA_PROP, isVElement, isProperty } from "./shared.js";
