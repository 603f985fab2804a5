/**
 * Tool Annotations Presets
 */

import type { ToolAnnotations } from "../types/index.js";

/** Read-only query tools (SELECT, SHOW, DESCRIBE, COUNT) */
export const READ_ONLY: ToolAnnotations = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
};

/**
 * Create read-only annotations with title
 */
export function readOnly(title: string): ToolAnnotations {
  return { title, ...READ_ONLY };
}
