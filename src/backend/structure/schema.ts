/**
 * Validation for structure trees read back from disk.
 *
 * A saved tree may have been filtered (empty `elements` dropped, optional
 * properties omitted); planning only needs ids, content and content sizes.
 */

import { z } from 'zod';
import type { PlannableNode } from './planner';

export const plannableNodeSchema: z.ZodType<PlannableNode> = z.lazy(() =>
  z.object({
    id: z.number().int().positive(),
    content: z.string(),
    content_size: z.number().int().nonnegative(),
    elements: z.array(plannableNodeSchema).optional(),
    items: z.array(plannableNodeSchema).optional(),
  }),
);

/**
 * Validate a parsed JSON structure tree for planning.
 * Throws with the path of the first offending field.
 */
export function loadStructureTree(json: unknown, sourceName = 'structure'): PlannableNode {
  const result = plannableNodeSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new Error(`Invalid ${sourceName} tree at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}
