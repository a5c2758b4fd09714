/**
 * Output formatters for inference results
 *
 * Supports multiple output formats:
 * 1. Report (one `Type(name): type` line per binder)
 * 2. JSON (machine-readable)
 * 3. Inline comments (source with `(* name: type *)` after each binder)
 *
 * Every format prints a failed inference as the bare `Type error` verdict;
 * the failure kind stays internal.
 */

import type { ClassMap, EqualityConstraint } from '../constraint/index.js';
import { distinctClasses, formatTypeTerm } from '../constraint/index.js';
import type { InferenceResult } from '../analysis/index.js';
import { TYPE_ERROR } from '../analysis/index.js';

/**
 * Format an inference result as a human-readable report
 */
export function formatReport(result: InferenceResult): string {
  if (!result.success) {
    return TYPE_ERROR;
  }

  const lines = [`Type: ${result.type}`];
  for (const binding of result.bindings) {
    lines.push(`Type(${binding.displayName}): ${binding.type}`);
  }
  return lines.join('\n');
}

/**
 * Format an inference result as JSON
 */
export function formatJSON(result: InferenceResult, indent = 2): string {
  if (!result.success) {
    return JSON.stringify({ success: false, error: TYPE_ERROR }, null, indent);
  }

  const bindings: Record<string, string> = {};
  for (const binding of result.bindings) {
    bindings[binding.displayName] = binding.type;
  }
  return JSON.stringify({ success: true, type: result.type, bindings }, null, indent);
}

/**
 * Source text with a `(* name: type *)` comment after each line that opens
 * a let binder
 */
export function formatInline(source: string, result: InferenceResult): string {
  if (!result.success) {
    return TYPE_ERROR;
  }

  const byLine = new Map<number, string[]>();
  for (const binding of result.bindings) {
    const line = binding.node.loc?.line;
    if (line === undefined) continue;
    const existing = byLine.get(line) ?? [];
    existing.push(`(* ${binding.displayName}: ${binding.type} *)`);
    byLine.set(line, existing);
  }

  return source
    .split('\n')
    .map((text, i) => {
      const comments = byLine.get(i + 1);
      return comments ? `${text} ${comments.join(' ')}` : text;
    })
    .join('\n');
}

/**
 * One `(left, right)` line per constraint, in generation order
 */
export function formatConstraints(constraints: readonly EqualityConstraint[]): string {
  return constraints
    .map(c => `(${formatTypeTerm(c.left)}, ${formatTypeTerm(c.right)})`)
    .join('\n');
}

/**
 * One `{a, b, ...}` line per equivalence class, in first-seen order
 */
export function formatClasses(classes: ClassMap): string {
  return distinctClasses(classes)
    .map(cls => `{${cls.members.map(formatTypeTerm).join(', ')}}`)
    .join('\n');
}
