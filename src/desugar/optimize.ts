/**
 * Redundancy Optimizer
 *
 * Applied to the last generator of a chain, the one immediately followed by
 * the yield. `xs.map(x => x)` is `xs`; so is `ps.map { case (a, b) => (a, b) }`.
 * The check looks at that single generator/yield pair and nothing else.
 */

import type { Expr, Pattern } from "../ast";
import { mapCall, sameBinding } from "../ast";

export function elideRedundantMap(source: Expr, pattern: Pattern, body: Expr, enabled: boolean = true): Expr {
  if (enabled && sameBinding(pattern, body)) {
    return source;
  }
  return mapCall(source, pattern, body);
}
