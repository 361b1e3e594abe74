/**
 * Fresh-name supply
 *
 * The engine asks for synthetic names (the binder of a trailing exec clause,
 * placeholders for wildcards inside tuple construction) through this
 * capability instead of a global counter.
 */

import type { NameInventory } from "../ast";

export interface FreshNameSupply {
  /** A name not used anywhere in the comprehension being desugared. */
  fresh(): string;
}

export const DEFAULT_FRESH_PREFIX = "x$";

/**
 * Counter-based supply producing `x$1`, `x$2`, ..., skipping names in the
 * inventory and names that occur inside raw fragments.
 */
export function createFreshNameSupply(
  inventory: NameInventory = { names: new Set(), rawTexts: [] },
  prefix: string = DEFAULT_FRESH_PREFIX
): FreshNameSupply {
  let counter = 0;

  const taken = (name: string): boolean =>
    inventory.names.has(name) || inventory.rawTexts.some((text) => text.includes(name));

  return {
    fresh(): string {
      let name: string;
      do {
        name = `${prefix}${++counter}`;
      } while (taken(name));
      return name;
    },
  };
}
