/**
 * List tightness
 *
 * A list is loose when a blank line separates two of its items or falls
 * between two blocks of the same item. Only blank lines count: an item
 * that ends in a nested list and runs straight into the next item keeps
 * the list tight.
 *
 * @since 2026-10-06
 */

/**
 * Blank-line bookkeeping recorded for one item while parsing
 */
export interface ItemGaps {
  /** A blank line came between this item and the one before it */
  blankBefore: boolean;
  /** A blank line came between two of this item's own child blocks */
  hasBlankGap: boolean;
}

export function isTightList(items: readonly ItemGaps[]): boolean {
  return items.every((item, i) => !(i > 0 && item.blankBefore) && !item.hasBlankGap);
}
