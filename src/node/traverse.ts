/**
 * Tree queries over parsed documents
 *
 * @since 2026-10-03
 */

import type {
  BlockquoteNode,
  DocumentNode,
  ListItemNode,
  MarkdownNode,
} from './types.js';

/**
 * Nodes whose children are blocks
 */
export function isContainerNode(
  node: MarkdownNode
): node is DocumentNode | BlockquoteNode | ListItemNode {
  return node.type === 'document' || node.type === 'blockquote' || node.type === 'list_item';
}

/**
 * Nodes that hold raw inline text (directly or through Text children)
 */
export function hasTextContent(node: MarkdownNode): boolean {
  return node.type === 'text' || node.type === 'paragraph' || node.type === 'heading';
}

/**
 * Direct children of any node, in document order
 */
export function childrenOf(node: MarkdownNode): readonly MarkdownNode[] {
  switch (node.type) {
    case 'document':
    case 'blockquote':
    case 'list_item':
    case 'paragraph':
    case 'heading':
      return node.children;
    case 'list':
      return node.items;
    default:
      return [];
  }
}

/**
 * Depth-first walk in document order.
 * @param visitor Called for each node. Return false to stop the walk.
 * @returns false when the walk was stopped early
 */
export function visitNodes(
  node: MarkdownNode,
  visitor: (node: MarkdownNode, depth: number) => boolean | void,
  depth = 0
): boolean {
  if (visitor(node, depth) === false) return false;

  for (const child of childrenOf(node)) {
    if (!visitNodes(child, visitor, depth + 1)) return false;
  }

  return true;
}

/**
 * Concatenate the values of every Text node below `node`
 */
export function collectText(node: MarkdownNode): string {
  const parts: string[] = [];
  visitNodes(node, (current) => {
    if (current.type === 'text') {
      parts.push(current.value);
    }
  });
  return parts.join('');
}
