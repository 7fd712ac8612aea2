/**
 * @arch hexgraph.core.domain
 */

/**
 * Stable node identifier. Equal type names always yield equal ids.
 */
export type NodeId = string;

/**
 * Derive the NodeId for a type name. Surrounding whitespace is not significant.
 */
export function nodeIdFor(typeName: string): NodeId {
  return typeName.trim();
}
