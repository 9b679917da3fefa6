import { ScoredNode } from '@domain/types/scoring.types';
import { clampUnit, mean, unionKeywords } from './score-math';

export const EXPLANATION_SEPARATOR = ' | ';

/** A node contributed by one component, with that component's weight. */
export interface WeightedNode<T extends ScoredNode> {
  node: T;
  weight: number;
}

/** All nodes one component reported at a given tree level. */
export interface Contribution<T extends ScoredNode> {
  nodes: readonly T[];
  weight: number;
}

export interface MergedFields {
  score: number;
  confidence: number;
  matchedKeywords: string[];
  relevanceExplanation?: string;
}

/**
 * Describes one level of the section -> entry -> bullet tree: how a node is
 * keyed across components and how a merged node is rebuilt (recursing into
 * the level below through `members`).
 */
export interface MergeLevel<T extends ScoredNode, R> {
  keyOf(node: T, index: number): string;
  build(key: string, merged: MergedFields, members: WeightedNode<T>[]): R;
}

/**
 * Score is the weighted mean over members with a positive weight (0 when
 * none has one), confidence the plain mean, keywords the ordered union and
 * explanations the non-empty ones joined in contribution order.
 */
export function mergeScoredNodes<T extends ScoredNode>(
  members: readonly WeightedNode<T>[],
): MergedFields {
  let weightedSum = 0;
  let totalWeight = 0;
  const weighted: T[] = [];
  for (const { node, weight } of members) {
    if (weight > 0) {
      weightedSum += node.score * weight;
      totalWeight += weight;
      weighted.push(node);
    }
  }
  // a lone contributor keeps its score bit-for-bit
  const score =
    weighted.length === 1
      ? weighted[0].score
      : totalWeight > 0
        ? clampUnit(weightedSum / totalWeight)
        : 0;

  const explanations = members
    .map(({ node }) => node.relevanceExplanation)
    .filter((text): text is string => typeof text === 'string' && text.length > 0);

  const merged: MergedFields = {
    score,
    confidence: mean(members.map(({ node }) => node.confidence)),
    matchedKeywords: unionKeywords(members.map(({ node }) => node.matchedKeywords)),
  };
  if (explanations.length > 0) {
    merged.relevanceExplanation = explanations.join(EXPLANATION_SEPARATOR);
  }
  return merged;
}

/** Groups nodes by key in first-seen order and merges each group. */
export function mergeLevel<T extends ScoredNode, R>(
  contributions: readonly Contribution<T>[],
  level: MergeLevel<T, R>,
): R[] {
  const groups = new Map<string, WeightedNode<T>[]>();

  for (const { nodes, weight } of contributions) {
    nodes.forEach((node, index) => {
      const key = level.keyOf(node, index);
      const group = groups.get(key);
      if (group) {
        group.push({ node, weight });
      } else {
        groups.set(key, [{ node, weight }]);
      }
    });
  }

  return [...groups].map(([key, members]) =>
    level.build(key, mergeScoredNodes(members), members),
  );
}

/** Children of a merged group, each counted once with unit weight. */
export function childContributions<P extends ScoredNode, C extends ScoredNode>(
  members: readonly WeightedNode<P>[],
  childrenOf: (parent: P) => readonly C[],
): Contribution<C>[] {
  return members.map(({ node }) => ({ nodes: childrenOf(node), weight: 1 }));
}
