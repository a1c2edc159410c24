import { DimensionNotFoundError } from '../common/errors/dimension-not-found.error';
import { DocumentDescriptor } from '../common/interfaces/document-provider.interface';
import { Repo, RepoNode } from '../content-server/interfaces/content-source.interface';

export interface ContentTreeFilter {
  supportedMimeTypes: string[];
  excludeAttribute: string;
}

/**
 * Flattens a content tree into a map keyed by node identity. Traversal is
 * iterative and visits every identity once, so a cyclic tree terminates.
 * When two distinct nodes share an identity the later one wins.
 */
export function flattenRepoNodes(root: RepoNode | null | undefined): Map<string, RepoNode> {
  const nodeMap = new Map<string, RepoNode>();
  const visited = new Set<RepoNode>();
  const stack: Array<RepoNode | null | undefined> = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || visited.has(node)) {
      continue;
    }
    visited.add(node);
    nodeMap.set(node.id, node);

    // Children are pushed in reverse so they pop in declared order
    const children = childrenOf(node);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return nodeMap;
}

// Children listed in index come first, the rest follow in map order
function childrenOf(node: RepoNode): Array<RepoNode | null> {
  if (!node.nodes) {
    return [];
  }
  const nodes = node.nodes;
  const ordered = node.index ?? [];
  const listed = new Set(ordered);

  return [
    ...ordered.filter(id => id in nodes).map(id => nodes[id]),
    ...Object.keys(nodes)
      .filter(id => !listed.has(id))
      .map(id => nodes[id]),
  ];
}

export function isIndexable(
  node: RepoNode | null | undefined,
  filter: ContentTreeFilter,
): node is RepoNode {
  if (!node) {
    return false;
  }
  if (node.hidden === true || node.data?.[filter.excludeAttribute] === true) {
    return false;
  }
  return filter.supportedMimeTypes.includes(node.mimeType);
}

/**
 * Returns the indexable descriptors of one dimension of the repo, sorted by
 * document identity.
 */
export function extractDocumentDescriptors(
  repo: Repo,
  dimension: string,
  filter: ContentTreeFilter,
): DocumentDescriptor[] {
  const root = repo[dimension];
  if (!root) {
    throw new DimensionNotFoundError(dimension);
  }

  const descriptors: DocumentDescriptor[] = [];
  for (const node of flattenRepoNodes(root).values()) {
    if (isIndexable(node, filter)) {
      descriptors.push({ documentType: node.mimeType, documentID: node.id });
    }
  }

  return descriptors.sort((a, b) =>
    a.documentID < b.documentID ? -1 : a.documentID > b.documentID ? 1 : 0,
  );
}
