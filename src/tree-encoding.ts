import { LogComponent, debug, trace } from './debug-logger';
import { TreeShapeError } from './errors';
import { lsb } from './fenwick-tree';
import { LadderOperatorUnit } from './ladder';
import { EncodingScheme, ladderFromMajoranas } from './majorana-encoding';
import { Pauli } from './pauli';
import { PauliRegister, PauliRegisterSequence } from './pauli-register';

/**
 * Node of an arena-allocated tree: children and parent are indices into
 * `EncodingTree.nodes`, and `nodes[i].index === i`.
 */
export interface TreeNode {
  readonly index: number;
  readonly children: readonly number[];
  readonly parent: number | undefined;
}

export interface EncodingTree {
  readonly root: number;
  readonly nodes: readonly TreeNode[];
  readonly size: number;
}

export enum LinkLabel {
  X = 'X',
  Y = 'Y',
  Z = 'Z',
}

/** A descending link; a link without a target is a leg. */
export interface Link {
  readonly label: LinkLabel;
  readonly target: number | undefined;
}

export interface LegId {
  readonly node: number;
  readonly label: LinkLabel;
}

export type TreeLinks = ReadonlyMap<number, readonly Link[]>;

// Edges take labels in this order; the remaining labels become legs.
const EDGE_LABELS = [LinkLabel.Z, LinkLabel.X, LinkLabel.Y] as const;

const LINK_ORDER = [LinkLabel.X, LinkLabel.Y, LinkLabel.Z] as const;

function labelToPauli(label: LinkLabel): Pauli {
  switch (label) {
    case LinkLabel.X:
      return Pauli.X;
    case LinkLabel.Y:
      return Pauli.Y;
    case LinkLabel.Z:
      return Pauli.Z;
    default:
      const _exhaustive: never = label;
      throw new Error(`Unknown link label ${_exhaustive}`);
  }
}

/**
 * Builds a tree from a child list per node. Every index `0..size-1` must
 * appear exactly once and exactly one node may be parentless.
 */
export function makeTree(children: ReadonlyMap<number, readonly number[]>): EncodingTree {
  const size = children.size;
  const parent = new Map<number, number>();
  for (const [node, cs] of children) {
    if (!Number.isInteger(node) || node < 0 || node >= size)
      throw new TreeShapeError(`Node index ${node} outside 0..${size - 1}`, node);
    for (const c of cs) {
      if (!children.has(c)) throw new TreeShapeError(`Child ${c} of ${node} is not a node`, c);
      if (parent.has(c)) throw new TreeShapeError(`Node ${c} has two parents`, c);
      parent.set(c, node);
    }
  }
  const roots = [...children.keys()].filter((k) => !parent.has(k));
  if (roots.length !== 1)
    throw new TreeShapeError(`Expected exactly one root, found ${roots.length}`);
  const nodes: TreeNode[] = [];
  for (let i = 0; i < size; i++) {
    nodes.push({ index: i, children: children.get(i) ?? [], parent: parent.get(i) });
  }
  const root = roots[0];
  const reached = [root];
  for (let i = 0; i < reached.length; i++) reached.push(...(children.get(reached[i]) ?? []));
  if (reached.length !== size) throw new TreeShapeError(`Nodes unreachable from root ${root}`, root);
  debug(LogComponent.TREE, `built tree of ${size} nodes rooted at ${root}`);
  return { root, nodes, size };
}

function nodeAt(tree: EncodingTree, j: number): TreeNode {
  const node = tree.nodes[j];
  if (node === undefined) throw new RangeError(`Node ${j} is not in a tree of size ${tree.size}`);
  return node;
}

/** Ancestors of `j`, nearest first. */
export function treeAncestors(tree: EncodingTree, j: number): number[] {
  const out: number[] = [];
  for (let p = nodeAt(tree, j).parent; p !== undefined; p = nodeAt(tree, p).parent) out.push(p);
  return out;
}

export function treeChildren(tree: EncodingTree, j: number): number[] {
  return [...nodeAt(tree, j).children];
}

/** All descendants of `j` in depth-first pre-order. */
export function treeDescendants(tree: EncodingTree, j: number): number[] {
  return nodeAt(tree, j).children.flatMap((c) => [c, ...treeDescendants(tree, c)]);
}

export function treeDepth(tree: EncodingTree): number {
  let depth = 0;
  for (let j = 0; j < tree.size; j++) depth = Math.max(depth, treeAncestors(tree, j).length + 1);
  return depth;
}

/**
 * Index-set encoding read off a tree: update = ancestors, parity = children
 * plus the lower-indexed siblings of ancestors, occupation = `j` and its
 * children. Matches Bravyi-Kitaev on Fenwick trees; for other shapes use
 * the path-based `encodeWithTernaryTree`.
 */
export function treeEncodingScheme(tree: EncodingTree): EncodingScheme {
  const remainder = (j: number): number[] => {
    const up = treeAncestors(tree, j);
    const onPath = new Set(up);
    return up.flatMap((a) => nodeAt(tree, a).children.filter((c) => c < j && !onPath.has(c)));
  };
  return {
    update: (j) => new Set(treeAncestors(tree, j)),
    parity: (j) => new Set([...remainder(j), ...treeChildren(tree, j)]),
    occupation: (j) => new Set([j, ...treeChildren(tree, j)]),
  };
}

export function computeLinks(tree: EncodingTree): TreeLinks {
  const links = new Map<number, Link[]>();
  for (const node of tree.nodes) {
    if (node.children.length > EDGE_LABELS.length)
      throw new TreeShapeError(
        `Node ${node.index} has ${node.children.length} children; at most 3 are supported`,
        node.index
      );
    const targets = new Map<LinkLabel, number>();
    node.children.forEach((c, i) => targets.set(EDGE_LABELS[i], c));
    links.set(
      node.index,
      LINK_ORDER.map((label) => ({ label, target: targets.get(label) }))
    );
  }
  return links;
}

function linkOf(links: TreeLinks, node: number, label: LinkLabel): Link {
  const link = links.get(node)?.find((l) => l.label === label);
  if (link === undefined) throw new RangeError(`Node ${node} has no ${label} link`);
  return link;
}

export function allLegs(links: TreeLinks): LegId[] {
  const legs: LegId[] = [];
  for (const [node, ls] of [...links.entries()].sort(([a], [b]) => a - b)) {
    for (const l of ls) if (l.target === undefined) legs.push({ node, label: l.label });
  }
  return legs;
}

/**
 * Pauli string of a leg: the edge label at every step of the root-to-node
 * path, then the leg's own label at the node.
 */
export function majoranaStringForLeg(
  tree: EncodingTree,
  links: TreeLinks,
  leg: LegId,
  n: number
): PauliRegister {
  const path = [...treeAncestors(tree, leg.node).reverse(), leg.node];
  const assignments: [number, Pauli][] = [];
  for (let i = 0; i + 1 < path.length; i++) {
    const from = path[i];
    const to = path[i + 1];
    const edge = links.get(from)?.find((l) => l.target === to);
    if (edge === undefined) throw new TreeShapeError(`No edge from ${from} to ${to}`, from);
    assignments.push([from, labelToPauli(edge.label)]);
  }
  assignments.push([leg.node, labelToPauli(leg.label)]);
  return PauliRegister.fromAssignments(n, assignments);
}

function followToLeg(links: TreeLinks, start: number, label: LinkLabel): LegId {
  const link = linkOf(links, start, label);
  if (link.target === undefined) return { node: start, label };
  let node = link.target;
  for (;;) {
    const z = linkOf(links, node, LinkLabel.Z);
    if (z.target === undefined) return { node, label: LinkLabel.Z };
    node = z.target;
  }
}

/**
 * Assigns each mode the two legs reached by following its X and Y links
 * and then descending Z links.
 */
export function pairLegs(tree: EncodingTree, links: TreeLinks): Map<number, [LegId, LegId]> {
  const pairs = new Map<number, [LegId, LegId]>();
  for (const node of tree.nodes) {
    pairs.set(node.index, [
      followToLeg(links, node.index, LinkLabel.X),
      followToLeg(links, node.index, LinkLabel.Y),
    ]);
  }
  return pairs;
}

/**
 * Path-based encoding of one ladder operator on an arbitrary tree. Nodes at
 * or beyond `n` do not appear in the `n`-qubit result.
 */
export function encodeWithTernaryTree(
  tree: EncodingTree,
  op: LadderOperatorUnit,
  j: number,
  n: number
): PauliRegisterSequence {
  if (op === LadderOperatorUnit.Identity || j >= n || j >= tree.size)
    return PauliRegisterSequence.EMPTY;
  const links = computeLinks(tree);
  const pair = pairLegs(tree, links).get(j);
  if (pair === undefined) return PauliRegisterSequence.EMPTY;
  const [sx, sy] = pair;
  trace(LogComponent.TREE, `mode ${j} legs (${sx.node},${sx.label}) (${sy.node},${sy.label})`);
  return ladderFromMajoranas(
    op,
    majoranaStringForLeg(tree, links, sx, n),
    majoranaStringForLeg(tree, links, sy, n)
  );
}

// Tree shapes

function childMap(size: number): Map<number, number[]> {
  const m = new Map<number, number[]>();
  for (let i = 0; i < size; i++) m.set(i, []);
  return m;
}

export function linearTree(n: number): EncodingTree {
  const children = childMap(n);
  for (let i = 0; i + 1 < n; i++) children.set(i, [i + 1]);
  return makeTree(children);
}

export function balancedBinaryTree(n: number): EncodingTree {
  const children = childMap(n);
  const build = (lo: number, hi: number): number | undefined => {
    if (lo > hi) return undefined;
    const mid = Math.floor((lo + hi) / 2);
    const kids = [build(lo, mid - 1), build(mid + 1, hi)];
    children.set(
      mid,
      kids.filter((k): k is number => k !== undefined)
    );
    return mid;
  };
  build(0, n - 1);
  return makeTree(children);
}

/**
 * Root is the median; the indices before it split into two parts and the
 * indices after it form the third.
 */
export function balancedTernaryTree(n: number): EncodingTree {
  const children = childMap(n);
  const build = (indices: number[]): number => {
    const mid = Math.floor(indices.length / 2);
    const root = indices[mid];
    const before = indices.slice(0, mid);
    const after = indices.slice(mid + 1);
    const split = Math.floor(before.length / 2);
    const parts = [before.slice(0, split), before.slice(split), after].filter((p) => p.length > 0);
    children.set(root, parts.map(build));
    return root;
  };
  if (n > 0) build(Array.from({ length: n }, (_, i) => i));
  return makeTree(children);
}

/**
 * The Fenwick tree on `n` modes, parent of 1-based `k` being `k + lsb(k)`.
 * It is a single tree only when `n` is a power of two.
 */
export function fenwickTree(n: number): EncodingTree {
  if (n < 1 || (n & (n - 1)) !== 0)
    throw new TreeShapeError(`Fenwick tree needs a power-of-two size, got ${n}`);
  const children = childMap(n);
  for (let k = 1; k < n; k++) {
    const p = k + lsb(k);
    if (p <= n) children.get(p - 1)?.push(k - 1);
  }
  return makeTree(children);
}

/**
 * Returns an encoder that builds one tree per mode count and reuses it.
 */
export function cachedTreeEncoder(
  shape: (n: number) => EncodingTree
): (op: LadderOperatorUnit, j: number, n: number) => PauliRegisterSequence {
  const cache = new Map<number, EncodingTree>();
  return (op, j, n) => {
    if (op === LadderOperatorUnit.Identity || j >= n) return PauliRegisterSequence.EMPTY;
    let tree = cache.get(n);
    if (tree === undefined) {
      tree = shape(n);
      cache.set(n, tree);
    }
    return encodeWithTernaryTree(tree, op, j, n);
  };
}

export const ternaryTreeTerms = cachedTreeEncoder(balancedTernaryTree);
export const balancedBinaryTreeTerms = cachedTreeEncoder(balancedBinaryTree);
export const linearTreeTerms = cachedTreeEncoder(linearTree);
export const fenwickTreeTerms = cachedTreeEncoder(fenwickTree);
