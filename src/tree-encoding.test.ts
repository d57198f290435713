import { expect } from 'chai';
import { Complex } from './complex';
import { TreeShapeError } from './errors';
import * as fenwick from './fenwick-tree';
import { LadderOperatorUnit } from './ladder';
import { bravyiKitaevTerms, encodeOperator, jordanWignerTerms } from './majorana-encoding';
import { PauliRegisterSequence } from './pauli-register';
import {
  EncodingTree,
  LinkLabel,
  allLegs,
  balancedBinaryTree,
  balancedBinaryTreeTerms,
  balancedTernaryTree,
  computeLinks,
  encodeWithTernaryTree,
  fenwickTree,
  linearTree,
  makeTree,
  pairLegs,
  ternaryTreeTerms,
  treeAncestors,
  treeDepth,
  treeDescendants,
  treeEncodingScheme,
} from './tree-encoding';

const { Raise, Lower, Identity } = LadderOperatorUnit;

const terms = (s: PauliRegisterSequence) =>
  s.terms.map((r) => [r.signature, r.coefficient.re, r.coefficient.im]);

const childLists = (t: EncodingTree) =>
  Object.fromEntries(t.nodes.filter((nd) => nd.children.length > 0).map((nd) => [nd.index, nd.children]));

const sorted = (s: ReadonlySet<number>) => [...s].sort((a, b) => a - b);

const children = (entries: [number, number[]][]) => new Map(entries);

function expectTreeCar(tree: EncodingTree) {
  const n = tree.size;
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      const ai = encodeWithTernaryTree(tree, Lower, i, n);
      const ajDag = encodeWithTernaryTree(tree, Raise, j, n);
      const aj = encodeWithTernaryTree(tree, Lower, j, n);
      const mixed = ai.mul(ajDag).add(ajDag.mul(ai));
      const lowers = ai.mul(aj).add(aj.mul(ai));
      if (i === j) {
        expect(mixed.size, `{a_${i}, a†_${j}} on ${n}`).to.equal(1);
        expect(mixed.coefficient('I'.repeat(n)).equals(Complex.ONE)).to.be.true;
      } else {
        expect(mixed.size, `{a_${i}, a†_${j}} on ${n}`).to.equal(0);
      }
      expect(lowers.size).to.equal(0);
    }
  }
}

describe('tree-encoding.ts', () => {
  describe('tree shapes', () => {
    it('should build a linear chain', () => {
      const t = linearTree(4);
      expect(t.root).to.equal(0);
      expect(childLists(t)).to.deep.equal({ 0: [1], 1: [2], 2: [3] });
      expect(treeAncestors(t, 3)).to.deep.equal([2, 1, 0]);
    });

    it('should build balanced binary trees', () => {
      const t4 = balancedBinaryTree(4);
      expect(t4.root).to.equal(1);
      expect(childLists(t4)).to.deep.equal({ 1: [0, 2], 2: [3] });
      const t7 = balancedBinaryTree(7);
      expect(t7.root).to.equal(3);
      expect(t7.nodes[3].children).to.have.length(2);
      expect(treeAncestors(t7, 0)).to.deep.equal([1, 3]);
      const t8 = balancedBinaryTree(8);
      expect(t8.root).to.equal(3);
      expect(childLists(t8)).to.deep.equal({ 3: [1, 5], 1: [0, 2], 5: [4, 6], 6: [7] });
      expect(treeDepth(t8)).to.equal(4);
    });

    it('should build balanced ternary trees', () => {
      const t4 = balancedTernaryTree(4);
      expect(t4.root).to.equal(2);
      expect(childLists(t4)).to.deep.equal({ 2: [0, 1, 3] });
      const t7 = balancedTernaryTree(7);
      expect(t7.root).to.equal(3);
      expect(childLists(t7)).to.deep.equal({ 3: [0, 2, 5], 2: [1], 5: [4, 6] });
      const t8 = balancedTernaryTree(8);
      expect(t8.root).to.equal(4);
      expect(childLists(t8)).to.deep.equal({ 4: [1, 3, 6], 1: [0], 3: [2], 6: [5, 7] });
      expect(treeDepth(t8)).to.equal(3);
    });

    it('should build Fenwick trees for powers of two only', () => {
      const t = fenwickTree(8);
      expect(t.root).to.equal(7);
      expect(childLists(t)).to.deep.equal({ 1: [0], 3: [1, 2], 5: [4], 7: [3, 5, 6] });
      expect(() => fenwickTree(6)).to.throw(TreeShapeError);
      expect(fenwickTree(1).size).to.equal(1);
    });

    it('should list descendants depth first', () => {
      expect(treeDescendants(fenwickTree(8), 7)).to.deep.equal([3, 1, 0, 2, 5, 4, 6]);
    });

    it('should reject malformed trees', () => {
      expect(() => makeTree(children([[0, [1]], [1, []], [2, []]]))).to.throw(TreeShapeError, 'exactly one root');
      expect(() =>
        makeTree(
          children([
            [0, [1, 2]],
            [1, [2]],
            [2, []],
          ])
        )
      ).to.throw(TreeShapeError, 'two parents');
      expect(() => makeTree(children([[0, [5]], [1, []]]))).to.throw(TreeShapeError);
      expect(() =>
        makeTree(
          children([
            [0, []],
            [1, [2]],
            [2, [1]],
          ])
        )
      ).to.throw(TreeShapeError);
    });
  });

  describe('links and legs', () => {
    it('should label edges Z, X, Y in child order and leave legs', () => {
      const links = computeLinks(balancedTernaryTree(4));
      expect(links.get(2)).to.deep.equal([
        { label: LinkLabel.X, target: 1 },
        { label: LinkLabel.Y, target: 3 },
        { label: LinkLabel.Z, target: 0 },
      ]);
      expect(links.get(0)?.every((l) => l.target === undefined)).to.be.true;
    });

    it('should have 2n + 1 legs of which 2n are paired', () => {
      const tree = balancedTernaryTree(7);
      const links = computeLinks(tree);
      expect(allLegs(links)).to.have.length(15);
      const used = new Set(
        [...pairLegs(tree, links).values()].flatMap(([sx, sy]) => [`${sx.node}${sx.label}`, `${sy.node}${sy.label}`])
      );
      expect(used.size).to.equal(14);
    });

    it('should reject nodes with more than three children', () => {
      const tree = makeTree(
        children([
          [0, [1, 2, 3, 4]],
          [1, []],
          [2, []],
          [3, []],
          [4, []],
        ])
      );
      expect(() => computeLinks(tree)).to.throw(TreeShapeError, 'at most 3');
      expect(() => encodeWithTernaryTree(tree, Raise, 0, 5)).to.throw(TreeShapeError);
    });
  });

  describe('encodeWithTernaryTree', () => {
    it('should encode creators on the balanced ternary tree', () => {
      const tree = balancedTernaryTree(4);
      const expected = [
        [['XIZI', 0.5, 0], ['YIZI', 0, -0.5]],
        [['IXXI', 0.5, 0], ['IYXI', 0, -0.5]],
        [['IIYZ', 0, -0.5], ['IZXI', 0.5, 0]],
        [['IIYX', 0.5, 0], ['IIYY', 0, -0.5]],
      ];
      expected.forEach((e, j) =>
        expect(terms(encodeWithTernaryTree(tree, Raise, j, 4)), `mode ${j}`).to.deep.equal(e)
      );
    });

    it('should restrict a larger tree to the first n qubits', () => {
      const encoded = encodeWithTernaryTree(balancedTernaryTree(13), Raise, 1, 4);
      expect(terms(encoded)).to.deep.equal([
        ['IXZI', 0.5, 0],
        ['IYII', 0, -0.5],
      ]);
      expect(encoded.terms.map((r) => r.operators.length)).to.deep.equal([4, 4]);
    });

    it('should encode annihilators with the opposite imaginary sign', () => {
      expect(terms(ternaryTreeTerms(Lower, 0, 4))).to.deep.equal([
        ['XIZI', 0.5, 0],
        ['YIZI', 0, 0.5],
      ]);
    });

    it('should encode creators on the balanced binary tree', () => {
      const expected = [
        [['XZII', 0.5, 0], ['YZII', 0, -0.5]],
        [['IXZZ', 0.5, 0], ['IYII', 0, -0.5]],
        [['IXXI', 0.5, 0], ['IXYI', 0, -0.5]],
        [['IXZX', 0.5, 0], ['IXZY', 0, -0.5]],
      ];
      expected.forEach((e, j) =>
        expect(terms(balancedBinaryTreeTerms(Raise, j, 4)), `mode ${j}`).to.deep.equal(e)
      );
    });

    it('should encode creators on the Fenwick tree', () => {
      const tree = fenwickTree(4);
      const expected = [
        [['XZIZ', 0.5, 0], ['YZIZ', 0, -0.5]],
        [['IXIZ', 0.5, 0], ['IYIZ', 0, -0.5]],
        [['IIXX', 0.5, 0], ['IIYX', 0, -0.5]],
        [['IIIY', 0, -0.5], ['IIZX', 0.5, 0]],
      ];
      expected.forEach((e, j) =>
        expect(terms(encodeWithTernaryTree(tree, Raise, j, 4)), `mode ${j}`).to.deep.equal(e)
      );
    });

    it('should recover Jordan-Wigner on the linear chain', () => {
      for (let n = 1; n <= 6; n++) {
        const tree = linearTree(n);
        for (let j = 0; j < n; j++) {
          for (const op of [Raise, Lower]) {
            expect(encodeWithTernaryTree(tree, op, j, n).equals(jordanWignerTerms(op, j, n))).to.be.true;
          }
        }
      }
    });

    it('should return the empty sequence for Identity or an out-of-range mode', () => {
      const tree = balancedTernaryTree(4);
      expect(encodeWithTernaryTree(tree, Identity, 0, 4).size).to.equal(0);
      expect(encodeWithTernaryTree(tree, Raise, 4, 4).size).to.equal(0);
      expect(ternaryTreeTerms(Raise, 9, 4).size).to.equal(0);
    });

    it('should satisfy the anticommutation relations on every tree shape', () => {
      for (let n = 1; n <= 8; n++) {
        expectTreeCar(linearTree(n));
        expectTreeCar(balancedBinaryTree(n));
        expectTreeCar(balancedTernaryTree(n));
      }
      for (const n of [1, 2, 4, 8]) expectTreeCar(fenwickTree(n));
    });
  });

  describe('treeEncodingScheme', () => {
    it('should reproduce the Bravyi-Kitaev index sets on Fenwick trees', () => {
      for (const n of [2, 4, 8, 16]) {
        const scheme = treeEncodingScheme(fenwickTree(n));
        for (let j = 0; j < n; j++) {
          expect(sorted(scheme.update(j, n)), `U(${j}) on ${n}`).to.deep.equal(sorted(fenwick.updateSet(j, n)));
          expect(sorted(scheme.parity(j)), `P(${j}) on ${n}`).to.deep.equal(sorted(fenwick.paritySet(j)));
          expect(sorted(scheme.occupation(j)), `O(${j}) on ${n}`).to.deep.equal(sorted(fenwick.occupationSet(j)));
        }
      }
    });

    it('should encode like Bravyi-Kitaev on a Fenwick tree', () => {
      const scheme = treeEncodingScheme(fenwickTree(8));
      for (let j = 0; j < 8; j++) {
        expect(encodeOperator(scheme, Raise, j, 8).equals(bravyiKitaevTerms(Raise, j, 8))).to.be.true;
      }
    });
  });
});
