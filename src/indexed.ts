/** An operator unit acting on a particular mode or qubit. */
export interface IxOp<Op> {
  readonly index: number;
  readonly op: Op;
}

export enum IndexOrder {
  Ascending = 'Ascending',
  Descending = 'Descending',
}

export function ixOp<Op>(index: number, op: Op): IxOp<Op> {
  if (!Number.isInteger(index) || index < 0)
    throw new RangeError(`Operator index must be a non-negative integer, got ${index}`);
  return { index, op };
}

export function indicesInOrder<Op>(
  order: IndexOrder,
  ops: readonly IxOp<Op>[]
): boolean {
  for (let i = 1; i < ops.length; i++) {
    const prev = ops[i - 1].index;
    const curr = ops[i].index;
    switch (order) {
      case IndexOrder.Ascending:
        if (prev > curr) return false;
        break;
      case IndexOrder.Descending:
        if (prev < curr) return false;
        break;
      default:
        const _exhaustive: never = order;
        throw new Error(`Unknown index order ${_exhaustive}`);
    }
  }
  return true;
}

/** Comparator in the `<=` style expected by the swap-tracking sort. */
export function indexComparator<Op>(
  order: IndexOrder
): (a: IxOp<Op>, b: IxOp<Op>) => boolean {
  return order === IndexOrder.Ascending
    ? (a, b) => a.index <= b.index
    : (a, b) => a.index >= b.index;
}
