import { Complex } from './complex';
import { LogComponent, trace } from './debug-logger';

export interface SortResult<T, A> {
  readonly sorted: T[];
  readonly tracking: A;
}

/**
 * Selection sort that reports, for every selected minimum, how many places
 * it moved to reach the front of the unsorted remainder. `lessOrEqual` is
 * a `<=` comparator; ties go to the first occurrence.
 */
export function swapTrackingSort<T, A>(
  lessOrEqual: (a: T, b: T) => boolean,
  track: (displacement: number, acc: A) => A,
  initial: A,
  items: readonly T[]
): SortResult<T, A> {
  const remaining = [...items];
  const sorted: T[] = [];
  let tracking = initial;
  while (remaining.length > 0) {
    let at = 0;
    for (let i = 1; i < remaining.length; i++) {
      if (!lessOrEqual(remaining[at], remaining[i])) at = i;
    }
    tracking = track(at, tracking);
    sorted.push(...remaining.splice(at, 1));
  }
  trace(LogComponent.SORT, `sorted ${items.length} items`);
  return { sorted, tracking };
}

/** `(-1)^displacement` folded into the running phase. */
export function fermionicTracking(displacement: number, phase: Complex): Complex {
  return displacement % 2 === 0 ? phase : phase.neg();
}

export function bosonicTracking(_displacement: number, phase: Complex): Complex {
  return phase;
}
