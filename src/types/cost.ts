/**
 * Compile-time algorithmic cost brands.
 *
 * Values handed back to callers carry the cost level of the operation that
 * produced them. A cheaper value widens to a dearer level, never the reverse:
 *
 * ```typescript
 * const n: LinearCost<number> = array.size(); // ok, O(1) <= O(n)
 * const v: ConstCost<readonly number[]> = array.toArray(); // type error
 * ```
 *
 * Plans start from `$cost(value)`, go through combinators that raise their
 * level, and are checked against a ceiling by `$`.
 */

declare const costLevel: unique symbol;

/**
 * Cost levels, cheapest first.
 */
type Levels = ['const', 'log', 'linear', 'nlogn', 'quad'];

export type CostLabel = Levels[number];

export type CostBigO = 'O(1)' | 'O(log n)' | 'O(n)' | 'O(n log n)' | 'O(n^2)';

interface BigOLabels {
  'O(1)': 'const';
  'O(log n)': 'log';
  'O(n)': 'linear';
  'O(n log n)': 'nlogn';
  'O(n^2)': 'quad';
}

type CostInput = CostLabel | CostBigO;

type ToLabel<L extends CostInput> = L extends CostBigO ? BigOLabels[L] : L;

/**
 * Every level at or below `L`.
 */
type UpTo<L extends CostLabel, Rest extends CostLabel[] = Levels> =
  Rest extends [infer Head extends CostLabel, ...infer Tail extends CostLabel[]]
    ? Head extends L
      ? Head
      : Head | UpTo<L, Tail>
    : never;

/** The dearer of two levels. */
type Seq<A extends CostLabel, B extends CostLabel> = A extends UpTo<B> ? B : A;

type Within<C extends CostLabel, L extends CostInput> =
  C extends UpTo<ToLabel<L>> ? unknown : never;

/**
 * A value produced at cost level `Level` or cheaper.
 */
export type Costed<Level extends CostLabel, T> = T & { readonly [costLevel]: UpTo<Level> };

/** Value from an O(1) operation. */
export type ConstCost<T> = Costed<'const', T>;
/** Value from an O(n) operation. */
export type LinearCost<T> = Costed<'linear', T>;

// =============================================================================
// Plans
// =============================================================================

/**
 * A value tagged with the modeled cost of computing it. `_cost` is phantom.
 */
export type Ctx<C extends CostLabel, T> = { readonly _cost: C; readonly value: T };

const checkedPlanTag = Symbol('checked-cost-plan');

/**
 * Deferred plan whose cost `$` checks before running it.
 */
export type CheckedPlan<C extends CostLabel, T> = {
  readonly [checkedPlanTag]: true;
  readonly run: () => Ctx<C, T>;
};

export function $checked<C extends CostLabel, T>(run: () => Ctx<C, T>): CheckedPlan<C, T> {
  return { [checkedPlanTag]: true, run };
}

/**
 * Start a plan at O(1).
 */
export const $cost = <T>(value: T): Ctx<'const', T> => ({ value } as Ctx<'const', T>);

/**
 * Brand the result of a plan, rejecting at compile time any plan dearer
 * than `max`.
 */
export function $<L extends CostInput, C extends CostLabel, T>(
  max: L,
  plan: CheckedPlan<C, T> & Within<C, L>
): Costed<ToLabel<L>, T>;
export function $<L extends CostInput, C extends CostLabel, T>(
  max: L,
  ctx: Ctx<C, T> & Within<C, L>
): Costed<ToLabel<L>, T>;
export function $(
  _max: CostInput,
  boundary: CheckedPlan<CostLabel, unknown> | Ctx<CostLabel, unknown>
): unknown {
  return checkedPlanTag in boundary ? boundary.run().value : boundary.value;
}

// =============================================================================
// Linear Combinators
// =============================================================================

/**
 * Copy of the first `end` elements.
 * Holes read as `undefined`, so `end` must stay within the filled prefix.
 */
export const $prefix =
  (end: number) =>
  <E, C extends CostLabel>(c: Ctx<C, readonly E[]>): Ctx<Seq<C, 'linear'>, E[]> =>
    ({ value: c.value.slice(0, end) } as Ctx<Seq<C, 'linear'>, E[]>);

/**
 * Index of the first element in [0, end) matching `pred`, or -1.
 */
export const $linearFindIndex =
  <E>(pred: (e: E) => boolean, end: number) =>
  <C extends CostLabel>(c: Ctx<C, readonly E[]>): Ctx<Seq<C, 'linear'>, number> => {
    const limit = Math.min(end, c.value.length);
    let found = -1;
    for (let i = 0; i < limit && found < 0; i++) {
      if (pred(c.value[i])) found = i;
    }
    return { value: found } as Ctx<Seq<C, 'linear'>, number>;
  };
