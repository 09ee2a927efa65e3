/**
 * dtoshape runtime - the projection marker
 *
 * `selectExpr` is what projection code calls. It applies the selector in
 * memory so code runs and type-checks before anything is generated; the
 * generator reads its call sites, and the generated mapping functions
 * replace it where a typed DTO is wanted.
 */

/**
 * Values a projection reads from its enclosing scope
 */
export type Captures = Readonly<Record<string, unknown>>;

/**
 * Project every element of `source`.
 *
 * The second type argument names the DTO a caller wants emitted under a
 * fixed name: `selectExpr<Sample, SampleRow>(samples, (s) => ({ ... }))`.
 * `captures` lists the outer values the selector uses; the generator checks
 * it against what the selector actually references.
 */
export const selectExpr = <T, R = unknown>(
  source: Iterable<T>,
  selector: (item: T) => R,
  _captures?: Captures
): R[] => Array.from(source, (item) => selector(item));
