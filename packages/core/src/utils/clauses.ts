import type { Clause, Predicate } from '../types';

/**
 * Folds the non-excluding predicates of each group into one clause. Excluding
 * and ungrouped predicates stay clauses of their own.
 */
export function clausesOf(predicates: readonly Predicate[]): Clause[] {
  const out: Clause[] = [];
  const open = new Map<number, Clause>();
  for (const p of predicates) {
    const clause = p.exclude || p.group === undefined ? undefined : open.get(p.group);
    if (clause) {
      clause.predicates.push(p);
      continue;
    }
    const fresh: Clause = { path: p.path, exclude: p.exclude, predicates: [p] };
    if (!p.exclude && p.group !== undefined) open.set(p.group, fresh);
    out.push(fresh);
  }
  return out;
}
