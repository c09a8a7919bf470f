import type { AnnotationSpec, EntityType, PlanData, Predicate, SortKey } from '@sieve/core';

/**
 * Incremental builder of the abstract query handed to a backend. Slicing
 * composes like successive array slices: `start` then `limit` windows the
 * current window.
 */
export class QueryPlan {
  private readonly predicates: Predicate[] = [];
  private readonly sortKeys: SortKey[] = [];
  private readonly annotations: AnnotationSpec[] = [];
  private offset = 0;
  private limit: number | undefined;
  private distinct = false;
  private groups = 0;

  constructor(readonly entity: EntityType) {}

  addPredicate(p: Predicate): this {
    this.predicates.push(p);
    return this;
  }

  // Fragments of one filter field: a related chain must satisfy all of them.
  addFilter(predicates: readonly Predicate[]): this {
    const group = this.groups++;
    for (const p of predicates) this.predicates.push({ ...p, group });
    return this;
  }

  addSort(key: SortKey): this {
    this.sortKeys.push(key);
    return this;
  }

  start(n: number): this {
    this.offset += n;
    if (this.limit !== undefined) this.limit = Math.max(0, this.limit - n);
    return this;
  }

  cap(n: number): this {
    this.limit = this.limit === undefined ? n : Math.min(this.limit, n);
    return this;
  }

  setDistinct(distinct: boolean): this {
    this.distinct = distinct;
    return this;
  }

  annotate(spec: AnnotationSpec): this {
    this.annotations.push(spec);
    return this;
  }

  build(): PlanData {
    return {
      entity: this.entity,
      predicates: [...this.predicates],
      sort: [...this.sortKeys],
      offset: this.offset,
      limit: this.limit,
      distinct: this.distinct,
      annotations: [...this.annotations],
    };
  }
}
