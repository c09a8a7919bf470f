import { InvalidCommandError } from '@sieve/core';
import { parseAggregate, parseAnnotation, readAnnotationTarget } from './annotations';
import type { QueryContext } from './context';
import { parseJoin } from './joins';

/**
 * A handler for one or more command tags (`c:<tag>`). `apply` receives every
 * value given for its field, already comma-split, in query-string order.
 */
export interface Command {
  readonly tags: readonly string[];
  /** Optional pre-pass run over the whole query before any `apply`. */
  declare?(ctx: QueryContext, field: string, values: string[]): void;
  apply(ctx: QueryContext, field: string, values: string[]): void;
}

function last(field: string, values: string[]): string {
  const v = values[values.length - 1];
  if (v === undefined) throw new InvalidCommandError(field, 'a value is required');
  return v;
}

function flag(field: string, values: string[]): boolean {
  const v = last(field, values);
  if (!/^\d+$/.test(v)) throw new InvalidCommandError(field, `value must be either 0 or 1 (received '${v}')`);
  return Number(v) !== 0;
}

function natural(field: string, values: string[]): number {
  const v = last(field, values);
  if (!/^\d+$/.test(v)) {
    throw new InvalidCommandError(field, `value must be a non-negative integer (received '${v}')`);
  }
  return Number(v);
}

export const caseCommand: Command = {
  tags: ['case'],
  apply(ctx, field, values) {
    ctx.caseSensitive = flag(field, values);
  },
};

export const annotateCommand: Command = {
  tags: ['annotate'],
  declare(ctx, field, values) {
    for (const v of values) {
      const { name, delayed } = readAnnotationTarget(ctx, field, v);
      ctx.declare(field, name, delayed);
    }
  },
  apply(ctx, field, values) {
    for (const v of values) ctx.addAnnotation(parseAnnotation(ctx, field, v));
  },
};

export const distinctCommand: Command = {
  tags: ['distinct'],
  apply(ctx, field, values) {
    ctx.plan.setDistinct(flag(field, values));
  },
};

export const sortCommand: Command = {
  tags: ['sort'],
  apply(ctx, field, values) {
    if (ctx.sliced) throw new InvalidCommandError(field, "cannot be used after 'c:start' or 'c:limit'");
    for (const v of values) {
      const descending = v.startsWith('-');
      const path = ctx.services.resolver.resolveValue(ctx.entity, descending ? v.slice(1) : v, ctx.valueScope());
      ctx.plan.addSort({ path, descending });
    }
  },
};

export const subsetCommand: Command = {
  tags: ['start', 'limit'],
  apply(ctx, field, values) {
    const n = natural(field, values);
    if (field.endsWith('start')) {
      ctx.plan.start(n);
    } else {
      const max = ctx.settings.maxLimit;
      if (max > 0 && n > max) {
        throw new InvalidCommandError(field, `value cannot be higher than '${max}' (received '${n}')`);
      }
      if (n > 0) ctx.plan.cap(n);
      ctx.limitSet = true;
    }
    ctx.sliced = true;
  },
};

export const joinCommand: Command = {
  tags: ['join'],
  apply(ctx, field, values) {
    const defs = values.map((v) => parseJoin(ctx, field, v));
    // shallow joins first so deeper ones extend them
    defs.sort((a, b) => a.hops.length - b.hops.length);
    for (const d of defs) ctx.joins.add(d);
  },
};

export const showCommand: Command = {
  tags: ['show', 'hide'],
  apply(ctx, field, values) {
    const names = values.filter((v) => v !== '');
    for (const n of names) {
      if (n.includes('.')) throw new InvalidCommandError(field, `'${n}' is not a field of '${ctx.entity.name}'`);
      ctx.services.resolver.resolve(ctx.entity, n, ctx.valueScope());
    }
    if (field.endsWith('show')) ctx.show = names;
    else ctx.hide = names;
  },
};

export const aggregateCommand: Command = {
  tags: ['aggregate'],
  apply(ctx, field, values) {
    for (const v of values) ctx.aggregates.push(parseAggregate(ctx, field, v));
  },
};

export const countCommand: Command = {
  tags: ['count'],
  apply(ctx, field, values) {
    ctx.includeCount = flag(field, values);
  },
};

export const timeCommand: Command = {
  tags: ['time'],
  apply(ctx, field, values) {
    ctx.includeTime = flag(field, values);
  },
};

export const evaluateCommand: Command = {
  tags: ['evaluate'],
  apply(ctx, field, values) {
    ctx.evaluate = flag(field, values);
  },
};

/** Every field without the command prefix: one predicate per value, all held by the same related chain. */
export const filteringCommand: Command = {
  tags: [],
  apply(ctx, field, values) {
    if (ctx.sliced) throw new InvalidCommandError(field, "You cannot filter on fields after 'c:start' or 'c:limit'");
    if (ctx.isDelayed(field)) {
      throw new InvalidCommandError(field, `delayed annotation '${field}' cannot be used in a filter`);
    }
    const predicates = ctx.services.filters.compileAll(ctx.entity, field, values, ctx.filterScope());
    ctx.plan.addFilter(predicates);
  },
};

export const DEFAULT_COMMANDS: readonly Command[] = [
  caseCommand,
  annotateCommand,
  distinctCommand,
  sortCommand,
  subsetCommand,
  joinCommand,
  showCommand,
  aggregateCommand,
  countCommand,
  timeCommand,
  evaluateCommand,
];

/**
 * Static tag -> handlers table. Built once at startup; unknown tags are
 * rejected rather than ignored.
 */
export class CommandRegistry {
  private readonly byTag = new Map<string, Command[]>();

  constructor(
    commands: readonly Command[] = DEFAULT_COMMANDS,
    readonly fallback: Command = filteringCommand,
  ) {
    for (const c of commands) {
      for (const tag of c.tags) this.byTag.set(tag, [...(this.byTag.get(tag) ?? []), c]);
    }
  }

  tags(): string[] {
    return [...this.byTag.keys()];
  }

  /** Handlers for a field; `prefix` marks command fields. */
  lookup(field: string, prefix: string): readonly Command[] {
    if (!field.startsWith(prefix)) return [this.fallback];
    const handlers = this.byTag.get(field.slice(prefix.length));
    if (!handlers) {
      throw new InvalidCommandError(
        field,
        `unknown command, valid commands are ${JSON.stringify(this.tags().map((t) => prefix + t))}`,
      );
    }
    return handlers;
  }
}
