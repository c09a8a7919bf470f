import type { AggregateFunction, AggregateSpec, AnnotationSpec, Predicate } from '@sieve/core';
import { InvalidCommandError } from '@sieve/core';
import type { QueryContext } from './context';
import { lastOf, parseSubquery } from './subquery';

export const AGGREGATE_FUNCTIONS: readonly AggregateFunction[] = [
  'max', 'min', 'avg', 'sum', 'stddev', 'var', 'count',
];

// Envelope keys an aggregate cannot be stored under.
const RESERVED_KEYS = new Set(['status', 'rows', 'count', 'time']);
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const ANNOTATE_KEYS = ['field', 'to', 'func', 'filters', 'delayed'];
const AGGREGATE_KEYS = ['field', 'to', 'func'];

function isAggregateFunction(v: string): v is AggregateFunction {
  return AGGREGATE_FUNCTIONS.some((f) => f === v);
}

function subquery(ctx: QueryContext, command: string, value: string, allowed: string[]) {
  const args = parseSubquery(value, {
    command,
    fieldSeparator: ctx.settings.fieldSeparator,
    valueSeparator: ctx.settings.valueSeparator,
  });
  for (const key of args.keys()) {
    if (!allowed.includes(key)) {
      throw new InvalidCommandError(command, `unknown argument '${key}', valid arguments are ${JSON.stringify(allowed)}`);
    }
  }
  return args;
}

function required(args: ReadonlyMap<string, string[]>, key: string, command: string): string {
  const v = lastOf(args, key);
  if (v === undefined || v === '') throw new InvalidCommandError(command, `'${key}' argument is missing`);
  return v;
}

function func(args: ReadonlyMap<string, string[]>, command: string): AggregateFunction {
  const f = required(args, 'func', command);
  if (!isAggregateFunction(f)) {
    throw new InvalidCommandError(
      command,
      `Unknown function '${f}', valid functions are ${JSON.stringify(AGGREGATE_FUNCTIONS)}`,
    );
  }
  return f;
}

function delayedFlag(args: ReadonlyMap<string, string[]>, command: string): boolean {
  const v = lastOf(args, 'delayed') ?? '0';
  if (!/^\d+$/.test(v)) {
    throw new InvalidCommandError(command, `'delayed' value must be either 0 or 1 (received '${v}')`);
  }
  return Number(v) !== 0;
}

/** Reads only the target name and phase, for the declaration pre-pass. */
export function readAnnotationTarget(ctx: QueryContext, command: string, value: string) {
  const args = subquery(ctx, command, value, ANNOTATE_KEYS);
  return { name: required(args, 'to', command), delayed: delayedFlag(args, command) };
}

/** Compiles `field=value` filters scoped to the query's root entity. */
export function scopedFilters(ctx: QueryContext, command: string, tokens: readonly string[]): Predicate[] {
  const { filters } = ctx.services;
  return tokens.filter((t) => t !== '').map((token) => {
    const eq = token.indexOf('=');
    if (eq < 0) {
      throw new InvalidCommandError(command, `filters must contain an equal '=' (received '${token}')`);
    }
    return filters.compile(ctx.entity, token.slice(0, eq), token.slice(eq + 1), ctx.plainScope());
  });
}

export function parseAnnotation(ctx: QueryContext, command: string, value: string): AnnotationSpec {
  const args = subquery(ctx, command, value, ANNOTATE_KEYS);
  const path = ctx.services.resolver.resolveValue(ctx.entity, required(args, 'field', command), ctx.plainScope());
  return {
    name: required(args, 'to', command),
    path,
    func: func(args, command),
    filters: scopedFilters(ctx, command, args.get('filters') ?? []),
    delayed: delayedFlag(args, command),
  };
}

export function parseAggregate(ctx: QueryContext, command: string, value: string): AggregateSpec {
  const args = subquery(ctx, command, value, AGGREGATE_KEYS);
  const path = ctx.services.resolver.resolveValue(ctx.entity, required(args, 'field', command), ctx.valueScope());
  const f = func(args, command);
  const name = required(args, 'to', command);

  if (!IDENTIFIER.test(name)) {
    throw new InvalidCommandError(command, `'to' value isn't a valid identifier ('${name}')`);
  }
  const { schema } = ctx.services;
  const taken = RESERVED_KEYS.has(name)
    || ctx.computedNames().includes(name)
    || ctx.aggregates.some((a) => a.name === name)
    || schema.fieldsOf(ctx.entity).some((fd) => fd.name === name)
    || schema.relationsOf(ctx.entity).some((r) => r.name === name);
  if (taken) throw new InvalidCommandError(command, `'to' value ('${name}') is already used`);

  return { name, path, func: f };
}
