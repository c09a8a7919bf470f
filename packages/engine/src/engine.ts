import pino, { type BaseLogger } from 'pino';
import type {
  CapabilityCheck,
  EngineSettings,
  EngineSettingsInput,
  EntityType,
  JsonRow,
  JsonValue,
  Key,
  PlanData,
  Principal,
  QueryBackend,
  QueryFailure,
  QueryResult,
  QuerySuccess,
  SchemaReflection,
  ValuePath,
  VisibilityRules,
} from '@sieve/core';
import { EngineSettingsSchema, isQueryError, UNKNOWN_ERROR_MESSAGE } from '@sieve/core';
import { Censor } from './censor';
import { CommandRegistry } from './commands';
import { QueryContext, type EngineServices } from './context';
import { DEFAULT_FILTER_TABLE, FilterCompiler, type FilterTable } from './filter';
import { groupParams, type QueryParams } from './params';
import { TypeParserRegistry } from './parsers';
import { QueryPlan } from './plan';
import { FieldResolver } from './resolver';
import { RowSerializer, toJson } from './serializer';

// The two levels the engine writes; any pino-compatible logger fits.
export type EngineLogger = Pick<BaseLogger, 'debug' | 'warn'>;

export interface EngineOptions {
  schema: SchemaReflection;
  backend: QueryBackend;
  settings?: EngineSettingsInput;
  parsers?: TypeParserRegistry;
  commands?: CommandRegistry;
  filterTable?: FilterTable;
  logger?: EngineLogger;
}

export interface RequestOptions {
  /** Visibility rules for this request only. */
  visibility?: VisibilityRules;
  user?: Principal;
  usePermissions?: boolean;
  canView?: CapabilityCheck;
  logger?: EngineLogger;
}

export interface ExplainResult {
  status: true;
  entity: string;
  plan: JsonValue;
  backend: JsonValue;
}

const describePath = (p: ValuePath) => p.raw;

export function describePlan(plan: PlanData): JsonValue {
  return {
    entity: plan.entity.name,
    predicates: plan.predicates.map((p) => ({
      field: describePath(p.path),
      operator: p.operator,
      value: toJson(p.value.value),
      exclude: p.exclude,
    })),
    sort: plan.sort.map((s) => ({ field: describePath(s.path), descending: s.descending })),
    offset: plan.offset,
    limit: plan.limit ?? null,
    distinct: plan.distinct,
    annotations: plan.annotations.map((a) => ({
      name: a.name,
      field: describePath(a.path),
      func: a.func,
      filters: a.filters.length,
      delayed: a.delayed,
    })),
  };
}

/**
 * Compiles query strings into plans and evaluates them on a backend. One
 * instance is shared by every request; all per-request state lives in the
 * `QueryContext`.
 */
export class QueryEngine {
  readonly settings: EngineSettings;
  readonly schema: SchemaReflection;
  readonly backend: QueryBackend;
  private readonly services: EngineServices;
  private readonly commands: CommandRegistry;
  private readonly serializer: RowSerializer;
  private readonly logger: EngineLogger;

  constructor(opts: EngineOptions) {
    this.settings = EngineSettingsSchema.parse(opts.settings ?? {});
    this.schema = opts.schema;
    this.backend = opts.backend;
    this.commands = opts.commands ?? new CommandRegistry();
    this.logger = opts.logger ?? pino({ name: 'sieve-engine', level: process.env.LOG_LEVEL ?? 'info' });

    const resolver = new FieldResolver(opts.schema, this.settings.maxDepth);
    this.services = {
      schema: opts.schema,
      settings: this.settings,
      resolver,
      filters: new FilterCompiler(resolver, opts.parsers ?? new TypeParserRegistry(), opts.filterTable ?? DEFAULT_FILTER_TABLE),
    };
    this.serializer = new RowSerializer(opts.schema, opts.backend);
  }

  censor(req: RequestOptions = {}): Censor {
    return new Censor(this.schema, {
      defaults: this.schema.visibility,
      overrides: req.visibility,
      user: req.user,
      usePermissions: req.usePermissions,
      canView: req.canView,
    });
  }

  /** Runs the command pipeline; throws the first query error met. */
  compile(entity: EntityType, params: QueryParams, req: RequestOptions = {}): QueryContext {
    const ctx = new QueryContext(entity, this.censor(req), this.services);
    const prefix = this.settings.commandPrefix;
    const steps = groupParams(params, this.settings.listSeparator)
      .map(([field, values]) => ({ field, values, handlers: this.commands.lookup(field, prefix) }));

    for (const { field, values, handlers } of steps) {
      for (const h of handlers) h.declare?.(ctx, field, values);
    }
    for (const { field, values, handlers } of steps) {
      for (const h of handlers) h.apply(ctx, field, values);
    }
    return ctx;
  }

  /** The finished plan a backend would receive for these parameters. */
  plan(entity: EntityType, params: QueryParams, req: RequestOptions = {}): PlanData {
    return this.finalize(this.compile(entity, params, req));
  }

  async query(entity: EntityType, params: QueryParams, req: RequestOptions = {}): Promise<QueryResult> {
    const log = req.logger ?? this.logger;
    const started = Date.now();
    try {
      const ctx = this.compile(entity, params, req);
      const result = await this.evaluate(ctx, started);
      log.debug(
        { entity: entity.name, backend: this.backend.name, ms: Date.now() - started, rows: result.rows?.length ?? 0 },
        'query-evaluated',
      );
      return result;
    } catch (err) {
      return this.failure(err, log, entity);
    }
  }

  async explain(entity: EntityType, params: QueryParams, req: RequestOptions = {}): Promise<ExplainResult | QueryFailure> {
    const log = req.logger ?? this.logger;
    try {
      const plan = this.plan(entity, params, req);
      const backend = await this.backend.explain(plan);
      return {
        status: true,
        entity: entity.name,
        plan: describePlan(plan),
        backend: {
          backend: backend.backend,
          sql: backend.sql ?? null,
          params: backend.params ?? [],
          detail: backend.detail ?? null,
        },
      };
    } catch (err) {
      return this.failure(err, log, entity);
    }
  }

  /**
   * Serializes one instance outside of a query, exactly as a row of
   * `query()` would render it under the same visibility.
   */
  async serialize(entity: EntityType, key: Key, req: RequestOptions = {}): Promise<JsonRow | null> {
    const censor = this.censor(req);
    const pk = this.schema.primaryKeyOf(entity);
    const plan = new QueryPlan(entity)
      .addPredicate({
        path: { raw: pk.name, root: entity, hops: [], entity, terminal: { kind: 'field', field: pk } },
        modifier: 'none',
        operator: 'exact',
        value: typeof key === 'number' ? { kind: 'int', value: key } : { kind: 'string', value: key },
        caseSensitive: true,
        exclude: false,
      })
      .cap(1)
      .build();
    const rows = await this.backend.rows(plan);
    const [row] = await this.serializer.render({
      root: entity,
      rows,
      visible: censor.visibleNames(entity),
      joins: new Map(),
      censor,
    });
    return row ?? null;
  }

  // Deferred annotations and the default limit, in that order.
  private finalize(ctx: QueryContext): PlanData {
    for (const spec of ctx.deferred) ctx.plan.annotate(spec);
    const { defaultLimit, maxLimit } = this.settings;
    if (!ctx.limitSet && defaultLimit > 0) {
      ctx.plan.cap(maxLimit > 0 ? Math.min(defaultLimit, maxLimit) : defaultLimit);
    }
    return ctx.plan.build();
  }

  private async evaluate(ctx: QueryContext, started: number): Promise<QuerySuccess> {
    const plan = this.finalize(ctx);

    const count = ctx.includeCount ? await this.backend.count(plan) : undefined;
    const aggregates: Array<[string, JsonValue]> = [];
    for (const spec of ctx.aggregates) {
      aggregates.push([spec.name, toJson(await this.backend.aggregate(plan, spec))]);
    }

    const result: QuerySuccess = { status: true };
    if (ctx.evaluate) {
      result.rows = await this.serializer.render({
        root: ctx.entity,
        rows: await this.backend.rows(plan),
        visible: this.visible(ctx),
        joins: ctx.joins.roots,
        censor: ctx.censor,
      });
    }
    if (count !== undefined) result.count = count;
    if (ctx.includeTime) result.time = (Date.now() - started) / 1000;
    for (const [name, value] of aggregates) result[name] = value;
    return result;
  }

  // Root fields to render: `c:show` wins over `c:hide`; annotations are
  // always shown unless hidden.
  private visible(ctx: QueryContext): string[] {
    const declared = ctx.censor.visibleNames(ctx.entity);
    const computed = ctx.computedNames();
    if (ctx.show) {
      const show = ctx.show;
      return [...declared.filter((n) => show.includes(n)), ...computed];
    }
    const hide = ctx.hide ?? [];
    return [...declared, ...computed].filter((n) => !hide.includes(n));
  }

  private failure(err: unknown, log: EngineLogger, entity: EntityType): QueryFailure {
    if (isQueryError(err)) {
      return { ...err.details(), status: false, code: err.code, message: err.message };
    }
    log.warn({ err, entity: entity.name }, 'query-failed');
    return { status: false, code: 'UNKNOWN', message: UNKNOWN_ERROR_MESSAGE };
  }
}

export function createEngine(opts: EngineOptions): QueryEngine {
  return new QueryEngine(opts);
}
