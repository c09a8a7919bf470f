import type {
  AggregateSpec,
  AnnotationSpec,
  EngineSettings,
  EntityType,
  SchemaReflection,
} from '@sieve/core';
import { InvalidCommandError } from '@sieve/core';
import type { Censor } from './censor';
import type { FilterCompiler, FilterScope } from './filter';
import { JoinTree } from './joins';
import { QueryPlan } from './plan';
import type { FieldResolver, ResolveScope } from './resolver';

// Shared, immutable collaborators of every request.
export interface EngineServices {
  schema: SchemaReflection;
  settings: EngineSettings;
  resolver: FieldResolver;
  filters: FilterCompiler;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Per-request state mutated by the commands, in query-string order, and read
 * once by the evaluator.
 */
export class QueryContext {
  readonly plan: QueryPlan;
  readonly joins = new JoinTree();
  readonly aggregates: AggregateSpec[] = [];
  readonly deferred: AnnotationSpec[] = [];

  caseSensitive = true;
  evaluate = true;
  includeCount = false;
  includeTime = false;
  sliced = false;
  limitSet = false;
  show?: string[];
  hide?: string[];

  // annotation target name -> delayed
  private readonly declared = new Map<string, boolean>();

  constructor(
    readonly entity: EntityType,
    readonly censor: Censor,
    readonly services: EngineServices,
  ) {
    this.plan = new QueryPlan(entity);
  }

  get settings(): EngineSettings {
    return this.services.settings;
  }

  /** Registers an annotation target name ahead of the main pass. */
  declare(command: string, name: string, delayed: boolean): void {
    if (!IDENTIFIER.test(name)) {
      throw new InvalidCommandError(command, `'to' value isn't a valid identifier ('${name}')`);
    }
    const { schema } = this.services;
    const taken = schema.fieldsOf(this.entity).some((f) => f.name === name)
      || schema.relationsOf(this.entity).some((r) => r.name === name);
    if (taken) {
      throw new InvalidCommandError(command, `'to' value ('${name}') is already used by a field`);
    }
    if (this.declared.has(name)) {
      throw new InvalidCommandError(command, `'to' value ('${name}') is already used by another annotation`);
    }
    this.declared.set(name, delayed);
  }

  isDelayed(name: string): boolean {
    return this.declared.get(name) === true;
  }

  computedNames(): string[] {
    return [...this.declared.keys()];
  }

  immediateNames(): string[] {
    return [...this.declared].filter(([, delayed]) => !delayed).map(([name]) => name);
  }

  /** Scope for top-level filters: only immediate annotations exist before filtering. */
  filterScope(): FilterScope {
    return { censor: this.censor, computed: this.immediateNames(), caseSensitive: this.caseSensitive };
  }

  /** Scope for sort, show/hide and aggregates: every annotation is available. */
  valueScope(): ResolveScope {
    return { censor: this.censor, computed: this.computedNames() };
  }

  /** Scope for paths inside a join or annotation: no computed names. */
  plainScope(): FilterScope {
    return { censor: this.censor, caseSensitive: this.caseSensitive };
  }

  addAnnotation(spec: AnnotationSpec): void {
    if (spec.delayed) this.deferred.push(spec);
    else this.plan.annotate(spec);
  }
}
