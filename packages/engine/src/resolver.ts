import type {
  EntityType,
  FieldDescriptor,
  FieldPath,
  PathTerminal,
  RelationDescriptor,
  RelationHop,
  SchemaReflection,
  ValuePath,
} from '@sieve/core';
import { FieldDepthError, NotARelatedFieldError, UnknownFieldError } from '@sieve/core';
import type { Censor } from './censor';

export interface ResolveScope {
  censor: Censor;
  /** Computed names usable as the first (and only) segment of a path. */
  computed?: readonly string[];
}

export type RelationPath = FieldPath & {
  terminal: { kind: 'relation'; relation: RelationDescriptor; target: EntityType };
};

/**
 * Walks dotted paths (`region.continent.name`) over the schema. Every segment
 * must be declared and visible; only relations may be traversed.
 */
export class FieldResolver {
  constructor(
    private readonly schema: SchemaReflection,
    readonly maxDepth: number,
  ) {}

  resolve(root: EntityType, raw: string, scope: ResolveScope): FieldPath {
    const segments = raw.split('.');
    if (segments.length - 1 > this.maxDepth) throw new FieldDepthError(raw, this.maxDepth);

    const computed = scope.computed ?? [];
    const hops: RelationHop[] = [];
    let entity = root;

    for (const [i, name] of segments.entries()) {
      const last = i === segments.length - 1;
      const field = this.schema.fieldsOf(entity).find((f) => f.name === name);
      const relation = this.schema.relationsOf(entity).find((r) => r.name === name);

      if (!field && !relation && i === 0 && computed.includes(name)) {
        if (!last) throw new NotARelatedFieldError(name, entity.name, this.relatedNames(entity, scope));
        return { raw, root, hops, entity, name, terminal: { kind: 'computed', name } };
      }

      if ((!field && !relation) || !scope.censor.isVisible(entity, name)) {
        const valid = scope.censor.visibleNames(entity);
        throw new UnknownFieldError(name, entity.name, i === 0 ? [...valid, ...computed] : valid);
      }

      if (last && relation) {
        const terminal: PathTerminal = { kind: 'relation', relation, target: this.schema.target(relation) };
        return { raw, root, hops, entity, name, terminal };
      }
      if (last && field) return { raw, root, hops, entity, name, terminal: { kind: 'field', field } };

      if (!relation) throw new NotARelatedFieldError(name, entity.name, this.relatedNames(entity, scope));
      const to = this.schema.target(relation);
      hops.push({ from: entity, relation, to });
      entity = to;
    }

    // split() always yields at least one segment
    throw new UnknownFieldError(raw, root.name, scope.censor.visibleNames(root));
  }

  /**
   * Resolves a path ending on a comparable value. A relation implies its
   * primary key; a to-one foreign key is read from its own column, so a NULL
   * key still matches an empty value.
   */
  resolveValue(root: EntityType, raw: string, scope: ResolveScope): ValuePath {
    const p = this.resolve(root, raw, scope);
    if (p.terminal.kind !== 'relation') {
      return { raw, root, hops: p.hops, entity: p.entity, terminal: p.terminal };
    }
    const { relation, target } = p.terminal;
    if (relation.link.kind === 'foreignKey') {
      const field: FieldDescriptor = {
        name: relation.name,
        type: this.schema.primaryKeyOf(target).type,
        nullable: relation.nullable ?? false,
        column: relation.link.column,
      };
      return { raw, root, hops: p.hops, entity: p.entity, terminal: { kind: 'field', field } };
    }
    return {
      raw,
      root,
      hops: [...p.hops, { from: p.entity, relation, to: target }],
      entity: target,
      terminal: { kind: 'field', field: this.schema.primaryKeyOf(target) },
    };
  }

  /** Resolves a path that must end on a relation, as joins need. */
  resolveRelation(root: EntityType, raw: string, scope: ResolveScope): RelationPath {
    const p = this.resolve(root, raw, { censor: scope.censor });
    const terminal = p.terminal;
    if (terminal.kind !== 'relation') {
      throw new NotARelatedFieldError(p.name, p.entity.name, this.relatedNames(p.entity, scope));
    }
    return { ...p, terminal };
  }

  private relatedNames(entity: EntityType, scope: ResolveScope): string[] {
    return scope.censor.censor(entity, this.schema.relationsOf(entity).map((r) => r.name));
  }
}
