import type {
  EntityType,
  FieldDescriptor,
  RelationDescriptor,
  SchemaModel,
  SchemaReflection,
  VisibilityRules,
} from '@sieve/core';
import { SchemaModelSchema } from '@sieve/core';

export class SchemaModelError extends Error {
  override readonly name = 'SchemaModelError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Immutable reflection over a validated schema model. Entities are looked up
 * by name first, then by storage table.
 */
export class SchemaRegistry implements SchemaReflection {
  readonly visibility: VisibilityRules;
  private readonly byName = new Map<string, EntityType>();
  private readonly byTable = new Map<string, EntityType>();
  private readonly pks = new Map<EntityType, FieldDescriptor>();

  constructor(model: SchemaModel) {
    for (const e of model.entities) {
      if (this.byName.has(e.name)) throw new SchemaModelError(`Duplicate entity '${e.name}'`);
      this.byName.set(e.name, e);
      this.byTable.set(e.table, e);
    }

    for (const e of model.entities) {
      const names = new Set<string>();
      for (const n of [...e.fields.map((f) => f.name), ...e.relations.map((r) => r.name)]) {
        if (names.has(n)) throw new SchemaModelError(`Duplicate field '${n}' on '${e.name}'`);
        names.add(n);
      }
      const pk = e.fields.find((f) => f.name === e.primaryKey);
      if (!pk) throw new SchemaModelError(`Primary key '${e.primaryKey}' is not a field of '${e.name}'`);
      this.pks.set(e, pk);
      for (const r of e.relations) {
        if (!this.byName.has(r.target)) {
          throw new SchemaModelError(`Relation '${e.name}.${r.name}' targets unknown entity '${r.target}'`);
        }
      }
    }

    const visibility = model.visibility ?? {};
    for (const list of [visibility.public, visibility.private]) {
      for (const name of Object.keys(list ?? {})) {
        if (!this.byName.has(name)) throw new SchemaModelError(`Visibility rules name unknown entity '${name}'`);
      }
    }
    this.visibility = visibility;
  }

  static fromJSON(raw: unknown): SchemaRegistry {
    return new SchemaRegistry(SchemaModelSchema.parse(raw));
  }

  entity(name: string): EntityType | undefined {
    return this.byName.get(name) ?? this.byTable.get(name);
  }

  entities(): readonly EntityType[] {
    return [...this.byName.values()];
  }

  fieldsOf(entity: EntityType): readonly FieldDescriptor[] {
    return entity.fields;
  }

  relationsOf(entity: EntityType): readonly RelationDescriptor[] {
    return entity.relations;
  }

  primaryKeyOf(entity: EntityType): FieldDescriptor {
    const pk = this.pks.get(entity);
    if (!pk) throw new SchemaModelError(`Entity '${entity.name}' is not registered`);
    return pk;
  }

  target(relation: RelationDescriptor): EntityType {
    const t = this.byName.get(relation.target);
    if (!t) throw new SchemaModelError(`Unknown relation target '${relation.target}'`);
    return t;
  }
}
