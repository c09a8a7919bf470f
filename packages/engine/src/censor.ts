import type {
  CapabilityCheck,
  EntityType,
  Principal,
  SchemaReflection,
  VisibilityRules,
} from '@sieve/core';

export interface CensorOptions {
  /** Process-wide rules, usually the schema model's `visibility` block. */
  defaults?: VisibilityRules;
  /** Rules for a single request; they take precedence entity by entity. */
  overrides?: VisibilityRules;
  user?: Principal;
  usePermissions?: boolean;
  canView?: CapabilityCheck;
}

export const defaultCapabilityCheck: CapabilityCheck = (user, entity) =>
  user.permissions.includes(`view:${entity.name}`);

/**
 * Decides which fields of an entity a request may see.
 *
 * For an entity the first list that exists wins: request public, request
 * private, process public, process private. A public list shows only what it
 * names; a private list hides what it names. When permissions are enabled a
 * relation is also hidden unless the user may view its target entity.
 */
export class Censor {
  private readonly defaults: VisibilityRules;
  private readonly overrides: VisibilityRules;
  private readonly user?: Principal;
  private readonly canView?: CapabilityCheck;

  constructor(private readonly schema: SchemaReflection, opts: CensorOptions = {}) {
    if (opts.usePermissions && !opts.user) {
      throw new Error('A user must be provided when permission checking is enabled');
    }
    this.defaults = opts.defaults ?? {};
    this.overrides = opts.overrides ?? {};
    if (opts.usePermissions) {
      this.user = opts.user;
      this.canView = opts.canView ?? defaultCapabilityCheck;
    }
  }

  isVisible(entity: EntityType, name: string): boolean {
    if (!this.listed(entity, name)) return false;
    if (!this.user || !this.canView) return true;
    const relation = this.schema.relationsOf(entity).find((r) => r.name === name);
    if (!relation) return true;
    return this.canView(this.user, this.schema.target(relation));
  }

  censor(entity: EntityType, names: readonly string[]): string[] {
    return names.filter((n) => this.isVisible(entity, n));
  }

  /** Visible scalar fields then visible relations, in declaration order. */
  visibleNames(entity: EntityType): string[] {
    return this.censor(entity, [
      ...this.schema.fieldsOf(entity).map((f) => f.name),
      ...this.schema.relationsOf(entity).map((r) => r.name),
    ]);
  }

  private listed(entity: EntityType, name: string): boolean {
    for (const rules of [this.overrides, this.defaults]) {
      const pub = rules.public?.[entity.name];
      if (pub) return pub.includes(name);
      const priv = rules.private?.[entity.name];
      if (priv) return !priv.includes(name);
    }
    return true;
  }
}
