// --------------------
// Schema model
// --------------------
export type ScalarType =
  | 'string'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'datetime';

export interface FieldDescriptor {
  name: string;
  type: ScalarType;
  nullable?: boolean;
  column?: string; // storage column, defaults to name
}

export type Cardinality = 'one' | 'many';

// How a relation is stored:
//   foreignKey: this entity holds `column` pointing at the target's primary key
//   reverse:    the target holds `column` pointing at this entity's primary key
//   junction:   a link table with one column per side
export type RelationLink =
  | { kind: 'foreignKey'; column: string }
  | { kind: 'reverse'; column: string }
  | { kind: 'junction'; table: string; sourceColumn: string; targetColumn: string };

export interface RelationDescriptor {
  name: string;
  target: string;
  cardinality: Cardinality;
  nullable?: boolean;
  link: RelationLink;
}

export interface EntityType {
  name: string;
  table: string;
  primaryKey: string;
  fields: FieldDescriptor[];
  relations: RelationDescriptor[];
}

// entity name -> field names
export type VisibilityList = Record<string, string[]>;

export interface VisibilityRules {
  public?: VisibilityList;
  private?: VisibilityList;
}

export interface SchemaModel {
  version: string;
  entities: EntityType[];
  visibility?: VisibilityRules;
}

export interface SchemaReflection {
  entity(name: string): EntityType | undefined;
  entities(): readonly EntityType[];
  fieldsOf(entity: EntityType): readonly FieldDescriptor[];
  relationsOf(entity: EntityType): readonly RelationDescriptor[];
  primaryKeyOf(entity: EntityType): FieldDescriptor;
  target(relation: RelationDescriptor): EntityType;
  readonly visibility: VisibilityRules;
}

// --------------------
// Values
// --------------------
export type StoredValue = string | number | boolean | Date | null;
export type Key = string | number;

export type ValueKind = 'null' | 'int' | 'float' | 'datetime' | 'string';

export type TypedValue =
  | { kind: 'null'; value: null }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'datetime'; value: Date }
  | { kind: 'string'; value: string };

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonRow = { [key: string]: JsonValue };

// A row as returned by a backend: scalar fields by field name, to-one
// foreign keys by relation name, computed fields by their target name.
export type EntityRow = Record<string, StoredValue>;

// --------------------
// Paths
// --------------------
export interface RelationHop {
  from: EntityType;
  relation: RelationDescriptor;
  to: EntityType;
}

export type PathTerminal =
  | { kind: 'field'; field: FieldDescriptor }
  | { kind: 'relation'; relation: RelationDescriptor; target: EntityType }
  | { kind: 'computed'; name: string };

export type ValueTerminal = Exclude<PathTerminal, { kind: 'relation' }>;

export interface FieldPath {
  raw: string;
  root: EntityType;
  hops: RelationHop[];
  entity: EntityType; // entity owning the terminal segment
  name: string;       // terminal segment
  terminal: PathTerminal;
}

// A path that ends on a comparable value (a relation terminal is
// normalized into one more hop ending on the target's primary key).
export interface ValuePath {
  raw: string;
  root: EntityType;
  hops: RelationHop[];
  entity: EntityType;
  terminal: ValueTerminal;
}

// --------------------
// Plan
// --------------------
export type Modifier =
  | 'none'
  | 'ne'
  | 'gt' | 'gte' | 'lt' | 'lte'
  | 'startswith'
  | 'endswith'
  | 'contains'
  | 'notcontains';

export type Operator =
  | 'exact' | 'iexact'
  | 'gt' | 'gte' | 'lt' | 'lte'
  | 'startswith' | 'istartswith'
  | 'endswith' | 'iendswith'
  | 'contains' | 'icontains';

export interface Predicate {
  path: ValuePath;
  modifier: Modifier;
  operator: Operator;
  value: TypedValue;
  caseSensitive: boolean;
  exclude: boolean;
  group?: number; // fragments of one filter field share a group
}

// Predicates on one path that a single related chain must satisfy together.
export interface Clause {
  path: ValuePath;
  exclude: boolean;
  predicates: Predicate[];
}

export interface SortKey {
  path: ValuePath;
  descending: boolean;
}

export type AggregateFunction = 'max' | 'min' | 'avg' | 'sum' | 'stddev' | 'var' | 'count';

export interface AnnotationSpec {
  name: string;
  path: ValuePath;
  func: AggregateFunction;
  filters: Predicate[];
  delayed: boolean;
}

export interface AggregateSpec {
  name: string;
  path: ValuePath;
  func: AggregateFunction;
}

export interface PlanData {
  entity: EntityType;
  predicates: Predicate[];
  sort: SortKey[];
  offset: number;
  limit?: number; // undefined = unbounded
  distinct: boolean;
  annotations: AnnotationSpec[];
}

// --------------------
// Backend
// --------------------
export interface RelatedRequest {
  root: EntityType;
  hops: RelationHop[];   // root -> joined relation
  anchors: Key[][];      // per parent: keys of root and every intermediate hop
  filters: Predicate[];  // rooted at `root`, bound to the anchor chain
  sort: SortKey[];       // rooted at the joined entity
}

export interface RelatedRow {
  anchor: Key[];
  row: EntityRow;
}

export interface BackendExplain {
  backend: string;
  sql?: string;
  params?: JsonValue[];
  detail?: JsonValue;
}

export interface BackendHealth {
  ok: boolean;
  error?: string;
}

export interface QueryBackend {
  readonly name: string;
  rows(plan: PlanData): Promise<EntityRow[]>;
  count(plan: PlanData): Promise<number>;
  aggregate(plan: PlanData, spec: AggregateSpec): Promise<StoredValue>;
  related(request: RelatedRequest): Promise<RelatedRow[]>;
  relatedKeys(entity: EntityType, relation: RelationDescriptor, keys: Key[]): Promise<Map<string, Key[]>>;
  explain(plan: PlanData): Promise<BackendExplain>;
  health(): Promise<BackendHealth>;
  close?(): Promise<void>;
}

// --------------------
// Caller identity
// --------------------
export interface Principal {
  id: string;
  permissions: string[];
}

export type CapabilityCheck = (user: Principal, entity: EntityType) => boolean;

// --------------------
// Result envelope
// --------------------
export interface QuerySuccess {
  status: true;
  rows?: JsonRow[];
  count?: number;
  time?: number;
  [aggregate: string]: JsonValue | undefined;
}

export interface QueryFailure {
  status: false;
  code: string;
  message: string;
  [detail: string]: JsonValue | undefined;
}

export type QueryResult = QuerySuccess | QueryFailure;
