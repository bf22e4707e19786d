/**
 * Entity Descriptions
 *
 * Declarative per-entity and per-member annotations read by the
 * SchemaModelBuilder. Descriptions can be written by hand, generated, or
 * produced by reflection; the builder only reads these fields.
 */

import { DefaultValue, ReferentialAction } from './schema-model';

/**
 * Underlying type of an entity member, before mapping to a column type.
 */
export type MemberType =
  | 'int'
  | 'long'
  | 'bool'
  | 'date'
  | 'dateOffset'
  | 'uuid'
  | 'decimal'
  | 'double'
  | 'float'
  | 'string'
  | 'bytes';

export interface TableAnnotation {
  name: string;
  schema?: string;
}

export interface CheckAnnotation {
  expression: string;
  name?: string;
}

export interface PrimaryKeyAnnotation {
  /** Position of the member inside a composite key. Defaults to 0. */
  order?: number;
  name?: string;
}

export interface UniqueAnnotation {
  /** Group name; members sharing it form one constraint, `UQ_<name>`. */
  name: string;
  order?: number;
}

export interface IndexAnnotation {
  /** Index name; members sharing it form one composite index. */
  name: string;
  order?: number;
  isUnique?: boolean;
}

export type EntityReference = EntityDescription | (() => EntityDescription);

export interface ForeignKeyAnnotation {
  entity: EntityReference;
  member: string;
  name?: string;
  onDelete?: ReferentialAction;
  onUpdate?: ReferentialAction;
}

export interface IncrementalKeyAnnotation {
  sequenceName?: string;
  startWith?: number;
  incrementBy?: number;
}

export interface PrecisionAnnotation {
  precision: number;
  scale: number;
}

export interface MemberDescription {
  name: string;
  type: MemberType;
  column?: string;
  ignore?: boolean;
  json?: boolean;
  notNull?: boolean;
  maxLength?: number;
  fixedLength?: number;
  /** Alias of `fixedLength`. */
  length?: number;
  precision?: PrecisionAnnotation;
  primaryKey?: PrimaryKeyAnnotation;
  unique?: UniqueAnnotation[];
  indexes?: IndexAnnotation[];
  checks?: CheckAnnotation[];
  foreignKey?: ForeignKeyAnnotation;
  incrementalKey?: IncrementalKeyAnnotation;
  defaultValue?: DefaultValue;
}

export interface EntityDescription {
  name: string;
  table?: TableAnnotation;
  checks?: CheckAnnotation[];
  members: MemberDescription[];
}

export function defineEntity<T extends EntityDescription>(description: T): T {
  return description;
}

export function resolveEntityReference(reference: EntityReference): EntityDescription {
  return typeof reference === 'function' ? reference() : reference;
}

export function isEntityDescription(value: unknown): value is EntityDescription {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'members' in value &&
    Array.isArray(value.members)
  );
}
