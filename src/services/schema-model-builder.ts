/**
 * Schema Model Builder
 *
 * Reads entity descriptions and produces a SchemaModel: schema and table
 * names, columns (name, type, nullability, size, precision, identity),
 * primary keys, unique groups, checks and foreign keys.
 *
 * Misused annotations fail fast with a ModelBuildError naming the entity
 * and member; nothing is silently ignored.
 */

import { ColumnType, ColumnTypes } from '../models/column-type';
import {
  EntityDescription,
  MemberDescription,
  isEntityDescription,
  resolveEntityReference,
} from '../models/entity-description';
import { DbColumn, DbTable, ReferentialAction, SchemaModel } from '../models/schema-model';
import { getConfig } from '../lib/environment-config';
import { getLogger, ModelBuildError } from '../lib/error-handler';
import { DefaultTypeMapper, TypeMapper } from '../lib/type-mapper';

export interface SchemaModelBuilderOptions {
  /** Schema used when an entity has no explicit one. Defaults to DEFAULT_SCHEMA (`public`). */
  defaultSchema?: string;
  typeMapper?: TypeMapper;
  /** Only entities with a `table` annotation are modeled; others are skipped. */
  requireTableAnnotation?: boolean;
}

interface ResolvedTableName {
  schema: string;
  table: string;
}

interface ColumnGroup {
  name: string;
  isUnique: boolean;
  members: Array<{ column: string; order: number }>;
}

export class SchemaModelBuilder {
  private readonly defaultSchema: string;
  private readonly typeMapper: TypeMapper;
  private readonly requireTableAnnotation: boolean;
  private logger = getLogger();

  constructor(options: SchemaModelBuilderOptions = {}) {
    this.defaultSchema = options.defaultSchema ?? getConfig().migration.defaultSchema;
    this.typeMapper = options.typeMapper ?? new DefaultTypeMapper();
    this.requireTableAnnotation = options.requireTableAnnotation ?? false;
  }

  /**
   * Builds the schema model for the given entities.
   */
  build(entities: readonly EntityDescription[]): SchemaModel {
    const model = new SchemaModel();
    const mappedBy = new Map<string, string>();

    for (const entity of entities) {
      if (this.requireTableAnnotation && !entity.table) {
        this.logger.debug('Skipping entity without table annotation', { entity: entity.name });
        continue;
      }

      const { schema: schemaName, table: tableName } = this.resolveTableName(entity);
      const key = `${schemaName}.${tableName}`.toLowerCase();
      const previous = mappedBy.get(key);
      if (previous !== undefined) {
        throw new ModelBuildError(
          `Entities ${previous} and ${entity.name} both map to table ${schemaName}.${tableName}`,
          { entity: entity.name, table: `${schemaName}.${tableName}` }
        );
      }
      mappedBy.set(key, entity.name);

      const table = model.getOrAddSchema(schemaName).getOrAddTable(tableName, entity);
      this.buildColumns(table, entity);
      this.buildConstraints(table, entity);
    }

    this.logger.debug('Schema model built', { summary: model.toString() });
    return model;
  }

  private resolveTableName(entity: EntityDescription): ResolvedTableName {
    return {
      schema: entity.table?.schema ?? this.defaultSchema,
      table: entity.table?.name ?? entity.name,
    };
  }

  private mappableMembers(entity: EntityDescription): MemberDescription[] {
    return entity.members.filter(m => !m.ignore);
  }

  private columnName(member: MemberDescription): string {
    return member.column ?? member.name;
  }

  private buildColumns(table: DbTable, entity: EntityDescription): void {
    for (const member of this.mappableMembers(entity)) {
      this.validateMember(entity, member);

      const columnName = this.columnName(member);
      if (table.findColumn(columnName)) {
        throw new ModelBuildError(
          `Column '${columnName}' is mapped twice in ${entity.name} (member ${member.name})`,
          { entity: entity.name, member: member.name, column: columnName }
        );
      }

      const fixedLength = member.fixedLength ?? member.length;

      // Nullable unless forced, part of the primary key, or an incremental key
      const isNullable = !member.notNull && !member.primaryKey && !member.incrementalKey;

      const column: DbColumn = {
        name: columnName,
        sourceName: member.name,
        type: this.refineType(this.typeMapper.map(member), member),
        isNullable,
        isIncrementalKey: member.incrementalKey !== undefined,
        sequenceName: member.incrementalKey?.sequenceName,
        startWith: member.incrementalKey?.startWith,
        incrementBy: member.incrementalKey?.incrementBy,
        maxLength: member.maxLength,
        fixedLength,
        precision: member.precision?.precision,
        scale: member.precision?.scale,
        defaultValue: member.defaultValue,
      };

      table.addColumn(column);
    }
  }

  private refineType(type: ColumnType, member: MemberDescription): ColumnType {
    if (type.kind === 'string' && member.maxLength !== undefined) {
      return ColumnTypes.string(member.maxLength, type.unicode);
    }
    if (type.kind === 'decimal' && member.precision) {
      return ColumnTypes.decimal(member.precision.precision, member.precision.scale);
    }
    return type;
  }

  private validateMember(entity: EntityDescription, member: MemberDescription): void {
    const where = `${entity.name}.${member.name}`;
    const context = { entity: entity.name, member: member.name, memberType: member.type };
    const fixedLength = member.fixedLength ?? member.length;
    const isString = member.type === 'string';

    if ((member.maxLength !== undefined || fixedLength !== undefined) && !isString) {
      throw new ModelBuildError(
        `maxLength/fixedLength only apply to string members. ${where} is ${member.type}.`,
        context
      );
    }

    if (member.maxLength !== undefined && fixedLength !== undefined) {
      throw new ModelBuildError(`Use either maxLength or fixedLength, not both: ${where}.`, context);
    }

    if (member.maxLength !== undefined && !isPositiveInteger(member.maxLength)) {
      throw new ModelBuildError(`maxLength must be a positive integer: ${where} has ${member.maxLength}.`, context);
    }

    if (fixedLength !== undefined && !isPositiveInteger(fixedLength)) {
      throw new ModelBuildError(`fixedLength must be a positive integer: ${where} has ${fixedLength}.`, context);
    }

    if (member.precision) {
      if (member.type !== 'decimal') {
        throw new ModelBuildError(`precision only applies to decimal members. ${where} is ${member.type}.`, context);
      }
      const { precision, scale } = member.precision;
      if (!isPositiveInteger(precision) || !Number.isInteger(scale) || scale < 0 || scale > precision) {
        throw new ModelBuildError(
          `Invalid precision (${precision},${scale}) on ${where}: precision must be positive and scale between 0 and precision.`,
          context
        );
      }
    }

    const pkOrder = member.primaryKey?.order;
    if (pkOrder !== undefined && (!Number.isInteger(pkOrder) || pkOrder < 0)) {
      throw new ModelBuildError(`Primary key order must be a non-negative integer: ${where} has ${pkOrder}.`, context);
    }

    for (const unique of member.unique ?? []) {
      if (!unique.name.trim()) {
        throw new ModelBuildError(`Unique group name must not be empty: ${where}.`, context);
      }
    }

    for (const index of member.indexes ?? []) {
      if (!index.name.trim()) {
        throw new ModelBuildError(`Index name must not be empty: ${where}.`, context);
      }
    }
  }

  private buildConstraints(table: DbTable, entity: EntityDescription): void {
    const members = this.mappableMembers(entity);

    this.buildPrimaryKey(table, entity, members);
    this.buildUniques(table, members);
    this.buildIndexes(table, members);
    this.buildChecks(table, entity, members);
    this.buildForeignKeys(table, entity, members);
  }

  private buildPrimaryKey(table: DbTable, entity: EntityDescription, members: MemberDescription[]): void {
    const keyMembers = members
      .filter(m => m.primaryKey)
      .map(m => ({ member: m, order: m.primaryKey?.order ?? 0, name: m.primaryKey?.name }))
      .sort((a, b) => a.order - b.order);

    if (keyMembers.length === 0) {
      return;
    }

    for (let i = 1; i < keyMembers.length; i++) {
      if (keyMembers[i].order === keyMembers[i - 1].order) {
        throw new ModelBuildError(
          `Duplicate primary key order ${keyMembers[i].order} in ${entity.name}: ` +
            `${keyMembers[i - 1].member.name} and ${keyMembers[i].member.name}`,
          { entity: entity.name, member: keyMembers[i].member.name }
        );
      }
    }

    const explicitNames = new Set(keyMembers.map(k => k.name).filter((n): n is string => n !== undefined));
    if (explicitNames.size > 1) {
      throw new ModelBuildError(
        `Conflicting primary key names in ${entity.name}: ${Array.from(explicitNames).join(', ')}`,
        { entity: entity.name }
      );
    }

    const [explicitName] = Array.from(explicitNames);
    table.setPrimaryKey({
      name: explicitName ?? `PK_${table.name}`,
      columns: keyMembers.map(k => this.columnName(k.member)),
    });
  }

  private buildUniques(table: DbTable, members: MemberDescription[]): void {
    const groups = this.groupColumns(table, members, m =>
      (m.unique ?? []).map(u => ({ name: u.name, order: u.order ?? 0, isUnique: true }))
    );

    for (const group of groups) {
      table.uniques.push({ name: `UQ_${group.name}`, columns: this.orderedColumns(group) });
    }
  }

  private buildIndexes(table: DbTable, members: MemberDescription[]): void {
    const groups = this.groupColumns(table, members, m =>
      (m.indexes ?? []).map(i => ({ name: i.name, order: i.order ?? 0, isUnique: i.isUnique ?? false }))
    );

    for (const group of groups) {
      table.indexes.push({ name: group.name, columns: this.orderedColumns(group), isUnique: group.isUnique });
    }
  }

  /**
   * Groups member columns by annotation name (case-insensitive); the first
   * spelling of a name is kept.
   */
  private groupColumns(
    table: DbTable,
    members: MemberDescription[],
    annotationsOf: (member: MemberDescription) => Array<{ name: string; order: number; isUnique: boolean }>
  ): ColumnGroup[] {
    const groups = new Map<string, ColumnGroup>();

    for (const member of members) {
      for (const annotation of annotationsOf(member)) {
        const key = annotation.name.toLowerCase();
        let group = groups.get(key);
        if (!group) {
          group = { name: annotation.name, isUnique: annotation.isUnique, members: [] };
          groups.set(key, group);
        } else if (group.isUnique !== annotation.isUnique) {
          throw new ModelBuildError(
            `Index ${group.name} on ${table.qualifiedName} mixes unique and non-unique members (${member.name})`,
            { entity: table.source?.name, member: member.name, index: group.name }
          );
        }
        group.members.push({ column: this.columnName(member), order: annotation.order });
      }
    }

    return Array.from(groups.values());
  }

  private orderedColumns(group: ColumnGroup): string[] {
    return [...group.members].sort((a, b) => a.order - b.order).map(m => m.column);
  }

  private buildChecks(table: DbTable, entity: EntityDescription, members: MemberDescription[]): void {
    for (const check of entity.checks ?? []) {
      table.checks.push({
        name: check.name ?? `CK_${table.name}_${table.checks.length + 1}`,
        expression: check.expression,
      });
    }

    for (const member of members) {
      for (const check of member.checks ?? []) {
        table.checks.push({
          name: check.name ?? `CK_${table.name}_${this.columnName(member)}`,
          expression: check.expression,
        });
      }
    }
  }

  private buildForeignKeys(table: DbTable, entity: EntityDescription, members: MemberDescription[]): void {
    for (const member of members) {
      const fk = member.foreignKey;
      if (!fk) {
        continue;
      }

      const referenced = resolveEntityReference(fk.entity);
      if (!isEntityDescription(referenced)) {
        throw new ModelBuildError(
          `Foreign key on ${entity.name}.${member.name} does not reference an entity description`,
          { entity: entity.name, member: member.name }
        );
      }

      const refMember = referenced.members.find(m => m.name === fk.member && !m.ignore);
      if (!refMember) {
        throw new ModelBuildError(
          `ForeignKey reference member not found: ${referenced.name}.${fk.member} (from ${entity.name}.${member.name})`,
          { entity: entity.name, member: member.name, referencedEntity: referenced.name, referencedMember: fk.member }
        );
      }

      const { schema: refSchema, table: refTable } = this.resolveTableName(referenced);
      const column = this.columnName(member);

      table.foreignKeys.push({
        name: fk.name ?? `FK_${table.name}_${refTable}_${column}`,
        columns: [column],
        refSchema,
        refTable,
        refColumns: [this.columnName(refMember)],
        onDelete: fk.onDelete ?? ReferentialAction.NO_ACTION,
        onUpdate: fk.onUpdate ?? ReferentialAction.NO_ACTION,
      });
    }
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
