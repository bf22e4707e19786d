/**
 * Migration definition consumed by the Migrator.
 */

import type { MigrationBuilder } from '../services/migration-builder';

export interface Migration {
  /** Sortable identifier, e.g. `20250101_000001_CreateUsers`. */
  readonly id: string;
  readonly name: string;
  up(builder: MigrationBuilder): void;
}

export interface MigrationHistoryEntry {
  migrationId: string;
  name: string;
  productVersion: string;
  appliedAtUtc: string;
}

export function isMigration(value: unknown): value is Migration {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'up' in value &&
    typeof value.up === 'function'
  );
}
