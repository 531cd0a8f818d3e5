/**
 * Core type definitions shared across all packages
 */

// ============================================================================
// Entity Types
// ============================================================================

export interface Template {
  id: number;
  name: string;
  kind: string;
  content: string;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface Blueprint {
  id: number;
  name: string;
  stack: string;
  config: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface ConfigEntry {
  scope: string;
  key: string;
  value: string;
}

export interface AuditEntry {
  id: number;
  actor: string;
  action: string;
  entity: string;
  details: Record<string, unknown>;
  createdAt: string;
}

// ============================================================================
// Health Types
// ============================================================================

export type CheckStatus = 'OK' | 'WARNING' | 'ERROR';

export interface HealthCheck {
  name: string;
  status: CheckStatus;
  message: string;
  value?: string;
  durationMs: number;
  checkedAt: string;
}

export interface HealthStatus {
  status: CheckStatus;
  checkedAt: string;
  databasePath: string;
  databaseSize: number;
  tableCount: number;
  totalRows: number;
  integrityOk: boolean;
  walMode: boolean;
  version: string;
  checks: HealthCheck[];
  recommendations: string[];
}

export interface TableStats {
  name: string;
  rowCount: number;
}

export interface DatabaseStats {
  totalSize: number;
  dataSize: number;
  freePages: number;
  pageCount: number;
  pageSize: number;
  walSize: number;
  journalMode: string;
  cacheSize: number;
  tempStore: string;
  tables: TableStats[];
}

// ============================================================================
// Transfer Types
// ============================================================================

export type TransferFormat = 'sql' | 'json' | 'csv';

export type SqlValue = string | number | bigint | Buffer | null;
