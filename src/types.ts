export type TargetKey = 'db1' | 'db2';

export interface TargetConfig {
  key: TargetKey;
  name: string;
  host: string;
  port: string;
  sidOrService: string;
  pdbName: string;
  user: string;
  password: string;
  containerName: string;
}

export interface ConnectionDescriptor {
  dsn: string;
  user: string;
  password: string;
  privilege: 'SYSDBA';
}

export interface StatusRecord {
  targetName: string;
  reachable: boolean;
  version?: string;
  instanceName?: string;
  instanceStatus?: string;
  databaseStatus?: string;
  sessionCount?: number;
  errorMessage?: string;
}

export type Row = Record<string, unknown>;

export type QueryErrorCode = 'EMPTY_INPUT' | 'CONNECTION_FAILURE' | 'QUERY_FAILURE';

export type QueryResult =
  | { status: 'success'; columns: string[]; rows: Row[] }
  | { status: 'acknowledged'; message: string }
  | { status: 'failure'; code: QueryErrorCode; errorMessage: string };

/** Public view of a target; never carries credentials. */
export interface TargetSummary {
  key: TargetKey;
  name: string;
  connectionString: string;
  sid: string;
  containerName: string;
}
