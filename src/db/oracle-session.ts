import oracledb from 'oracledb';
import { ConnectionDescriptor } from '../types.js';
import { ConnectionFailureError, errorMessage } from '../errors.js';

export interface StatementOutcome {
  /** Present only when the statement produced a result set. */
  columns?: string[];
  rows: unknown[][];
}

export interface OracleSession {
  execute(sql: string): Promise<StatementOutcome>;
  commit(): Promise<void>;
  close(): Promise<void>;
}

export type SessionOpener = (descriptor: ConnectionDescriptor) => Promise<OracleSession>;

/**
 * NUMBER arrives as text; it becomes a JS number only when that is exact,
 * so NUMBER(38) ids and SCNs keep every digit.
 */
export function exactNumber(value: string | null): number | string | null {
  if (value === null) return null;
  const numeric = Number(value);
  if (Number.isSafeInteger(numeric)) return numeric;
  if (Number.isFinite(numeric) && !Number.isInteger(numeric)) return numeric;
  return value;
}

// LOBs are read inline: a Lob stream is useless once the session is closed.
export function fetchTypeHandler(metaData: { dbType?: unknown }) {
  switch (metaData.dbType) {
    case oracledb.DB_TYPE_CLOB:
    case oracledb.DB_TYPE_NCLOB:
      return { type: oracledb.STRING };
    case oracledb.DB_TYPE_BLOB:
      return { type: oracledb.BUFFER };
    case oracledb.DB_TYPE_NUMBER:
      return { type: oracledb.STRING, converter: exactNumber };
    default:
      return {};
  }
}

function privilegeOf(descriptor: ConnectionDescriptor): number {
  switch (descriptor.privilege) {
    case 'SYSDBA':
      return oracledb.SYSDBA;
  }
}

export const openOracleSession: SessionOpener = async (descriptor) => {
  const connection = await oracledb.getConnection({
    user: descriptor.user,
    password: descriptor.password,
    connectString: descriptor.dsn,
    privilege: privilegeOf(descriptor)
  });

  return {
    async execute(sql: string): Promise<StatementOutcome> {
      const result = await connection.execute<unknown[]>(sql, [], {
        outFormat: oracledb.OUT_FORMAT_ARRAY,
        fetchTypeHandler
      });
      return {
        columns: result.metaData?.map((col) => col.name),
        rows: result.rows ?? []
      };
    },
    commit: () => connection.commit(),
    close: () => connection.close()
  };
};

/**
 * Opens one session, hands it to `fn` and closes it on every exit path.
 * A failure to open rejects with ConnectionFailureError; a failing close is
 * logged rather than replacing the outcome of `fn`.
 */
export async function withSession<T>(
  open: SessionOpener,
  descriptor: ConnectionDescriptor,
  fn: (session: OracleSession) => Promise<T>
): Promise<T> {
  let session: OracleSession;
  try {
    session = await open(descriptor);
  } catch (error) {
    throw new ConnectionFailureError(error);
  }

  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
    } catch (error) {
      console.warn(`⚠️ Could not close session to ${descriptor.dsn}: ${errorMessage(error)}`);
    }
  }
}
