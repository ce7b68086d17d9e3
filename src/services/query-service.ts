import { QueryResult, Row, TargetConfig } from '../types.js';
import { resolveConnection } from '../db/connection-resolver.js';
import { SessionOpener, openOracleSession, withSession } from '../db/oracle-session.js';
import { ConnectionFailureError, errorMessage } from '../errors.js';

export const EMPTY_INPUT_MESSAGE = 'Please enter a SQL query.';
export const NO_OUTPUT_MESSAGE = 'Statement executed successfully (No Output)';

export class QueryService {
  constructor(private openSession: SessionOpener = openOracleSession) {}

  /**
   * Runs one operator-supplied statement as SYSDBA. The statement is sent
   * exactly once; there is no retry.
   */
  async execute(target: TargetConfig, statement: string): Promise<QueryResult> {
    if (statement.trim().length === 0) {
      return { status: 'failure', code: 'EMPTY_INPUT', errorMessage: EMPTY_INPUT_MESSAGE };
    }

    const startTime = Date.now();
    try {
      return await withSession(this.openSession, resolveConnection(target), async (session): Promise<QueryResult> => {
        const outcome = await session.execute(statement);

        if (outcome.columns) {
          const columns = outcome.columns;
          const rows = outcome.rows.map((values) => zipRow(columns, values));
          return { status: 'success', columns, rows };
        }

        await session.commit();
        return { status: 'acknowledged', message: NO_OUTPUT_MESSAGE };
      });
    } catch (error) {
      if (error instanceof ConnectionFailureError) {
        console.error(`❌ Could not connect to ${target.name}: ${error.message}`);
        return { status: 'failure', code: 'CONNECTION_FAILURE', errorMessage: error.message };
      }
      console.error(`❌ Statement failed on ${target.name}: ${errorMessage(error)}`);
      return { status: 'failure', code: 'QUERY_FAILURE', errorMessage: errorMessage(error) };
    } finally {
      console.log(`⏱️ Statement on ${target.name} finished in ${Date.now() - startTime}ms`);
    }
  }
}

function zipRow(columns: string[], values: unknown[]): Row {
  const row: Row = {};
  columns.forEach((column, index) => {
    row[column] = values[index];
  });
  return row;
}
