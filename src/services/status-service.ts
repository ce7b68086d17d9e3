import { StatusRecord, TargetConfig } from '../types.js';
import { resolveConnection } from '../db/connection-resolver.js';
import { SessionOpener, openOracleSession, withSession } from '../db/oracle-session.js';
import { MissingRowError, errorMessage } from '../errors.js';

const INSTANCE_SQL = 'SELECT VERSION, INSTANCE_NAME, STATUS, DATABASE_STATUS FROM V$INSTANCE';
const SESSION_COUNT_SQL = 'SELECT COUNT(*) FROM V$SESSION';

export class StatusService {
  constructor(private openSession: SessionOpener = openOracleSession) {}

  /**
   * Probes one target. Never rejects: any connection, query or missing-row
   * failure comes back as an unreachable record carrying the driver's message.
   */
  async probe(target: TargetConfig): Promise<StatusRecord> {
    const startTime = Date.now();
    const descriptor = resolveConnection(target);

    try {
      const record = await withSession(this.openSession, descriptor, async (session) => {
        const instance = await session.execute(INSTANCE_SQL);
        const instanceRow = instance.rows[0];
        if (!instanceRow) {
          throw new MissingRowError('no instance row');
        }
        const [version, instanceName, instanceStatus, databaseStatus] = instanceRow;

        const sessions = await session.execute(SESSION_COUNT_SQL);
        const countRow = sessions.rows[0];
        if (!countRow || countRow.length === 0) {
          throw new MissingRowError('no session count row');
        }

        return {
          targetName: target.name,
          reachable: true,
          version: text(version),
          instanceName: text(instanceName),
          instanceStatus: text(instanceStatus),
          databaseStatus: text(databaseStatus),
          sessionCount: Number(countRow[0])
        };
      });
      console.log(`🟢 ${target.name} online (${Date.now() - startTime}ms)`);
      return record;
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`🟠 ${target.name} unreachable: ${message}`);
      return { targetName: target.name, reachable: false, errorMessage: message };
    }
  }
}

/** The "Mode" metric shown on the status view, e.g. `OPEN / ACTIVE`. */
export function describeMode(record: StatusRecord): string {
  return `${record.instanceStatus ?? '?'} / ${record.databaseStatus ?? '?'}`;
}

function text(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}
