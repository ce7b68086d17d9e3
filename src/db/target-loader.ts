import oracledb from 'oracledb';
import { z } from 'zod';
import { TargetConfig, TargetKey } from '../types.js';
import { errorMessage } from '../errors.js';

type Env = Record<string, string | undefined>;

interface TargetDefaults {
  key: TargetKey;
  prefix: string;
  name: string;
  host: string;
  container: string;
  sid: string;
  pdb: string;
}

const TARGETS: TargetDefaults[] = [
  { key: 'db1', prefix: 'DB1', name: 'Database 1', host: 'oracle-db1', container: 'oracle-db1', sid: 'ORCLCDB1', pdb: 'ORCLPDB1' },
  { key: 'db2', prefix: 'DB2', name: 'Database 2', host: 'oracle-db2', container: 'oracle-db2', sid: 'ORCLCDB2', pdb: 'ORCLPDB2' }
];

// Empty strings count as unset, like an unset variable in a compose file.
const setting = (fallback: string) =>
  z.string().optional().transform((value) => (value && value.length > 0 ? value : fallback));

function targetSchema(defaults: TargetDefaults) {
  return z.object({
    NAME: setting(defaults.name),
    CONTAINER_NAME: setting(defaults.container),
    HOST: setting(defaults.host),
    PORT: setting('1521'),
    SID: setting(defaults.sid),
    PDB: setting(defaults.pdb),
    USER: setting('SYS'),
    PWD: setting('Welcome123456')
  });
}

const serverSchema = z.object({
  MONITOR_PORT: z.coerce.number().int().min(1).max(65535).default(8501)
});

export class TargetLoader {
  constructor(private env: Env = process.env) {}

  loadTargets(): TargetConfig[] {
    return TARGETS.map((defaults) => {
      const raw = this.scoped(defaults.prefix);
      const parsed = targetSchema(defaults).parse(raw);

      const target: TargetConfig = {
        key: defaults.key,
        name: parsed.NAME,
        host: parsed.HOST,
        port: parsed.PORT,
        sidOrService: parsed.SID,
        pdbName: parsed.PDB,
        user: parsed.USER,
        password: parsed.PWD,
        containerName: parsed.CONTAINER_NAME
      };
      console.log(`🎯 ${target.name} (${target.key}) -> ${target.host}:${target.port}/${target.pdbName}`);
      return Object.freeze(target);
    });
  }

  listenPort(): number {
    const value = this.env.MONITOR_PORT;
    return serverSchema.parse({ MONITOR_PORT: value === '' ? undefined : value }).MONITOR_PORT;
  }

  private scoped(prefix: string): Env {
    const values: Env = {};
    for (const field of ['NAME', 'CONTAINER_NAME', 'HOST', 'PORT', 'SID', 'PDB', 'USER', 'PWD']) {
      values[field] = this.env[`${prefix}_${field}`];
    }
    return values;
  }
}

/** Switches node-oracledb to Thick mode when a client library directory is configured. */
export function initOracleClient(env: Env = process.env): void {
  const libDir = env.ORACLE_CLIENT_LIB_DIR;
  if (!libDir) return;

  try {
    oracledb.initOracleClient({ libDir });
    console.log(`🔧 Oracle client initialised from ${libDir}`);
  } catch (error) {
    console.error(`❌ Could not initialise Oracle client from ${libDir}: ${errorMessage(error)}`);
    throw error;
  }
}
