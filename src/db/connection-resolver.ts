import { ConnectionDescriptor, TargetConfig } from '../types.js';

export function connectionString(target: TargetConfig): string {
  return `${target.host}:${target.port}/${target.pdbName}`;
}

// No validation here: a bad host or port surfaces when the driver connects.
export function resolveConnection(target: TargetConfig): ConnectionDescriptor {
  return {
    dsn: connectionString(target),
    user: target.user,
    password: target.password,
    privilege: 'SYSDBA'
  };
}
