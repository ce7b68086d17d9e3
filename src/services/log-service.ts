import { ContainerRuntime } from '../runtime/docker-runtime.js';
import { errorMessage } from '../errors.js';

export const LOG_TAIL_LINES = 50;
export const RUNTIME_UNAVAILABLE_MESSAGE = 'Docker socket not connected. Cannot fetch logs.';

export class LogService {
  constructor(private runtime: ContainerRuntime | null) {}

  // A missing container is normal while the database is still being built.
  async fetchLogs(containerName: string): Promise<string> {
    if (!this.runtime) {
      return RUNTIME_UNAVAILABLE_MESSAGE;
    }

    try {
      return await this.runtime.tailLogs(containerName, LOG_TAIL_LINES);
    } catch (error) {
      return `Error reading logs for ${containerName}: ${errorMessage(error)}`;
    }
  }
}
