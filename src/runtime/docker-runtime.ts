import Docker from 'dockerode';
import { Readable, Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { errorMessage } from '../errors.js';

export interface ContainerRuntime {
  /** Last `lines` lines of combined stdout/stderr, decoded as UTF-8. */
  tailLogs(containerName: string, lines: number): Promise<string>;
}

export class DockerRuntime implements ContainerRuntime {
  constructor(private docker: Docker) {}

  async tailLogs(containerName: string, lines: number): Promise<string> {
    const container = this.docker.getContainer(containerName);
    const info = await container.inspect();
    const raw = await container.logs({ stdout: true, stderr: true, tail: lines, follow: false });
    const body = info.Config.Tty ? raw : await this.demux(raw);
    return body.toString('utf-8');
  }

  // Without a TTY the engine frames each chunk with a stream header.
  private async demux(raw: Buffer): Promise<Buffer> {
    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      }
    });

    const source = Readable.from([raw]);
    this.docker.modem.demuxStream(source, sink, sink);
    await finished(source);
    return Buffer.concat(chunks);
  }
}

/**
 * Connects to the engine named by DOCKER_HOST (or the local socket). Returns
 * null when the engine does not answer, so log views can say so up front.
 */
export async function connectDocker(): Promise<ContainerRuntime | null> {
  const docker = new Docker();
  try {
    await docker.ping();
    console.log('🐳 Docker engine reachable');
    return new DockerRuntime(docker);
  } catch (error) {
    console.error(`❌ Docker socket error: ${errorMessage(error)}`);
    return null;
  }
}
