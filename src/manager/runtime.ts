/**
 * Narrow seam over the container engine. Production uses Docker (docker-runtime.ts);
 * tests plug in an in-process fake.
 */

export interface LaunchSpec {
  name: string;
  image: string;
  /** Empty means the image's default command */
  command: string[];
  env: Record<string, string>;
  /** Container port bound to an OS-assigned host port */
  internalPort: number;
  memoryBytes: number;
  /** "host:container[:mode]" bind mounts */
  binds: string[];
}

export interface ContainerState {
  running: boolean;
  exitCode: number | null;
  /** internal port → published host port (undefined while not yet bound) */
  ports: Record<number, number | undefined>;
}

export interface ContainerRuntime {
  /** Throws when the engine is unreachable */
  ping(): Promise<void>;
  /** Creates and starts a container, returning its reference */
  start(spec: LaunchSpec): Promise<string>;
  /** null when the container no longer exists */
  inspect(ref: string): Promise<ContainerState | null>;
  /** Stop with a grace period, then remove. Idempotent. */
  stop(ref: string, graceSec: number): Promise<void>;
}
