/**
 * Peak-memory estimation for executed programs.
 *
 * A small launcher class (resources/PeakMemoryProbe.java) wraps the target's
 * main method, samples used heap on a daemon task and writes the peak delta
 * to a file in the working directory at JVM shutdown. This module compiles
 * the launcher once per process, drops its bytecode into each workspace and
 * reads the reading back.
 *
 * The number is an estimate: sampling every few milliseconds misses short
 * spikes, and GC timing moves it by a few hundred KB either way. Readings
 * that are missing, unparsable or above the heap cap become a placeholder.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { Logger } from '@compilebox/shared/Utils/logger.js';
import type { CompilationStage } from '../stages/compiler.js';
import type { Toolchain } from '../stages/toolchain.js';
import type { Workspace, WorkspaceManager } from '../workspace/manager.js';

export const PROBE_CLASS = 'PeakMemoryProbe';
export const PEAK_MEMORY_FILE = '.peak-memory';
export const PLACEHOLDER_PEAK_BYTES = 150_000;

export const DEFAULT_PROBE_SOURCE = fileURLToPath(
  new URL(`../../resources/${PROBE_CLASS}.java`, import.meta.url),
);

export interface ProbeLaunch {
  mainClass: string;
  args: string[];
}

export interface MemoryProbeOptions {
  compiler: CompilationStage;
  workspaces: WorkspaceManager;
  toolchain: Toolchain;
  /** Readings above this are discarded */
  heapCapBytes: number;
  sourcePath?: string;
  logger?: Logger;
}

/**
 * Turn the probe file's contents into a byte count, or the placeholder.
 */
export function parsePeakReading(raw: string | null, heapCapBytes: number): number {
  if (raw === null) return PLACEHOLDER_PEAK_BYTES;
  const text = raw.trim();
  if (!/^\d+$/.test(text)) return PLACEHOLDER_PEAK_BYTES;
  const value = Number(text);
  if (!Number.isSafeInteger(value) || value > heapCapBytes) return PLACEHOLDER_PEAK_BYTES;
  return value;
}

export class MemoryProbe {
  private bytecode: Promise<Map<string, Buffer> | null> | null = null;
  private readonly logger: Logger;
  private readonly sourcePath: string;

  constructor(private readonly options: MemoryProbeOptions) {
    this.logger = (options.logger ?? new Logger('compiler')).child('memory-probe');
    this.sourcePath = options.sourcePath ?? DEFAULT_PROBE_SOURCE;
  }

  /**
   * Compiled launcher class files, compiled on first use. A failed compile is
   * remembered too: programs then run unprobed with the placeholder reading.
   * An infrastructure error is not remembered; the next call tries again.
   */
  load(): Promise<Map<string, Buffer> | null> {
    if (!this.bytecode) {
      this.bytecode = this.compileLauncher().catch((err: unknown) => {
        this.logger.warn('Probe preparation failed', { error: err });
        this.bytecode = null;
        return null;
      });
    }
    return this.bytecode;
  }

  /**
   * Put the launcher into the workspace and return the command that runs the
   * target through it. Returns null when the launcher is unavailable or the
   * submission itself declares a class with the launcher's name.
   */
  async install(workspace: Workspace, entryPoint: string, programArgs: readonly string[]): Promise<ProbeLaunch | null> {
    if (entryPoint === PROBE_CLASS) return null;

    const files = await this.load();
    if (!files) return null;

    const { workspaces } = this.options;
    const present = new Set(await workspaces.listFiles(workspace));
    for (const name of files.keys()) {
      if (present.has(name)) {
        this.logger.debug('Submission shadows the probe class, running unprobed', { file: name });
        return null;
      }
    }
    for (const [name, bytes] of files) {
      await workspaces.writeBytes(workspace, name, bytes);
    }
    return { mainClass: PROBE_CLASS, args: [entryPoint, ...programArgs] };
  }

  async readPeak(workspace: Workspace): Promise<number> {
    let raw: string | null = null;
    try {
      raw = (await this.options.workspaces.readBytes(workspace, PEAK_MEMORY_FILE)).toString('utf-8');
    } catch {
      this.logger.debug('No peak memory reading, using placeholder');
    }
    return parsePeakReading(raw, this.options.heapCapBytes);
  }

  private async compileLauncher(): Promise<Map<string, Buffer> | null> {
    const { workspaces, compiler, toolchain } = this.options;
    let source: string;
    try {
      source = await readFile(this.sourcePath, 'utf-8');
    } catch (err) {
      this.logger.warn('Probe source not readable, memory will be estimated', { path: this.sourcePath, error: err });
      return null;
    }

    const workspace = await workspaces.create();
    try {
      const sourceFile = await workspaces.writeText(workspace, `${PROBE_CLASS}${toolchain.sourceExtension}`, source);
      const result = await compiler.compile(sourceFile, workspace.path);
      if (!result.succeeded) {
        this.logger.warn('Probe failed to compile, memory will be estimated', { output: result.output });
        return null;
      }

      const files = new Map<string, Buffer>();
      for (const name of await workspaces.listFiles(workspace, toolchain.artifactExtension)) {
        files.set(name, await workspaces.readBytes(workspace, name));
      }
      this.logger.info('Memory probe ready', { files: [...files.keys()] });
      return files.size > 0 ? files : null;
    } finally {
      await workspaces.destroy(workspace);
    }
  }
}
