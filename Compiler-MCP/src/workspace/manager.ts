/**
 * Per-submission workspaces.
 *
 * Each workspace is a fresh owner-only directory under the workspace root,
 * used by exactly one submission and destroyed exactly once. Destroy never
 * throws: a cleanup failure must not mask the submission's result.
 */

import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import { Logger } from '@compilebox/shared/Utils/logger.js';
import { InfrastructureError, ValidationError, errorMessage } from '@compilebox/shared/Types/errors.js';
import { generateWorkspaceId } from '../utils/id-generator.js';

export interface Workspace {
  readonly id: string;
  readonly path: string;
  readonly createdAt: number;
}

export class WorkspaceManager {
  private readonly live = new Map<string, Workspace>();
  private readonly logger: Logger;

  constructor(
    private readonly root: string,
    logger: Logger = new Logger('compiler'),
  ) {
    this.logger = logger.child('workspace');
  }

  /**
   * Allocate a new workspace directory.
   * @throws InfrastructureError when the directory cannot be created
   */
  async create(): Promise<Workspace> {
    const id = generateWorkspaceId();
    const path = join(this.root, id);
    try {
      await mkdir(this.root, { recursive: true, mode: 0o700 });
      // Non-recursive: fails instead of reusing a directory that already exists
      await mkdir(path, { mode: 0o700 });
    } catch (err) {
      throw new InfrastructureError(`Could not create workspace: ${errorMessage(err)}`, { root: this.root });
    }

    const workspace: Workspace = { id, path, createdAt: Date.now() };
    this.live.set(id, workspace);
    this.logger.debug('Workspace created', { id });
    return workspace;
  }

  /**
   * Recursively delete a workspace. Second and later calls are no-ops;
   * deletion errors are logged and swallowed.
   */
  async destroy(workspace: Workspace): Promise<void> {
    if (!this.live.delete(workspace.id)) {
      this.logger.debug('Workspace already destroyed', { id: workspace.id });
      return;
    }
    try {
      await rm(workspace.path, { recursive: true, force: true, maxRetries: 2 });
      this.logger.debug('Workspace destroyed', { id: workspace.id, lifetimeMs: Date.now() - workspace.createdAt });
    } catch (err) {
      this.logger.warn('Workspace cleanup failed', { id: workspace.id, error: err });
    }
  }

  /** Workspaces created and not yet destroyed */
  liveCount(): number {
    return this.live.size;
  }

  /**
   * Resolve a relative path inside the workspace.
   * @throws ValidationError when the path would leave the workspace
   */
  resolveInside(workspace: Workspace, relativePath: string): string {
    const target = resolve(workspace.path, relativePath);
    const rel = relative(workspace.path, target);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new ValidationError(`Path escapes workspace: ${relativePath}`);
    }
    return target;
  }

  async writeText(workspace: Workspace, relativePath: string, content: string): Promise<string> {
    const target = this.resolveInside(workspace, relativePath);
    await writeFile(target, content, 'utf-8');
    return target;
  }

  async writeBytes(workspace: Workspace, relativePath: string, bytes: Uint8Array): Promise<string> {
    const target = this.resolveInside(workspace, relativePath);
    await writeFile(target, bytes);
    return target;
  }

  async readBytes(workspace: Workspace, relativePath: string): Promise<Buffer> {
    return readFile(this.resolveInside(workspace, relativePath));
  }

  /**
   * Top-level file names in the workspace, optionally filtered by extension.
   */
  async listFiles(workspace: Workspace, extension?: string): Promise<string[]> {
    const entries = await readdir(workspace.path, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && (extension === undefined || e.name.endsWith(extension)))
      .map((e) => e.name)
      .sort();
  }
}
