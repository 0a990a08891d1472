import fs from 'fs';
import path from 'path';
import { SessionKey } from '../../../domain/entities';
import { ILogger } from '../../../domain/interfaces';
import { artifactPrefix } from './artifactNames';

/**
 * Derived files of all sessions, kept in one directory.
 * Maps artifact name -> absolute path for the names handed out to clients.
 */
export class ArtifactRegistry {
  private readonly artifacts = new Map<string, string>();
  readonly dir: string;

  constructor(
    dir: string,
    private readonly logger: ILogger
  ) {
    this.dir = path.resolve(dir);
    fs.mkdirSync(this.dir, { recursive: true });
  }

  pathFor(name: string): string {
    return path.join(this.dir, name);
  }

  register(name: string): string {
    const filePath = this.pathFor(name);
    this.artifacts.set(name, filePath);
    return filePath;
  }

  /**
   * Path of a registered artifact, null when unknown
   */
  lookup(name: string): string | null {
    return this.artifacts.get(name) ?? null;
  }

  /**
   * Absolute path for a client-supplied file name, null when it would leave the directory
   */
  resolveInside(name: string): string | null {
    if (!name) {
      return null;
    }
    const resolved = path.resolve(this.dir, name);
    const relative = path.relative(this.dir, resolved);
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      return null;
    }
    return resolved;
  }

  /**
   * Deletes every artifact of a session, registered or not
   * @returns the deleted file names
   */
  purge(key: SessionKey): string[] {
    const prefix = artifactPrefix(key);
    const deleted = new Set<string>();

    for (const [name, filePath] of this.artifacts) {
      if (!name.startsWith(prefix)) {
        continue;
      }
      this.artifacts.delete(name);
      if (this.removeFile(filePath)) {
        deleted.add(name);
      }
    }

    let strays: string[] = [];
    try {
      strays = fs.readdirSync(this.dir).filter((name) => name.startsWith(prefix));
    } catch (error) {
      this.logger.error(`[artifacts] cannot list ${this.dir}:`, error);
    }
    for (const name of strays) {
      if (this.removeFile(this.pathFor(name))) {
        deleted.add(name);
      }
    }

    if (deleted.size > 0) {
      this.logger.info(`[artifacts] deleted ${deleted.size} file(s) of ${key}`);
    }
    return [...deleted];
  }

  private removeFile(filePath: string): boolean {
    try {
      fs.unlinkSync(filePath);
      return true;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      this.logger.error(`[artifacts] error deleting ${filePath}:`, error);
      return false;
    }
  }
}
