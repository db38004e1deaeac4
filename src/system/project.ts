import fs from 'node:fs/promises';
import path from 'node:path';
import { createLogger } from '../log/logger.js';

const log = createLogger('project');

export const PROJECT_FILE = 'project.json';

/** The facts about the configuration project the engines read or record. */
export interface Project {
  getEnabledApps(): Promise<string[]>;
  /** Records that the current configuration has been built and applied. */
  markChangesApplied(): Promise<void>;
}

export interface ProjectManifest {
  enabledApps: string[];
  changesApplied: boolean;
  appliedAt: string | null;
}

function parseManifest(raw: string, file: string): ProjectManifest {
  const data: unknown = JSON.parse(raw);
  if (typeof data !== 'object' || data === null) {
    throw new Error(`${file} does not contain a JSON object`);
  }
  const enabledApps: unknown = Reflect.get(data, 'enabledApps');
  const changesApplied: unknown = Reflect.get(data, 'changesApplied');
  const appliedAt: unknown = Reflect.get(data, 'appliedAt');

  const apps: string[] = [];
  if (enabledApps !== undefined) {
    if (!Array.isArray(enabledApps)) {
      throw new Error(`${file}: enabledApps must be a list of strings`);
    }
    for (const app of enabledApps) {
      if (typeof app !== 'string') {
        throw new Error(`${file}: enabledApps must be a list of strings`);
      }
      apps.push(app);
    }
  }
  return {
    enabledApps: apps,
    changesApplied: changesApplied === true,
    appliedAt: typeof appliedAt === 'string' ? appliedAt : null,
  };
}

/** Project manifest kept as `project.json` in the work directory. */
export class FsProject implements Project {
  readonly file: string;

  constructor(readonly workDir: string) {
    this.file = path.join(workDir, PROJECT_FILE);
  }

  async load(): Promise<ProjectManifest> {
    try {
      return parseManifest(await fs.readFile(this.file, 'utf-8'), this.file);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        log.debug(`No ${PROJECT_FILE} in ${this.workDir}, using an empty manifest`);
        return { enabledApps: [], changesApplied: false, appliedAt: null };
      }
      throw err;
    }
  }

  async getEnabledApps(): Promise<string[]> {
    return (await this.load()).enabledApps;
  }

  async markChangesApplied(): Promise<void> {
    const manifest = await this.load();
    const next: ProjectManifest = { ...manifest, changesApplied: true, appliedAt: new Date().toISOString() };
    const tmp = `${this.file}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(next, null, 2) + '\n', 'utf-8');
    await fs.rename(tmp, this.file);
    log.info(`Marked changes as applied in ${this.file}`);
  }
}

/** Used in demo mode and by tests. */
export class InMemoryProject implements Project {
  appliedCount = 0;

  constructor(private readonly apps: string[] = []) {}

  async getEnabledApps(): Promise<string[]> {
    return [...this.apps];
  }

  async markChangesApplied(): Promise<void> {
    this.appliedCount++;
  }
}
