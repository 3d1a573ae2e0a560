import { Identity } from '@netform/contracts';
import * as fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod/v4';

export interface IStateEntry {
  kind: string;
  name: string;
  /** Identity the device answered with on the last apply */
  identity: Identity;
  attributes: Record<string, unknown>;
  /** Addresses this resource referenced when it was applied */
  dependsOn?: string[];
}

export interface IState {
  version: number;
  resources: Record<string, IStateEntry>;
}

const identitySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('id'), value: z.string() }),
  z.object({ kind: z.literal('key'), field: z.string(), value: z.string() }),
]);

const stateSchema = z.object({
  version: z.number().int(),
  resources: z.record(
    z.string(),
    z.object({
      kind: z.string(),
      name: z.string(),
      identity: identitySchema,
      attributes: z.record(z.string(), z.unknown()),
      dependsOn: z.array(z.string()).optional(),
    })
  ),
});

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

export function emptyState(): IState {
  return { version: 1, resources: {} };
}

export class StateManager {
  private filePath: string;

  constructor(workingDir: string = process.cwd(), filename: string = 'netform.state.json') {
    this.filePath = path.join(workingDir, filename);
  }

  get stateFilePath(): string {
    return this.filePath;
  }

  async read(): Promise<IState> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') return emptyState();
      throw error;
    }

    const parsed = stateSchema.safeParse(JSON.parse(content));
    if (!parsed.success) throw new Error(`Invalid state file ${this.filePath}: ${z.prettifyError(parsed.error)}`);
    return parsed.data;
  }

  async write(state: IState): Promise<void> {
    try {
      await fs.copyFile(this.filePath, `${this.filePath}.bak`);
    } catch (error) {
      // First write: nothing to back up
      if (errorCode(error) !== 'ENOENT') throw error;
    }

    await fs.writeFile(this.filePath, JSON.stringify(state, null, 2), 'utf8');
  }

  get lockFilePath(): string {
    return `${this.filePath}.lock`;
  }

  async lock(): Promise<void> {
    try {
      // 'wx' fails if the file exists
      await fs.writeFile(this.lockFilePath, String(Date.now()), { flag: 'wx' });
    } catch (error) {
      if (errorCode(error) === 'EEXIST') throw new Error('State is locked by another process.');
      throw error;
    }
  }

  async unlock(): Promise<void> {
    try {
      await fs.unlink(this.lockFilePath);
    } catch (error) {
      // Already unlocked
      if (errorCode(error) !== 'ENOENT') throw error;
    }
  }
}
