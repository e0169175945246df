import * as fs from 'fs/promises';
import * as path from 'path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { ITaskArtifactRepository, TaskArtifact } from '../../domain/repositories/ITaskArtifactRepository';
import { ILogger } from '../../domain/common/ILogger';
import { ValidationError } from '../../domain/common/Errors';

const statusSchema = z.enum(['new', 'assigned', 'in_progress', 'validation', 'integration', 'complete', 'deprecated']);

const artifactSchema = z.object({
  tasks: z.record(
    z.string(),
    z.object({
      status: statusSchema,
      priority: z.string(),
      stable_id: z.string(),
      legacy_id: z.string().nullable(),
      migrated_at: z.string().nullable(),
      deprecated: z.boolean().optional(),
      superseded_by: z.string().optional(),
    })
  ).default({}),
});

/**
 * Task artifact kept as a YAML document inside the repository working tree.
 * Writes go to a temporary file first and are renamed into place.
 */
export class YamlTaskArtifactRepository implements ITaskArtifactRepository {
  private filePath: string;

  constructor(
    repoRoot: string,
    readonly relativePath: string,
    private logger: ILogger
  ) {
    this.filePath = path.join(repoRoot, relativePath);
  }

  async read(): Promise<TaskArtifact> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return {};
      }
      throw err;
    }

    const result = artifactSchema.safeParse(parse(raw) ?? {});
    if (!result.success) {
      throw new ValidationError(`Task artifact ${this.relativePath} is malformed`, result.error.issues);
    }
    return result.data.tasks;
  }

  async write(artifact: TaskArtifact): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const ordered: TaskArtifact = {};
    for (const id of Object.keys(artifact).sort()) {
      ordered[id] = artifact[id];
    }

    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmpPath, stringify({ tasks: ordered }), 'utf-8');
    await fs.rename(tmpPath, this.filePath);
    this.logger.debug(`Task artifact written: ${this.relativePath}`, { tasks: Object.keys(ordered).length });
  }
}
