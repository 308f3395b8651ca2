/**
 * Turns an instruction and a file list into a pending edit.
 *
 * An injected producer (typically a model adapter) may supply whole-file
 * contents as JSON. Without one, or when it yields nothing usable, a few
 * deterministic instruction forms are applied instead:
 *
 *   replace 'A' -> 'B'
 *   append 'TEXT'
 *   prepend 'TEXT'
 */

import { z } from 'zod';

import type { PatchEngineCallbacks } from '../patch/callbacks.js';
import type { PatchSystem } from '../patch/system.js';
import { pathExists, readTextFile, resolveWithinRoot } from '../workspace/paths.js';
import type { PendingEdit } from './pending.js';

export const DETERMINISTIC_RATIONALE = 'Applied deterministic transformations based on instruction.';

export interface SourceFile {
  path: string;
  content: string;
}

export interface EditRequest {
  instruction: string;
  files: SourceFile[];
}

/**
 * Produces raw text expected to contain
 * `{"changes": {"<path>": "<full new content>"}, "rationale": "..."}`.
 */
export type EditProducer = (request: EditRequest) => Promise<string>;

const ProducedChangesSchema = z.object({
  changes: z.record(z.string(), z.string()).nullish(),
  rationale: z.string().nullish(),
});

export interface ProducedChanges {
  changes: Record<string, string>;
  rationale?: string;
}

/**
 * Extract the outermost JSON object from producer output.
 * @returns null when there is no object or it has the wrong shape
 */
export function parseProducedChanges(text: string): ProducedChanges | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }

  const parsed = ProducedChangesSchema.safeParse(data);
  if (!parsed.success) {
    return null;
  }
  const rationale = parsed.data.rationale ?? undefined;
  return {
    changes: parsed.data.changes ?? {},
    ...(rationale !== undefined && rationale !== '' && { rationale }),
  };
}

type Transform = (original: string) => string;

/**
 * The transform named by the first matching instruction form, if any.
 */
export function parseInstruction(instruction: string): Transform | undefined {
  const replace = /replace\s+'(.+?)'\s*->\s*'(.+?)'/i.exec(instruction);
  if (replace?.[1] !== undefined && replace[2] !== undefined) {
    const [from, to] = [replace[1], replace[2]];
    return (original) => original.split(from).join(to);
  }

  const append = /append\s+'(.+?)'/i.exec(instruction);
  if (append?.[1] !== undefined) {
    const text = append[1];
    return (original) =>
      `${original}${original === '' || original.endsWith('\n') ? '' : '\n'}${text}\n`;
  }

  const prepend = /prepend\s+'(.+?)'/i.exec(instruction);
  if (prepend?.[1] !== undefined) {
    const text = prepend[1];
    return (original) => `${text}\n${original}`;
  }

  return undefined;
}

/**
 * Apply the instruction's transform to each file. Files the transform leaves
 * unchanged are omitted.
 */
export function applySimpleInstruction(
  instruction: string,
  files: readonly SourceFile[]
): Record<string, string> {
  const transform = parseInstruction(instruction);
  const changes: Record<string, string> = {};
  if (transform === undefined) {
    return changes;
  }
  for (const file of files) {
    const updated = transform(file.content);
    if (updated !== file.content) {
      changes[file.path] = updated;
    }
  }
  return changes;
}

export interface EditProposerOptions {
  producer?: EditProducer;
  callbacks?: PatchEngineCallbacks;
}

export class EditProposer {
  private readonly producer?: EditProducer;
  private readonly callbacks?: PatchEngineCallbacks;

  constructor(
    private readonly patchSystem: PatchSystem,
    options: EditProposerOptions = {}
  ) {
    this.producer = options.producer;
    this.callbacks = options.callbacks;
  }

  /**
   * Build a pending edit for `instruction` over `files` (paths relative to the
   * root). Nothing is written.
   * @returns null when no file would change
   */
  async propose(instruction: string, files: readonly string[]): Promise<PendingEdit | null> {
    const sources = await this.readSources(files);

    let changes: Record<string, string> = {};
    let rationale: string | undefined;

    if (this.producer !== undefined) {
      const produced = parseProducedChanges(await this.producer({ instruction, files: sources }));
      if (produced === null) {
        this.callbacks?.onDebug?.('Producer output held no usable changes object');
      } else {
        changes = produced.changes;
        rationale = produced.rationale;
      }
    }

    if (Object.keys(changes).length === 0) {
      changes = applySimpleInstruction(instruction, sources);
      rationale = rationale ?? DETERMINISTIC_RATIONALE;
    }

    if (Object.keys(changes).length === 0) {
      return null;
    }

    const proposal = await this.patchSystem.proposeFromChanges(instruction, changes, rationale);
    return { instruction, proposal };
  }

  /**
   * Current text of each listed file under the root. Missing files read as
   * empty; paths outside the root and non-text files are left out.
   */
  private async readSources(files: readonly string[]): Promise<SourceFile[]> {
    const sources: SourceFile[] = [];
    for (const relativePath of files) {
      const absolutePath = resolveWithinRoot(this.patchSystem.root, relativePath);
      if (absolutePath === null) {
        this.callbacks?.onDebug?.('Skipping path outside project root', { path: relativePath });
        continue;
      }
      const content = await readTextFile(absolutePath);
      if (content === null && (await pathExists(absolutePath))) {
        this.callbacks?.onDebug?.('Skipping non-text file', { path: relativePath });
        continue;
      }
      sources.push({ path: relativePath, content: content ?? '' });
    }
    return sources;
  }
}
