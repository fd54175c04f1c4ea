/**
 * @arch patternloom.core.domain
 *
 * Pattern exchange format: value conversion plus file load/save.
 * Loading resolves each component against the live catalog by name.
 */
import { ErrorCodes, PatternError, getErrorMessage } from '../../utils/errors.js';
import { fileExists } from '../../utils/file-system.js';
import { loadJson, writeJson } from '../../utils/json.js';
import { formatZodError } from '../../utils/yaml.js';
import type { Diagnostic } from '../catalog/index.js';
import type { CatalogReader } from '../graph/index.js';
import { Pattern } from './pattern.js';
import { PatternComponentRecordSchema, PatternFileSchema } from './schema.js';
import type { PatternLoadResult, PatternRecord } from './types.js';

export function patternToRecord(pattern: Pattern): PatternRecord {
  return {
    name: pattern.name,
    description: pattern.description,
    components: pattern.components.map(({ component, role }) => ({
      name: component.name,
      role,
      capabilities: [...component.capabilities],
    })),
    tags: pattern.tags,
    evolution_notes: [...pattern.notes],
  };
}

/**
 * Rebuild a pattern from its exchange form. Entries that do not decode or
 * name no known component are skipped and listed in `diagnostics`.
 *
 * @param source - file path or other label used in messages
 */
export function patternFromRecord(
  raw: unknown,
  graph: Pick<CatalogReader, 'resolveComponent'>,
  source = 'input'
): PatternLoadResult {
  const parsed = PatternFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PatternError(
      ErrorCodes.MALFORMED_FILE,
      `Invalid pattern in ${source}: ${formatZodError(parsed.error)}`,
      { source }
    );
  }

  const record = parsed.data;
  const pattern = new Pattern({
    name: record.name,
    description: record.description,
    tags: record.tags,
    notes: record.evolution_notes ?? record.transformation_notes ?? [],
  });
  const diagnostics: Diagnostic[] = [];

  record.components.forEach((entry, index) => {
    const decoded = PatternComponentRecordSchema.safeParse(entry);
    if (!decoded.success) {
      diagnostics.push({
        code: ErrorCodes.MALFORMED_ENTRY,
        message: `Skipped component #${index} in ${source}: ${formatZodError(decoded.error)}`,
        entry: `#${index}`,
        file: source,
      });
      return;
    }
    const component = graph.resolveComponent(decoded.data.name);
    if (!component) {
      diagnostics.push({
        code: ErrorCodes.NOT_FOUND,
        message: `Component '${decoded.data.name}' in ${source} is not in the catalog; skipped`,
        entry: decoded.data.name,
        file: source,
      });
      return;
    }
    pattern.addComponent(component, decoded.data.role);
  });

  return { pattern, diagnostics };
}

export async function savePattern(pattern: Pattern, filePath: string): Promise<void> {
  await writeJson(filePath, patternToRecord(pattern));
}

export async function loadPattern(
  filePath: string,
  graph: Pick<CatalogReader, 'resolveComponent'>
): Promise<PatternLoadResult> {
  if (!(await fileExists(filePath))) {
    throw new PatternError(
      ErrorCodes.NOT_FOUND,
      `Pattern file not found: ${filePath}`,
      { filePath }
    );
  }

  let raw: unknown;
  try {
    raw = await loadJson(filePath);
  } catch (error) {
    throw new PatternError(
      ErrorCodes.MALFORMED_FILE,
      `Failed to read pattern file ${filePath}: ${getErrorMessage(error)}`,
      { filePath }
    );
  }
  return patternFromRecord(raw, graph, filePath);
}
