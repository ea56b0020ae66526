import { readFileSync } from 'fs';
import { resolve } from 'path';
import { FieldMapper } from '../conditions/FieldMapper.js';
import { MappingConfig, MappingConfigValidator } from '../validators/MappingConfigValidator.js';
import { ValidationError } from '../validators/ValidationError.js';

export type { MappingConfig } from '../validators/MappingConfigValidator.js';

export function emptyMappingConfig(): MappingConfig {
  return { fields: [], fieldMapping: {}, valueTranslations: {}, operatorMapping: {} };
}

/**
 * Fold the `fields` section into the display → canonical table. Explicit
 * `fieldMapping` entries win over ones derived from `fields`.
 */
export function resolveFieldMapping(config: MappingConfig): Record<string, string> {
  return {
    ...new FieldMapper(config.fields).toFieldMapping(),
    ...config.fieldMapping,
  };
}

/**
 * Load and validate a mapping file.
 *
 * @throws ValidationError if the file cannot be read, is not JSON, or fails validation
 */
export function loadMappingConfig(path: string): MappingConfig {
  const absolutePath = resolve(path);

  let content: string;
  try {
    content = readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    throw new ValidationError(
      `Cannot read mapping config "${absolutePath}": ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(
      `Mapping config "${absolutePath}" is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return MappingConfigValidator.validate(raw);
}

/**
 * Load the mapping file named by QUERY_TOOLKIT_MAPPINGS_PATH, or an empty
 * config when the variable is unset.
 */
export function loadMappingConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MappingConfig {
  const path = env.QUERY_TOOLKIT_MAPPINGS_PATH?.trim();
  if (!path) {
    return emptyMappingConfig();
  }
  return loadMappingConfig(path);
}
