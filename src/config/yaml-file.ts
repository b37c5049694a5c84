import * as fs from 'fs';
import yaml from 'js-yaml';
import { ValidateFunction } from 'ajv';
import { ConfigurationError } from '../errors';

export function formatAjvErrors(validate: ValidateFunction): string {
  return (validate.errors ?? [])
    .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    .join('; ');
}

/** Read, parse and schema-check a YAML file. Throws ConfigurationError. */
export function loadYamlFile<T>(filepath: string, validate: ValidateFunction<T>): T {
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(filepath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Failed to read ${filepath}: ${err instanceof Error ? err.message : String(err)}`, {
      filepath,
    });
  }
  if (!validate(parsed)) {
    throw new ConfigurationError(`Invalid ${filepath}: ${formatAjvErrors(validate)}`, { filepath });
  }
  return parsed;
}
