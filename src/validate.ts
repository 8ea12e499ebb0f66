import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { Ajv, type Schema, type ValidateFunction } from 'ajv';
import { DatasetError } from './errors/index.js';
import type { Dataset } from './types/index.js';

const ajv = new Ajv({ allErrors: true, strict: false });

const defaultSchemaPath = fileURLToPath(new URL('../schemas/dataset.json', import.meta.url));

const validatorCache = new Map<string, ValidateFunction<Dataset>>();

async function loadValidator (schemaPath: string): Promise<ValidateFunction<Dataset>> {
  const cached = validatorCache.get(schemaPath);
  if (cached) return cached;
  const schema: Schema = JSON.parse(await readFile(schemaPath, 'utf8'));
  const validator = ajv.compile<Dataset>(schema);
  validatorCache.set(schemaPath, validator);
  return validator;
}

/**
 * Checks only that the document is a mapping of keys to objects. Record
 * fields stay opaque.
 */
export async function validateDataset (
  data: unknown,
  schemaPath: string = defaultSchemaPath
): Promise<Dataset> {
  const validator = await loadValidator(schemaPath);
  if (!validator(data)) {
    const message = ajv.errorsText(validator.errors, { dataVar: 'dataset' });
    throw new DatasetError(`Input is not a key → record mapping: ${message}`);
  }
  return data;
}
