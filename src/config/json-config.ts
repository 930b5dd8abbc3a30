import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigFileError, errorMessage } from '../common/errors';

// fs errors may come from another realm (Jest's sandbox), so no instanceof
function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * Read and parse a JSON file. Resolves to `undefined` when the file does
 * not exist; any other read or parse failure is a ConfigFileError.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return undefined;
    }
    throw new ConfigFileError(filePath, [errorMessage(error)]);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new ConfigFileError(filePath, [errorMessage(error)]);
  }
}

/** Read a JSON file that must exist and match `schema`. */
export async function readJsonConfig<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
): Promise<z.infer<T>> {
  const data = await readJsonFile(filePath);
  if (data === undefined) {
    throw new ConfigFileError(filePath, ['file not found']);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigFileError(
      filePath,
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
}
