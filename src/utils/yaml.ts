/**
 * YAML parsing with Zod validation, used for the configuration file.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes, errorMessage } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${errorMessage(error)}`,
      { error }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T
): z.infer<T> {
  const result = schema.safeParse(parseYaml(content));

  if (!result.success) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  try {
    const content = await readFile(filePath);
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to load YAML file: ${filePath}`,
      { filePath, error }
    );
  }
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
