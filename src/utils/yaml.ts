/**
 * YAML parsing utilities for project configuration and package manifests.
 */
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an unknown value. An empty document yields {}.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content) ?? {};
  } catch (error) {
    throw new ConfigurationError(
      ErrorCodes.MANIFEST_INVALID,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      undefined,
      error
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
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new ConfigurationError(
      ErrorCodes.MANIFEST_INVALID,
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
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new ConfigurationError(
      ErrorCodes.MANIFEST_INVALID,
      `Failed to read YAML file: ${filePath}`,
      { filePath },
      error
    );
  }

  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      // Re-throw with file path context
      throw new ConfigurationError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath },
        error.cause
      );
    }
    throw error;
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
