/**
 * @arch hexgraph.infra.fs
 *
 * YAML parsing for configuration and component manifests.
 */
import { parse, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';
import { formatZodError } from './format.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    const details: Record<string, unknown> = {};
    if (error instanceof YAMLParseError && error.linePos) {
      details.line = error.linePos[0].line;
      details.column = error.linePos[0].col;
    }
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      details
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T,
  errorCode: string = ErrorCodes.PARSE_ERROR
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new SystemError(
      errorCode,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { issues: result.error.issues.map((issue) => issue.message) }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 * Errors are re-thrown with the file path attached.
 */
export async function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T,
  errorCode: string = ErrorCodes.PARSE_ERROR
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.FILE_NOT_FOUND,
      `Failed to read YAML file: ${filePath}`,
      { filePath, reason: error instanceof Error ? error.message : String(error) }
    );
  }

  try {
    return parseYamlWithSchema(content, schema, errorCode);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw error;
  }
}
