import type { ValueError } from '@sinclair/typebox/errors';

/**
 * Flattens TypeBox validation errors into `path: message` lines.
 */
export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);
