/**
 * Prompt construction for SQL translation.
 *
 * The output directive below is the contract `parseModelResponse` relies on:
 * three labelled fields, in this order.
 */

import type { SchemaDescriptor } from '../types/models.js';

export const SQL_MARKER = 'SQL:';
export const EXPLANATION_MARKER = 'EXPLANATION:';
export const CONFIDENCE_MARKER = 'CONFIDENCE:';

export const NO_SCHEMA_TEXT = 'No schema available.';

const OUTPUT_DIRECTIVE = `Return the answer in the following format:
${SQL_MARKER} <the SQL query>
${EXPLANATION_MARKER} <brief explanation of how the query works>
${CONFIDENCE_MARKER} <a number from 0 to 1 indicating confidence>`;

/**
 * One line per table: `Table: cars (id integer, model varchar(50), ...)`.
 */
export function formatSchemaForPrompt(schema?: SchemaDescriptor): string {
  if (!schema || schema.size === 0) {
    return NO_SCHEMA_TEXT;
  }

  const lines: string[] = [];
  for (const [tableName, info] of schema) {
    const columns = info.columns.map((col) => `${col.name} ${col.type}`).join(', ');
    lines.push(`Table: ${tableName} (${columns})`);
  }

  return lines.join('\n');
}

/**
 * The question is embedded verbatim; the model reads the whole prompt as
 * plain instructions.
 */
export function buildPrompt(question: string, schema?: SchemaDescriptor): string {
  return `Given the following PostgreSQL database schema:

${formatSchemaForPrompt(schema)}

Translate this natural language question into a valid SQL query:
"${question}"

${OUTPUT_DIRECTIVE}

Make sure the SQL is valid PostgreSQL syntax, contains no syntax errors, and would run correctly against the described database.
`;
}
