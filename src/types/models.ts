/**
 * Type definitions and Zod schemas for type-safe data validation.
 */

import { z } from 'zod';

// ============================================================================
// SCHEMA DESCRIPTORS
// ============================================================================

/**
 * One column of a table, as the model is told about it.
 */
export interface ColumnDescriptor {
	readonly name: string;
	/** Free-form type label, e.g. "integer" or "numeric(5,1)". */
	readonly type: string;
	readonly nullable: boolean;
}

/**
 * Columns of one table in declaration order.
 */
export interface TableDescriptor {
	readonly columns: readonly ColumnDescriptor[];
}

/**
 * Tables available to the model, keyed by table name in enumeration order.
 */
export type SchemaDescriptor = ReadonlyMap<string, TableDescriptor>;

export function column(name: string, type: string, nullable: boolean): ColumnDescriptor {
	return Object.freeze({ name, type, nullable });
}

export function table(columns: ColumnDescriptor[]): TableDescriptor {
	return Object.freeze({ columns: Object.freeze([...columns]) });
}

// ============================================================================
// TRANSLATION
// ============================================================================

/**
 * A natural-language question as it arrives from a caller.
 */
export interface Question {
	readonly question: string;
	readonly modelName?: string;
}

/**
 * A question paired with the schema it will be translated against.
 */
export interface TranslationRequest extends Question {
	readonly schema: SchemaDescriptor;
}

/**
 * SQL extracted from a model response.
 */
export interface TranslationResult {
	readonly sqlQuery: string;
	readonly explanation?: string;
	/** In [0, 1]; 0.0 when the model gave none, 0.5 when it was unreadable. */
	readonly confidence: number;
}

/**
 * Translation result plus which fallbacks were applied on the way.
 */
export interface ProcessedQuery extends TranslationResult {
	readonly schemaFallback: boolean;
	readonly sqlFallback: boolean;
}

// ============================================================================
// EXECUTION
// ============================================================================

export type Row = Record<string, unknown>;

/**
 * Value that can be bound to a named statement parameter.
 */
export const BindingValueSchema = z.union([
	z.string(),
	z.number(),
	z.boolean(),
	z.null(),
	z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])),
]);
export type BindingValue = z.infer<typeof BindingValueSchema>;

export type QueryParams = Record<string, BindingValue>;

export interface ExecutionRequest {
	readonly sqlQuery: string;
	readonly params?: QueryParams;
}

export interface ExecutionResult {
	readonly rows: Row[];
	readonly columnNames: string[];
	readonly rowCount: number;
	readonly executionTimeMs: number;
}

export type QueryErrorKind = 'SyntaxError' | 'ConstraintViolation' | 'ConnectionError' | 'Other';

export interface QueryError {
	readonly kind: QueryErrorKind;
	readonly message: string;
}

// ============================================================================
// PRESENTATION
// ============================================================================

export type OutputFormat = 'html' | 'csv' | 'json';

export interface FormatOptions {
	readonly format?: string;
	readonly visualizationType?: string;
	readonly title?: string;
	readonly description?: string;
}

export interface FormattedResult {
	readonly formattedData: string;
	readonly contentType: string;
	/** `data:` URI of the rendered chart, when one was requested and possible. */
	readonly visualization?: string;
}

// ============================================================================
// HTTP REQUESTS
// ============================================================================

/**
 * POST /process-query
 */
export const ProcessQueryRequestSchema = z.object({
	query: z.string().min(1).describe('Natural language question'),
	model: z.string().min(1).optional().describe('Model name override'),
});

export interface ProcessQueryResponse {
	sql_query: string;
	explanation?: string;
	confidence: number;
	fallback: {
		schema: boolean;
		sql: boolean;
	};
}

/**
 * POST /execute-query
 */
export const ExecuteQueryRequestSchema = z.object({
	query: z.string().min(1).describe('SQL statement to run'),
	params: z.record(BindingValueSchema).optional().describe('Named parameters bound as :name'),
});

export interface ExecuteQueryResponse {
	results: Row[];
	metadata: {
		row_count: number;
		column_names: string[];
		query_execution_time_ms: number;
	};
}

/**
 * POST /format
 */
export const FormatRequestSchema = z.object({
	data: z.array(z.record(z.unknown())).describe('Rows to render'),
	format: z.string().default('html').describe('html, csv or json'),
	visualization_type: z.string().optional().describe('bar, line or pie'),
	title: z.string().optional(),
	description: z.string().optional(),
});

export interface FormatResponse {
	formatted_data: string;
	visualization?: string;
	content_type: string;
}

/**
 * POST /translate-and-execute
 */
export const TranslateAndExecuteRequestSchema = z.object({
	natural_query: z.string().min(1).describe('Natural language question'),
	model: z.string().min(1).optional().describe('Model name override'),
});

export interface TranslateAndExecuteResponse {
	natural_query: string;
	sql_query: string;
	explanation?: string;
	results: Row[];
	metadata: {
		confidence: number;
		execution_time_ms: number;
		llm_processing_time_ms: number;
		total_time_ms: number;
	};
}

/**
 * Response model for errors.
 */
export interface ErrorResponse {
	error: string;
	message: string;
}
