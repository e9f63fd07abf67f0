/**
 * Crime Pipeline Core Types
 *
 * Shared table model for every pipeline layer. Tables are plain, readonly
 * column/row structures so that each stage can hand its output to the next
 * one in memory.
 *
 * TYPE SAFETY: No `any`. Cells are string, number or null and nothing else.
 */

import type { PipelineError } from './errors.js';

// ============================================================================
// Table Model
// ============================================================================

/**
 * A single cell. Empty CSV fields are read as `null`.
 */
export type CellValue = string | number | null;

/**
 * One row, keyed by column name
 */
export type Row = Readonly<Record<string, CellValue>>;

/**
 * In-memory table. Column order is significant and preserved on write.
 */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

// ============================================================================
// Outcome Categories
// ============================================================================

/**
 * Broad outcome categories, in display order
 */
export const BROAD_OUTCOME_CATEGORIES = [
  'No Further Action',
  'Non-criminal Outcome',
  'Public Interest Consideration',
  'Unknown',
] as const;

export type BroadOutcomeCategory = (typeof BROAD_OUTCOME_CATEGORIES)[number];

/**
 * One entry of the ordered classification table
 */
export interface OutcomeCategoryRule {
  readonly category: Exclude<BroadOutcomeCategory, 'Unknown'>;
  readonly outcomes: readonly string[];
}

// ============================================================================
// Primary Layer
// ============================================================================

/**
 * Label enumerations for the categorical columns of the primary layer
 */
export interface PrimaryCategories {
  readonly crimeTypes: readonly string[];
  readonly outcomeCategories: readonly BroadOutcomeCategory[];
}

/**
 * Primary table: staged rows plus validated categorical label sets
 */
export interface PrimaryTable extends Table {
  readonly categories: PrimaryCategories;
}

// ============================================================================
// Stage Results
// ============================================================================

/**
 * Tagged result returned by every stage boundary
 */
export type StageResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: PipelineError };

/**
 * Result of ingesting one file
 */
export type IngestResult = StageResult<Table>;

/**
 * Pipeline stage names
 */
export type StageName = 'ingest' | 'stage' | 'primary' | 'reporting';

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: PipelineError): StageResult<T> {
  return { ok: false, error };
}
